// ============================================================================
// Cash Logistics MCP Server — Protocol Server
// ============================================================================

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { listTools } from "./tools/definitions.js";
import type { ToolDispatcher } from "./tools/dispatcher.js";

/**
 * Build the MCP server around a dispatcher. The SDK handles the handshake
 * (initialize, ping, tools/list); every tools/call lands in the dispatcher.
 */
export function createServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {} },
      instructions:
        "Cash-logistics data for retail stores: deposits, armored-carrier pickup schedules and outcomes, " +
        "carrier costs. Use list_tables/describe_table before writing SQL; prefer the rule tools " +
        "(detect_missed_pickups, score_risk, detect_schedule_mismatches, find_consolidation_opportunities, analyze_costs, " +
        "generate_findings) over hand-written queries.",
    }
  );

  const tools = listTools();
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    dispatcher.handle(request.params.name, request.params.arguments ?? {})
  );

  return server;
}
