#!/usr/bin/env node
// ============================================================================
//
//   Cash Logistics MCP Server
//   Tool server + rule engine over a cash-logistics SQLite store
//
// ============================================================================

import { loadConfig } from "./config.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { openStore } from "./database.js";
import { CashLogisticsError } from "./errors.js";
import { errorContext, log } from "./logger.js";
import { createRepositories } from "./repositories/index.js";
import { createServer } from "./server.js";
import { createRuleServices } from "./services/index.js";
import { ToolDispatcher } from "./tools/dispatcher.js";
import { SerialStdioTransport } from "./transport/serial-stdio.js";

const USAGE = `${SERVER_NAME} v${SERVER_VERSION}

Usage: cash-logistics-mcp --db <path> [options]

Options (each also read from the environment variable shown):
  --db <path>                    CASH_LOGISTICS_DB_PATH           SQLite store (required)
  --max-rows <n>                 CASH_LOGISTICS_MAX_ROWS          Result row ceiling (10000)
  --query-timeout-ms <ms>        CASH_LOGISTICS_QUERY_TIMEOUT_MS  Per-query timeout (5000)
  --high-volume-threshold <usd>  CASH_LOGISTICS_HIGH_VOLUME_THRESHOLD  (30000)
  --cash-sitting-hours <h>       CASH_LOGISTICS_CASH_SITTING_HOURS     (48)
  --log-level <level>            CASH_LOGISTICS_LOG_LEVEL         debug | info | warn | error
  --help, --version
`;

// ─── Initialize ───────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // stdout carries protocol frames only
  if (args.includes("--help") || args.includes("-h")) {
    process.stderr.write(USAGE);
    return;
  }
  if (args.includes("--version") || args.includes("-v")) {
    process.stderr.write(`${SERVER_VERSION}\n`);
    return;
  }

  const config = loadConfig(args);
  log.setLevel(config.logLevel);

  const executor = openStore({
    dbPath: config.dbPath,
    maxResultRows: config.maxResultRows,
    queryTimeoutMs: config.queryTimeoutMs,
  });
  log.info(`Store opened: ${config.dbPath}`);

  const repos = createRepositories(executor);
  const dispatcher = new ToolDispatcher({
    executor,
    repos,
    rules: createRuleServices(repos),
    config: config.rules,
  });

  const server = createServer(dispatcher);
  server.onclose = () => {
    executor.close();
    log.info("Input closed; store released. Bye.");
  };

  // ─── Connect Transport ───────────────────────────────────────────

  await server.connect(new SerialStdioTransport(process.stdin, process.stdout));
  log.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio. Ready.`);
}

// ─── Run ──────────────────────────────────────────────────────────────

main().catch((error: unknown) => {
  if (error instanceof CashLogisticsError) {
    log.error("Startup failed", errorContext(error));
  } else {
    log.error("Fatal error", { message: error instanceof Error ? error.message : String(error) });
  }
  process.exit(1);
});
