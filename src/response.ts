// ============================================================================
// Cash Logistics MCP Server — Response Helpers
// ============================================================================

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { CashLogisticsError } from "./errors.js";

/**
 * JSON replacer that strips null values from tool payloads.
 */
function stripNulls(_key: string, value: unknown): unknown {
    return value === null ? undefined : value;
}

/**
 * Return a successful JSON response (compact, nulls stripped).
 */
export function success(data: Record<string, unknown>): CallToolResult {
    return {
        content: [{ type: "text", text: JSON.stringify(data, stripNulls) }],
    };
}

/**
 * Return a structured error response: `{"error":{"kind","message"}}`.
 * MCP carries tool failures in-band, so this is still a `result`, flagged with isError.
 */
export function failure(err: CashLogisticsError): CallToolResult {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ error: { kind: err.kind, message: err.message } }) }],
    };
}
