// ============================================================================
// Cash Logistics MCP Server — Error Types
// ============================================================================

export const ERROR_KINDS = [
    "UnknownTool",
    "InvalidArguments",
    "NotFound",
    "ForbiddenOperation",
    "QueryError",
    "ResultTooLarge",
    "QueryTimeout",
    "ProtocolDecodeError",
    "FatalStartup",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Base error class for every failure this server reports.
 * `kind` is what the caller sees in a structured error response.
 */
export class CashLogisticsError extends Error {
    readonly kind: ErrorKind;
    readonly context?: Record<string, unknown>;

    constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = "CashLogisticsError";
        this.kind = kind;
        this.context = context;
    }
}

/**
 * Thrown when a tool name is outside the closed tool set.
 */
export class UnknownToolError extends CashLogisticsError {
    constructor(toolName: string) {
        super("UnknownTool", `Unknown tool: ${toolName}`, { tool: toolName });
        this.name = "UnknownToolError";
    }
}

/**
 * Thrown when tool arguments fail validation. Raised before any store access.
 */
export class InvalidArgumentsError extends CashLogisticsError {
    constructor(toolName: string, detail: string) {
        super("InvalidArguments", `Invalid arguments for ${toolName}: ${detail}`, { tool: toolName });
        this.name = "InvalidArgumentsError";
    }
}

export class NotFoundError extends CashLogisticsError {
    constructor(entity: string, id: string) {
        super("NotFound", `${entity} "${id}" not found.`, { entity, id });
        this.name = "NotFoundError";
    }
}

/**
 * Thrown when a mutating statement reaches the read-only path.
 */
export class ForbiddenOperationError extends CashLogisticsError {
    constructor(reason: string) {
        super("ForbiddenOperation", `Statement rejected on the read-only path: ${reason}`);
        this.name = "ForbiddenOperationError";
    }
}

/**
 * Wraps a failure raised by the backing store. The underlying message is kept.
 */
export class QueryError extends CashLogisticsError {
    constructor(message: string, context?: Record<string, unknown>) {
        super("QueryError", message, context);
        this.name = "QueryError";
    }
}

export class ResultTooLargeError extends CashLogisticsError {
    constructor(maxRows: number) {
        super("ResultTooLarge", `Query returned more than ${maxRows} rows. Narrow the query or aggregate.`, { maxRows });
        this.name = "ResultTooLargeError";
    }
}

export class QueryTimeoutError extends CashLogisticsError {
    constructor(timeoutMs: number) {
        super("QueryTimeout", `Query exceeded the ${timeoutMs} ms timeout and was aborted.`, { timeoutMs });
        this.name = "QueryTimeoutError";
    }
}

export class ProtocolDecodeError extends CashLogisticsError {
    constructor(message: string) {
        super("ProtocolDecodeError", message);
        this.name = "ProtocolDecodeError";
    }
}

/**
 * Thrown when the server cannot start: bad configuration or an unreachable store.
 */
export class FatalStartupError extends CashLogisticsError {
    constructor(message: string, context?: Record<string, unknown>) {
        super("FatalStartup", message, context);
        this.name = "FatalStartupError";
    }
}

/**
 * Normalize anything thrown inside a tool call. Non-domain exceptions are
 * store-side failures as far as the caller is concerned.
 */
export function toCashLogisticsError(err: unknown): CashLogisticsError {
    if (err instanceof CashLogisticsError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new QueryError(message);
}
