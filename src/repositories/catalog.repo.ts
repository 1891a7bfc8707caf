// ============================================================================
// Cash Logistics MCP Server — Schema Catalog
// ============================================================================

import { z } from "zod";
import { NotFoundError } from "../errors.js";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { ColumnInfo } from "../types.js";

const NameRow = z.object({ name: z.string() });

const ColumnRow = z.object({
    cid: z.number(),
    name: z.string(),
    type: z.string(),
    notnull: z.number(),
    dflt_value: z.string().nullable(),
    pk: z.number(),
});

/**
 * Live view of the store's schema. Every call introspects the database, so
 * tables created or altered through write_query show up immediately.
 */
export class CatalogRepo {
    constructor(private executor: QueryExecutor) { }

    listTables(): string[] {
        return this.executor
            .select(
                "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name",
                [],
                NameRow
            )
            .map((r) => r.name);
    }

    describeTable(tableName: string): ColumnInfo[] {
        const match = this.executor.select(
            "SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name = ? COLLATE NOCASE",
            [tableName],
            NameRow
        )[0];
        if (!match) throw new NotFoundError("Table", tableName);

        return this.executor
            .select(
                "SELECT cid, name, type, \"notnull\", dflt_value, pk FROM pragma_table_info(?) ORDER BY cid",
                [match.name],
                ColumnRow
            )
            .map((c) => ({
                name: c.name,
                type: c.type,
                nullable: c.notnull === 0,
                primaryKey: c.pk > 0,
                defaultValue: c.dflt_value,
            }));
    }

    /** True when `tableName` exists and has every column in `columns`. */
    hasColumns(tableName: string, columns: readonly string[]): boolean {
        let described: ColumnInfo[];
        try {
            described = this.describeTable(tableName);
        } catch (err) {
            if (err instanceof NotFoundError) return false;
            throw err;
        }
        const present = new Set(described.map((c) => c.name.toLowerCase()));
        return columns.every((c) => present.has(c.toLowerCase()));
    }
}
