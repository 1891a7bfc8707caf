// ============================================================================
// Cash Logistics MCP Server — SQL Guard
// ============================================================================
//
// Text inspection for the read-only path. Keyword scanning is a best-effort
// filter: the executor also asks SQLite whether the prepared statement is
// read-only, and file stores serve reads from a connection opened readonly.

export const MUTATION_KEYWORDS = [
    "INSERT",
    "UPDATE",
    "DELETE",
    "DROP",
    "ALTER",
    "CREATE",
    "REPLACE",
    "TRUNCATE",
    "ATTACH",
    "DETACH",
    "VACUUM",
    "REINDEX",
    "PRAGMA",
] as const;

// A keyword directly followed by "(" is a function call, e.g. replace(x, 'a', 'b').
const MUTATION_RE = new RegExp(`\\b(${MUTATION_KEYWORDS.join("|")})\\b(?!\\s*\\()`, "i");
const RETRIEVAL_START_RE = /^(SELECT|WITH)\b/i;

export type ReadCheck =
    | { ok: true }
    | { ok: false; reason: string };

/**
 * Blank out string literals, quoted identifiers and comments so keywords
 * inside them are not mistaken for statements. Length is preserved.
 */
export function maskSqlText(sql: string): string {
    let out = "";
    let i = 0;
    while (i < sql.length) {
        const ch = sql[i];
        const next = sql[i + 1];

        if (ch === "-" && next === "-") {
            const end = sql.indexOf("\n", i);
            const stop = end === -1 ? sql.length : end;
            out += " ".repeat(stop - i);
            i = stop;
            continue;
        }

        if (ch === "/" && next === "*") {
            const end = sql.indexOf("*/", i + 2);
            const stop = end === -1 ? sql.length : end + 2;
            out += " ".repeat(stop - i);
            i = stop;
            continue;
        }

        if (ch === "'" || ch === "\"" || ch === "`" || ch === "[") {
            const close = ch === "[" ? "]" : ch;
            let j = i + 1;
            while (j < sql.length) {
                if (sql[j] === close) {
                    // doubled quote is an escaped quote
                    if (close !== "]" && sql[j + 1] === close) { j += 2; continue; }
                    break;
                }
                j++;
            }
            const stop = Math.min(j + 1, sql.length);
            out += " ".repeat(stop - i);
            i = stop;
            continue;
        }

        out += ch;
        i++;
    }
    return out;
}

/** True when the masked text holds more than one statement. */
export function hasMultipleStatements(masked: string): boolean {
    const idx = masked.indexOf(";");
    return idx !== -1 && masked.slice(idx + 1).trim().length > 0;
}

export function findMutationKeyword(masked: string): string | null {
    const m = MUTATION_RE.exec(masked);
    return m ? m[1].toUpperCase() : null;
}

/**
 * Decide whether a statement may run on the read-only path.
 */
export function checkReadStatement(sql: string): ReadCheck {
    const masked = maskSqlText(sql).trim();
    if (masked.length === 0) return { ok: false, reason: "empty statement" };
    if (hasMultipleStatements(masked)) return { ok: false, reason: "only a single statement is allowed" };

    const keyword = findMutationKeyword(masked);
    if (keyword) return { ok: false, reason: `contains ${keyword}` };

    if (!RETRIEVAL_START_RE.test(masked)) {
        return { ok: false, reason: "only SELECT or WITH statements are allowed" };
    }
    return { ok: true };
}
