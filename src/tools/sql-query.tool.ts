// ═════════════════════════════════════════════════════════════════════════════
// SQL QUERY TOOL — Read-only database access for the agents
// ═════════════════════════════════════════════════════════════════════════════

import { AgentTool } from "../utils/types";

export const SQL_QUERY_TOOL_NAME = "query_database";
export const SQL_MAX_ROWS = 50;

const READ_ONLY_KEYWORDS = new Set(["select", "with", "show", "explain"]);

/**
 * Runs one statement and resolves to its rows.
 */
export type SqlExecutor = (query: string) => Promise<Record<string, unknown>[]>;

/**
 * Accepts a single SELECT/WITH/SHOW/EXPLAIN statement. A trailing semicolon is
 * allowed; any other semicolon means a second statement and is refused.
 */
export function isReadOnlyQuery(query: string): boolean {
  const statement = query.trim().replace(/;\s*$/, "");
  if (!statement || statement.includes(";")) {
    return false;
  }
  const keyword = statement.split(/\s+/)[0].toLowerCase();
  return READ_ONLY_KEYWORDS.has(keyword);
}

export function createSqlQueryTool(execute: SqlExecutor): AgentTool {
  return {
    schema: {
      name: SQL_QUERY_TOOL_NAME,
      description:
        "Run a read-only SQL SELECT against the service database (e.g. the `listing` table " +
        "for equipment information). Returns rows as JSON.",
      parameters: {
        query: {
          type: "string",
          description: "A single SELECT statement",
        },
      },
      required: ["query"],
    },
    handler: async (args) => {
      const query = typeof args.query === "string" ? args.query : "";
      if (!isReadOnlyQuery(query)) {
        return "Rejected: only read-only SELECT queries are allowed.";
      }

      try {
        const rows = await execute(query);
        return JSON.stringify(rows.slice(0, SQL_MAX_ROWS));
      } catch (err) {
        return `Query failed: ${err instanceof Error ? err.message : String(err)}`;
      }
    },
  };
}
