import type { ClickHouseClient } from "@clickhouse/client";
import { isSizeExceededError, queryClickHouse } from "../clickhouse/client";
import { ACTIVITY_TABLES } from "../clickhouse/tables";
import type { ActivityRow } from "../clickhouse/types";
import type { ActivityLogSource } from "./types";

export const DEFAULT_MAX_RESULT_BYTES = 64 * 1024 * 1024;

/** Upper bound of the UInt32 `LIMIT` parameter. */
export const MAX_QUERY_ENTRIES = 4294967295;

export interface ClickHouseActivitySourceOptions {
  table?: string;
  maxResultBytes?: number;
}

/**
 * Activity source backed by the Graph activity log table. The query returns
 * distinct (method, URI) pairs for one service principal, successful
 * responses only. ClickHouse strips the query string and collapses duplicate
 * slashes; identifier substitution happens locally afterwards.
 */
export function createClickHouseActivitySource(
  client: ClickHouseClient,
  options: ClickHouseActivitySourceOptions = {},
): ActivityLogSource {
  const table = options.table ?? ACTIVITY_TABLES.graphActivity;
  const maxResultBytes = options.maxResultBytes ?? DEFAULT_MAX_RESULT_BYTES;

  const sql = `
    SELECT DISTINCT
      upper(RequestMethod) AS method,
      concat(
        protocol(RequestUri), '://', domain(RequestUri),
        replaceRegexpAll(path(RequestUri), '/{2,}', '/')
      ) AS uri
    FROM ${table}
    WHERE TimeGenerated >= fromUnixTimestamp64Milli({startMs:Int64})
      AND TimeGenerated < fromUnixTimestamp64Milli({endMs:Int64})
      AND ServicePrincipalId = {principalId:String}
      AND ResponseStatusCode >= 200
      AND ResponseStatusCode < 300
    LIMIT {maxEntries:UInt32}
  `;

  return {
    async queryActivity(principalId, window) {
      try {
        const rows = await queryClickHouse<ActivityRow>(
          client,
          sql,
          {
            principalId,
            startMs: window.start.getTime(),
            endMs: window.end.getTime(),
            maxEntries: window.maxEntries,
          },
          {
            max_result_bytes: String(maxResultBytes),
            result_overflow_mode: "throw",
            wait_end_of_query: 1,
          },
        );
        return {
          status: "ok",
          activities: rows.map((row) => ({ method: row.method, uri: row.uri })),
        };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (isSizeExceededError(err)) {
          return { status: "size_exceeded", message };
        }
        console.error(`Activity query failed for ${principalId}:`, err);
        return { status: "error", message };
      }
    },
  };
}
