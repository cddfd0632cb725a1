import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { createClickHouseActivitySource } from "./activity/clickhouseSource";
import { createClickHouseClient, waitForClickHouse } from "./clickhouse/client";
import { getConfig, permissionMapSource } from "./config";
import { loadPermissionMapDocuments } from "./permission-map/loader";
import { createPermissionMapIndex } from "./permission-map/mapIndex";
import { createAnalyzeRoute } from "./routes/analyze";
import { createHealthRoute } from "./routes/health";

async function main(): Promise<void> {
  const config = getConfig();
  const clickhouse = createClickHouseClient({
    url: config.CLICKHOUSE_URL,
    username: config.CLICKHOUSE_USERNAME,
    password: config.CLICKHOUSE_PASSWORD,
  });

  const maxAttempts = 30;
  if (!(await waitForClickHouse(clickhouse, { maxAttempts }))) {
    console.error(`ClickHouse not reachable after ${maxAttempts} attempts, exiting`);
    process.exit(1);
  }

  const documents = await loadPermissionMapDocuments(permissionMapSource(config));
  const index = createPermissionMapIndex(documents);
  console.log(
    `Permission map loaded: ${index.size("v1.0")} v1.0 and ${index.size("beta")} beta endpoints`,
  );

  const source = createClickHouseActivitySource(clickhouse, {
    table: config.ACTIVITY_LOG_TABLE,
    maxResultBytes: config.MAX_RESULT_BYTES,
  });

  const app = new Hono();
  app.route("/", createHealthRoute(clickhouse));
  app.route(
    "/",
    createAnalyzeRoute({
      source,
      index,
      lookbackDays: config.LOOKBACK_DAYS,
      maxEntries: config.MAX_ENTRIES,
      pool: {
        workerCount: config.WORKER_COUNT,
        stallTimeoutMs: config.STALL_TIMEOUT_MS,
      },
    }),
  );

  serve({ fetch: app.fetch, port: config.PORT });
  console.log(`Permission analyzer listening on :${config.PORT}`);

  process.on("SIGTERM", () => {
    console.log("SIGTERM received, shutting down");
    clickhouse
      .close()
      .catch((err) => console.error("Failed to close ClickHouse client:", err))
      .finally(() => process.exit(0));
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
