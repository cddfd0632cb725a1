import type { ClickHouseClient } from "@clickhouse/client";
import { Hono } from "hono";
import { pingClickHouse } from "../clickhouse/client";

export function createHealthRoute(clickhouse: ClickHouseClient): Hono {
  const health = new Hono();

  health.get("/health", async (c) => {
    const healthy = await pingClickHouse(clickhouse);
    if (!healthy) {
      return c.json({ status: "error" }, 503);
    }
    return c.json({ status: "ok" });
  });

  return health;
}
