import { Hono } from "hono";
import { z } from "zod";
import { MAX_QUERY_ENTRIES } from "../activity/clickhouseSource";
import type { ActivityLogSource } from "../activity/types";
import { analyzeApplications, MAX_LOOKBACK_DAYS } from "../analysis/analyzer";
import type { PermissionMapIndex } from "../permission-map/types";
import type { PoolOptions } from "../scheduler/pool";

const applicationSchema = z.object({
  id: z.string().min(1),
  principalId: z.string().min(1),
  displayName: z.string().optional(),
  currentPermissions: z.array(z.string().min(1)).optional(),
});

export const analyzeRequestSchema = z.object({
  applications: z.array(applicationSchema).min(1),
  lookbackDays: z.number().int().positive().max(MAX_LOOKBACK_DAYS).optional(),
  maxEntries: z.number().int().positive().max(MAX_QUERY_ENTRIES).optional(),
});

export interface AnalyzeRouteOptions {
  source: ActivityLogSource;
  index: PermissionMapIndex;
  lookbackDays: number;
  maxEntries: number;
  pool?: PoolOptions;
}

export function createAnalyzeRoute(options: AnalyzeRouteOptions): Hono {
  const analyzeRoute = new Hono();

  analyzeRoute.post("/analyze", async (c) => {
    const rawBody: unknown = await c.req.json().catch(() => null);
    const parsed = analyzeRequestSchema.safeParse(rawBody);

    if (!parsed.success) {
      return c.json({ error: "Invalid payload", details: parsed.error.issues }, 400);
    }

    const request = parsed.data;

    try {
      const batch = await analyzeApplications(
        request.applications,
        {
          source: options.source,
          index: options.index,
          lookbackDays: request.lookbackDays ?? options.lookbackDays,
          maxEntries: request.maxEntries ?? options.maxEntries,
        },
        options.pool,
      );

      const failed = batch.reports.some((r) => r.status === "failed");
      const status = failed || batch.timedOut ? 207 : 200;
      return c.json(batch, status);
    } catch (err) {
      console.error("Analysis failed:", err);
      return c.json(
        { error: err instanceof Error ? err.message : String(err) },
        500,
      );
    }
  });

  return analyzeRoute;
}
