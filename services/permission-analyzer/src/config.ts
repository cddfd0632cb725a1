import { z } from "zod";
import { DEFAULT_MAX_RESULT_BYTES, MAX_QUERY_ENTRIES } from "./activity/clickhouseSource";
import { MAX_LOOKBACK_DAYS } from "./analysis/analyzer";
import { ACTIVITY_TABLES } from "./clickhouse/tables";
import type { PermissionMapSource } from "./permission-map/loader";
import { DEFAULT_STALL_TIMEOUT_MS, DEFAULT_WORKER_COUNT } from "./scheduler/pool";

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CLICKHOUSE_URL: z.string().url().default("http://localhost:8123"),
  CLICKHOUSE_USERNAME: z.string().optional(),
  CLICKHOUSE_PASSWORD: z.string().optional(),
  ACTIVITY_LOG_TABLE: z.string().min(1).default(ACTIVITY_TABLES.graphActivity),
  LOOKBACK_DAYS: z.coerce.number().int().positive().max(MAX_LOOKBACK_DAYS).default(30),
  MAX_ENTRIES: z.coerce.number().int().positive().max(MAX_QUERY_ENTRIES).default(100000),
  MAX_RESULT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULT_BYTES),
  WORKER_COUNT: z.coerce.number().int().positive().default(DEFAULT_WORKER_COUNT),
  STALL_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_STALL_TIMEOUT_MS),
  PERMISSION_MAP_DIR: z.string().min(1).default("./permission-map"),
  PERMISSION_MAP_BUCKET: z.string().min(1).optional(),
  PERMISSION_MAP_PREFIX: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}

/** The bucket wins when both a bucket and a directory are configured. */
export function permissionMapSource(config: Config): PermissionMapSource {
  if (config.PERMISSION_MAP_BUCKET) {
    return {
      kind: "gcs",
      bucket: config.PERMISSION_MAP_BUCKET,
      prefix: config.PERMISSION_MAP_PREFIX,
    };
  }
  return { kind: "file", directory: config.PERMISSION_MAP_DIR };
}
