import {
  createClient,
  type ClickHouseClient,
  type ClickHouseSettings,
} from "@clickhouse/client";

export interface ClickHouseConnection {
  url: string;
  username?: string;
  password?: string;
}

/** ClickHouse error code for TOO_MANY_ROWS_OR_BYTES. */
export const SIZE_EXCEEDED_CODE = "396";
export const SIZE_EXCEEDED_TYPE = "TOO_MANY_ROWS_OR_BYTES";

export function createClickHouseClient(
  connection: ClickHouseConnection,
): ClickHouseClient {
  return createClient({
    url: connection.url,
    username: connection.username,
    password: connection.password,
  });
}

export async function pingClickHouse(
  client: ClickHouseClient,
): Promise<boolean> {
  try {
    const result = await client.ping();
    return result.success;
  } catch {
    return false;
  }
}

export interface WaitOptions {
  maxAttempts?: number;
  delayMs?: number;
}

/**
 * Ping until ClickHouse answers or the attempts run out. Resolves false in
 * the latter case.
 */
export async function waitForClickHouse(
  client: ClickHouseClient,
  { maxAttempts = 30, delayMs = 2000 }: WaitOptions = {},
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (await pingClickHouse(client)) {
      console.log(`ClickHouse healthy after ${attempt} attempt(s)`);
      return true;
    }
    if (attempt < maxAttempts) {
      console.log(
        `ClickHouse not ready (attempt ${attempt}/${maxAttempts}), retrying in ${delayMs}ms`,
      );
      await new Promise((r) => setTimeout(r, delayMs));
    }
  }
  return false;
}

export async function queryClickHouse<T>(
  client: ClickHouseClient,
  query: string,
  params?: Record<string, unknown>,
  settings?: ClickHouseSettings,
): Promise<T[]> {
  const result = await client.query({
    query,
    query_params: params,
    format: "JSONEachRow",
    clickhouse_settings: settings,
  });
  return result.json<T>();
}

/**
 * True when ClickHouse refused the query because its result would exceed
 * `max_result_rows` / `max_result_bytes`.
 */
export function isSizeExceededError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  if ("code" in err && err.code === SIZE_EXCEEDED_CODE) return true;
  if ("type" in err && err.type === SIZE_EXCEEDED_TYPE) return true;

  return err.message.includes(SIZE_EXCEEDED_TYPE);
}
