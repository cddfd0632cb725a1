export const API_VERSIONS = ["v1.0", "beta"] as const;

export type ApiVersion = (typeof API_VERSIONS)[number];

/**
 * One distinct successful call observed in the activity log.
 */
export interface RawActivity {
  method: string;
  uri: string;
}

/**
 * A call reduced to method, API version and identifier-free path.
 */
export interface CanonicalActivity {
  method: string;
  version: ApiVersion;
  path: string;
}

/**
 * Half-open query window `[start, end)` with the row budget for that window.
 */
export interface ActivityWindow {
  start: Date;
  end: Date;
  maxEntries: number;
}

export type ActivityQueryOutcome =
  | { status: "ok"; activities: RawActivity[] }
  | { status: "size_exceeded"; message: string }
  | { status: "error"; message: string };

export interface ActivityLogSource {
  queryActivity(
    principalId: string,
    window: ActivityWindow,
  ): Promise<ActivityQueryOutcome>;
}

export type CollectionOutcome =
  | {
      status: "ok";
      activities: RawActivity[];
      /** One-day slices that still overflowed and were treated as empty. */
      skippedWindows: ActivityWindow[];
    }
  | { status: "failed"; error: string };
