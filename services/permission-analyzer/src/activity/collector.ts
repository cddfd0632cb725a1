import { canonicalizeUri } from "./canonicalize";
import type {
  ActivityLogSource,
  ActivityWindow,
  CollectionOutcome,
  RawActivity,
} from "./types";

export const MIN_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface CollectorOptions {
  /** Windows this short or shorter are not split further. */
  minWindowMs?: number;
}

function formatWindow(window: ActivityWindow): string {
  return `${window.start.toISOString()}..${window.end.toISOString()}`;
}

/**
 * Split a window at its midpoint. Each half gets half the row budget, never
 * less than one.
 */
export function bisectWindow(window: ActivityWindow): [ActivityWindow, ActivityWindow] {
  const start = window.start.getTime();
  const end = window.end.getTime();
  const mid = start + Math.floor((end - start) / 2);
  const maxEntries = Math.max(1, Math.floor(window.maxEntries / 2));

  return [
    { start: new Date(start), end: new Date(mid), maxEntries },
    { start: new Date(mid), end: new Date(end), maxEntries },
  ];
}

/**
 * Canonicalize URIs and drop repeats, keeping first-seen order.
 */
export function dedupeActivities(activities: RawActivity[]): RawActivity[] {
  const seen = new Map<string, RawActivity>();
  for (const activity of activities) {
    const method = activity.method.trim().toUpperCase();
    const uri = canonicalizeUri(activity.uri);
    const key = `${method} ${uri}`;
    if (!seen.has(key)) seen.set(key, { method, uri });
  }
  return [...seen.values()];
}

/**
 * Fetch every distinct call a principal made in `window`.
 *
 * When the store reports that the result is too large the window is halved
 * and both halves are collected in turn, recursively. A window of
 * `minWindowMs` or less that still overflows is logged, treated as empty and
 * reported in `skippedWindows`. Any other query error fails the whole
 * collection.
 */
export async function collectActivity(
  source: ActivityLogSource,
  principalId: string,
  window: ActivityWindow,
  options: CollectorOptions = {},
): Promise<CollectionOutcome> {
  const minWindowMs = options.minWindowMs ?? MIN_WINDOW_MS;
  const outcome = await source.queryActivity(principalId, window);

  if (outcome.status === "ok") {
    return {
      status: "ok",
      activities: dedupeActivities(outcome.activities),
      skippedWindows: [],
    };
  }
  if (outcome.status === "error") {
    return { status: "failed", error: outcome.message };
  }

  if (window.end.getTime() - window.start.getTime() <= minWindowMs) {
    console.warn(
      `Activity for ${principalId} exceeds the result size limit in ${formatWindow(window)}, skipping window`,
    );
    return { status: "ok", activities: [], skippedWindows: [window] };
  }

  const [first, second] = bisectWindow(window);

  const left = await collectActivity(source, principalId, first, options);
  if (left.status === "failed") return left;

  const right = await collectActivity(source, principalId, second, options);
  if (right.status === "failed") return right;

  return {
    status: "ok",
    activities: dedupeActivities([...left.activities, ...right.activities]),
    skippedWindows: [...left.skippedWindows, ...right.skippedWindows],
  };
}
