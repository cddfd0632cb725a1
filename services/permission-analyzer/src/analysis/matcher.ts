import { activityKey, toCanonicalActivity } from "../activity/canonicalize";
import type { CanonicalActivity, RawActivity } from "../activity/types";
import type {
  PermissionDescriptor,
  PermissionMapIndex,
} from "../permission-map/types";
import type { MatchResult } from "./types";

/**
 * Application-scoped least-privileged permissions, or every
 * Application-scoped permission when none is flagged. Delegated scopes are
 * never returned.
 */
export function resolveCandidates(
  descriptors: PermissionDescriptor[],
): PermissionDescriptor[] {
  const application = descriptors.filter((d) => d.scopeType === "Application");
  const leastPrivileged = application.filter((d) => d.isLeastPrivileged);
  return leastPrivileged.length > 0 ? leastPrivileged : application;
}

export function matchActivity(
  index: PermissionMapIndex,
  activity: CanonicalActivity,
): MatchResult {
  const entry = index.find(activity.version, activity.method, activity.path);

  if (!entry) {
    // The path may exist without documenting this method
    const pathEntry = index.lookup(activity.version, activity.path);
    return {
      activity,
      matchedPath: pathEntry?.canonicalPath ?? null,
      candidatePermissions: [],
      isMatched: false,
    };
  }

  return {
    activity,
    matchedPath: entry.canonicalPath,
    candidatePermissions: resolveCandidates(
      entry.perMethodPermissions[activity.method.toUpperCase()],
    ),
    isMatched: true,
  };
}

/**
 * Canonicalize and match observed calls. Calls outside the v1.0 and beta
 * APIs are dropped; calls sharing an activity key are matched once.
 */
export function matchActivities(
  index: PermissionMapIndex,
  activities: RawActivity[],
): MatchResult[] {
  const seen = new Set<string>();
  const results: MatchResult[] = [];

  for (const raw of activities) {
    const activity = toCanonicalActivity(raw);
    if (!activity) continue;

    const key = activityKey(activity);
    if (seen.has(key)) continue;
    seen.add(key);

    results.push(matchActivity(index, activity));
  }

  return results;
}
