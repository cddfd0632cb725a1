import { activityKey } from "../activity/canonicalize";
import type { CanonicalActivity } from "../activity/types";
import { descriptorKey } from "../permission-map/mapIndex";
import type { PermissionDescriptor } from "../permission-map/types";
import type { MatchResult, SelectedPermission, SelectionResult } from "./types";

interface Coverage {
  permission: PermissionDescriptor;
  activities: Map<string, CanonicalActivity>;
}

function uncoveredGain(
  coverage: Coverage,
  uncovered: Map<string, CanonicalActivity>,
): number {
  let gain = 0;
  for (const key of coverage.activities.keys()) {
    if (uncovered.has(key)) gain++;
  }
  return gain;
}

/**
 * Greedy set cover: choose a small set of permissions that together
 * authorize every matched activity.
 *
 * Each round takes the permission covering the most still-uncovered
 * activities. Permissions are pre-sorted by total coverage (descending,
 * stable), and on equal gain the first one in that order wins; there is no
 * preference for least-privileged permissions on ties. This approximates
 * minimum set cover and is not guaranteed to be optimal.
 *
 * Activities without an endpoint match, or matched without any Application
 * permission, are returned in `unmatchedActivities`.
 */
export function selectOptimalPermissions(results: MatchResult[]): SelectionResult {
  const all = new Map<string, CanonicalActivity>();
  const unmatched = new Map<string, CanonicalActivity>();
  const coverageByPermission = new Map<string, Coverage>();

  for (const result of results) {
    const key = activityKey(result.activity);
    if (!all.has(key)) all.set(key, result.activity);

    if (!result.isMatched || result.candidatePermissions.length === 0) {
      if (!unmatched.has(key)) unmatched.set(key, result.activity);
      continue;
    }

    for (const permission of result.candidatePermissions) {
      const id = descriptorKey(permission);
      let coverage = coverageByPermission.get(id);
      if (!coverage) {
        coverage = { permission, activities: new Map() };
        coverageByPermission.set(id, coverage);
      }
      coverage.activities.set(key, result.activity);
    }
  }

  const ordered = [...coverageByPermission.values()].sort(
    (a, b) => b.activities.size - a.activities.size,
  );

  const uncovered = new Map<string, CanonicalActivity>();
  for (const coverage of ordered) {
    for (const [key, activity] of coverage.activities) {
      uncovered.set(key, activity);
      unmatched.delete(key);
    }
  }

  const selected: SelectedPermission[] = [];

  while (uncovered.size > 0) {
    let best: Coverage | undefined;
    let bestGain = 0;
    for (const coverage of ordered) {
      const gain = uncoveredGain(coverage, uncovered);
      if (gain > bestGain) {
        best = coverage;
        bestGain = gain;
      }
    }
    if (!best) break;

    const coveredActivities: CanonicalActivity[] = [];
    for (const [key, activity] of best.activities) {
      if (!uncovered.delete(key)) continue;
      coveredActivities.push(activity);
    }

    selected.push({
      permission: best.permission,
      marginalCoverage: coveredActivities.length,
      coveredActivities,
    });
  }

  // Nothing should be left here; if it is, report it rather than lose it
  for (const [key, activity] of uncovered) {
    unmatched.set(key, activity);
  }

  return {
    selected,
    unmatchedActivities: [...unmatched.values()],
    totalActivities: all.size,
    matchedActivities: all.size - unmatched.size,
  };
}
