import { collectActivity } from "../activity/collector";
import type { ActivityLogSource, ActivityWindow } from "../activity/types";
import type { PermissionMapIndex } from "../permission-map/types";
import { runBounded, type PoolOptions } from "../scheduler/pool";
import { diffPermissions } from "./delta";
import { matchActivities } from "./matcher";
import { selectOptimalPermissions } from "./selector";
import type {
  AnalyzedApplication,
  ApplicationReport,
  ApplicationTarget,
  OptimalPermission,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const MAX_LOOKBACK_DAYS = 365;

export interface AnalyzerDeps {
  source: ActivityLogSource;
  index: PermissionMapIndex;
  lookbackDays: number;
  maxEntries: number;
  minWindowMs?: number;
  now?: () => Date;
}

export interface BatchAnalysis {
  reports: ApplicationReport[];
  submitted: number;
  completed: number;
  timedOut: boolean;
}

export function lookbackWindow(
  now: Date,
  lookbackDays: number,
  maxEntries: number,
): ActivityWindow {
  return {
    start: new Date(now.getTime() - lookbackDays * DAY_MS),
    end: new Date(now.getTime()),
    maxEntries,
  };
}

/**
 * Collect one application's activity over the lookback window and work out
 * the smallest permission set that covers it. Collection failures come back
 * as a `failed` report.
 */
export async function analyzeApplication(
  application: ApplicationTarget,
  deps: AnalyzerDeps,
): Promise<ApplicationReport> {
  const now = deps.now ? deps.now() : new Date();
  const window = lookbackWindow(now, deps.lookbackDays, deps.maxEntries);

  const collection = await collectActivity(deps.source, application.principalId, window, {
    minWindowMs: deps.minWindowMs,
  });

  if (collection.status === "failed") {
    console.error(`Activity collection failed for ${application.id}: ${collection.error}`);
    return { status: "failed", application, error: collection.error };
  }

  const activityPermissions = matchActivities(deps.index, collection.activities);
  const selection = selectOptimalPermissions(activityPermissions);

  const optimalPermissions: OptimalPermission[] = selection.selected.map((s) => ({
    permission: s.permission.name,
    scopeType: s.permission.scopeType,
    isLeastPrivileged: s.permission.isLeastPrivileged,
    activitiesCovered: s.marginalCoverage,
  }));

  const report: AnalyzedApplication = {
    status: "analyzed",
    application,
    activity: activityPermissions.map((r) => r.activity),
    activityPermissions,
    optimalPermissions,
    unmatchedActivities: selection.unmatchedActivities,
    matchedAllActivity: selection.unmatchedActivities.length === 0,
    totalActivities: selection.totalActivities,
    matchedActivities: selection.matchedActivities,
    skippedWindows: collection.skippedWindows.length,
  };

  if (application.currentPermissions) {
    report.permissionDelta = diffPermissions(
      application.currentPermissions,
      optimalPermissions.map((p) => p.permission),
    );
  }

  console.log(
    `Analyzed ${application.id}: ${report.totalActivities} activities, ` +
      `${optimalPermissions.length} permissions, ${report.unmatchedActivities.length} unmatched`,
  );

  return report;
}

/**
 * Analyze a batch through the bounded scheduler. Reports are in completion
 * order; a stalled batch returns the reports finished so far.
 */
export async function analyzeApplications(
  applications: ApplicationTarget[],
  deps: AnalyzerDeps,
  poolOptions: PoolOptions = {},
): Promise<BatchAnalysis> {
  const outcome = await runBounded(
    applications,
    (application) => analyzeApplication(application, deps),
    poolOptions,
  );

  const reports = outcome.results.map((entry): ApplicationReport => {
    if (entry.status === "fulfilled") return entry.value;
    console.error(`Analysis failed for ${entry.item.id}: ${entry.reason}`);
    return { status: "failed", application: entry.item, error: entry.reason };
  });

  return {
    reports,
    submitted: outcome.submitted,
    completed: outcome.completed,
    timedOut: outcome.timedOut,
  };
}
