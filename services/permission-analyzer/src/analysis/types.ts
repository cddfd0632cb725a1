import type { CanonicalActivity } from "../activity/types";
import type { PermissionDescriptor, ScopeType } from "../permission-map/types";

export interface MatchResult {
  activity: CanonicalActivity;
  matchedPath: string | null;
  candidatePermissions: PermissionDescriptor[];
  isMatched: boolean;
}

export interface SelectedPermission {
  permission: PermissionDescriptor;
  /** Activities this permission newly covered when it was chosen. */
  marginalCoverage: number;
  coveredActivities: CanonicalActivity[];
}

export interface SelectionResult {
  selected: SelectedPermission[];
  unmatchedActivities: CanonicalActivity[];
  totalActivities: number;
  matchedActivities: number;
}

export interface OptimalPermission {
  permission: string;
  scopeType: ScopeType;
  isLeastPrivileged: boolean;
  activitiesCovered: number;
}

export interface PermissionDelta {
  /** Granted but not needed by any observed call. */
  excess: string[];
  /** Needed by observed calls but not granted. */
  required: string[];
}

/**
 * An application submitted for analysis. Current grants come from the
 * identity directory and are supplied by the caller.
 */
export interface ApplicationTarget {
  id: string;
  principalId: string;
  displayName?: string;
  currentPermissions?: string[];
}

export interface AnalyzedApplication {
  status: "analyzed";
  application: ApplicationTarget;
  activity: CanonicalActivity[];
  activityPermissions: MatchResult[];
  optimalPermissions: OptimalPermission[];
  unmatchedActivities: CanonicalActivity[];
  matchedAllActivity: boolean;
  totalActivities: number;
  matchedActivities: number;
  skippedWindows: number;
  permissionDelta?: PermissionDelta;
}

export interface FailedApplication {
  status: "failed";
  application: ApplicationTarget;
  error: string;
}

export type ApplicationReport = AnalyzedApplication | FailedApplication;
