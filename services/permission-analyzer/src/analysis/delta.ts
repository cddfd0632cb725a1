import type { PermissionDelta } from "./types";

/**
 * Compare granted permission names with the selected ones. Names are
 * compared exactly.
 */
export function diffPermissions(current: string[], optimal: string[]): PermissionDelta {
  const granted = new Set(current);
  const needed = new Set(optimal);

  return {
    excess: [...granted].filter((name) => !needed.has(name)).sort(),
    required: [...needed].filter((name) => !granted.has(name)).sort(),
  };
}
