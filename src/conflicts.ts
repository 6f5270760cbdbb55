/**
 * Detect packages declared with different versions across the merged
 * requirement list.
 *
 * The first version seen for a name is the reference; every later occurrence
 * with a different version string yields its own record. An unpinned ("")
 * occurrence next to a pinned one counts as a conflict.
 */

import { ConflictRecord, PackageInfo } from "./types";

export function findConflicts(packages: readonly Pick<PackageInfo, "name" | "declaredVersion">[]): ConflictRecord[] {
  const firstSeen = new Map<string, string>();
  const conflicts: ConflictRecord[] = [];

  for (const pkg of packages) {
    const seen = firstSeen.get(pkg.name);

    if (seen === undefined) {
      firstSeen.set(pkg.name, pkg.declaredVersion);
    } else if (seen !== pkg.declaredVersion) {
      conflicts.push({
        name: pkg.name,
        firstVersionSeen: seen,
        conflictingVersion: pkg.declaredVersion,
      });
    }
  }

  return conflicts;
}
