import * as semver from "semver";

/**
 * True for a single concrete version ("2.0.1", "1.0rc1"), false for "",
 * wildcards ("1.x") and anything carrying range syntax.
 */
export function isPinnedVersion(version: string): boolean {
  if (!/^\d[0-9A-Za-z.+-]*$/.test(version)) return false;
  return !/(^|\.)[xX*](\.|$)/.test(version);
}

/**
 * Version to compare against semver ranges, or null when the declared
 * version cannot be read as semver even after coercion ("2.0" -> "2.0.0").
 */
export function toComparableVersion(version: string): string | null {
  if (!isPinnedVersion(version)) return null;
  return semver.valid(version) ?? semver.coerce(version)?.version ?? null;
}
