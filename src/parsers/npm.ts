/**
 * Parser for npm package.json manifests (direct dependencies only).
 */

import { isPinnedVersion } from "../clients/version";
import { ParseError } from "../errors";
import { RequirementRecord } from "../types";
import { createRequirement, isRecord } from "./utils";

// A Map so names such as "__proto__" are kept as ordinary keys
type DependencyMap = Map<string, string>;

function readDependencyMap(pkg: Record<string, unknown>, field: string): DependencyMap {
  const value = pkg[field];
  if (value === undefined || value === null) return new Map<string, string>();

  if (!isRecord(value)) {
    throw new ParseError(`"${field}" must be an object of package names to versions`);
  }

  const deps: DependencyMap = new Map<string, string>();
  for (const [name, version] of Object.entries(value)) {
    if (typeof version !== "string") {
      throw new ParseError(`"${field}.${name}" must be a version string`);
    }
    deps.set(name, version);
  }
  return deps;
}

/**
 * Strip any leading non-digit range operator ("^", "~", ">=", "workspace:", ...).
 */
export function stripVersionPrefix(version: string): string {
  return version.replace(/^[^0-9]*/, "");
}

/**
 * True when the declaration names one version: "1.2.3", "=1.2.3" or "v1.2.3".
 */
export function isExactVersion(declared: string): boolean {
  const raw = declared.trim();
  const version = stripVersionPrefix(raw);
  const prefix = raw.slice(0, raw.length - version.length);
  return (prefix === "" || prefix === "=" || prefix === "v") && isPinnedVersion(version);
}

export function parsePackageJson(content: unknown): RequirementRecord[] {
  let pkg: unknown = content;

  if (typeof content === "string") {
    try {
      pkg = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError(`Invalid package.json: ${message}`);
    }
  }

  if (!isRecord(pkg)) {
    throw new ParseError("Invalid package.json: expected a JSON object");
  }

  // devDependencies win over dependencies of the same name
  const allDeps: DependencyMap = new Map([
    ...readDependencyMap(pkg, "dependencies"),
    ...readDependencyMap(pkg, "devDependencies"),
  ]);

  const records: RequirementRecord[] = [];
  for (const [rawName, version] of allDeps) {
    const name = rawName.trim();
    if (!name) continue;
    records.push(createRequirement(name, stripVersionPrefix(version.trim()), isExactVersion(version)));
  }

  return records;
}
