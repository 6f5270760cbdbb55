/**
 * Shared types for the dep-footprint tool.
 */

export type Ecosystem = "python" | "node";
export type PackageRegistry = "pypi" | "npm";
export type DatabaseSource = "osv" | "ghsa";

export const ECOSYSTEMS: readonly Ecosystem[] = ["python", "node"];

export function isEcosystem(value: string): value is Ecosystem {
  return (ECOSYSTEMS as readonly string[]).includes(value);
}

export function toRegistry(ecosystem: Ecosystem): PackageRegistry {
  switch (ecosystem) {
    case "python": return "pypi";
    case "node": return "npm";
  }
}

export interface RequirementRecord {
  readonly name: string;
  readonly versionConstraint: string;
  /** Declared as one exact version ("==2.0.1", "4.18.2"), not a range. */
  readonly exact: boolean;
}

export interface PackageInfo {
  name: string;
  size: number;
  isPaid: boolean;
  declaredVersion: string;
  description: string;
  latestVersion: string;
  vulnerabilitySignal: string;
}

export interface DockerSizeEstimate {
  full: number;
  slim: number;
  alpine: number;
}

export type ImageVariant = keyof DockerSizeEstimate;

export interface ConflictRecord {
  name: string;
  firstVersionSeen: string;
  conflictingVersion: string;
}

export interface AnalysisReport {
  packages: PackageInfo[];
  estimate: DockerSizeEstimate;
  conflicts: ConflictRecord[];
}

// console satisfies this; tests pass a silent one
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}
