/**
 * Common utilities for manifest parsers.
 */

import { Ecosystem, RequirementRecord } from "../types";

/**
 * PEP 503 name normalization: lower-case, runs of "-", "_", "." become "-".
 */
export function normalizePythonName(name: string): string {
  return name.toLowerCase().replace(/[_.-]+/g, "-");
}

export function normalizeName(ecosystem: Ecosystem, name: string): string {
  switch (ecosystem) {
    case "python": return normalizePythonName(name.trim());
    case "node": return name.trim();
  }
}

/**
 * Create a frozen requirement record. Callers guarantee a non-empty name.
 */
export function createRequirement(name: string, versionConstraint: string, exact = false): RequirementRecord {
  return Object.freeze({ name, versionConstraint, exact });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
