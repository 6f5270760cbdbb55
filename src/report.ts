/**
 * Generate the result artifact summarizing an analysis run.
 */

import { CacheStats } from "./cache";
import { isPinnedVersion } from "./clients/version";
import { AnalysisReport, ConflictRecord, DatabaseSource, DockerSizeEstimate, Ecosystem } from "./types";

export interface ReportMetadata {
  manifests: string[];
  ecosystem: Ecosystem;
  sources: DatabaseSource[];
  timestamp: string;
  durationMs: number;
  ignoredCount?: number;
  cache?: CacheStats;
}

export interface PackageFinding {
  name: string;
  size: number;
  isPaid: boolean;
  version: string;
  description: string;
  latestVersion: string;
  vulnerabilities: string;
}

export interface Report {
  metadata: ReportMetadata;
  summary: {
    totalPackages: number;
    totalSize: number;
    paidPackages: number;
    outdatedPackages: number;
    conflicts: number;
  };
  packages: PackageFinding[];
  dockerSizes: DockerSizeEstimate;
  conflicts: ConflictRecord[];
}

export function generateReport(analysis: AnalysisReport, metadata: ReportMetadata): Report {
  const packages: PackageFinding[] = analysis.packages.map((pkg) => ({
    name: pkg.name,
    size: pkg.size,
    isPaid: pkg.isPaid,
    version: pkg.declaredVersion,
    description: pkg.description,
    latestVersion: pkg.latestVersion,
    vulnerabilities: pkg.vulnerabilitySignal,
  }));

  // Only pinned declarations can be compared to the latest release
  const outdatedPackages = packages.filter(
    (p) => isPinnedVersion(p.version) && p.latestVersion !== "" && p.version !== p.latestVersion,
  ).length;

  return {
    metadata,
    summary: {
      totalPackages: packages.length,
      totalSize: packages.reduce((total, p) => total + p.size, 0),
      paidPackages: packages.filter((p) => p.isPaid).length,
      outdatedPackages,
      conflicts: analysis.conflicts.length,
    },
    packages,
    dockerSizes: analysis.estimate,
    conflicts: analysis.conflicts,
  };
}

const UNITS = ["B", "KB", "MB", "GB"];

/**
 * Human-readable byte count, 1024-based: 1536 -> "1.5 KB".
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}
