/**
 * Defaults for an analysis run, with environment overrides.
 *
 * Environment:
 *   DEP_FOOTPRINT_CONCURRENCY   Max registry lookups in flight (default: 8)
 *   DEP_FOOTPRINT_TIMEOUT_MS    Per-request timeout in ms (default: 5000)
 *   GITHUB_TOKEN                Enables GitHub Security Advisories
 */

import { DockerSizeEstimate, Ecosystem } from "./types";

const MiB = 1024 * 1024;

export const BASE_IMAGE_SIZES: Record<Ecosystem, DockerSizeEstimate> = {
  python: { full: 100 * MiB, slim: 40 * MiB, alpine: 15 * MiB },
  node: { full: 85 * MiB, slim: 35 * MiB, alpine: 12 * MiB },
};

// Layer/metadata overhead applied on top of the summed package sizes
export const PACKAGE_OVERHEAD_RATIO = 0.15;

export const DEFAULT_PAID_PACKAGES: Record<Ecosystem, ReadonlySet<string>> = {
  python: new Set(["private-package", "enterprise-pkg"]),
  node: new Set(["private-module", "enterprise-pkg"]),
};

export const PYPI_URL = "https://pypi.org/pypi";
export const NPM_REGISTRY_URL = "https://registry.npmjs.org";
export const OSV_QUERY_URL = "https://api.osv.dev/v1/query";

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TIMEOUT_MS = 5000;

export interface RuntimeConfig {
  concurrency: number;
  timeoutMs: number;
  githubToken?: string;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = raw !== undefined ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return fallback;
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    concurrency: positiveInt(env.DEP_FOOTPRINT_CONCURRENCY, DEFAULT_CONCURRENCY),
    timeoutMs: positiveInt(env.DEP_FOOTPRINT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    githubToken: env.GITHUB_TOKEN || undefined,
  };
}
