/**
 * Analysis orchestrator: manifests in, `AnalysisReport` out.
 *
 * Manifest and argument problems (missing file, bad JSON, unknown ecosystem)
 * throw before any registry traffic. Per-package lookup problems never throw;
 * the resolver folds them into sentinel values.
 */

import fs from "node:fs";
import { MetadataCache } from "./cache";
import { createRegistryClients, createSecurityAudit, HttpClient, RegistryClients, SecurityAudit } from "./clients";
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS } from "./config";
import { findConflicts } from "./conflicts";
import { ManifestNotFoundError, ParseError, UnsupportedEcosystemError } from "./errors";
import { estimateDockerSizes } from "./estimate";
import { parse } from "./parsers";
import { RegistryResolver } from "./resolver";
import { AnalysisReport, Ecosystem, isEcosystem, Logger, RequirementRecord } from "./types";

export interface AnalyzeOptions {
  registries?: RegistryClients;
  audit?: SecurityAudit;
  paidPackages?: Record<Ecosystem, ReadonlySet<string>>;
  ignoredAdvisories?: ReadonlySet<string>;
  concurrency?: number;
  timeoutMs?: number;
  logger?: Logger;
  /** Receives the run's resolver, eg. to read cache statistics afterwards. */
  onResolver?: (resolver: RegistryResolver) => void;
}

export function assertEcosystem(ecosystem: string): Ecosystem {
  if (!isEcosystem(ecosystem)) {
    throw new UnsupportedEcosystemError(ecosystem);
  }
  return ecosystem;
}

/**
 * Read and parse every manifest, in order. All paths are checked before any
 * file is read.
 */
export function loadRequirements(manifestPaths: readonly string[], ecosystem: Ecosystem): RequirementRecord[] {
  const missing = manifestPaths.find((p) => !fs.existsSync(p) || !fs.statSync(p).isFile());
  if (missing !== undefined) {
    throw new ManifestNotFoundError(missing);
  }

  const requirements: RequirementRecord[] = [];
  for (const manifestPath of manifestPaths) {
    const content = fs.readFileSync(manifestPath, "utf-8");
    try {
      requirements.push(...parse(content, ecosystem));
    } catch (err) {
      if (err instanceof ParseError) {
        throw new ParseError(err.message, manifestPath);
      }
      throw err;
    }
  }
  return requirements;
}

export async function analyze(
  manifestPaths: readonly string[],
  ecosystemTag: string,
  options: AnalyzeOptions = {},
): Promise<AnalysisReport> {
  const ecosystem = assertEcosystem(ecosystemTag);
  const requirements = loadRequirements(manifestPaths, ecosystem);

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const resolver = new RegistryResolver({
    registries: options.registries ?? createRegistryClients(new HttpClient({ timeoutMs })),
    audit: options.audit ?? createSecurityAudit({ timeoutMs }).audit,
    cache: new MetadataCache(),
    paidPackages: options.paidPackages,
    ignoredAdvisories: options.ignoredAdvisories,
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    logger: options.logger,
  });
  options.onResolver?.(resolver);

  const packages = await resolver.resolveAll(requirements, ecosystem);

  return {
    packages,
    estimate: estimateDockerSizes(packages, ecosystem),
    conflicts: findConflicts(packages),
  };
}
