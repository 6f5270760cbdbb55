/**
 * Resolves requirement records into `PackageInfo` using the registry clients,
 * the per-run metadata cache and the security audit.
 *
 * This is the only place lookup failures are turned into sentinel values;
 * `resolve` never rejects.
 */

import { MetadataCache } from "./cache";
import { describeVulnerabilities } from "./clients/audit";
import { RegistryClients } from "./clients";
import { LookupError, RegistryMetadata, Result, SecurityAudit, Vulnerability } from "./clients/types";
import { DEFAULT_CONCURRENCY, DEFAULT_PAID_PACKAGES } from "./config";
import { filterIgnored } from "./ignore";
import { mapWithConcurrency } from "./pool";
import { Ecosystem, Logger, PackageInfo, RequirementRecord } from "./types";

export const NO_DESCRIPTION = "No description available";
export const NO_LATEST_VERSION = "";
export const AUDIT_UNAVAILABLE = "Vulnerability audit unavailable";
export const NO_AUDIT = "No security audit available";

export interface ResolverOptions {
  registries: RegistryClients;
  audit: SecurityAudit;
  cache?: MetadataCache;
  paidPackages?: Record<Ecosystem, ReadonlySet<string>>;
  ignoredAdvisories?: ReadonlySet<string>;
  concurrency?: number;
  logger?: Logger;
}

export class RegistryResolver {
  readonly cache: MetadataCache;
  private readonly registries: RegistryClients;
  private readonly audit: SecurityAudit;
  private readonly paidPackages: Record<Ecosystem, ReadonlySet<string>>;
  private readonly ignoredAdvisories: ReadonlySet<string>;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private ignoredCount = 0;

  constructor(options: ResolverOptions) {
    this.registries = options.registries;
    this.audit = options.audit;
    this.cache = options.cache ?? new MetadataCache();
    this.paidPackages = options.paidPackages ?? DEFAULT_PAID_PACKAGES;
    this.ignoredAdvisories = options.ignoredAdvisories ?? new Set<string>();
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger ?? console;
  }

  /** Advisories dropped by the ignore list so far. */
  get ignoredAdvisoryCount(): number {
    return this.ignoredCount;
  }

  async resolve(requirement: RequirementRecord, ecosystem: Ecosystem): Promise<PackageInfo> {
    const { name, versionConstraint, exact } = requirement;

    // A range is audited by name alone, never as its lower bound
    const [metadata, vulnerabilitySignal] = await Promise.all([
      this.lookupMetadata(name, ecosystem),
      this.auditSignal(name, exact ? versionConstraint : "", ecosystem),
    ]);

    return {
      name,
      size: metadata?.size ?? 0,
      isPaid: this.paidPackages[ecosystem].has(name),
      declaredVersion: versionConstraint,
      description: metadata?.description ?? NO_DESCRIPTION,
      latestVersion: metadata?.latestVersion ?? NO_LATEST_VERSION,
      vulnerabilitySignal,
    };
  }

  /**
   * Resolve every requirement with bounded concurrency. Output order matches
   * input order regardless of which lookups finish first.
   */
  async resolveAll(requirements: readonly RequirementRecord[], ecosystem: Ecosystem): Promise<PackageInfo[]> {
    return mapWithConcurrency(requirements, this.concurrency, (req) => this.resolve(req, ecosystem));
  }

  private async lookupMetadata(name: string, ecosystem: Ecosystem): Promise<RegistryMetadata | undefined> {
    const registry = this.registries[ecosystem];

    // Warn inside the fetcher: callers sharing one in-flight lookup log its failure once
    const result = await this.cache.getOrFetch(ecosystem, name, () =>
      registry
        .lookup(name)
        .catch((err: unknown): Result<RegistryMetadata> => ({ ok: false, error: unexpected(err) }))
        .then((lookup) => {
          if (!lookup.ok) this.warn(`registry lookup failed for ${name}`, lookup.error);
          return lookup;
        }),
    );

    return result.ok ? result.value : undefined;
  }

  private async auditSignal(name: string, version: string, ecosystem: Ecosystem): Promise<string> {
    if (!this.audit.supports(ecosystem)) return NO_AUDIT;

    const result = await this.audit
      .audit(ecosystem, name, version)
      .catch((err: unknown): Result<Vulnerability[]> => ({ ok: false, error: unexpected(err) }));

    if (!result.ok) {
      if (result.error.kind === "unsupported") return NO_AUDIT;
      this.warn(`security audit failed for ${name}`, result.error);
      return AUDIT_UNAVAILABLE;
    }

    const { kept, ignoredIds } = filterIgnored(result.value, this.ignoredAdvisories);
    this.ignoredCount += ignoredIds.length;
    return describeVulnerabilities(kept);
  }

  private warn(context: string, error: LookupError): void {
    this.logger.warn(`⚠️ ${context} (${error.kind}): ${error.message}`);
  }
}

// Clients return errors as values; this only guards against a client bug.
function unexpected(err: unknown): LookupError {
  return { kind: "network", message: err instanceof Error ? err.message : String(err) };
}
