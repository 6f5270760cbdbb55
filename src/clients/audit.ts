/**
 * Security-audit capability backed by one or more advisory databases.
 *
 * Sources are queried in parallel and their advisories merged. The audit
 * fails only when every applicable source fails.
 */

import { Ecosystem } from "../types";
import { mergeVulnerabilities } from "./merge";
import { fail, LookupError, ok, Result, SecurityAudit, Vulnerability } from "./types";

export class MultiSourceAudit implements SecurityAudit {
  constructor(private readonly sources: SecurityAudit[]) {}

  supports(ecosystem: Ecosystem): boolean {
    return this.sources.some((source) => source.supports(ecosystem));
  }

  async audit(ecosystem: Ecosystem, name: string, version: string): Promise<Result<Vulnerability[]>> {
    const applicable = this.sources.filter((source) => source.supports(ecosystem));
    if (applicable.length === 0) {
      return fail("unsupported", `no advisory database covers ${ecosystem}`);
    }

    const results = await Promise.all(applicable.map((source) => source.audit(ecosystem, name, version)));

    const found: Vulnerability[][] = [];
    const errors: LookupError[] = [];
    for (const result of results) {
      if (result.ok) found.push(result.value);
      else errors.push(result.error);
    }

    if (found.length === 0) {
      return { ok: false, error: errors[0] };
    }
    return ok(mergeVulnerabilities(...found));
  }
}

/**
 * One-line summary of a package's advisories, eg.
 * "2 known vulnerabilities: GHSA-xxxx (CVE-2021-1), PYSEC-2021-9"
 */
export function describeVulnerabilities(vulns: Vulnerability[]): string {
  if (vulns.length === 0) return "No known vulnerabilities";

  const ids = vulns.map((v) => {
    // Show CVE alias in parentheses if available
    const cve = v.aliases?.find((a) => a.startsWith("CVE-"));
    return cve && cve !== v.id ? `${v.id} (${cve})` : v.id;
  });
  const noun = vulns.length === 1 ? "vulnerability" : "vulnerabilities";
  return `${vulns.length} known ${noun}: ${ids.join(", ")}`;
}
