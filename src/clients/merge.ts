/**
 * Merge advisories for one package reported by several databases.
 *
 * Merge strategy:
 * - Dedupe by vulnerability ID
 * - Severity: take highest
 * - References: union (dedupe by URL)
 * - Summary: prefer longer description
 * - fixedIn: first explicit version wins
 */

import { Vulnerability } from "./types";

type Severity = NonNullable<Vulnerability["severity"]>;
type References = NonNullable<Vulnerability["references"]>;

// CRITICAL > HIGH > MODERATE > LOW
export function severityRank(severity?: Severity): number {
  const score = severity?.[0]?.score?.toUpperCase() ?? "";
  if (score.includes("CRITICAL")) return 4;
  if (score.includes("HIGH")) return 3;
  if (score.includes("MODERATE") || score.includes("MEDIUM")) return 2;
  if (score.includes("LOW")) return 1;
  return 0;
}

export function mergeVulnerabilities(...sources: Vulnerability[][]): Vulnerability[] {
  const merged = new Map<string, Vulnerability>();

  for (const vulns of sources) {
    for (const vuln of vulns) {
      const existing = merged.get(vuln.id);
      merged.set(vuln.id, existing ? mergeVuln(existing, vuln) : vuln);
    }
  }

  return [...merged.values()];
}

function mergeVuln(a: Vulnerability, b: Vulnerability): Vulnerability {
  return {
    id: a.id,
    aliases: unionStrings(a.aliases, b.aliases),
    summary: pickLonger(a.summary, b.summary),
    severity: pickHigherSeverity(a.severity, b.severity),
    references: mergeRefs(a.references, b.references),
    fixedIn: a.fixedIn || b.fixedIn,
  };
}

function pickLonger(a?: string, b?: string): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return a.length >= b.length ? a : b;
}

function pickHigherSeverity(a?: Severity, b?: Severity): Severity | undefined {
  if (!a?.length) return b;
  if (!b?.length) return a;
  return severityRank(a) >= severityRank(b) ? a : b;
}

function unionStrings(a?: string[], b?: string[]): string[] | undefined {
  if (!a?.length) return b;
  if (!b?.length) return a;
  return [...new Set([...a, ...b])];
}

function mergeRefs(a?: References, b?: References): References | undefined {
  if (!a?.length) return b;
  if (!b?.length) return a;

  const seen = new Set<string>();
  return [...a, ...b].filter((ref) => {
    if (seen.has(ref.url)) return false;
    seen.add(ref.url);
    return true;
  });
}
