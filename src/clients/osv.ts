/**
 * Client for OSV.dev (Open Source Vulnerability) database.
 *
 * Queries one package at a time. When the declared version is concrete it is
 * sent along and OSV matches it server-side; otherwise every advisory on
 * record for the package is returned. No auth required.
 *
 * Ref: https://google.github.io/osv.dev/post-v1-query/
 */

import { z } from "zod";
import { OSV_QUERY_URL } from "../config";
import { Ecosystem } from "../types";
import { HttpClient } from "./http";
import { isPinnedVersion } from "./version";
import { fail, ok, Result, SecurityAudit, Vulnerability } from "./types";

// Map ecosystem to OSV ecosystem string.
function toOsvEcosystem(ecosystem: Ecosystem): string {
  switch (ecosystem) {
    case "python": return "PyPI";
    case "node": return "npm";
  }
}

const osvVulnerabilitySchema = z.object({
  id: z.string(),
  aliases: z.array(z.string()).nullish(),
  summary: z.string().nullish(),
  severity: z.array(z.object({ type: z.string(), score: z.string() })).nullish(),
  references: z.array(z.object({ type: z.string(), url: z.string() })).nullish(),
  affected: z
    .array(
      z.object({
        ranges: z
          .array(
            z.object({
              events: z
                .array(z.object({ introduced: z.string().optional(), fixed: z.string().optional() }))
                .nullish(),
            }),
          )
          .nullish(),
      }),
    )
    .nullish(),
});

const osvResponseSchema = z.object({
  vulns: z.array(osvVulnerabilitySchema).nullish(),
});

type OsvVulnerability = z.infer<typeof osvVulnerabilitySchema>;

interface OsvQuery {
  package: { ecosystem: string; name: string };
  version?: string;
}

/**
 * Extract the first fixed version from OSV affected ranges.
 */
function extractFixedVersion(vuln: OsvVulnerability): string | undefined {
  for (const affected of vuln.affected ?? []) {
    for (const range of affected.ranges ?? []) {
      for (const event of range.events ?? []) {
        if (event.fixed) return event.fixed;
      }
    }
  }
  return undefined;
}

export function toVulnerability(v: OsvVulnerability): Vulnerability {
  return {
    id: v.id,
    aliases: v.aliases ?? undefined,
    summary: v.summary ?? undefined,
    severity: v.severity ?? undefined,
    references: v.references ?? undefined,
    fixedIn: extractFixedVersion(v),
  };
}

export function buildOsvQuery(ecosystem: Ecosystem, name: string, version: string): OsvQuery {
  const query: OsvQuery = { package: { ecosystem: toOsvEcosystem(ecosystem), name } };
  // Only pinned versions narrow the query; ranges would be rejected by OSV
  if (isPinnedVersion(version)) {
    query.version = version;
  }
  return query;
}

export class OsvClient implements SecurityAudit {
  constructor(
    private readonly http: HttpClient,
    private readonly url: string = OSV_QUERY_URL,
  ) {}

  supports(ecosystem: Ecosystem): boolean {
    return ecosystem === "python" || ecosystem === "node";
  }

  async audit(ecosystem: Ecosystem, name: string, version: string): Promise<Result<Vulnerability[]>> {
    if (!this.supports(ecosystem)) {
      return fail("unsupported", `OSV does not cover ${ecosystem}`);
    }

    const response = await this.http.postJson(this.url, buildOsvQuery(ecosystem, name, version), osvResponseSchema);
    if (!response.ok) return response;

    return ok((response.value.vulns ?? []).map(toVulnerability));
  }
}
