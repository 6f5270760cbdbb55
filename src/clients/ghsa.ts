/**
 * Client for GHSA (GitHub Security Advisory) database.
 *
 * Uses the GraphQL API to fetch a package's advisories and matches the
 * declared version client-side with semver. An unpinned declaration keeps
 * every advisory on record for the package.
 *
 * Note: GraphQL API requires authentication. Export as environment variable
 * (`GITHUB_TOKEN`) or pass as CLI flag (`--github-token`).
 *
 * Ref: https://docs.github.com/en/graphql/reference/objects#securityvulnerability
 */

import { graphql } from "@octokit/graphql";
import * as semver from "semver";
import { z } from "zod";
import { Ecosystem } from "../types";
import { fail, ok, Result, SecurityAudit, Vulnerability } from "./types";
import { toComparableVersion } from "./version";

// GraphQL ecosystem enum values
type GhsaEcosystem = "NPM" | "PIP";

function toGhsaEcosystem(ecosystem: Ecosystem): GhsaEcosystem {
  switch (ecosystem) {
    case "node": return "NPM";
    case "python": return "PIP";
  }
}

const VULNERABILITIES_QUERY = `
  query ($ecosystem: SecurityAdvisoryEcosystem!, $package: String!) {
    securityVulnerabilities(ecosystem: $ecosystem, package: $package, first: 100) {
      nodes {
        advisory {
          ghsaId
          summary
          severity
          identifiers { type value }
          references { url }
        }
        vulnerableVersionRange
        firstPatchedVersion { identifier }
      }
    }
  }
`;

const vulnerabilityNodeSchema = z.object({
  advisory: z.object({
    ghsaId: z.string(),
    summary: z.string().nullish(),
    severity: z.string().nullish(),
    identifiers: z.array(z.object({ type: z.string(), value: z.string() })).nullish(),
    references: z.array(z.object({ url: z.string() })).nullish(),
  }),
  vulnerableVersionRange: z.string().nullish(),
  firstPatchedVersion: z.object({ identifier: z.string() }).nullish(),
});

const responseSchema = z.object({
  securityVulnerabilities: z
    .object({ nodes: z.array(vulnerabilityNodeSchema).nullish() })
    .nullish(),
});

type VulnerabilityNode = z.infer<typeof vulnerabilityNodeSchema>;

export type GraphqlRequest = (query: string, variables: { ecosystem: GhsaEcosystem; package: string }) => Promise<unknown>;

export function createGraphqlRequest(token: string): GraphqlRequest {
  const gql = graphql.defaults({
    headers: {
      authorization: `token ${token}`,
    },
  });
  return (query, variables) => gql<unknown>(query, variables);
}

// Convert GHSA version range to SemVer-compatible range.
export function toSemverRange(ghsaRange: string): string {
  return ghsaRange
    .split(",")
    .map(part => part.trim().replace(/\s+/g, ""))
    .join(" ");
}

/**
 * Check if a version falls within the GHSA vulnerable range. An unpinned
 * (or non-semver) declaration is treated as possibly affected.
 */
export function isVersionAffected(version: string, range: string | null | undefined): boolean {
  if (!range) return false;

  const comparable = toComparableVersion(version);
  if (!comparable) return true;

  try {
    return semver.satisfies(comparable, toSemverRange(range));
  } catch {
    return range.includes(version);
  }
}

function toVulnerability(node: VulnerabilityNode): Vulnerability {
  // Extract CVE and other aliases from identifiers
  const aliases = node.advisory.identifiers
    ?.filter(id => id.type !== "GHSA")
    .map(id => id.value);

  return {
    id: node.advisory.ghsaId,
    aliases: aliases?.length ? aliases : undefined,
    summary: node.advisory.summary ?? undefined,
    severity: node.advisory.severity
      ? [{ type: "GHSA", score: node.advisory.severity }]
      : undefined,
    references: node.advisory.references?.map(ref => ({
      type: "WEB",
      url: ref.url,
    })),
    fixedIn: node.firstPatchedVersion?.identifier,
  };
}

export class GhsaClient implements SecurityAudit {
  constructor(private readonly request: GraphqlRequest) {}

  static withToken(token: string): GhsaClient {
    return new GhsaClient(createGraphqlRequest(token));
  }

  supports(ecosystem: Ecosystem): boolean {
    return ecosystem === "python" || ecosystem === "node";
  }

  async audit(ecosystem: Ecosystem, name: string, version: string): Promise<Result<Vulnerability[]>> {
    if (!this.supports(ecosystem)) {
      return fail("unsupported", `GHSA does not cover ${ecosystem}`);
    }

    let data: unknown;
    try {
      data = await this.request(VULNERABILITIES_QUERY, {
        ecosystem: toGhsaEcosystem(ecosystem),
        package: name,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail("network", `GHSA query failed: ${message}`);
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      return fail("payload", "unexpected GHSA response shape");
    }

    const matching: Vulnerability[] = [];
    const seenIds = new Set<string>();

    for (const node of parsed.data.securityVulnerabilities?.nodes ?? []) {
      if (seenIds.has(node.advisory.ghsaId)) continue;
      if (!isVersionAffected(version, node.vulnerableVersionRange)) continue;

      seenIds.add(node.advisory.ghsaId);
      matching.push(toVulnerability(node));
    }

    return ok(matching);
  }
}
