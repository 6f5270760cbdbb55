/**
 * Registry and vulnerability database clients.
 *
 * Registries:
 * - PyPI JSON API: https://pypi.org/pypi/<name>/json
 * - npm registry: https://registry.npmjs.org/<name>
 *
 * Advisory databases:
 * - Open Source Vulnerabilities: https://osv.dev/list
 * - GitHub Security Advisories: https://github.com/advisories (needs a token)
 */

import { DatabaseSource, Ecosystem } from "../types";
import { MultiSourceAudit } from "./audit";
import { GhsaClient } from "./ghsa";
import { HttpClient, HttpClientOptions } from "./http";
import { NpmRegistryClient } from "./npm";
import { OsvClient } from "./osv";
import { PypiClient } from "./pypi";
import { RegistryClient, SecurityAudit } from "./types";

export * from "./types";
export { describeVulnerabilities, MultiSourceAudit } from "./audit";
export { HttpClient } from "./http";

export type RegistryClients = Record<Ecosystem, RegistryClient>;

export function createRegistryClients(http: HttpClient = new HttpClient()): RegistryClients {
  return {
    python: new PypiClient(http),
    node: new NpmRegistryClient(http),
  };
}

export interface AuditOptions extends HttpClientOptions {
  source?: DatabaseSource;
  githubToken?: string;
}

/**
 * OSV always (unless GHSA is asked for alone); GHSA joins when a token is set.
 */
export function createSecurityAudit(options: AuditOptions = {}): { audit: SecurityAudit; sources: DatabaseSource[] } {
  const http = new HttpClient(options);
  const sources: SecurityAudit[] = [];
  const names: DatabaseSource[] = [];

  if (options.source !== "ghsa") {
    sources.push(new OsvClient(http));
    names.push("osv");
  }
  if (options.source !== "osv" && options.githubToken) {
    sources.push(GhsaClient.withToken(options.githubToken));
    names.push("ghsa");
  }

  return { audit: new MultiSourceAudit(sources), sources: names };
}
