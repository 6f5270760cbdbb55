/**
 * Shared types for registry and vulnerability database clients.
 */

import { Ecosystem } from "../types";

export interface Vulnerability {
  id: string;
  aliases?: string[];  // CVE IDs and other cross-references
  summary?: string;
  severity?: Array<{ type: string; score: string }>;
  references?: Array<{ type: string; url: string }>;
  fixedIn?: string;  // Version that fixes this vulnerability
}

export type LookupErrorKind = "timeout" | "http" | "network" | "payload" | "unsupported";

export interface LookupError {
  kind: LookupErrorKind;
  message: string;
}

export type Result<T, E = LookupError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(kind: LookupErrorKind, message: string): Result<never> {
  return { ok: false, error: { kind, message } };
}

/**
 * What a registry knows about the latest release of a package.
 */
export interface RegistryMetadata {
  size: number;
  description?: string;
  latestVersion?: string;
}

export interface RegistryClient {
  readonly ecosystem: Ecosystem;
  lookup(name: string): Promise<Result<RegistryMetadata>>;
}

export interface SecurityAudit {
  supports(ecosystem: Ecosystem): boolean;
  /** `version` is the declared version, or "" when unpinned. */
  audit(ecosystem: Ecosystem, name: string, version: string): Promise<Result<Vulnerability[]>>;
}
