/**
 * In-process stand-ins for the registry and advisory clients.
 */

import { fail, RegistryClient, RegistryMetadata, Result, SecurityAudit, Vulnerability } from "../src/clients/types";
import { Ecosystem, Logger } from "../src/types";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class FakeRegistry implements RegistryClient {
  readonly lookups: string[] = [];

  constructor(
    readonly ecosystem: Ecosystem,
    private readonly responses: Record<string, Result<RegistryMetadata>>,
    private readonly delays: Record<string, number> = {},
  ) {}

  async lookup(name: string): Promise<Result<RegistryMetadata>> {
    this.lookups.push(name);
    const wait = this.delays[name];
    if (wait) await delay(wait);
    return this.responses[name] ?? fail("http", "404 Not Found");
  }
}

export class FakeAudit implements SecurityAudit {
  readonly audited: Array<{ ecosystem: Ecosystem; name: string; version: string }> = [];

  constructor(
    private readonly responses: Record<string, Result<Vulnerability[]>> = {},
    private readonly supported: Ecosystem[] = ["python", "node"],
  ) {}

  supports(ecosystem: Ecosystem): boolean {
    return this.supported.includes(ecosystem);
  }

  async audit(ecosystem: Ecosystem, name: string, version: string): Promise<Result<Vulnerability[]>> {
    this.audited.push({ ecosystem, name, version });
    return this.responses[name] ?? { ok: true, value: [] };
  }
}

export function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    log: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
  };
}
