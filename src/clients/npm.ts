/**
 * Client for the npm registry packument endpoint.
 *
 * Size is the latest version's `dist.unpackedSize`, falling back to
 * `dist.size`, else 0.
 */

import { z } from "zod";
import { NPM_REGISTRY_URL } from "../config";
import { HttpClient } from "./http";
import { ok, RegistryClient, RegistryMetadata, Result } from "./types";

const npmVersionSchema = z.object({
  dist: z
    .object({
      unpackedSize: z.number().int().nonnegative().optional(),
      size: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

const packumentSchema = z.object({
  description: z.string().nullish(),
  "dist-tags": z.record(z.string()).optional(),
  // Only the latest entry is read, so older versions are not validated
  versions: z.record(z.unknown()).optional(),
});

export type Packument = z.infer<typeof packumentSchema>;

export function toRegistryMetadata(packument: Packument): RegistryMetadata {
  const latest = packument["dist-tags"]?.latest;
  const entry = npmVersionSchema.safeParse(latest ? packument.versions?.[latest] : undefined);
  const dist = entry.success ? entry.data.dist : undefined;

  return {
    size: dist?.unpackedSize ?? dist?.size ?? 0,
    description: packument.description || undefined,
    latestVersion: latest || undefined,
  };
}

// Scoped names keep their "@" but encode the slash: @scope%2fname
export function packumentPath(name: string): string {
  return name.startsWith("@") ? `@${encodeURIComponent(name.slice(1))}` : encodeURIComponent(name);
}

export class NpmRegistryClient implements RegistryClient {
  readonly ecosystem = "node" as const;

  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = NPM_REGISTRY_URL,
  ) {}

  async lookup(name: string): Promise<Result<RegistryMetadata>> {
    const response = await this.http.getJson(`${this.baseUrl}/${packumentPath(name)}`, packumentSchema);
    if (!response.ok) return response;
    return ok(toRegistryMetadata(response.value));
  }
}
