/**
 * Registry metadata cache for one analysis run.
 *
 * Keys are scoped by ecosystem. Concurrent misses for the same key share one
 * in-flight fetch. Failed lookups are handed to every waiter but never stored,
 * so the next call for that key fetches again. No eviction.
 */

import { RegistryMetadata, Result } from "./clients/types";
import { Ecosystem } from "./types";

export interface CacheStats {
  hits: number;
  misses: number;
  fetches: number;
  entries: number;
}

export class MetadataCache {
  private readonly entries = new Map<string, RegistryMetadata>();
  private readonly inFlight = new Map<string, Promise<Result<RegistryMetadata>>>();
  private hits = 0;
  private misses = 0;
  private fetches = 0;

  private static key(ecosystem: Ecosystem, name: string): string {
    return `${ecosystem}:${name}`;
  }

  get(ecosystem: Ecosystem, name: string): RegistryMetadata | undefined {
    return this.entries.get(MetadataCache.key(ecosystem, name));
  }

  put(ecosystem: Ecosystem, name: string, metadata: RegistryMetadata): void {
    this.entries.set(MetadataCache.key(ecosystem, name), metadata);
  }

  async getOrFetch(
    ecosystem: Ecosystem,
    name: string,
    fetcher: () => Promise<Result<RegistryMetadata>>,
  ): Promise<Result<RegistryMetadata>> {
    const key = MetadataCache.key(ecosystem, name);

    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      return { ok: true, value: cached };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    this.fetches++;
    const request = fetcher()
      .then((result) => {
        if (result.ok) this.entries.set(key, result.value);
        return result;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      fetches: this.fetches,
      entries: this.entries.size,
    };
  }
}
