/**
 * Client for the PyPI JSON API.
 *
 * Size is taken from the latest release's files: the first wheel, else the
 * first source distribution, else 0.
 *
 * Ref: https://warehouse.pypa.io/api-reference/json.html
 */

import { z } from "zod";
import { PYPI_URL } from "../config";
import { HttpClient } from "./http";
import { ok, RegistryClient, RegistryMetadata, Result } from "./types";

const releaseFileSchema = z.object({
  packagetype: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
});

const pypiProjectSchema = z.object({
  info: z.object({
    version: z.string(),
    summary: z.string().nullish(),
    description: z.string().nullish(),
  }),
  // Only the latest release's files are validated, when read
  releases: z.record(z.unknown()).optional(),
  urls: z.unknown().optional(),
});

const releaseFilesSchema = z.array(releaseFileSchema);

export type PypiProject = z.infer<typeof pypiProjectSchema>;
type ReleaseFile = z.infer<typeof releaseFileSchema>;

export function pickDistributionSize(files: ReleaseFile[]): number {
  const wheel = files.find((f) => f.packagetype === "bdist_wheel");
  if (wheel) return wheel.size ?? 0;

  const sdist = files.find((f) => f.packagetype === "sdist");
  return sdist?.size ?? 0;
}

export function toRegistryMetadata(project: PypiProject): RegistryMetadata {
  const version = project.info.version;
  const files = releaseFilesSchema.safeParse(project.releases?.[version] ?? project.urls);

  return {
    size: files.success ? pickDistributionSize(files.data) : 0,
    description: project.info.summary || project.info.description || undefined,
    latestVersion: version || undefined,
  };
}

export class PypiClient implements RegistryClient {
  readonly ecosystem = "python" as const;

  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = PYPI_URL,
  ) {}

  async lookup(name: string): Promise<Result<RegistryMetadata>> {
    const url = `${this.baseUrl}/${encodeURIComponent(name)}/json`;
    const response = await this.http.getJson(url, pypiProjectSchema);
    if (!response.ok) return response;
    return ok(toRegistryMetadata(response.value));
  }
}
