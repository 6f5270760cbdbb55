/**
 * Errors surfaced to the caller. Registry and audit failures are not here:
 * they travel as `LookupError` values (see clients/types.ts) and never throw.
 */

export class ManifestNotFoundError extends Error {
  readonly name = "ManifestNotFoundError";

  constructor(readonly manifestPath: string) {
    super(`Manifest not found: ${manifestPath}`);
  }
}

export class ParseError extends Error {
  readonly name = "ParseError";

  constructor(message: string, readonly manifestPath?: string) {
    super(manifestPath ? `${manifestPath}: ${message}` : message);
  }
}

export class UnsupportedEcosystemError extends Error {
  readonly name = "UnsupportedEcosystemError";

  constructor(readonly ecosystem: string) {
    super(`Unsupported ecosystem: ${ecosystem}. Use 'python' or 'node'.`);
  }
}

export class UsageError extends Error {
  readonly name = "UsageError";
}
