/**
 * Support for .footprintignore files to suppress specific advisories.
 *
 * Format: One vulnerability ID per line (GHSA-xxxx, CVE-xxxx, PYSEC-xxxx, etc.)
 *
 * Lines starting with # are considered comments and will be ignored.
 * Blank lines or any text following # on the same line will be ignored.
 *
 * Example .footprintignore:
 *   PYSEC-2022-9
 *   # Not relevant to this project
 *   GHSA-1234-5678-abcd
 *   CVE-2024-12345 # False positive
 */

import fs from "node:fs";
import path from "node:path";
import { Vulnerability } from "./clients/types";
import { Logger } from "./types";

export const IGNORE_FILENAME = ".footprintignore";

/**
 * Load suppressed vulnerability IDs.
 * Priority: explicit path (--ignore-file) > manifest dir > cwd
 */
export function loadIgnoreList(
  manifestPath: string,
  explicitPath?: string,
  logger: Logger = console,
  cwd: string = process.cwd(),
): Set<string> {
  if (explicitPath) {
    if (!fs.existsSync(explicitPath)) {
      throw new Error(`Ignore file not found: ${explicitPath}`);
    }
    return parseIgnoreFile(explicitPath, logger);
  }

  const candidates = [
    path.join(path.dirname(manifestPath), IGNORE_FILENAME),
    path.join(cwd, IGNORE_FILENAME),
  ];
  const ignorePath = candidates.find((candidate) => fs.existsSync(candidate));

  return ignorePath ? parseIgnoreFile(ignorePath, logger) : new Set<string>();
}

export function parseIgnoreContent(content: string): Set<string> {
  const ignored = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const withoutComment = line.split("#")[0].trim();
    if (withoutComment) ignored.add(withoutComment);
  }

  return ignored;
}

function parseIgnoreFile(ignorePath: string, logger: Logger): Set<string> {
  const ignored = parseIgnoreContent(fs.readFileSync(ignorePath, "utf-8"));

  if (ignored.size > 0) {
    logger.log(`📋 Loaded ${ignored.size} ignored advisory ID(s) from ${path.basename(ignorePath)}`);
  }

  return ignored;
}

/**
 * Drop advisories whose ID, or any alias (CVE ID), is in the ignore list.
 */
export function filterIgnored(
  vulns: Vulnerability[],
  ignored: ReadonlySet<string>,
): { kept: Vulnerability[]; ignoredIds: string[] } {
  if (ignored.size === 0) {
    return { kept: vulns, ignoredIds: [] };
  }

  const kept: Vulnerability[] = [];
  const ignoredIds: string[] = [];

  for (const vuln of vulns) {
    const match = ignored.has(vuln.id)
      ? vuln.id
      : vuln.aliases?.find((alias) => ignored.has(alias));

    if (match) ignoredIds.push(match);
    else kept.push(vuln);
  }

  return { kept, ignoredIds };
}
