/**
 * Parser for pip requirements files (requirements.txt).
 *
 * One requirement per line: `name[comparator version]`. Options (-r, -e, ...),
 * URLs and anything else that does not look like a requirement are skipped.
 */

import { isPinnedVersion } from "../clients/version";
import { RequirementRecord } from "../types";
import { createRequirement, normalizePythonName } from "./utils";

const REQUIREMENT_LINE = /^([a-zA-Z0-9._-]+)(?:\s*([=<>!~]+)\s*([a-zA-Z0-9._-]+))?/;
const EXACT_OPERATORS = new Set(["==", "==="]);

export function parseRequirements(content: string): RequirementRecord[] {
  const records: RequirementRecord[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.split(" #")[0].trim();

    if (!trimmed) continue;
    if (trimmed.startsWith("#")) continue;
    if (trimmed.startsWith("-")) continue;
    if (trimmed.includes("://")) continue;

    const match = trimmed.match(REQUIREMENT_LINE);
    if (!match) continue;

    const [matched, rawName, operator, version] = match;
    // "==2.0.1" alone; "==2.*", "==2.0,<3" or a trailing marker are ranges
    const exact =
      operator !== undefined &&
      EXACT_OPERATORS.has(operator) &&
      isPinnedVersion(version) &&
      trimmed.slice(matched.length).trim() === "";
    records.push(createRequirement(normalizePythonName(rawName), version ?? "", exact));
  }

  return records;
}
