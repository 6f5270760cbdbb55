/**
 * Parsers for dependency manifests.
 *
 * Supported ecosystems:
 * - Python ("requirements.txt" style text)
 * - Node.js ("package.json", as text or an already decoded object)
 */

import { ParseError } from "../errors";
import { Ecosystem, RequirementRecord } from "../types";
import { parsePackageJson } from "./npm";
import { parseRequirements } from "./pypi";

export { normalizeName } from "./utils";

export function parse(content: unknown, ecosystem: Ecosystem): RequirementRecord[] {
  switch (ecosystem) {
    case "python":
      if (typeof content !== "string") {
        throw new ParseError("Requirements manifest must be text");
      }
      return parseRequirements(content);
    case "node":
      return parsePackageJson(content);
  }
}
