/**
 * Unit tests for CLI argument parsing.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import path from "node:path";
import { parseArgs, USAGE } from "../src/args";
import { UsageError } from "../src/errors";

describe("parseArgs", () => {
  test("splits manifests and reads the ecosystem last", () => {
    const options = parseArgs(["api/requirements.txt,worker/requirements.txt", "extra.txt", "python"], "/work");

    assert.deepStrictEqual(options.manifests, ["api/requirements.txt", "worker/requirements.txt", "extra.txt"]);
    assert.strictEqual(options.ecosystem, "python");
    assert.strictEqual(options.output, path.join("/work", "analysis_output.json"));
    assert.strictEqual(options.help, false);
  });

  test("reads flag values", () => {
    const options = parseArgs(
      ["package.json", "node", "--database-source", "osv", "--output", "out.json", "--concurrency", "3", "--ignore-file", "x.ignore"],
      "/work",
    );

    assert.strictEqual(options.source, "osv");
    assert.strictEqual(options.output, "out.json");
    assert.strictEqual(options.concurrency, 3);
    assert.strictEqual(options.ignoreFile, "x.ignore");
  });

  test("--output without a value is rejected before any work", () => {
    assert.throws(
      () => parseArgs(["requirements.txt", "python", "--output"]),
      (err: unknown) => err instanceof UsageError && err.message === "Missing --output value. Expected a file path.",
    );
  });

  test("--output followed by another flag is rejected", () => {
    assert.throws(() => parseArgs(["requirements.txt", "python", "--output", "--concurrency", "2"]), UsageError);
  });

  test("rejects a non-positive concurrency", () => {
    assert.throws(
      () => parseArgs(["requirements.txt", "python", "--concurrency", "0"]),
      /Invalid --concurrency value: 0/,
    );
  });

  test("rejects an unknown database source", () => {
    assert.throws(() => parseArgs(["requirements.txt", "python", "--database-source", "nvd"]), /Must be 'osv' or 'ghsa'/);
  });

  test("needs a manifest and an ecosystem", () => {
    assert.throws(
      () => parseArgs(["requirements.txt"]),
      (err: unknown) => err instanceof UsageError && err.message === USAGE,
    );
  });

  test("--help wins over missing positionals", () => {
    assert.strictEqual(parseArgs(["--help"]).help, true);
  });
});
