import { test, describe } from "node:test";
import assert from "node:assert";
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS, loadConfig } from "../src/config";

describe("loadConfig", () => {
  test("defaults when nothing is set", () => {
    assert.deepStrictEqual(loadConfig({}), {
      concurrency: DEFAULT_CONCURRENCY,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      githubToken: undefined,
    });
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig({
      DEP_FOOTPRINT_CONCURRENCY: "3",
      DEP_FOOTPRINT_TIMEOUT_MS: "250",
      GITHUB_TOKEN: "test-token",
    });

    assert.deepStrictEqual(config, { concurrency: 3, timeoutMs: 250, githubToken: "test-token" });
  });

  test("ignores values that are not positive integers", () => {
    const config = loadConfig({ DEP_FOOTPRINT_CONCURRENCY: "0", DEP_FOOTPRINT_TIMEOUT_MS: "soon", GITHUB_TOKEN: "" });

    assert.deepStrictEqual(config, { concurrency: 8, timeoutMs: 5000, githubToken: undefined });
  });
});
