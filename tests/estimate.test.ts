/**
 * Unit tests for Docker image size estimation.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { estimateDockerSizes } from "../src/estimate";

const MiB = 1024 * 1024;

describe("estimateDockerSizes", () => {
  test("python variants add packages plus floored overhead", () => {
    // 1000 + 2001 = 3001; 3001 * 0.15 = 450.15
    const estimate = estimateDockerSizes([{ size: 1000 }, { size: 2001 }], "python");

    assert.deepStrictEqual(estimate, {
      full: 100 * MiB + 3001 + 450,
      slim: 40 * MiB + 3001 + 450,
      alpine: 15 * MiB + 3001 + 450,
    });
  });

  test("variant gaps equal the base image gaps", () => {
    const estimate = estimateDockerSizes([{ size: 123456 }], "python");

    assert.strictEqual(estimate.full - estimate.slim, 60 * MiB);
    assert.strictEqual(estimate.slim - estimate.alpine, 25 * MiB);
  });

  test("node uses its own base images", () => {
    const estimate = estimateDockerSizes([{ size: 200 }], "node");

    assert.deepStrictEqual(estimate, {
      full: 85 * MiB + 230,
      slim: 35 * MiB + 230,
      alpine: 12 * MiB + 230,
    });
  });

  test("no packages gives the bare base sizes", () => {
    assert.deepStrictEqual(estimateDockerSizes([], "node"), { full: 85 * MiB, slim: 35 * MiB, alpine: 12 * MiB });
  });

  test("unresolved packages contribute nothing", () => {
    const estimate = estimateDockerSizes([{ size: 0 }, { size: 0 }], "python");
    assert.strictEqual(estimate.full, 100 * MiB);
  });

  test("accepts custom base sizes", () => {
    const bases = {
      python: { full: 10, slim: 5, alpine: 1 },
      node: { full: 20, slim: 10, alpine: 2 },
    };
    assert.deepStrictEqual(estimateDockerSizes([{ size: 100 }], "node", bases), { full: 135, slim: 125, alpine: 117 });
  });
});
