/**
 * Unit tests for advisory merge logic.
 *
 * Tests dedupe and conflict resolution when merging results from multiple databases.
 *
 * Usage: npm run test
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { mergeVulnerabilities, severityRank } from "../src/clients/merge";
import { Vulnerability } from "../src/clients/types";

describe("mergeVulnerabilities", () => {
  test("deduplicates by vulnerability ID", () => {
    const a: Vulnerability[] = [{ id: "GHSA-1234", summary: "Vuln A" }];
    const b: Vulnerability[] = [
      { id: "GHSA-1234", summary: "Vuln A from B" },
      { id: "GHSA-5678", summary: "Vuln B only" },
    ];

    const merged = mergeVulnerabilities(a, b);

    assert.deepStrictEqual(merged.map(v => v.id), ["GHSA-1234", "GHSA-5678"]);
  });

  test("prefers longer summary when merging", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234", summary: "Short" }],
      [{ id: "GHSA-1234", summary: "This is a much longer and more detailed summary" }],
    );

    assert.strictEqual(merged.length, 1);
    assert.strictEqual(merged[0].summary, "This is a much longer and more detailed summary");
  });

  test("prefers higher severity when merging", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234", severity: [{ type: "GHSA", score: "LOW" }] }],
      [{ id: "GHSA-1234", severity: [{ type: "GHSA", score: "CRITICAL" }] }],
    );

    assert.strictEqual(merged[0].severity?.[0].score, "CRITICAL");
  });

  test("keeps the only severity reported", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234" }],
      [{ id: "GHSA-1234", severity: [{ type: "GHSA", score: "MODERATE" }] }],
    );

    assert.deepStrictEqual(merged[0].severity, [{ type: "GHSA", score: "MODERATE" }]);
  });

  test("unions references by URL", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234", references: [{ type: "WEB", url: "https://example.com/a" }] }],
      [{
        id: "GHSA-1234",
        references: [
          { type: "WEB", url: "https://example.com/a" },  // duplicate
          { type: "WEB", url: "https://example.com/b" },  // new
        ],
      }],
    );

    assert.deepStrictEqual(merged[0].references?.map(r => r.url), ["https://example.com/a", "https://example.com/b"]);
  });

  test("unions aliases", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234", aliases: ["CVE-2099-1"] }],
      [{ id: "GHSA-1234", aliases: ["CVE-2099-1", "PYSEC-2099-1"] }],
    );

    assert.deepStrictEqual(merged[0].aliases, ["CVE-2099-1", "PYSEC-2099-1"]);
  });

  test("prefers explicit fixedIn over missing", () => {
    const merged = mergeVulnerabilities([{ id: "GHSA-1234" }], [{ id: "GHSA-1234", fixedIn: "1.2.3" }]);
    assert.strictEqual(merged[0].fixedIn, "1.2.3");
  });

  test("keeps fixedIn from first source if both have it", () => {
    const merged = mergeVulnerabilities(
      [{ id: "GHSA-1234", fixedIn: "1.0.0" }],
      [{ id: "GHSA-1234", fixedIn: "1.2.3" }],
    );
    assert.strictEqual(merged[0].fixedIn, "1.0.0");
  });

  test("merges three sources", () => {
    const merged = mergeVulnerabilities([{ id: "A" }], [{ id: "B" }], [{ id: "A", summary: "from third" }]);
    assert.deepStrictEqual(merged.map(v => v.id), ["A", "B"]);
    assert.strictEqual(merged[0].summary, "from third");
  });

  test("handles empty inputs", () => {
    assert.deepStrictEqual(mergeVulnerabilities([], []), []);
  });
});

describe("severityRank", () => {
  test("orders labels", () => {
    assert.strictEqual(severityRank([{ type: "GHSA", score: "CRITICAL" }]), 4);
    assert.strictEqual(severityRank([{ type: "GHSA", score: "high" }]), 3);
    assert.strictEqual(severityRank([{ type: "GHSA", score: "MEDIUM" }]), 2);
    assert.strictEqual(severityRank([{ type: "GHSA", score: "LOW" }]), 1);
    assert.strictEqual(severityRank(undefined), 0);
  });
});
