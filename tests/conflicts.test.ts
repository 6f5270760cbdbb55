/**
 * Unit tests for version conflict detection.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { findConflicts } from "../src/conflicts";

const pkg = (name: string, declaredVersion: string) => ({ name, declaredVersion });

describe("findConflicts", () => {
  test("reports a later differing version against the first seen", () => {
    const conflicts = findConflicts([pkg("x", "1.0"), pkg("y", "2.0"), pkg("x", "1.0"), pkg("x", "2.0")]);

    assert.deepStrictEqual(conflicts, [{ name: "x", firstVersionSeen: "1.0", conflictingVersion: "2.0" }]);
  });

  test("each differing occurrence yields its own record", () => {
    const conflicts = findConflicts([pkg("x", "1.0"), pkg("x", "2.0"), pkg("x", "3.0"), pkg("x", "2.0")]);

    assert.deepStrictEqual(conflicts, [
      { name: "x", firstVersionSeen: "1.0", conflictingVersion: "2.0" },
      { name: "x", firstVersionSeen: "1.0", conflictingVersion: "3.0" },
      { name: "x", firstVersionSeen: "1.0", conflictingVersion: "2.0" },
    ]);
  });

  test("unpinned next to pinned is a conflict", () => {
    const conflicts = findConflicts([pkg("requests", ""), pkg("requests", "2.31.0")]);

    assert.deepStrictEqual(conflicts, [{ name: "requests", firstVersionSeen: "", conflictingVersion: "2.31.0" }]);
  });

  test("repeated identical declarations are not conflicts", () => {
    assert.deepStrictEqual(findConflicts([pkg("numpy", ""), pkg("numpy", ""), pkg("flask", "2.0.1")]), []);
  });

  test("empty input", () => {
    assert.deepStrictEqual(findConflicts([]), []);
  });
});
