import test from "node:test";
import assert from "node:assert/strict";

import { isConverged } from "../../src/judges/convergence.ts";
import type { Verdict } from "../../src/verdicts/base.ts";

function verdict(overrides: Partial<Verdict> = {}): Verdict {
  return { satisfied: true, issues: [], suggestions: "", score: 8, ...overrides };
}

test("converged when every verdict is satisfied with no issues", () => {
  assert.equal(isConverged([verdict(), verdict({ suggestions: "minor wording" })]), true);
});

test("satisfied with issues does not count", () => {
  assert.equal(isConverged([verdict(), verdict({ issues: ["naming drift"] })]), false);
});

test("one unsatisfied reviewer blocks convergence", () => {
  assert.equal(isConverged([verdict(), verdict({ satisfied: false })]), false);
});

test("empty set converges vacuously", () => {
  assert.equal(isConverged([]), true);
});
