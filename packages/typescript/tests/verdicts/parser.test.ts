import test from "node:test";
import assert from "node:assert/strict";

import { FALLBACK_SUGGESTION_CHARS, ResponseParser, parseVerdict, tryParseVerdict } from "../../src/verdicts/parser.ts";

test("parses a clean JSON review", () => {
  const verdict = parseVerdict('{"satisfied": false, "issues": ["missing retry policy"], "suggestions": "add one", "score": 6}');
  assert.deepEqual(verdict, { satisfied: false, issues: ["missing retry policy"], suggestions: "add one", score: 6 });
});

test("takes the outermost object out of surrounding prose and fences", () => {
  const raw = 'Here is my review:\n```json\n{"satisfied": true, "issues": [], "suggestions": "", "score": 8}\n```\nThanks.';
  const result = tryParseVerdict(raw);
  assert.equal(result.kind, "parsed");
  assert.equal(result.kind === "parsed" && result.source, "structured");
  assert.deepEqual(parseVerdict(raw), { satisfied: true, issues: [], suggestions: "", score: 8 });
});

test("retries with normalized quotes", () => {
  const raw = "{“satisfied”: true, “issues”: [], “score”: 7}";
  assert.deepEqual(parseVerdict(raw), { satisfied: true, issues: [], suggestions: "", score: 7 });
});

test("keeps apostrophes when the reply is already valid JSON", () => {
  const verdict = parseVerdict('{"satisfied": false, "issues": ["the module\'s API is vague"], "score": 5}');
  assert.deepEqual(verdict.issues, ["the module's API is vague"]);
});

test("coerces loosely typed fields", () => {
  const verdict = parseVerdict('{"satisfied": "TRUE", "issues": "one issue", "score": "7"}');
  assert.deepEqual(verdict, { satisfied: true, issues: ["one issue"], suggestions: "", score: 7 });
});

test("non-digit score and non-string issue items", () => {
  const verdict = parseVerdict('{"satisfied": "yes", "issues": [{"id": 1}, "plain"], "score": 7.5}');
  assert.deepEqual(verdict, { satisfied: false, issues: ['{"id":1}', "plain"], suggestions: "", score: 0 });
});

test("blank issue string becomes an empty list", () => {
  assert.deepEqual(parseVerdict('{"issues": "  ", "score": 3}').issues, []);
});

test("wrong field types degrade to defaults", () => {
  const verdict = parseVerdict('{"satisfied": 1, "issues": 5, "suggestions": ["x"], "score": null}');
  assert.deepEqual(verdict, { satisfied: false, issues: [], suggestions: "", score: 0 });
});

test("recovers score and satisfied by pattern when the object is broken", () => {
  const raw = '{"satisfied": True, "score": "6", "issues": [unterminated';
  const result = tryParseVerdict(raw);
  assert.equal(result.kind, "parsed");
  if (result.kind !== "parsed") {
    return;
  }
  assert.equal(result.source, "pattern");
  assert.deepEqual(result.verdict, { satisfied: true, issues: [], suggestions: raw, score: 6 });
});

test("pattern tier keeps only the head of a long reply", () => {
  const raw = `"score": 4 ${"x".repeat(2000)}`;
  const verdict = parseVerdict(raw);
  assert.equal(verdict.score, 4);
  assert.equal(verdict.satisfied, false);
  assert.equal(verdict.suggestions.length, FALLBACK_SUGGESTION_CHARS);
});

test("garbage is a failure and parses to the zero verdict", () => {
  const result = tryParseVerdict("I could not review this document.");
  assert.deepEqual(result, { kind: "failure", reason: "no object span" });
  assert.deepEqual(parseVerdict("I could not review this document."), {
    satisfied: false,
    issues: [],
    suggestions: "",
    score: 0,
  });
});

test("an invalid object without known fields is a failure", () => {
  assert.deepEqual(tryParseVerdict("{not json at all}"), { kind: "failure", reason: "object span is not valid JSON" });
});

test("empty and null replies are failures", () => {
  assert.deepEqual(tryParseVerdict(""), { kind: "failure", reason: "empty reply" });
  assert.deepEqual(tryParseVerdict("   \n"), { kind: "failure", reason: "empty reply" });
  assert.deepEqual(tryParseVerdict(null), { kind: "failure", reason: "empty reply" });
});

test("ResponseParser returns the zero verdict on failure", () => {
  const parser = new ResponseParser();
  assert.deepEqual(parser.parse(null), { satisfied: false, issues: [], suggestions: "", score: 0 });
  assert.equal(parser.parse('{"score": 9, "satisfied": true}').score, 9);
});
