import test from "node:test";
import assert from "node:assert/strict";

import { ConfigurationError } from "../../src/errors.ts";
import { AlignmentPropagator, extractRoundSummary, priorChangesBlock } from "../../src/refinement/alignment.ts";
import type { AlignmentArtifacts, AlignmentRound } from "../../src/refinement/alignment.ts";
import { FakeGenerator } from "../helpers.ts";

class RecordingArtifacts implements AlignmentArtifacts {
  rounds: AlignmentRound[] = [];

  async alignmentPrompt(round: AlignmentRound): Promise<string> {
    this.rounds.push(round);
    return `ALIGN ${round.round}/${round.totalRounds}\n${round.priorChanges}`;
  }
}

test("summary block runs to the end of the reply", () => {
  const summary = extractRoundSummary("Updated two documents.\n[ROUND SUMMARY]\n- renamed StoreApi\n- aligned Job fields\n");
  assert.deepEqual(summary, { text: "- renamed StoreApi\n- aligned Job fields", source: "marker" });
});

test("summary block stops at the next marker line", () => {
  const summary = extractRoundSummary("[ROUND SUMMARY]\n- moved retry config\n\n[NEXT STEPS]\n- review queue module");
  assert.deepEqual(summary, { text: "- moved retry config", source: "marker" });
});

test("inline bracketed words do not end the block", () => {
  assert.equal(extractRoundSummary("[ROUND SUMMARY] updated [API] names").text, "updated [API] names");
});

test("tagged summary lines stay in the block", () => {
  const summary = extractRoundSummary(
    "Aligned docs.\n[ROUND SUMMARY]\n[API] renamed StoreApi.put to write\n[DB] added index on job_id\n",
  );
  assert.deepEqual(summary, {
    text: "[API] renamed StoreApi.put to write\n[DB] added index on job_id",
    source: "marker",
  });
});

test("an empty summary block falls back to the tail", () => {
  assert.deepEqual(extractRoundSummary("Aligned.\n[ROUND SUMMARY]\n"), { text: "Aligned.\n[ROUND SUMMARY]", source: "tail" });
  assert.deepEqual(extractRoundSummary("Aligned.\n[ROUND SUMMARY]\n\n[NEXT STEPS]\n- none"), {
    text: "Aligned.\n[ROUND SUMMARY]\n\n[NEXT STEPS]\n- none",
    source: "tail",
  });
});

test("falls back to the tail of the reply", () => {
  const reply = `${"x".repeat(100)}${"y".repeat(500)}  `;
  assert.deepEqual(extractRoundSummary(reply), { text: "y".repeat(500), source: "tail" });
});

test("absent reply gives an empty summary", () => {
  assert.deepEqual(extractRoundSummary(null), { text: "", source: "none" });
  assert.deepEqual(extractRoundSummary(""), { text: "", source: "none" });
});

test("prior changes block", () => {
  assert.equal(priorChangesBlock(2, ""), "");
  assert.equal(
    priorChangesBlock(3, "- renamed Foo"),
    "## Changes already made in round 2\n\nContinue from these changes. Do not redo any of these items and do not revert " +
      "interface definitions that were already aligned:\n\n- renamed Foo\n",
  );
});

test("runs exactly the configured rounds, rotating writers and carrying the latest summary", async () => {
  const generator = new FakeGenerator(["done\n[ROUND SUMMARY]\nrenamed Foo", "no marker here", "[ROUND SUMMARY] final"]);
  const artifacts = new RecordingArtifacts();
  const summary = await new AlignmentPropagator(["w1", "w2"], generator, 3).run(artifacts);

  assert.equal(summary, "final");
  assert.equal(generator.calls.length, 3);
  assert.deepEqual(generator.identities, ["w1", "w2", "w1"]);
  assert.deepEqual(
    artifacts.rounds.map((round) => [round.round, round.totalRounds]),
    [
      [1, 3],
      [2, 3],
      [3, 3],
    ],
  );
  assert.equal(artifacts.rounds[0]?.priorChanges, "");
  assert.equal(artifacts.rounds[1]?.priorChanges, priorChangesBlock(2, "renamed Foo"));
  assert.equal(artifacts.rounds[2]?.priorChanges, priorChangesBlock(3, "no marker here"));
});

test("tagged summary lines are carried into the next round", async () => {
  const generator = new FakeGenerator(["[ROUND SUMMARY]\n[API] renamed Foo", "x"]);
  const artifacts = new RecordingArtifacts();
  await new AlignmentPropagator(["w1"], generator, 2).run(artifacts);

  assert.equal(artifacts.rounds[1]?.priorChanges, priorChangesBlock(2, "[API] renamed Foo"));
});

test("only the last reply decides the final summary", async () => {
  const generator = new FakeGenerator(["[ROUND SUMMARY] a", "[ROUND SUMMARY] b"]);
  assert.equal(await new AlignmentPropagator(["w1"], generator, 2).run(new RecordingArtifacts()), "b");
});

test("an absent reply clears the carried summary", async () => {
  const generator = new FakeGenerator(["[ROUND SUMMARY] a", null, "[ROUND SUMMARY] c"]);
  const artifacts = new RecordingArtifacts();
  const summary = await new AlignmentPropagator(["w1"], generator, 3).run(artifacts);

  assert.equal(summary, "c");
  assert.equal(artifacts.rounds[2]?.priorChanges, "");
});

test("zero rounds makes no calls", async () => {
  const generator = new FakeGenerator();
  assert.equal(await new AlignmentPropagator([null], generator).run(new RecordingArtifacts(), 0), "");
  assert.equal(generator.calls.length, 0);
});

test("rejects an empty writer list", () => {
  assert.throws(() => new AlignmentPropagator([], new FakeGenerator()), ConfigurationError);
});
