import test from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { DocumentWorkspace } from "../../src/documents/workspace.ts";
import { ConfigurationError } from "../../src/errors.ts";
import { ModuleSplitPipeline, splitCandidateName } from "../../src/pipeline/split.ts";
import { FakeGenerator, review, tempDir } from "../helpers.ts";

test("scores every candidate and optimizes the best into the leader document", async () => {
  const dir = tempDir();
  mkdirSync(join(dir, "requirement"));
  writeFileSync(join(dir, "requirement", "orders.md"), "Orders can be cancelled within 24 hours.", "utf8");

  const generator = new FakeGenerator([
    "ok",
    "ok",
    "ok",
    review({ score: 60, issues: ["a"] }),
    review({ score: 80, suggestions: "tighten" }),
    review({ score: 70 }),
    review({ score: 50 }),
    review({ score: 75, issues: ["x"] }),
    review({ score: 60 }),
    "ok",
  ]);
  const pipeline = new ModuleSplitPipeline({
    workspace: new DocumentWorkspace(dir),
    generator,
    writers: ["w1", "w2"],
    reviewers: ["r1", "r2"],
    settings: { candidates: 3 },
  });
  const report = await pipeline.run();

  assert.deepEqual(report, {
    output: "requirement_leader.md",
    bestCandidate: "requirement_leader_2.md",
    scores: [
      { name: "requirement_leader_1.md", totalScore: 110, issueCount: 1 },
      { name: "requirement_leader_2.md", totalScore: 155, issueCount: 1 },
      { name: "requirement_leader_3.md", totalScore: 130, issueCount: 0 },
    ],
    calls: 10,
  });
  assert.deepEqual(generator.identities, ["w1", "w2", "w1", "r1", "r1", "r1", "r2", "r2", "r2", "w1"]);

  const firstPrompt = generator.calls[0]?.prompt ?? "";
  assert.ok(firstPrompt.includes("Orders can be cancelled within 24 hours."));
  assert.ok(firstPrompt.includes("Note: the document you produce is named requirement_leader_1.md."));

  const optimizePrompt = generator.calls[9]?.prompt ?? "";
  assert.ok(optimizePrompt.includes("## Module split document to optimize (file: requirement_leader_2.md)\n\n[missing file: requirement_leader_2.md]"));
  assert.ok(optimizePrompt.includes("## Review comments (from several reviewers, for reference only)\n\n[r1] Suggestions: tighten\n\n[r2] Issues:\n  - x"));
});

test("candidate names", () => {
  assert.equal(splitCandidateName(4), "requirement_leader_4.md");
});

test("rejects missing identities and a zero candidate count", () => {
  const workspace = new DocumentWorkspace(tempDir());
  const generator = new FakeGenerator();
  assert.throws(() => new ModuleSplitPipeline({ workspace, generator, writers: [], reviewers: ["r1"] }), ConfigurationError);
  assert.throws(() => new ModuleSplitPipeline({ workspace, generator, writers: ["w1"], reviewers: [] }), ConfigurationError);
  assert.throws(
    () => new ModuleSplitPipeline({ workspace, generator, writers: ["w1"], reviewers: ["r1"], settings: { candidates: 0 } }),
    ConfigurationError,
  );
});
