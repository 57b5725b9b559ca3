import test from "node:test";
import assert from "node:assert/strict";
import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { DocumentWorkspace } from "../../src/documents/workspace.ts";
import type { Identity } from "../../src/llm/client.ts";
import { DesignPipeline, overallCandidateName, parseModuleList } from "../../src/pipeline/design.ts";
import { LoopState } from "../../src/refinement/loop.ts";
import { FakeGenerator, SATISFIED, review, tempDir } from "../helpers.ts";

test("module list from a JSON array", () => {
  assert.deepEqual(parseModuleList('Modules:\n["storage", "api/gateway", " storage "]'), ["storage", "api-gateway"]);
});

test("module list from curly quotes inside the array", () => {
  assert.deepEqual(parseModuleList("[“orders”, “billing”]"), ["orders", "billing"]);
});

test("module list falls back to quoted names", () => {
  assert.deepEqual(parseModuleList('The modules are "orders" and 「billing」.'), ["orders", "billing"]);
});

test("no module list", () => {
  assert.deepEqual(parseModuleList("no modules here"), []);
  assert.deepEqual(parseModuleList(null), []);
});

function scriptedModel(dir: string) {
  return (prompt: string, _identity: Identity): string | null => {
    if (prompt.includes("Align the interfaces across")) {
      const round = /round (\d+) of/.exec(prompt)?.[1] ?? "?";
      return `Updated the documents.\n[ROUND SUMMARY]\n- round ${round} changes`;
    }
    if (prompt.includes("Review all design documents as a whole.")) {
      return SATISFIED;
    }
    if (prompt.includes("extract its list of modules")) {
      return '["storage", "api/gateway"]';
    }
    if (prompt.includes('Review the detailed design document of the module "storage"')) {
      return SATISFIED;
    }
    if (prompt.includes('Review the detailed design document of the module "api-gateway"')) {
      return review({ issues: ["no rate limits"], score: 40 });
    }
    if (prompt.includes('write the detailed design document of the module "storage"')) {
      writeFileSync(join(dir, "design_module_storage.md"), "# Storage\n## Interfaces Provided\n- put(key, value)\n", "utf8");
      return "written";
    }
    if (prompt.includes("Review the following overall design document strictly.")) {
      return review({ issues: ["thin"], score: 70 });
    }
    return "ok";
  };
}

test("runs overall selection, module generation, refinement, alignment and global review", async () => {
  const dir = tempDir();
  const generator = new FakeGenerator(scriptedModel(dir));
  const report = await new DesignPipeline({
    workspace: new DocumentWorkspace(dir),
    generator,
    writers: ["w1", "w2"],
    reviewers: ["r1"],
    settings: { candidates: 1, alignRounds: 2, refinementFactor: 1 },
  }).run();

  assert.deepEqual(report.overall, {
    output: "design_overall.md",
    bestCandidate: "design_overall_1.md",
    scores: [{ name: "design_overall_1.md", totalScore: 70, issueCount: 1 }],
  });
  assert.deepEqual(report.modules, ["storage", "api-gateway"]);
  assert.deepEqual(
    report.moduleOutcomes.map((outcome) => [outcome.artifact, outcome.state, outcome.callsUsed, outcome.optimizeCalls]),
    [
      ["design_module_storage.md", LoopState.CONVERGED, 1, 0],
      ["design_module_api-gateway.md", LoopState.BUDGET_EXHAUSTED, 2, 1],
    ],
  );
  assert.equal(report.alignmentSummary, "- round 2 changes");
  assert.equal(report.globalOutcome?.state, LoopState.CONVERGED);
  assert.equal(report.calls, 12);
  assert.deepEqual(generator.identities, ["w1", "r1", "w1", "w1", "w1", "w2", "r1", "r1", "w1", "w1", "w2", "r1"]);

  const gatewayDocPrompt = generator.calls[5]?.prompt ?? "";
  assert.ok(
    gatewayDocPrompt.includes(
      "--- module: storage (file: design_module_storage.md) ---\n" +
        "### Interfaces (from design_module_storage.md)\n## Interfaces Provided\n- put(key, value)\n",
    ),
  );

  const gatewayOptimizePrompt = generator.calls[8]?.prompt ?? "";
  assert.ok(gatewayOptimizePrompt.includes("## Review comments\n\n[r1] Issues:\n  - no rate limits"));

  const secondAlignPrompt = generator.calls[10]?.prompt ?? "";
  assert.ok(secondAlignPrompt.includes("## Changes already made in round 1"));
  assert.ok(secondAlignPrompt.includes("- round 1 changes"));
});

test("stops after the overall document when no module list can be read", async () => {
  const generator = new FakeGenerator((prompt) => (prompt.includes("extract its list of modules") ? "I cannot tell." : "ok"));
  const report = await new DesignPipeline({
    workspace: new DocumentWorkspace(tempDir()),
    generator,
    writers: ["w1"],
    reviewers: ["r1"],
    settings: { candidates: 2 },
  }).run();

  assert.deepEqual(report.modules, []);
  assert.deepEqual(report.moduleOutcomes, []);
  assert.equal(report.globalOutcome, null);
  assert.equal(report.calls, 6);
  assert.equal(overallCandidateName(2), "design_overall_2.md");
});
