import { LEADER_FILE } from "../documents/workspace.ts";
import type { CandidateScore } from "../judges/selection.ts";
import { splitCandidatePrompt, splitOptimizePrompt, splitScorePrompt } from "../prompts/split.ts";
import { PipelineBase } from "./base.ts";
import { CandidateRound } from "./candidates.ts";
import type { CandidatePrompts } from "./candidates.ts";

export type ModuleSplitReport = {
  output: string;
  bestCandidate: string;
  scores: Array<{ name: string; totalScore: number; issueCount: number }>;
  calls: number;
};

export function splitCandidateName(candidateId: number): string {
  return `requirement_leader_${candidateId}.md`;
}

/**
 * Produces requirement_leader.md: several module split candidates, scored by
 * every reviewer, with the best one optimized using its reviews.
 */
export class ModuleSplitPipeline extends PipelineBase {
  prompts(): CandidatePrompts {
    return {
      candidateName: splitCandidateName,
      generatePrompt: (candidateId) =>
        splitCandidatePrompt({
          docName: splitCandidateName(candidateId),
          requirements: this.workspace.readRequirementDocs(),
        }),
      scorePrompt: (candidateId) =>
        splitScorePrompt({
          docName: splitCandidateName(candidateId),
          requirements: this.workspace.readRequirementDocs(),
          document: this.workspace.readDocument(splitCandidateName(candidateId)),
        }),
      optimizePrompt: (best: CandidateScore, feedback: string) =>
        splitOptimizePrompt({
          bestName: splitCandidateName(best.candidateId),
          requirements: this.workspace.readRequirementDocs(),
          document: this.workspace.readDocument(splitCandidateName(best.candidateId)),
          feedback,
        }),
    };
  }

  async run(): Promise<ModuleSplitReport> {
    const round = new CandidateRound(this.generator, this.writers, this.reviewers, this.settings.candidates, this.log);
    const prompts = this.prompts();

    this.step("split: generate candidates");
    await round.generate(prompts);

    this.step("split: score candidates");
    const board = await round.score(prompts);

    this.step("split: optimize best candidate");
    const result = await round.optimize(prompts, board);
    this.log.info({ output: LEADER_FILE, calls: this.callCount }, "module split finished");

    return {
      output: LEADER_FILE,
      bestCandidate: result.bestName,
      scores: result.scores.map((entry) => ({
        name: splitCandidateName(entry.candidateId),
        totalScore: entry.totalScore,
        issueCount: entry.issueCount,
      })),
      calls: this.callCount,
    };
  }
}
