import { ConfigurationError } from "../errors.ts";
import { mergeLabeledFeedback } from "../judges/feedback.ts";
import { ScoreBoard } from "../judges/selection.ts";
import type { CandidateScore } from "../judges/selection.ts";
import { identityLabel } from "../llm/client.ts";
import type { Generator, Identity } from "../llm/client.ts";
import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";
import { NO_SUGGESTIONS } from "../prompts/formats.ts";
import { ResponseParser } from "../verdicts/parser.ts";

export interface CandidatePrompts {
  candidateName(candidateId: number): string;
  generatePrompt(candidateId: number): string;
  scorePrompt(candidateId: number): string;
  optimizePrompt(best: CandidateScore, feedback: string): string;
}

export type CandidateRoundResult = {
  scores: CandidateScore[];
  best: CandidateScore;
  bestName: string;
  feedback: string;
};

/**
 * Generate N candidates, have every reviewer score every candidate, and
 * optimize the best one with the feedback it received.
 */
export class CandidateRound {
  private generator: Generator;
  private writers: Identity[];
  private reviewers: Identity[];
  private count: number;
  private log: Logger;
  private parser: ResponseParser;

  constructor(generator: Generator, writers: Identity[], reviewers: Identity[], count: number, logger: Logger = rootLogger) {
    if (writers.length === 0 || reviewers.length === 0) {
      throw new ConfigurationError("CandidateRound needs at least one writer and one reviewer identity");
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new ConfigurationError(`Candidate count must be a positive integer, got ${count}`);
    }
    this.generator = generator;
    this.writers = [...writers];
    this.reviewers = [...reviewers];
    this.count = count;
    this.log = logger;
    this.parser = new ResponseParser(logger);
  }

  candidateIds(): number[] {
    return Array.from({ length: this.count }, (_v, idx) => idx + 1);
  }

  async generate(prompts: CandidatePrompts): Promise<void> {
    for (const candidateId of this.candidateIds()) {
      const writer = this.writers[(candidateId - 1) % this.writers.length] ?? null;
      const name = prompts.candidateName(candidateId);
      this.log.info({ candidate: candidateId, of: this.count, name, writer: identityLabel(writer) }, "generating candidate");
      await this.generator.submit(prompts.generatePrompt(candidateId), writer);
    }
  }

  /** Reviewer-major order: each reviewer scores every candidate before the next reviewer starts. */
  async score(prompts: CandidatePrompts): Promise<ScoreBoard> {
    const board = new ScoreBoard(this.candidateIds());
    const totalCalls = this.reviewers.length * this.count;
    let call = 0;

    for (const reviewer of this.reviewers) {
      const label = identityLabel(reviewer);
      for (const candidateId of this.candidateIds()) {
        call += 1;
        const reply = await this.generator.submit(prompts.scorePrompt(candidateId), reviewer);
        const verdict = this.parser.parse(reply);
        board.record(candidateId, label, verdict);
        this.log.info(
          { call, totalCalls, reviewer: label, name: prompts.candidateName(candidateId), score: verdict.score, issues: verdict.issues.length },
          "candidate scored",
        );
      }
    }
    return board;
  }

  async optimize(prompts: CandidatePrompts, board: ScoreBoard): Promise<CandidateRoundResult> {
    const scores = board.all();
    for (const entry of scores) {
      this.log.info(
        { name: prompts.candidateName(entry.candidateId), totalScore: entry.totalScore, issueCount: entry.issueCount },
        "candidate total",
      );
    }

    const best = board.best();
    const bestName = prompts.candidateName(best.candidateId);
    this.log.info({ name: bestName, totalScore: best.totalScore, issueCount: best.issueCount }, "best candidate selected");

    const feedback = mergeLabeledFeedback(best.contributingVerdicts) || NO_SUGGESTIONS;
    const writer = this.writers[0] ?? null;
    await this.generator.submit(prompts.optimizePrompt(best, feedback), writer);

    return { scores, best, bestName, feedback };
  }

  async run(prompts: CandidatePrompts): Promise<CandidateRoundResult> {
    await this.generate(prompts);
    const board = await this.score(prompts);
    return this.optimize(prompts, board);
  }
}
