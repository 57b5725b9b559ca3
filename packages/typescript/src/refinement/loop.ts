import { ConfigurationError } from "../errors.ts";
import { isConverged } from "../judges/convergence.ts";
import { mergeFeedback } from "../judges/feedback.ts";
import { identityLabel } from "../llm/client.ts";
import type { Generator, Identity } from "../llm/client.ts";
import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";
import type { ReviewerLabel, Verdict } from "../verdicts/base.ts";
import { ResponseParser } from "../verdicts/parser.ts";

export const LoopState = {
  REVIEWING: "reviewing",
  CONVERGED: "converged",
  BUDGET_EXHAUSTED: "budget_exhausted",
  NO_FEEDBACK: "no_feedback",
} as const;

export type LoopState = (typeof LoopState)[keyof typeof LoopState];

export type TerminalState = Exclude<LoopState, typeof LoopState.REVIEWING>;

/**
 * The document (or document set) under refinement. Prompts are rendered on
 * demand so that every round sees what the previous optimize call wrote.
 */
export interface RefinementArtifact {
  name: string;
  reviewPrompt(): Promise<string>;
  optimizePrompt(feedback: string): Promise<string>;
}

export type RefinementState = {
  callsUsed: number;
  callBudget: number;
  lastVerdicts: Verdict[];
  converged: boolean;
};

export type RefinementOutcome = {
  artifact: string;
  state: TerminalState;
  verdicts: Verdict[];
  labels: ReviewerLabel[];
  callsUsed: number;
  callBudget: number;
  rounds: number;
  optimizeCalls: number;
};

/** Each round costs one call per reviewer plus the optimize call. */
export function callBudgetFor(reviewerCount: number, refinementFactor: number): number {
  return (reviewerCount + 1) * refinementFactor;
}

export class RefinementConfig {
  refinementFactor: number;

  constructor(options: Partial<RefinementConfig> = {}) {
    this.refinementFactor = options.refinementFactor ?? 5;
  }
}

export class RefinementLoop {
  private reviewers: Identity[];
  private writer: Identity;
  private generator: Generator;
  private config: RefinementConfig;
  private log: Logger;
  private parser: ResponseParser;

  constructor(
    reviewers: Identity[],
    writer: Identity,
    generator: Generator,
    config = new RefinementConfig(),
    logger: Logger = rootLogger,
  ) {
    if (reviewers.length === 0) {
      throw new ConfigurationError("RefinementLoop needs at least one reviewer identity");
    }
    if (!Number.isInteger(config.refinementFactor) || config.refinementFactor < 0) {
      throw new ConfigurationError(`refinementFactor must be a non-negative integer, got ${config.refinementFactor}`);
    }
    this.reviewers = [...reviewers];
    this.writer = writer;
    this.generator = generator;
    this.config = config;
    this.log = logger;
    this.parser = new ResponseParser(logger);
  }

  get defaultCallBudget(): number {
    return callBudgetFor(this.reviewers.length, this.config.refinementFactor);
  }

  async run(artifact: RefinementArtifact, callBudget = this.defaultCallBudget): Promise<RefinementOutcome> {
    if (!Number.isInteger(callBudget) || callBudget < 0) {
      throw new ConfigurationError(`callBudget must be a non-negative integer, got ${callBudget}`);
    }

    const log = this.log.child({ artifact: artifact.name });
    const state: RefinementState = { callsUsed: 0, callBudget, lastVerdicts: [], converged: false };
    let labels: ReviewerLabel[] = [];
    let current: LoopState = LoopState.REVIEWING;
    let rounds = 0;
    let optimizeCalls = 0;

    log.info({ reviewers: this.reviewers.map(identityLabel), callBudget }, "refinement started");

    while (current === LoopState.REVIEWING) {
      if (state.callsUsed >= state.callBudget) {
        current = LoopState.BUDGET_EXHAUSTED;
        break;
      }

      rounds += 1;
      const collected = await this.collectVerdicts(artifact, state, log);
      state.lastVerdicts = collected.verdicts;
      labels = collected.labels;

      if (isConverged(state.lastVerdicts)) {
        state.converged = true;
        current = LoopState.CONVERGED;
        break;
      }

      const feedback = mergeFeedback(state.lastVerdicts, labels);
      if (!feedback) {
        current = LoopState.NO_FEEDBACK;
        break;
      }

      if (state.callsUsed >= state.callBudget) {
        current = LoopState.BUDGET_EXHAUSTED;
        break;
      }

      state.callsUsed += 1;
      optimizeCalls += 1;
      log.info({ call: state.callsUsed, callBudget, writer: identityLabel(this.writer) }, "optimizing");
      const reply = await this.generator.submit(await artifact.optimizePrompt(feedback), this.writer);
      if (reply === null) {
        log.warn({ call: state.callsUsed }, "optimize call returned nothing, reviewing the unchanged artifact");
      }
    }

    const outcome: RefinementOutcome = {
      artifact: artifact.name,
      state: current,
      verdicts: state.lastVerdicts,
      labels,
      callsUsed: state.callsUsed,
      callBudget,
      rounds,
      optimizeCalls,
    };
    this.report(outcome, log);
    return outcome;
  }

  private async collectVerdicts(
    artifact: RefinementArtifact,
    state: RefinementState,
    log: Logger,
  ): Promise<{ verdicts: Verdict[]; labels: ReviewerLabel[] }> {
    const verdicts: Verdict[] = [];
    const labels: ReviewerLabel[] = [];
    const prompt = await artifact.reviewPrompt();

    for (const reviewer of this.reviewers) {
      if (state.callsUsed >= state.callBudget) {
        log.warn({ collected: verdicts.length, reviewers: this.reviewers.length }, "budget ran out mid-review");
        break;
      }
      state.callsUsed += 1;
      const label = identityLabel(reviewer);
      const reply = await this.generator.submit(prompt, reviewer);
      const verdict = this.parser.parse(reply);
      verdicts.push(verdict);
      labels.push(label);
      log.info(
        {
          call: state.callsUsed,
          callBudget: state.callBudget,
          reviewer: label,
          satisfied: verdict.satisfied,
          issues: verdict.issues.length,
          score: verdict.score,
        },
        "review collected",
      );
    }

    return { verdicts, labels };
  }

  private report(outcome: RefinementOutcome, log: Logger): void {
    const details = { rounds: outcome.rounds, callsUsed: outcome.callsUsed, callBudget: outcome.callBudget };
    switch (outcome.state) {
      case LoopState.CONVERGED:
        log.info(details, "every reviewer is satisfied");
        break;
      case LoopState.NO_FEEDBACK:
        log.info(details, "reviewers left no actionable feedback");
        break;
      case LoopState.BUDGET_EXHAUSTED:
        log.warn(details, "call budget exhausted before convergence");
        break;
    }
  }
}
