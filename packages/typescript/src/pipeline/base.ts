import type { DocumentWorkspace } from "../documents/workspace.ts";
import { ConfigurationError } from "../errors.ts";
import type { Generator, Identity } from "../llm/client.ts";
import { TracingGenerator } from "../llm/tracing.ts";
import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";

export type PipelineSettings = {
  /** Candidate documents generated before selecting the best one. */
  candidates: number;
  /** Fixed number of interface alignment rounds. */
  alignRounds: number;
  /** Review+optimize rounds a refinement loop may afford. */
  refinementFactor: number;
};

export const DEFAULT_SETTINGS: PipelineSettings = {
  candidates: 5,
  alignRounds: 5,
  refinementFactor: 5,
};

export type PipelineOptions = {
  workspace: DocumentWorkspace;
  generator: Generator;
  writers: Identity[];
  reviewers: Identity[];
  settings?: Partial<PipelineSettings>;
  logger?: Logger;
};

export class PipelineBase {
  protected workspace: DocumentWorkspace;
  protected generator: TracingGenerator;
  protected writers: Identity[];
  protected reviewers: Identity[];
  protected settings: PipelineSettings;
  protected log: Logger;

  constructor(options: PipelineOptions) {
    if (options.writers.length === 0) {
      throw new ConfigurationError("At least one writer identity is required");
    }
    if (options.reviewers.length === 0) {
      throw new ConfigurationError("At least one reviewer identity is required");
    }
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    if (!Number.isInteger(this.settings.candidates) || this.settings.candidates < 1) {
      throw new ConfigurationError(`candidates must be a positive integer, got ${this.settings.candidates}`);
    }
    this.workspace = options.workspace;
    this.writers = [...options.writers];
    this.reviewers = [...options.reviewers];
    this.log = options.logger ?? rootLogger;
    this.generator =
      options.generator instanceof TracingGenerator ? options.generator : new TracingGenerator(options.generator, this.log);
  }

  protected writerFor(index: number): Identity {
    return this.writers[(index - 1) % this.writers.length] ?? null;
  }

  protected get primaryWriter(): Identity {
    return this.writers[0] ?? null;
  }

  protected get primaryReviewer(): Identity {
    return this.reviewers[0] ?? null;
  }

  protected step(name: string): void {
    this.log.info({ step: name }, "step started");
    this.generator.withStep(name);
  }

  get callCount(): number {
    return this.generator.calls.length;
  }
}
