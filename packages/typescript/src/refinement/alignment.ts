import { ConfigurationError } from "../errors.ts";
import { identityLabel } from "../llm/client.ts";
import type { Generator, Identity } from "../llm/client.ts";
import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";
import { tail } from "../utils.ts";

export const ROUND_SUMMARY_MARKER = "[ROUND SUMMARY]";
export const SUMMARY_FALLBACK_CHARS = 500;

// A line holding nothing but an `[UPPER CASE]` marker closes the summary block.
const MARKER_LINE = /^\s*\[[A-Z][A-Z ]+\]\s*$/;

export type RoundSummary = {
  text: string;
  source: "marker" | "tail" | "none";
};

/**
 * Best-effort extraction of the change summary a writer appends to its reply.
 * Looks for a non-empty marker block first, then keeps the tail of the reply.
 */
export function extractRoundSummary(reply: string | null): RoundSummary {
  if (!reply) {
    return { text: "", source: "none" };
  }
  const start = reply.indexOf(ROUND_SUMMARY_MARKER);
  if (start >= 0) {
    const lines = reply.slice(start + ROUND_SUMMARY_MARKER.length).split(/\r?\n/);
    // Line 0 is the remainder of the marker line itself.
    const end = lines.findIndex((line, idx) => idx > 0 && MARKER_LINE.test(line));
    const text = (end < 0 ? lines : lines.slice(0, end)).join("\n").trim();
    if (text) {
      return { text, source: "marker" };
    }
  }
  return { text: tail(reply, SUMMARY_FALLBACK_CHARS), source: "tail" };
}

export type AlignmentRound = {
  round: number;
  totalRounds: number;
  /** Instruction block built from the previous round's summary; empty on the first round. */
  priorChanges: string;
};

export interface AlignmentArtifacts {
  alignmentPrompt(round: AlignmentRound): Promise<string>;
}

export function priorChangesBlock(round: number, summary: string): string {
  if (!summary) {
    return "";
  }
  return (
    `## Changes already made in round ${round - 1}\n\n` +
    "Continue from these changes. Do not redo any of these items and do not revert " +
    "interface definitions that were already aligned:\n\n" +
    `${summary}\n`
  );
}

export class AlignmentPropagator {
  private writers: Identity[];
  private generator: Generator;
  private rounds: number;
  private log: Logger;

  constructor(writers: Identity[], generator: Generator, rounds = 5, logger: Logger = rootLogger) {
    if (writers.length === 0) {
      throw new ConfigurationError("AlignmentPropagator needs at least one writer identity");
    }
    this.writers = [...writers];
    this.generator = generator;
    this.rounds = rounds;
    this.log = logger;
  }

  writerFor(round: number): Identity {
    return this.writers[(round - 1) % this.writers.length] ?? null;
  }

  /** Runs every round, carrying only the latest summary forward, and returns the last one. */
  async run(artifacts: AlignmentArtifacts, roundCount = this.rounds): Promise<string> {
    if (!Number.isInteger(roundCount) || roundCount < 0) {
      throw new ConfigurationError(`roundCount must be a non-negative integer, got ${roundCount}`);
    }

    let summary = "";
    for (let round = 1; round <= roundCount; round += 1) {
      const writer = this.writerFor(round);
      this.log.info({ round, roundCount, writer: identityLabel(writer) }, "alignment round started");

      const prompt = await artifacts.alignmentPrompt({
        round,
        totalRounds: roundCount,
        priorChanges: priorChangesBlock(round, summary),
      });
      const reply = await this.generator.submit(prompt, writer);
      const extracted = extractRoundSummary(reply);
      if (extracted.source !== "marker") {
        this.log.warn({ round, source: extracted.source }, "reply had no round summary block, using fallback");
      }
      summary = extracted.text;
      this.log.info({ round, summary: summary.slice(0, 100) }, "alignment round finished");
    }
    return summary;
  }
}
