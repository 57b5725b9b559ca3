import { z } from "zod";

import rootLogger from "../logger.ts";
import type { Logger } from "../logger.ts";
import { head, normalizeQuotes, outermostObjectSpan, safeJsonObject } from "../utils.ts";
import { emptyVerdict } from "./base.ts";
import type { Verdict, VerdictParse } from "./base.ts";

export const FALLBACK_SUGGESTION_CHARS = 800;

const SCORE_PATTERN = /"score"\s*:\s*"?(\d+)"?/;
const SATISFIED_PATTERN = /"satisfied"\s*:\s*(true|false)/i;

// Every field degrades to undefined on a wrong type instead of failing the object.
const ReviewPayloadSchema = z
  .object({
    satisfied: z.union([z.boolean(), z.string()]).optional().catch(undefined),
    issues: z.union([z.array(z.unknown()), z.string()]).optional().catch(undefined),
    suggestions: z.string().optional().catch(undefined),
    score: z.union([z.number(), z.string()]).optional().catch(undefined),
  })
  .passthrough();

function coerceScore(value: number | string | undefined): number {
  if (value === undefined) {
    return 0;
  }
  const text = String(value).trim();
  return /^\d+$/.test(text) ? Number.parseInt(text, 10) : 0;
}

function coerceIssues(value: unknown[] | string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return value.trim() ? [value] : [];
  }
  return value.map((item) => (typeof item === "string" ? item : JSON.stringify(item)));
}

function coerceSatisfied(value: boolean | string | undefined): boolean {
  if (typeof value === "string") {
    return value.trim().toLowerCase() === "true";
  }
  return value === true;
}

function decodeSpan(span: string): Record<string, unknown> | null {
  return safeJsonObject(span) ?? safeJsonObject(normalizeQuotes(span));
}

/**
 * Extracts a verdict from a reviewer reply.
 *
 * Structured tier: the outermost `{...}` span decoded as JSON (retried with
 * normalized quotes). Pattern tier: `"score"` and `"satisfied"` searched
 * directly in the text, with the head of the reply kept as suggestions.
 * A reply matching neither tier is a failure.
 */
export function tryParseVerdict(raw: string | null | undefined): VerdictParse {
  if (!raw || !raw.trim()) {
    return { kind: "failure", reason: "empty reply" };
  }

  const span = outermostObjectSpan(raw);
  const decoded = span ? decodeSpan(span) : null;
  if (decoded) {
    const payload = ReviewPayloadSchema.parse(decoded);
    return {
      kind: "parsed",
      source: "structured",
      verdict: {
        satisfied: coerceSatisfied(payload.satisfied),
        issues: coerceIssues(payload.issues),
        suggestions: payload.suggestions ?? "",
        score: coerceScore(payload.score),
      },
    };
  }

  const scoreMatch = SCORE_PATTERN.exec(raw);
  const satisfiedMatch = SATISFIED_PATTERN.exec(raw);
  if (!scoreMatch && !satisfiedMatch) {
    return { kind: "failure", reason: span ? "object span is not valid JSON" : "no object span" };
  }

  return {
    kind: "parsed",
    source: "pattern",
    verdict: {
      satisfied: satisfiedMatch?.[1]?.toLowerCase() === "true",
      issues: [],
      suggestions: head(raw, FALLBACK_SUGGESTION_CHARS),
      score: scoreMatch?.[1] ? Number.parseInt(scoreMatch[1], 10) : 0,
    },
  };
}

export function parseVerdict(raw: string | null | undefined): Verdict {
  const result = tryParseVerdict(raw);
  return result.kind === "parsed" ? result.verdict : emptyVerdict();
}

export class ResponseParser {
  private log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger;
  }

  parse(raw: string | null | undefined): Verdict {
    const result = tryParseVerdict(raw);
    if (result.kind === "failure") {
      this.log.warn({ reason: result.reason }, "review reply unusable, counting it as a zero verdict");
      return emptyVerdict();
    }
    if (result.source === "pattern") {
      this.log.warn(
        { score: result.verdict.score, satisfied: result.verdict.satisfied },
        "review reply was not valid JSON, recovered fields by pattern",
      );
    }
    return result.verdict;
  }
}
