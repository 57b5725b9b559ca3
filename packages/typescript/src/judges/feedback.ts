import { isSettled } from "../verdicts/base.ts";
import type { LabeledVerdict, ReviewerLabel, Verdict } from "../verdicts/base.ts";

/**
 * Merges reviewer verdicts into one feedback text, in input order.
 * Settled verdicts are skipped; an empty result means there is nothing to act on.
 */
export function mergeFeedback(verdicts: readonly Verdict[], labels: readonly ReviewerLabel[]): string {
  if (verdicts.length !== labels.length) {
    throw new Error(
      `mergeFeedback needs one label per verdict (got ${verdicts.length} verdicts and ${labels.length} labels)`,
    );
  }

  const parts: string[] = [];
  verdicts.forEach((verdict, idx) => {
    if (isSettled(verdict)) {
      return;
    }
    const label = labels[idx];
    if (verdict.issues.length > 0) {
      const lines = verdict.issues.map((issue) => `  - ${issue}`).join("\n");
      parts.push(`[${label}] Issues:\n${lines}`);
    }
    if (verdict.suggestions) {
      parts.push(`[${label}] Suggestions: ${verdict.suggestions}`);
    }
  });

  return parts.join("\n\n");
}

export function mergeLabeledFeedback(entries: readonly LabeledVerdict[]): string {
  return mergeFeedback(
    entries.map((entry) => entry.verdict),
    entries.map((entry) => entry.label),
  );
}
