export type Verdict = {
  satisfied: boolean;
  issues: string[];
  suggestions: string;
  score: number;
};

/** Display name of the reviewer identity that produced a verdict. Attribution only. */
export type ReviewerLabel = string;

export type LabeledVerdict = {
  label: ReviewerLabel;
  verdict: Verdict;
};

export type ParsedVerdict = {
  kind: "parsed";
  source: "structured" | "pattern";
  verdict: Verdict;
};

export type ParseFailure = {
  kind: "failure";
  reason: string;
};

export type VerdictParse = ParsedVerdict | ParseFailure;

export function emptyVerdict(): Verdict {
  return { satisfied: false, issues: [], suggestions: "", score: 0 };
}

/** A verdict only counts as satisfied when it lists no issues. */
export function isSettled(verdict: Verdict): boolean {
  return verdict.satisfied && verdict.issues.length === 0;
}
