import type { LabeledVerdict, ReviewerLabel, Verdict } from "../verdicts/base.ts";

export type CandidateScore = {
  candidateId: number;
  totalScore: number;
  issueCount: number;
  contributingVerdicts: LabeledVerdict[];
};

function outranks(a: CandidateScore, b: CandidateScore): boolean {
  if (a.totalScore !== b.totalScore) {
    return a.totalScore > b.totalScore;
  }
  if (a.issueCount !== b.issueCount) {
    return a.issueCount < b.issueCount;
  }
  return a.candidateId < b.candidateId;
}

/**
 * Picks the candidate with the highest total score, then the fewest issues,
 * then the lowest candidate id.
 */
export function selectBest(scores: ReadonlyMap<number, CandidateScore>): number {
  let best: CandidateScore | null = null;
  for (const score of scores.values()) {
    if (best === null || outranks(score, best)) {
      best = score;
    }
  }
  if (best === null) {
    throw new Error("selectBest needs at least one candidate");
  }
  return best.candidateId;
}

/** Accumulates one review round of candidate scores. */
export class ScoreBoard {
  private scores = new Map<number, CandidateScore>();

  constructor(candidateIds: readonly number[]) {
    for (const candidateId of candidateIds) {
      this.scores.set(candidateId, { candidateId, totalScore: 0, issueCount: 0, contributingVerdicts: [] });
    }
  }

  record(candidateId: number, label: ReviewerLabel, verdict: Verdict): CandidateScore {
    const entry = this.scores.get(candidateId);
    if (!entry) {
      throw new Error(`Unknown candidate ${candidateId}`);
    }
    entry.totalScore += verdict.score;
    entry.issueCount += verdict.issues.length;
    if (!verdict.satisfied || verdict.suggestions) {
      entry.contributingVerdicts.push({ label, verdict });
    }
    return entry;
  }

  get(candidateId: number): CandidateScore | undefined {
    return this.scores.get(candidateId);
  }

  all(): CandidateScore[] {
    return [...this.scores.values()];
  }

  best(): CandidateScore {
    const candidateId = selectBest(this.scores);
    const entry = this.scores.get(candidateId);
    if (!entry) {
      throw new Error(`Unknown candidate ${candidateId}`);
    }
    return entry;
  }
}
