import { isSettled } from "../verdicts/base.ts";
import type { Verdict } from "../verdicts/base.ts";

/**
 * True when no verdict reports outstanding issues. An empty set converges
 * vacuously, so callers must check that at least one verdict was collected.
 */
export function isConverged(verdicts: readonly Verdict[]): boolean {
  return verdicts.every(isSettled);
}
