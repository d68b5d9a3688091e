import { clamp01, roundTo2 } from "../utils";
import type { RunState } from "./types";

export interface ConfidenceFactors {
  base: number;
  querySucceeded: boolean;
  evidenceRetrieved: boolean;
  repairAttempts: number;
}

export interface ConfidenceComputationResult {
  score: number;
  factors: ConfidenceFactors;
}

const BASE_CONFIDENCE = 0.5;
const QUERY_SUCCESS_BONUS = 0.3;
const EVIDENCE_BONUS = 0.2;
const REPAIR_PENALTY = 0.1;

/**
 * Additive heuristic kept for compatibility with earlier outputs. It is a
 * ranking signal, not a calibrated probability.
 */
export function computeConfidenceScore(
  state: Pick<RunState, "queryResult" | "snippets" | "repairCount">
): ConfidenceComputationResult {
  const querySucceeded = state.queryResult?.success === true && state.queryResult.rowCount > 0;
  const evidenceRetrieved = state.snippets.length > 0;

  let score = BASE_CONFIDENCE;
  if (querySucceeded) {
    score += QUERY_SUCCESS_BONUS;
  }
  if (evidenceRetrieved) {
    score += EVIDENCE_BONUS;
  }
  score -= REPAIR_PENALTY * state.repairCount;

  return {
    score: roundTo2(clamp01(score)),
    factors: {
      base: BASE_CONFIDENCE,
      querySucceeded,
      evidenceRetrieved,
      repairAttempts: state.repairCount
    }
  } satisfies ConfidenceComputationResult;
}
