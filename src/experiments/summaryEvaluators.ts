/**
 * Summary evaluators
 *
 * Computed per completed record from its evaluator results and averaged
 * over the configuration by the accumulator. Returning null leaves the
 * record out of that metric.
 */

import type { EvaluationResult } from '../evaluation/types.js';
import { EVALUATOR_NAMES } from '../evaluation/evaluators.js';

export interface SummaryEvaluator {
  readonly name: string;
  compute(results: readonly EvaluationResult[]): number | null;
}

/** Weights of the per-record evaluators in overall_accuracy */
export const OVERALL_ACCURACY_WEIGHTS: Readonly<Record<string, number>> = {
  [EVALUATOR_NAMES.exactMatch]: 0.15,
  [EVALUATOR_NAMES.ballotAccuracy]: 0.25,
  [EVALUATOR_NAMES.voteQuality]: 0.3,
  [EVALUATOR_NAMES.judge]: 0.3,
};

function scoreOf(results: readonly EvaluationResult[], evaluator: string): number | null {
  const result = results.find(r => r.evaluator === evaluator);
  return result ? result.score : null;
}

/**
 * Weighted blend; an evaluator missing from the record contributes 0
 */
export const overallAccuracy: SummaryEvaluator = {
  name: 'overall_accuracy',
  compute(results) {
    let total = 0;
    for (const [evaluator, weight] of Object.entries(OVERALL_ACCURACY_WEIGHTS)) {
      total += (scoreOf(results, evaluator) ?? 0) * weight;
    }
    return total;
  },
};

export const successRate: SummaryEvaluator = {
  name: 'success_rate',
  compute: results => scoreOf(results, EVALUATOR_NAMES.noErrors),
};

export const avgBallotAccuracy: SummaryEvaluator = {
  name: 'avg_ballot_accuracy',
  compute: results => scoreOf(results, EVALUATOR_NAMES.ballotAccuracy),
};

export const avgLlmJudgeScore: SummaryEvaluator = {
  name: 'avg_llm_judge_score',
  compute: results => scoreOf(results, EVALUATOR_NAMES.judge),
};

export function createDefaultSummaryEvaluators(): SummaryEvaluator[] {
  return [overallAccuracy, successRate, avgBallotAccuracy, avgLlmJudgeScore];
}
