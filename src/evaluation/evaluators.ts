/**
 * Per-record evaluators
 *
 * Each scores one (output, expected) pair on a single dimension and is
 * independent of the others. `runEvaluators` isolates them so one throwing
 * evaluator cannot stop the rest.
 */

import type { BallotStatistics, ConsolidatedForm } from '../types/forms.js';
import type {
  EvaluationResult,
  EvaluationValue,
  Evaluator,
  EvaluatorKind,
  ExtractionInput,
  ExtractionOutput,
} from './types.js';
import { deepEqual, toComparable } from './normalize.js';
import { logger } from '../utils/logger.js';

export const EVALUATOR_NAMES = {
  exactMatch: 'exact_form_match',
  ballotAccuracy: 'ballot_accuracy_score',
  voteQuality: 'vote_results_quality',
  noErrors: 'has_no_errors',
  judge: 'llm_judge',
} as const;

/** Ballot fields compared by the ballot accuracy score */
export const SCORED_BALLOT_FIELDS = [
  'ballotsAllocated',
  'ballotsUsed',
  'validBallots',
  'voidBallots',
  'noVoteBallots',
] as const satisfies readonly (keyof BallotStatistics)[];

export type VoteQualityLabel = 'excellent' | 'good' | 'fair' | 'poor';

export function voteQualityLabel(fraction: number): VoteQualityLabel {
  if (fraction >= 0.95) return 'excellent';
  if (fraction >= 0.8) return 'good';
  if (fraction >= 0.5) return 'fair';
  return 'poor';
}

// ============================================================================
// Scoring functions
// ============================================================================

export function exactFormMatch(
  _input: ExtractionInput,
  output: ExtractionOutput,
  expected: ConsolidatedForm
): EvaluationResult {
  const actual = toComparable(output.form);
  const target = toComparable(expected);
  const sections = ['formInfo', 'voterStatistics', 'ballotStatistics', 'voteRows'] as const;
  const differing = sections.filter(section => !deepEqual(actual[section], target[section]));
  const matched = differing.length === 0;

  return {
    evaluator: EVALUATOR_NAMES.exactMatch,
    kind: 'boolean',
    value: matched,
    score: matched ? 1 : 0,
    reason: matched ? 'Forms match' : `Differs in: ${differing.join(', ')}`,
  };
}

export function ballotAccuracyScore(
  _input: ExtractionInput,
  output: ExtractionOutput,
  expected: ConsolidatedForm
): EvaluationResult {
  const actual = output.form.ballotStatistics;
  const extractedAny = SCORED_BALLOT_FIELDS.some(field => actual[field] !== null);

  if (!extractedAny) {
    return {
      evaluator: EVALUATOR_NAMES.ballotAccuracy,
      kind: 'numeric',
      value: 0,
      score: 0,
      reason: 'No ballot statistics extracted',
    };
  }

  const mismatched = SCORED_BALLOT_FIELDS.filter(field => actual[field] !== expected.ballotStatistics[field]);
  const ratio = (SCORED_BALLOT_FIELDS.length - mismatched.length) / SCORED_BALLOT_FIELDS.length;

  return {
    evaluator: EVALUATOR_NAMES.ballotAccuracy,
    kind: 'numeric',
    value: ratio,
    score: ratio,
    reason: mismatched.length === 0 ? 'All ballot fields match' : `Mismatched: ${mismatched.join(', ')}`,
  };
}

export function voteResultsQuality(
  _input: ExtractionInput,
  output: ExtractionOutput,
  expected: ConsolidatedForm
): EvaluationResult {
  const expectedRows = expected.voteRows;
  const outputCounts = new Map(output.form.voteRows.map(row => [row.number, row.voteCount]));

  let fraction = 0;
  if (expectedRows.length > 0 && outputCounts.size > 0) {
    const matches = expectedRows.filter(
      row => outputCounts.has(row.number) && outputCounts.get(row.number) === row.voteCount
    ).length;
    fraction = matches / expectedRows.length;
  }

  const label = voteQualityLabel(fraction);
  return {
    evaluator: EVALUATOR_NAMES.voteQuality,
    kind: 'categorical',
    value: label,
    score: fraction,
    reason: `${Math.round(fraction * 100)}% of vote counts match`,
  };
}

export function hasNoErrors(
  _input: ExtractionInput,
  output: ExtractionOutput,
  _expected: ConsolidatedForm
): EvaluationResult {
  const validationPassed = output.form.validation?.passed === true;
  const ok = output.pageErrors.length === 0 && validationPassed;

  let reason = 'No page errors and all checks passed';
  if (output.pageErrors.length > 0) {
    reason = `${output.pageErrors.length} page error(s)`;
  } else if (!validationPassed) {
    reason = output.form.validation ? `Validation failed: ${output.form.validation.score.toFixed(2)}` : 'Not validated';
  }

  return {
    evaluator: EVALUATOR_NAMES.noErrors,
    kind: 'boolean',
    value: ok,
    score: ok ? 1 : 0,
    reason,
  };
}

// ============================================================================
// Evaluator objects
// ============================================================================

type ScoringFunction = (
  input: ExtractionInput,
  output: ExtractionOutput,
  expected: ConsolidatedForm
) => EvaluationResult;

export function defineEvaluator(name: string, kind: EvaluatorKind, evaluate: ScoringFunction): Evaluator {
  return { name, kind, evaluate };
}

export function createDefaultEvaluators(): Evaluator[] {
  return [
    defineEvaluator(EVALUATOR_NAMES.exactMatch, 'boolean', exactFormMatch),
    defineEvaluator(EVALUATOR_NAMES.ballotAccuracy, 'numeric', ballotAccuracyScore),
    defineEvaluator(EVALUATOR_NAMES.voteQuality, 'categorical', voteResultsQuality),
    defineEvaluator(EVALUATOR_NAMES.noErrors, 'boolean', hasNoErrors),
  ];
}

function placeholderValue(kind: EvaluatorKind): EvaluationValue {
  switch (kind) {
    case 'boolean':
      return false;
    case 'numeric':
      return 0;
    case 'categorical':
      return 'error';
  }
}

/**
 * Run every evaluator on one record. An evaluator that throws (or rejects)
 * yields a failing result with score 0 and the error message as reason.
 */
export async function runEvaluators(
  evaluators: readonly Evaluator[],
  input: ExtractionInput,
  output: ExtractionOutput,
  expected: ConsolidatedForm
): Promise<EvaluationResult[]> {
  return Promise.all(
    evaluators.map(async (evaluator): Promise<EvaluationResult> => {
      try {
        return await evaluator.evaluate(input, output, expected);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Evaluator ${evaluator.name} failed for ${input.formSetName}`, error);
        return {
          evaluator: evaluator.name,
          kind: evaluator.kind,
          value: placeholderValue(evaluator.kind),
          score: 0,
          reason: message,
          failed: true,
        };
      }
    })
  );
}
