/**
 * Test file for the streaming summary accumulator and summary evaluators
 */
import { describe, it, expect } from 'vitest';
import { SummaryAccumulator } from '../SummaryAccumulator.js';
import { createDefaultSummaryEvaluators, overallAccuracy } from '../summaryEvaluators.js';
import type { EvaluationResult } from '../../evaluation/types.js';
import type { ResolvedConfiguration } from '../types.js';

const configuration: ResolvedConfiguration = { id: 'cfg-a', modelKey: 'gemini-fast', temperature: 0, metadata: {} };

function results(scores: {
  exact: boolean;
  ballot: number;
  vote: [string, number];
  judge?: number;
  noErrors: boolean;
}): EvaluationResult[] {
  const list: EvaluationResult[] = [
    { evaluator: 'exact_form_match', kind: 'boolean', value: scores.exact, score: scores.exact ? 1 : 0 },
    { evaluator: 'ballot_accuracy_score', kind: 'numeric', value: scores.ballot, score: scores.ballot },
    { evaluator: 'vote_results_quality', kind: 'categorical', value: scores.vote[0], score: scores.vote[1] },
    { evaluator: 'has_no_errors', kind: 'boolean', value: scores.noErrors, score: scores.noErrors ? 1 : 0 },
  ];
  if (scores.judge !== undefined) {
    list.push({ evaluator: 'llm_judge', kind: 'numeric', value: scores.judge, score: scores.judge });
  }
  return list;
}

const good = results({ exact: true, ballot: 0.8, vote: ['good', 0.9], judge: 0.7, noErrors: true });
const poor = results({ exact: false, ballot: 0.4, vote: ['poor', 0.2], judge: 0.3, noErrors: false });

describe('SummaryAccumulator', () => {
  it('averages evaluators over successful records only', () => {
    const accumulator = new SummaryAccumulator(configuration, 4, createDefaultSummaryEvaluators());
    accumulator.recordSuccess(good);
    accumulator.recordFailure();
    accumulator.recordSuccess(poor);

    const summary = accumulator.finalize({ status: 'completed', durationMs: 1200 });

    expect(summary).toMatchObject({
      configurationId: 'cfg-a',
      modelKey: 'gemini-fast',
      temperature: 0,
      status: 'completed',
      totalRecords: 4,
      successfulRecords: 2,
      failedRecords: 1,
      skippedRecords: 1,
      durationMs: 1200,
    });
    expect(summary.evaluators.exact_form_match).toEqual({
      evaluator: 'exact_form_match',
      kind: 'boolean',
      count: 2,
      value: 0.5,
    });
    expect(summary.evaluators.ballot_accuracy_score.value).toBe(0.6);
    expect(summary.evaluators.vote_results_quality).toEqual({
      evaluator: 'vote_results_quality',
      kind: 'categorical',
      count: 2,
      value: 0.55,
      distribution: { good: 1, poor: 1 },
    });
    expect(summary.metrics).toEqual({
      overall_accuracy: 0.54,
      success_rate: 0.5,
      avg_ballot_accuracy: 0.6,
      avg_llm_judge_score: 0.5,
    });
  });

  it('gives the same summary whatever order records complete in', () => {
    const forward = new SummaryAccumulator(configuration, 2, createDefaultSummaryEvaluators());
    forward.recordSuccess(good);
    forward.recordSuccess(poor);
    const backward = new SummaryAccumulator(configuration, 2, createDefaultSummaryEvaluators());
    backward.recordSuccess(poor);
    backward.recordSuccess(good);

    expect(backward.finalize({ status: 'completed', durationMs: 0 })).toEqual(
      forward.finalize({ status: 'completed', durationMs: 0 })
    );
  });

  it('reports zeros and an error for a configuration with no successes', () => {
    const accumulator = new SummaryAccumulator(configuration, 3, createDefaultSummaryEvaluators());
    accumulator.recordFailure();

    const summary = accumulator.finalize({ status: 'failed', error: 'Run cancelled', durationMs: 5 });

    expect(summary.error).toBe('Run cancelled');
    expect(summary.evaluators).toEqual({});
    expect(summary.metrics.overall_accuracy).toBe(0);
    expect(summary.skippedRecords).toBe(2);
    expect(Object.isFrozen(summary)).toBe(true);
  });

  it('leaves records without a judge out of the judge average', () => {
    const accumulator = new SummaryAccumulator(configuration, 2, createDefaultSummaryEvaluators());
    accumulator.recordSuccess(good);
    accumulator.recordSuccess(results({ exact: true, ballot: 1, vote: ['excellent', 1], noErrors: true }));

    const summary = accumulator.finalize({ status: 'completed', durationMs: 0 });

    expect(summary.metrics.avg_llm_judge_score).toBe(0.7);
    expect(summary.evaluators.llm_judge.count).toBe(1);
  });
});

describe('overallAccuracy', () => {
  it('weights exact match, ballots, votes and judge', () => {
    expect(overallAccuracy.compute(good)).toBeCloseTo(0.83);
  });

  it('counts a missing judge as 0', () => {
    const withoutJudge = results({ exact: true, ballot: 1, vote: ['excellent', 1], noErrors: true });

    expect(overallAccuracy.compute(withoutJudge)).toBeCloseTo(0.7);
  });
});
