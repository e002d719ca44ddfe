/**
 * Streaming per-configuration aggregate: a running sum and count per
 * evaluator, plus a label histogram for categorical evaluators. Per-record
 * results are not retained.
 */

import type { EvaluationResult, EvaluatorKind } from '../evaluation/types.js';
import type {
  ConfigurationStatus,
  EvaluatorAggregate,
  ExperimentSummary,
  ResolvedConfiguration,
} from './types.js';
import type { SummaryEvaluator } from './summaryEvaluators.js';

interface RunningTotal {
  kind: EvaluatorKind;
  sum: number;
  count: number;
  distribution: Map<string, number> | null;
}

/** Keeps summaries identical whatever order records completed in */
function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export class SummaryAccumulator {
  private readonly configuration: ResolvedConfiguration;
  private readonly totalRecords: number;
  private readonly summaryEvaluators: readonly SummaryEvaluator[];
  private readonly totals = new Map<string, RunningTotal>();
  private readonly metricTotals = new Map<string, { sum: number; count: number }>();
  private successful = 0;
  private failed = 0;

  constructor(
    configuration: ResolvedConfiguration,
    totalRecords: number,
    summaryEvaluators: readonly SummaryEvaluator[] = []
  ) {
    this.configuration = configuration;
    this.totalRecords = totalRecords;
    this.summaryEvaluators = summaryEvaluators;
  }

  get successfulRecords(): number {
    return this.successful;
  }

  get failedRecords(): number {
    return this.failed;
  }

  recordSuccess(results: readonly EvaluationResult[]): void {
    this.successful++;

    for (const result of results) {
      let total = this.totals.get(result.evaluator);
      if (!total) {
        total = {
          kind: result.kind,
          sum: 0,
          count: 0,
          distribution: result.kind === 'categorical' ? new Map<string, number>() : null,
        };
        this.totals.set(result.evaluator, total);
      }
      total.sum += result.score;
      total.count++;
      if (total.distribution && typeof result.value === 'string') {
        total.distribution.set(result.value, (total.distribution.get(result.value) ?? 0) + 1);
      }
    }

    for (const evaluator of this.summaryEvaluators) {
      const value = evaluator.compute(results);
      if (value === null) continue;
      const metric = this.metricTotals.get(evaluator.name) ?? { sum: 0, count: 0 };
      metric.sum += value;
      metric.count++;
      this.metricTotals.set(evaluator.name, metric);
    }
  }

  /**
   * A failed record counts toward failedRecords only; none of its scores
   * enter the aggregates
   */
  recordFailure(): void {
    this.failed++;
  }

  finalize(options: { status: ConfigurationStatus; error?: string; durationMs: number }): ExperimentSummary {
    const evaluators: Record<string, EvaluatorAggregate> = {};
    for (const [name, total] of this.totals) {
      evaluators[name] = {
        evaluator: name,
        kind: total.kind,
        count: total.count,
        value: total.count > 0 ? round(total.sum / total.count) : 0,
        ...(total.distribution ? { distribution: Object.fromEntries(total.distribution) } : {}),
      };
    }

    const metrics: Record<string, number> = {};
    for (const evaluator of this.summaryEvaluators) {
      const metric = this.metricTotals.get(evaluator.name);
      metrics[evaluator.name] = metric && metric.count > 0 ? round(metric.sum / metric.count) : 0;
    }

    return Object.freeze({
      configurationId: this.configuration.id,
      modelKey: this.configuration.modelKey,
      temperature: this.configuration.temperature,
      status: options.status,
      ...(options.error !== undefined ? { error: options.error } : {}),
      totalRecords: this.totalRecords,
      successfulRecords: this.successful,
      failedRecords: this.failed,
      skippedRecords: Math.max(0, this.totalRecords - this.successful - this.failed),
      evaluators,
      metrics,
      durationMs: options.durationMs,
    });
  }
}
