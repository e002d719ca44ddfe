/**
 * Cross-configuration comparison and ranking
 */

import type { ExperimentComparison, ExperimentSummary } from './types.js';

export function buildComparison(options: {
  runId: string;
  dataset: string;
  datasetVersion?: number;
  sampleIds: string[];
  summaries: readonly ExperimentSummary[];
}): ExperimentComparison {
  const configurations: Record<string, ExperimentSummary> = {};
  for (const summary of options.summaries) {
    configurations[summary.configurationId] = summary;
  }

  return {
    runId: options.runId,
    dataset: options.dataset,
    ...(options.datasetVersion !== undefined ? { datasetVersion: options.datasetVersion } : {}),
    sampleIds: options.sampleIds,
    configurations,
  };
}

/**
 * Value of a metric for one summary: a summary evaluator name
 * (e.g. overall_accuracy) or a per-record evaluator name (its aggregate)
 */
export function metricValue(summary: ExperimentSummary, metric: string): number | undefined {
  if (Object.hasOwn(summary.metrics, metric)) {
    return summary.metrics[metric];
  }
  return summary.evaluators[metric]?.value;
}

export interface RankedConfiguration {
  rank: number;
  configurationId: string;
  value: number;
}

/**
 * Order configurations by a metric. Configurations without the metric are
 * left out; ties keep configuration id order.
 */
export function rankConfigurations(
  comparison: ExperimentComparison,
  metric: string,
  order: 'desc' | 'asc' = 'desc'
): RankedConfiguration[] {
  const direction = order === 'desc' ? -1 : 1;

  return Object.values(comparison.configurations)
    .flatMap(summary => {
      const value = metricValue(summary, metric);
      return value === undefined ? [] : [{ configurationId: summary.configurationId, value }];
    })
    .sort((a, b) => (a.value - b.value) * direction || a.configurationId.localeCompare(b.configurationId))
    .map((entry, index) => ({ rank: index + 1, ...entry }));
}

/**
 * Plain-text table of the comparison, one row per configuration
 */
export function formatComparisonTable(comparison: ExperimentComparison, metrics: readonly string[]): string {
  const header = ['configuration', 'status', 'ok', 'failed', ...metrics];
  const rows = Object.values(comparison.configurations).map(summary => [
    summary.configurationId,
    summary.status,
    String(summary.successfulRecords),
    String(summary.failedRecords),
    ...metrics.map(metric => {
      const value = metricValue(summary, metric);
      return value === undefined ? '-' : value.toFixed(3);
    }),
  ]);

  const widths = header.map((cell, i) => Math.max(cell.length, ...rows.map(row => row[i].length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [line(header), line(widths.map(width => '-'.repeat(width))), ...rows.map(line)].join('\n');
}
