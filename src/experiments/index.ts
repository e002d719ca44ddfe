export * from './types.js';
export { ExperimentRunner, CANCELLED_REASON } from './ExperimentRunner.js';
export type { ExperimentRunnerDependencies } from './ExperimentRunner.js';
export { ExperimentRunManager } from './ExperimentRunManager.js';
export type { ExperimentRunMetadata, ExperimentRunRecord } from './ExperimentRunManager.js';
export { ExperimentError, RecordTaskError } from './ExperimentError.js';
export { FileDatasetStore, DatasetNotFoundError, ConsolidatedFormSchema, DatasetRecordSchema } from './FileDatasetStore.js';
export { LoggerResultSink, HttpResultSink, CompositeResultSink } from './ResultSink.js';
export type { HttpResultSinkOptions } from './ResultSink.js';
export { SummaryAccumulator } from './SummaryAccumulator.js';
export {
  OVERALL_ACCURACY_WEIGHTS,
  avgBallotAccuracy,
  avgLlmJudgeScore,
  createDefaultSummaryEvaluators,
  overallAccuracy,
  successRate,
} from './summaryEvaluators.js';
export type { SummaryEvaluator } from './summaryEvaluators.js';
export { buildComparison, formatComparisonTable, metricValue, rankConfigurations } from './comparison.js';
export type { RankedConfiguration } from './comparison.js';
export { configurationId, resolveConfiguration, resolveConfigurations } from './configuration.js';
export { selectSample } from './sampling.js';
export { createExtractionTask, selectFormForComparison } from './extractionTask.js';
export type { ExtractionTaskOptions } from './extractionTask.js';
