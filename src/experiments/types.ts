/**
 * Experiment harness types
 */

import type { ConsolidatedForm } from '../types/forms.js';
import type { EvaluationResult, EvaluatorKind, ExtractionInput, ExtractionOutput } from '../evaluation/types.js';

// ============================================================================
// Datasets
// ============================================================================

export interface DatasetRecord {
  id: string;
  input: ExtractionInput;
  expected: ConsolidatedForm;
}

/**
 * Versioned key-value dataset service. Pulled records are read-only.
 */
export interface DatasetStore {
  pull(name: string, version?: number): Promise<readonly DatasetRecord[]>;
  /** Returns the id of the stored version, e.g. "tally-sheets@v3" */
  push(name: string, records: readonly DatasetRecord[]): Promise<string>;
}

// ============================================================================
// Configurations
// ============================================================================

export interface ModelConfiguration {
  /** Explicit identity; derived from the other fields when omitted */
  id?: string;
  /** Key in the model registry */
  modelKey: string;
  /** Defaults to 0 */
  temperature?: number;
  nameSuffix?: string;
  metadata?: Record<string, unknown>;
}

export interface ResolvedConfiguration {
  id: string;
  modelKey: string;
  temperature: number;
  metadata: Record<string, unknown>;
}

/**
 * Runs extraction, consolidation and validation for one record
 */
export type ExtractionTask = (
  input: ExtractionInput,
  expected: ConsolidatedForm,
  configuration: ResolvedConfiguration
) => Promise<ExtractionOutput>;

// ============================================================================
// Results
// ============================================================================

export type RunState = 'pending' | 'loading' | 'running' | 'aggregating' | 'done' | 'failed';

export type ConfigurationStatus = 'completed' | 'failed';

export interface EvaluatorAggregate {
  evaluator: string;
  kind: EvaluatorKind;
  /** Records that produced a result for this evaluator */
  count: number;
  /** Mean score; for boolean evaluators the proportion true */
  value: number;
  /** Label counts, categorical evaluators only */
  distribution?: Record<string, number>;
}

export interface ExperimentSummary {
  configurationId: string;
  modelKey: string;
  temperature: number;
  status: ConfigurationStatus;
  error?: string;
  totalRecords: number;
  successfulRecords: number;
  failedRecords: number;
  /** Sampled records never started because the run stopped */
  skippedRecords: number;
  evaluators: Record<string, EvaluatorAggregate>;
  /** Summary evaluators, e.g. overall_accuracy */
  metrics: Record<string, number>;
  durationMs: number;
}

export interface ExperimentComparison {
  runId: string;
  dataset: string;
  datasetVersion?: number;
  sampleIds: string[];
  configurations: Record<string, ExperimentSummary>;
}

export interface ExperimentRunResult {
  runId: string;
  state: RunState;
  cancelled: boolean;
  perConfiguration: ExperimentSummary[];
  comparison: ExperimentComparison;
}

export interface ExperimentRunOptions {
  dataset: string;
  version?: number;
  configurations: readonly ModelConfiguration[];
  /** All records when omitted */
  sampleSize?: number;
  maxParallel?: number;
  failFast?: boolean;
  seed?: string;
  signal?: AbortSignal;
  runName?: string;
}

// ============================================================================
// Telemetry
// ============================================================================

export type ExperimentEvent =
  | {
      type: 'evaluation';
      runId: string;
      configurationId: string;
      recordId: string;
      result: EvaluationResult;
    }
  | {
      type: 'summary';
      runId: string;
      summary: ExperimentSummary;
    };

export interface ResultSink {
  emit(event: ExperimentEvent): Promise<void>;
}
