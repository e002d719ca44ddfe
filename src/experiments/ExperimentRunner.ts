/**
 * Experiment Runner
 *
 * Runs every configuration over the same deterministic sample of a dataset.
 * State machine per run: pending -> loading -> running -> aggregating -> done | failed.
 *
 * Records are processed with at most `maxParallel` tasks in flight; each task
 * extracts the record and then runs every evaluator (the judge included) on
 * it, so judge calls share the same bound. Completions feed a streaming
 * accumulator per configuration.
 *
 * Failure policy:
 * - failFast: the first record failure stops new tasks, lets in-flight tasks
 *   finish, marks the configuration failed and rejects with ExperimentError
 * - otherwise the record counts as failed and its scores stay out of the
 *   aggregates
 * - cancellation stops new tasks; affected configurations report what had
 *   completed with status failed and error "Run cancelled"
 */

import * as crypto from 'crypto';
import type { Evaluator, ExtractionOutput } from '../evaluation/types.js';
import { runEvaluators } from '../evaluation/evaluators.js';
import type {
  DatasetRecord,
  DatasetStore,
  ExperimentEvent,
  ExperimentRunOptions,
  ExperimentRunResult,
  ExperimentSummary,
  ExtractionTask,
  ResolvedConfiguration,
  ResultSink,
  RunState,
} from './types.js';
import { resolveConfigurations } from './configuration.js';
import { selectSample } from './sampling.js';
import { SummaryAccumulator } from './SummaryAccumulator.js';
import { createDefaultSummaryEvaluators, type SummaryEvaluator } from './summaryEvaluators.js';
import { ExperimentRunManager } from './ExperimentRunManager.js';
import { buildComparison } from './comparison.js';
import { ExperimentError, RecordTaskError } from './ExperimentError.js';
import { runBounded } from '../utils/workerPool.js';
import { logger } from '../utils/logger.js';

export const CANCELLED_REASON = 'Run cancelled';

const DEFAULTS = {
  maxParallel: 2,
  maxParallelLimit: 16,
  seed: 'tally',
};

export interface ExperimentRunnerDependencies {
  datasetStore: DatasetStore;
  task: ExtractionTask;
  evaluators: readonly Evaluator[];
  summaryEvaluators?: readonly SummaryEvaluator[];
  resultSink?: ResultSink | null;
  runManager?: ExperimentRunManager | null;
  defaults?: { maxParallel?: number; seed?: string };
}

export class ExperimentRunner {
  private readonly deps: ExperimentRunnerDependencies;
  private readonly summaryEvaluators: readonly SummaryEvaluator[];
  private readonly pendingEvents = new Set<Promise<void>>();
  private currentState: RunState = 'pending';
  private controller: AbortController | null = null;

  constructor(deps: ExperimentRunnerDependencies) {
    this.deps = deps;
    this.summaryEvaluators = deps.summaryEvaluators ?? createDefaultSummaryEvaluators();
  }

  get state(): RunState {
    return this.currentState;
  }

  /**
   * Stop issuing record tasks. In-flight tasks complete; run() then resolves.
   */
  cancel(): void {
    if (this.controller && !this.controller.signal.aborted) {
      logger.warn('Experiment run cancellation requested');
      this.controller.abort();
    }
  }

  async run(options: ExperimentRunOptions): Promise<ExperimentRunResult> {
    if (this.controller) {
      throw new Error('An experiment run is already in progress');
    }

    const configurations = resolveConfigurations(options.configurations);
    if (configurations.length === 0) {
      throw new Error('At least one model configuration is required');
    }
    const maxParallel = Math.min(
      DEFAULTS.maxParallelLimit,
      Math.max(1, options.maxParallel ?? this.deps.defaults?.maxParallel ?? DEFAULTS.maxParallel)
    );
    const seed = options.seed ?? this.deps.defaults?.seed ?? DEFAULTS.seed;
    const failFast = options.failFast ?? false;

    const controller = new AbortController();
    this.controller = controller;
    const onExternalAbort = () => this.cancel();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const runManager = this.deps.runManager ?? null;
    let runId = `exp-${crypto.randomBytes(4).toString('hex')}`;
    this.currentState = 'pending';

    try {
      if (runManager) {
        runId = runManager.startRun({
          dataset: options.dataset,
          datasetVersion: options.version,
          configurations,
          runName: options.runName,
          options: { maxParallel, failFast, seed },
        }).runId;
      }

      this.transition('loading', runManager);
      const records = await this.deps.datasetStore.pull(options.dataset, options.version);
      const sample = selectSample(records, options.sampleSize, seed);
      const sampleIds = sample.map(record => record.id);
      runManager?.setSample(sampleIds, options.version);
      logger.info(`Sampled ${sample.length}/${records.length} record(s) from ${options.dataset}`, { seed });

      this.transition('running', runManager);
      const summaries: ExperimentSummary[] = [];
      for (const configuration of configurations) {
        const summary = await this.runConfiguration(runId, configuration, sample, {
          maxParallel,
          failFast,
          signal: controller.signal,
        });
        summaries.push(summary);
        runManager?.recordSummary(summary);
        this.emit({ type: 'summary', runId, summary });
      }

      this.transition('aggregating', runManager);
      const comparison = buildComparison({
        runId,
        dataset: options.dataset,
        datasetVersion: options.version,
        sampleIds,
        summaries,
      });

      const cancelled = controller.signal.aborted;
      this.currentState = 'done';
      runManager?.completeRun('done', { cancelled });
      logger.info(`Experiment run ${runId} done`, { configurations: summaries.length, cancelled });

      return { runId, state: 'done', cancelled, perConfiguration: summaries, comparison };
    } catch (error) {
      this.currentState = 'failed';
      const message = error instanceof Error ? error.message : String(error);
      runManager?.completeRun('failed', { error: message });
      logger.error(`Experiment run ${runId} failed`, error);
      throw error;
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.controller = null;
      await this.flushEvents();
    }
  }

  private async runConfiguration(
    runId: string,
    configuration: ResolvedConfiguration,
    sample: readonly DatasetRecord[],
    options: { maxParallel: number; failFast: boolean; signal: AbortSignal }
  ): Promise<ExperimentSummary> {
    const startTime = Date.now();
    const accumulator = new SummaryAccumulator(configuration, sample.length, this.summaryEvaluators);
    logger.info(`Running configuration ${configuration.id} over ${sample.length} record(s)`);

    const processRecord = async (record: DatasetRecord): Promise<void> => {
      let output: ExtractionOutput;
      try {
        output = await this.deps.task(record.input, record.expected, configuration);
      } catch (error) {
        logger.error(`Record ${record.id} failed for ${configuration.id}`, error);
        accumulator.recordFailure();
        if (options.failFast) {
          throw new RecordTaskError(record.id, error);
        }
        return;
      }

      const results = await runEvaluators(this.deps.evaluators, record.input, output, record.expected);
      accumulator.recordSuccess(results);
      for (const result of results) {
        this.emit({ type: 'evaluation', runId, configurationId: configuration.id, recordId: record.id, result });
      }
    };

    try {
      const { stopped } = await runBounded(sample, processRecord, {
        concurrency: options.maxParallel,
        signal: options.signal,
      });

      if (stopped) {
        logger.warn(`Configuration ${configuration.id} cancelled after ${accumulator.successfulRecords + accumulator.failedRecords} record(s)`);
        return accumulator.finalize({ status: 'failed', error: CANCELLED_REASON, durationMs: Date.now() - startTime });
      }
      return accumulator.finalize({ status: 'completed', durationMs: Date.now() - startTime });
    } catch (error) {
      if (!(error instanceof RecordTaskError)) throw error;

      const summary = accumulator.finalize({
        status: 'failed',
        error: error.message,
        durationMs: Date.now() - startTime,
      });
      this.deps.runManager?.recordSummary(summary);
      this.emit({ type: 'summary', runId, summary });
      throw new ExperimentError(configuration.id, error.recordId, error.cause);
    }
  }

  private transition(state: RunState, runManager: ExperimentRunManager | null): void {
    logger.info(`Experiment state: ${this.currentState} -> ${state}`);
    this.currentState = state;
    runManager?.setState(state);
  }

  /**
   * Fire-and-forget delivery to the result sink
   */
  private emit(event: ExperimentEvent): void {
    const sink = this.deps.resultSink;
    if (!sink) return;

    const pending: Promise<void> = Promise.resolve()
      .then(() => sink.emit(event))
      .catch((error: unknown) => {
        logger.warn(`Result sink failed for ${event.type} event`, {
          message: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pendingEvents.delete(pending);
      });
    this.pendingEvents.add(pending);
  }

  private async flushEvents(): Promise<void> {
    await Promise.all([...this.pendingEvents]);
  }
}
