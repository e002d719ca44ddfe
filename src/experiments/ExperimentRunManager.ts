/**
 * Experiment Run Manager
 *
 * Persists each experiment run as `<runsDirectory>/<runId>/run.json`:
 * run metadata (state, dataset, sample, configurations, timings) plus the
 * per-configuration summaries recorded so far. The file is rewritten on
 * every state change, so an interrupted run still leaves its progress.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { z } from 'zod';
import type { ExperimentSummary, ResolvedConfiguration, RunState } from './types.js';
import { logger } from '../utils/logger.js';

const RUN_STATES = ['pending', 'loading', 'running', 'aggregating', 'done', 'failed'] as const satisfies readonly RunState[];

const ExperimentSummarySchema = z.object({
  configurationId: z.string(),
  modelKey: z.string(),
  temperature: z.number(),
  status: z.enum(['completed', 'failed']),
  error: z.string().optional(),
  totalRecords: z.number(),
  successfulRecords: z.number(),
  failedRecords: z.number(),
  skippedRecords: z.number(),
  evaluators: z.record(
    z.object({
      evaluator: z.string(),
      kind: z.enum(['boolean', 'numeric', 'categorical']),
      count: z.number(),
      value: z.number(),
      distribution: z.record(z.number()).optional(),
    })
  ),
  metrics: z.record(z.number()),
  durationMs: z.number(),
});

const RunMetadataSchema = z.object({
  runId: z.string(),
  runName: z.string(),
  startedAt: z.string(),
  completedAt: z.string().optional(),
  state: z.enum(RUN_STATES),
  cancelled: z.boolean().optional(),
  error: z.string().optional(),
  dataset: z.string(),
  datasetVersion: z.number().optional(),
  sampleIds: z.array(z.string()),
  configurations: z.array(
    z.object({
      id: z.string(),
      modelKey: z.string(),
      temperature: z.number(),
      metadata: z.record(z.unknown()),
    })
  ),
  options: z.object({
    maxParallel: z.number(),
    failFast: z.boolean(),
    seed: z.string(),
  }),
});

const RunFileSchema = z.object({
  metadata: RunMetadataSchema,
  summaries: z.array(ExperimentSummarySchema),
});

export type ExperimentRunMetadata = z.infer<typeof RunMetadataSchema>;

export interface ExperimentRunRecord {
  metadata: ExperimentRunMetadata;
  summaries: ExperimentSummary[];
}

export interface StartRunOptions {
  dataset: string;
  datasetVersion?: number;
  configurations: ResolvedConfiguration[];
  runName?: string;
  options: ExperimentRunMetadata['options'];
}

export class ExperimentRunManager {
  private runsDirectory: string;
  private currentRun: ExperimentRunRecord | null = null;
  private currentRunPath: string | null = null;

  constructor(runsDirectory?: string) {
    this.runsDirectory = runsDirectory || './experiment-runs';
  }

  private ensureRunsDirectory(): void {
    if (!fs.existsSync(this.runsDirectory)) {
      fs.mkdirSync(this.runsDirectory, { recursive: true });
    }
  }

  private generateRunId(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const random = crypto.randomBytes(4).toString('hex');
    return `exp-${timestamp}-${random}`;
  }

  startRun(options: StartRunOptions): ExperimentRunMetadata {
    this.ensureRunsDirectory();
    const runId = this.generateRunId();

    const metadata: ExperimentRunMetadata = {
      runId,
      runName: options.runName || `Experiment on ${options.dataset}`,
      startedAt: new Date().toISOString(),
      state: 'pending',
      dataset: options.dataset,
      ...(options.datasetVersion !== undefined ? { datasetVersion: options.datasetVersion } : {}),
      sampleIds: [],
      configurations: options.configurations,
      options: options.options,
    };

    const runPath = path.join(this.runsDirectory, runId);
    fs.mkdirSync(runPath, { recursive: true });
    this.currentRun = { metadata, summaries: [] };
    this.currentRunPath = runPath;
    try {
      this.saveCurrentRun();
    } catch (error) {
      this.currentRun = null;
      this.currentRunPath = null;
      throw error;
    }

    logger.info(`Started experiment run: ${runId}`, { runDirectory: this.currentRunPath });
    return metadata;
  }

  setState(state: RunState): void {
    if (!this.currentRun) return;
    this.currentRun.metadata.state = state;
    this.saveCurrentRun();
  }

  setSample(sampleIds: string[], datasetVersion?: number): void {
    if (!this.currentRun) return;
    this.currentRun.metadata.sampleIds = sampleIds;
    if (datasetVersion !== undefined) {
      this.currentRun.metadata.datasetVersion = datasetVersion;
    }
    this.saveCurrentRun();
  }

  recordSummary(summary: ExperimentSummary): void {
    if (!this.currentRun) {
      throw new Error('No active run. Call startRun() first.');
    }
    this.currentRun.summaries.push(summary);
    this.saveCurrentRun();
  }

  completeRun(state: 'done' | 'failed', details: { cancelled?: boolean; error?: string } = {}): ExperimentRunMetadata | null {
    if (!this.currentRun) {
      return null;
    }

    const metadata = this.currentRun.metadata;
    metadata.state = state;
    metadata.completedAt = new Date().toISOString();
    if (details.cancelled) metadata.cancelled = true;
    if (details.error !== undefined) metadata.error = details.error;

    this.saveCurrentRun();
    this.currentRun = null;
    this.currentRunPath = null;
    return metadata;
  }

  private saveCurrentRun(): void {
    if (!this.currentRun || !this.currentRunPath) {
      return;
    }
    fs.writeFileSync(path.join(this.currentRunPath, 'run.json'), JSON.stringify(this.currentRun, null, 2));
  }

  /**
   * All readable runs, newest first
   */
  listRuns(): ExperimentRunMetadata[] {
    if (!fs.existsSync(this.runsDirectory)) {
      return [];
    }

    const runs: ExperimentRunMetadata[] = [];
    for (const entry of fs.readdirSync(this.runsDirectory, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const run = this.loadRun(entry.name);
      if (run) runs.push(run.metadata);
    }

    return runs.sort((a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime());
  }

  loadRun(runId: string): ExperimentRunRecord | null {
    const runPath = path.join(this.runsDirectory, runId, 'run.json');
    if (!fs.existsSync(runPath)) {
      return null;
    }

    try {
      const parsed = RunFileSchema.safeParse(JSON.parse(fs.readFileSync(runPath, 'utf-8')));
      if (!parsed.success) {
        logger.warn(`Ignoring malformed run file ${runPath}`, { issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn(`Cannot read run file ${runPath}`, { message: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }

  getCurrentRun(): ExperimentRunMetadata | null {
    return this.currentRun?.metadata || null;
  }

  getRunsDirectory(): string {
    return this.runsDirectory;
  }

  getCurrentRunPath(): string | null {
    return this.currentRunPath;
  }
}
