/**
 * Configuration schema for the tally extraction and experiment harness
 */

import { z } from 'zod';
import type { FormCategory } from '../types/forms.js';
import type { LogLevel } from '../utils/logger.js';

export interface ExtractionSettings {
  /** Registry key of the extraction model */
  modelKey?: string;
  timeoutMs: number;
  /** Caller-side retries for transient page failures */
  transientRetries: number;
  retryDelayMs: number;
  defaultFormCategory: FormCategory;
}

export interface JudgeSettings {
  /** Registry key of the judge model; absent means the judge runs degraded */
  modelKey?: string;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface ExperimentSettings {
  maxParallel: number;
  sampleSeed: string;
  datasetsDir: string;
  runsDir: string;
  telemetryUrl?: string;
}

export interface AppConfig {
  extraction: ExtractionSettings;
  judge: JudgeSettings;
  experiments: ExperimentSettings;
  logLevel: LogLevel;
  /** Path of the model registry file */
  modelsConfigPath?: string;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  extraction: {
    timeoutMs: 120_000,
    transientRetries: 2,
    retryDelayMs: 1000,
    defaultFormCategory: 'Constituency',
  },
  judge: {
    maxAttempts: 3,
    retryDelayMs: 1000,
  },
  experiments: {
    maxParallel: 2,
    sampleSeed: 'tally',
    datasetsDir: './datasets',
    runsDir: './experiment-runs',
  },
  logLevel: 'info',
};

const formCategorySchema = z.enum(['Constituency', 'PartyList']);

/**
 * Shape accepted in the optional JSON config file; every key may be omitted
 */
export const AppConfigFileSchema = z
  .object({
    extraction: z
      .object({
        modelKey: z.string(),
        timeoutMs: z.number().int(),
        transientRetries: z.number().int(),
        retryDelayMs: z.number().int(),
        defaultFormCategory: formCategorySchema,
      })
      .partial(),
    judge: z
      .object({
        modelKey: z.string(),
        maxAttempts: z.number().int(),
        retryDelayMs: z.number().int(),
      })
      .partial(),
    experiments: z
      .object({
        maxParallel: z.number().int(),
        sampleSeed: z.string(),
        datasetsDir: z.string(),
        runsDir: z.string(),
        telemetryUrl: z.string(),
      })
      .partial(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    modelsConfigPath: z.string(),
  })
  .partial();

export type AppConfigFile = z.infer<typeof AppConfigFileSchema>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const MAX_PARALLEL_LIMIT = 16;

/**
 * Validate application configuration
 */
export function validateAppConfig(config: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const { maxParallel } = config.experiments;
  if (!Number.isInteger(maxParallel) || maxParallel < 1 || maxParallel > MAX_PARALLEL_LIMIT) {
    errors.push(`maxParallel must be an integer between 1 and ${MAX_PARALLEL_LIMIT} (got ${maxParallel})`);
  }

  if (!Number.isFinite(config.extraction.timeoutMs) || config.extraction.timeoutMs <= 0) {
    errors.push('Extraction timeout must be a positive number of milliseconds');
  }

  if (!Number.isInteger(config.extraction.transientRetries) || config.extraction.transientRetries < 0) {
    errors.push('Transient retries must be a non-negative integer');
  }

  if (!Number.isInteger(config.judge.maxAttempts) || config.judge.maxAttempts < 1) {
    errors.push('Judge max attempts must be at least 1');
  }

  if (!config.experiments.sampleSeed) {
    errors.push('Sample seed is required');
  }

  if (!config.judge.modelKey) {
    warnings.push('No judge model configured; judge scores will be 0');
  } else if (config.judge.modelKey === config.extraction.modelKey) {
    warnings.push(`Judge model "${config.judge.modelKey}" is also the extraction model`);
  }

  if (config.experiments.telemetryUrl) {
    try {
      new URL(config.experiments.telemetryUrl);
    } catch {
      errors.push(`Telemetry URL is not a valid URL: ${config.experiments.telemetryUrl}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
