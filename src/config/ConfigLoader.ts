import { promises as fs } from 'fs';
import path from 'path';
import type { AppConfig, AppConfigFile } from './ConfigSchema.js';
import { AppConfigFileSchema, DEFAULT_APP_CONFIG, validateAppConfig } from './ConfigSchema.js';
import { isFormCategory } from '../types/forms.js';
import { logger, setLogLevel, type LogLevel } from '../utils/logger.js';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value.trim());
}

function logLevelFromEnv(value: string | undefined): LogLevel | undefined {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
    ? value
    : undefined;
}

/**
 * Configuration loader for the harness
 * Supports loading from a JSON file and environment variables
 */
export class ConfigLoader {

  /**
   * Load configuration: defaults, then the config file, then environment overrides
   */
  static async loadAppConfig(configPath?: string, env: Env = process.env): Promise<AppConfig> {

    // Priority order:
    // 1. Explicit config file path
    // 2. TALLY_CONFIG_PATH environment variable
    // 3. Default: ./config/app-config.json

    const finalPath = configPath
      || env.TALLY_CONFIG_PATH
      || path.join(process.cwd(), 'config', 'app-config.json');

    const fileConfig = await this.readConfigFile(finalPath);
    const config = this.mergeWithEnv(this.mergeWithDefaults(fileConfig), env);

    const validation = validateAppConfig(config);
    if (!validation.valid) {
      logger.error('Invalid configuration:', validation.errors);
      throw new ConfigurationError(`Configuration validation failed: ${validation.errors.join(', ')}`);
    }

    if (validation.warnings.length > 0) {
      logger.warn('Configuration warnings:', validation.warnings);
    }

    setLogLevel(config.logLevel);
    return config;
  }

  private static async readConfigFile(filePath: string): Promise<AppConfigFile> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch {
      logger.debug(`Config file not found: ${filePath}, using defaults`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = AppConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(
        `Config file ${filePath} is invalid: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }

    logger.info(`Loaded config from: ${filePath}`);
    return result.data;
  }

  /**
   * Merge config file values with default values
   */
  static mergeWithDefaults(config: AppConfigFile): AppConfig {
    return {
      ...DEFAULT_APP_CONFIG,
      ...config,
      extraction: {
        ...DEFAULT_APP_CONFIG.extraction,
        ...config.extraction,
      },
      judge: {
        ...DEFAULT_APP_CONFIG.judge,
        ...config.judge,
      },
      experiments: {
        ...DEFAULT_APP_CONFIG.experiments,
        ...config.experiments,
      },
    };
  }

  /**
   * Merge config with environment variable overrides
   */
  static mergeWithEnv(config: AppConfig, env: Env): AppConfig {
    const category = env.DEFAULT_FORM_CATEGORY;
    return {
      ...config,
      logLevel: logLevelFromEnv(env.LOG_LEVEL) ?? config.logLevel,
      modelsConfigPath: env.VISION_MODELS_CONFIG || config.modelsConfigPath,
      extraction: {
        ...config.extraction,
        modelKey: env.EXTRACTION_MODEL || env.VISION_MODEL || config.extraction.modelKey,
        timeoutMs: intFromEnv(env.EXTRACTION_TIMEOUT_MS) ?? config.extraction.timeoutMs,
        transientRetries: intFromEnv(env.TRANSIENT_RETRIES) ?? config.extraction.transientRetries,
        defaultFormCategory: isFormCategory(category) ? category : config.extraction.defaultFormCategory,
      },
      judge: {
        ...config.judge,
        modelKey: env.JUDGE_MODEL || config.judge.modelKey,
      },
      experiments: {
        ...config.experiments,
        maxParallel: intFromEnv(env.MAX_PARALLEL) ?? config.experiments.maxParallel,
        sampleSeed: env.SAMPLE_SEED || config.experiments.sampleSeed,
        datasetsDir: env.DATASETS_DIR || config.experiments.datasetsDir,
        runsDir: env.EXPERIMENT_RUNS_DIR || config.experiments.runsDir,
        telemetryUrl: env.TELEMETRY_URL || config.experiments.telemetryUrl,
      },
    };
  }
}
