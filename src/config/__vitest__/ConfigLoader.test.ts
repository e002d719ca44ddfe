/**
 * Test file for ConfigLoader
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader, ConfigurationError } from '../ConfigLoader.js';
import { DEFAULT_APP_CONFIG, validateAppConfig } from '../ConfigSchema.js';
import { getLogLevel, setLogLevel } from '../../utils/logger.js';

describe('ConfigLoader', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
    configPath = path.join(tmpDir, 'app-config.json');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    setLogLevel('info');
  });

  it('uses defaults when the config file is missing', async () => {
    const config = await ConfigLoader.loadAppConfig(configPath, {});

    expect(config).toEqual(DEFAULT_APP_CONFIG);
  });

  it('layers file values over defaults and environment over both', async () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        logLevel: 'warn',
        judge: { modelKey: 'file-judge' },
        experiments: { maxParallel: 4, sampleSeed: 'file-seed' },
      })
    );

    const config = await ConfigLoader.loadAppConfig(configPath, {
      MAX_PARALLEL: '6',
      JUDGE_MODEL: 'env-judge',
      DEFAULT_FORM_CATEGORY: 'PartyList',
    });

    expect(config.experiments).toEqual({
      maxParallel: 6,
      sampleSeed: 'file-seed',
      datasetsDir: './datasets',
      runsDir: './experiment-runs',
    });
    expect(config.judge).toEqual({ modelKey: 'env-judge', maxAttempts: 3, retryDelayMs: 1000 });
    expect(config.extraction.defaultFormCategory).toBe('PartyList');
    expect(getLogLevel()).toBe('warn');
  });

  it('ignores an unknown form category from the environment', async () => {
    const config = await ConfigLoader.loadAppConfig(configPath, { DEFAULT_FORM_CATEGORY: 'Referendum' });

    expect(config.extraction.defaultFormCategory).toBe('Constituency');
  });

  it('finds the file through TALLY_CONFIG_PATH', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ experiments: { sampleSeed: 'from-env-path' } }));

    const config = await ConfigLoader.loadAppConfig(undefined, { TALLY_CONFIG_PATH: configPath });

    expect(config.experiments.sampleSeed).toBe('from-env-path');
  });

  it('rejects a file that is not JSON', async () => {
    fs.writeFileSync(configPath, '{ maxParallel: 2 ');

    await expect(ConfigLoader.loadAppConfig(configPath, {})).rejects.toThrow(/is not valid JSON/);
  });

  it('rejects a file with wrongly typed values', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ experiments: { maxParallel: 'two' } }));

    await expect(ConfigLoader.loadAppConfig(configPath, {})).rejects.toThrow(
      `Config file ${configPath} is invalid: experiments.maxParallel: Expected number, received string`
    );
  });

  it('rejects an out-of-range parallelism', async () => {
    const error = await ConfigLoader.loadAppConfig(configPath, { MAX_PARALLEL: '40' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty(
      'message',
      'Configuration validation failed: maxParallel must be an integer between 1 and 16 (got 40)'
    );
  });
});

describe('validateAppConfig', () => {
  it('warns when no judge model is configured', () => {
    expect(validateAppConfig(DEFAULT_APP_CONFIG)).toEqual({
      valid: true,
      errors: [],
      warnings: ['No judge model configured; judge scores will be 0'],
    });
  });

  it('warns when the judge is also the extraction model', () => {
    const result = validateAppConfig({
      ...DEFAULT_APP_CONFIG,
      extraction: { ...DEFAULT_APP_CONFIG.extraction, modelKey: 'same' },
      judge: { ...DEFAULT_APP_CONFIG.judge, modelKey: 'same' },
    });

    expect(result.warnings).toEqual(['Judge model "same" is also the extraction model']);
  });

  it('rejects a malformed telemetry URL', () => {
    const result = validateAppConfig({
      ...DEFAULT_APP_CONFIG,
      experiments: { ...DEFAULT_APP_CONFIG.experiments, telemetryUrl: 'not a url' },
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Telemetry URL is not a valid URL: not a url']);
  });
});
