#!/usr/bin/env tsx

/**
 * Tally CLI
 *
 * Extract tally form sets, store labeled datasets and compare model
 * configurations against them.
 */

import 'dotenv/config';
import { promises as fs } from 'fs';
import { pathToFileURL } from 'url';
import { ConfigLoader } from '../config/ConfigLoader.js';
import type { AppConfig } from '../config/ConfigSchema.js';
import { VisionModelFactory } from '../extraction/VisionModelFactory.js';
import { PageExtractor } from '../extraction/PageExtractor.js';
import { FormSetExtractor } from '../extraction/FormSetExtractor.js';
import { createDefaultEvaluators } from '../evaluation/evaluators.js';
import { LLMJudge } from '../evaluation/LLMJudge.js';
import { ExperimentRunner } from '../experiments/ExperimentRunner.js';
import { ExperimentRunManager } from '../experiments/ExperimentRunManager.js';
import { DatasetRecordSchema, FileDatasetStore } from '../experiments/FileDatasetStore.js';
import { HttpResultSink, LoggerResultSink } from '../experiments/ResultSink.js';
import { createExtractionTask } from '../experiments/extractionTask.js';
import { formatComparisonTable, rankConfigurations } from '../experiments/comparison.js';
import type { DatasetRecord, ModelConfiguration } from '../experiments/types.js';
import { logger } from '../utils/logger.js';

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, string | boolean>;
}

/**
 * Split argv into a command, positional arguments and `--flag [value]` pairs.
 * A flag followed by another flag (or nothing) is boolean.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      const next = rest[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags[name] = next;
        i++;
      } else {
        flags[name] = true;
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
}

function intFlag(flags: ParsedArgs['flags'], name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`--${name} expects an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Model configurations from `--models a,b[:temperature]`
 */
export function parseModelConfigurations(value: string): ModelConfiguration[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const [modelKey, temperature] = entry.split(':');
      if (temperature === undefined) {
        return { modelKey };
      }
      const parsed = Number(temperature);
      if (!Number.isFinite(parsed)) {
        throw new Error(`Invalid temperature in "${entry}"`);
      }
      return { modelKey, temperature: parsed };
    });
}

/**
 * List registry models and check which are reachable
 */
async function listModels(): Promise<void> {
  console.log('='.repeat(60));
  console.log('Available Models');
  console.log('='.repeat(60));

  const registry = VisionModelFactory.loadConfig();
  const defaultModel = VisionModelFactory.getDefaultModelKey();

  console.log(`\nExtraction model: ${defaultModel}`);
  console.log(`Judge model: ${process.env.JUDGE_MODEL || registry.judge || '(none)'}\n`);

  for (const [key, modelConfig] of Object.entries(registry.models)) {
    const marker = key === defaultModel ? '→' : ' ';
    console.log(`${marker} ${key}`);
    console.log(`     Provider: ${modelConfig.provider}`);
    console.log(`     Model: ${modelConfig.model}`);
    console.log(`     Description: ${modelConfig.description || '-'}`);
  }

  console.log('\nAvailability Status:');
  console.log('-'.repeat(60));
  for (const key of Object.keys(registry.models)) {
    try {
      const healthy = await VisionModelFactory.createByName(key).healthCheck();
      console.log(`  ${key}: ${healthy ? '✓ Available' : '✗ Not Available'}`);
    } catch (error) {
      console.log(`  ${key}: ✗ Error - ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

async function extract(config: AppConfig, imagePaths: string[], modelKey?: string): Promise<void> {
  const model = VisionModelFactory.createByName(modelKey || config.extraction.modelKey || VisionModelFactory.getDefaultModelKey());
  const extractor = new FormSetExtractor(new PageExtractor(model, { timeoutMs: config.extraction.timeoutMs }), {
    maxParallel: config.experiments.maxParallel,
    transientRetries: config.extraction.transientRetries,
    retryDelayMs: config.extraction.retryDelayMs,
    defaultCategory: config.extraction.defaultFormCategory,
  });

  const result = await extractor.extractFiles(imagePaths);
  console.log(JSON.stringify(result, null, 2));
}

async function pushDataset(config: AppConfig, name: string, recordsPath: string): Promise<void> {
  const parsed = DatasetRecordSchema.array().safeParse(JSON.parse(await fs.readFile(recordsPath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(
      `${recordsPath} must contain a JSON array of records: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }

  const store = new FileDatasetStore(config.experiments.datasetsDir);
  const records: DatasetRecord[] = parsed.data;
  const datasetId = await store.push(name, records);
  console.log(`Stored ${records.length} record(s) as ${datasetId}`);
}

async function runExperiment(config: AppConfig, flags: ParsedArgs['flags']): Promise<void> {
  const dataset = stringFlag(flags, 'dataset');
  const models = stringFlag(flags, 'models');
  if (!dataset || !models) {
    throw new Error('Usage: tally-cli experiment --dataset <name> --models <a,b> [--version N] [--sample N] [--parallel N] [--fail-fast]');
  }

  const judge = new LLMJudge(VisionModelFactory.createJudge(config.judge.modelKey), {
    maxAttempts: config.judge.maxAttempts,
    retryDelayMs: config.judge.retryDelayMs,
  });

  const runner = new ExperimentRunner({
    datasetStore: new FileDatasetStore(config.experiments.datasetsDir),
    task: createExtractionTask({
      createModel: modelKey => VisionModelFactory.createByName(modelKey),
      pageTimeoutMs: config.extraction.timeoutMs,
      extractor: {
        maxParallel: 1,
        transientRetries: config.extraction.transientRetries,
        retryDelayMs: config.extraction.retryDelayMs,
        defaultCategory: config.extraction.defaultFormCategory,
      },
    }),
    evaluators: [...createDefaultEvaluators(), judge],
    resultSink: config.experiments.telemetryUrl
      ? new HttpResultSink({ url: config.experiments.telemetryUrl })
      : new LoggerResultSink(),
    runManager: new ExperimentRunManager(config.experiments.runsDir),
    defaults: { maxParallel: config.experiments.maxParallel, seed: config.experiments.sampleSeed },
  });

  const onInterrupt = () => runner.cancel();
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runner.run({
      dataset,
      version: intFlag(flags, 'version'),
      configurations: parseModelConfigurations(models),
      sampleSize: intFlag(flags, 'sample'),
      maxParallel: intFlag(flags, 'parallel'),
      failFast: flags['fail-fast'] === true,
    });

    const metrics = ['overall_accuracy', 'success_rate', 'avg_ballot_accuracy', 'avg_llm_judge_score'];
    console.log(`\nRun ${result.runId}${result.cancelled ? ' (cancelled)' : ''}`);
    console.log(`Sample: ${result.comparison.sampleIds.length} record(s)\n`);
    console.log(formatComparisonTable(result.comparison, metrics));

    const ranking = rankConfigurations(result.comparison, 'overall_accuracy');
    if (ranking.length > 0) {
      console.log(`\nBest by overall_accuracy: ${ranking[0].configurationId} (${ranking[0].value.toFixed(3)})`);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function listRuns(config: AppConfig): void {
  const runs = new ExperimentRunManager(config.experiments.runsDir).listRuns();
  if (runs.length === 0) {
    console.log('No experiment runs found');
    return;
  }
  for (const run of runs) {
    console.log(`${run.runId}  ${run.state.padEnd(11)}  ${run.dataset}  ${run.configurations.map(c => c.id).join(', ')}`);
  }
}

export function printHelp(): void {
  console.log(`
Tally CLI

Usage:
  tally-cli models                              List registry models and their availability
  tally-cli extract <image...> [--model key]    Extract one form set and print forms as JSON
  tally-cli push-dataset <name> <records.json>  Store a new dataset version
  tally-cli experiment --dataset <name> --models <a,b[:temp]> [options]
                                                Compare model configurations on a dataset
  tally-cli runs                                List stored experiment runs

Experiment options:
  --version <n>     Dataset version (default: latest)
  --sample <n>      Records to sample (default: all)
  --parallel <n>    Concurrent record tasks (default: MAX_PARALLEL or 2)
  --fail-fast       Abort a configuration on its first failed record
  `);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { command, positionals, flags } = parseArgs(argv);

  if (command === undefined || command === 'help') {
    printHelp();
    return;
  }

  const config = await ConfigLoader.loadAppConfig(stringFlag(flags, 'config'));
  if (config.modelsConfigPath) {
    VisionModelFactory.setConfigPath(config.modelsConfigPath);
  }

  switch (command) {
    case 'models':
      await listModels();
      break;

    case 'extract':
      if (positionals.length === 0) {
        throw new Error('Usage: tally-cli extract <image...> [--model key]');
      }
      await extract(config, positionals, stringFlag(flags, 'model'));
      break;

    case 'push-dataset':
      if (positionals.length < 2) {
        throw new Error('Usage: tally-cli push-dataset <name> <records.json>');
      }
      await pushDataset(config, positionals[0], positionals[1]);
      break;

    case 'experiment':
      await runExperiment(config, flags);
      break;

    case 'runs':
      listRuns(config);
      break;

    default:
      printHelp();
      throw new Error(`Unknown command: ${command}`);
  }
}

const isMainModule = (): boolean =>
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule()) {
  main().catch(error => {
    logger.error('Fatal error', error);
    process.exitCode = 1;
  });
}
