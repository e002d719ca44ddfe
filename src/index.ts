/**
 * Tally extraction and model-comparison harness
 */

export * from './types/forms.js';
export * from './extraction/index.js';
export { consolidate, consolidateFormSet, groupPagesIntoForms, FormAccumulator } from './consolidation/Consolidator.js';
export type { FormSetConsolidation } from './consolidation/Consolidator.js';
export * from './validation/index.js';
export * from './evaluation/index.js';
export * from './experiments/index.js';
export { ConfigLoader, ConfigurationError } from './config/ConfigLoader.js';
export { DEFAULT_APP_CONFIG, MAX_PARALLEL_LIMIT, validateAppConfig } from './config/ConfigSchema.js';
export type { AppConfig, ExperimentSettings, ExtractionSettings, JudgeSettings } from './config/ConfigSchema.js';
export { logger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
export { runBounded } from './utils/workerPool.js';
