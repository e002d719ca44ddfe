/**
 * Central configuration entry point
 */

export { ConfigLoader, ConfigurationError } from './ConfigLoader.js';
export {
  DEFAULT_APP_CONFIG,
  MAX_PARALLEL_LIMIT,
  validateAppConfig,
} from './ConfigSchema.js';
export type {
  AppConfig,
  ExtractionSettings,
  JudgeSettings,
  ExperimentSettings,
  ValidationResult,
} from './ConfigSchema.js';
