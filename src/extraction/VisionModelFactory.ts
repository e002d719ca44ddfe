/**
 * Vision Model Factory - Creates the provider for a named model configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { GenerativeModel, VisionModelConfig, VisionModelsConfigFile } from './types.js';
import { OpenAIVisionProvider } from './providers/OpenAIVisionProvider.js';
import { AnthropicVisionProvider } from './providers/AnthropicVisionProvider.js';
import { GoogleVisionProvider } from './providers/GoogleVisionProvider.js';
import { ConfigurationError } from '../config/ConfigLoader.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const VisionModelConfigSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'google']),
  baseUrl: z.string().optional(),
  model: z.string().min(1),
  description: z.string().optional(),
  parameters: z.string().optional(),
  apiKey: z.string().optional(),
  options: z
    .object({
      temperature: z.number().optional(),
      maxTokens: z.number().int().positive().optional(),
      timeout: z.number().int().positive().optional(),
      maxRetries: z.number().int().min(0).optional(),
      requestsPerMinute: z.number().int().positive().optional(),
    })
    .optional(),
});

const VisionModelsConfigFileSchema = z.object({
  default: z.string(),
  judge: z.string().optional(),
  models: z.record(z.string(), VisionModelConfigSchema),
});

type Env = Record<string, string | undefined>;

export class VisionModelFactory {
  private static configPath = path.join(__dirname, '../../config/vision-models.json');
  private static configCache: VisionModelsConfigFile | null = null;

  /**
   * Create a provider from a model configuration. API keys in the environment win.
   */
  static create(config: VisionModelConfig, env: Env = process.env): GenerativeModel {
    const effectiveConfig = { ...config };

    if (config.provider === 'openai') {
      effectiveConfig.apiKey = env.OPENAI_API_KEY || config.apiKey;
    }
    if (config.provider === 'anthropic') {
      effectiveConfig.apiKey = env.ANTHROPIC_API_KEY || config.apiKey;
    }
    if (config.provider === 'google') {
      effectiveConfig.apiKey = env.GOOGLE_API_KEY || env.GEMINI_API_KEY || config.apiKey;
    }

    switch (effectiveConfig.provider) {
      case 'openai':
        return new OpenAIVisionProvider(effectiveConfig);
      case 'anthropic':
        return new AnthropicVisionProvider(effectiveConfig);
      case 'google':
        return new GoogleVisionProvider(effectiveConfig);
    }
  }

  /**
   * Point the factory at a different registry file
   */
  static setConfigPath(configPath: string): void {
    this.configPath = configPath;
    this.configCache = null;
  }

  /**
   * Load the model registry file
   */
  static loadConfig(): VisionModelsConfigFile {
    if (this.configCache) {
      return this.configCache;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load model registry from ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = VisionModelsConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(
        `Model registry ${this.configPath} is invalid: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }

    this.configCache = result.data;
    return result.data;
  }

  /**
   * Create a provider by model key name
   */
  static createByName(modelKey: string, env: Env = process.env): GenerativeModel {
    return this.create(this.requireModelConfig(modelKey), env);
  }

  /**
   * Create the default extraction provider
   */
  static createDefault(env: Env = process.env): GenerativeModel {
    return this.createByName(this.getDefaultModelKey(env), env);
  }

  /**
   * Create the judge model, or null when it is not configured or lacks credentials.
   * The judge degrades to a zero score instead of failing the run.
   */
  static createJudge(modelKey?: string, env: Env = process.env): GenerativeModel | null {
    try {
      const key = modelKey || env.JUDGE_MODEL || this.loadConfig().judge;
      if (!key) {
        logger.warn('LLM Judge: no judge model configured');
        return null;
      }

      const modelConfig = this.getModelConfig(key);
      if (!modelConfig) {
        logger.warn(`LLM Judge: judge model "${key}" not found in registry`);
        return null;
      }

      return this.create(modelConfig, env);
    } catch (error) {
      logger.warn(`LLM Judge: cannot create judge model: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  static listAvailableModels(): string[] {
    return Object.keys(this.loadConfig().models);
  }

  static getModelConfig(modelKey: string): VisionModelConfig | undefined {
    return this.loadConfig().models[modelKey];
  }

  static getDefaultModelKey(env: Env = process.env): string {
    return env.EXTRACTION_MODEL || env.VISION_MODEL || this.loadConfig().default;
  }

  /**
   * Clear the config cache (useful for testing or config updates)
   */
  static clearCache(): void {
    this.configCache = null;
  }

  private static requireModelConfig(modelKey: string): VisionModelConfig {
    const modelConfig = this.getModelConfig(modelKey);
    if (!modelConfig) {
      throw new ConfigurationError(
        `Vision model not found: ${modelKey}. Available models: ${this.listAvailableModels().join(', ')}`
      );
    }
    return modelConfig;
  }
}
