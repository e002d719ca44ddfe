/**
 * Base Cloud Vision Provider
 *
 * Shared functionality for cloud model providers including:
 * - Rate limiting (sliding window)
 * - Optional exponential backoff retry logic
 * - Image base64 encoding
 */

import type {
  GenerativeModel,
  GenerationRequest,
  GenerationResult,
  ImagePayload,
  ModelInfo,
  ModelProviderName,
  VisionModelConfig,
} from '../types.js';
import type { z } from 'zod';
import { logger } from '../../utils/logger.js';

/**
 * Simple rate limiter using sliding window
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private maxRequests: number;
  private windowMs: number;

  constructor(maxRequests: number = 60, windowMs: number = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
  }

  async waitForSlot(): Promise<void> {
    const now = Date.now();
    this.timestamps = this.timestamps.filter(t => now - t < this.windowMs);

    if (this.timestamps.length >= this.maxRequests) {
      const oldestTimestamp = this.timestamps[0];
      const waitTime = this.windowMs - (now - oldestTimestamp) + 10;
      if (waitTime > 0) {
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }
      const afterWait = Date.now();
      this.timestamps = this.timestamps.filter(t => afterWait - t < this.windowMs);
    }

    this.timestamps.push(Date.now());
  }
}

/**
 * Cloud provider error with retry information
 */
export class CloudVisionError extends Error {
  constructor(
    message: string,
    public provider: string,
    public statusCode: number,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'CloudVisionError';
  }
}

/**
 * Base class for cloud providers (OpenAI, Anthropic, Google)
 */
export abstract class BaseCloudVisionProvider implements GenerativeModel {
  abstract name: string;
  protected abstract readonly providerName: ModelProviderName;
  protected config: VisionModelConfig;
  protected apiKey: string;
  protected rateLimiter: RateLimiter;
  protected timeout: number;
  protected maxRetries: number;

  constructor(config: VisionModelConfig) {
    this.config = config;
    this.apiKey = config.apiKey || '';
    this.timeout = config.options?.timeout || 60000;
    this.maxRetries = config.options?.maxRetries ?? 0;
    this.rateLimiter = new RateLimiter(config.options?.requestsPerMinute ?? 60, 60000);
  }

  abstract generate(request: GenerationRequest): Promise<GenerationResult>;

  abstract healthCheck(): Promise<boolean>;

  getModelInfo(): ModelInfo {
    return {
      name: this.config.model,
      provider: this.providerName,
      parameters: this.config.parameters || 'cloud'
    };
  }

  protected encodeImage(image: ImagePayload): string {
    return image.data.toString('base64');
  }

  protected resolveTemperature(request: GenerationRequest): number {
    return request.temperature ?? this.config.options?.temperature ?? 0;
  }

  protected resolveMaxTokens(request: GenerationRequest): number {
    return request.maxTokens ?? this.config.options?.maxTokens ?? 8192;
  }

  /**
   * Make HTTP request with rate limiting; retries only when maxRetries > 0.
   * The JSON body is parsed against `schema`; a body that does not match is a
   * non-retryable provider error.
   */
  protected async requestWithRetry<T>(
    url: string,
    options: RequestInit,
    schema: z.ZodType<T>,
    timeoutMs: number = this.timeout,
    retryCount: number = 0
  ): Promise<T> {
    await this.rateLimiter.waitForSlot();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const errorText = await response.text();
        const retryable = response.status === 429 || response.status >= 500;

        if (retryable && retryCount < this.maxRetries) {
          const delay = Math.pow(2, retryCount) * 1000;
          logger.warn(`${this.name}: Request failed with ${response.status}, retrying in ${delay}ms...`);
          await new Promise(resolve => setTimeout(resolve, delay));
          return this.requestWithRetry(url, options, schema, timeoutMs, retryCount + 1);
        }

        throw new CloudVisionError(
          `API error: ${response.status} - ${errorText}`,
          this.providerName,
          response.status,
          retryable
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new CloudVisionError(
          `Unexpected response body: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
          this.providerName,
          response.status,
          false
        );
      }
      return parsed.data;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof CloudVisionError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (retryCount < this.maxRetries) {
          logger.warn(`${this.name}: Request timeout, retrying...`);
          await new Promise(resolve => setTimeout(resolve, 1000));
          return this.requestWithRetry(url, options, schema, timeoutMs, retryCount + 1);
        }
        throw new CloudVisionError(
          `Request timeout after ${timeoutMs}ms`,
          this.providerName,
          0,
          true
        );
      }

      throw new CloudVisionError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.providerName,
        0,
        true
      );
    }
  }

  protected wrapError(error: unknown, label: string): CloudVisionError {
    if (error instanceof CloudVisionError) {
      return error;
    }
    return new CloudVisionError(
      `${label} request failed: ${error instanceof Error ? error.message : String(error)}`,
      this.providerName,
      0,
      true
    );
  }
}
