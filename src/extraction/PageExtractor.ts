/**
 * Page Extractor - one model call per page image, returning a PageRecord
 * or an ExtractionError value. No retries happen here.
 */

import type { GenerativeModel, ImagePayload } from './types.js';
import type { PageRecord } from '../types/forms.js';
import { CloudVisionError } from './providers/BaseCloudVisionProvider.js';
import { ExtractionError } from './ExtractionError.js';
import { isSupportedMimeType } from './imagePayload.js';
import { PAGE_EXTRACTION_PROMPT, PAGE_RESPONSE_SCHEMA, parsePageResponse, toPageRecord } from './schema.js';
import { logger } from '../utils/logger.js';

export interface PageExtractorOptions {
  /** Per-call timeout passed to the provider */
  timeoutMs?: number;
  /** Defaults to 0 for deterministic output */
  temperature?: number;
  maxTokens?: number;
}

export class PageExtractor {
  private readonly model: GenerativeModel;
  private readonly options: PageExtractorOptions;

  constructor(model: GenerativeModel, options: PageExtractorOptions = {}) {
    this.model = model;
    this.options = options;
  }

  get modelName(): string {
    return this.model.name;
  }

  async extract(image: ImagePayload, pageIndex: number): Promise<PageRecord | ExtractionError> {
    if (!isSupportedMimeType(image.mimeType)) {
      return new ExtractionError('InvalidInput', pageIndex, `Unsupported image type: ${image.mimeType}`);
    }

    let text: string;
    try {
      const result = await this.model.generate({
        prompt: PAGE_EXTRACTION_PROMPT,
        images: [image],
        responseSchema: PAGE_RESPONSE_SCHEMA,
        temperature: this.options.temperature ?? 0,
        maxTokens: this.options.maxTokens,
        timeoutMs: this.options.timeoutMs,
      });
      text = result.text;
      logger.debug(`Page ${pageIndex} extracted by ${result.model}`, {
        processingTimeMs: result.processing_time_ms,
        usage: result.usage,
      });
    } catch (error) {
      return this.toTransportError(error, pageIndex);
    }

    const parsed = parsePageResponse(text);
    if (!parsed.success) {
      logger.warn(`Page ${pageIndex}: schema violation from ${this.model.name}`, { reason: parsed.reason });
      return new ExtractionError('SchemaViolation', pageIndex, parsed.reason, { raw: text });
    }

    return toPageRecord(parsed.data, pageIndex, image.filename);
  }

  private toTransportError(error: unknown, pageIndex: number): ExtractionError {
    if (error instanceof CloudVisionError) {
      const kind = error.retryable ? 'Transient' : 'Provider';
      logger.warn(`Page ${pageIndex}: ${kind} error from ${error.provider}`, {
        statusCode: error.statusCode,
        message: error.message,
      });
      return new ExtractionError(kind, pageIndex, error.message, { statusCode: error.statusCode });
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Page ${pageIndex}: model call failed`, { message });
    return new ExtractionError('Transient', pageIndex, message);
  }
}
