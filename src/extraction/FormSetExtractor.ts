/**
 * Form Set Extractor
 *
 * Extracts every page of a form set with bounded concurrency, waits for all
 * pages to settle, then groups, consolidates and validates the logical forms.
 * Transient page errors are retried here with exponential backoff; other
 * error kinds are recorded and the page is left out.
 */

import type { ImagePayload } from './types.js';
import type { ConsolidatedForm, FormCategory, PageRecord } from '../types/forms.js';
import { PageExtractor } from './PageExtractor.js';
import { ExtractionError } from './ExtractionError.js';
import { loadImagePayload } from './imagePayload.js';
import { consolidateFormSet } from '../consolidation/Consolidator.js';
import { FormValidator } from '../validation/FormValidator.js';
import { runBounded, sleep as defaultSleep } from '../utils/workerPool.js';
import { logger } from '../utils/logger.js';

export interface FormSetExtractorOptions {
  maxParallel?: number;
  /** Extra attempts for a Transient page error */
  transientRetries?: number;
  /** Base delay, doubled on every retry */
  retryDelayMs?: number;
  /** Category used to validate a form whose type was not extracted */
  defaultCategory?: FormCategory;
  validator?: FormValidator;
  sleep?: (ms: number) => Promise<void>;
}

export interface FormSetResult {
  forms: ConsolidatedForm[];
  pageErrors: ExtractionError[];
  pagesProcessed: number;
}

const DEFAULT_OPTIONS: Required<Omit<FormSetExtractorOptions, 'sleep' | 'validator'>> = {
  maxParallel: 2,
  transientRetries: 2,
  retryDelayMs: 1000,
  defaultCategory: 'Constituency',
};

export class FormSetExtractor {
  private readonly pageExtractor: PageExtractor;
  private readonly maxParallel: number;
  private readonly transientRetries: number;
  private readonly retryDelayMs: number;
  private readonly defaultCategory: FormCategory;
  private readonly validator: FormValidator;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(pageExtractor: PageExtractor, options: FormSetExtractorOptions = {}) {
    this.pageExtractor = pageExtractor;
    this.maxParallel = options.maxParallel ?? DEFAULT_OPTIONS.maxParallel;
    this.transientRetries = options.transientRetries ?? DEFAULT_OPTIONS.transientRetries;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_OPTIONS.retryDelayMs;
    this.defaultCategory = options.defaultCategory ?? DEFAULT_OPTIONS.defaultCategory;
    this.validator = options.validator ?? new FormValidator();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Extract pages already in memory. Page indices are 1-based, in input order.
   */
  async extractFormSet(images: readonly ImagePayload[]): Promise<FormSetResult> {
    return this.run(images);
  }

  /**
   * Load page images from disk first; a file that cannot be loaded becomes
   * an InvalidInput error for that page
   */
  async extractFiles(imagePaths: readonly string[]): Promise<FormSetResult> {
    const entries = await Promise.all(
      imagePaths.map(async (imagePath, i): Promise<ImagePayload | ExtractionError> => {
        try {
          return await loadImagePayload(imagePath);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn(`Cannot load page ${i + 1} (${imagePath})`, { message });
          return new ExtractionError('InvalidInput', i + 1, message);
        }
      })
    );
    return this.run(entries);
  }

  private async run(entries: readonly (ImagePayload | ExtractionError)[]): Promise<FormSetResult> {
    const startTime = Date.now();

    const { results } = await runBounded(
      entries,
      (entry, i) => (entry instanceof ExtractionError ? Promise.resolve(entry) : this.extractWithRetry(entry, i + 1)),
      { concurrency: this.maxParallel }
    );

    const outcomes = results.filter((outcome): outcome is PageRecord | ExtractionError => outcome !== undefined);
    const { forms, errors } = consolidateFormSet(outcomes);

    const validated = forms.map(form => {
      const category = form.formInfo.formType ?? this.defaultCategory;
      return { ...form, validation: this.validator.validate(form, category) };
    });

    logger.info(`Form set extracted: ${validated.length} form(s) from ${entries.length} page(s)`, {
      model: this.pageExtractor.modelName,
      pageErrors: errors.length,
      durationMs: Date.now() - startTime,
    });

    return { forms: validated, pageErrors: errors, pagesProcessed: entries.length };
  }

  private async extractWithRetry(image: ImagePayload, pageIndex: number): Promise<PageRecord | ExtractionError> {
    let outcome = await this.pageExtractor.extract(image, pageIndex);

    for (let attempt = 0; attempt < this.transientRetries; attempt++) {
      if (!(outcome instanceof ExtractionError) || !outcome.retryable) {
        break;
      }
      const delay = this.retryDelayMs * Math.pow(2, attempt);
      logger.info(`Retrying page ${pageIndex} in ${delay}ms (attempt ${attempt + 2}/${this.transientRetries + 1})`);
      await this.sleep(delay);
      outcome = await this.pageExtractor.extract(image, pageIndex);
    }

    return outcome;
  }
}
