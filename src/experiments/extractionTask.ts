/**
 * The extraction task run for each (record, configuration) pair:
 * extract every page, consolidate, validate, then pick the form that is
 * compared against the record's expected form.
 */

import type { GenerativeModel } from '../extraction/types.js';
import type { ConsolidatedForm } from '../types/forms.js';
import type { ExtractionOutput } from '../evaluation/types.js';
import type { ExtractionTask } from './types.js';
import { PageExtractor } from '../extraction/PageExtractor.js';
import { FormSetExtractor, type FormSetExtractorOptions } from '../extraction/FormSetExtractor.js';
import { consolidate } from '../consolidation/Consolidator.js';

export interface ExtractionTaskOptions {
  /** Builds the extraction model for a registry key */
  createModel: (modelKey: string) => GenerativeModel;
  extractor?: FormSetExtractorOptions;
  pageTimeoutMs?: number;
}

/**
 * The form whose type matches the expected form, else the first form,
 * else an empty form
 */
export function selectFormForComparison(
  forms: readonly ConsolidatedForm[],
  expected: ConsolidatedForm
): ConsolidatedForm {
  const expectedType = expected.formInfo.formType;
  const matching = expectedType === null ? undefined : forms.find(form => form.formInfo.formType === expectedType);
  return matching ?? forms[0] ?? consolidate([]);
}

export function createExtractionTask(options: ExtractionTaskOptions): ExtractionTask {
  const models = new Map<string, GenerativeModel>();

  const modelFor = (modelKey: string): GenerativeModel => {
    let model = models.get(modelKey);
    if (!model) {
      model = options.createModel(modelKey);
      models.set(modelKey, model);
    }
    return model;
  };

  return async (input, expected, configuration): Promise<ExtractionOutput> => {
    if (input.imagePaths.length === 0) {
      throw new Error(`Form set ${input.formSetName} has no page images`);
    }

    const pageExtractor = new PageExtractor(modelFor(configuration.modelKey), {
      temperature: configuration.temperature,
      timeoutMs: options.pageTimeoutMs,
    });
    const extractor = new FormSetExtractor(pageExtractor, options.extractor);
    const result = await extractor.extractFiles(input.imagePaths);

    if (result.pageErrors.length === result.pagesProcessed) {
      const kinds = [...new Set(result.pageErrors.map(error => error.kind))].join(', ');
      throw new Error(`All ${result.pagesProcessed} page(s) of ${input.formSetName} failed (${kinds})`);
    }

    return {
      form: selectFormForComparison(result.forms, expected),
      forms: result.forms,
      pageErrors: result.pageErrors,
    };
  };
}
