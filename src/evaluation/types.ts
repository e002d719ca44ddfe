/**
 * Evaluation types
 */

import type { ConsolidatedForm } from '../types/forms.js';
import type { ExtractionError } from '../extraction/ExtractionError.js';

export type EvaluatorKind = 'boolean' | 'numeric' | 'categorical';

export type EvaluationValue = boolean | number | string;

export type FindingSeverity = 'minor' | 'major' | 'critical';

/**
 * One itemized discrepancy reported by the judge
 */
export interface JudgeFinding {
  field: string;
  expected: string;
  actual: string;
  severity: FindingSeverity;
}

export interface EvaluationResult {
  evaluator: string;
  kind: EvaluatorKind;
  /** Boolean verdict, ratio or label, depending on kind */
  value: EvaluationValue;
  /** Numeric view of the value in [0,1], used for aggregation */
  score: number;
  reason?: string;
  /** Judge only */
  reasoning?: string;
  /** Judge only */
  errors?: JudgeFinding[];
  /** The evaluator threw; value and score are placeholders */
  failed?: boolean;
}

/**
 * What a dataset record feeds the extraction task
 */
export interface ExtractionInput {
  formSetName: string;
  imagePaths: string[];
}

/**
 * What the extraction task hands to the evaluators
 */
export interface ExtractionOutput {
  /** The form compared against the expected one */
  form: ConsolidatedForm;
  /** Every logical form found in the form set */
  forms: ConsolidatedForm[];
  pageErrors: ExtractionError[];
}

export interface Evaluator {
  readonly name: string;
  readonly kind: EvaluatorKind;
  evaluate(
    input: ExtractionInput,
    output: ExtractionOutput,
    expected: ConsolidatedForm
  ): EvaluationResult | Promise<EvaluationResult>;
}
