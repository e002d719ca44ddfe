/**
 * Validation types
 */

import type { ConsolidatedForm, FormCategory, ValidationCheck } from '../types/forms.js';

export type CheckName =
  | 'completeness'
  | 'ballot_arithmetic'
  | 'vote_sum'
  | 'non_negative'
  | 'vote_rows_present';

/** Name of the composite entry appended to every report */
export const COMPOSITE_CHECK_NAME = 'all_checks';

/**
 * A single named check over a consolidated form
 */
export interface FormCheck {
  readonly name: CheckName;
  /** Categories this check is declared for */
  readonly categories: readonly FormCategory[];
  run(form: ConsolidatedForm, category: FormCategory): ValidationCheck;
}
