import type { ConsolidatedForm, FormCategory, FormInfo, ValidationCheck } from '../../types/forms.js';
import { BaseCheck } from './BaseCheck.js';

type RequiredHeaderField = keyof Omit<FormInfo, 'formType'>;

export const REQUIRED_HEADER_FIELDS: Record<FormCategory, readonly RequiredHeaderField[]> = {
  Constituency: ['province', 'district', 'constituencyNumber', 'pollingStationNumber'],
  PartyList: ['province', 'district', 'pollingStationNumber'],
};

/**
 * Every required header field for the category is present
 */
export class CompletenessCheck extends BaseCheck {
  readonly name = 'completeness' as const;

  run(form: ConsolidatedForm, category: FormCategory): ValidationCheck {
    const required = REQUIRED_HEADER_FIELDS[category];
    const missing = this.missingFields(form.formInfo, required);
    const score = (required.length - missing.length) / required.length;

    if (missing.length > 0) {
      return this.createResult(false, `Missing required field(s): ${missing.join(', ')}`, score, { missing });
    }
    return this.createResult(true, `All ${required.length} required fields present`, score);
  }
}
