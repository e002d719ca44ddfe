import {
  BALLOT_STATISTICS_FIELDS,
  VOTER_STATISTICS_FIELDS,
  type ConsolidatedForm,
  type ValidationCheck,
} from '../../types/forms.js';
import { BaseCheck } from './BaseCheck.js';

/**
 * Every numeric field that is present is >= 0
 */
export class NonNegativeCheck extends BaseCheck {
  readonly name = 'non_negative' as const;

  run(form: ConsolidatedForm): ValidationCheck {
    const negative: string[] = [];

    for (const field of VOTER_STATISTICS_FIELDS) {
      const value = form.voterStatistics[field];
      if (value !== null && value < 0) negative.push(`${field}=${value}`);
    }
    for (const field of BALLOT_STATISTICS_FIELDS) {
      const value = form.ballotStatistics[field];
      if (value !== null && value < 0) negative.push(`${field}=${value}`);
    }
    for (const row of form.voteRows) {
      if (row.voteCount !== null && row.voteCount < 0) {
        negative.push(`voteRows[${row.number}].voteCount=${row.voteCount}`);
      }
    }

    if (negative.length > 0) {
      return this.fail(`Negative value(s): ${negative.join(', ')}`, { negative });
    }
    return this.pass('All numeric fields are non-negative');
  }
}
