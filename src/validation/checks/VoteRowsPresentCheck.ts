import type { ConsolidatedForm, ValidationCheck } from '../../types/forms.js';
import { BaseCheck } from './BaseCheck.js';

export class VoteRowsPresentCheck extends BaseCheck {
  readonly name = 'vote_rows_present' as const;

  run(form: ConsolidatedForm): ValidationCheck {
    const count = form.voteRows.length;
    return count > 0 ? this.pass(`${count} vote row(s) extracted`, { rows: count }) : this.fail('No vote rows extracted');
  }
}
