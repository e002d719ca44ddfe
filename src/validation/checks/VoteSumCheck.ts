import type { ConsolidatedForm, ValidationCheck } from '../../types/forms.js';
import { BaseCheck } from './BaseCheck.js';

/**
 * Sum of vote counts must not exceed validBallots (nor eligibleVoters when
 * known). Equality is not required: struck-through rows can leave the sum
 * below validBallots.
 */
export class VoteSumCheck extends BaseCheck {
  readonly name = 'vote_sum' as const;

  run(form: ConsolidatedForm): ValidationCheck {
    const { validBallots } = form.ballotStatistics;
    if (validBallots === null) {
      return this.fail('Cannot check vote sum, missing: validBallots');
    }

    const uncounted = form.voteRows.filter(row => row.voteCount === null).map(row => String(row.number));
    if (uncounted.length > 0) {
      return this.fail(`Vote count missing for row(s): ${uncounted.join(', ')}`, { missing: uncounted });
    }

    const total = form.voteRows.reduce((sum, row) => sum + (row.voteCount ?? 0), 0);

    if (total > validBallots) {
      return this.fail(`Vote sum ${total} exceeds validBallots ${validBallots}`, {
        total,
        excess: total - validBallots,
      });
    }

    const { eligibleVoters } = form.voterStatistics;
    if (eligibleVoters !== null && total > eligibleVoters) {
      return this.fail(`Vote sum ${total} exceeds eligibleVoters ${eligibleVoters}`, {
        total,
        excess: total - eligibleVoters,
      });
    }

    return this.pass(`Vote sum ${total} within validBallots ${validBallots}`, { total });
  }
}
