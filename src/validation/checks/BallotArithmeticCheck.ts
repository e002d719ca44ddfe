import type { ConsolidatedForm, ValidationCheck } from '../../types/forms.js';
import { BaseCheck } from './BaseCheck.js';

/**
 * ballotsUsed must equal valid + void + no-vote exactly. These are hand
 * counted totals, so there is no tolerance.
 */
export class BallotArithmeticCheck extends BaseCheck {
  readonly name = 'ballot_arithmetic' as const;

  run(form: ConsolidatedForm): ValidationCheck {
    const { ballotsUsed, validBallots, voidBallots, noVoteBallots } = form.ballotStatistics;

    if (ballotsUsed === null || validBallots === null || voidBallots === null || noVoteBallots === null) {
      const missing = this.missingFields(form.ballotStatistics, [
        'ballotsUsed',
        'validBallots',
        'voidBallots',
        'noVoteBallots',
      ]);
      return this.fail(`Cannot check ballot arithmetic, missing: ${missing.join(', ')}`, { missing });
    }

    const expected = validBallots + voidBallots + noVoteBallots;
    const delta = ballotsUsed - expected;

    if (delta !== 0) {
      return this.fail(
        `ballotsUsed (${ballotsUsed}) != valid + void + noVote (${expected}); delta ${delta}`,
        { delta }
      );
    }
    return this.pass(`ballotsUsed (${ballotsUsed}) = valid + void + noVote`, { delta });
  }
}
