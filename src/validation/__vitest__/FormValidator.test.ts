/**
 * Test file for FormValidator and its checks
 */
import { describe, it, expect } from 'vitest';
import { FormValidator, attachValidation } from '../FormValidator.js';
import { BaseCheck } from '../checks/BaseCheck.js';
import { BallotArithmeticCheck } from '../checks/BallotArithmeticCheck.js';
import { CompletenessCheck } from '../checks/CompletenessCheck.js';
import { NonNegativeCheck } from '../checks/NonNegativeCheck.js';
import { VoteSumCheck } from '../checks/VoteSumCheck.js';
import { COMPOSITE_CHECK_NAME } from '../types.js';
import type { ConsolidatedForm, ValidationCheck } from '../../types/forms.js';
import { form, validConstituencyForm } from '../../__vitest__/fixtures.js';

function withBallots(ballotsUsed: number): ConsolidatedForm {
  const base = validConstituencyForm();
  return { ...base, ballotStatistics: { ...base.ballotStatistics, ballotsUsed } };
}

function checkNamed(checks: readonly ValidationCheck[], name: string): ValidationCheck | undefined {
  return checks.find(check => check.name === name);
}

describe('FormValidator', () => {
  const validator = new FormValidator();

  it('passes every check on a consistent form', () => {
    const report = validator.validate(validConstituencyForm(), 'Constituency');

    expect(report.passed).toBe(true);
    expect(report.score).toBe(1);
    expect(report.checks.map(c => c.name)).toEqual([
      'completeness',
      'ballot_arithmetic',
      'vote_sum',
      'non_negative',
      'vote_rows_present',
      COMPOSITE_CHECK_NAME,
    ]);
  });

  it('reports the same check names for every form of a category', () => {
    const full = validator.validate(validConstituencyForm(), 'PartyList');
    const empty = validator.validate(form(), 'PartyList');

    expect(full.checks.map(c => c.name)).toEqual(validator.checkNamesFor('PartyList'));
    expect(empty.checks.map(c => c.name)).toEqual(validator.checkNamesFor('PartyList'));
  });

  it.each([
    [321, 1],
    [319, -1],
  ])('fails arithmetic when ballotsUsed is %i', (ballotsUsed, delta) => {
    const report = validator.validate(withBallots(ballotsUsed), 'Constituency');
    const arithmetic = checkNamed(report.checks, 'ballot_arithmetic');

    expect(arithmetic?.passed).toBe(false);
    expect(arithmetic?.details).toEqual({ delta });
    expect(arithmetic?.reason).toBe(`ballotsUsed (${ballotsUsed}) != valid + void + noVote (320); delta ${delta}`);
    expect(report.passed).toBe(false);
  });

  it('rolls check results into the composite', () => {
    const report = validator.validate(withBallots(321), 'Constituency');
    const composite = checkNamed(report.checks, COMPOSITE_CHECK_NAME);

    expect(composite).toEqual({
      name: COMPOSITE_CHECK_NAME,
      passed: false,
      reason: '4/5 checks passed',
      score: 0.8,
      details: { passed: 4, total: 5 },
    });
    expect(report.score).toBe(0.8);
  });

  it('reports a throwing check as failed instead of throwing', () => {
    class ExplodingCheck extends BaseCheck {
      readonly name = 'vote_sum' as const;
      run(): ValidationCheck {
        throw new Error('boom');
      }
    }
    const report = new FormValidator([new ExplodingCheck()]).validate(validConstituencyForm(), 'Constituency');

    expect(report.checks[0]).toEqual({
      name: 'vote_sum',
      passed: false,
      reason: 'Check failed to run: boom',
      score: 0,
    });
    expect(report.passed).toBe(false);
  });

  it('returns a frozen report', () => {
    const report = validator.validate(validConstituencyForm(), 'Constituency');

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.checks)).toBe(true);
  });

  it('attaches the report to a copy of the form', () => {
    const original = validConstituencyForm();
    const validated = attachValidation(original, 'Constituency', validator);

    expect(validated.validation?.passed).toBe(true);
    expect(original.validation).toBeUndefined();
  });
});

describe('CompletenessCheck', () => {
  const check = new CompletenessCheck();

  it('scores the share of required fields present', () => {
    const result = check.run(
      form({ formInfo: { province: 'North', district: '  ', pollingStationNumber: '7' } }),
      'Constituency'
    );

    expect(result.passed).toBe(false);
    expect(result.score).toBe(0.5);
    expect(result.reason).toBe('Missing required field(s): district, constituencyNumber');
  });

  it('does not require a constituency number on party-list forms', () => {
    const result = check.run(
      form({ formInfo: { province: 'North', district: 'River', pollingStationNumber: '7' } }),
      'PartyList'
    );

    expect(result.passed).toBe(true);
    expect(result.reason).toBe('All 3 required fields present');
  });
});

describe('BallotArithmeticCheck', () => {
  it('fails and names missing inputs', () => {
    const result = new BallotArithmeticCheck().run(form({ ballotStatistics: { ballotsUsed: 10, validBallots: 10 } }));

    expect(result.passed).toBe(false);
    expect(result.reason).toBe('Cannot check ballot arithmetic, missing: voidBallots, noVoteBallots');
  });
});

describe('VoteSumCheck', () => {
  const check = new VoteSumCheck();

  it('allows a sum below validBallots', () => {
    const result = check.run(
      form({ ballotStatistics: { validBallots: 100 }, voteRows: [{ number: 1, voteCount: 60 }, { number: 2, voteCount: 30 }] })
    );

    expect(result.passed).toBe(true);
    expect(result.reason).toBe('Vote sum 90 within validBallots 100');
  });

  it('fails when the sum exceeds validBallots', () => {
    const result = check.run(
      form({ ballotStatistics: { validBallots: 100 }, voteRows: [{ number: 1, voteCount: 70 }, { number: 2, voteCount: 40 }] })
    );

    expect(result.passed).toBe(false);
    expect(result.details).toEqual({ total: 110, excess: 10 });
  });

  it('fails when a row has no count', () => {
    const result = check.run(
      form({ ballotStatistics: { validBallots: 100 }, voteRows: [{ number: 1, voteCount: 10 }, { number: 2 }] })
    );

    expect(result.reason).toBe('Vote count missing for row(s): 2');
  });
});

describe('NonNegativeCheck', () => {
  it('lists every negative value', () => {
    const result = new NonNegativeCheck().run(
      form({ ballotStatistics: { voidBallots: -2 }, voteRows: [{ number: 3, voteCount: -1 }] })
    );

    expect(result.passed).toBe(false);
    expect(result.reason).toBe('Negative value(s): voidBallots=-2, voteRows[3].voteCount=-1');
  });
});
