/**
 * Form Validator
 *
 * Runs the category's declared checks over a consolidated form and rolls
 * them into an `all_checks` composite. Never throws: a check that fails to
 * run is reported as failing with the error message as its reason.
 */

import type { ConsolidatedForm, FormCategory, ValidationCheck, ValidationReport } from '../types/forms.js';
import { COMPOSITE_CHECK_NAME } from './types.js';
import { BaseCheck } from './checks/BaseCheck.js';
import { CompletenessCheck } from './checks/CompletenessCheck.js';
import { BallotArithmeticCheck } from './checks/BallotArithmeticCheck.js';
import { VoteSumCheck } from './checks/VoteSumCheck.js';
import { NonNegativeCheck } from './checks/NonNegativeCheck.js';
import { VoteRowsPresentCheck } from './checks/VoteRowsPresentCheck.js';
import { logger } from '../utils/logger.js';

export class FormValidator {
  private readonly checks: readonly BaseCheck[];

  constructor(checks?: readonly BaseCheck[]) {
    this.checks = checks ?? [
      new CompletenessCheck(),
      new BallotArithmeticCheck(),
      new VoteSumCheck(),
      new NonNegativeCheck(),
      new VoteRowsPresentCheck(),
    ];
  }

  /**
   * Names every report for this category contains, in report order
   */
  checkNamesFor(category: FormCategory): string[] {
    return [
      ...this.checks.filter(check => check.appliesTo(category)).map(check => check.name),
      COMPOSITE_CHECK_NAME,
    ];
  }

  validate(form: ConsolidatedForm, category: FormCategory): ValidationReport {
    const results: ValidationCheck[] = [];

    for (const check of this.checks) {
      if (!check.appliesTo(category)) continue;
      results.push(this.runCheck(check, form, category));
    }

    const passedCount = results.filter(result => result.passed).length;
    const total = results.length;
    const score = total === 0 ? 1 : passedCount / total;
    const passed = passedCount === total;

    const composite: ValidationCheck = {
      name: COMPOSITE_CHECK_NAME,
      passed,
      reason: `${passedCount}/${total} checks passed`,
      score,
      details: { passed: passedCount, total },
    };

    return Object.freeze({
      category,
      checks: Object.freeze([...results, composite].map(result => Object.freeze(result))),
      passed,
      score,
    });
  }

  private runCheck(check: BaseCheck, form: ConsolidatedForm, category: FormCategory): ValidationCheck {
    try {
      return check.run(form, category);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Check ${check.name} threw`, error);
      return { name: check.name, passed: false, reason: `Check failed to run: ${message}`, score: 0 };
    }
  }
}

/**
 * Validate a form and return a copy with the report attached
 */
export function attachValidation(
  form: ConsolidatedForm,
  category: FormCategory,
  validator: FormValidator = new FormValidator()
): ConsolidatedForm {
  return { ...form, validation: validator.validate(form, category) };
}
