/**
 * Base Check Abstract Class
 *
 * Common helpers for the form checks run by FormValidator.
 */

import type { ConsolidatedForm, FormCategory, ValidationCheck } from '../../types/forms.js';
import { FORM_CATEGORIES } from '../../types/forms.js';
import type { CheckName, FormCheck } from '../types.js';

export abstract class BaseCheck implements FormCheck {
  abstract readonly name: CheckName;

  /** Declared for every category unless a check narrows it */
  readonly categories: readonly FormCategory[] = FORM_CATEGORIES;

  abstract run(form: ConsolidatedForm, category: FormCategory): ValidationCheck;

  appliesTo(category: FormCategory): boolean {
    return this.categories.includes(category);
  }

  protected createResult(
    passed: boolean,
    reason: string,
    score: number = passed ? 1 : 0,
    details?: ValidationCheck['details']
  ): ValidationCheck {
    return {
      name: this.name,
      passed,
      reason,
      score,
      ...(details ? { details } : {}),
    };
  }

  protected pass(reason: string, details?: ValidationCheck['details']): ValidationCheck {
    return this.createResult(true, reason, 1, details);
  }

  protected fail(reason: string, details?: ValidationCheck['details']): ValidationCheck {
    return this.createResult(false, reason, 0, details);
  }

  /**
   * Names of the listed fields whose value is null, undefined or blank
   */
  protected missingFields<T extends object, K extends keyof T & string>(
    source: T,
    fields: readonly K[]
  ): K[] {
    return fields.filter(field => {
      const value = source[field];
      if (value === null || value === undefined) return true;
      return typeof value === 'string' && value.trim() === '';
    });
  }
}
