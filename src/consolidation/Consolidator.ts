/**
 * Consolidator - merges page records into logical forms
 *
 * Merge rules:
 * 1. Header, voter and ballot fields: first non-null value wins, in page order
 * 2. Vote rows are keyed by candidate number; a repeated number only fills
 *    sub-fields that are still null. Counts are never summed, since every
 *    page repeats the same cumulative table.
 * 3. Rows keep the order in which their number first appeared
 */

import {
  BALLOT_STATISTICS_FIELDS,
  FORM_INFO_FIELDS,
  VOTER_STATISTICS_FIELDS,
  VOTE_ROW_OPTIONAL_FIELDS,
  emptyBallotStatistics,
  emptyFormInfo,
  emptyVoterStatistics,
  type ConsolidatedForm,
  type FormCategory,
  type PageRecord,
  type VoteRow,
} from '../types/forms.js';
import { ExtractionError } from '../extraction/ExtractionError.js';

/**
 * Copy each field of `source` onto `target` where `target` is still null
 */
function fillNulls<T extends object, K extends keyof T>(
  target: T,
  source: Readonly<T> | null,
  fields: readonly K[]
): void {
  if (!source) return;
  for (const field of fields) {
    if (target[field] === null && source[field] !== null && source[field] !== undefined) {
      target[field] = source[field];
    }
  }
}

/**
 * Accumulates pages for one logical form
 */
export class FormAccumulator {
  private readonly form: ConsolidatedForm = {
    formInfo: emptyFormInfo(),
    voterStatistics: emptyVoterStatistics(),
    ballotStatistics: emptyBallotStatistics(),
    voteRows: [],
    sourcePages: [],
  };
  private readonly rowsByNumber = new Map<number, VoteRow>();

  get formType(): FormCategory | null {
    return this.form.formInfo.formType;
  }

  get pageCount(): number {
    return this.form.sourcePages.length;
  }

  addPage(page: PageRecord): void {
    fillNulls(this.form.formInfo, page.formInfo, FORM_INFO_FIELDS);
    fillNulls(this.form.voterStatistics, page.voterStatistics, VOTER_STATISTICS_FIELDS);
    fillNulls(this.form.ballotStatistics, page.ballotStatistics, BALLOT_STATISTICS_FIELDS);

    for (const row of page.voteRows) {
      const existing = this.rowsByNumber.get(row.number);
      if (existing) {
        fillNulls(existing, row, VOTE_ROW_OPTIONAL_FIELDS);
      } else {
        const copy: VoteRow = { ...row };
        this.rowsByNumber.set(row.number, copy);
        this.form.voteRows.push(copy);
      }
    }

    if (!this.form.sourcePages.includes(page.pageIndex)) {
      this.form.sourcePages.push(page.pageIndex);
    }
  }

  build(): ConsolidatedForm {
    return {
      formInfo: { ...this.form.formInfo },
      voterStatistics: { ...this.form.voterStatistics },
      ballotStatistics: { ...this.form.ballotStatistics },
      voteRows: this.form.voteRows.map(row => ({ ...row })),
      sourcePages: [...this.form.sourcePages].sort((a, b) => a - b),
    };
  }
}

/**
 * Merge pages, in the order given, into one form. An empty list yields
 * a form with every field null and no rows.
 */
export function consolidate(pages: readonly PageRecord[]): ConsolidatedForm {
  const accumulator = new FormAccumulator();
  for (const page of pages) {
    accumulator.addPage(page);
  }
  return accumulator.build();
}

/**
 * Split pages into logical forms. A page whose form type differs from the
 * type already established for the current group starts a new group; pages
 * without a form type stay with the current group.
 */
export function groupPagesIntoForms(pages: readonly PageRecord[]): PageRecord[][] {
  const groups: PageRecord[][] = [];
  let current: PageRecord[] = [];
  let currentType: FormCategory | null = null;

  for (const page of pages) {
    const pageType = page.formInfo.formType;
    if (pageType !== null && currentType !== null && pageType !== currentType) {
      groups.push(current);
      current = [];
      currentType = null;
    }
    if (pageType !== null && currentType === null) {
      currentType = pageType;
    }
    current.push(page);
  }

  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

export interface FormSetConsolidation {
  forms: ConsolidatedForm[];
  errors: ExtractionError[];
}

/**
 * Consolidate a whole form set. Failed pages are left out and reported;
 * the remaining pages are sorted by page index, grouped and merged.
 * Always yields at least one form so validation has something to report on.
 */
export function consolidateFormSet(
  outcomes: readonly (PageRecord | ExtractionError)[]
): FormSetConsolidation {
  const errors: ExtractionError[] = [];
  const pages: PageRecord[] = [];

  for (const outcome of outcomes) {
    if (outcome instanceof ExtractionError) {
      errors.push(outcome);
    } else {
      pages.push(outcome);
    }
  }

  pages.sort((a, b) => a.pageIndex - b.pageIndex);
  errors.sort((a, b) => a.pageIndex - b.pageIndex);

  const groups = groupPagesIntoForms(pages);
  const forms = groups.length > 0 ? groups.map(consolidate) : [consolidate([])];

  return { forms, errors };
}
