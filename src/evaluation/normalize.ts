/**
 * Normalization applied before structural comparison
 */

import { FORM_INFO_FIELDS, type ConsolidatedForm } from '../types/forms.js';

/**
 * Trim, collapse internal whitespace and drop number formatting, so that
 * "  0012 " and "12", or "1,234" and "1234", compare equal
 */
export function normalizeText(value: string | null): string | null {
  if (value === null) return null;
  const collapsed = value.normalize('NFC').trim().replace(/\s+/g, ' ');
  if (collapsed === '') return null;
  const compact = collapsed.replace(/[,\s]/g, '');
  if (/^\d+$/.test(compact)) {
    return compact.replace(/^0+(?=\d)/, '');
  }
  return collapsed;
}

export interface ComparableForm {
  formInfo: Record<string, string | null>;
  voterStatistics: Record<string, number | null>;
  ballotStatistics: Record<string, number | null>;
  voteRows: Array<{
    number: number;
    candidateName: string | null;
    partyName: string | null;
    voteCount: number | null;
    voteCountText: string | null;
  }>;
}

/**
 * The parts of a form that carry extracted data, normalized. Validation
 * and source pages are left out; vote rows are ordered by number.
 */
export function toComparable(form: ConsolidatedForm): ComparableForm {
  const formInfo: Record<string, string | null> = {};
  for (const field of FORM_INFO_FIELDS) {
    formInfo[field] = normalizeText(form.formInfo[field]);
  }

  return {
    formInfo,
    voterStatistics: { ...form.voterStatistics },
    ballotStatistics: { ...form.ballotStatistics },
    voteRows: [...form.voteRows]
      .sort((a, b) => a.number - b.number)
      .map(row => ({
        number: row.number,
        candidateName: normalizeText(row.candidateName),
        partyName: normalizeText(row.partyName),
        voteCount: row.voteCount,
        voteCountText: normalizeText(row.voteCountText),
      })),
  };
}

/**
 * Plain-data deep equality (objects, arrays, primitives)
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  const aEntries = Object.entries(a);
  const bKeys = Object.keys(b);
  if (aEntries.length !== bKeys.length) return false;
  const bRecord = new Map(Object.entries(b));
  return aEntries.every(([key, value]) => bRecord.has(key) && deepEqual(value, bRecord.get(key)));
}
