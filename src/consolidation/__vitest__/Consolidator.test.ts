/**
 * Test file for the page consolidator
 */
import { describe, it, expect } from 'vitest';
import { consolidate, consolidateFormSet, groupPagesIntoForms } from '../Consolidator.js';
import { ExtractionError } from '../../extraction/ExtractionError.js';
import { page } from '../../__vitest__/fixtures.js';

describe('consolidate', () => {
  const first = page(1, {
    formInfo: { formType: 'Constituency', province: 'Alpha' },
    ballotStatistics: { validBallots: 90 },
  });
  const second = page(2, {
    formInfo: { formType: 'Constituency', province: 'Beta' },
    ballotStatistics: { validBallots: 95 },
  });

  it('keeps the first non-null value in page order', () => {
    const merged = consolidate([first, second]);

    expect(merged.formInfo.province).toBe('Alpha');
    expect(merged.ballotStatistics.validBallots).toBe(90);
  });

  it('lets the page order decide which conflicting value wins', () => {
    const merged = consolidate([second, first]);

    expect(merged.formInfo.province).toBe('Beta');
    expect(merged.ballotStatistics.validBallots).toBe(95);
    expect(merged.sourcePages).toEqual([1, 2]);
  });

  it('fills fields left null by earlier pages', () => {
    const merged = consolidate([
      page(1, { formInfo: { district: 'D1' }, voterStatistics: { eligibleVoters: 500 } }),
      page(2, { formInfo: { province: 'P', district: 'D2' }, voterStatistics: { votersPresent: 320 } }),
    ]);

    expect(merged.formInfo.province).toBe('P');
    expect(merged.formInfo.district).toBe('D1');
    expect(merged.voterStatistics).toEqual({ eligibleVoters: 500, votersPresent: 320 });
  });

  it('merges vote rows by number without summing counts', () => {
    const merged = consolidate([
      page(1, {
        voteRows: [
          { number: 2, candidateName: 'Cand B', voteCount: 40 },
          { number: 1, voteCount: 50 },
        ],
      }),
      page(2, {
        voteRows: [
          { number: 1, candidateName: 'Cand A', voteCount: 55, voteCountText: 'fifty' },
          { number: 3, voteCount: 5 },
        ],
      }),
    ]);

    expect(merged.voteRows.map(r => r.number)).toEqual([2, 1, 3]);
    expect(merged.voteRows[1]).toEqual({
      number: 1,
      candidateName: 'Cand A',
      partyName: null,
      voteCount: 50,
      voteCountText: 'fifty',
    });
    expect(merged.voteRows[0].voteCount).toBe(40);
    expect(merged.voteRows[2].voteCount).toBe(5);
  });

  it('is idempotent for a repeated page', () => {
    const single = page(4, {
      formInfo: { province: 'Alpha' },
      voteRows: [{ number: 1, voteCount: 10 }],
    });

    expect(consolidate([single, single])).toEqual(consolidate([single]));
    expect(consolidate([single, single]).sourcePages).toEqual([4]);
  });

  it('returns an all-null form for no pages', () => {
    const merged = consolidate([]);

    expect(Object.values(merged.formInfo).every(v => v === null)).toBe(true);
    expect(Object.values(merged.voterStatistics).every(v => v === null)).toBe(true);
    expect(Object.values(merged.ballotStatistics).every(v => v === null)).toBe(true);
    expect(merged.voteRows).toEqual([]);
    expect(merged.sourcePages).toEqual([]);
  });

  it('does not share row objects with the input pages', () => {
    const input = page(1, { voteRows: [{ number: 1, voteCount: 10 }] });
    const merged = consolidate([input]);
    merged.voteRows[0].voteCount = 99;

    expect(input.voteRows[0].voteCount).toBe(10);
  });
});

describe('groupPagesIntoForms', () => {
  it('starts a new form when the form type changes', () => {
    const pages = [
      page(1, { formInfo: { formType: 'Constituency' } }),
      page(2),
      page(3),
      page(4, { formInfo: { formType: 'PartyList' } }),
      page(5),
      page(6, { formInfo: { formType: 'PartyList' } }),
    ];

    const groups = groupPagesIntoForms(pages);

    expect(groups.map(g => g.map(p => p.pageIndex))).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('keeps untyped leading pages with the first typed page', () => {
    const groups = groupPagesIntoForms([page(1), page(2, { formInfo: { formType: 'PartyList' } })]);

    expect(groups).toHaveLength(1);
  });

  it('returns no groups for no pages', () => {
    expect(groupPagesIntoForms([])).toEqual([]);
  });
});

describe('consolidateFormSet', () => {
  it('leaves failed pages out and reports them sorted', () => {
    const failure3 = new ExtractionError('SchemaViolation', 3, 'bad json');
    const failure2 = new ExtractionError('Transient', 2, 'timeout');

    const { forms, errors } = consolidateFormSet([
      page(4, { formInfo: { province: 'Late' } }),
      failure3,
      page(1, { formInfo: { province: 'Early' } }),
      failure2,
    ]);

    expect(errors).toEqual([failure2, failure3]);
    expect(forms).toHaveLength(1);
    expect(forms[0].formInfo.province).toBe('Early');
    expect(forms[0].sourcePages).toEqual([1, 4]);
  });

  it('yields one empty form when every page failed', () => {
    const { forms, errors } = consolidateFormSet([new ExtractionError('Provider', 1, 'denied')]);

    expect(errors).toHaveLength(1);
    expect(forms).toEqual([consolidate([])]);
  });

  it('builds two forms for a six-page set with two form types', () => {
    const { forms } = consolidateFormSet([
      page(1, { formInfo: { formType: 'Constituency', province: 'North' }, ballotStatistics: { ballotsUsed: 100 } }),
      page(2, { voteRows: [{ number: 1, voteCount: 60 }] }),
      page(3, { voteRows: [{ number: 2, voteCount: 30 }] }),
      page(4, { formInfo: { formType: 'PartyList', province: 'North' }, ballotStatistics: { ballotsUsed: 101 } }),
      page(5, { voteRows: [{ number: 1, voteCount: 70 }] }),
      page(6, { voteRows: [{ number: 2, voteCount: 20 }] }),
    ]);

    expect(forms).toHaveLength(2);
    expect(forms[0].formInfo.formType).toBe('Constituency');
    expect(forms[0].ballotStatistics.ballotsUsed).toBe(100);
    expect(forms[0].voteRows.map(r => r.voteCount)).toEqual([60, 30]);
    expect(forms[1].formInfo.formType).toBe('PartyList');
    expect(forms[1].ballotStatistics.ballotsUsed).toBe(101);
    expect(forms[1].sourcePages).toEqual([4, 5, 6]);
  });
});
