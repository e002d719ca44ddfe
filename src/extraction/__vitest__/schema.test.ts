/**
 * Test file for the page response schema
 */
import { describe, it, expect } from 'vitest';
import { extractJsonText, parsePageResponse, toPageRecord } from '../schema.js';

describe('parsePageResponse', () => {
  it('coerces counts, blanks and form type spellings', () => {
    const outcome = parsePageResponse(
      JSON.stringify({
        form_info: { form_type: 'party list', province: '  North   Province ', district: 'null', polling_station_number: 12 },
        ballot_statistics: { ballots_used: '1,234', good_ballots: ' 1200 ', bad_ballots: 20, no_vote_ballots: '' },
        vote_results: [{ number: '1', party_name: 'Party Red', vote_count: '600' }],
      })
    );

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    const record = toPageRecord(outcome.data, 2, 'p2.png');

    expect(record.pageIndex).toBe(2);
    expect(record.sourceName).toBe('p2.png');
    expect(record.formInfo.formType).toBe('PartyList');
    expect(record.formInfo.province).toBe('North Province');
    expect(record.formInfo.district).toBeNull();
    expect(record.formInfo.pollingStationNumber).toBe('12');
    expect(record.voterStatistics).toBeNull();
    expect(record.ballotStatistics).toEqual({
      ballotsAllocated: null,
      ballotsUsed: 1234,
      validBallots: 1200,
      voidBallots: 20,
      noVoteBallots: null,
      ballotsRemaining: null,
    });
    expect(record.voteRows).toEqual([
      { number: 1, candidateName: null, partyName: 'Party Red', voteCount: 600, voteCountText: null },
    ]);
  });

  it('maps an unknown form type to null', () => {
    const outcome = parsePageResponse('{"form_info": {"form_type": "Referendum"}, "vote_results": []}');

    expect(outcome.success && outcome.data.form_info?.form_type).toBeNull();
  });

  it('produces frozen records', () => {
    const outcome = parsePageResponse('{"vote_results": [{"number": 1, "vote_count": 5}]}');
    if (!outcome.success) throw new Error(outcome.reason);
    const record = toPageRecord(outcome.data, 1);

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.voteRows[0])).toBe(true);
  });

  it('rejects a response without vote_results', () => {
    const outcome = parsePageResponse('{"form_info": {}}');

    expect(outcome).toEqual({ success: false, reason: 'vote_results: Required' });
  });

  it('rejects a non-numeric vote count with its path', () => {
    const outcome = parsePageResponse('{"vote_results": [{"number": 1, "vote_count": "many"}]}');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.reason.startsWith('vote_results.0.vote_count: ')).toBe(true);
    }
  });

  it('rejects text that is not JSON', () => {
    const outcome = parsePageResponse('Sorry, I cannot read this page.');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.reason.startsWith('Response is not valid JSON: ')).toBe(true);
    }
  });
});

describe('extractJsonText', () => {
  it('unwraps a fenced code block', () => {
    expect(extractJsonText('Here you go:\n```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('trims prose around a bare object', () => {
    expect(extractJsonText('Result: {"a": {"b": 2}} done')).toBe('{"a": {"b": 2}}');
  });
});
