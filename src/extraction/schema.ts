/**
 * Page output schema: the descriptor sent to the model and the zod schema
 * its JSON response is checked against
 */

import { z } from 'zod';
import type { FormCategory, PageRecord } from '../types/forms.js';

export const SCHEMA_VERSION = '1.1.0';

/**
 * Response schema for one page, in the OpenAPI subset Gemini accepts
 */
export const PAGE_RESPONSE_SCHEMA: Record<string, unknown> = {
  type: 'OBJECT',
  description: 'Fields visible on a single page of an election tally form.',
  properties: {
    form_info: {
      type: 'OBJECT',
      description: 'Header identifying the polling station. Only fill fields printed on this page.',
      properties: {
        form_type: {
          type: 'STRING',
          enum: ['Constituency', 'PartyList'],
          description: 'Constituency (candidates with names) or PartyList (parties only).',
        },
        date: { type: 'STRING', description: 'Date of election' },
        province: { type: 'STRING', description: 'Province name' },
        district: { type: 'STRING', description: 'District name' },
        sub_district: { type: 'STRING', description: 'Sub-district name' },
        constituency_number: { type: 'STRING', description: 'Constituency number' },
        polling_station_number: { type: 'STRING', description: 'Polling station (unit) number' },
      },
    },
    voter_statistics: {
      type: 'OBJECT',
      description: 'Section 1: voter statistics, if printed on this page.',
      properties: {
        eligible_voters: { type: 'INTEGER', description: 'Item 1.1: eligible voters' },
        voters_present: { type: 'INTEGER', description: 'Item 1.2: voters present' },
      },
    },
    ballot_statistics: {
      type: 'OBJECT',
      description: 'Section 2: ballot accounting, if printed on this page.',
      properties: {
        ballots_allocated: { type: 'INTEGER', description: 'Item 2.1: allocated ballots' },
        ballots_used: { type: 'INTEGER', description: 'Item 2.2: used ballots' },
        good_ballots: { type: 'INTEGER', description: 'Item 2.2.1: valid ballots' },
        bad_ballots: { type: 'INTEGER', description: 'Item 2.2.2: void ballots' },
        no_vote_ballots: { type: 'INTEGER', description: 'Item 2.2.3: no-vote ballots' },
        ballots_remaining: { type: 'INTEGER', description: 'Item 2.3: remaining ballots' },
      },
    },
    vote_results: {
      type: 'ARRAY',
      description: 'Section 3: rows of the vote table visible on this page, in printed order.',
      items: {
        type: 'OBJECT',
        properties: {
          number: { type: 'INTEGER', description: 'Candidate or party number' },
          candidate_name: { type: 'STRING', description: 'Candidate name (Constituency only)' },
          party_name: { type: 'STRING' },
          vote_count: { type: 'INTEGER' },
          vote_count_text: { type: 'STRING', description: 'Vote count written in words' },
        },
        required: ['number'],
      },
    },
  },
  required: ['vote_results'],
};

export const PAGE_EXTRACTION_PROMPT = `You are an expert data entry assistant for election tally forms.

The image above is ONE page of a multi-page tally report. Extract only what is printed on this page:
1. Header fields (form type, date, location, polling station) if this page carries the header.
2. Voter and ballot statistics if this page carries them.
3. Every row of the vote table visible on this page, in the order printed. Use digits for counts and copy the written-out count into vote_count_text.
4. Leave a field out (or null) when it is not on this page. Do not guess values from other pages.

Schema version: ${SCHEMA_VERSION}
Return ONLY the JSON object.`;

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'null';
}

const nullableText = z.preprocess(
  value => {
    if (isBlank(value)) return null;
    if (typeof value === 'number') return String(value);
    return typeof value === 'string' ? value.trim().replace(/\s+/g, ' ') : value;
  },
  z.string().nullable()
);

/**
 * Accepts integers and integer strings such as "1,234" or " 57 "
 */
function toCount(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const compact = value.replace(/[,\s]/g, '');
  return /^-?\d+$/.test(compact) ? Number(compact) : value;
}

const nullableCount = z.preprocess(
  value => (isBlank(value) ? null : toCount(value)),
  z.number().int().nullable()
);

const formType = z.preprocess(
  value => {
    if (isBlank(value)) return null;
    if (typeof value !== 'string') return value;
    const key = value.toLowerCase().replace(/[\s_-]/g, '');
    if (key === 'constituency') return 'Constituency';
    if (key === 'partylist') return 'PartyList';
    return null;
  },
  z.enum(['Constituency', 'PartyList']).nullable()
);

const optionalObject = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess(value => (value === undefined ? null : value), z.object(shape).nullable());

export const PageResponseSchema = z.object({
  form_info: optionalObject({
    form_type: formType,
    date: nullableText,
    province: nullableText,
    district: nullableText,
    sub_district: nullableText,
    constituency_number: nullableText,
    polling_station_number: nullableText,
  }),
  voter_statistics: optionalObject({
    eligible_voters: nullableCount,
    voters_present: nullableCount,
  }),
  ballot_statistics: optionalObject({
    ballots_allocated: nullableCount,
    ballots_used: nullableCount,
    good_ballots: nullableCount,
    bad_ballots: nullableCount,
    no_vote_ballots: nullableCount,
    ballots_remaining: nullableCount,
  }),
  vote_results: z.array(
    z.object({
      number: z.preprocess(toCount, z.number().int()),
      candidate_name: nullableText,
      party_name: nullableText,
      vote_count: nullableCount,
      vote_count_text: nullableText,
    })
  ),
});

export type PageResponse = z.infer<typeof PageResponseSchema>;

export type ParseOutcome =
  | { success: true; data: PageResponse }
  | { success: false; reason: string };

/**
 * Pull the JSON value out of a model response (handles markdown code blocks)
 */
export function extractJsonText(text: string): string {
  const jsonBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  const jsonText = (jsonBlockMatch ? jsonBlockMatch[1] : text).trim();
  const objectMatch = jsonText.match(/\{[\s\S]*\}/);
  return objectMatch ? objectMatch[0] : jsonText;
}

export function parsePageResponse(text: string): ParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonText(text));
  } catch (error) {
    return { success: false, reason: `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = PageResponseSchema.safeParse(json);
  if (!result.success) {
    return {
      success: false,
      reason: result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }
  return { success: true, data: result.data };
}

function freezeRecord<T extends object>(value: T): Readonly<T> {
  return Object.freeze(value);
}

/**
 * Map a validated page response onto the domain record
 */
export function toPageRecord(data: PageResponse, pageIndex: number, sourceName?: string): PageRecord {
  const info = data.form_info;
  const voters = data.voter_statistics;
  const ballots = data.ballot_statistics;
  const category: FormCategory | null = info?.form_type ?? null;

  return freezeRecord({
    pageIndex,
    sourceName,
    formInfo: freezeRecord({
      formType: category,
      date: info?.date ?? null,
      province: info?.province ?? null,
      district: info?.district ?? null,
      subDistrict: info?.sub_district ?? null,
      constituencyNumber: info?.constituency_number ?? null,
      pollingStationNumber: info?.polling_station_number ?? null,
    }),
    voterStatistics: voters
      ? freezeRecord({
          eligibleVoters: voters.eligible_voters,
          votersPresent: voters.voters_present,
        })
      : null,
    ballotStatistics: ballots
      ? freezeRecord({
          ballotsAllocated: ballots.ballots_allocated,
          ballotsUsed: ballots.ballots_used,
          validBallots: ballots.good_ballots,
          voidBallots: ballots.bad_ballots,
          noVoteBallots: ballots.no_vote_ballots,
          ballotsRemaining: ballots.ballots_remaining,
        })
      : null,
    voteRows: Object.freeze(
      data.vote_results.map(row =>
        freezeRecord({
          number: row.number,
          candidateName: row.candidate_name,
          partyName: row.party_name,
          voteCount: row.vote_count,
          voteCountText: row.vote_count_text,
        })
      )
    ),
  });
}
