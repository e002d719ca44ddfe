/**
 * Tally form types shared by extraction, consolidation, validation and evaluation
 */

export type FormCategory = 'Constituency' | 'PartyList';

export const FORM_CATEGORIES: readonly FormCategory[] = ['Constituency', 'PartyList'];

/**
 * Header information identifying the polling station
 */
export interface FormInfo {
  formType: FormCategory | null;
  date: string | null;
  province: string | null;
  district: string | null;
  subDistrict: string | null;
  constituencyNumber: string | null;
  pollingStationNumber: string | null;
}

/**
 * Section 1: voter statistics
 */
export interface VoterStatistics {
  eligibleVoters: number | null;
  votersPresent: number | null;
}

/**
 * Section 2: ballot accounting
 */
export interface BallotStatistics {
  ballotsAllocated: number | null;
  ballotsUsed: number | null;
  validBallots: number | null;
  voidBallots: number | null;
  noVoteBallots: number | null;
  ballotsRemaining: number | null;
}

/**
 * One row of the candidate/party vote table
 */
export interface VoteRow {
  number: number;
  candidateName: string | null;
  partyName: string | null;
  voteCount: number | null;
  voteCountText: string | null;
}

/**
 * One page's fields as extracted by the model. Immutable once produced.
 */
export interface PageRecord {
  readonly pageIndex: number;
  readonly sourceName?: string;
  readonly formInfo: Readonly<FormInfo>;
  readonly voterStatistics: Readonly<VoterStatistics> | null;
  readonly ballotStatistics: Readonly<BallotStatistics> | null;
  readonly voteRows: readonly Readonly<VoteRow>[];
}

export interface ValidationCheck {
  name: string;
  passed: boolean;
  reason: string;
  /** 0-1 */
  score: number;
  /** Numbers behind the verdict, e.g. the arithmetic delta */
  details?: Record<string, number | string[]>;
}

export interface ValidationReport {
  readonly category: FormCategory;
  readonly checks: readonly ValidationCheck[];
  readonly passed: boolean;
  readonly score: number;
}

/**
 * Merged result for one logical form
 */
export interface ConsolidatedForm {
  formInfo: FormInfo;
  voterStatistics: VoterStatistics;
  ballotStatistics: BallotStatistics;
  voteRows: VoteRow[];
  sourcePages: number[];
  validation?: ValidationReport;
}

export const FORM_INFO_FIELDS = [
  'formType',
  'date',
  'province',
  'district',
  'subDistrict',
  'constituencyNumber',
  'pollingStationNumber',
] as const satisfies readonly (keyof FormInfo)[];

export const VOTER_STATISTICS_FIELDS = [
  'eligibleVoters',
  'votersPresent',
] as const satisfies readonly (keyof VoterStatistics)[];

export const BALLOT_STATISTICS_FIELDS = [
  'ballotsAllocated',
  'ballotsUsed',
  'validBallots',
  'voidBallots',
  'noVoteBallots',
  'ballotsRemaining',
] as const satisfies readonly (keyof BallotStatistics)[];

export const VOTE_ROW_OPTIONAL_FIELDS = [
  'candidateName',
  'partyName',
  'voteCount',
  'voteCountText',
] as const satisfies readonly (keyof VoteRow)[];

export function emptyFormInfo(): FormInfo {
  return {
    formType: null,
    date: null,
    province: null,
    district: null,
    subDistrict: null,
    constituencyNumber: null,
    pollingStationNumber: null,
  };
}

export function emptyVoterStatistics(): VoterStatistics {
  return { eligibleVoters: null, votersPresent: null };
}

export function emptyBallotStatistics(): BallotStatistics {
  return {
    ballotsAllocated: null,
    ballotsUsed: null,
    validBallots: null,
    voidBallots: null,
    noVoteBallots: null,
    ballotsRemaining: null,
  };
}

export function isFormCategory(value: unknown): value is FormCategory {
  return value === 'Constituency' || value === 'PartyList';
}
