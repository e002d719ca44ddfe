/**
 * Builders shared by the test suites
 */

import type {
  BallotStatistics,
  ConsolidatedForm,
  FormInfo,
  PageRecord,
  VoteRow,
  VoterStatistics,
} from '../types/forms.js';
import { emptyBallotStatistics, emptyFormInfo, emptyVoterStatistics } from '../types/forms.js';
import type { GenerationRequest, GenerationResult, GenerativeModel, ModelInfo } from '../extraction/types.js';

export type RowInput = Partial<VoteRow> & { number: number };

export function row(input: RowInput): VoteRow {
  return {
    candidateName: null,
    partyName: null,
    voteCount: null,
    voteCountText: null,
    ...input,
  };
}

export function page(
  pageIndex: number,
  parts: {
    formInfo?: Partial<FormInfo>;
    voterStatistics?: Partial<VoterStatistics> | null;
    ballotStatistics?: Partial<BallotStatistics> | null;
    voteRows?: RowInput[];
  } = {}
): PageRecord {
  return Object.freeze({
    pageIndex,
    formInfo: Object.freeze({ ...emptyFormInfo(), ...parts.formInfo }),
    voterStatistics: parts.voterStatistics ? Object.freeze({ ...emptyVoterStatistics(), ...parts.voterStatistics }) : null,
    ballotStatistics: parts.ballotStatistics ? Object.freeze({ ...emptyBallotStatistics(), ...parts.ballotStatistics }) : null,
    voteRows: Object.freeze((parts.voteRows ?? []).map(input => Object.freeze(row(input)))),
  });
}

export function form(
  parts: {
    formInfo?: Partial<FormInfo>;
    voterStatistics?: Partial<VoterStatistics>;
    ballotStatistics?: Partial<BallotStatistics>;
    voteRows?: RowInput[];
    sourcePages?: number[];
  } = {}
): ConsolidatedForm {
  return {
    formInfo: { ...emptyFormInfo(), ...parts.formInfo },
    voterStatistics: { ...emptyVoterStatistics(), ...parts.voterStatistics },
    ballotStatistics: { ...emptyBallotStatistics(), ...parts.ballotStatistics },
    voteRows: (parts.voteRows ?? []).map(row),
    sourcePages: parts.sourcePages ?? [],
  };
}

/**
 * A complete, arithmetically consistent Constituency form
 */
export function validConstituencyForm(): ConsolidatedForm {
  return form({
    formInfo: {
      formType: 'Constituency',
      date: '2026-03-01',
      province: 'North Province',
      district: 'River District',
      subDistrict: 'Old Town',
      constituencyNumber: '3',
      pollingStationNumber: '12',
    },
    voterStatistics: { eligibleVoters: 500, votersPresent: 320 },
    ballotStatistics: {
      ballotsAllocated: 400,
      ballotsUsed: 320,
      validBallots: 300,
      voidBallots: 12,
      noVoteBallots: 8,
      ballotsRemaining: 80,
    },
    voteRows: [
      { number: 1, candidateName: 'Candidate One', partyName: 'Party Red', voteCount: 150 },
      { number: 2, candidateName: 'Candidate Two', partyName: 'Party Blue', voteCount: 100 },
      { number: 3, candidateName: 'Candidate Three', partyName: 'Party Green', voteCount: 50 },
    ],
    sourcePages: [1, 2],
  });
}

type Responder = (request: GenerationRequest, call: number) => string | Promise<string>;

/**
 * In-process GenerativeModel; the responder returns the text or throws
 */
export class FakeModel implements GenerativeModel {
  readonly name: string;
  readonly requests: GenerationRequest[] = [];
  private readonly responder: Responder;

  constructor(responder: Responder, name = 'fake-model') {
    this.responder = responder;
    this.name = name;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const text = await this.responder(request, this.requests.length);
    return { text, model: this.name, provider: 'fake', processing_time_ms: 1 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  getModelInfo(): ModelInfo {
    return { name: this.name, provider: 'fake' };
  }
}
