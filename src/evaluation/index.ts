export * from './types.js';
export {
  EVALUATOR_NAMES,
  SCORED_BALLOT_FIELDS,
  ballotAccuracyScore,
  createDefaultEvaluators,
  defineEvaluator,
  exactFormMatch,
  hasNoErrors,
  runEvaluators,
  voteQualityLabel,
  voteResultsQuality,
} from './evaluators.js';
export type { VoteQualityLabel } from './evaluators.js';
export { LLMJudge, JUDGE_RESPONSE_SCHEMA, JudgeVerdictSchema, buildJudgePrompt, parseJudgeVerdict } from './LLMJudge.js';
export type { JudgeVerdict, LLMJudgeOptions } from './LLMJudge.js';
export { deepEqual, normalizeText, toComparable } from './normalize.js';
