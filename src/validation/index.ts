export { FormValidator, attachValidation } from './FormValidator.js';
export { BaseCheck } from './checks/BaseCheck.js';
export { CompletenessCheck, REQUIRED_HEADER_FIELDS } from './checks/CompletenessCheck.js';
export { BallotArithmeticCheck } from './checks/BallotArithmeticCheck.js';
export { VoteSumCheck } from './checks/VoteSumCheck.js';
export { NonNegativeCheck } from './checks/NonNegativeCheck.js';
export { VoteRowsPresentCheck } from './checks/VoteRowsPresentCheck.js';
export { COMPOSITE_CHECK_NAME } from './types.js';
export type { CheckName, FormCheck } from './types.js';
