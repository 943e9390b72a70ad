export { DecisionEngine, type DecisionEngineOptions } from './loans/engine.js';
export { findApprovableLoan, highestValidLoanAmount, type SearchLimits } from './loans/limits.js';
export { resolveCreditModifier } from './loans/credit.js';
export { toDecisionResponse } from './loans/response.js';
export {
  DecisionError,
  InvalidPersonalCodeError,
  InvalidLoanAmountError,
  InvalidLoanPeriodError,
  NoValidLoanError,
  isDecisionError,
} from './loans/errors.js';
export type {
  ApprovedLoan,
  CreditModifier,
  CreditSegment,
  Decision,
  DecisionErrorCode,
  DecisionResponse,
  LoanRequest,
} from './loans/types.js';
export { EstonianPersonalCodeDecoder } from './identity/estonian.js';
export { type PersonalCodeDecoder, PersonalCodeFormatError } from './identity/types.js';
export {
  ConfigError,
  DEFAULT_DECISION_CONFIG,
  getDecisionConfig,
  loadDecisionConfig,
  resetDecisionConfigCache,
  type DecisionConfig,
} from './config/index.js';
