import type { Decision, DecisionResponse } from './types.js';

export function toDecisionResponse(decision: Decision): DecisionResponse {
  if (decision.approved) {
    return { loanAmount: decision.loanAmount, loanPeriod: decision.loanPeriod, errorMessage: null };
  }
  return { loanAmount: null, loanPeriod: null, errorMessage: decision.errorMessage };
}
