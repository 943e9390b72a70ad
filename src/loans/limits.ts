import type { DecisionConfig } from '../config/index.js';
import { NoValidLoanError } from './errors.js';
import type { ApprovedLoan } from './types.js';

export type SearchLimits = Pick<DecisionConfig,
  'minimumLoanAmount' | 'maximumLoanAmount' | 'maximumLoanPeriod'>;

export function highestValidLoanAmount(creditModifier: number, loanPeriod: number): number {
  return creditModifier * loanPeriod;
}

/**
 * Find the shortest period, starting at the requested one, at which
 * modifier * period reaches the minimum amount.
 * - never goes below the requested period or above maximumLoanPeriod
 * - the approved amount is clamped to maximumLoanAmount
 * Throws NoValidLoanError when even maximumLoanPeriod is not enough.
 */
export function findApprovableLoan(creditModifier: number, requestedPeriod: number, limits: SearchLimits): ApprovedLoan {
  if (creditModifier <= 0) throw new NoValidLoanError();

  let loanPeriod = Math.min(requestedPeriod, limits.maximumLoanPeriod);
  let amount = highestValidLoanAmount(creditModifier, loanPeriod);
  while (amount < limits.minimumLoanAmount) {
    if (loanPeriod >= limits.maximumLoanPeriod) throw new NoValidLoanError();
    loanPeriod++;
    amount = highestValidLoanAmount(creditModifier, loanPeriod);
  }

  return { loanAmount: Math.min(amount, limits.maximumLoanAmount), loanPeriod };
}
