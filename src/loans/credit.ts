import type { DecisionConfig } from '../config/index.js';
import type { CreditModifier } from './types.js';

/**
 * Credit modifier from the last four digits of the personal code.
 * Debt      0000..2499 -> 0
 * Segment 1 2500..4999
 * Segment 2 5000..7499
 * Segment 3 7500..9999
 */
export function resolveCreditModifier(personalCode: string, config: Readonly<DecisionConfig>): CreditModifier {
  const segment = Number.parseInt(personalCode.slice(-4), 10);
  if (!Number.isInteger(segment) || segment < 2500) return { segment: 'debt', modifier: 0 };
  if (segment < 5000) return { segment: 'segment1', modifier: config.segment1CreditModifier };
  if (segment < 7500) return { segment: 'segment2', modifier: config.segment2CreditModifier };
  return { segment: 'segment3', modifier: config.segment3CreditModifier };
}
