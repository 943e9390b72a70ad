import dayjs from 'dayjs';
import type { DecisionConfig } from '../config/index.js';
import { EstonianPersonalCodeDecoder } from '../identity/estonian.js';
import { type PersonalCodeDecoder, PersonalCodeFormatError } from '../identity/types.js';
import { log } from '../utils/logger.js';
import { maskPersonalCode } from '../utils/errors.js';
import { resolveCreditModifier } from './credit.js';
import {
  InvalidLoanAmountError,
  InvalidLoanPeriodError,
  InvalidPersonalCodeError,
  NoValidLoanError,
  isDecisionError,
} from './errors.js';
import { findApprovableLoan } from './limits.js';
import type { ApprovedLoan, Decision, LoanRequest } from './types.js';

const logger = log.withScope('decision');

export type DecisionEngineOptions = {
  decoder?: PersonalCodeDecoder;
  now?: () => Date;
};

/**
 * Calculates the approved loan amount and period for a customer. The amount
 * depends on the credit modifier, which comes from the last four digits of
 * the personal code.
 */
export class DecisionEngine {
  private readonly config: Readonly<DecisionConfig>;
  private readonly decoder: PersonalCodeDecoder;
  private readonly now: () => Date;

  constructor(config: Readonly<DecisionConfig>, opts: DecisionEngineOptions = {}) {
    this.config = config;
    this.decoder = opts.decoder ?? new EstonianPersonalCodeDecoder();
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Throws InvalidPersonalCodeError, InvalidLoanAmountError,
   * InvalidLoanPeriodError or NoValidLoanError, checked in that order.
   */
  calculateApprovedLoan(personalCode: string, requestedAmount: number, requestedPeriod: number): ApprovedLoan {
    this.verifyInputs(personalCode, requestedAmount, requestedPeriod);

    const { segment, modifier } = resolveCreditModifier(personalCode, this.config);
    if (modifier === 0) {
      logger.debug('rejected: debt segment', { code: maskPersonalCode(personalCode) });
      throw new NoValidLoanError();
    }

    const loan = findApprovableLoan(modifier, requestedPeriod, this.config);
    logger.debug('approved', {
      code: maskPersonalCode(personalCode),
      segment,
      requestedAmount,
      requestedPeriod,
      ...loan,
    });
    return loan;
  }

  /** Same as calculateApprovedLoan, with decision errors returned as rejections. */
  decide(request: LoanRequest): Decision {
    const { personalCode, amount, period } = request;
    try {
      const loan = this.calculateApprovedLoan(personalCode, amount, period);
      return { approved: true, ...loan };
    } catch (err) {
      if (!isDecisionError(err)) throw err;
      logger.debug('rejected', { code: maskPersonalCode(personalCode), reason: err.code });
      return { approved: false, code: err.code, errorMessage: err.message };
    }
  }

  /** Completed years between the birth date in the code and now. */
  ageOf(personalCode: string): number {
    return dayjs(this.now()).diff(dayjs(this.decoder.birthDate(personalCode)), 'year');
  }

  isOldEnough(personalCode: string): boolean {
    return this.ageOf(personalCode) >= this.config.minimumAge;
  }

  private verifyInputs(personalCode: string, loanAmount: number, loanPeriod: number): void {
    const c = this.config;
    if (!this.decoder.isValid(personalCode)) {
      throw new InvalidPersonalCodeError();
    }
    let oldEnough: boolean;
    try {
      oldEnough = this.isOldEnough(personalCode);
    } catch (err) {
      if (err instanceof PersonalCodeFormatError) throw new InvalidPersonalCodeError();
      throw err;
    }
    if (!oldEnough) {
      throw new InvalidPersonalCodeError('To approve a loan you must be an adult!');
    }
    if (!Number.isInteger(loanAmount) || loanAmount < c.minimumLoanAmount || loanAmount > c.maximumLoanAmount) {
      throw new InvalidLoanAmountError();
    }
    if (!Number.isInteger(loanPeriod) || loanPeriod < c.minimumLoanPeriod || loanPeriod > c.maximumLoanPeriod) {
      throw new InvalidLoanPeriodError();
    }
  }
}
