import type { DecisionErrorCode } from './types.js';

export class DecisionError extends Error {
  readonly code: DecisionErrorCode;
  constructor(code: DecisionErrorCode, message: string) {
    super(message);
    this.name = 'DecisionError';
    this.code = code;
  }
}

export class InvalidPersonalCodeError extends DecisionError {
  constructor(message = 'Invalid personal ID code!') {
    super('invalid_personal_code', message);
    this.name = 'InvalidPersonalCodeError';
  }
}

export class InvalidLoanAmountError extends DecisionError {
  constructor(message = 'Invalid loan amount!') {
    super('invalid_loan_amount', message);
    this.name = 'InvalidLoanAmountError';
  }
}

export class InvalidLoanPeriodError extends DecisionError {
  constructor(message = 'Invalid loan period!') {
    super('invalid_loan_period', message);
    this.name = 'InvalidLoanPeriodError';
  }
}

export class NoValidLoanError extends DecisionError {
  constructor(message = 'No valid loan found!') {
    super('no_valid_loan', message);
    this.name = 'NoValidLoanError';
  }
}

export function isDecisionError(err: unknown): err is DecisionError {
  return err instanceof DecisionError;
}
