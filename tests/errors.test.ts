import { describe, test, expect } from '@jest/globals';
import { InvalidLoanAmountError, isDecisionError } from '../src/loans/errors.js';
import { toDecisionResponse } from '../src/loans/response.js';
import { formatUserError, maskPersonalCode, normalizeError } from '../src/utils/errors.js';

describe('error helpers', () => {
  test('normalizeError keeps the decision code', () => {
    const n = normalizeError(new InvalidLoanAmountError());
    expect(n.name).toBe('InvalidLoanAmountError');
    expect(n.message).toBe('Invalid loan amount!');
    expect(n.code).toBe('invalid_loan_amount');
  });
  test('normalizeError on non-errors', () => {
    expect(normalizeError('boom')).toEqual({ name: 'string', message: 'boom', stack: '' });
  });
  test('formatUserError without stack', () => {
    expect(formatUserError(new Error('bad'), false)).toBe('Error: bad');
  });
  test('isDecisionError', () => {
    expect(isDecisionError(new InvalidLoanAmountError())).toBe(true);
    expect(isDecisionError(new Error('x'))).toBe(false);
  });
  test('maskPersonalCode', () => {
    expect(maskPersonalCode('39001013002')).toBe('390010*****');
    expect(maskPersonalCode('1234')).toBe('****');
  });
});

describe('toDecisionResponse', () => {
  test('approval', () => {
    expect(toDecisionResponse({ approved: true, loanAmount: 3600, loanPeriod: 12 }))
      .toEqual({ loanAmount: 3600, loanPeriod: 12, errorMessage: null });
  });
  test('rejection', () => {
    expect(toDecisionResponse({ approved: false, code: 'invalid_loan_period', errorMessage: 'Invalid loan period!' }))
      .toEqual({ loanAmount: null, loanPeriod: null, errorMessage: 'Invalid loan period!' });
  });
});
