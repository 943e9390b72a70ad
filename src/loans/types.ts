export type LoanRequest = {
  personalCode: string;
  amount: number; // currency units
  period: number; // months
};

export type ApprovedLoan = {
  readonly loanAmount: number;
  readonly loanPeriod: number;
};

export type DecisionErrorCode =
  | 'invalid_personal_code'
  | 'invalid_loan_amount'
  | 'invalid_loan_period'
  | 'no_valid_loan';

export type Decision =
  | ({ readonly approved: true } & ApprovedLoan)
  | { readonly approved: false; readonly code: DecisionErrorCode; readonly errorMessage: string };

// Wire shape: absent parts are null, never 0.
export type DecisionResponse = {
  readonly loanAmount: number | null;
  readonly loanPeriod: number | null;
  readonly errorMessage: string | null;
};

export type CreditSegment = 'debt' | 'segment1' | 'segment2' | 'segment3';

export type CreditModifier = {
  segment: CreditSegment;
  modifier: number;
};
