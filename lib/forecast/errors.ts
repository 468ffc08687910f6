// lib/forecast/errors.ts
// Forecast error taxonomy

export type ForecastErrorCode =
  | 'INVALID_CONFIG'
  | 'INSUFFICIENT_HISTORY'
  | 'MISSING_DATA'
  | 'NEGATIVE_DEBT'
  | 'BALANCE_CHECK_FAILURE';

/**
 * Base class for every error raised or recorded by the engine
 */
export class ForecastError extends Error {
  readonly code: ForecastErrorCode;
  readonly year: number | null;

  constructor(code: ForecastErrorCode, message: string, year: number | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.year = year;
  }
}

/**
 * Company config failed schema validation. Fatal.
 */
export class InvalidConfigError extends ForecastError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid forecast config: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Fewer historical years than the assumptions need. Raised before any period is projected.
 */
export class InsufficientHistoryError extends ForecastError {
  readonly required: number;
  readonly available: number;

  constructor(message: string, required: number, available: number) {
    super('INSUFFICIENT_HISTORY', message);
    this.required = required;
    this.available = available;
  }
}

/**
 * A required historical line item (or the base year itself) is absent
 */
export class MissingDataError extends ForecastError {
  readonly statement: string;
  readonly line: string;

  constructor(statement: string, line: string, year: number) {
    super('MISSING_DATA', `Missing ${statement}.${line} for ${year}`, year);
    this.statement = statement;
    this.line = line;
  }
}

/**
 * Scheduled amortization larger than the outstanding balance. Recorded, not thrown:
 * the payment is clamped to the balance.
 */
export class NegativeDebtError extends ForecastError {
  readonly trancheId: string;
  readonly scheduled: string;
  readonly outstanding: string;

  constructor(params: { year: number; trancheId: string; scheduled: string; outstanding: string }) {
    super(
      'NEGATIVE_DEBT',
      `Tranche ${params.trancheId} scheduled ${params.scheduled} against ${params.outstanding} outstanding in ${params.year}; clamped`,
      params.year
    );
    this.trancheId = params.trancheId;
    this.scheduled = params.scheduled;
    this.outstanding = params.outstanding;
  }
}

/**
 * Assets - (Liabilities + Equity) outside tolerance. Recorded, the run still completes.
 */
export class BalanceCheckFailure extends ForecastError {
  readonly residual: string;

  constructor(year: number, residual: string, tolerance: string) {
    super('BALANCE_CHECK_FAILURE', `Balance sheet off by ${residual} in ${year} (tolerance ${tolerance})`, year);
    this.residual = residual;
  }
}

export function isForecastError(error: unknown): error is ForecastError {
  return error instanceof ForecastError;
}
