/**
 * Typed errors raised by the planner. Every error carries a stable code so the
 * CLI (and tests) can branch on it without matching message text.
 */

export type CashflowErrorCode =
  | "INVALID_WINDOW"
  | "INVALID_BALANCE"
  | "INVALID_START_DATE"
  | "INVALID_TRANSACTION"
  | "INVALID_MONTH"
  | "DATA_FILE_NOT_FOUND"
  | "DATA_FORMAT";

export class CashflowError extends Error {
  readonly code: CashflowErrorCode;

  constructor(code: CashflowErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** windowDays is not a positive integer. */
export class InvalidWindowError extends CashflowError {
  constructor(message: string) {
    super("INVALID_WINDOW", message);
  }
}

/** Start or target balance is not a finite number. */
export class InvalidBalanceError extends CashflowError {
  constructor(message: string) {
    super("INVALID_BALANCE", message);
  }
}

export class InvalidStartDateError extends CashflowError {
  constructor(message: string) {
    super("INVALID_START_DATE", message);
  }
}

/** A transaction has a non-finite amount or a malformed date. */
export class InvalidTransactionError extends CashflowError {
  constructor(message: string) {
    super("INVALID_TRANSACTION", message);
  }
}

export class InvalidMonthError extends CashflowError {
  constructor(message: string) {
    super("INVALID_MONTH", message);
  }
}

export class DataFileNotFoundError extends CashflowError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("DATA_FILE_NOT_FOUND", message);
    this.path = path;
  }
}

/** config.json or ledger.csv exists but does not match the expected shape. */
export class DataFormatError extends CashflowError {
  constructor(message: string) {
    super("DATA_FORMAT", message);
  }
}
