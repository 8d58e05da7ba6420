/**
 * Validation and guardrails for projection/simulation inputs.
 * Hard errors block calculation; soft warnings allow it.
 */

import type { ProjectionParams } from "./projector";
import { addDays, fitsCalendar, isDateOnly, LAST_DATE } from "./date-only";
import {
  CashflowError,
  InvalidBalanceError,
  InvalidStartDateError,
  InvalidTransactionError,
  InvalidWindowError,
} from "./errors";

export interface ValidationError {
  code: "INVALID_WINDOW" | "INVALID_BALANCE" | "INVALID_START_DATE" | "INVALID_TRANSACTION";
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/** Check all inputs before anything is projected. */
export function validateSimulationInput(input: ProjectionParams): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const validWindow = Number.isInteger(input.windowDays) && input.windowDays > 0;
  if (!validWindow) {
    errors.push({
      code: "INVALID_WINDOW",
      message: `Window must be a positive whole number of days (got ${input.windowDays})`,
    });
  }

  if (!Number.isFinite(input.startBalance)) {
    errors.push({
      code: "INVALID_BALANCE",
      message: `Start balance must be a finite number (got ${input.startBalance})`,
    });
  }
  if (!Number.isFinite(input.targetBalance)) {
    errors.push({
      code: "INVALID_BALANCE",
      message: `Target balance must be a finite number (got ${input.targetBalance})`,
    });
  }

  if (!isDateOnly(input.startDate)) {
    errors.push({
      code: "INVALID_START_DATE",
      message: `Start date must be a calendar date as YYYY-MM-DD (got "${input.startDate}")`,
    });
  } else if (validWindow && !fitsCalendar(input.startDate, input.windowDays - 1)) {
    errors.push({
      code: "INVALID_WINDOW",
      message: `Window of ${input.windowDays} days from ${input.startDate} runs past ${LAST_DATE}`,
    });
  }

  input.transactions.forEach((t, i) => {
    if (!isDateOnly(t.date)) {
      errors.push({
        code: "INVALID_TRANSACTION",
        message: `Transaction #${i + 1} ("${t.description}") has an invalid date: "${t.date}"`,
      });
    } else if (!Number.isFinite(t.amount)) {
      errors.push({
        code: "INVALID_TRANSACTION",
        message: `Transaction #${i + 1} ("${t.description}") on ${t.date} has a non-numeric amount`,
      });
    }
  });

  if (errors.length > 0) return { errors, warnings };

  if (input.startBalance < input.targetBalance) {
    warnings.push({
      code: "START_BELOW_TARGET",
      message: `Start balance ${input.startBalance.toFixed(2)} is already below target ${input.targetBalance.toFixed(2)}`,
    });
  }

  const endDate = addDays(input.startDate, input.windowDays - 1);
  const inWindow = input.transactions.some(
    (t) => t.date >= input.startDate && t.date <= endDate
  );
  if (!inWindow) {
    warnings.push({
      code: "NO_TRANSACTIONS_IN_WINDOW",
      message: `No transactions fall between ${input.startDate} and ${endDate}; balance stays flat`,
    });
  }

  return { errors, warnings };
}

function toError(e: ValidationError): CashflowError {
  switch (e.code) {
    case "INVALID_WINDOW":
      return new InvalidWindowError(e.message);
    case "INVALID_BALANCE":
      return new InvalidBalanceError(e.message);
    case "INVALID_START_DATE":
      return new InvalidStartDateError(e.message);
    case "INVALID_TRANSACTION":
      return new InvalidTransactionError(e.message);
  }
}

/**
 * Throw the first hard error as a typed CashflowError.
 * Window is checked before balances so a bad window always reports as INVALID_WINDOW.
 */
export function assertValidSimulationInput(input: ProjectionParams): ValidationWarning[] {
  const { errors, warnings } = validateSimulationInput(input);
  const first = errors[0];
  if (first) throw toError(first);
  return warnings;
}
