/**
 * Surplus transfer rule: sweep what sits above target at month-end, holding
 * back enough to cover the lowest balance the look-ahead predicts.
 * Oblivious to dates; callers build the look-ahead series.
 */

import { roundCents } from "./money";

export interface TransferEvaluation {
  surplus: number;
  /** null when no look-ahead was consulted (no surplus, or empty series). */
  lowestFutureBalance: number | null;
  holdback: number;
  recommendedTransfer: number;
}

const NO_TRANSFER: TransferEvaluation = {
  surplus: 0,
  lowestFutureBalance: null,
  holdback: 0,
  recommendedTransfer: 0,
};

/**
 * Evaluate the transfer rule and return its working.
 * NaN look-ahead entries are ignored; a -Infinity low blocks the sweep.
 * The result is never negative.
 */
export function evaluateTransfer(
  monthEndBalance: number,
  targetBalance: number,
  futureBalances: readonly number[]
): TransferEvaluation {
  const surplus = roundCents(Math.max(0, monthEndBalance - targetBalance));
  if (!Number.isFinite(surplus) || surplus <= 0) return NO_TRANSFER;

  const known = futureBalances.filter((b) => !Number.isNaN(b));
  if (known.length === 0) {
    return { surplus, lowestFutureBalance: null, holdback: 0, recommendedTransfer: surplus };
  }

  const lowestFutureBalance = Math.min(...known);
  const shortfall = roundCents(Math.max(0, targetBalance - lowestFutureBalance));
  const recommendedTransfer = roundCents(Math.max(0, surplus - shortfall));
  return {
    surplus,
    lowestFutureBalance,
    holdback: roundCents(surplus - recommendedTransfer),
    recommendedTransfer,
  };
}

/** Recommended month-end sweep amount (>= 0). */
export function recommendTransfer(
  monthEndBalance: number,
  targetBalance: number,
  futureBalances: readonly number[]
): number {
  return evaluateTransfer(monthEndBalance, targetBalance, futureBalances).recommendedTransfer;
}
