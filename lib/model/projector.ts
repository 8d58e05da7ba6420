/**
 * Daily ledger projector.
 * Replays dated transactions over a window of consecutive calendar days and
 * carries the balance forward. Knows nothing about months or transfers.
 */

import type { DateOnly, DayRecord, Transaction } from "@/lib/types/zod";
import { addDays } from "./date-only";
import { assertValidSimulationInput } from "./validation";

export interface ProjectionParams {
  startBalance: number;
  targetBalance: number;
  /** Unordered; entries outside the window are ignored. */
  transactions: readonly Transaction[];
  startDate: DateOnly;
  windowDays: number;
}

/** Group in-window transactions by date, keeping their input order. */
export function groupByDate(
  transactions: readonly Transaction[],
  startDate: DateOnly,
  endDate: DateOnly
): Map<DateOnly, Transaction[]> {
  const byDate = new Map<DateOnly, Transaction[]>();
  for (const t of transactions) {
    if (t.date < startDate || t.date > endDate) continue;
    const list = byDate.get(t.date) ?? [];
    list.push(t);
    byDate.set(t.date, list);
  }
  return byDate;
}

/** "Rent: -1500.00, Paycheck: 2500.00" */
export function summarizeTransactions(transactions: readonly Transaction[]): string {
  return transactions.map((t) => `${t.description}: ${t.amount.toFixed(2)}`).join(", ");
}

/**
 * One day of the ledger from already-validated inputs.
 * Stored amounts are exact; rounding happens only when they are formatted.
 */
export function buildDayRecord(
  date: DateOnly,
  startBalance: number,
  targetBalance: number,
  dayTransactions: readonly Transaction[]
): DayRecord {
  const netChange = dayTransactions.reduce((sum, t) => sum + t.amount, 0);
  const endBalance = startBalance + netChange;
  const belowTarget = endBalance < targetBalance;
  return {
    date,
    startBalance,
    transactionsSummary: summarizeTransactions(dayTransactions),
    netChange,
    endBalance,
    alertType: belowTarget ? "BELOW_TARGET" : "OK",
    shortfall: belowTarget ? targetBalance - endBalance : 0,
  };
}

/**
 * Project one DayRecord per calendar day from startDate, windowDays long.
 * Pure: identical arguments always give identical output.
 */
export function project(params: ProjectionParams): DayRecord[] {
  assertValidSimulationInput(params);
  const { startBalance, targetBalance, transactions, startDate, windowDays } = params;

  const endDate = addDays(startDate, windowDays - 1);
  const byDate = groupByDate(transactions, startDate, endDate);

  const days: DayRecord[] = [];
  let balance = startBalance;
  for (let offset = 0; offset < windowDays; offset++) {
    const date = addDays(startDate, offset);
    const day = buildDayRecord(date, balance, targetBalance, byDate.get(date) ?? []);
    days.push(day);
    balance = day.endBalance;
  }
  return days;
}
