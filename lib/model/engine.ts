/**
 * Cash flow simulation engine.
 * Drives the daily projector over the window, evaluates the surplus transfer
 * rule at every month-end and injects recommended sweeps back into the run.
 */

import type {
  DayRecord,
  Transaction,
  TransferDecision,
  VirtualTransfer,
} from "@/lib/types/zod";
import {
  LOOKAHEAD_DAYS,
  SURPLUS_TRANSFER_DESCRIPTION,
  SYSTEM_CATEGORY,
} from "./constants";
import {
  addDays,
  firstDayOfNextMonth,
  fitsCalendar,
  isLastDayOfMonth,
  LAST_DATE,
} from "./date-only";
import { InvalidWindowError } from "./errors";
import { buildDayRecord, groupByDate, project, type ProjectionParams } from "./projector";
import { evaluateTransfer } from "./transfer-advisor";
import { assertValidSimulationInput, type ValidationWarning } from "./validation";

export type SimulationParams = ProjectionParams;

export interface SimulationResult {
  /** Exactly windowDays records, transfers already applied. */
  days: DayRecord[];
  /** Sweeps injected during this run, in decision order. */
  transfers: VirtualTransfer[];
  /** Every month-end evaluated inside the window, including ones that moved nothing. */
  decisions: TransferDecision[];
  warnings: ValidationWarning[];
}

function createVirtualTransfer(date: string, amount: number): VirtualTransfer {
  return {
    date,
    amount: -amount,
    description: SURPLUS_TRANSFER_DESCRIPTION,
    category: SYSTEM_CATEGORY,
    isForecast: true,
    isVirtual: true,
  };
}

/**
 * Stress-test a month-end: project LOOKAHEAD_DAYS from the day after, starting
 * at exactly the target (i.e. as if the full surplus were already gone).
 * Runs against a snapshot; the result is only read for its end balances.
 */
function lookAheadBalances(
  decisionDate: string,
  targetBalance: number,
  working: readonly Transaction[]
): number[] {
  return project({
    startBalance: targetBalance,
    targetBalance,
    transactions: working.slice(),
    startDate: addDays(decisionDate, 1),
    windowDays: LOOKAHEAD_DAYS,
  }).map((d) => d.endBalance);
}

function decide(
  day: DayRecord,
  targetBalance: number,
  working: readonly Transaction[]
): TransferDecision {
  const monthEndBalance = day.endBalance;
  const future =
    monthEndBalance > targetBalance
      ? lookAheadBalances(day.date, targetBalance, working)
      : [];
  const evaluation = evaluateTransfer(monthEndBalance, targetBalance, future);
  return {
    decisionDate: day.date,
    monthEndBalance,
    ...evaluation,
    transferDate:
      evaluation.recommendedTransfer > 0 ? firstDayOfNextMonth(day.date) : null,
  };
}

/**
 * Run the full simulation. Inputs are validated once, before anything is
 * produced; the caller's transactions are copied and never touched.
 */
export function simulate(params: SimulationParams): SimulationResult {
  const warnings = assertValidSimulationInput(params);
  const { startBalance, targetBalance, startDate, windowDays } = params;
  // A month-end on the last day looks LOOKAHEAD_DAYS past the window
  if (!fitsCalendar(startDate, windowDays - 1 + LOOKAHEAD_DAYS)) {
    throw new InvalidWindowError(
      `Window of ${windowDays} days from ${startDate} leaves no room for the ${LOOKAHEAD_DAYS}-day look-ahead before ${LAST_DATE}`
    );
  }

  // Append-only, owned by this call
  const working: Transaction[] = [...params.transactions];
  const endDate = addDays(startDate, windowDays - 1);
  const byDate = groupByDate(working, startDate, endDate);
  const transfers: VirtualTransfer[] = [];
  const decisions: TransferDecision[] = [];
  const days: DayRecord[] = [];

  let balance = startBalance;
  for (let offset = 0; offset < windowDays; offset++) {
    const date = addDays(startDate, offset);
    const day = buildDayRecord(date, balance, targetBalance, byDate.get(date) ?? []);
    days.push(day);
    balance = day.endBalance;

    if (!isLastDayOfMonth(date)) continue;

    const decision = decide(day, targetBalance, working);
    decisions.push(decision);
    if (decision.transferDate != null) {
      const transfer = createVirtualTransfer(
        decision.transferDate,
        decision.recommendedTransfer
      );
      working.push(transfer);
      transfers.push(transfer);
      if (transfer.date <= endDate) {
        const list = byDate.get(transfer.date) ?? [];
        list.push(transfer);
        byDate.set(transfer.date, list);
      }
    }
  }

  return { days, transfers, decisions, warnings };
}
