/**
 * Console text for a simulation run: window summary, below-target alerts,
 * injected surplus transfers and month-ends where surplus was held back.
 */

import type { DayRecord, TransferDecision } from "@/lib/types/zod";
import type { SimulationResult } from "@/lib/model/engine";
import { LOOKAHEAD_DAYS, SURPLUS_TRANSFER_DESCRIPTION } from "@/lib/model/constants";
import { formatAmount, formatCurrency } from "@/lib/utils/format";

const RULE = "=".repeat(40);

export interface TransferNotice {
  date: string;
  /** Positive amount moved out of the account. */
  amount: number;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const TRANSFER_PATTERN = new RegExp(
  `${escapeRegExp(SURPLUS_TRANSFER_DESCRIPTION)}: (-?\\d+(?:\\.\\d+)?)`,
  "g"
);

/** Find surplus transfers by their marker in each day's transaction summary. */
export function findTransferNotices(days: readonly DayRecord[]): TransferNotice[] {
  const notices: TransferNotice[] = [];
  for (const day of days) {
    for (const match of day.transactionsSummary.matchAll(TRANSFER_PATTERN)) {
      notices.push({ date: day.date, amount: Math.abs(Number(match[1])) });
    }
  }
  return notices;
}

function lowestDay(days: readonly DayRecord[]): DayRecord | undefined {
  return days.reduce<DayRecord | undefined>(
    (low, d) => (low == null || d.endBalance < low.endBalance ? d : low),
    undefined
  );
}

function formatHoldback(d: TransferDecision): string {
  const low = d.lowestFutureBalance != null ? formatAmount(d.lowestFutureBalance) : "n/a";
  return `  ${d.decisionDate}: held back ${formatAmount(d.holdback)} of ${formatAmount(d.surplus)} surplus (${LOOKAHEAD_DAYS}-day low ${low})`;
}

export function formatSimulationReport(
  result: SimulationResult,
  targetBalance: number
): string {
  const { days, decisions } = result;
  const first = days[0];
  const last = days[days.length - 1];
  const low = lowestDay(days);

  const lines: string[] = ["SIMULATION SUMMARY", RULE];
  if (first && last && low) {
    lines.push(
      `Period: ${first.date} to ${last.date} (${days.length} days)`,
      `Starting balance: ${formatCurrency(first.startBalance)}`,
      `Target balance: ${formatCurrency(targetBalance)}`,
      `Ending balance: ${formatCurrency(last.endBalance)}`,
      `Lowest balance: ${formatCurrency(low.endBalance)} on ${low.date}`
    );
  }

  for (const w of result.warnings) {
    lines.push(`WARNING: ${w.message}`);
  }

  const alerts = days.filter((d) => d.alertType === "BELOW_TARGET");
  if (alerts.length > 0) {
    lines.push("", "ALERTS:");
    for (const a of alerts) {
      lines.push(
        `  ${a.date}: Balance drops to ${formatAmount(a.endBalance)} (below target of ${formatAmount(targetBalance)})`,
        `    SYSTEM RECOMMENDATION: Add ${formatAmount(a.shortfall)} to reach target balance`
      );
    }
  } else {
    lines.push("", "No alerts: balance stays at or above target.");
  }

  const notices = findTransferNotices(days);
  if (notices.length > 0) {
    lines.push("", "SYSTEM_TRANSFER:");
    for (const n of notices) {
      lines.push(`  ${n.date}: ${SURPLUS_TRANSFER_DESCRIPTION} of ${formatAmount(n.amount)}`);
    }
  }

  const heldBack = decisions.filter((d) => d.holdback > 0);
  if (heldBack.length > 0) {
    lines.push("", "HOLDBACKS:");
    for (const d of heldBack) lines.push(formatHoldback(d));
  }

  return lines.join("\n");
}
