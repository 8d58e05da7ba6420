/**
 * Export simulated days as CSV.
 * Columns: date, start_balance, transactions_summary, net_change, end_balance, alert_type.
 */

import { writeFileSync } from "node:fs";
import type { DayRecord } from "@/lib/types/zod";
import { escapeCsv } from "@/lib/data/csv";
import { formatAmount } from "@/lib/utils/format";

export const SIMULATION_CSV_HEADERS = [
  "date",
  "start_balance",
  "transactions_summary",
  "net_change",
  "end_balance",
  "alert_type",
] as const;

/** Convert a DayRecord to CSV row cells. */
function rowToCells(day: DayRecord): string[] {
  return [
    day.date,
    formatAmount(day.startBalance),
    day.transactionsSummary,
    formatAmount(day.netChange),
    formatAmount(day.endBalance),
    day.alertType,
  ];
}

/** Serialize simulated days to a CSV string (header always present). */
export function simulationToCsv(days: readonly DayRecord[]): string {
  const rows: string[] = [SIMULATION_CSV_HEADERS.join(",")];
  for (const day of days) {
    rows.push(rowToCells(day).map(escapeCsv).join(","));
  }
  return rows.join("\n") + "\n";
}

/** Write simulated days to filePath, replacing any existing file. */
export function writeSimulationCsv(filePath: string, days: readonly DayRecord[]): void {
  writeFileSync(filePath, simulationToCsv(days), "utf8");
}
