/**
 * ledger.csv <-> Transaction[].
 * Header: date,amount,description,category,forecast (column order is free).
 */

import type { Transaction } from "@/lib/types/zod";
import { LedgerRowSchema } from "@/lib/types/zod";
import { DataFormatError } from "@/lib/model/errors";
import { parseCsvRows, toCsv } from "./csv";

export const LEDGER_COLUMNS = ["date", "amount", "description", "category", "forecast"] as const;

const REQUIRED_COLUMNS = ["date", "amount", "description"] as const;

/** Parse ledger text; throws DataFormatError naming the first bad line. */
export function parseLedgerCsv(text: string, source = "ledger.csv"): Transaction[] {
  const rows = parseCsvRows(text);
  const headerRow = rows[0];
  if (!headerRow) return [];

  const header = headerRow.cells.map((c) => c.toLowerCase());
  for (const col of REQUIRED_COLUMNS) {
    if (!header.includes(col)) {
      throw new DataFormatError(`${source}: missing required column "${col}"`);
    }
  }

  const cell = (cells: string[], col: string): string | undefined => {
    const idx = header.indexOf(col);
    return idx === -1 ? undefined : cells[idx];
  };

  return rows.slice(1).map(({ lineNumber, cells }) => {
    const parsed = LedgerRowSchema.safeParse({
      date: cell(cells, "date") ?? "",
      amount: cell(cells, "amount") ?? "",
      description: cell(cells, "description"),
      category: cell(cells, "category"),
      forecast: cell(cells, "forecast"),
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join(".") || "row";
      throw new DataFormatError(
        `${source} line ${lineNumber}: ${field}: ${issue?.message ?? "invalid row"}`
      );
    }
    return parsed.data;
  });
}

function formatLedgerAmount(amount: number): string {
  return amount.toFixed(2);
}

/** Serialize transactions back to the ledger.csv layout. */
export function ledgerToCsv(transactions: readonly Transaction[]): string {
  return toCsv([
    [...LEDGER_COLUMNS],
    ...transactions.map((t) => [
      t.date,
      formatLedgerAmount(t.amount),
      t.description,
      t.category,
      t.isForecast ? "1" : "0",
    ]),
  ]);
}
