/**
 * Console text for the monthly P&L and the uncategorized-transaction warning.
 */

import type { Transaction } from "@/lib/types/zod";
import type { PnlReport } from "@/lib/model/summary";
import { formatAmount } from "@/lib/utils/format";

export function formatPnlOutput(pnl: PnlReport): string {
  const lines: string[] = ["CASH FLOW SUMMARY", "=".repeat(40)];

  for (const [category, entries] of Object.entries(pnl.byCategory)) {
    const items = Object.entries(entries);
    if (items.length === 0) continue;
    lines.push("", `${category}:`);
    for (const [description, amount] of items) {
      lines.push(`  ${description}: ${formatAmount(amount)}`);
    }
  }

  const s = pnl.statement;
  lines.push(
    "",
    "CASH FLOW STATEMENT:",
    `  Revenue: ${formatAmount(s.revenue)}`,
    `  Fixed Expenses: ${formatAmount(s.fixedExpenses)}`,
    `  Variable Expenses: ${formatAmount(s.variableExpenses)}`,
    `  Profit Margin: ${formatAmount(s.profitMargin)}`,
    `  Misc Income: ${formatAmount(s.miscIncome)}`,
    `  Misc Expenses: ${formatAmount(s.miscExpenses)}`,
    `  Net Income: ${formatAmount(s.netIncome)}`
  );
  return lines.join("\n");
}

/** Warning block listing rows whose category is not configured; "" when none. */
export function formatUncategorized(rows: readonly Transaction[]): string {
  if (rows.length === 0) return "";
  const lines = ["WARNING: Uncategorized transactions found:"];
  for (const t of rows) {
    lines.push(`  ${t.date} | ${t.description} | Category: '${t.category}'`);
  }
  return lines.join("\n");
}
