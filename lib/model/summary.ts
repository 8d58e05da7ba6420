/**
 * Monthly P&L summary: amounts by category and description plus a
 * cash-flow statement. Rows outside the configured categories are excluded
 * and reported separately as uncategorized.
 */

import type { PlannerConfig, Transaction } from "@/lib/types/zod";
import { MonthSchema } from "@/lib/types/zod";
import { monthBounds } from "./date-only";
import { InvalidMonthError } from "./errors";
import { roundCents } from "./money";

export interface CashFlowStatement {
  revenue: number;
  fixedExpenses: number;
  variableExpenses: number;
  profitMargin: number;
  miscIncome: number;
  miscExpenses: number;
  netIncome: number;
}

export interface PnlReport {
  month: string;
  /** category -> description -> summed amount; every valid category is present. */
  byCategory: Record<string, Record<string, number>>;
  statement: CashFlowStatement;
}

export interface SummaryReport {
  pnl: PnlReport;
  uncategorized: Transaction[];
}

const EMPTY_STATEMENT: CashFlowStatement = {
  revenue: 0,
  fixedExpenses: 0,
  variableExpenses: 0,
  profitMargin: 0,
  miscIncome: 0,
  miscExpenses: 0,
  netIncome: 0,
};

/** Transactions whose category is not in the configured list. */
export function findUncategorized(
  transactions: readonly Transaction[],
  validCategories: readonly string[]
): Transaction[] {
  const valid = new Set(validCategories);
  return transactions.filter((t) => !valid.has(t.category));
}

/** Apply one category total to the statement, forcing the sign per line item. */
function addToStatement(
  statement: CashFlowStatement,
  category: string,
  amount: number
): void {
  switch (category) {
    case "Revenue":
      statement.revenue += amount;
      break;
    case "Fixed":
      statement.fixedExpenses += -Math.abs(amount);
      break;
    case "Variable":
      statement.variableExpenses += -Math.abs(amount);
      break;
    case "Misc Income":
      statement.miscIncome += Math.abs(amount);
      break;
    case "Misc Expense":
      statement.miscExpenses += -Math.abs(amount);
      break;
  }
}

export function calculatePnl(
  transactions: readonly Transaction[],
  month: string,
  validCategories: readonly string[]
): PnlReport {
  if (!MonthSchema.safeParse(month).success) {
    throw new InvalidMonthError(`Month must be YYYYMM (got "${month}")`);
  }
  const { startDate, endDate } = monthBounds(month);

  // Maps, not object literals: descriptions like "constructor" must not hit the prototype
  const totals = new Map<string, Map<string, number>>();
  for (const category of validCategories) totals.set(category, new Map());

  for (const t of transactions) {
    if (t.date < startDate || t.date > endDate) continue;
    const lines = totals.get(t.category);
    if (!lines) continue;
    lines.set(t.description, roundCents((lines.get(t.description) ?? 0) + t.amount));
  }

  const statement: CashFlowStatement = { ...EMPTY_STATEMENT };
  // Sign rules apply to each (category, description) total, not each row
  for (const [category, lines] of totals) {
    for (const amount of lines.values()) {
      addToStatement(statement, category, amount);
    }
  }

  statement.revenue = roundCents(statement.revenue);
  statement.fixedExpenses = roundCents(statement.fixedExpenses);
  statement.variableExpenses = roundCents(statement.variableExpenses);
  statement.miscIncome = roundCents(statement.miscIncome);
  statement.miscExpenses = roundCents(statement.miscExpenses);
  statement.profitMargin = roundCents(
    statement.revenue + statement.fixedExpenses + statement.variableExpenses
  );
  statement.netIncome = roundCents(
    statement.profitMargin + statement.miscIncome + statement.miscExpenses
  );

  const byCategory = Object.fromEntries(
    Array.from(totals, ([category, lines]) => [category, Object.fromEntries(lines)] as const)
  );
  return { month, byCategory, statement };
}

export function generateSummaryReport(
  transactions: readonly Transaction[],
  config: Pick<PlannerConfig, "categories">,
  month: string
): SummaryReport {
  return {
    pnl: calculatePnl(transactions, month, config.categories),
    uncategorized: findUncategorized(transactions, config.categories),
  };
}
