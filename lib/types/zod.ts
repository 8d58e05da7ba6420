/**
 * Zod schemas for the cash flow planner.
 * Transactions, per-user configuration and simulation output shapes.
 */

import { z } from "zod";

/** Calendar date without time component: "YYYY-MM-DD". */
export const DateOnlySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: "Expected date as YYYY-MM-DD" });
export type DateOnly = z.infer<typeof DateOnlySchema>;

/** Month selector for the P&L summary: "YYYYMM". */
export const MonthSchema = z
  .string()
  .regex(/^\d{4}(0[1-9]|1[0-2])$/, { message: "Expected month as YYYYMM" });

export const TransactionSchema = z.object({
  date: DateOnlySchema,
  /** Signed: positive = inflow, negative = outflow. */
  amount: z.number().finite(),
  description: z.string(),
  category: z.string(),
  isForecast: z.boolean(),
});
export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * One raw ledger.csv row (all columns are text in the file).
 * Amount must parse to a finite number; forecast is "1" for forecast rows.
 */
export const LedgerRowSchema = z
  .object({
    date: DateOnlySchema,
    amount: z
      .string()
      .trim()
      .min(1, { message: "Amount is required" })
      .transform((s) => Number(s))
      .refine((n) => Number.isFinite(n), { message: "Amount must be a number" }),
    description: z.string().default(""),
    category: z.string().default(""),
    forecast: z.string().default(""),
  })
  .transform(
    (row): Transaction => ({
      date: row.date,
      amount: row.amount,
      description: row.description,
      category: row.category,
      isForecast: row.forecast.trim() === "1",
    })
  );

/** config.json as written by the user (snake_case keys). */
export const ConfigFileSchema = z
  .object({
    current_balance: z.number().finite(),
    target_balance: z.number().finite(),
    categories: z.array(z.string()).default([]),
  })
  .transform((c) => ({
    currentBalance: c.current_balance,
    targetBalance: c.target_balance,
    categories: c.categories,
  }));
export type PlannerConfig = z.infer<typeof ConfigFileSchema>;

export const AlertTypeSchema = z.enum(["OK", "BELOW_TARGET"]);
export type AlertType = z.infer<typeof AlertTypeSchema>;

export interface DayRecord {
  date: DateOnly;
  /** Balance at day open. */
  startBalance: number;
  /** "<description>: <amount>" per transaction, comma-joined; "" when none. */
  transactionsSummary: string;
  netChange: number;
  endBalance: number;
  alertType: AlertType;
  /** Amount needed to reach target when BELOW_TARGET; 0 otherwise. */
  shortfall: number;
}

/** Synthetic run-scoped transaction produced by the month-end sweep. Never persisted. */
export type VirtualTransfer = Transaction & { isVirtual: true };

export interface TransferDecision {
  /** Last calendar day of the month that was evaluated. */
  decisionDate: DateOnly;
  monthEndBalance: number;
  surplus: number;
  /** Lowest look-ahead balance; null when no look-ahead ran (no surplus). */
  lowestFutureBalance: number | null;
  /** Portion of surplus withheld to cover a predicted shortfall. */
  holdback: number;
  recommendedTransfer: number;
  /** Date the transfer lands (first of next month); null when nothing is moved. */
  transferDate: DateOnly | null;
}
