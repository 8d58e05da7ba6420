/**
 * Ledger fixtures shared by engine, summary and report tests.
 */

import type { Transaction } from "@/lib/types/zod";

export function createTransaction(overrides?: Partial<Transaction>): Transaction {
  return {
    date: "2024-01-01",
    amount: 0,
    description: "Item",
    category: "Variable",
    isForecast: true,
    ...overrides,
  };
}

/** Ten days in January: rent, payday with a subscription, car payment. */
export function getJanuaryForecast(): Transaction[] {
  return [
    createTransaction({ date: "2024-01-02", amount: -1500, description: "Rent", category: "Fixed" }),
    createTransaction({ date: "2024-01-05", amount: 2500, description: "Paycheck", category: "Revenue" }),
    createTransaction({ date: "2024-01-05", amount: -50, description: "Spotify", category: "Variable" }),
    createTransaction({ date: "2024-01-08", amount: -800, description: "Car Payment", category: "Fixed" }),
  ];
}

/**
 * Large deposit just before month-end and a big bill right after the 1st:
 * the sweep must hold back enough to cover the bill.
 */
export function getMonthEndSweepScenario() {
  return {
    startBalance: 3000,
    targetBalance: 2500,
    startDate: "2024-01-01",
    transactions: [
      createTransaction({ date: "2024-01-30", amount: 4000, description: "Bonus", category: "Revenue" }),
      createTransaction({ date: "2024-02-02", amount: -3000, description: "Tuition", category: "Fixed" }),
    ],
  };
}
