/**
 * Simulation engine tests: month-end sweeps, look-ahead holdback and
 * propagation of injected transfers through the rest of the run.
 */

import { describe, it, expect } from "vitest";
import { simulate } from "./engine";
import { project } from "./projector";
import { InvalidBalanceError, InvalidWindowError } from "./errors";
import { SURPLUS_TRANSFER_DESCRIPTION } from "./constants";
import type { Transaction } from "@/lib/types/zod";
import { createTransaction, getMonthEndSweepScenario } from "@/fixtures/ledgers";

function dayOn(result: ReturnType<typeof simulate>, date: string) {
  const day = result.days.find((d) => d.date === date);
  if (!day) throw new Error(`no day ${date}`);
  return day;
}

describe("simulate", () => {
  it("injects a held-back sweep on the 1st and applies it to later days", () => {
    const scenario = getMonthEndSweepScenario();
    const result = simulate({ ...scenario, windowDays: 35 });

    expect(result.days).toHaveLength(35);
    expect(result.transfers).toEqual([
      {
        date: "2024-02-01",
        amount: -1500,
        description: SURPLUS_TRANSFER_DESCRIPTION,
        category: "System",
        isForecast: true,
        isVirtual: true,
      },
    ]);

    // Month-end: 3000 + 4000
    expect(dayOn(result, "2024-01-31").endBalance).toBe(7000);

    const feb1 = dayOn(result, "2024-02-01");
    expect(feb1.netChange).toBe(-1500);
    expect(feb1.endBalance).toBe(5500);
    expect(feb1.transactionsSummary).toBe("Surplus Transfer: -1500.00");

    const feb2 = dayOn(result, "2024-02-02");
    expect(feb2.startBalance).toBe(5500);
    expect(feb2.endBalance).toBe(2500);
    expect(feb2.alertType).toBe("OK");
  });

  it("records the decision working for each month-end in the window", () => {
    const result = simulate({ ...getMonthEndSweepScenario(), windowDays: 35 });
    expect(result.decisions).toEqual([
      {
        decisionDate: "2024-01-31",
        monthEndBalance: 7000,
        surplus: 4500,
        // Look-ahead from 2500: tuition on Feb 2 takes it to -500
        lowestFutureBalance: -500,
        holdback: 3000,
        recommendedTransfer: 1500,
        transferDate: "2024-02-01",
      },
    ]);
  });

  it("does not evaluate month-ends outside the window", () => {
    const result = simulate({ ...getMonthEndSweepScenario(), windowDays: 30 });
    expect(result.decisions).toEqual([]);
    expect(result.transfers).toEqual([]);
  });

  it("matches a plain projection when no month-end has surplus", () => {
    const params = {
      startBalance: 1000,
      targetBalance: 2000,
      transactions: [createTransaction({ date: "2024-01-15", amount: 200 })],
      startDate: "2024-01-10",
      windowDays: 40,
    };
    const result = simulate(params);
    expect(result.transfers).toEqual([]);
    expect(result.days).toEqual(project(params));
    expect(result.decisions.map((d) => d.decisionDate)).toEqual(["2024-01-31"]);
  });

  it("sweeps the full surplus when nothing threatens the target", () => {
    const result = simulate({
      startBalance: 4000,
      targetBalance: 1000,
      transactions: [],
      startDate: "2024-03-30",
      windowDays: 5,
    });
    expect(result.transfers.map((t) => [t.date, t.amount])).toEqual([["2024-04-01", -3000]]);
    expect(result.days.map((d) => d.endBalance)).toEqual([4000, 4000, 1000, 1000, 1000]);
  });

  it("books a sweep after the transactions already dated that day", () => {
    const result = simulate({
      startBalance: 4000,
      targetBalance: 1000,
      transactions: [createTransaction({ date: "2024-04-01", amount: -50, description: "Gym" })],
      startDate: "2024-03-30",
      windowDays: 5,
    });
    // Look-ahead from 1000 dips to 950 on Apr 1: hold back 50 of the 3000 surplus
    const apr1 = dayOn(result, "2024-04-01");
    expect(apr1.transactionsSummary).toBe("Gym: -50.00, Surplus Transfer: -2950.00");
    expect(apr1.netChange).toBe(-3000);
    expect(result.days.map((d) => d.endBalance)).toEqual([4000, 4000, 1000, 1000, 1000]);
  });

  it("lets an earlier sweep shape later decisions", () => {
    const transactions: Transaction[] = [
      createTransaction({ date: "2024-01-15", amount: 3000, description: "Paycheck" }),
      createTransaction({ date: "2024-02-15", amount: 3000, description: "Paycheck" }),
      createTransaction({ date: "2024-03-05", amount: -2000, description: "Insurance" }),
    ];
    const result = simulate({
      startBalance: 1000,
      targetBalance: 1000,
      transactions,
      startDate: "2024-01-01",
      windowDays: 70,
    });

    // Jan 31 ends at 4000 and its look-ahead never drops below 1000: sweep 3000.
    // Feb 29 ends at 4000 again; its look-ahead hits -1000 on Mar 5: hold back 2000.
    expect(result.transfers.map((t) => [t.date, t.amount])).toEqual([
      ["2024-02-01", -3000],
      ["2024-03-01", -1000],
    ]);
    expect(dayOn(result, "2024-02-29").endBalance).toBe(4000);
    expect(dayOn(result, "2024-03-05").endBalance).toBe(1000);
    expect(result.days.every((d) => d.alertType === "OK")).toBe(true);
  });

  it("evaluates the next month-end against the post-sweep balance", () => {
    const result = simulate({
      startBalance: 5000,
      targetBalance: 1000,
      transactions: [],
      startDate: "2024-01-31",
      windowDays: 31,
    });
    expect(result.transfers.map((t) => [t.date, t.amount])).toEqual([["2024-02-01", -4000]]);
    expect(result.decisions[1]).toMatchObject({
      decisionDate: "2024-02-29",
      monthEndBalance: 1000,
      surplus: 0,
      transferDate: null,
    });
  });

  it("keeps balance continuity across injected transfers", () => {
    const result = simulate({ ...getMonthEndSweepScenario(), windowDays: 70 });
    for (let i = 1; i < result.days.length; i++) {
      expect(result.days[i]!.startBalance).toBe(result.days[i - 1]!.endBalance);
    }
  });

  it("leaves the caller's transactions untouched", () => {
    const scenario = getMonthEndSweepScenario();
    const before = structuredClone(scenario.transactions);
    simulate({ ...scenario, windowDays: 40 });
    expect(scenario.transactions).toEqual(before);
    expect(scenario.transactions).toHaveLength(2);
  });

  it("does not leak transfers between runs", () => {
    const scenario = getMonthEndSweepScenario();
    const first = simulate({ ...scenario, windowDays: 40 });
    const second = simulate({ ...scenario, windowDays: 40 });
    expect(second).toEqual(first);
    expect(second.transfers).toHaveLength(1);
  });

  it("fails before producing anything on bad input", () => {
    const scenario = getMonthEndSweepScenario();
    expect(() => simulate({ ...scenario, windowDays: 0 })).toThrow(InvalidWindowError);
    expect(() => simulate({ ...scenario, startBalance: NaN, windowDays: 10 })).toThrow(
      InvalidBalanceError
    );
  });

  it("rejects a window whose look-ahead would run past 9999-12-31", () => {
    expect(() =>
      simulate({
        startBalance: 1000,
        targetBalance: 500,
        transactions: [],
        startDate: "9999-12-01",
        windowDays: 31,
      })
    ).toThrow(
      "Window of 31 days from 9999-12-01 leaves no room for the 30-day look-ahead before 9999-12-31"
    );
  });
});
