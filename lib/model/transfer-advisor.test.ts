import { describe, it, expect } from "vitest";
import { evaluateTransfer, recommendTransfer } from "./transfer-advisor";

describe("recommendTransfer", () => {
  it("transfers the full surplus when the look-ahead never dips below target", () => {
    // Surplus 2500; lowest future 3000 > target
    expect(recommendTransfer(5000, 2500, [4000, 3500, 3000, 4500])).toBe(2500);
  });

  it("holds back the predicted shortfall", () => {
    // Surplus 2500; lowest 1500 -> shortfall 1000 -> transfer 1500
    expect(recommendTransfer(5000, 2500, [4000, 1500, 2000, 3500])).toBe(1500);
  });

  it("never goes negative when the holdback exceeds the surplus", () => {
    // Surplus 500; shortfall 1000
    expect(recommendTransfer(3000, 2500, [2000, 1500, 2500])).toBe(0);
  });

  it("returns 0 when the month ends at or below target", () => {
    expect(recommendTransfer(2000, 2500, [1500, 1000, 500])).toBe(0);
    expect(recommendTransfer(2500, 2500, [3000])).toBe(0);
  });

  it("treats an empty look-ahead as unconstrained", () => {
    expect(recommendTransfer(4000, 1000, [])).toBe(3000);
  });

  it("ignores NaN look-ahead entries", () => {
    expect(recommendTransfer(5000, 2500, [NaN, 2000, Infinity])).toBe(2000);
  });

  it("holds everything back when the look-ahead falls to -Infinity", () => {
    expect(recommendTransfer(5000, 2500, [3000, -Infinity])).toBe(0);
  });

  it("returns 0 for a non-finite month-end balance", () => {
    expect(recommendTransfer(NaN, 2500, [3000])).toBe(0);
    expect(recommendTransfer(Infinity, 2500, [])).toBe(0);
  });

  it("stays non-negative across a grid of inputs", () => {
    for (const monthEnd of [-1000, 0, 999.99, 2500, 10_000]) {
      for (const low of [-5000, 0, 2500, 9000]) {
        expect(recommendTransfer(monthEnd, 2500, [low])).toBeGreaterThanOrEqual(0);
      }
    }
  });
});

describe("evaluateTransfer", () => {
  it("reports surplus, lowest balance and holdback", () => {
    expect(evaluateTransfer(5000, 2500, [4000, 1500, 2000])).toEqual({
      surplus: 2500,
      lowestFutureBalance: 1500,
      holdback: 1000,
      recommendedTransfer: 1500,
    });
  });

  it("skips the look-ahead entirely when there is no surplus", () => {
    expect(evaluateTransfer(1000, 2500, [-9999])).toEqual({
      surplus: 0,
      lowestFutureBalance: null,
      holdback: 0,
      recommendedTransfer: 0,
    });
  });

  it("caps the holdback at the surplus", () => {
    expect(evaluateTransfer(3000, 2500, [1500])).toEqual({
      surplus: 500,
      lowestFutureBalance: 1500,
      holdback: 500,
      recommendedTransfer: 0,
    });
  });
});
