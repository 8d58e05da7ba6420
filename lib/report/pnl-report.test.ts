import { describe, it, expect } from "vitest";
import { formatPnlOutput, formatUncategorized } from "./pnl-report";
import { calculatePnl } from "@/lib/model/summary";
import { createTransaction } from "@/fixtures/ledgers";

describe("formatPnlOutput", () => {
  it("prints non-empty categories and the statement", () => {
    const pnl = calculatePnl(
      [
        createTransaction({ date: "2024-01-05", amount: 2500, description: "Paycheck", category: "Revenue" }),
        createTransaction({ date: "2024-01-02", amount: -1500, description: "Rent", category: "Fixed" }),
      ],
      "202401",
      ["Revenue", "Fixed", "Variable"]
    );
    expect(formatPnlOutput(pnl)).toBe(
      [
        "CASH FLOW SUMMARY",
        "========================================",
        "",
        "Revenue:",
        "  Paycheck: 2500.00",
        "",
        "Fixed:",
        "  Rent: -1500.00",
        "",
        "CASH FLOW STATEMENT:",
        "  Revenue: 2500.00",
        "  Fixed Expenses: -1500.00",
        "  Variable Expenses: 0.00",
        "  Profit Margin: 1000.00",
        "  Misc Income: 0.00",
        "  Misc Expenses: 0.00",
        "  Net Income: 1000.00",
      ].join("\n")
    );
  });
});

describe("formatUncategorized", () => {
  it("lists each row", () => {
    expect(
      formatUncategorized([
        createTransaction({ date: "2024-01-17", description: "Mystery", category: "Misc" }),
      ])
    ).toBe("WARNING: Uncategorized transactions found:\n  2024-01-17 | Mystery | Category: 'Misc'");
  });

  it("is empty when everything is categorized", () => {
    expect(formatUncategorized([])).toBe("");
  });
});
