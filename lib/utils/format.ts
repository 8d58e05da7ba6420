/**
 * Format amounts for report text and CSV cells.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** Plain two-decimal amount ("1500.00", "-50.00"), no grouping. */
export function formatAmount(amount: number): string {
  const fixed = amount.toFixed(2);
  return fixed === "-0.00" ? "0.00" : fixed;
}
