/** Round to whole cents; normalizes -0 to 0. */
export function roundCents(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}
