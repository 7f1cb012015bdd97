import { COST_SCALE } from "../constants";

export const roundCost = (value: number): number =>
  Math.round(value * COST_SCALE) / COST_SCALE;

// Plain code-unit order, independent of locale.
export const compareIds = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const compareIdSequences = (
  a: readonly string[],
  b: readonly string[]
): number => {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const order = compareIds(a[index], b[index]);
    if (order !== 0) {
      return order;
    }
  }
  return a.length - b.length;
};
