/**
 * Proportion scaling.
 *
 * When a hidden item's weight is split across `k` consumers, plain integer
 * division loses the remainder. Scaling every weight by the least common
 * multiple of all consumption-group sizes makes each split by a group size
 * exact in the common case; what is left over is handed out by
 * `splitEven`.
 */

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/** Least common multiple of the non-zero values. Empty or all-zero input yields 1. */
export function lcm(values: readonly number[]): number {
  let acc = 1;
  for (let i = 0; i < values.length; i++) {
    const v = Math.abs(values[i] ?? 0);
    if (v === 0) continue;
    acc = (acc / gcd(acc, v)) * v;
  }
  return acc;
}

/** Scale factor L for the given consumer lists. */
export function consumptionScale(groups: readonly (readonly number[])[]): number {
  const sizes = new Array<number>(groups.length);
  for (let i = 0; i < groups.length; i++) {
    sizes[i] = groups[i]?.length ?? 0;
  }
  return lcm(sizes);
}
