/**
 * Split `total` into `parts` integer shares that sum to `total`.
 *
 * Every share gets `trunc(total / parts)`; the first `total mod parts`
 * shares get one extra unit. `parts <= 0` yields an empty array.
 */
export function splitEven(total: number, parts: number): number[] {
  if (parts <= 0) return [];
  const base = Math.trunc(total / parts);
  const rem = total - base * parts;
  const out = new Array<number>(parts).fill(base);
  const extra = rem >= 0 ? 1 : -1;
  const count = Math.abs(rem);
  for (let i = 0; i < count; i++) {
    out[i] = base + extra;
  }
  return out;
}
