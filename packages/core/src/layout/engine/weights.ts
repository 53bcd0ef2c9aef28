import type { FlexEntry } from "../types.js";

/**
 * Scaled weight an entry competes with. Fixed-size entries never take a
 * proportional share, whatever their `proportion` says.
 */
export function scaledWeight(entry: FlexEntry, scale: number): number {
  return entry.fixedSize > 0 ? 0 : entry.proportion * scale;
}
