/**
 * Second layout pass.
 *
 * Re-walks the items with the running totals reset to their first-pass values.
 * Each item's size starts at `fixedSize + fixedDelta[i]` and it competes with
 * `weight + proportionDelta[i]`. Hidden items are skipped entirely: they do
 * not consume from the running totals and do not advance the position, so
 * whatever they did not donate is dropped.
 */

import { mainOrigin, mulDiv, sliceOnAxis } from "../bounds.js";
import type { Axis, FlexEntry, LayoutProbe, Placement, Rect } from "../types.js";
import type { RedistributionResult } from "./redistribute.js";
import { scaledWeight } from "./weights.js";

export type AllocationInput<C extends LayoutProbe> = Readonly<{
  entries: readonly FlexEntry<C>[];
  rect: Rect;
  axis: Axis;
  scale: number;
  pass: RedistributionResult;
}>;

export type AllocationResult<C extends LayoutProbe> = Readonly<{
  placements: readonly Placement<C>[];
  /** Final size per item; `null` for hidden items. */
  sizes: readonly (number | null)[];
}>;

export function allocate<C extends LayoutProbe>(input: AllocationInput<C>): AllocationResult<C> {
  const { entries, rect, axis, scale, pass } = input;
  const count = entries.length;

  const placements: Placement<C>[] = [];
  const sizes = new Array<number | null>(count).fill(null);

  let proportionLeft = pass.proportionSum;
  let distLeft = pass.distributable;
  let pos = mainOrigin(rect, axis);

  for (let i = 0; i < count; i++) {
    const entry = entries[i];
    if (!entry) continue;
    if (pass.visible[i] !== true) continue;

    let size = entry.fixedSize + (pass.fixedDelta[i] ?? 0);
    const weight = scaledWeight(entry, scale) + (pass.proportionDelta[i] ?? 0);
    if (proportionLeft > 0) {
      const share = mulDiv(distLeft, weight, proportionLeft);
      distLeft -= share;
      proportionLeft -= weight;
      size += share;
    }

    sizes[i] = size;
    placements.push({ index: i, content: entry.content, rect: sliceOnAxis(rect, axis, pos, size) });
    pos += size;
  }

  return { placements, sizes };
}
