/**
 * packages/core/src/layout/engine/redistribute.ts — First layout pass.
 *
 * Why: A child's visibility predicate may depend on its own size, so every
 * child is first given the rect it would get if nothing were hidden. Items
 * that then report hidden donate their fixed size and scaled weight to their
 * consumers; the donations are returned as per-index delta arrays for the
 * allocation pass.
 *
 * Running-remainder rule: each proportional item gets
 * `trunc(distLeft * weight / proportionLeft)` and both running totals are
 * decremented, so the provisional shares sum exactly to `distributable`.
 */

import { noopTrace } from "../../debug/trace.js";
import type { LayoutTrace } from "../../debug/types.js";
import { clampNonNegative, mainExtent, mainOrigin, mulDiv, sliceOnAxis } from "../bounds.js";
import type { Axis, FlexEntry, LayoutProbe, Rect } from "../types.js";
import { splitEven } from "./splitEven.js";
import { scaledWeight } from "./weights.js";

export type RedistributionInput<C extends LayoutProbe> = Readonly<{
  entries: readonly FlexEntry<C>[];
  /** Consumer lists with out-of-range indices already removed, parallel to `entries`. */
  consumers: readonly (readonly number[])[];
  rect: Rect;
  axis: Axis;
  scale: number;
  trace?: LayoutTrace;
}>;

export type RedistributionResult = Readonly<{
  /** Main extent minus every fixed size, hidden items included. */
  distributable: number;
  /** Σ scaled weight over proportional items. */
  proportionSum: number;
  /** Provisional size per item, before any donation. */
  provisional: readonly number[];
  /** Visibility as answered during this pass. Spacers are always visible. */
  visible: readonly boolean[];
  /** Extra fixed cells each index inherits from hidden donors. */
  fixedDelta: readonly number[];
  /** Extra scaled weight each index inherits from hidden donors. */
  proportionDelta: readonly number[];
}>;

export function redistribute<C extends LayoutProbe>(
  input: RedistributionInput<C>,
): RedistributionResult {
  const { entries, consumers, rect, axis, scale } = input;
  const trace = input.trace ?? noopTrace();
  const count = entries.length;

  let distributable = mainExtent(rect, axis);
  let proportionSum = 0;
  for (let i = 0; i < count; i++) {
    const entry = entries[i];
    if (!entry) continue;
    if (entry.fixedSize > 0) {
      distributable -= entry.fixedSize;
    } else {
      proportionSum += scaledWeight(entry, scale);
    }
  }

  const provisional = new Array<number>(count).fill(0);
  const visible = new Array<boolean>(count).fill(true);
  const fixedDelta = new Array<number>(count).fill(0);
  const proportionDelta = new Array<number>(count).fill(0);

  let proportionLeft = proportionSum;
  let distLeft = distributable;
  let pos = mainOrigin(rect, axis);

  for (let i = 0; i < count; i++) {
    const entry = entries[i];
    if (!entry) continue;
    const weight = scaledWeight(entry, scale);

    let size = entry.fixedSize;
    if (size <= 0) {
      if (proportionLeft > 0) {
        size = mulDiv(distLeft, weight, proportionLeft);
        distLeft -= size;
        proportionLeft -= weight;
      } else {
        size = 0;
      }
    }
    provisional[i] = size;

    const content = entry.content;
    if (content !== null) {
      const r = sliceOnAxis(rect, axis, pos, size);
      content.setRect(r.x, r.y, clampNonNegative(r.w), clampNonNegative(r.h));
      // Evaluated after setRect: the predicate may look at the size it was just given.
      const isVisible = content.isVisible();
      visible[i] = isVisible;

      const group = consumers[i] ?? [];
      if (!isVisible && group.length > 0) {
        const weightParts = splitEven(weight, group.length);
        const fixedParts = splitEven(entry.fixedSize, group.length);
        for (let k = 0; k < group.length; k++) {
          const j = group[k];
          if (j === undefined) continue;
          proportionDelta[j] = (proportionDelta[j] ?? 0) + (weightParts[k] ?? 0);
          fixedDelta[j] = (fixedDelta[j] ?? 0) + (fixedParts[k] ?? 0);
        }
        if (trace.enabled("trace", "layout")) {
          trace.emit("trace", "layout", "hidden item donates", {
            index: i,
            consumers: group,
            weightParts,
            fixedParts,
          });
        }
      }
    }
    pos += size;
  }

  return { distributable, proportionSum, provisional, visible, fixedDelta, proportionDelta };
}
