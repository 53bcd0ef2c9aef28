/**
 * packages/core/src/layout/layout.ts — Visibility-aware flex layout pipeline.
 *
 * Why: Runs the whole computation for one container and one draw: sanitize
 * consumer lists, compute the scale factor, run the redistribution pass, run
 * the allocation pass. Nothing is cached between calls; the same entries and
 * the same visibility answers always produce the same placements.
 *
 * @see engine/redistribute.ts
 * @see engine/allocate.ts
 */

import { noopTrace } from "../debug/trace.js";
import type { LayoutTrace } from "../debug/types.js";
import { mainExtent } from "./bounds.js";
import { allocate } from "./engine/allocate.js";
import { redistribute } from "./engine/redistribute.js";
import { consumptionScale } from "./engine/scale.js";
import type { Axis, FlexEntry, LayoutProbe, Placement, Rect } from "./types.js";

export type FlexLayoutOptions = Readonly<{
  trace?: LayoutTrace;
}>;

export type FlexLayout<C extends LayoutProbe = LayoutProbe> = Readonly<{
  placements: readonly Placement<C>[];
  /** Scale factor L applied to every proportion. */
  scale: number;
  distributable: number;
  proportionSum: number;
  visible: readonly boolean[];
  fixedDelta: readonly number[];
  proportionDelta: readonly number[];
  /** Final size per item; `null` for hidden items. */
  sizes: readonly (number | null)[];
}>;

/**
 * Drop consumer indices that no longer point at an entry (e.g. after a
 * removal shifted the registry). Reported, never thrown.
 */
export function sanitizeConsumers(
  entries: readonly FlexEntry[],
  trace: LayoutTrace = noopTrace(),
): readonly (readonly number[])[] {
  const count = entries.length;
  const out = new Array<readonly number[]>(count);
  for (let i = 0; i < count; i++) {
    const group = entries[i]?.consumers ?? [];
    let kept: number[] | null = null;
    for (let k = 0; k < group.length; k++) {
      const j = group[k];
      const ok = j !== undefined && Number.isInteger(j) && j >= 0 && j < count;
      if (ok && kept === null) continue;
      if (kept === null) kept = group.slice(0, k);
      if (ok) {
        kept.push(j);
      } else {
        trace.emit("warn", "layout", "consumer index out of range, skipped", {
          index: i,
          consumer: j ?? null,
          count,
        });
      }
    }
    out[i] = kept ?? group;
  }
  return out;
}

export function layoutFlex<C extends LayoutProbe>(
  entries: readonly FlexEntry<C>[],
  rect: Rect,
  axis: Axis,
  opts: FlexLayoutOptions = {},
): FlexLayout<C> {
  const trace = opts.trace ?? noopTrace();
  const consumers = sanitizeConsumers(entries, trace);
  const scale = consumptionScale(consumers);

  const pass = redistribute({ entries, consumers, rect, axis, scale, trace });
  const { placements, sizes } = allocate({ entries, rect, axis, scale, pass });

  if (trace.enabled("info", "layout")) {
    trace.emit("info", "layout", "flex layout", {
      axis,
      extent: mainExtent(rect, axis),
      items: entries.length,
      scale,
      distributable: pass.distributable,
      proportionSum: pass.proportionSum,
      fixedDelta: pass.fixedDelta,
      proportionDelta: pass.proportionDelta,
      sizes,
    });
  }

  return {
    placements,
    scale,
    distributable: pass.distributable,
    proportionSum: pass.proportionSum,
    visible: pass.visible,
    fixedDelta: pass.fixedDelta,
    proportionDelta: pass.proportionDelta,
    sizes,
  };
}
