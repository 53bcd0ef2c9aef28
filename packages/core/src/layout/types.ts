/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by the layout passes and the
 * container widget. All coordinates are in terminal cell units (not pixels).
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/**
 * Layout axis.
 *
 * - `"row"`: children sit side by side; width is distributed (primary axis x).
 * - `"column"`: children are stacked; height is distributed (primary axis y).
 */
export type Axis = "row" | "column";

/**
 * What a layout pass needs from a child: somewhere to put a provisional rect
 * and a visibility answer that may depend on that rect.
 */
export interface LayoutProbe {
  setRect(x: number, y: number, w: number, h: number): void;
  isVisible(): boolean;
}

/**
 * One registry record as seen by the layout passes.
 *
 * `content === null` is an empty spacer: it takes space and is always visible.
 * `consumers` are sibling indices that absorb this item's space while it is hidden.
 */
export type FlexEntry<C extends LayoutProbe = LayoutProbe> = Readonly<{
  content: C | null;
  fixedSize: number;
  proportion: number;
  focus: boolean;
  consumers: readonly number[];
}>;

/** Final rectangle for one visible item of one layout pass. */
export type Placement<C extends LayoutProbe = LayoutProbe> = Readonly<{
  /** Index of the item in the registry. */
  index: number;
  content: C | null;
  /** Unclamped; `w`/`h` may be negative for degenerate container extents. */
  rect: Rect;
}>;
