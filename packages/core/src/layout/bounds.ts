import type { Axis, Rect } from "./types.js";

export const I32_MAX = 2147483647;

export function clampNonNegative(n: number): number {
  return n > 0 ? n : 0;
}

export function isInt32NonNegative(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= I32_MAX;
}

/** Integer division truncating toward zero. `den` must be non-zero. */
export function idiv(num: number, den: number): number {
  return Math.trunc(num / den);
}

/**
 * `trunc(a * b / den)` for integers, exact even when `a * b` is beyond
 * `Number.MAX_SAFE_INTEGER` (extent and int32 weights can get there).
 * `den` must be non-zero.
 */
export function mulDiv(a: number, b: number, den: number): number {
  const product = a * b;
  if (Number.isSafeInteger(product)) return idiv(product, den);
  return Number((BigInt(a) * BigInt(b)) / BigInt(den));
}

/** Extent of `rect` along the primary axis. */
export function mainExtent(rect: Rect, axis: Axis): number {
  return axis === "row" ? rect.w : rect.h;
}

/** Origin of `rect` along the primary axis. */
export function mainOrigin(rect: Rect, axis: Axis): number {
  return axis === "row" ? rect.x : rect.y;
}

/**
 * Slice of `container` starting at `pos` on the primary axis with `size`
 * cells; the cross axis spans the whole container.
 */
export function sliceOnAxis(container: Rect, axis: Axis, pos: number, size: number): Rect {
  return axis === "row"
    ? { x: pos, y: container.y, w: size, h: container.h }
    : { x: container.x, y: pos, w: container.w, h: size };
}

/** Same rect with negative dimensions clamped to zero. */
export function clampRect(rect: Rect): Rect {
  if (rect.w >= 0 && rect.h >= 0) return rect;
  return { x: rect.x, y: rect.y, w: clampNonNegative(rect.w), h: clampNonNegative(rect.h) };
}
