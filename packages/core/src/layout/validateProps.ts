/**
 * packages/core/src/layout/validateProps.ts — Container argument validation.
 *
 * Why: Validates item sizes and consumer lists before they enter the
 * registry. Returns structured fatal errors instead of throwing so callers
 * decide how to surface them; the container widget turns them into
 * `FlexUiError`.
 *
 * Validation rules:
 *   - `fixedSize` and `proportion` must be int32 >= 0
 *   - consumer indices must be int32 >= 0, below the current item count,
 *     unique, and must not name the owning item itself
 */

import type { FlexUiErrorCode } from "../errors.js";
import { isInt32NonNegative } from "./bounds.js";

/** Fatal error for invalid container arguments. */
export type InvalidPropsFatal = Readonly<{ code: FlexUiErrorCode; detail: string }>;

/** Validation result: success with value, or failure with fatal error. */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

export type ValidatedItemSize = Readonly<{ fixedSize: number; proportion: number }>;

function invalid(code: FlexUiErrorCode, detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}

function describeValue(v: unknown): string {
  if (typeof v === "number") return String(v);
  if (typeof v === "string") return JSON.stringify(v);
  return typeof v;
}

function requireIntNonNegative(op: string, name: string, v: unknown): LayoutResult<number> {
  if (!isInt32NonNegative(v)) {
    return invalid(
      "FLEX_INVALID_PROPS",
      `${op}.${name} must be an int32 >= 0 (got ${describeValue(v)})`,
    );
  }
  return { ok: true, value: v };
}

export function validateItemSize(
  op: string,
  fixedSize: unknown,
  proportion: unknown,
): LayoutResult<ValidatedItemSize> {
  const fixed = requireIntNonNegative(op, "fixedSize", fixedSize);
  if (!fixed.ok) return fixed;
  const prop = requireIntNonNegative(op, "proportion", proportion);
  if (!prop.ok) return prop;
  return { ok: true, value: { fixedSize: fixed.value, proportion: prop.value } };
}

/**
 * Validate a consumer list for the item at `ownerIndex` in a registry of
 * `itemCount` items.
 *
 * Cycles between distinct items are accepted: donated space is never
 * forwarded, so a cycle cannot loop.
 */
export function validateConsumers(
  ownerIndex: number,
  itemCount: number,
  consumers: unknown,
): LayoutResult<readonly number[]> {
  if (!Array.isArray(consumers)) {
    return invalid("FLEX_INVALID_CONSUMERS", "setConsumers.consumers must be an array");
  }
  const out: number[] = [];
  for (let k = 0; k < consumers.length; k++) {
    const raw: unknown = consumers[k];
    if (!isInt32NonNegative(raw)) {
      return invalid(
        "FLEX_INVALID_CONSUMERS",
        `setConsumers.consumers[${String(k)}] must be an int32 >= 0 (got ${describeValue(raw)})`,
      );
    }
    if (raw >= itemCount) {
      return invalid(
        "FLEX_INVALID_CONSUMERS",
        `setConsumers.consumers[${String(k)}]=${String(raw)} is out of range (items=${String(itemCount)})`,
      );
    }
    if (raw === ownerIndex) {
      return invalid(
        "FLEX_INVALID_CONSUMERS",
        `setConsumers.consumers[${String(k)}]=${String(raw)} refers to the item itself`,
      );
    }
    if (out.includes(raw)) {
      return invalid(
        "FLEX_INVALID_CONSUMERS",
        `setConsumers.consumers[${String(k)}]=${String(raw)} is duplicated`,
      );
    }
    out.push(raw);
  }
  return { ok: true, value: Object.freeze(out) };
}
