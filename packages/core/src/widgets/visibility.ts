/**
 * Visibility predicates.
 *
 * A predicate is evaluated fresh on every layout pass, after the child was
 * given its provisional rect, so it may depend on that size. Predicates must
 * not mutate the container they are asked about.
 */

import type { Rect } from "../layout/types.js";

/** Minimal view a predicate gets of the widget it decides for. */
export type VisibilityTarget = Readonly<{ getRect(): Rect }>;

export type VisibilityPredicate = (target: VisibilityTarget) => boolean;

export const alwaysVisible: VisibilityPredicate = () => true;

export const neverVisible: VisibilityPredicate = () => false;

/** Visible while `getter()` returns true (e.g. a toggle in app state). */
export function visibleWhen(getter: () => boolean): VisibilityPredicate {
  return () => getter();
}

/** Visible only while the widget's rect is at least `w` x `h` cells. */
export function minSize(min: Readonly<{ w?: number; h?: number }>): VisibilityPredicate {
  const minW = min.w ?? 0;
  const minH = min.h ?? 0;
  return (target) => {
    const r = target.getRect();
    return r.w >= minW && r.h >= minH;
  };
}

export function allOf(...predicates: readonly VisibilityPredicate[]): VisibilityPredicate {
  return (target) => predicates.every((p) => p(target));
}

export function anyOf(...predicates: readonly VisibilityPredicate[]): VisibilityPredicate {
  return (target) => predicates.some((p) => p(target));
}

export function not(predicate: VisibilityPredicate): VisibilityPredicate {
  return (target) => !predicate(target);
}
