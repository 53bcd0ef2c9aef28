import { assert, describe, test } from "@cellflex/testkit";
import type { Rect } from "../../layout/types.js";
import {
  allOf,
  alwaysVisible,
  anyOf,
  minSize,
  neverVisible,
  not,
  visibleWhen,
} from "../visibility.js";

function target(w: number, h: number) {
  const rect: Rect = { x: 0, y: 0, w, h };
  return { getRect: () => rect };
}

describe("visibility predicates", () => {
  test("constants", () => {
    assert.equal(alwaysVisible(target(0, 0)), true);
    assert.equal(neverVisible(target(10, 10)), false);
  });

  test("visibleWhen reads the getter on every call", () => {
    let shown = false;
    const p = visibleWhen(() => shown);
    assert.equal(p(target(1, 1)), false);
    shown = true;
    assert.equal(p(target(1, 1)), true);
  });

  test("minSize compares against the current rect", () => {
    const p = minSize({ w: 10, h: 2 });
    assert.equal(p(target(10, 2)), true);
    assert.equal(p(target(9, 2)), false);
    assert.equal(p(target(10, 1)), false);
    assert.equal(minSize({ h: 3 })(target(0, 3)), true);
  });

  test("combinators", () => {
    const wide = minSize({ w: 5 });
    const tall = minSize({ h: 5 });
    assert.equal(allOf(wide, tall)(target(5, 4)), false);
    assert.equal(anyOf(wide, tall)(target(5, 4)), true);
    assert.equal(not(wide)(target(4, 0)), true);
    assert.equal(allOf()(target(0, 0)), true);
    assert.equal(anyOf()(target(0, 0)), false);
  });
});
