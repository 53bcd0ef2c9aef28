import { type Rng, assert, describe, test, withSeed } from "@cellflex/testkit";
import { RecordingChild } from "../../testing/recordingChild.js";
import { neverVisible } from "../../widgets/visibility.js";
import { I32_MAX, mulDiv } from "../bounds.js";
import { layoutFlex } from "../layout.js";
import type { Axis, FlexEntry, Rect } from "../types.js";

type Spec = Readonly<{ fixedSize: number; proportion: number }>;

const SEEDS = [1, 2, 3, 5, 8, 13, 21, 34, 55, 89, 144, 233];

function randomSpecs(rng: Rng): Spec[] {
  const count = rng.int(1, 8);
  const specs: Spec[] = [];
  for (let i = 0; i < count; i++) {
    const fixed = rng.int(0, 3) === 0;
    specs.push(fixed ? { fixedSize: rng.int(1, 6), proportion: 0 } : { fixedSize: 0, proportion: rng.int(1, 9) });
  }
  // At least one proportional item so the remainder has somewhere to go.
  specs.push({ fixedSize: 0, proportion: rng.int(1, 9) });
  return specs;
}

function toEntries(
  specs: readonly Spec[],
  hiddenIndex = -1,
  consumers: readonly number[] = [],
): FlexEntry<RecordingChild>[] {
  return specs.map((s, i) => ({
    content: new RecordingChild(`c${String(i)}`, i === hiddenIndex ? { visibility: neverVisible } : {}),
    fixedSize: s.fixedSize,
    proportion: s.proportion,
    focus: false,
    consumers: i === hiddenIndex ? consumers : [],
  }));
}

function containerRect(rng: Rng, axis: Axis, extent: number): Rect {
  const cross = rng.int(1, 40);
  const x = rng.int(0, 20);
  const y = rng.int(0, 20);
  return axis === "row" ? { x, y, w: extent, h: cross } : { x, y, w: cross, h: extent };
}

function mainSizes(res: ReturnType<typeof layoutFlex>, axis: Axis): number[] {
  return res.placements.map((p) => (axis === "row" ? p.rect.w : p.rect.h));
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

function assertContiguous(res: ReturnType<typeof layoutFlex>, rect: Rect, axis: Axis): void {
  let pos = axis === "row" ? rect.x : rect.y;
  for (const p of res.placements) {
    assert.equal(axis === "row" ? p.rect.x : p.rect.y, pos, "placements must not leave gaps");
    if (axis === "row") {
      assert.equal(p.rect.y, rect.y);
      assert.equal(p.rect.h, rect.h);
    } else {
      assert.equal(p.rect.x, rect.x);
      assert.equal(p.rect.w, rect.w);
    }
    pos += axis === "row" ? p.rect.w : p.rect.h;
  }
}

describe("layoutFlex properties (seeded)", () => {
  test("all visible: sizes partition the extent exactly", () => {
    for (const seed of SEEDS) {
      withSeed("partition", seed, (rng) => {
        const axis = rng.pick<Axis>(["row", "column"]);
        const specs = randomSpecs(rng);
        const extent = rng.int(0, 300);
        const rect = containerRect(rng, axis, extent);
        const res = layoutFlex(toEntries(specs), rect, axis);
        assert.equal(res.placements.length, specs.length);
        assert.equal(sum(mainSizes(res, axis)), extent);
        assertContiguous(res, rect, axis);
      });
    }
  });

  test("fixed items always get at least their fixed size", () => {
    for (const seed of SEEDS) {
      withSeed("fixed-priority", seed, (rng) => {
        const specs = randomSpecs(rng);
        const rect = containerRect(rng, "row", rng.int(0, 200));
        const res = layoutFlex(toEntries(specs), rect, "row");
        for (const p of res.placements) {
          const item = specs[p.index];
          if (item && item.fixedSize > 0) assert.ok(p.rect.w >= item.fixedSize);
        }
      });
    }
  });

  test("a hidden item with visible consumers leaves no space unused", () => {
    for (const seed of SEEDS) {
      withSeed("donation-partition", seed, (rng) => {
        const axis = rng.pick<Axis>(["row", "column"]);
        const specs = randomSpecs(rng);
        const hiddenIndex = rng.int(0, specs.length - 1);
        const others: number[] = [];
        for (let i = 0; i < specs.length; i++) if (i !== hiddenIndex) others.push(i);
        const consumers = others.filter(() => rng.int(0, 1) === 1);
        if (consumers.length === 0 && others[0] !== undefined) consumers.push(others[0]);
        const extent = rng.int(0, 300);
        const rect = containerRect(rng, axis, extent);
        const res = layoutFlex(toEntries(specs, hiddenIndex, consumers), rect, axis);
        assert.equal(res.placements.length, specs.length - 1);
        assert.equal(sum(mainSizes(res, axis)), extent);
        assertContiguous(res, rect, axis);
      });
    }
  });

  test("a hidden item without consumers never increases the total", () => {
    for (const seed of SEEDS) {
      withSeed("drop", seed, (rng) => {
        const specs = randomSpecs(rng);
        let fixedTotal = 0;
        for (const s of specs) fixedTotal += s.fixedSize;
        const extent = fixedTotal + rng.int(0, 200);
        const hiddenIndex = rng.int(0, specs.length - 1);
        const res = layoutFlex(toEntries(specs, hiddenIndex), containerRect(rng, "row", extent), "row");
        assert.ok(sum(mainSizes(res, "row")) <= extent);
        assert.equal(res.sizes[hiddenIndex], null);
      });
    }
  });

  test("layout is idempotent for unchanged inputs", () => {
    for (const seed of SEEDS) {
      withSeed("idempotent", seed, (rng) => {
        const specs = randomSpecs(rng);
        const hiddenIndex = rng.int(-1, specs.length - 1);
        const consumers = hiddenIndex > 0 ? [0] : [];
        const entries = toEntries(specs, hiddenIndex, consumers);
        const rect = containerRect(rng, "column", rng.int(0, 120));
        const first = layoutFlex(entries, rect, "column");
        const second = layoutFlex(entries, rect, "column");
        assert.deepEqual(
          second.placements.map((p) => [p.index, p.rect]),
          first.placements.map((p) => [p.index, p.rect]),
        );
      });
    }
  });

  test("int32 proportions and extents still partition exactly", () => {
    for (const seed of SEEDS) {
      withSeed("large-proportions", seed, (rng) => {
        const count = rng.int(2, 9);
        const specs: Spec[] = [];
        for (let i = 0; i < count; i++) specs.push({ fixedSize: 0, proportion: rng.int(1, I32_MAX) });
        const extent = rng.int(1, I32_MAX);
        const hiddenIndex = rng.int(-1, count - 1);
        const consumers = hiddenIndex === 0 ? [1] : [0];
        const rect: Rect = { x: 0, y: 0, w: extent, h: 1 };
        const res = layoutFlex(toEntries(specs, hiddenIndex, consumers), rect, "row");
        assert.equal(sum(mainSizes(res, "row")), extent);
        assertContiguous(res, rect, "row");
      });
    }
  });

  test("proportions whose products pass 2^53 do not drift", () => {
    const props = [67558462, 273852879, 2001310514, 1569231424, 279734000, 895459545];
    const specs = props.map((proportion) => ({ fixedSize: 0, proportion }));
    const rect: Rect = { x: 0, y: 0, w: 593107637, h: 1 };
    const res = layoutFlex(toEntries(specs), rect, "row");
    assert.equal(res.placements.length, 6);
    assert.equal(sum(mainSizes(res, "row")), 593107637);
    assertContiguous(res, rect, "row");
  });
});

describe("mulDiv", () => {
  test("small products divide as usual", () => {
    assert.equal(mulDiv(100, 1, 3), 33);
    assert.equal(mulDiv(-7, 1, 2), -3);
  });

  test("exact beyond the safe integer range", () => {
    // 2147482880 * 2147483645 rounds down as a double; the quotient must still be exact.
    assert.equal(mulDiv(2147482880, 2147483645, 2147482880), 2147483645);
    assert.equal(mulDiv(-2147482880, 2147483645, 2147482880), -2147483645);
  });
});
