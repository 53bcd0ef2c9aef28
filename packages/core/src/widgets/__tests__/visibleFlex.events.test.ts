import { assert, describe, test } from "@cellflex/testkit";
import { keyEvent, mouseEvent } from "../../testing/events.js";
import { RecordingChild } from "../../testing/recordingChild.js";
import type { FlexChild } from "../types.js";
import { VisibleFlex } from "../visibleFlex.js";
import { neverVisible } from "../visibility.js";

function collector(): { seen: FlexChild[]; setFocus: (t: FlexChild) => void } {
  const seen: FlexChild[] = [];
  return { seen, setFocus: (t) => seen.push(t) };
}

describe("VisibleFlex - focus", () => {
  test("delegates to the first visible focus-attracting child", () => {
    const a = new RecordingChild("a");
    const b = new RecordingChild("b", { visibility: neverVisible });
    const c = new RecordingChild("c");
    const flex = new VisibleFlex()
      .addItem(a, 0, 1, false)
      .addItem(null, 0, 1, true)
      .addItem(b, 0, 1, true)
      .addItem(c, 0, 1, true);
    const { seen, setFocus } = collector();
    flex.focus(setFocus);
    assert.deepEqual(seen, [c]);
  });

  test("no eligible child means no delegation", () => {
    const flex = new VisibleFlex().addItem(new RecordingChild("a"), 0, 1, false);
    const { seen, setFocus } = collector();
    flex.focus(setFocus);
    assert.deepEqual(seen, []);
  });

  test("hasFocus reflects any focused child", () => {
    const a = new RecordingChild("a");
    const flex = new VisibleFlex().addItem(null, 0, 1).addItem(a, 0, 1);
    assert.equal(flex.hasFocus(), false);
    a.setFocused(true);
    assert.equal(flex.hasFocus(), true);
  });
});

describe("VisibleFlex - keys", () => {
  test("forwards to the focused child", () => {
    const a = new RecordingChild("a");
    const b = new RecordingChild("b", { focused: true, handlesKeys: true });
    const flex = new VisibleFlex().addItem(a, 0, 1).addItem(b, 0, 1);
    const { setFocus } = collector();
    assert.equal(flex.handleKey(keyEvent("enter"), setFocus), true);
    assert.equal(a.keys.length, 0);
    assert.deepEqual(b.keys, [{ event: { key: "enter", action: "down", mods: 0 } }]);
  });

  test("stops at the first focused child even if it does not handle the key", () => {
    const a = new RecordingChild("a", { focused: true });
    const b = new RecordingChild("b", { focused: true, handlesKeys: true });
    const flex = new VisibleFlex().addItem(a, 0, 1).addItem(b, 0, 1);
    const { setFocus } = collector();
    assert.equal(flex.handleKey(keyEvent("x"), setFocus), false);
    assert.equal(a.keys.length, 1);
    assert.equal(b.keys.length, 0);
  });

  test("nothing focused: not handled", () => {
    const flex = new VisibleFlex().addItem(new RecordingChild("a", { handlesKeys: true }), 0, 1);
    const { setFocus } = collector();
    assert.equal(flex.handleKey(keyEvent("x"), setFocus), false);
  });
});

describe("VisibleFlex - mouse", () => {
  function setup() {
    const c = new RecordingChild("c", { visibility: neverVisible, consumesMouse: true });
    const a = new RecordingChild("a");
    const b = new RecordingChild("b", { consumesMouse: true });
    const flex = new VisibleFlex().addItem(c, 0, 1).addItem(a, 0, 1).addItem(b, 0, 1);
    flex.setConsumers(c, [1]);
    flex.setRect(0, 0, 10, 2);
    flex.layout();
    return { flex, a, b, c };
  }

  test("placements after the hidden child donates to a", () => {
    const { a, b } = setup();
    assert.rectEqual(a.lastRect(), { x: 0, y: 0, w: 6, h: 2 });
    assert.rectEqual(b.lastRect(), { x: 6, y: 0, w: 4, h: 2 });
  });

  test("events outside the container are ignored", () => {
    const { flex, a, b } = setup();
    const { seen, setFocus } = collector();
    const res = flex.handleMouse("down", mouseEvent({ x: 12, y: 0 }), setFocus);
    assert.deepEqual(res, { consumed: false, capture: null });
    assert.equal(a.mouse.length + b.mouse.length, 0);
    assert.deepEqual(seen, []);
  });

  test("offered to visible children in order until consumed", () => {
    const { flex, a, b, c } = setup();
    const { seen, setFocus } = collector();
    const res = flex.handleMouse("down", mouseEvent({ x: 7, y: 1 }), setFocus);
    assert.equal(res.consumed, true);
    assert.equal(a.mouse.length, 1);
    assert.equal(b.mouse.length, 1);
    assert.deepEqual(seen, [b]);
    assert.equal(c.mouse.length, 0);
  });

  test("hidden children are never offered events, even over their old rect", () => {
    const { flex, a, b, c } = setup();
    const { seen, setFocus } = collector();
    const res = flex.handleMouse("down", mouseEvent({ x: 1, y: 0 }), setFocus);
    assert.equal(res.consumed, false);
    assert.equal(c.mouse.length, 0);
    assert.equal(a.mouse.length, 1);
    assert.equal(b.mouse.length, 1);
    assert.deepEqual(seen, []);
  });
});
