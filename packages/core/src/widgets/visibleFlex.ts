/**
 * packages/core/src/widgets/visibleFlex.ts — Visibility-aware flex container.
 *
 * Why: Arranges children along one axis, where any child may hide itself at
 * layout time and hand its space to configured sibling "consumers". This is
 * the boundary between the pure layout pipeline and the widget world: it
 * owns the registry, applies placements through `setRect`, draws, delegates
 * focus and routes input.
 *
 * Focus rules:
 *   - A hidden child never receives focus from `focus()`.
 *   - A focused child that becomes hidden is the child's own business.
 *
 * Mouse rules: events outside the container rect are ignored; hidden children
 * are never offered mouse events.
 *
 * @see ../layout/layout.ts
 */

import { noopTrace } from "../debug/trace.js";
import type { LayoutTrace } from "../debug/types.js";
import { FlexUiError } from "../errors.js";
import type { KeyEvent, MouseAction, MouseEvent } from "../events.js";
import { clampRect } from "../layout/bounds.js";
import { layoutFlex } from "../layout/layout.js";
import type { Axis, FlexEntry, Placement, Rect } from "../layout/types.js";
import { type LayoutResult, validateConsumers, validateItemSize } from "../layout/validateProps.js";
import { FlexRegistry } from "../registry/flexRegistry.js";
import type { Surface } from "../surface/types.js";
import { Box } from "./box.js";
import type { CellStyle } from "./style.js";
import { MOUSE_IGNORED, type FlexChild, type MouseResult, type SetFocus } from "./types.js";
import type { VisibilityPredicate } from "./visibility.js";

export type VisibleFlexOptions = Readonly<{
  /** Default "row": children side by side, width is distributed. */
  direction?: Axis;
  background?: CellStyle;
  visibility?: VisibilityPredicate;
  border?: boolean;
  trace?: LayoutTrace;
}>;

function unwrap<T>(res: LayoutResult<T>): T {
  if (!res.ok) throw new FlexUiError(res.fatal.code, res.fatal.detail);
  return res.value;
}

function requireAxis(op: string, axis: unknown): Axis {
  if (axis === "row" || axis === "column") return axis;
  throw new FlexUiError(
    "FLEX_INVALID_PROPS",
    `${op}.direction must be "row" or "column" (got ${String(axis)})`,
  );
}

export class VisibleFlex implements FlexChild {
  private readonly box: Box;
  private readonly registry = new FlexRegistry<FlexChild>();
  private direction: Axis;
  private trace: LayoutTrace;

  constructor(opts: VisibleFlexOptions = {}) {
    this.box = new Box({
      background: opts.background,
      visibility: opts.visibility,
      border: opts.border,
    });
    this.direction = opts.direction === undefined ? "row" : requireAxis("VisibleFlex", opts.direction);
    this.trace = opts.trace ?? noopTrace();
  }

  /* --- Configuration --- */

  setDirection(direction: Axis): this {
    this.direction = requireAxis("setDirection", direction);
    return this;
  }

  getDirection(): Axis {
    return this.direction;
  }

  setVisibility(predicate: VisibilityPredicate): this {
    this.box.setVisibility(predicate);
    return this;
  }

  setBackground(style: CellStyle): this {
    this.box.setBackground(style);
    return this;
  }

  setBorder(border: boolean, style?: CellStyle): this {
    this.box.setBorder(border, style);
    return this;
  }

  setTrace(trace: LayoutTrace): this {
    this.trace = trace;
    return this;
  }

  /* --- Registry --- */

  /**
   * Append a child. `content === null` adds an empty spacer.
   * `fixedSize > 0` reserves that many cells; otherwise the child takes a
   * share of the remaining space proportional to `proportion`.
   */
  addItem(content: FlexChild | null, fixedSize: number, proportion: number, focus = false): this {
    const size = unwrap(validateItemSize("addItem", fixedSize, proportion));
    this.registry.add(content, size.fixedSize, size.proportion, focus);
    return this;
  }

  /** Remove every item holding `content`, keeping the order of the rest. */
  removeItem(content: FlexChild | null): this {
    this.registry.remove(content);
    return this;
  }

  clear(): this {
    this.registry.clear();
    return this;
  }

  resizeItem(content: FlexChild | null, fixedSize: number, proportion: number): this {
    const size = unwrap(validateItemSize("resizeItem", fixedSize, proportion));
    this.registry.resize(content, size.fixedSize, size.proportion);
    return this;
  }

  /**
   * Set the sibling indices that absorb `content`'s space while it is hidden.
   * Every item holding `content` gets its own validated copy; nothing is
   * changed if any of them rejects the list.
   */
  setConsumers(content: FlexChild | null, consumers: readonly number[]): this {
    const count = this.registry.size;
    const updates: Array<Readonly<{ index: number; consumers: readonly number[] }>> = [];
    for (let i = 0; i < count; i++) {
      if (this.registry.at(i)?.content !== content) continue;
      updates.push({ index: i, consumers: unwrap(validateConsumers(i, count, consumers)) });
    }
    for (const u of updates) {
      this.registry.setConsumersAt(u.index, u.consumers);
    }
    return this;
  }

  get itemCount(): number {
    return this.registry.size;
  }

  items(): readonly FlexEntry<FlexChild>[] {
    return this.registry.snapshot();
  }

  /* --- Geometry --- */

  setRect(x: number, y: number, w: number, h: number): void {
    this.box.setRect(x, y, w, h);
  }

  getRect(): Rect {
    return this.box.getRect();
  }

  getInnerRect(): Rect {
    return this.box.getInnerRect();
  }

  isVisible(): boolean {
    return this.box.isVisible();
  }

  /**
   * Compute placements for `rect` (default: the inner rect) and apply them to
   * the visible children. Negative sizes are handed to children as 0.
   */
  layout(rect: Rect = this.getInnerRect()): readonly Placement<FlexChild>[] {
    const result = layoutFlex(this.registry.snapshot(), rect, this.direction, {
      trace: this.trace,
    });
    for (const p of result.placements) {
      if (p.content === null) continue;
      const r = clampRect(p.rect);
      p.content.setRect(r.x, r.y, r.w, r.h);
    }
    return result.placements;
  }

  /* --- Drawing --- */

  /**
   * Fill the container rect with the background, then lay out and draw the
   * visible children. A focused child is drawn last so its content is on top.
   */
  draw(surface: Surface): void {
    this.box.draw(surface);
    if (!this.isVisible()) {
      this.trace.emit("trace", "draw", "container hidden, background only", {
        rect: this.getRect(),
      });
      return;
    }

    const placements = this.layout();
    const deferred: FlexChild[] = [];
    for (const p of placements) {
      const child = p.content;
      if (child === null) continue;
      if (child.hasFocus()) {
        deferred.push(child);
        continue;
      }
      child.draw(surface);
    }
    for (const child of deferred) {
      child.draw(surface);
    }
  }

  /* --- Focus --- */

  /** Delegate focus to the first focus-attracting visible child. */
  focus(delegate: SetFocus): void {
    const entries = this.registry.snapshot();
    for (let i = 0; i < entries.length; i++) {
      const e = entries[i];
      if (!e || !e.focus || e.content === null) continue;
      if (!e.content.isVisible()) continue;
      this.trace.emit("trace", "focus", "delegating focus", { index: i });
      delegate(e.content);
      return;
    }
    this.trace.emit("trace", "focus", "no visible focus target");
  }

  hasFocus(): boolean {
    for (const e of this.registry.entries()) {
      if (e.content !== null && e.content.hasFocus()) return true;
    }
    return false;
  }

  /* --- Input --- */

  /** Forward to the first focused child that handles keys. */
  handleKey(event: KeyEvent, setFocus: SetFocus): boolean {
    for (const e of this.registry.snapshot()) {
      const child = e.content;
      if (child === null || !child.hasFocus() || child.handleKey === undefined) continue;
      return child.handleKey(event, setFocus);
    }
    return false;
  }

  /** Offer the event to visible children in order until one consumes it. */
  handleMouse(action: MouseAction, event: MouseEvent, setFocus: SetFocus): MouseResult {
    if (!this.box.inRect(event.x, event.y)) return MOUSE_IGNORED;
    for (const e of this.registry.snapshot()) {
      const child = e.content;
      if (child === null || child.handleMouse === undefined) continue;
      if (!child.isVisible()) continue;
      const res = child.handleMouse(action, event, setFocus);
      if (res.consumed) {
        this.trace.emit("trace", "input", "mouse consumed", { action, x: event.x, y: event.y });
        return res;
      }
    }
    return MOUSE_IGNORED;
  }
}
