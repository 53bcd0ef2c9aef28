/**
 * packages/core/src/widgets/box.ts — Leaf widget holding geometry state.
 *
 * Why: Every widget needs a rect, a background, a visibility predicate and a
 * focus flag. `Box` carries exactly that and is composed into containers
 * rather than inherited from. It is also usable as a plain leaf child.
 */

import type { MouseAction, MouseEvent } from "../events.js";
import { clampNonNegative } from "../layout/bounds.js";
import { contains } from "../layout/hitTest.js";
import type { Rect } from "../layout/types.js";
import { type Surface, fillRect } from "../surface/types.js";
import { type CellStyle, DEFAULT_STYLE } from "./style.js";
import { MOUSE_IGNORED, type FlexChild, type MouseResult, type SetFocus } from "./types.js";
import { type VisibilityPredicate, alwaysVisible } from "./visibility.js";

export type BoxOptions = Readonly<{
  background?: CellStyle;
  visibility?: VisibilityPredicate;
  /** Draw a single-line border; the inner rect shrinks by one cell per side. */
  border?: boolean;
  borderStyle?: CellStyle;
  /** Whether a left click inside the box takes focus. Default false. */
  focusOnClick?: boolean;
}>;

const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

const BORDER_GLYPHS = Object.freeze({
  h: "─",
  v: "│",
  tl: "┌",
  tr: "┐",
  bl: "└",
  br: "┘",
});

export class Box implements FlexChild {
  private rect: Rect = EMPTY_RECT;
  private background: CellStyle;
  private visibility: VisibilityPredicate;
  private border: boolean;
  private borderStyle: CellStyle;
  private focusOnClick: boolean;
  private focused = false;

  constructor(opts: BoxOptions = {}) {
    this.background = opts.background ?? DEFAULT_STYLE;
    this.visibility = opts.visibility ?? alwaysVisible;
    this.border = opts.border ?? false;
    this.borderStyle = opts.borderStyle ?? this.background;
    this.focusOnClick = opts.focusOnClick ?? false;
  }

  setRect(x: number, y: number, w: number, h: number): void {
    this.rect = { x, y, w, h };
  }

  getRect(): Rect {
    return this.rect;
  }

  /** Rect available to content: the rect minus the border, if any. */
  getInnerRect(): Rect {
    if (!this.border) return this.rect;
    const { x, y, w, h } = this.rect;
    return { x: x + 1, y: y + 1, w: clampNonNegative(w - 2), h: clampNonNegative(h - 2) };
  }

  inRect(x: number, y: number): boolean {
    return contains(this.rect, x, y);
  }

  setBackground(style: CellStyle): this {
    this.background = style;
    return this;
  }

  getBackground(): CellStyle {
    return this.background;
  }

  setBorder(border: boolean, style?: CellStyle): this {
    this.border = border;
    if (style !== undefined) this.borderStyle = style;
    return this;
  }

  setVisibility(predicate: VisibilityPredicate): this {
    this.visibility = predicate;
    return this;
  }

  isVisible(): boolean {
    return this.visibility(this);
  }

  /** Set by the host when focus moves to or away from this box. */
  setFocused(focused: boolean): this {
    this.focused = focused;
    return this;
  }

  hasFocus(): boolean {
    return this.focused;
  }

  focus(delegate: SetFocus): void {
    delegate(this);
  }

  handleMouse(action: MouseAction, event: MouseEvent, setFocus: SetFocus): MouseResult {
    if (!this.inRect(event.x, event.y)) return MOUSE_IGNORED;
    if (this.focusOnClick && action === "down" && (event.buttons & 1) !== 0) {
      setFocus(this);
      return { consumed: true, capture: null };
    }
    return MOUSE_IGNORED;
  }

  draw(surface: Surface): void {
    const { x, y, w, h } = this.rect;
    fillRect(surface, x, y, w, h, this.background);
    if (this.border && w >= 2 && h >= 2) this.drawBorder(surface);
  }

  private drawBorder(surface: Surface): void {
    const { x, y, w, h } = this.rect;
    const s = this.borderStyle;
    const right = x + w - 1;
    const bottom = y + h - 1;
    for (let cx = x + 1; cx < right; cx++) {
      surface.setCell(cx, y, BORDER_GLYPHS.h, s);
      surface.setCell(cx, bottom, BORDER_GLYPHS.h, s);
    }
    for (let cy = y + 1; cy < bottom; cy++) {
      surface.setCell(x, cy, BORDER_GLYPHS.v, s);
      surface.setCell(right, cy, BORDER_GLYPHS.v, s);
    }
    surface.setCell(x, y, BORDER_GLYPHS.tl, s);
    surface.setCell(right, y, BORDER_GLYPHS.tr, s);
    surface.setCell(x, bottom, BORDER_GLYPHS.bl, s);
    surface.setCell(right, bottom, BORDER_GLYPHS.br, s);
  }
}
