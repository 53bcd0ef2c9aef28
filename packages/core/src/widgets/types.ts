/**
 * packages/core/src/widgets/types.ts — Child capability interface.
 *
 * Why: Containers never inherit from their children's base class. Every child
 * type (leaf boxes, nested containers, host widgets) implements this
 * interface and is dispatched through it.
 */

import type { KeyEvent, MouseAction, MouseEvent } from "../events.js";
import type { LayoutProbe, Rect } from "../layout/types.js";
import type { Surface } from "../surface/types.js";

/** Callback a child uses to ask the host to move focus. */
export type SetFocus = (target: FlexChild) => void;

/** Result of offering a mouse event to a child. */
export type MouseResult = Readonly<{
  consumed: boolean;
  /** Child that wants subsequent mouse events until release. */
  capture: FlexChild | null;
}>;

export const MOUSE_IGNORED: MouseResult = Object.freeze({ consumed: false, capture: null });

export interface FlexChild extends LayoutProbe {
  hasFocus(): boolean;
  getRect(): Rect;
  draw(surface: Surface): void;
  /** Hand focus to this child or one of its descendants. Leaves call `delegate(this)`. */
  focus?(delegate: SetFocus): void;
  /** Returns true when the event was handled. */
  handleKey?(event: KeyEvent, setFocus: SetFocus): boolean;
  handleMouse?(action: MouseAction, event: MouseEvent, setFocus: SetFocus): MouseResult;
}
