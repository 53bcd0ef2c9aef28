/**
 * packages/core/src/events.ts — Input events routed through containers.
 *
 * Decoding terminal input is the host's job; containers only route already
 * decoded events to the right child.
 */

/** Key event action type: down (press), up (release), or repeat (held). */
export type KeyAction = "down" | "up" | "repeat";

/** Modifier bit flags for `KeyEvent.mods` and `MouseEvent.mods`. */
export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;

export type KeyEvent = Readonly<{
  /** Key name, e.g. "a", "enter", "tab", "up". */
  key: string;
  action: KeyAction;
  mods: number;
}>;

/** Mouse action kinds. */
export type MouseAction = "move" | "drag" | "down" | "up" | "wheel";

export type MouseEvent = Readonly<{
  x: number;
  y: number;
  /** Pressed button bitmask (1 = left, 2 = middle, 4 = right). */
  buttons: number;
  mods: number;
  /** Wheel delta in rows; 0 for non-wheel actions. */
  wheelY: number;
}>;
