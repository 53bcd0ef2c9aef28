import type { KeyAction, KeyEvent, MouseEvent } from "../events.js";

export type TestMouseInput = Readonly<{
  x: number;
  y: number;
  buttons?: number;
  mods?: number;
  wheelY?: number;
}>;

export function keyEvent(key: string, action: KeyAction = "down", mods = 0): KeyEvent {
  return { key, action, mods };
}

/** Mouse event with the left button pressed unless `buttons` says otherwise. */
export function mouseEvent(input: TestMouseInput): MouseEvent {
  return {
    x: input.x,
    y: input.y,
    buttons: input.buttons ?? 1,
    mods: input.mods ?? 0,
    wheelY: input.wheelY ?? 0,
  };
}
