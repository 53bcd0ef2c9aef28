import type { CellStyle } from "../widgets/style.js";

/**
 * Cell grid a widget draws into. Implemented by the host renderer; the
 * container only writes cells through it.
 *
 * Writes outside `0 <= x < cols`, `0 <= y < rows` must be ignored.
 */
export interface Surface {
  readonly cols: number;
  readonly rows: number;
  setCell(x: number, y: number, ch: string, style: CellStyle): void;
}

/** Fill a rectangle with `ch` in `style`. Clipped to the surface. */
export function fillRect(
  surface: Surface,
  x: number,
  y: number,
  w: number,
  h: number,
  style: CellStyle,
  ch = " ",
): void {
  const x0 = Math.max(0, x);
  const y0 = Math.max(0, y);
  const x1 = Math.min(surface.cols, x + w);
  const y1 = Math.min(surface.rows, y + h);
  for (let cy = y0; cy < y1; cy++) {
    for (let cx = x0; cx < x1; cx++) {
      surface.setCell(cx, cy, ch, style);
    }
  }
}
