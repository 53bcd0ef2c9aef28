/**
 * packages/core/src/widgets/style.ts — Cell styling types and helpers.
 */

/** Packed RGB color (0x00RRGGBB). Value 0 is reserved as default/unset sentinel. */
export type Rgb24 = number;

/** Cell styling options. Omitted fields mean the terminal default. */
export type CellStyle = Readonly<{
  fg?: Rgb24;
  bg?: Rgb24;
  bold?: boolean;
  dim?: boolean;
  inverse?: boolean;
}>;

/** Terminal defaults, no attributes. */
export const DEFAULT_STYLE: CellStyle = Object.freeze({});

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. Note: `rgb(0, 0, 0)` encodes sentinel `0`. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function styleEquals(a: CellStyle, b: CellStyle): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    a.bold === b.bold &&
    a.dim === b.dim &&
    a.inverse === b.inverse
  );
}
