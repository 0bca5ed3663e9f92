/**
 * Cell colors
 *
 * A cell is either left at the terminal's default color or painted with a
 * 24-bit RGB color. Keeping "no color" as its own variant (instead of null)
 * makes color comparison during rendering a plain total function.
 */

export interface DefaultColor {
  kind: 'default';
}

export interface RgbColor {
  kind: 'rgb';
  r: number;
  g: number;
  b: number;
}

export type Color = DefaultColor | RgbColor;

/** Triple form used by palettes and themes */
export type Rgb = readonly [number, number, number];

export const DEFAULT_COLOR: DefaultColor = { kind: 'default' };

export const WHITE: RgbColor = { kind: 'rgb', r: 255, g: 255, b: 255 };

/**
 * Clamp a channel to an integer in [0, 255].
 * NaN collapses to 0.
 */
export function clampChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(255, Math.round(value)));
}

export function rgb(r: number, g: number, b: number): RgbColor {
  return { kind: 'rgb', r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) };
}

export function fromRgb([r, g, b]: Rgb): RgbColor {
  return rgb(r, g, b);
}

export function colorsEqual(a: Color, b: Color): boolean {
  if (a.kind === 'default' || b.kind === 'default') return a.kind === b.kind;
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Multiply every channel by a factor (clamped, so factors above 1 saturate).
 */
export function scaleColor(color: RgbColor, factor: number): RgbColor {
  return rgb(color.r * factor, color.g * factor, color.b * factor);
}

/**
 * Quadratic fade towards black: base * (life / maxLife)^2.
 * Full color at life === maxLife, black at life <= 0.
 */
export function fadeColor(base: RgbColor, life: number, maxLife: number): RgbColor {
  if (maxLife <= 0) return rgb(0, 0, 0);
  const ratio = Math.max(0, Math.min(1, life / maxLife));
  return scaleColor(base, ratio * ratio);
}

/** Average of a color and white */
export function pastel(color: RgbColor): RgbColor {
  return rgb((color.r + 255) / 2, (color.g + 255) / 2, (color.b + 255) / 2);
}

/** Linear blend, t = 0 gives `from`, t = 1 gives `to` */
export function mixColor(from: RgbColor, to: RgbColor, t: number): RgbColor {
  const k = Math.max(0, Math.min(1, t));
  return rgb(
    from.r + (to.r - from.r) * k,
    from.g + (to.g - from.g) * k,
    from.b + (to.b - from.b) * k,
  );
}

/**
 * Offset each channel independently by an integer in [-amount, amount].
 * `offset` supplies the per-channel offsets so callers decide the randomness.
 */
export function jitterColor(color: RgbColor, offset: () => number): RgbColor {
  return rgb(color.r + offset(), color.g + offset(), color.b + offset());
}
