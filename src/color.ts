/**
 * RGBA color helpers shared by every drawing primitive.
 * Channels are integers in [0, 255]; a 3-element input gets full opacity.
 */

export type Rgba = readonly [number, number, number, number];

/** Color as exchanged with callers: `[r, g, b]` or `[r, g, b, a]`. */
export type ColorInput = readonly number[];

export const TRANSPARENT: Rgba = [0, 0, 0, 0];
export const WHITE: Rgba = [255, 255, 255, 255];
export const BLACK: Rgba = [0, 0, 0, 255];

function channel(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(0, Math.min(255, Math.round(value)));
}

export function toRgba(color: ColorInput): Rgba {
  return [
    channel(color[0], 0),
    channel(color[1], 0),
    channel(color[2], 0),
    channel(color.length >= 4 ? color[3] : 255, 255),
  ];
}

export function withAlpha(color: ColorInput, alpha: number): Rgba {
  const [r, g, b] = toRgba(color);
  return [r, g, b, channel(alpha, 255)];
}

/** Linear interpolation per channel, truncated toward zero. */
export function lerpColor(from: ColorInput, to: ColorInput, t: number): Rgba {
  const a = toRgba(from);
  const b = toRgba(to);
  const k = Math.max(0, Math.min(1, t));
  return [
    Math.trunc(a[0] + (b[0] - a[0]) * k),
    Math.trunc(a[1] + (b[1] - a[1]) * k),
    Math.trunc(a[2] + (b[2] - a[2]) * k),
    Math.trunc(a[3] + (b[3] - a[3]) * k),
  ];
}

export function sameColor(a: Rgba, b: Rgba): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

/**
 * Source-over composite of `src` onto the pixel at `offset` in `data`.
 * An opaque source replaces the destination outright.
 */
export function blendInto(data: Uint8ClampedArray, offset: number, src: Rgba): void {
  const sa = src[3];
  if (sa === 0) return;
  if (sa === 255) {
    data[offset] = src[0];
    data[offset + 1] = src[1];
    data[offset + 2] = src[2];
    data[offset + 3] = 255;
    return;
  }
  const srcA = sa / 255;
  const dstA = (data[offset + 3] ?? 0) / 255;
  const outA = srcA + dstA * (1 - srcA);
  for (let i = 0; i < 3; i++) {
    const s = src[i] ?? 0;
    const d = data[offset + i] ?? 0;
    data[offset + i] = Math.round((s * srcA + d * dstA * (1 - srcA)) / outA);
  }
  data[offset + 3] = Math.round(outA * 255);
}
