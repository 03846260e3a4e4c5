/**
 * Low-level rasterization over RGBA buffers.
 *
 * Every primitive first marks the pixels it covers in a CoverageMask and then
 * composites the mask once with its color, so overlapping parts of one shape
 * (a polyline joint, a polygon edge over its fill) never blend twice.
 */

import { blendInto, type Rgba } from "./color.js";
import type { Point } from "./geometry.js";

export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  /** Row-major RGBA, 4 bytes per pixel. */
  readonly data: Uint8ClampedArray;
}

export type FillRule = "evenodd" | "nonzero";

export function createPixelBuffer(width: number, height: number, fill?: Rgba): PixelBuffer {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
      data[i + 3] = fill[3];
    }
  }
  return { width, height, data };
}

export class CoverageMask {
  readonly bits: Uint8Array;
  private minX = Infinity;
  private minY = Infinity;
  private maxX = -Infinity;
  private maxY = -Infinity;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.bits = new Uint8Array(width * height);
  }

  get empty(): boolean {
    return this.maxX < this.minX;
  }

  /** Inclusive bounds of the marked pixels, or null when nothing is marked. */
  get bounds(): { x0: number; y0: number; x1: number; y1: number } | null {
    if (this.empty) return null;
    return { x0: this.minX, y0: this.minY, x1: this.maxX, y1: this.maxY };
  }

  has(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return false;
    return this.bits[y * this.width + x] === 1;
  }

  set(x: number, y: number): void {
    if (!(x >= 0 && y >= 0 && x < this.width && y < this.height)) return;
    this.bits[y * this.width + x] = 1;
    this.grow(x, x, y);
  }

  clear(x: number, y: number): void {
    if (!(x >= 0 && y >= 0 && x < this.width && y < this.height)) return;
    this.bits[y * this.width + x] = 0;
  }

  /** Marks pixels x0..x1 (inclusive) on row y, clipped to the mask. */
  span(y: number, x0: number, x1: number): void {
    if (!(y >= 0 && y < this.height)) return;
    const from = Math.max(0, x0);
    const to = Math.min(this.width - 1, x1);
    if (!(from <= to)) return;
    this.bits.fill(1, y * this.width + from, y * this.width + to + 1);
    this.grow(from, to, y);
  }

  /** Unmarks every pixel that `other` marks. */
  subtract(other: CoverageMask): void {
    const b = other.bounds;
    if (!b) return;
    for (let y = b.y0; y <= b.y1; y++) {
      for (let x = b.x0; x <= b.x1; x++) {
        if (other.has(x, y)) this.clear(x, y);
      }
    }
  }

  private grow(x0: number, x1: number, y: number): void {
    if (x0 < this.minX) this.minX = x0;
    if (x1 > this.maxX) this.maxX = x1;
    if (y < this.minY) this.minY = y;
    if (y > this.maxY) this.maxY = y;
  }
}

interface Edge {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  dir: 1 | -1;
}

/**
 * Scanline fill of one or more closed contours. Rows are sampled at integer y
 * and each crossing pair covers pixels from ceil(xa) up to ceil(xb) - 1.
 */
export function fillPath(mask: CoverageMask, contours: readonly (readonly Point[])[], rule: FillRule = "evenodd"): void {
  const edges: Edge[] = [];
  let top = Infinity;
  let bottom = -Infinity;
  for (const contour of contours) {
    for (let i = 0; i < contour.length; i++) {
      const a = contour[i];
      const b = contour[(i + 1) % contour.length];
      if (!a || !b) continue;
      const [ax, ay] = a;
      const [bx, by] = b;
      if (![ax, ay, bx, by].every(Number.isFinite) || ay === by) continue;
      edges.push({ x0: ax, y0: ay, x1: bx, y1: by, dir: by > ay ? 1 : -1 });
      top = Math.min(top, ay, by);
      bottom = Math.max(bottom, ay, by);
    }
  }
  if (edges.length === 0) return;

  const yStart = Math.max(0, Math.ceil(top));
  const yEnd = Math.min(mask.height - 1, Math.floor(bottom));
  const crossings: { x: number; dir: number }[] = [];
  for (let y = yStart; y <= yEnd; y++) {
    crossings.length = 0;
    for (const e of edges) {
      const lower = Math.min(e.y0, e.y1);
      const upper = Math.max(e.y0, e.y1);
      if (y < lower || y >= upper) continue;
      crossings.push({ x: e.x0 + ((y - e.y0) * (e.x1 - e.x0)) / (e.y1 - e.y0), dir: e.dir });
    }
    crossings.sort((p, q) => p.x - q.x);

    if (rule === "evenodd") {
      for (let i = 0; i + 1 < crossings.length; i += 2) {
        const a = crossings[i];
        const b = crossings[i + 1];
        if (a && b) mask.span(y, Math.ceil(a.x), Math.ceil(b.x) - 1);
      }
      continue;
    }

    let winding = 0;
    let start = 0;
    for (const c of crossings) {
      const before = winding;
      winding += c.dir;
      if (before === 0 && winding !== 0) start = c.x;
      else if (before !== 0 && winding === 0) mask.span(y, Math.ceil(start), Math.ceil(c.x) - 1);
    }
  }
}

/**
 * Liang–Barsky clip of a segment to the box [x0, x1] × [y0, y1]. Returns the
 * clipped endpoints, or null when the segment misses the box.
 */
export function clipSegment(
  a: Point,
  b: Point,
  box: { x0: number; y0: number; x1: number; y1: number },
): [Point, Point] | null {
  const [ax, ay] = a;
  const dx = b[0] - ax;
  const dy = b[1] - ay;
  let t0 = 0;
  let t1 = 1;
  const edges: [number, number][] = [
    [-dx, ax - box.x0],
    [dx, box.x1 - ax],
    [-dy, ay - box.y0],
    [dy, box.y1 - ay],
  ];
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null;
      continue;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) return null;
      if (r > t0) t0 = r;
    } else {
      if (r < t0) return null;
      if (r < t1) t1 = r;
    }
  }
  return [
    [ax + t0 * dx, ay + t0 * dy],
    [ax + t1 * dx, ay + t1 * dy],
  ];
}

/** Bresenham between rounded endpoints, clipped to the mask first. */
export function plotLine(mask: CoverageMask, x0: number, y0: number, x1: number, y1: number): void {
  if (![x0, y0, x1, y1].every(Number.isFinite)) return;
  const clipped = clipSegment([x0, y0], [x1, y1], { x0: 0, y0: 0, x1: mask.width - 1, y1: mask.height - 1 });
  if (!clipped) return;
  const [[cx0, cy0], [cx1, cy1]] = clipped;
  let x = Math.round(cx0);
  let y = Math.round(cy0);
  const xe = Math.round(cx1);
  const ye = Math.round(cy1);
  const dx = Math.abs(xe - x);
  const dy = -Math.abs(ye - y);
  const sx = x < xe ? 1 : -1;
  const sy = y < ye ? 1 : -1;
  let err = dx + dy;
  for (;;) {
    mask.set(x, y);
    if (x === xe && y === ye) return;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y += sy;
    }
  }
}

/** Ellipse inscribed in the inclusive pixel box x0..x1, y0..y1. */
export function fillEllipse(mask: CoverageMask, x0: number, y0: number, x1: number, y1: number): void {
  const left = Math.round(x0);
  const right = Math.round(x1);
  const top = Math.round(y0);
  const bottom = Math.round(y1);
  if (!(right >= left && bottom >= top)) return;
  const cx = (left + right) / 2;
  const cy = (top + bottom) / 2;
  const rx = (right - left) / 2 + 0.5;
  const ry = (bottom - top) / 2 + 0.5;
  for (let y = Math.max(0, top); y <= Math.min(mask.height - 1, bottom); y++) {
    const dy = (y - cy) / ry;
    const t = 1 - dy * dy;
    if (t < 0) continue;
    const half = rx * Math.sqrt(t);
    mask.span(y, Math.ceil(cx - half), Math.floor(cx + half));
  }
}

/** Filled disk of the given diameter centered on (cx, cy). */
export function fillDisk(mask: CoverageMask, cx: number, cy: number, diameter: number): void {
  const d = Math.max(1, Math.round(diameter));
  const x0 = Math.round(cx - (d - 1) / 2);
  const y0 = Math.round(cy - (d - 1) / 2);
  fillEllipse(mask, x0, y0, x0 + d - 1, y0 + d - 1);
}

/** Rounded rectangle over the inclusive pixel box; radius is clamped to half the short side. */
export function fillRoundedRect(
  mask: CoverageMask,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  radius: number,
): void {
  const left = Math.round(x0);
  const right = Math.round(x1);
  const top = Math.round(y0);
  const bottom = Math.round(y1);
  if (!(right >= left && bottom >= top)) return;
  const maxRadius = Math.floor(Math.min(right - left + 1, bottom - top + 1) / 2);
  const r = Math.max(0, Math.min(Number.isFinite(radius) ? Math.round(radius) : 0, maxRadius));
  const reach = (r + 0.5) * (r + 0.5);
  for (let y = Math.max(0, top); y <= Math.min(mask.height - 1, bottom); y++) {
    let dy = 0;
    if (y < top + r) dy = top + r - y;
    else if (y > bottom - r) dy = y - (bottom - r);
    if (dy === 0) {
      mask.span(y, left, right);
      continue;
    }
    const s = Math.sqrt(Math.max(0, reach - dy * dy));
    mask.span(y, Math.ceil(left + r - s), Math.floor(right - r + s));
  }
}

/** Ring of the given width along the inside of a rounded rectangle. */
export function strokeRoundedRect(
  mask: CoverageMask,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  radius: number,
  width: number,
): void {
  const w = Math.max(1, Math.round(width));
  fillRoundedRect(mask, x0, y0, x1, y1, radius);
  const inner = new CoverageMask(mask.width, mask.height);
  fillRoundedRect(inner, x0 + w, y0 + w, x1 - w, y1 - w, Math.max(0, radius - w));
  mask.subtract(inner);
}

/** Ring of the given width along the inside of an ellipse. */
export function strokeEllipse(mask: CoverageMask, x0: number, y0: number, x1: number, y1: number, width: number): void {
  const w = Math.max(1, Math.round(width));
  fillEllipse(mask, x0, y0, x1, y1);
  const inner = new CoverageMask(mask.width, mask.height);
  fillEllipse(inner, x0 + w, y0 + w, x1 - w, y1 - w);
  mask.subtract(inner);
}

export interface StrokeOptions {
  closed?: boolean;
  /** Round the corners where segments meet. */
  roundJoins?: boolean;
}

/** Polyline of the given pixel width. */
export function strokePolyline(
  mask: CoverageMask,
  points: readonly Point[],
  width: number,
  options: StrokeOptions = {},
): void {
  const path = points.filter(([x, y]) => Number.isFinite(x) && Number.isFinite(y));
  if (path.length === 0) return;
  const first = path[0];
  if (options.closed && first && path.length >= 2) path.push(first);
  const w = Number.isFinite(width) ? Math.max(1, width) : 1;

  if (path.length === 1 && first) {
    fillDisk(mask, first[0], first[1], w);
    return;
  }

  for (let i = 0; i + 1 < path.length; i++) {
    const a = path[i];
    const b = path[i + 1];
    if (!a || !b) continue;
    strokeSegment(mask, a, b, w);
  }

  if (options.roundJoins && w > 2) {
    const last = path.length - 1;
    path.forEach(([x, y], i) => {
      if (options.closed || (i > 0 && i < last)) fillDisk(mask, x, y, w);
    });
  }
}

function strokeSegment(mask: CoverageMask, a: Point, b: Point, width: number): void {
  const [ax, ay] = a;
  const [bx, by] = b;
  plotLine(mask, ax, ay, bx, by);
  if (width < 2) return;
  const len = Math.hypot(bx - ax, by - ay);
  if (len === 0) {
    fillDisk(mask, ax, ay, width);
    return;
  }
  const nx = (-(by - ay) / len) * (width / 2);
  const ny = ((bx - ax) / len) * (width / 2);
  fillPath(
    mask,
    [
      [
        [ax + nx, ay + ny],
        [bx + nx, by + ny],
        [bx - nx, by - ny],
        [ax - nx, ay - ny],
      ],
    ],
    "nonzero",
  );
}

export function compositeMask(target: PixelBuffer, mask: CoverageMask, color: Rgba): void {
  const b = mask.bounds;
  if (!b || color[3] === 0) return;
  for (let y = b.y0; y <= b.y1; y++) {
    for (let x = b.x0; x <= b.x1; x++) {
      if (mask.bits[y * mask.width + x] === 1) blendInto(target.data, (y * target.width + x) * 4, color);
    }
  }
}

/** Source-over paste of `src` with its top-left corner at (ox, oy). */
export function compositeImage(target: PixelBuffer, src: PixelBuffer, ox: number, oy: number): void {
  const left = Math.round(ox);
  const top = Math.round(oy);
  for (let y = 0; y < src.height; y++) {
    const ty = top + y;
    if (ty < 0 || ty >= target.height) continue;
    for (let x = 0; x < src.width; x++) {
      const tx = left + x;
      if (tx < 0 || tx >= target.width) continue;
      const s = (y * src.width + x) * 4;
      const a = src.data[s + 3] ?? 0;
      if (a === 0) continue;
      blendInto(target.data, (ty * target.width + tx) * 4, [src.data[s] ?? 0, src.data[s + 1] ?? 0, src.data[s + 2] ?? 0, a]);
    }
  }
}

/** Resets every marked pixel to fully transparent black. */
export function eraseMask(target: PixelBuffer, mask: CoverageMask): void {
  const b = mask.bounds;
  if (!b) return;
  for (let y = b.y0; y <= b.y1; y++) {
    for (let x = b.x0; x <= b.x1; x++) {
      if (mask.bits[y * mask.width + x] === 1) target.data.fill(0, (y * target.width + x) * 4, (y * target.width + x) * 4 + 4);
    }
  }
}
