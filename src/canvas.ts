import { TRANSPARENT, blendInto, lerpColor, sameColor, toRgba, type ColorInput, type Rgba } from "./color.js";
import { arcPoints, regularPolygonVertices, sampleBezier, type Point } from "./geometry.js";
import {
  CoverageMask,
  compositeImage,
  compositeMask,
  createPixelBuffer,
  eraseMask,
  fillDisk,
  fillEllipse,
  fillPath,
  fillRoundedRect,
  strokeEllipse,
  strokePolyline,
  strokeRoundedRect,
  type PixelBuffer,
} from "./raster.js";
import { measureText, rasterizeText, resolveFont, type TextMetrics } from "./text.js";

/** Pixels a single flood fill may recolor before it stops expanding. */
export const FLOOD_FILL_LIMIT = 100_000;

export interface ShapeStyle {
  fill?: ColorInput;
  border?: ColorInput;
  /** Defaults to 1 when a border color is given. */
  borderWidth?: number;
}

export type GradientDirection = "horizontal" | "vertical" | "diagonal" | "radial";

export interface Gradient {
  direction: GradientDirection;
  /** Color reached at the far end; the start color is the style's `fill`. */
  endColor: ColorInput;
}

export interface RoundedRectStyle extends ShapeStyle {
  gradient?: Gradient;
}

export interface RegularPolygonStyle extends ShapeStyle {
  /** Degrees; 0 puts a vertex straight up. */
  rotation?: number;
}

function borderWidthOf(style: ShapeStyle): number {
  if (!style.border) return 0;
  const w = style.borderWidth ?? 1;
  return Number.isFinite(w) && w > 0 ? Math.round(w) : 0;
}

function toInt(value: number, fallback = 1): number {
  return Number.isFinite(value) ? Math.max(1, Math.trunc(value)) : fallback;
}

/**
 * An RGBA raster with immediate-mode drawing primitives. Origin is top-left
 * and y grows downward; anything outside the buffer is clipped.
 *
 * Every primitive builds the coverage of the shape first and composites it
 * once, source-over, so semi-transparent colors blend exactly once per pixel.
 */
export class Canvas {
  readonly width: number;
  readonly height: number;
  private readonly buffer: PixelBuffer;

  constructor(width: number, height: number, background: ColorInput = TRANSPARENT) {
    this.width = toInt(width);
    this.height = toInt(height);
    this.buffer = createPixelBuffer(this.width, this.height, toRgba(background));
  }

  getPixel(x: number, y: number): Rgba | undefined {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return undefined;
    const o = (y * this.width + x) * 4;
    const d = this.buffer.data;
    return [d[o] ?? 0, d[o + 1] ?? 0, d[o + 2] ?? 0, d[o + 3] ?? 0];
  }

  /** A copy of the current pixels; later draws do not affect it. */
  snapshot(): PixelBuffer {
    return { width: this.width, height: this.height, data: this.buffer.data.slice() };
  }

  rect(x: number, y: number, w: number, h: number, style: ShapeStyle = {}): void {
    this.roundedRect(x, y, w, h, 0, style);
  }

  roundedRect(x: number, y: number, w: number, h: number, radius: number, style: RoundedRectStyle = {}): void {
    const box = this.box(x, y, w, h);
    if (!box) return;
    const [x0, y0, x1, y1] = box;
    if (style.fill) {
      const mask = this.mask();
      fillRoundedRect(mask, x0, y0, x1, y1, radius);
      if (style.gradient) this.paintGradient(mask, box, toRgba(style.fill), style.gradient);
      else this.paint(mask, style.fill);
    }
    const bw = borderWidthOf(style);
    if (bw > 0 && style.border) {
      const ring = this.mask();
      strokeRoundedRect(ring, x0, y0, x1, y1, radius, bw);
      this.paint(ring, style.border);
    }
  }

  /**
   * Ellipse inscribed in the box. With both fill and border the border is a
   * larger concentric ellipse underneath the fill; a border alone is a ring.
   */
  ellipse(x: number, y: number, w: number, h: number, style: ShapeStyle = {}): void {
    const box = this.box(x, y, w, h);
    if (box) this.ellipseBox(box, style);
  }

  circle(cx: number, cy: number, radius: number, style: ShapeStyle = {}): void {
    if (![cx, cy, radius].every(Number.isFinite) || radius < 0) return;
    this.ellipseBox([Math.round(cx - radius), Math.round(cy - radius), Math.round(cx + radius), Math.round(cy + radius)], style);
  }

  /**
   * Filled with the even-odd rule; edges always belong to the filled area, so
   * a polygon collapsed to a line or a point still leaves a mark.
   */
  polygon(points: readonly Point[], style: ShapeStyle = {}): void {
    if (points.length === 0) return;
    if (style.fill) {
      const mask = this.mask();
      fillPath(mask, [points], "evenodd");
      strokePolyline(mask, points, 1, { closed: true });
      this.paint(mask, style.fill);
    }
    const bw = borderWidthOf(style);
    if (bw > 0 && style.border) {
      const ring = this.mask();
      strokePolyline(ring, points, bw, { closed: true, roundJoins: true });
      this.paint(ring, style.border);
    }
  }

  regularPolygon(sides: number, cx: number, cy: number, radius: number, style: RegularPolygonStyle = {}): void {
    const points = regularPolygonVertices(sides, cx, cy, radius, style.rotation ?? 0);
    if (points.length > 0) this.polygon(points, style);
  }

  /** Polyline with rounded joins; `closed` joins the last point back to the first. */
  line(points: readonly Point[], color: ColorInput, width = 1, closed = false): void {
    const mask = this.mask();
    strokePolyline(mask, points, width, { closed, roundJoins: true });
    this.paint(mask, color);
  }

  /** Elliptical arc in the box; 0° is +x and angles run clockwise on screen. */
  arc(x: number, y: number, w: number, h: number, startDeg: number, endDeg: number, color: ColorInput, width = 1): void {
    const box = this.box(x, y, w, h);
    if (!box || !Number.isFinite(startDeg) || !Number.isFinite(endDeg)) return;
    const [x0, y0, x1, y1] = box;
    const points = arcPoints((x0 + x1) / 2, (y0 + y1) / 2, (x1 - x0) / 2, (y1 - y0) / 2, startDeg, endDeg);
    this.line(points, color, width);
  }

  bezier(controls: readonly Point[], color: ColorInput, width = 1, steps = 50): void {
    const samples = sampleBezier(controls, steps);
    if (samples.length > 0) this.line(samples, color, width);
  }

  /** Filled dot of diameter `size` centered on (x, y). */
  point(x: number, y: number, color: ColorInput, size = 3): void {
    if (![x, y, size].every(Number.isFinite)) return;
    const mask = this.mask();
    fillDisk(mask, x, y, size);
    this.paint(mask, color);
  }

  /** Draws `text` with its top-left corner at (x, y). */
  text(x: number, y: number, text: string, color: ColorInput, fontSize = 16, fontPath?: string): void {
    if (text.length === 0) return;
    const mask = this.mask();
    rasterizeText(mask, x, y, text, fontSize, resolveFont(fontPath));
    this.paint(mask, color);
  }

  measureText(text: string, fontSize = 16, fontPath?: string): TextMetrics {
    return measureText(text, fontSize, resolveFont(fontPath));
  }

  /** Clears a rectangle or the ellipse inscribed in it back to transparent. */
  erase(x: number, y: number, w: number, h: number, shape: "rect" | "ellipse" = "rect"): void {
    const box = this.box(x, y, w, h);
    if (!box) return;
    const mask = this.mask();
    if (shape === "ellipse") fillEllipse(mask, ...box);
    else fillRoundedRect(mask, ...box, 0);
    eraseMask(this.buffer, mask);
  }

  /** Composites another canvas source-over with its top-left corner at (x, y). */
  paste(source: Canvas, x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;
    compositeImage(this.buffer, source.buffer, x, y);
  }

  /**
   * 4-connected fill from the seed over pixels matching the seed's color.
   * Stops after FLOOD_FILL_LIMIT pixels and returns how many were recolored.
   */
  floodFill(x: number, y: number, color: ColorInput): number {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return 0;
    const sx = Math.trunc(x);
    const sy = Math.trunc(y);
    const seed = this.getPixel(sx, sy);
    const target = toRgba(color);
    if (!seed || sameColor(seed, target)) return 0;

    const { width, height } = this;
    const data = this.buffer.data;
    const matches = (i: number): boolean => {
      const o = i * 4;
      return data[o] === seed[0] && data[o + 1] === seed[1] && data[o + 2] === seed[2] && data[o + 3] === seed[3];
    };
    const recolor = (i: number): void => {
      data.set(target, i * 4);
    };

    const queue = new Int32Array(Math.min(FLOOD_FILL_LIMIT, width * height));
    let head = 0;
    let tail = 0;
    const start = sy * width + sx;
    recolor(start);
    queue[tail++] = start;
    let filled = 1;

    while (head < tail && filled < FLOOD_FILL_LIMIT) {
      const i = queue[head++] ?? 0;
      const px = i % width;
      const neighbours = [
        px > 0 ? i - 1 : -1,
        px < width - 1 ? i + 1 : -1,
        i >= width ? i - width : -1,
        i < (height - 1) * width ? i + width : -1,
      ];
      for (const n of neighbours) {
        if (n < 0 || !matches(n)) continue;
        recolor(n);
        queue[tail++] = n;
        if (++filled >= FLOOD_FILL_LIMIT) break;
      }
    }
    return filled;
  }

  private mask(): CoverageMask {
    return new CoverageMask(this.width, this.height);
  }

  private paint(mask: CoverageMask, color: ColorInput): void {
    compositeMask(this.buffer, mask, toRgba(color));
  }

  /** Inclusive pixel box for (x, y, w, h), or null when it is empty. */
  private box(x: number, y: number, w: number, h: number): [number, number, number, number] | null {
    if (![x, y, w, h].every(Number.isFinite)) return null;
    const x0 = Math.round(x);
    const y0 = Math.round(y);
    const rw = Math.round(w);
    const rh = Math.round(h);
    if (rw <= 0 || rh <= 0) return null;
    return [x0, y0, x0 + rw - 1, y0 + rh - 1];
  }

  private ellipseBox([x0, y0, x1, y1]: readonly [number, number, number, number], style: ShapeStyle): void {
    const bw = borderWidthOf(style);
    if (style.fill) {
      if (bw > 0 && style.border) {
        const under = this.mask();
        fillEllipse(under, x0 - bw, y0 - bw, x1 + bw, y1 + bw);
        this.paint(under, style.border);
      }
      const mask = this.mask();
      fillEllipse(mask, x0, y0, x1, y1);
      this.paint(mask, style.fill);
    } else if (bw > 0 && style.border) {
      const ring = this.mask();
      strokeEllipse(ring, x0, y0, x1, y1, bw);
      this.paint(ring, style.border);
    }
  }

  private paintGradient(
    mask: CoverageMask,
    [x0, y0, x1, y1]: readonly [number, number, number, number],
    start: Rgba,
    gradient: Gradient,
  ): void {
    const b = mask.bounds;
    if (!b) return;
    const end = toRgba(gradient.endColor);
    const w = x1 - x0 + 1;
    const h = y1 - y0 + 1;
    const cx = (w - 1) / 2;
    const cy = (h - 1) / 2;
    const halfDiagonal = Math.hypot(cx, cy);
    const position = (lx: number, ly: number): number => {
      switch (gradient.direction) {
        case "vertical":
          return ly / Math.max(h - 1, 1);
        case "horizontal":
          return lx / Math.max(w - 1, 1);
        case "diagonal":
          return (lx + ly) / Math.max(w + h - 2, 1);
        case "radial":
          return halfDiagonal === 0 ? 0 : Math.hypot(lx - cx, ly - cy) / halfDiagonal;
      }
    };
    const data = this.buffer.data;
    for (let y = b.y0; y <= b.y1; y++) {
      for (let x = b.x0; x <= b.x1; x++) {
        if (!mask.has(x, y)) continue;
        blendInto(data, (y * this.width + x) * 4, lerpColor(start, end, position(x - x0, y - y0)));
      }
    }
  }
}
