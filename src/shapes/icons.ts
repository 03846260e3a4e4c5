import { Canvas } from "../canvas.js";
import type { ColorInput, Rgba } from "../color.js";
import { alternatingVertices, heartPoints, type Point } from "../geometry.js";

/** Center and radius default to the middle of the canvas, inset by 4px. */
export interface Centered {
  cx?: number;
  cy?: number;
  size?: number;
}

function resolveCenter(canvas: Canvas, { cx, cy, size }: Centered): { cx: number; cy: number; size: number } {
  return {
    cx: cx ?? Math.floor(canvas.width / 2),
    cy: cy ?? Math.floor(canvas.height / 2),
    size: size ?? Math.floor(Math.min(canvas.width, canvas.height) / 2) - 4,
  };
}

export interface StarOptions extends Centered {
  points?: number;
  fill?: ColorInput;
  border?: ColorInput;
  borderWidth?: number;
  innerRatio?: number;
}

export function drawStar(canvas: Canvas, options: StarOptions = {}): void {
  const { cx, cy, size } = resolveCenter(canvas, options);
  const {
    points = 5,
    fill = [255, 215, 0, 255],
    border = [218, 165, 32, 255],
    borderWidth = 2,
    innerRatio = 0.4,
  } = options;
  const vertices = alternatingVertices(points, cx, cy, size, Math.trunc(size * innerRatio));
  canvas.polygon(vertices, { fill, border, borderWidth });
}

export const ARROW_DIRECTIONS = ["up", "down", "left", "right"] as const;
export type ArrowDirection = (typeof ARROW_DIRECTIONS)[number];
export const ARROW_STYLES = ["solid", "outline", "chevron"] as const;
export type ArrowStyle = (typeof ARROW_STYLES)[number];

export interface ArrowOptions {
  direction?: ArrowDirection;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  color?: ColorInput;
  style?: ArrowStyle;
}

export function drawArrow(canvas: Canvas, options: ArrowOptions = {}): void {
  const {
    direction = "right",
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    color = [255, 165, 0, 255],
    style = "solid",
  } = options;
  const part = (size: number, num: number, den: number): number => Math.floor((size * num) / den);

  if (style === "chevron") {
    const chevrons: Record<ArrowDirection, Point[]> = {
      right: [
        [x + part(w, 1, 4), y + part(h, 1, 6)],
        [x + part(w, 3, 4), y + part(h, 1, 2)],
        [x + part(w, 1, 4), y + part(h, 5, 6)],
      ],
      left: [
        [x + part(w, 3, 4), y + part(h, 1, 6)],
        [x + part(w, 1, 4), y + part(h, 1, 2)],
        [x + part(w, 3, 4), y + part(h, 5, 6)],
      ],
      up: [
        [x + part(w, 1, 6), y + part(h, 3, 4)],
        [x + part(w, 1, 2), y + part(h, 1, 4)],
        [x + part(w, 5, 6), y + part(h, 3, 4)],
      ],
      down: [
        [x + part(w, 1, 6), y + part(h, 1, 4)],
        [x + part(w, 1, 2), y + part(h, 3, 4)],
        [x + part(w, 5, 6), y + part(h, 1, 4)],
      ],
    };
    canvas.line(chevrons[direction], color, Math.floor(Math.min(w, h) / 4));
    return;
  }

  const m = Math.floor(Math.min(w, h) / 6);
  const triangles: Record<ArrowDirection, Point[]> = {
    right: [
      [x + m, y + m],
      [x + w - m, y + part(h, 1, 2)],
      [x + m, y + h - m],
    ],
    left: [
      [x + w - m, y + m],
      [x + m, y + part(h, 1, 2)],
      [x + w - m, y + h - m],
    ],
    up: [
      [x + m, y + h - m],
      [x + part(w, 1, 2), y + m],
      [x + w - m, y + h - m],
    ],
    down: [
      [x + m, y + m],
      [x + part(w, 1, 2), y + h - m],
      [x + w - m, y + m],
    ],
  };
  if (style === "solid") canvas.polygon(triangles[direction], { fill: color });
  else canvas.polygon(triangles[direction], { border: color, borderWidth: 3 });
}

export interface CoinOptions extends Centered {
  gold?: ColorInput;
  symbol?: string;
  fontPath?: string;
}

export function drawCoin(canvas: Canvas, options: CoinOptions = {}): void {
  const { cx, cy, size: r } = resolveCenter(canvas, options);
  const { gold = [255, 215, 0, 255], symbol = "$", fontPath } = options;
  const darkGold: Rgba = [218, 165, 32, 255];

  canvas.circle(cx, cy, r, { fill: darkGold });
  canvas.circle(cx, cy, Math.trunc(r * 0.85), { fill: gold });

  const hr = Math.trunc(r * 0.7);
  canvas.arc(cx - hr, cy - hr, hr * 2 + 1, hr * 2 + 1, 200, 340, [255, 239, 180, 255], 2);

  if (symbol) {
    const fontSize = Math.trunc(r * 1.2);
    const m = canvas.measureText(symbol, fontSize, fontPath);
    canvas.text(cx - Math.floor(m.width / 2), cy - Math.floor(m.height / 2) - 2, symbol, darkGold, fontSize, fontPath);
  }
}

export const GEM_TYPES = ["diamond", "ruby", "emerald", "sapphire"] as const;
export type GemType = (typeof GEM_TYPES)[number];

/** Light, mid and dark facet colors. */
export const GEM_COLORS: Record<GemType, readonly [Rgba, Rgba, Rgba]> = {
  diamond: [
    [200, 230, 255, 255],
    [150, 200, 255, 255],
    [100, 180, 255, 255],
  ],
  ruby: [
    [255, 100, 100, 255],
    [200, 50, 50, 255],
    [150, 30, 30, 255],
  ],
  emerald: [
    [100, 255, 150, 255],
    [50, 200, 100, 255],
    [30, 150, 80, 255],
  ],
  sapphire: [
    [100, 150, 255, 255],
    [50, 100, 200, 255],
    [30, 80, 180, 255],
  ],
};

export interface GemOptions extends Centered {
  gemType?: GemType;
}

export function drawGem(canvas: Canvas, options: GemOptions = {}): void {
  const { cx, cy, size: s } = resolveCenter(canvas, options);
  const [light, mid, dark] = GEM_COLORS[options.gemType ?? "diamond"];
  const center: Point = [cx, cy];
  const top: Point = [cx, cy - s];
  const bottom: Point = [cx, cy + s * 0.6];
  const left: Point = [cx - s * 0.7, cy - s * 0.2];
  const right: Point = [cx + s * 0.7, cy - s * 0.2];

  canvas.polygon([top, left, center], { fill: light });
  canvas.polygon([top, right, center], { fill: mid });
  canvas.polygon([left, bottom, center], { fill: mid });
  canvas.polygon([right, bottom, center], { fill: dark });
  canvas.polygon(
    [
      [cx - s * 0.15, cy - s * 0.5],
      [cx + s * 0.1, cy - s * 0.6],
      [cx - s * 0.1, cy - s * 0.3],
    ],
    { fill: [255, 255, 255, 150] },
  );
}

export interface HeartOptions extends Centered {
  fill?: ColorInput;
  border?: ColorInput;
}

export function drawHeart(canvas: Canvas, options: HeartOptions = {}): void {
  const { cx, cy, size: s } = resolveCenter(canvas, options);
  const { fill = [255, 50, 80, 255], border = [200, 30, 60, 255] } = options;

  canvas.polygon(heartPoints(cx, cy, s), { fill, border, borderWidth: 2 });

  const x0 = cx - s * 0.4;
  const y0 = cy - s * 0.5;
  canvas.ellipse(x0, y0, s * 0.3 + 1, s * 0.3 + 1, { fill: [255, 255, 255, 100] });
}

export interface ShieldOptions {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  fill?: ColorInput;
  border?: ColorInput;
}

export function drawShield(canvas: Canvas, options: ShieldOptions = {}): void {
  const {
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    fill = [70, 130, 180, 255],
    border = [192, 192, 192, 255],
  } = options;
  const cx = x + Math.floor(w / 2);

  canvas.polygon(
    [
      [cx, y + 4],
      [x + w - 4, y + h * 0.15],
      [x + w - 4, y + h * 0.5],
      [cx, y + h - 4],
      [x + 4, y + h * 0.5],
      [x + 4, y + h * 0.15],
    ],
    { fill, border, borderWidth: 3 },
  );
  canvas.line(
    [
      [cx, y + h * 0.15],
      [cx, y + h * 0.75],
    ],
    border,
    2,
  );
  canvas.line(
    [
      [x + w * 0.2, y + h * 0.35],
      [x + w * 0.8, y + h * 0.35],
    ],
    border,
    2,
  );
}

export const ICON_TYPES = ["star", "coin", "gem", "heart", "shield", "arrow"] as const;
export type IconType = (typeof ICON_TYPES)[number];

export interface CreateIconOptions {
  gemType?: GemType;
  direction?: ArrowDirection;
  fontPath?: string;
}

/** A square canvas with one decorative icon filling it. */
export function createIcon(size: number, iconType: IconType, options: CreateIconOptions = {}): Canvas {
  const canvas = new Canvas(size, size);
  switch (iconType) {
    case "star":
      drawStar(canvas);
      break;
    case "coin":
      drawCoin(canvas, { fontPath: options.fontPath });
      break;
    case "gem":
      drawGem(canvas, { gemType: options.gemType });
      break;
    case "heart":
      drawHeart(canvas);
      break;
    case "shield":
      drawShield(canvas);
      break;
    case "arrow":
      drawArrow(canvas, { direction: options.direction });
      break;
  }
  return canvas;
}
