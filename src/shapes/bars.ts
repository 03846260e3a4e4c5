import { Canvas } from "../canvas.js";
import { withAlpha, type ColorInput, type Rgba } from "../color.js";

export const BAR_TYPES = ["normal", "health"] as const;
export type BarType = (typeof BAR_TYPES)[number];

function clampPercent(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.min(100, value)) : 0;
}

export interface ProgressBarOptions {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  /** Percentage; clamped to 0..100. */
  progress?: number;
  background?: ColorInput;
  fill?: ColorInput;
  border?: ColorInput;
  borderWidth?: number;
  glow?: boolean;
}

export function drawProgressBar(canvas: Canvas, options: ProgressBarOptions = {}): void {
  const {
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    background = [60, 60, 60, 255],
    fill = [50, 205, 50, 255],
    border = [100, 100, 100, 255],
    borderWidth = 2,
    glow = true,
  } = options;
  const radius = Math.floor(h / 2);
  const progress = clampPercent(options.progress ?? 50);

  canvas.roundedRect(x, y, w, h, radius, { fill: background });

  const fillWidth = Math.trunc(((w - 4) * progress) / 100);
  if (fillWidth > 0) {
    if (glow) canvas.roundedRect(x + 1, y + 1, fillWidth + 3, h - 2, radius - 1, { fill: withAlpha(fill, 100) });
    canvas.roundedRect(x + 2, y + 2, fillWidth + 1, h - 4, Math.max(1, radius - 2), { fill });
  }

  if (borderWidth > 0) canvas.roundedRect(x, y, w, h, radius, { border, borderWidth });
}

/** Green above 60%, orange above 30%, red otherwise. */
export function healthColor(percent: number): Rgba {
  if (percent > 60) return [50, 205, 50, 255];
  if (percent > 30) return [255, 165, 0, 255];
  return [255, 50, 50, 255];
}

export interface HealthBarOptions {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  hp?: number;
  segments?: boolean;
  segmentCount?: number;
}

export function drawHealthBar(canvas: Canvas, options: HealthBarOptions = {}): void {
  const { x = 0, y = 0, width: w = canvas.width, height: h = canvas.height, segments = true } = options;
  const hp = clampPercent(options.hp ?? 75);
  const segmentCount = Math.max(1, Math.floor(options.segmentCount ?? 10));

  canvas.rect(x, y, w, h, { fill: [30, 30, 30, 255] });

  const hpWidth = Math.trunc(((w - 4) * hp) / 100);
  if (hpWidth > 0) canvas.rect(x + 2, y + 2, hpWidth + 1, h - 4, { fill: healthColor(hp) });

  if (segments) {
    const step = Math.floor(w / segmentCount);
    for (let i = 1; i < segmentCount; i++) {
      const sx = x + i * step;
      canvas.line(
        [
          [sx, y],
          [sx, y + h - 1],
        ],
        [0, 0, 0, 150],
      );
    }
  }

  canvas.rect(x, y, w, h, { border: [80, 80, 80, 255], borderWidth: 2 });
}

export interface CreateProgressBarOptions {
  width?: number;
  height?: number;
  progress?: number;
  barType?: BarType;
}

export function createProgressBar(options: CreateProgressBarOptions = {}): Canvas {
  const { width = 200, height = 24, progress = 50, barType = "normal" } = options;
  const canvas = new Canvas(width, height);
  if (barType === "health") drawHealthBar(canvas, { hp: progress });
  else drawProgressBar(canvas, { progress });
  return canvas;
}
