import { Canvas } from "../canvas.js";
import { WHITE, type ColorInput, type Rgba } from "../color.js";
import { alternatingVertices, type Point } from "../geometry.js";

export const CONTROL_TYPES = [
  "close",
  "settings",
  "play",
  "pause",
  "menu",
  "home",
  "refresh",
  "back",
  "plus",
  "minus",
  "check",
] as const;
export type ControlType = (typeof CONTROL_TYPES)[number];

export const CONTROL_STYLES = ["circle", "square", "none"] as const;
export type ControlStyle = (typeof CONTROL_STYLES)[number];

interface ControlDefaults {
  background?: Rgba;
  icon: Rgba;
  style: ControlStyle;
}

const GREY_GLYPH: ControlDefaults = { icon: [80, 80, 80, 255], style: "none" };
const RED: Rgba = [220, 60, 60, 255];
const GREEN: Rgba = [50, 180, 50, 255];

export const CONTROL_DEFAULTS: Record<ControlType, ControlDefaults> = {
  close: { background: RED, icon: WHITE, style: "circle" },
  settings: { icon: [100, 100, 100, 255], style: "none" },
  play: { background: GREEN, icon: WHITE, style: "circle" },
  pause: { background: [255, 180, 50, 255], icon: WHITE, style: "circle" },
  menu: GREY_GLYPH,
  home: GREY_GLYPH,
  refresh: GREY_GLYPH,
  back: GREY_GLYPH,
  plus: { background: GREEN, icon: WHITE, style: "circle" },
  minus: { background: RED, icon: WHITE, style: "circle" },
  check: { background: GREEN, icon: WHITE, style: "circle" },
};

export interface ControlButtonOptions {
  cx?: number;
  cy?: number;
  /** Diameter of the button; defaults to the canvas' short side minus 4. */
  size?: number;
  background?: ColorInput;
  iconColor?: ColorInput;
  style?: ControlStyle;
}

interface Glyph {
  canvas: Canvas;
  cx: number;
  cy: number;
  s: number;
  r: number;
  icon: ColorInput;
  background: ColorInput | undefined;
}

function seg(a: Point, b: Point): Point[] {
  return [a, b];
}

/** Clears a glyph cut-out and refills it with the background when there is one. */
function punch(g: Glyph, x: number, y: number, w: number, h: number, shape: "rect" | "ellipse"): void {
  g.canvas.erase(x, y, w, h, shape);
  if (!g.background) return;
  if (shape === "ellipse") g.canvas.ellipse(x, y, w, h, { fill: g.background });
  else g.canvas.rect(x, y, w, h, { fill: g.background });
}

const GLYPHS: Record<ControlType, (g: Glyph) => void> = {
  close({ canvas, cx, cy, s, r, icon }) {
    const o = Math.trunc(r * 0.5);
    const lw = Math.max(2, Math.floor(s / 10));
    canvas.line(seg([cx - o, cy - o], [cx + o, cy + o]), icon, lw);
    canvas.line(seg([cx + o, cy - o], [cx - o, cy + o]), icon, lw);
  },

  settings(g) {
    const { canvas, cx, cy, r, icon } = g;
    const outer = Math.trunc(r * 0.85);
    const inner = Math.trunc(r * 0.5);
    const hole = Math.trunc(r * 0.3);
    canvas.polygon(alternatingVertices(8, cx, cy, outer, inner), { fill: icon });
    punch(g, cx - hole, cy - hole, hole * 2 + 1, hole * 2 + 1, "ellipse");
  },

  play({ canvas, cx, cy, r, icon }) {
    // nudged right so the triangle looks centered
    const o = Math.trunc(r * 0.45);
    canvas.polygon(
      [
        [cx - o + 2, cy - o],
        [cx + o + 2, cy],
        [cx - o + 2, cy + o],
      ],
      { fill: icon },
    );
  },

  pause({ canvas, cx, cy, r, icon }) {
    const bw = Math.max(3, Math.trunc(r * 0.25));
    const bh = Math.trunc(r * 0.9);
    const gap = Math.max(2, Math.trunc(r * 0.2));
    canvas.rect(cx - gap - bw, cy - bh, bw + 1, bh * 2 + 1, { fill: icon });
    canvas.rect(cx + gap, cy - bh, bw + 1, bh * 2 + 1, { fill: icon });
  },

  menu({ canvas, cx, cy, r, icon }) {
    const half = Math.floor(Math.trunc(r * 1.2) / 2);
    const bh = Math.max(2, Math.trunc(r * 0.15));
    const gap = Math.trunc(r * 0.4);
    for (let i = -1; i <= 1; i++) {
      const y = cy + i * gap;
      const top = y - Math.floor(bh / 2);
      canvas.roundedRect(cx - half, top, half * 2 + 1, y + Math.floor(bh / 2) - top + 1, Math.floor(bh / 2), { fill: icon });
    }
  },

  home(g) {
    const { canvas, cx, cy, r, icon } = g;
    canvas.polygon(
      [
        [cx, cy - r * 0.7],
        [cx - r * 0.7, cy],
        [cx + r * 0.7, cy],
      ],
      { fill: icon },
    );
    const bodyHalf = Math.floor(Math.trunc(r * 0.9) / 2);
    const bodyH = Math.trunc(r * 0.65);
    canvas.rect(cx - bodyHalf, cy, bodyHalf * 2 + 1, bodyH + 1, { fill: icon });
    const doorHalf = Math.floor(Math.trunc(r * 0.35) / 2);
    const doorH = Math.trunc(r * 0.5);
    punch(g, cx - doorHalf, cy + bodyH - doorH, doorHalf * 2 + 1, doorH + 1, "rect");
  },

  refresh({ canvas, cx, cy, r, icon }) {
    const ar = Math.trunc(r * 0.65);
    const lw = Math.max(2, Math.trunc(r * 0.2));
    canvas.arc(cx - ar, cy - ar, ar * 2 + 1, ar * 2 + 1, 30, 300, icon, lw);
    const head = Math.trunc(r * 0.3);
    const ax = cx + ar * Math.cos(Math.PI / 6);
    const ay = cy - ar * Math.sin(Math.PI / 6);
    canvas.polygon(
      [
        [ax, ay],
        [ax + head, ay + Math.floor(head / 2)],
        [ax + Math.floor(head / 2), ay + head],
      ],
      { fill: icon },
    );
  },

  back({ canvas, cx, cy, r, icon }) {
    const lw = Math.max(2, Math.trunc(r * 0.2));
    const o = Math.trunc(r * 0.6);
    const h = Math.floor(o / 2);
    canvas.line(seg([cx - o, cy], [cx + o, cy]), icon, lw);
    canvas.line(seg([cx - o, cy], [cx - h, cy - h]), icon, lw);
    canvas.line(seg([cx - o, cy], [cx - h, cy + h]), icon, lw);
  },

  plus({ canvas, cx, cy, s, r, icon }) {
    const o = Math.trunc(r * 0.55);
    const lw = Math.max(2, Math.floor(s / 8));
    canvas.line(seg([cx - o, cy], [cx + o, cy]), icon, lw);
    canvas.line(seg([cx, cy - o], [cx, cy + o]), icon, lw);
  },

  minus({ canvas, cx, cy, s, r, icon }) {
    const o = Math.trunc(r * 0.55);
    canvas.line(seg([cx - o, cy], [cx + o, cy]), icon, Math.max(2, Math.floor(s / 8)));
  },

  check({ canvas, cx, cy, s, r, icon }) {
    const o = Math.trunc(r * 0.5);
    canvas.line(
      [
        [cx - o, cy],
        [cx - Math.floor(o / 3), cy + o * 0.7],
        [cx + o, cy - o * 0.6],
      ],
      icon,
      Math.max(2, Math.floor(s / 10)),
    );
  },
};

/**
 * Draws a control icon centered on (cx, cy). The background shape is drawn
 * only when the style is not "none" and a background color is known.
 */
export function drawControlButton(canvas: Canvas, type: ControlType, options: ControlButtonOptions = {}): void {
  const defaults = CONTROL_DEFAULTS[type];
  const cx = options.cx ?? Math.floor(canvas.width / 2);
  const cy = options.cy ?? Math.floor(canvas.height / 2);
  const s = options.size ?? Math.min(canvas.width, canvas.height) - 4;
  const r = Math.floor(s / 2);
  const style = options.style ?? defaults.style;
  const background = options.background ?? defaults.background;

  if (background && style === "circle") canvas.circle(cx, cy, r, { fill: background });
  else if (background && style === "square") canvas.roundedRect(cx - r, cy - r, r * 2 + 1, r * 2 + 1, 4, { fill: background });

  GLYPHS[type]({ canvas, cx, cy, s, r, icon: options.iconColor ?? defaults.icon, background });
}

export function createControlButton(size: number, type: ControlType, options: Omit<ControlButtonOptions, "cx" | "cy" | "size"> = {}): Canvas {
  const canvas = new Canvas(size, size);
  drawControlButton(canvas, type, options);
  return canvas;
}
