import type { Canvas } from "../canvas.js";
import { WHITE, type Rgba } from "../color.js";
import type { Point } from "../geometry.js";

export const RARITIES = ["common", "uncommon", "rare", "epic", "legendary"] as const;
export type Rarity = (typeof RARITIES)[number];

export const SLOT_COLORS: Record<Rarity, { background: Rgba; border: Rgba }> = {
  common: { background: [80, 80, 80, 255], border: [120, 120, 120, 255] },
  uncommon: { background: [30, 100, 30, 255], border: [50, 180, 50, 255] },
  rare: { background: [30, 60, 150, 255], border: [50, 100, 220, 255] },
  epic: { background: [100, 50, 150, 255], border: [160, 80, 220, 255] },
  legendary: { background: [180, 120, 30, 255], border: [255, 200, 50, 255] },
};

export interface Box {
  x?: number;
  y?: number;
  /** Defaults to the canvas size. */
  width?: number;
  height?: number;
}

export interface ItemSlotOptions extends Box {
  rarity?: Rarity;
  /** Diagonal highlight strokes; only drawn for epic and legendary. */
  shine?: boolean;
}

export function drawItemSlot(canvas: Canvas, options: ItemSlotOptions = {}): void {
  const { x = 0, y = 0, width: w = canvas.width, height: h = canvas.height, rarity = "common", shine = false } = options;
  const { background, border } = SLOT_COLORS[rarity];

  canvas.roundedRect(x, y, w, h, 4, { fill: background });
  canvas.roundedRect(x + 2, y + 2, w - 4, h - 4, 3, { border: [40, 40, 40, 255], borderWidth: 1 });
  canvas.roundedRect(x, y, w, h, 4, { border, borderWidth: 2 });

  if (shine && (rarity === "epic" || rarity === "legendary")) {
    for (let i = 0; i < 3; i++) {
      const sx = x + Math.floor(w / 4) + Math.floor((i * w) / 4);
      canvas.line(
        [
          [sx, y],
          [sx + Math.floor(w / 8), y + Math.floor(h / 3)],
        ],
        [255, 255, 255, 100 - i * 30],
        2,
      );
    }
  }
}

export const DIALOG_STYLES = ["modern", "fantasy", "scifi", "pixel"] as const;
export type DialogStyle = (typeof DIALOG_STYLES)[number];

export const DIALOG_COLORS: Record<DialogStyle, { background: Rgba; border: Rgba }> = {
  modern: { background: [30, 30, 30, 230], border: [100, 100, 100, 255] },
  fantasy: { background: [60, 40, 30, 230], border: [180, 140, 100, 255] },
  scifi: { background: [20, 30, 50, 230], border: [0, 200, 255, 255] },
  pixel: { background: [40, 40, 60, 255], border: [150, 150, 180, 255] },
};

export interface DialogBoxOptions extends Box {
  style?: DialogStyle;
  /** Speech pointer below the bottom edge. */
  arrow?: boolean;
}

/** Rows the speech pointer reaches below the box. */
export const DIALOG_POINTER_DEPTH = 13;

/**
 * Without an explicit height the box leaves the bottom DIALOG_POINTER_DEPTH
 * rows of the canvas to the pointer.
 */
export function drawDialogBox(canvas: Canvas, options: DialogBoxOptions = {}): void {
  const { x = 0, y = 0, width: w = canvas.width, style = "modern", arrow = true } = options;
  const h = options.height ?? Math.max(1, canvas.height - y - (arrow ? DIALOG_POINTER_DEPTH : 0));
  const { background, border } = DIALOG_COLORS[style];

  if (style === "pixel") {
    canvas.rect(x, y, w, h, { fill: background, border, borderWidth: 3 });
  } else {
    canvas.roundedRect(x, y, w, h, 12, { fill: background, border, borderWidth: 2 });
  }

  if (arrow) {
    const ax = x + Math.floor(w / 4);
    canvas.polygon(
      [
        [ax, y + h - 1],
        [ax + 15, y + h - 1],
        [ax + 7, y + h + 12],
      ],
      { fill: background, border, borderWidth: 1 },
    );
  }
}

export const TOOLTIP_TITLE_COLORS: Record<Rarity, Rgba> = {
  common: [180, 180, 180, 255],
  uncommon: [30, 255, 30, 255],
  rare: [50, 150, 255, 255],
  epic: [180, 80, 255, 255],
  legendary: [255, 200, 50, 255],
};

export interface TooltipOptions extends Box {
  title?: string;
  rarity?: Rarity;
  fontPath?: string;
}

export function drawTooltip(canvas: Canvas, options: TooltipOptions = {}): void {
  const {
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    title = "Item Name",
    rarity = "rare",
    fontPath,
  } = options;
  const edge: Rgba = [60, 60, 70, 255];

  canvas.roundedRect(x, y, w, h, 4, { fill: [20, 20, 25, 240], border: edge, borderWidth: 1 });
  canvas.text(x + 10, y + 8, title, TOOLTIP_TITLE_COLORS[rarity], 14, fontPath);
  canvas.line(
    [
      [x + 8, y + 28],
      [x + w - 8, y + 28],
    ],
    edge,
  );
  canvas.text(x + 10, y + 35, "+10 Attack", [150, 255, 150, 255], 11, fontPath);
  canvas.text(x + 10, y + 52, "+5 Crit Rate", [255, 200, 100, 255], 11, fontPath);
}

export const MINIMAP_SHAPES = ["circle", "square", "hexagon"] as const;
export type MinimapShape = (typeof MINIMAP_SHAPES)[number];

export interface MinimapOptions extends Box {
  shape?: MinimapShape;
  border?: Rgba;
}

export function drawMinimap(canvas: Canvas, options: MinimapOptions = {}): void {
  const {
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    shape = "circle",
    border = [200, 180, 150, 255],
  } = options;
  const cx = x + Math.floor(w / 2);
  const cy = y + Math.floor(h / 2);
  const r = Math.floor(Math.min(w, h) / 2) - 4;
  const terrain: Rgba = [80, 120, 80, 255];

  switch (shape) {
    case "circle":
      canvas.circle(cx, cy, r, { fill: terrain });
      canvas.circle(cx, cy, r, { border, borderWidth: 3 });
      break;
    case "square":
      canvas.roundedRect(x + 4, y + 4, w - 8, h - 8, 4, { fill: terrain, border, borderWidth: 3 });
      break;
    case "hexagon":
      canvas.regularPolygon(6, cx, cy, r, { rotation: 30, fill: terrain, border, borderWidth: 3 });
      break;
  }

  canvas.circle(cx, cy, 3, { fill: WHITE });
  const heading: Point[] = [
    [cx, cy - 8],
    [cx - 4, cy - 2],
    [cx + 4, cy - 2],
  ];
  canvas.polygon(heading, { fill: [255, 200, 50, 255] });
}
