import { Canvas } from "../canvas.js";
import { WHITE, withAlpha, type ColorInput, type Rgba } from "../color.js";

export const BUTTON_STYLES = ["flat", "gradient", "glossy", "outline", "pixel"] as const;
export type ButtonStyle = (typeof BUTTON_STYLES)[number];

export const BUTTON_COLOR_NAMES = ["blue", "green", "red", "orange", "purple"] as const;
export type ButtonColor = (typeof BUTTON_COLOR_NAMES)[number];

export const BUTTON_COLORS: Record<ButtonColor, { primary: Rgba; secondary: Rgba }> = {
  blue: { primary: [65, 105, 225, 255], secondary: [30, 60, 180, 255] },
  green: { primary: [50, 205, 50, 255], secondary: [30, 150, 30, 255] },
  red: { primary: [220, 60, 60, 255], secondary: [180, 30, 30, 255] },
  orange: { primary: [255, 165, 0, 255], secondary: [220, 120, 0, 255] },
  purple: { primary: [138, 43, 226, 255], secondary: [100, 30, 180, 255] },
};

export interface ButtonOptions {
  x?: number;
  y?: number;
  /** Defaults to the canvas size. */
  width?: number;
  height?: number;
  text?: string;
  style?: ButtonStyle;
  primary?: ColorInput;
  secondary?: ColorInput;
  textColor?: ColorInput;
  radius?: number;
  fontPath?: string;
}

export function drawButton(canvas: Canvas, options: ButtonOptions = {}): void {
  const {
    x = 0,
    y = 0,
    width: w = canvas.width,
    height: h = canvas.height,
    text = "",
    style = "gradient",
    primary = BUTTON_COLORS.blue.primary,
    secondary = BUTTON_COLORS.blue.secondary,
    textColor = WHITE,
    radius = 8,
  } = options;

  switch (style) {
    case "flat":
      canvas.roundedRect(x, y, w, h, radius, { fill: primary });
      break;
    case "gradient":
      canvas.roundedRect(x, y, w, h, radius, {
        fill: primary,
        gradient: { direction: "vertical", endColor: secondary },
      });
      break;
    case "glossy":
      canvas.roundedRect(x, y, w, h, radius, { fill: secondary });
      // highlight over the top half
      canvas.roundedRect(x + 2, y + 2, w - 4, Math.floor(h / 2) - 2, radius - 2, { fill: withAlpha(primary, 180) });
      break;
    case "outline":
      canvas.roundedRect(x, y, w, h, radius, { border: primary, borderWidth: 3 });
      break;
    case "pixel":
      canvas.rect(x, y, w, h, { fill: primary });
      canvas.rect(x + 2, y + 2, w - 4, h - 4, { border: secondary, borderWidth: 2 });
      break;
  }

  if (text) {
    const fontSize = Math.min(Math.floor(h / 2), 24);
    const m = canvas.measureText(text, fontSize, options.fontPath);
    const tx = x + Math.floor((w - m.width) / 2);
    const ty = y + Math.floor((h - m.height) / 2) - 2;
    canvas.text(tx, ty, text, textColor, fontSize, options.fontPath);
  }
}

export interface CreateButtonOptions {
  width?: number;
  height?: number;
  text?: string;
  style?: ButtonStyle;
  color?: ButtonColor;
  fontPath?: string;
}

/** A canvas sized to the button with one of the preset color pairs. */
export function createButton(options: CreateButtonOptions = {}): Canvas {
  const { width = 120, height = 40, text = "Button", style = "gradient", color = "blue", fontPath } = options;
  const canvas = new Canvas(width, height);
  const { primary, secondary } = BUTTON_COLORS[color];
  drawButton(canvas, { text, style, primary, secondary, fontPath });
  return canvas;
}
