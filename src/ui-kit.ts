import path from "node:path";
import { Canvas } from "./canvas.js";
import { saveCanvas } from "./encode.js";
import { drawButton, type ButtonStyle } from "./shapes/buttons.js";
import { drawHealthBar, drawProgressBar } from "./shapes/bars.js";
import { createControlButton, type ControlType } from "./shapes/controls.js";
import { createIcon, drawArrow, drawGem, type ArrowDirection, type GemType } from "./shapes/icons.js";
import { drawDialogBox, drawItemSlot, type DialogStyle, type Rarity } from "./shapes/panels.js";

export const UI_KIT_THEMES = ["default", "rpg", "scifi", "cartoon", "pixel"] as const;
export type UiKitTheme = (typeof UI_KIT_THEMES)[number];

export const THEME_DIALOG_STYLES: Record<UiKitTheme, DialogStyle> = {
  default: "modern",
  rpg: "fantasy",
  scifi: "scifi",
  cartoon: "modern",
  pixel: "pixel",
};

export interface UiKitOptions {
  theme?: UiKitTheme;
  /** Directory the kit is written into; created when missing. */
  directory: string;
  fontPath?: string;
}

export interface UiKitResult {
  directory: string;
  theme: UiKitTheme;
  files: string[];
}

/** Renders the fixed asset set of a placeholder UI kit into one directory. */
export async function generateUiKit({ theme = "default", directory, fontPath }: UiKitOptions): Promise<UiKitResult> {
  const entries: [string, Canvas][] = [];
  const add = (filename: string, canvas: Canvas): void => {
    entries.push([filename, canvas]);
  };

  const buttonStyles: ButtonStyle[] = ["flat", "gradient", "glossy"];
  for (const style of buttonStyles) {
    const canvas = new Canvas(120, 40);
    drawButton(canvas, { text: "Button", style, fontPath });
    add(`button_${style}.png`, canvas);
  }

  const controls: ControlType[] = ["close", "settings", "play", "pause", "menu"];
  for (const type of controls) add(`ctrl_${type}.png`, createControlButton(48, type));

  for (const icon of ["star", "coin", "heart"] as const) add(`icon_${icon}.png`, createIcon(64, icon, { fontPath }));

  const gems: GemType[] = ["diamond", "ruby", "emerald"];
  for (const gemType of gems) {
    const canvas = new Canvas(64, 64);
    drawGem(canvas, { gemType });
    add(`gem_${gemType}.png`, canvas);
  }

  const progress = new Canvas(200, 24);
  drawProgressBar(progress, { progress: 75 });
  add("progress_bar.png", progress);

  for (const hp of [100, 50, 25]) {
    const canvas = new Canvas(150, 16);
    drawHealthBar(canvas, { hp });
    add(`health_${hp}.png`, canvas);
  }

  const rarities: Rarity[] = ["common", "rare", "epic", "legendary"];
  for (const rarity of rarities) {
    const canvas = new Canvas(64, 64);
    drawItemSlot(canvas, { rarity });
    add(`slot_${rarity}.png`, canvas);
  }

  const dialog = new Canvas(300, 100);
  drawDialogBox(dialog, { style: THEME_DIALOG_STYLES[theme] });
  add("dialog_box.png", dialog);

  const directions: ArrowDirection[] = ["up", "down", "left", "right"];
  for (const direction of directions) {
    const canvas = new Canvas(40, 40);
    drawArrow(canvas, { direction });
    add(`arrow_${direction}.png`, canvas);
  }

  const target = path.resolve(directory);
  for (const [filename, canvas] of entries) {
    await saveCanvas(canvas, path.join(target, filename));
  }
  return { directory: target, theme, files: entries.map(([filename]) => filename) };
}
