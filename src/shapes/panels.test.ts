import { describe, expect, it } from "vitest";
import { Canvas } from "../canvas.js";
import { DIALOG_COLORS, SLOT_COLORS, TOOLTIP_TITLE_COLORS, drawDialogBox, drawItemSlot, drawMinimap, drawTooltip } from "./panels.js";

describe("drawItemSlot", () => {
  it("fills with the rarity background and frames with its border color", () => {
    const canvas = new Canvas(64, 64);
    drawItemSlot(canvas, { rarity: "rare" });
    expect(canvas.getPixel(32, 32)).toEqual(SLOT_COLORS.rare.background);
    expect(canvas.getPixel(32, 0)).toEqual(SLOT_COLORS.rare.border);
    expect(canvas.getPixel(32, 2)).toEqual([40, 40, 40, 255]);
  });

  it("only adds shine to epic and legendary slots", () => {
    const plain = new Canvas(64, 64);
    drawItemSlot(plain, { rarity: "rare" });
    const shiny = new Canvas(64, 64);
    drawItemSlot(shiny, { rarity: "rare", shine: true });
    expect(shiny.snapshot().data).toEqual(plain.snapshot().data);

    const epic = new Canvas(64, 64);
    drawItemSlot(epic, { rarity: "epic", shine: true });
    // first stroke runs from (16, 0) to (24, 21)
    expect(epic.getPixel(20, 10)).not.toEqual(SLOT_COLORS.epic.background);
  });
});

describe("drawDialogBox", () => {
  it("keeps the panel's translucency", () => {
    const canvas = new Canvas(300, 100);
    drawDialogBox(canvas, { style: "modern" });
    expect(canvas.getPixel(150, 50)).toEqual(DIALOG_COLORS.modern.background);
  });

  it("uses square corners and a 3px border for the pixel style", () => {
    const canvas = new Canvas(300, 100);
    drawDialogBox(canvas, { style: "pixel", arrow: false });
    expect(canvas.getPixel(0, 0)).toEqual(DIALOG_COLORS.pixel.border);
    expect(canvas.getPixel(2, 50)).toEqual(DIALOG_COLORS.pixel.border);
    expect(canvas.getPixel(3, 50)).toEqual(DIALOG_COLORS.pixel.background);
  });

  it("leaves room for the pointer when sized to the canvas", () => {
    const canvas = new Canvas(300, 100);
    drawDialogBox(canvas, { style: "scifi" });
    // box rows 0..86, pointer from row 86 down to its tip on row 99
    expect(canvas.getPixel(82, 91)).toEqual(DIALOG_COLORS.scifi.background);
    expect(canvas.getPixel(150, 90)).toEqual([0, 0, 0, 0]);
    expect(canvas.getPixel(150, 80)).toEqual(DIALOG_COLORS.scifi.background);
  });

  it("draws the pointer below the box when there is room", () => {
    const canvas = new Canvas(300, 120);
    drawDialogBox(canvas, { height: 100, style: "scifi" });
    expect(canvas.getPixel(82, 104)).toEqual(DIALOG_COLORS.scifi.background);
    expect(canvas.getPixel(150, 110)).toEqual([0, 0, 0, 0]);
  });
});

it("drawTooltip writes the title in the rarity color", () => {
  const canvas = new Canvas(180, 80);
  drawTooltip(canvas, { title: "I", rarity: "epic", fontPath: "/nonexistent.ttf" });
  // "I" at size 14 has scale 2; its top bar covers x 12..17 on rows 8..9
  expect(canvas.getPixel(12, 8)).toEqual(TOOLTIP_TITLE_COLORS.epic);
  expect(canvas.getPixel(11, 8)).toEqual([20, 20, 25, 240]);
});

describe("drawMinimap", () => {
  it("puts the player marker at the center of a circular map", () => {
    const canvas = new Canvas(120, 120);
    drawMinimap(canvas, { shape: "circle" });
    expect(canvas.getPixel(60, 60)).toEqual([255, 255, 255, 255]);
    expect(canvas.getPixel(60, 54)).toEqual([255, 200, 50, 255]);
    expect(canvas.getPixel(60, 30)).toEqual([80, 120, 80, 255]);
    expect(canvas.getPixel(0, 0)).toEqual([0, 0, 0, 0]);
  });

  it("frames the square map", () => {
    const canvas = new Canvas(120, 120);
    drawMinimap(canvas, { shape: "square" });
    expect(canvas.getPixel(60, 4)).toEqual([200, 180, 150, 255]);
    expect(canvas.getPixel(60, 20)).toEqual([80, 120, 80, 255]);
  });
});
