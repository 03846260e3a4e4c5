import { describe, expect, it } from "vitest";
import { Canvas } from "../canvas.js";
import { BUTTON_COLORS, BUTTON_STYLES, createButton, drawButton } from "./buttons.js";

const MISSING_FONT = "/nonexistent.ttf";
const ROYAL_BLUE = [65, 105, 225, 255] as const;

describe("drawButton", () => {
  it("draws a flat button with centered text on a transparent canvas", () => {
    const canvas = new Canvas(120, 40);
    drawButton(canvas, { style: "flat", primary: ROYAL_BLUE, text: "Start", fontPath: MISSING_FONT });

    // rounded corner stays untouched
    expect(canvas.getPixel(0, 0)).toEqual([0, 0, 0, 0]);
    expect(canvas.getPixel(2, 20)).toEqual([...ROYAL_BLUE]);
    // "Start" at size 20 is 87x21 bitmap pixels starting at (16, 7); the S
    // opens with a blank column, so its top row begins at x = 19
    expect(canvas.getPixel(19, 7)).toEqual([255, 255, 255, 255]);
    expect(canvas.getPixel(16, 7)).toEqual([...ROYAL_BLUE]);
  });

  it("runs the gradient style from primary at the top to secondary at the bottom", () => {
    const canvas = new Canvas(120, 40);
    drawButton(canvas, { style: "gradient" });
    expect(canvas.getPixel(60, 0)).toEqual(BUTTON_COLORS.blue.primary);
    expect(canvas.getPixel(60, 39)).toEqual(BUTTON_COLORS.blue.secondary);
  });

  it("leaves the inside of an outline button empty", () => {
    const canvas = new Canvas(120, 40);
    drawButton(canvas, { style: "outline" });
    expect(canvas.getPixel(60, 20)).toEqual([0, 0, 0, 0]);
    expect(canvas.getPixel(60, 1)).toEqual(BUTTON_COLORS.blue.primary);
  });

  it("gives the pixel style square corners and an inset border", () => {
    const canvas = new Canvas(120, 40);
    drawButton(canvas, { style: "pixel" });
    expect(canvas.getPixel(0, 0)).toEqual(BUTTON_COLORS.blue.primary);
    expect(canvas.getPixel(2, 20)).toEqual(BUTTON_COLORS.blue.secondary);
    expect(canvas.getPixel(4, 20)).toEqual(BUTTON_COLORS.blue.primary);
  });

  it("paints every style inside the canvas", () => {
    for (const style of BUTTON_STYLES) {
      const canvas = new Canvas(120, 40);
      drawButton(canvas, { style });
      expect(canvas.getPixel(60, 1)?.[3]).toBe(255);
    }
  });
});

it("createButton sizes the canvas and applies the named colors", () => {
  const canvas = createButton({ width: 80, height: 30, style: "flat", color: "green", text: "" });
  expect(canvas.width).toBe(80);
  expect(canvas.height).toBe(30);
  expect(canvas.getPixel(40, 15)).toEqual(BUTTON_COLORS.green.primary);
});
