import { describe, expect, it } from "vitest";
import { Canvas } from "../canvas.js";
import { createProgressBar, drawHealthBar, drawProgressBar, healthColor } from "./bars.js";

function progressPixels(progress: number): Uint8ClampedArray {
  const canvas = new Canvas(200, 24);
  drawProgressBar(canvas, { progress });
  return canvas.snapshot().data;
}

describe("drawProgressBar", () => {
  it("clamps progress to 0..100", () => {
    expect(progressPixels(150)).toEqual(progressPixels(100));
    expect(progressPixels(-10)).toEqual(progressPixels(0));
  });

  it("fills up to the progress and leaves the track elsewhere", () => {
    const empty = new Canvas(200, 24);
    drawProgressBar(empty, { progress: 0 });
    expect(empty.getPixel(100, 12)).toEqual([60, 60, 60, 255]);

    const full = new Canvas(200, 24);
    drawProgressBar(full, { progress: 100 });
    expect(full.getPixel(100, 12)).toEqual([50, 205, 50, 255]);

    const half = new Canvas(200, 24);
    drawProgressBar(half, { progress: 50 });
    expect(half.getPixel(50, 12)).toEqual([50, 205, 50, 255]);
    expect(half.getPixel(150, 12)).toEqual([60, 60, 60, 255]);
  });

  it("draws the border on top", () => {
    const canvas = new Canvas(200, 24);
    drawProgressBar(canvas, { progress: 100 });
    expect(canvas.getPixel(100, 0)).toEqual([100, 100, 100, 255]);
  });
});

describe("healthColor", () => {
  it("switches at 60 and 30 percent", () => {
    expect(healthColor(61)).toEqual([50, 205, 50, 255]);
    expect(healthColor(60)).toEqual([255, 165, 0, 255]);
    expect(healthColor(31)).toEqual([255, 165, 0, 255]);
    expect(healthColor(30)).toEqual([255, 50, 50, 255]);
  });
});

describe("drawHealthBar", () => {
  it("fills with the color of the current health", () => {
    const canvas = new Canvas(150, 16);
    drawHealthBar(canvas, { hp: 100 });
    expect(canvas.getPixel(3, 8)).toEqual([50, 205, 50, 255]);

    const low = new Canvas(150, 16);
    drawHealthBar(low, { hp: 25 });
    expect(low.getPixel(3, 8)).toEqual([255, 50, 50, 255]);
    expect(low.getPixel(100, 8)).toEqual([30, 30, 30, 255]);
  });

  it("darkens the segment separators", () => {
    const canvas = new Canvas(150, 16);
    drawHealthBar(canvas, { hp: 100 });
    // separator at x = 15 over the green fill, black at alpha 150
    expect(canvas.getPixel(15, 8)).toEqual([21, 84, 21, 255]);
  });
});

it("createProgressBar switches to the health bar", () => {
  const canvas = createProgressBar({ width: 150, height: 16, progress: 50, barType: "health" });
  expect(canvas.getPixel(3, 8)).toEqual([255, 165, 0, 255]);
});
