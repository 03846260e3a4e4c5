import { describe, expect, it } from "vitest";
import { Canvas, FLOOD_FILL_LIMIT } from "./canvas.js";
import type { Rgba } from "./color.js";

const RED: Rgba = [255, 0, 0, 255];
const BLUE: Rgba = [0, 0, 255, 255];
const BLACK: Rgba = [0, 0, 0, 255];
const WHITE: Rgba = [255, 255, 255, 255];
const CLEAR: Rgba = [0, 0, 0, 0];
const MISSING_FONT = "/nonexistent.ttf";

describe("Canvas", () => {
  it("truncates and clamps its dimensions", () => {
    const canvas = new Canvas(0, 2.7);
    expect(canvas.width).toBe(1);
    expect(canvas.height).toBe(2);
  });

  it("starts filled with the background color", () => {
    const canvas = new Canvas(3, 3, [10, 20, 30]);
    expect(canvas.getPixel(2, 2)).toEqual([10, 20, 30, 255]);
  });

  it("reports no pixel outside the buffer or at fractional coordinates", () => {
    const canvas = new Canvas(3, 3);
    expect(canvas.getPixel(3, 0)).toBeUndefined();
    expect(canvas.getPixel(-1, 0)).toBeUndefined();
    expect(canvas.getPixel(0.5, 0)).toBeUndefined();
  });

  it("returns snapshots unaffected by later draws", () => {
    const canvas = new Canvas(2, 2);
    const before = canvas.snapshot();
    canvas.rect(0, 0, 2, 2, { fill: RED });
    expect([...before.data].every((v) => v === 0)).toBe(true);
    expect(canvas.getPixel(0, 0)).toEqual(RED);
  });
});

describe("rect", () => {
  it("fills the inclusive box x..x+w-1", () => {
    const canvas = new Canvas(10, 10);
    canvas.rect(2, 2, 3, 3, { fill: RED });
    expect(canvas.getPixel(2, 2)).toEqual(RED);
    expect(canvas.getPixel(4, 4)).toEqual(RED);
    expect(canvas.getPixel(5, 5)).toEqual(CLEAR);
    expect(canvas.getPixel(1, 2)).toEqual(CLEAR);
  });

  it("draws a border ring without a fill", () => {
    const canvas = new Canvas(10, 10);
    canvas.rect(0, 0, 5, 5, { border: BLUE, borderWidth: 1 });
    expect(canvas.getPixel(0, 0)).toEqual(BLUE);
    expect(canvas.getPixel(4, 2)).toEqual(BLUE);
    expect(canvas.getPixel(2, 2)).toEqual(CLEAR);
  });

  it("ignores non-finite or empty boxes", () => {
    const canvas = new Canvas(4, 4);
    canvas.rect(Number.NaN, 0, 2, 2, { fill: RED });
    canvas.rect(0, 0, 0, 2, { fill: RED });
    canvas.rect(0, 0, -3, 2, { fill: RED });
    expect([...canvas.snapshot().data].every((v) => v === 0)).toBe(true);
  });
});

describe("gradients", () => {
  const start: Rgba = [0, 0, 0, 255];
  const end: Rgba = [200, 100, 50, 255];

  it("runs a vertical gradient from the first row to the last", () => {
    const canvas = new Canvas(20, 10);
    canvas.roundedRect(0, 0, 20, 10, 0, { fill: start, gradient: { direction: "vertical", endColor: end } });
    expect(canvas.getPixel(10, 0)).toEqual(start);
    expect(canvas.getPixel(10, 9)).toEqual(end);
    expect(canvas.getPixel(10, 4)).toEqual([88, 44, 22, 255]);
    for (let y = 1; y < 10; y++) {
      const above = canvas.getPixel(10, y - 1)?.[0] ?? -1;
      const here = canvas.getPixel(10, y)?.[0] ?? -1;
      expect(here).toBeGreaterThanOrEqual(above);
    }
  });

  it("runs a horizontal gradient across the columns", () => {
    const canvas = new Canvas(20, 10);
    canvas.roundedRect(0, 0, 20, 10, 0, { fill: start, gradient: { direction: "horizontal", endColor: end } });
    expect(canvas.getPixel(0, 5)).toEqual(start);
    expect(canvas.getPixel(19, 5)).toEqual(end);
  });

  it("runs a radial gradient from the center to the corners", () => {
    const canvas = new Canvas(21, 21);
    canvas.roundedRect(0, 0, 21, 21, 0, { fill: start, gradient: { direction: "radial", endColor: end } });
    expect(canvas.getPixel(10, 10)).toEqual(start);
    expect(canvas.getPixel(0, 0)).toEqual(end);
    expect(canvas.getPixel(20, 20)).toEqual(end);
  });
});

describe("ellipse and circle", () => {
  it("puts the border underneath a filled circle", () => {
    const canvas = new Canvas(21, 21);
    canvas.circle(10, 10, 5, { fill: RED, border: BLACK, borderWidth: 2 });
    expect(canvas.getPixel(10, 10)).toEqual(RED);
    expect(canvas.getPixel(10, 4)).toEqual(BLACK);
    expect(canvas.getPixel(10, 0)).toEqual(CLEAR);
  });

  it("draws a ring when only a border is given", () => {
    const canvas = new Canvas(21, 21);
    canvas.ellipse(0, 0, 21, 21, { border: BLUE, borderWidth: 2 });
    expect(canvas.getPixel(10, 0)).toEqual(BLUE);
    expect(canvas.getPixel(10, 10)).toEqual(CLEAR);
  });
});

describe("polygon", () => {
  it("blends a semi-transparent fill exactly once, edges included", () => {
    const canvas = new Canvas(20, 20);
    canvas.polygon(
      [
        [2, 2],
        [17, 2],
        [17, 17],
        [2, 17],
      ],
      { fill: [255, 0, 0, 128] },
    );
    expect(canvas.getPixel(10, 10)).toEqual([255, 0, 0, 128]);
    expect(canvas.getPixel(2, 2)).toEqual([255, 0, 0, 128]);
    expect(canvas.getPixel(17, 17)).toEqual([255, 0, 0, 128]);
  });

  it("still marks the edge of a polygon collapsed to a line", () => {
    const canvas = new Canvas(10, 10);
    canvas.polygon(
      [
        [1, 1],
        [5, 1],
      ],
      { fill: RED },
    );
    expect(canvas.getPixel(3, 1)).toEqual(RED);
  });

  it("fills a regular polygon around its center", () => {
    const canvas = new Canvas(20, 20);
    canvas.regularPolygon(4, 10, 10, 5, { fill: RED });
    expect(canvas.getPixel(10, 10)).toEqual(RED);
    expect(canvas.getPixel(0, 0)).toEqual(CLEAR);
  });
});

describe("strokes", () => {
  it("blends overlapping joins of a wide line once", () => {
    const canvas = new Canvas(20, 20);
    canvas.line(
      [
        [2, 10],
        [10, 10],
        [10, 2],
      ],
      [0, 0, 255, 128],
      5,
    );
    expect(canvas.getPixel(10, 10)).toEqual([0, 0, 255, 128]);
  });

  it("draws arcs clockwise from 0° at the right", () => {
    const canvas = new Canvas(21, 21);
    canvas.arc(0, 0, 21, 21, 0, 180, BLACK);
    expect(canvas.getPixel(20, 10)).toEqual(BLACK);
    expect(canvas.getPixel(0, 10)).toEqual(BLACK);
    expect(canvas.getPixel(10, 20)).toEqual(BLACK);
    expect(canvas.getPixel(10, 0)).toEqual(CLEAR);
  });

  it("clips lines that reach far beyond the canvas", () => {
    const canvas = new Canvas(50, 50);
    canvas.line(
      [
        [0, 10],
        [3e12, 10],
      ],
      BLACK,
    );
    expect(canvas.getPixel(0, 10)).toEqual(BLACK);
    expect(canvas.getPixel(49, 10)).toEqual(BLACK);
    expect(canvas.getPixel(49, 9)).toEqual(CLEAR);
  });

  it("fills a huge regular polygon over the whole canvas", () => {
    const canvas = new Canvas(50, 50);
    canvas.regularPolygon(4, 25, 25, 1e12, { fill: RED });
    expect(canvas.getPixel(0, 0)).toEqual(RED);
    expect(canvas.getPixel(49, 49)).toEqual(RED);
  });

  it("draws the visible part of an arc with an enormous radius", () => {
    const canvas = new Canvas(50, 50);
    canvas.arc(0, 0, 5e7, 50, 0, 180, BLACK);
    expect(canvas.getPixel(0, 25)).toEqual(BLACK);
    expect(canvas.getPixel(49, 25)).toEqual(BLACK);
    expect(canvas.getPixel(25, 0)).toEqual(CLEAR);
  });

  it("draws a Bezier curve through its end points", () => {
    const canvas = new Canvas(20, 20);
    canvas.bezier(
      [
        [0, 0],
        [10, 0],
        [10, 10],
      ],
      BLACK,
    );
    expect(canvas.getPixel(0, 0)).toEqual(BLACK);
    expect(canvas.getPixel(10, 10)).toEqual(BLACK);
  });

  it("draws a point as a dot of the given diameter", () => {
    const canvas = new Canvas(10, 10);
    canvas.point(5, 5, RED, 1);
    expect(canvas.getPixel(5, 5)).toEqual(RED);
    expect(canvas.getPixel(4, 5)).toEqual(CLEAR);
  });
});

describe("text", () => {
  it("measures with the bitmap fallback", () => {
    const canvas = new Canvas(10, 10);
    expect(canvas.measureText("Hi", 16, MISSING_FONT)).toEqual({ width: 22, height: 14 });
  });

  it("draws glyphs with their top-left corner at (x, y)", () => {
    const canvas = new Canvas(10, 10);
    canvas.text(0, 0, "I", WHITE, 8, MISSING_FONT);
    expect(canvas.getPixel(2, 0)).toEqual(WHITE);
    expect(canvas.getPixel(0, 0)).toEqual(CLEAR);
  });
});

describe("erase and paste", () => {
  it("erases a rectangle back to transparent", () => {
    const canvas = new Canvas(4, 4, WHITE);
    canvas.erase(0, 0, 2, 2);
    expect(canvas.getPixel(1, 1)).toEqual(CLEAR);
    expect(canvas.getPixel(2, 2)).toEqual(WHITE);
  });

  it("pastes another canvas with clipping", () => {
    const target = new Canvas(4, 4, WHITE);
    const source = new Canvas(2, 2, RED);
    target.paste(source, 1, 1);
    target.paste(source, 3, 3);
    expect(target.getPixel(1, 1)).toEqual(RED);
    expect(target.getPixel(2, 2)).toEqual(RED);
    expect(target.getPixel(3, 3)).toEqual(RED);
    expect(target.getPixel(0, 0)).toEqual(WHITE);
    expect(target.getPixel(3, 0)).toEqual(WHITE);
  });
});

describe("floodFill", () => {
  it("stops at the pixel limit", () => {
    const canvas = new Canvas(400, 300);
    expect(canvas.floodFill(0, 0, RED)).toBe(FLOOD_FILL_LIMIT);
    expect(FLOOD_FILL_LIMIT).toBe(100_000);
  });

  it("recolors an isolated pixel alone", () => {
    const canvas = new Canvas(5, 5, WHITE);
    canvas.point(2, 2, BLACK, 1);
    expect(canvas.floodFill(2, 2, RED)).toBe(1);
    expect(canvas.getPixel(2, 2)).toEqual(RED);
    expect(canvas.getPixel(2, 1)).toEqual(WHITE);
  });

  it("stays inside a closed border", () => {
    const canvas = new Canvas(10, 10, WHITE);
    canvas.rect(0, 0, 10, 10, { border: BLACK, borderWidth: 1 });
    expect(canvas.floodFill(5, 5, RED)).toBe(64);
    expect(canvas.getPixel(0, 0)).toEqual(BLACK);
    expect(canvas.getPixel(1, 1)).toEqual(RED);
  });

  it("does nothing outside the canvas or when the color already matches", () => {
    const canvas = new Canvas(5, 5, WHITE);
    expect(canvas.floodFill(-1, 0, RED)).toBe(0);
    expect(canvas.floodFill(5, 0, RED)).toBe(0);
    expect(canvas.floodFill(0, 0, WHITE)).toBe(0);
    expect(canvas.getPixel(0, 0)).toEqual(WHITE);
  });
});
