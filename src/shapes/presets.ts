import type { Canvas } from "../canvas.js";
import type { ColorInput, Rgba } from "../color.js";
import type { Point } from "../geometry.js";

export const PRESETS = ["car", "house", "tree"] as const;
export type PresetName = (typeof PRESETS)[number];

export interface PresetOptions {
  /** Top-left corner of the drawing. */
  x?: number;
  y?: number;
  scale?: number;
  /** Body color of the car, wall color of the house, leaf color of the tree. */
  primary?: ColorInput;
}

type Scaler = (v: number) => number;

function scaler(scale: number): Scaler {
  return (v) => Math.trunc(v * scale);
}

function offset(x: number, y: number, s: Scaler, coords: readonly (readonly [number, number])[]): Point[] {
  return coords.map(([px, py]) => [x + s(px), y + s(py)]);
}

const BLACK_EDGE: Rgba = [0, 0, 0, 255];

export function drawCar(canvas: Canvas, { x = 0, y = 0, scale = 1, primary }: PresetOptions = {}): void {
  const s = scaler(scale);
  const body = primary ?? [220, 50, 50, 255];
  const glass: Rgba = [150, 200, 255, 255];
  const frame: Rgba = [50, 50, 50, 255];

  canvas.polygon(
    offset(x, y, s, [
      [10, 50],
      [10, 35],
      [140, 35],
      [140, 50],
    ]),
    { fill: body, border: BLACK_EDGE, borderWidth: 2 },
  );
  canvas.polygon(
    offset(x, y, s, [
      [30, 35],
      [40, 15],
      [100, 15],
      [110, 35],
    ]),
    { fill: body, border: BLACK_EDGE, borderWidth: 2 },
  );
  canvas.polygon(
    offset(x, y, s, [
      [42, 33],
      [48, 18],
      [68, 18],
      [68, 33],
    ]),
    { fill: glass, border: frame, borderWidth: 1 },
  );
  canvas.polygon(
    offset(x, y, s, [
      [72, 33],
      [72, 18],
      [95, 18],
      [102, 33],
    ]),
    { fill: glass, border: frame, borderWidth: 1 },
  );

  // headlight, tail light
  canvas.ellipse(x + s(130), y + s(38), s(12), s(8), { fill: [255, 255, 150, 255], border: [200, 180, 50, 255], borderWidth: 1 });
  canvas.ellipse(x + s(8), y + s(38), s(10), s(8), { fill: [255, 50, 50, 255], border: [150, 30, 30, 255], borderWidth: 1 });

  for (const wx of [25, 100]) {
    canvas.ellipse(x + s(wx), y + s(42), s(24), s(24), { fill: [40, 40, 40, 255], border: [20, 20, 20, 255], borderWidth: 2 });
    canvas.ellipse(x + s(wx + 6), y + s(48), s(12), s(12), { fill: [180, 180, 180, 255] });
  }
}

export function drawHouse(canvas: Canvas, { x = 0, y = 0, scale = 1, primary }: PresetOptions = {}): void {
  const s = scaler(scale);
  const wall = primary ?? [255, 230, 180, 255];
  const trim: Rgba = [100, 80, 50, 255];
  const glass: Rgba = [150, 200, 255, 255];

  canvas.rect(x + s(20), y + s(50), s(100), s(70), { fill: wall, border: trim, borderWidth: 2 });
  canvas.polygon(
    offset(x, y, s, [
      [10, 50],
      [70, 10],
      [130, 50],
    ]),
    { fill: [180, 80, 50, 255], border: [100, 40, 20, 255], borderWidth: 2 },
  );
  canvas.rect(x + s(55), y + s(80), s(30), s(40), { fill: [139, 90, 43, 255], border: [90, 60, 30, 255], borderWidth: 2 });
  canvas.point(x + s(80), y + s(100), [255, 215, 0, 255], s(4));
  canvas.rect(x + s(28), y + s(60), s(20), s(18), { fill: glass, border: trim, borderWidth: 2 });
  canvas.rect(x + s(92), y + s(60), s(20), s(18), { fill: glass, border: trim, borderWidth: 2 });
  // chimney
  canvas.rect(x + s(95), y + s(20), s(15), s(30), { fill: [150, 80, 50, 255], border: [100, 50, 30, 255], borderWidth: 2 });
}

export function drawTree(canvas: Canvas, { x = 0, y = 0, scale = 1, primary }: PresetOptions = {}): void {
  const s = scaler(scale);
  const leaves = primary ?? [50, 180, 50, 255];
  const leafEdge: Rgba = [30, 120, 30, 255];

  canvas.rect(x + s(35), y + s(70), s(20), s(50), { fill: [139, 90, 43, 255], border: [100, 60, 30, 255], borderWidth: 2 });

  const tiers: (readonly [number, number])[][] = [
    [
      [5, 75],
      [45, 40],
      [85, 75],
    ],
    [
      [12, 55],
      [45, 22],
      [78, 55],
    ],
    [
      [20, 35],
      [45, 5],
      [70, 35],
    ],
  ];
  for (const tier of tiers) {
    canvas.polygon(offset(x, y, s, tier), { fill: leaves, border: leafEdge, borderWidth: 2 });
  }
}

export const PRESET_DRAWERS: Record<PresetName, (canvas: Canvas, options?: PresetOptions) => void> = {
  car: drawCar,
  house: drawHouse,
  tree: drawTree,
};
