/**
 * Pen commands: one tagged variant per free-form drawing operation, applied to
 * a canvas with all parameters already validated and defaulted.
 */

import type { Canvas } from "./canvas.js";
import type { ColorInput } from "./color.js";
import type { Point } from "./geometry.js";
import { PRESET_DRAWERS, type PresetName } from "./shapes/presets.js";

interface Outlined {
  fill?: ColorInput;
  border?: ColorInput;
  borderWidth: number;
}

export type PenCommand =
  | { kind: "line"; from: Point; to: Point; color: ColorInput; width: number }
  | { kind: "lines"; points: Point[]; color: ColorInput; width: number; closed: boolean }
  | ({ kind: "rect"; x: number; y: number; width: number; height: number } & Outlined)
  | ({ kind: "ellipse"; x: number; y: number; width: number; height: number } & Outlined)
  | ({ kind: "polygon"; points: Point[] } & Outlined)
  | ({ kind: "regular_polygon"; sides: number; cx: number; cy: number; radius: number; rotation: number } & Outlined)
  | {
      kind: "arc";
      x: number;
      y: number;
      width: number;
      height: number;
      startAngle: number;
      endAngle: number;
      color: ColorInput;
      lineWidth: number;
    }
  | { kind: "bezier"; points: Point[]; color: ColorInput; width: number; steps: number }
  | { kind: "point"; x: number; y: number; color: ColorInput; size: number }
  | { kind: "text"; x: number; y: number; text: string; color: ColorInput; fontSize: number; fontPath?: string }
  | { kind: "fill"; x: number; y: number; color: ColorInput }
  | { kind: "preset"; preset: PresetName; x: number; y: number; scale: number; primary?: ColorInput };

export type PenCommandKind = PenCommand["kind"];

const CURVE_NAMES: Record<number, string> = { 2: "linear", 3: "quadratic", 4: "cubic" };

/** Draws `command` onto `canvas` and returns a one-line summary of what was drawn. */
export function applyPenCommand(canvas: Canvas, command: PenCommand): string {
  switch (command.kind) {
    case "line": {
      const { from, to } = command;
      canvas.line([from, to], command.color, command.width);
      return `Line drawn: (${from[0]},${from[1]}) → (${to[0]},${to[1]})`;
    }
    case "lines":
      if (command.points.length >= 2) canvas.line(command.points, command.color, command.width, command.closed);
      return `Polyline drawn: ${command.points.length} points${command.closed ? " (closed)" : ""}`;
    case "rect":
      canvas.rect(command.x, command.y, command.width, command.height, command);
      return `Rectangle drawn at (${command.x},${command.y}) size ${command.width}x${command.height}`;
    case "ellipse":
      canvas.ellipse(command.x, command.y, command.width, command.height, command);
      return `Ellipse drawn at (${command.x},${command.y}) size ${command.width}x${command.height}`;
    case "polygon":
      canvas.polygon(command.points, command);
      return `Polygon drawn: ${command.points.length} vertices`;
    case "regular_polygon":
      canvas.regularPolygon(command.sides, command.cx, command.cy, command.radius, command);
      return `Regular polygon drawn: ${command.sides} sides, radius ${command.radius} at (${command.cx},${command.cy})`;
    case "arc":
      canvas.arc(
        command.x,
        command.y,
        command.width,
        command.height,
        command.startAngle,
        command.endAngle,
        command.color,
        command.lineWidth,
      );
      return `Arc drawn: ${command.startAngle}° → ${command.endAngle}°`;
    case "bezier":
      canvas.bezier(command.points, command.color, command.width, command.steps);
      return `Bezier curve drawn: ${CURVE_NAMES[command.points.length] ?? `${command.points.length}-point`}`;
    case "point":
      canvas.point(command.x, command.y, command.color, command.size);
      return `Point drawn at (${command.x},${command.y})`;
    case "text":
      canvas.text(command.x, command.y, command.text, command.color, command.fontSize, command.fontPath);
      return `Text drawn: "${command.text}" at (${command.x},${command.y})`;
    case "fill": {
      const filled = canvas.floodFill(command.x, command.y, command.color);
      return `Fill applied at (${command.x},${command.y}): ${filled} pixels`;
    }
    case "preset":
      PRESET_DRAWERS[command.preset](canvas, command);
      return `Preset drawn: ${command.preset} at (${command.x},${command.y}) scale ${command.scale}`;
  }
}
