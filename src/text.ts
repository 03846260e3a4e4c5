/**
 * Text rendering with a two-tier font lookup.
 *
 * A TrueType/OpenType font is looked up first (an explicit path, then
 * GAME_UI_FONT, then a short list of platform defaults). When none of them can
 * be read and parsed the lookup yields the built-in 5x7 bitmap font instead, so
 * drawing text never fails.
 */

import { readFileSync } from "node:fs";
import opentype from "opentype.js";
import type { Font, PathCommand } from "opentype.js";
import bitmapFontData from "./bitmap-font.json" with { type: "json" };
import { bezierPoint, type Point } from "./geometry.js";
import { CoverageMask, fillPath } from "./raster.js";

export interface BitmapFont {
  cellWidth: number;
  cellHeight: number;
  advance: number;
  lineHeight: number;
  fallbackGlyph: string;
  /** Rows of "0"/"1" strings, top to bottom. */
  glyphs: Record<string, string[]>;
}

export type FontLookup =
  | { kind: "found"; font: Font; source: string }
  | { kind: "fallback"; font: BitmapFont; reason: string };

export interface TextMetrics {
  width: number;
  height: number;
}

export const BUILTIN_FONT: BitmapFont = bitmapFontData;

const PLATFORM_FONTS = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
  "/usr/share/fonts/TTF/DejaVuSans.ttf",
  "/usr/share/fonts/dejavu/DejaVuSans.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
  "/System/Library/Fonts/Supplemental/Arial.ttf",
  "/Library/Fonts/Arial.ttf",
  "C:\\Windows\\Fonts\\arial.ttf",
];

const cache = new Map<string, FontLookup>();

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function loadFontFile(path: string): Font | string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    return `cannot read ${path}: ${errorMessage(err)}`;
  }
  try {
    const font = opentype.parse(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
    return font.supported ? font : `unsupported font format in ${path}`;
  } catch (err) {
    return `cannot parse ${path}: ${errorMessage(err)}`;
  }
}

/**
 * Resolves the font for a text call. With an explicit `fontPath` only that file
 * is tried; otherwise GAME_UI_FONT and the platform defaults are tried in order.
 */
export function resolveFont(fontPath?: string): FontLookup {
  const key = fontPath ?? "";
  const cached = cache.get(key);
  if (cached) return cached;

  const candidates = fontPath ? [fontPath] : [process.env.GAME_UI_FONT, ...PLATFORM_FONTS];
  const failures: string[] = [];
  let lookup: FontLookup | undefined;
  for (const candidate of candidates) {
    if (!candidate) continue;
    const loaded = loadFontFile(candidate);
    if (typeof loaded === "string") {
      failures.push(loaded);
      continue;
    }
    lookup = { kind: "found", font: loaded, source: candidate };
    break;
  }
  lookup ??= { kind: "fallback", font: BUILTIN_FONT, reason: failures.at(-1) ?? "no font candidates" };
  cache.set(key, lookup);
  return lookup;
}

export function clearFontCache(): void {
  cache.clear();
}

/** Integer pixel scale of the bitmap font for a requested font size. */
export function bitmapScale(fontSize: number): number {
  return Math.max(1, Math.round(fontSize / 8));
}

export function measureText(text: string, fontSize: number, lookup: FontLookup): TextMetrics {
  const lines = text.split("\n");
  if (lookup.kind === "fallback") {
    const f = lookup.font;
    const s = bitmapScale(fontSize);
    const longest = Math.max(...lines.map((line) => [...line].length));
    return {
      width: longest === 0 ? 0 : (longest * f.advance - (f.advance - f.cellWidth)) * s,
      height: ((lines.length - 1) * f.lineHeight + f.cellHeight) * s,
    };
  }
  const font = lookup.font;
  const scale = fontSize / font.unitsPerEm;
  const lineHeight = (font.ascender - font.descender) * scale;
  return {
    width: Math.ceil(Math.max(...lines.map((line) => font.getAdvanceWidth(line, fontSize)))),
    height: Math.ceil(lines.length * lineHeight),
  };
}

/** Marks the glyph pixels of `text` with its top-left corner at (x, y). */
export function rasterizeText(
  mask: CoverageMask,
  x: number,
  y: number,
  text: string,
  fontSize: number,
  lookup: FontLookup,
): void {
  if (!Number.isFinite(x) || !Number.isFinite(y) || !(fontSize > 0)) return;
  const lines = text.split("\n");
  if (lookup.kind === "fallback") {
    lines.forEach((line, i) => drawBitmapLine(mask, x, y + i * lookup.font.lineHeight * bitmapScale(fontSize), line, fontSize, lookup.font));
    return;
  }
  const font = lookup.font;
  const scale = fontSize / font.unitsPerEm;
  const ascent = font.ascender * scale;
  const lineHeight = (font.ascender - font.descender) * scale;
  lines.forEach((line, i) => {
    // shifted half a pixel so integer scanlines sample pixel centers
    const path = font.getPath(line, x - 0.5, y - 0.5 + i * lineHeight + ascent, fontSize);
    fillPath(mask, flattenCommands(path.commands), "nonzero");
  });
}

function drawBitmapLine(mask: CoverageMask, x: number, y: number, line: string, fontSize: number, font: BitmapFont): void {
  const s = bitmapScale(fontSize);
  const left = Math.round(x);
  const top = Math.round(y);
  let index = 0;
  for (const ch of line) {
    const rows = font.glyphs[ch] ?? font.glyphs[font.fallbackGlyph] ?? [];
    const gx = left + index * font.advance * s;
    rows.forEach((row, ry) => {
      for (let rx = 0; rx < row.length; rx++) {
        if (row[rx] !== "1") continue;
        for (let dy = 0; dy < s; dy++) {
          mask.span(top + ry * s + dy, gx + rx * s, gx + rx * s + s - 1);
        }
      }
    });
    index++;
  }
}

const CURVE_STEPS = 8;

function flattenCommands(commands: PathCommand[]): Point[][] {
  const contours: Point[][] = [];
  let current: Point[] = [];
  let cursor: Point = [0, 0];
  for (const cmd of commands) {
    switch (cmd.type) {
      case "M":
        if (current.length > 1) contours.push(current);
        current = [[cmd.x, cmd.y]];
        cursor = [cmd.x, cmd.y];
        break;
      case "L":
        current.push([cmd.x, cmd.y]);
        cursor = [cmd.x, cmd.y];
        break;
      case "Q": {
        const controls: Point[] = [cursor, [cmd.x1, cmd.y1], [cmd.x, cmd.y]];
        for (let i = 1; i <= CURVE_STEPS; i++) current.push(bezierPoint(controls, i / CURVE_STEPS));
        cursor = [cmd.x, cmd.y];
        break;
      }
      case "C": {
        const controls: Point[] = [cursor, [cmd.x1, cmd.y1], [cmd.x2, cmd.y2], [cmd.x, cmd.y]];
        for (let i = 1; i <= CURVE_STEPS; i++) current.push(bezierPoint(controls, i / CURVE_STEPS));
        cursor = [cmd.x, cmd.y];
        break;
      }
      case "Z":
        if (current.length > 1) contours.push(current);
        current = [];
        break;
    }
  }
  if (current.length > 1) contours.push(current);
  return contours;
}
