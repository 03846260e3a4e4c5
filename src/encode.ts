import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type { Canvas } from "./canvas.js";

export const IMAGE_FORMATS = ["png", "jpeg", "webp"] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const MIME_TYPES: Record<ImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
};

/**
 * Encodes the canvas as it is at call time. The pixels are copied before the
 * first await, so draws issued while encoding do not reach the output.
 */
export async function toBytes(canvas: Canvas, format: ImageFormat = "png"): Promise<Buffer> {
  const { width, height, data } = canvas.snapshot();
  const image = sharp(Buffer.from(data.buffer, data.byteOffset, data.byteLength), {
    raw: { width, height, channels: 4 },
  });
  switch (format) {
    case "png":
      return image.png().toBuffer();
    case "jpeg":
      // no alpha channel in JPEG
      return image.flatten({ background: "#ffffff" }).jpeg({ quality: 90 }).toBuffer();
    case "webp":
      return image.webp().toBuffer();
  }
}

export async function toBase64(canvas: Canvas, format: ImageFormat = "png"): Promise<string> {
  return (await toBytes(canvas, format)).toString("base64");
}

export async function toDataUri(canvas: Canvas, format: ImageFormat = "png"): Promise<string> {
  return `data:${MIME_TYPES[format]};base64,${await toBase64(canvas, format)}`;
}

/** Format implied by a file name's extension; PNG when there is none or it is unknown. */
export function formatForPath(filePath: string): ImageFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case ".jpg":
    case ".jpeg":
      return "jpeg";
    case ".webp":
      return "webp";
    default:
      return "png";
  }
}

/**
 * Writes the canvas to `filePath`, creating missing directories, and resolves
 * to the absolute path written. Filesystem errors reject.
 */
export async function saveCanvas(canvas: Canvas, filePath: string, format?: ImageFormat): Promise<string> {
  const bytes = await toBytes(canvas, format ?? formatForPath(filePath));
  const target = path.resolve(filePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, bytes);
  return target;
}

/** Joins a file name onto an output directory, falling back to `defaultDir`. */
export function outputPath(filename: string, outputDir: string | undefined, defaultDir: string): string {
  return path.resolve(defaultDir, outputDir ?? ".", filename);
}
