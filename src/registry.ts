import { Canvas } from "./canvas.js";
import type { ColorInput } from "./color.js";
import { outputPath, saveCanvas, type ImageFormat } from "./encode.js";
import { applyPenCommand, type PenCommand } from "./pen.js";

export const DEFAULT_CANVAS_ID = "default";

export type RegistryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: "not_found"; canvasId: string; message: string };

export interface CanvasInfo {
  id: string;
  width: number;
  height: number;
}

export interface SaveOptions {
  filename: string;
  outputDir?: string;
  format?: ImageFormat;
}

export interface CanvasRegistryOptions {
  /** Directory relative save targets resolve against. */
  outputDir: string;
}

/**
 * Named canvases for callers that cannot hold a Canvas across calls.
 *
 * Entries live until they are replaced or deleted; there is no eviction, so a
 * long-running process that keeps creating new ids keeps growing.
 */
export class CanvasRegistry {
  private readonly canvases = new Map<string, Canvas>();

  constructor(readonly options: CanvasRegistryOptions) {}

  /** Creates a canvas under `id`, discarding any canvas already stored there. */
  create(id: string, width: number, height: number, background?: ColorInput): Canvas {
    const canvas = new Canvas(width, height, background);
    this.canvases.set(id, canvas);
    return canvas;
  }

  get(id: string): RegistryResult<Canvas> {
    const canvas = this.canvases.get(id);
    if (!canvas) {
      return {
        ok: false,
        error: "not_found",
        canvasId: id,
        message: `Canvas '${id}' does not exist. Create it with pen_create_canvas first.`,
      };
    }
    return { ok: true, value: canvas };
  }

  has(id: string): boolean {
    return this.canvases.has(id);
  }

  list(): CanvasInfo[] {
    return [...this.canvases].map(([id, c]) => ({ id, width: c.width, height: c.height }));
  }

  delete(id: string): boolean {
    return this.canvases.delete(id);
  }

  apply(id: string, command: PenCommand): RegistryResult<{ canvas: Canvas; summary: string }> {
    const found = this.get(id);
    if (!found.ok) return found;
    return { ok: true, value: { canvas: found.value, summary: applyPenCommand(found.value, command) } };
  }

  /** Writes the canvas to disk; it stays registered and drawable afterwards. */
  async save(id: string, { filename, outputDir, format }: SaveOptions): Promise<RegistryResult<{ canvas: Canvas; path: string }>> {
    const found = this.get(id);
    if (!found.ok) return found;
    const target = outputPath(filename, outputDir, this.options.outputDir);
    return { ok: true, value: { canvas: found.value, path: await saveCanvas(found.value, target, format) } };
  }
}
