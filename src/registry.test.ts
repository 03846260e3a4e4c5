import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CanvasRegistry, DEFAULT_CANVAS_ID } from "./registry.js";

describe("CanvasRegistry", () => {
  let dir: string;
  let registry: CanvasRegistry;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "registry-test-"));
    registry = new CanvasRegistry({ outputDir: dir });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("replaces a canvas created under an existing id", () => {
    registry.create(DEFAULT_CANVAS_ID, 10, 10, [255, 0, 0]);
    registry.create(DEFAULT_CANVAS_ID, 20, 5);
    const found = registry.get(DEFAULT_CANVAS_ID);
    expect(found.ok).toBe(true);
    if (!found.ok) return;
    expect(found.value.width).toBe(20);
    expect(found.value.getPixel(0, 0)).toEqual([0, 0, 0, 0]);
    expect(registry.list()).toEqual([{ id: "default", width: 20, height: 5 }]);
  });

  it("reports a missing canvas as not_found", () => {
    const found = registry.get("nope");
    expect(found).toEqual({
      ok: false,
      error: "not_found",
      canvasId: "nope",
      message: "Canvas 'nope' does not exist. Create it with pen_create_canvas first.",
    });
    expect(registry.apply("nope", { kind: "point", x: 0, y: 0, color: [0, 0, 0], size: 1 }).ok).toBe(false);
  });

  it("applies pen commands to the named canvas", () => {
    const canvas = registry.create("sketch", 10, 10);
    const result = registry.apply("sketch", { kind: "point", x: 4, y: 4, color: [0, 0, 255], size: 1 });
    expect(result).toEqual({ ok: true, value: { canvas, summary: "Point drawn at (4,4)" } });
    expect(canvas.getPixel(4, 4)).toEqual([0, 0, 255, 255]);
  });

  it("deletes canvases explicitly", () => {
    registry.create("a", 1, 1);
    registry.create("b", 1, 1);
    expect(registry.delete("a")).toBe(true);
    expect(registry.delete("a")).toBe(false);
    expect(registry.has("a")).toBe(false);
    expect(registry.list().map((c) => c.id)).toEqual(["b"]);
  });

  it("saves into the default output directory and keeps the canvas", async () => {
    registry.create("sketch", 8, 8, [0, 128, 0]);
    const saved = await registry.save("sketch", { filename: "sketch.png", outputDir: "nested" });
    expect(saved.ok).toBe(true);
    if (!saved.ok) return;
    expect(saved.value.path).toBe(path.join(dir, "nested", "sketch.png"));
    const bytes = await fs.readFile(saved.value.path);
    expect([...bytes.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    expect(registry.has("sketch")).toBe(true);
  });

  it("does not write anything for a missing canvas", async () => {
    const saved = await registry.save("nope", { filename: "x.png" });
    expect(saved.ok).toBe(false);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
