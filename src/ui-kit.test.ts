import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { generateUiKit } from "./ui-kit.js";

describe("generateUiKit", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ui-kit-test-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the full asset set", async () => {
    const kit = await generateUiKit({ theme: "rpg", directory: path.join(dir, "rpg"), fontPath: "/nonexistent.ttf" });
    expect(kit.theme).toBe("rpg");
    expect(kit.directory).toBe(path.join(dir, "rpg"));
    expect(kit.files).toHaveLength(27);
    expect(kit.files).toContain("button_glossy.png");
    expect(kit.files).toContain("ctrl_settings.png");
    expect(kit.files).toContain("health_25.png");
    expect(kit.files).toContain("arrow_left.png");
    expect((await fs.readdir(kit.directory)).sort()).toEqual([...kit.files].sort());
  });

  it("sizes each asset", async () => {
    const kit = await generateUiKit({ directory: path.join(dir, "default"), fontPath: "/nonexistent.ttf" });
    const size = async (file: string) => {
      const meta = await sharp(path.join(kit.directory, file)).metadata();
      return [meta.width, meta.height];
    };
    expect(await size("button_flat.png")).toEqual([120, 40]);
    expect(await size("ctrl_close.png")).toEqual([48, 48]);
    expect(await size("progress_bar.png")).toEqual([200, 24]);
    expect(await size("health_100.png")).toEqual([150, 16]);
    expect(await size("dialog_box.png")).toEqual([300, 100]);
    expect(await size("arrow_up.png")).toEqual([40, 40]);
  });
});
