import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import path from "node:path";
import { z } from "zod/v4";
import { Canvas } from "./src/canvas.js";
import { outputPath, saveCanvas, toBase64, IMAGE_FORMATS } from "./src/encode.js";
import type { PenCommand } from "./src/pen.js";
import { CanvasRegistry, DEFAULT_CANVAS_ID } from "./src/registry.js";
import {
  ARROW_DIRECTIONS,
  BAR_TYPES,
  BUTTON_COLOR_NAMES,
  BUTTON_STYLES,
  CONTROL_STYLES,
  CONTROL_TYPES,
  DIALOG_STYLES,
  GEM_TYPES,
  ICON_TYPES,
  MINIMAP_SHAPES,
  PRESETS,
  RARITIES,
  createButton,
  createControlButton,
  createIcon,
  createProgressBar,
  drawDialogBox,
  drawItemSlot,
  drawMinimap,
  drawTooltip,
} from "./src/shapes/index.js";
import { UI_KIT_THEMES, generateUiKit } from "./src/ui-kit.js";

// ============================================================
// RECALL: usage guide for the agent
// ============================================================
const USAGE_GUIDE = `# Game UI Painter

Placeholder art for game UI prototypes. Every image tool saves a PNG and returns it inline.

## One-shot tools
- draw_button: styles flat | gradient | glossy | outline | pixel; colors blue | green | red | orange | purple
- draw_icon: star | coin | gem | heart | shield | arrow (gem_type, direction)
- draw_progress_bar: bar_type normal | health; progress is clamped to 0-100
- draw_item_slot: rarity common | uncommon | rare | epic | legendary; show_shine for epic/legendary
- draw_dialog_box: modern | fantasy | scifi | pixel
- draw_minimap: circle | square | hexagon
- draw_tooltip: rarity-colored title with sample stats
- draw_shape: rounded_rect (optional gradient) | circle | polygon
- draw_control_button: close | settings | play | pause | menu | home | refresh | back | plus | minus | check
- generate_ui_kit: a full themed asset set (default | rpg | scifi | cartoon | pixel)

## Pen workflow
1. pen_create_canvas (canvas_id defaults to "default")
2. pen_line, pen_lines, pen_rect, pen_ellipse, pen_polygon, pen_regular_polygon, pen_arc, pen_bezier, pen_point, pen_text, pen_fill, pen_draw_preset
3. pen_save writes the file; the canvas stays drawable. pen_delete_canvas frees it.

## Conventions
- Colors are [r, g, b] or [r, g, b, a] with channels 0-255.
- Points are [x, y]; origin is the top-left corner and y grows downward.
- Arc angles are degrees, 0 = right, increasing clockwise.
- Creating a canvas with an existing id replaces it.
`;

const color = z.array(z.number().int().min(0).max(255)).min(3).max(4);
const point = z.tuple([z.number(), z.number()]);
const dimension = z.number().int().min(1).max(4096);
const canvasId = z.string().min(1).default(DEFAULT_CANVAS_ID).describe("Pen canvas identifier");
const outputDir = z.string().optional().describe("Output directory; defaults to the server's output directory");

export interface ServerContext {
  registry: CanvasRegistry;
  /** Default directory for saved images. */
  outputDir: string;
}

function errorResult(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

async function imageResult(summary: string, canvas: Canvas): Promise<CallToolResult> {
  return {
    content: [
      { type: "text", text: summary },
      { type: "image", data: await toBase64(canvas), mimeType: "image/png" },
    ],
  };
}

/** Runs a tool body, reporting any thrown error as an error result. */
async function run(tool: string, body: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await body();
  } catch (err) {
    console.error(`Tool ${tool} failed:`, err);
    return errorResult(`${tool} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Registers the one-shot image tools.
 */
function registerImageTools(server: McpServer, ctx: ServerContext): void {
  const publish = async (canvas: Canvas, summary: string, filename: string, dir: string | undefined): Promise<CallToolResult> => {
    const file = await saveCanvas(canvas, outputPath(filename, dir, ctx.outputDir));
    return imageResult(`Saved ${file}\n${summary}`, canvas);
  };

  server.registerTool(
    "draw_button",
    {
      title: "Draw Button",
      description: "Draws a game button with optional centered label.",
      inputSchema: z.object({
        width: dimension.default(120),
        height: dimension.default(40),
        text: z.string().default(""),
        style: z.enum(BUTTON_STYLES).default("gradient"),
        color: z.enum(BUTTON_COLOR_NAMES).default("blue"),
        filename: z.string().default("button.png"),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_button", async () => {
        const canvas = createButton(args);
        return publish(canvas, `Button ${args.width}x${args.height}, style ${args.style}, color ${args.color}`, args.filename, args.output_dir);
      }),
  );

  server.registerTool(
    "draw_icon",
    {
      title: "Draw Icon",
      description: "Draws a square decorative icon: star, coin, gem, heart, shield or arrow.",
      inputSchema: z.object({
        icon_type: z.enum(ICON_TYPES).default("star"),
        size: dimension.default(64),
        gem_type: z.enum(GEM_TYPES).default("diamond"),
        direction: z.enum(ARROW_DIRECTIONS).default("right"),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_icon", async () => {
        const canvas = createIcon(args.size, args.icon_type, { gemType: args.gem_type, direction: args.direction });
        return publish(
          canvas,
          `Icon ${args.icon_type}, ${args.size}x${args.size}`,
          args.filename ?? `icon_${args.icon_type}.png`,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "draw_progress_bar",
    {
      title: "Draw Progress Bar",
      description: "Draws a progress bar or a segmented health bar. Progress is a percentage clamped to 0-100.",
      inputSchema: z.object({
        width: dimension.default(200),
        height: dimension.default(24),
        progress: z.number().default(50),
        bar_type: z.enum(BAR_TYPES).default("normal"),
        filename: z.string().default("progress_bar.png"),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_progress_bar", async () => {
        const canvas = createProgressBar({ width: args.width, height: args.height, progress: args.progress, barType: args.bar_type });
        return publish(
          canvas,
          `Progress bar ${args.width}x${args.height}, ${args.progress}%, type ${args.bar_type}`,
          args.filename,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "draw_item_slot",
    {
      title: "Draw Item Slot",
      description: "Draws an inventory slot framed in its rarity colors.",
      inputSchema: z.object({
        width: dimension.default(64),
        height: dimension.default(64),
        rarity: z.enum(RARITIES).default("common"),
        show_shine: z.boolean().default(false),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_item_slot", async () => {
        const canvas = new Canvas(args.width, args.height);
        drawItemSlot(canvas, { rarity: args.rarity, shine: args.show_shine });
        return publish(
          canvas,
          `Item slot ${args.width}x${args.height}, rarity ${args.rarity}`,
          args.filename ?? `slot_${args.rarity}.png`,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "draw_dialog_box",
    {
      title: "Draw Dialog Box",
      description: "Draws a dialog panel with an optional speech pointer.",
      inputSchema: z.object({
        width: dimension.default(300),
        height: dimension.default(100),
        style: z.enum(DIALOG_STYLES).default("modern"),
        show_arrow: z.boolean().default(true),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_dialog_box", async () => {
        const canvas = new Canvas(args.width, args.height);
        drawDialogBox(canvas, { style: args.style, arrow: args.show_arrow });
        return publish(
          canvas,
          `Dialog box ${args.width}x${args.height}, style ${args.style}`,
          args.filename ?? `dialog_${args.style}.png`,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "draw_minimap",
    {
      title: "Draw Minimap",
      description: "Draws a minimap frame with a player marker.",
      inputSchema: z.object({
        width: dimension.default(120),
        height: dimension.default(120),
        shape: z.enum(MINIMAP_SHAPES).default("circle"),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_minimap", async () => {
        const canvas = new Canvas(args.width, args.height);
        drawMinimap(canvas, { shape: args.shape });
        return publish(
          canvas,
          `Minimap ${args.width}x${args.height}, shape ${args.shape}`,
          args.filename ?? `minimap_${args.shape}.png`,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "draw_tooltip",
    {
      title: "Draw Tooltip",
      description: "Draws an item tooltip with a rarity-colored title and two sample stat lines.",
      inputSchema: z.object({
        width: dimension.default(180),
        height: dimension.default(80),
        title: z.string().default("Item Name"),
        rarity: z.enum(RARITIES).default("rare"),
        filename: z.string().default("tooltip.png"),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_tooltip", async () => {
        const canvas = new Canvas(args.width, args.height);
        drawTooltip(canvas, { title: args.title, rarity: args.rarity });
        return publish(canvas, `Tooltip "${args.title}", rarity ${args.rarity}`, args.filename, args.output_dir);
      }),
  );

  server.registerTool(
    "draw_shape",
    {
      title: "Draw Shape",
      description: "Draws a rounded rectangle (optionally with a gradient), a circle or a regular polygon filling the image.",
      inputSchema: z.object({
        shape_type: z.enum(["rounded_rect", "circle", "polygon"]).default("rounded_rect"),
        width: dimension.default(100),
        height: dimension.default(100),
        fill_color: color.default([100, 149, 237, 255]),
        border_color: color.optional(),
        border_width: z.number().int().min(0).default(0),
        radius: z.number().min(0).default(10),
        sides: z.number().int().min(3).max(64).default(6),
        gradient: z.enum(["none", "horizontal", "vertical", "diagonal", "radial"]).default("none"),
        gradient_end_color: color.optional(),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_shape", async () => {
        const { width: w, height: h, border_width: borderWidth } = args;
        const canvas = new Canvas(w, h);
        const style = { fill: args.fill_color, border: args.border_color, borderWidth };
        switch (args.shape_type) {
          case "rounded_rect": {
            const direction = args.gradient;
            const gradient =
              direction !== "none" && args.gradient_end_color ? { direction, endColor: args.gradient_end_color } : undefined;
            canvas.roundedRect(0, 0, w, h, args.radius, { ...style, gradient });
            break;
          }
          case "circle": {
            const r = Math.floor(Math.min(w, h) / 2) - (args.border_color ? borderWidth : 0) - 2;
            canvas.circle(Math.floor(w / 2), Math.floor(h / 2), r, style);
            break;
          }
          case "polygon":
            canvas.regularPolygon(args.sides, Math.floor(w / 2), Math.floor(h / 2), Math.floor(Math.min(w, h) / 2) - 4, style);
            break;
        }
        return publish(canvas, `Shape ${args.shape_type}, ${w}x${h}`, args.filename ?? `${args.shape_type}.png`, args.output_dir);
      }),
  );

  server.registerTool(
    "draw_control_button",
    {
      title: "Draw Control Button",
      description: "Draws a round/square control icon button such as close, play or settings.",
      inputSchema: z.object({
        button_type: z.enum(CONTROL_TYPES).default("close"),
        size: dimension.default(48),
        style: z.enum(CONTROL_STYLES).optional().describe("Background shape; each button type has its own default"),
        bg_color: color.optional(),
        icon_color: color.optional(),
        filename: z.string().optional(),
        output_dir: outputDir,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("draw_control_button", async () => {
        const canvas = createControlButton(args.size, args.button_type, {
          style: args.style,
          background: args.bg_color,
          iconColor: args.icon_color,
        });
        return publish(
          canvas,
          `Control button ${args.button_type}, ${args.size}x${args.size}`,
          args.filename ?? `ctrl_${args.button_type}.png`,
          args.output_dir,
        );
      }),
  );

  server.registerTool(
    "generate_ui_kit",
    {
      title: "Generate UI Kit",
      description: "Writes a complete placeholder UI kit (buttons, controls, icons, gems, bars, slots, dialog, arrows).",
      inputSchema: z.object({
        theme: z.enum(UI_KIT_THEMES).default("default"),
        output_dir: z.string().default("ui_kit").describe("Kit directory, relative to the server's output directory"),
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("generate_ui_kit", async () => {
        const kit = await generateUiKit({ theme: args.theme, directory: path.resolve(ctx.outputDir, args.output_dir) });
        const text = [
          `UI kit generated in ${kit.directory}`,
          `Theme: ${kit.theme}`,
          `Files (${kit.files.length}):`,
          ...kit.files.map((f) => `  - ${f}`),
        ].join("\n");
        return { content: [{ type: "text", text }] };
      }),
  );
}

/**
 * Registers the stateful pen tools backed by the canvas registry.
 */
function registerPenTools(server: McpServer, ctx: ServerContext): void {
  const { registry } = ctx;

  const draw = (tool: string, id: string, command: PenCommand): Promise<CallToolResult> =>
    run(tool, async () => {
      const result = registry.apply(id, command);
      if (!result.ok) return errorResult(result.message);
      return imageResult(result.value.summary, result.value.canvas);
    });

  const outlined = {
    fill_color: color.optional(),
    border_color: color.default([0, 0, 0, 255]),
    border_width: z.number().int().min(0).default(2),
  };

  server.registerTool(
    "pen_create_canvas",
    {
      title: "Create Pen Canvas",
      description: "Creates (or replaces) a named canvas for the pen tools.",
      inputSchema: z.object({
        width: dimension.default(200),
        height: dimension.default(200),
        bg_color: color.default([0, 0, 0, 0]),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("pen_create_canvas", async () => {
        registry.create(args.canvas_id, args.width, args.height, args.bg_color);
        return {
          content: [
            {
              type: "text",
              text: `Canvas '${args.canvas_id}' created: ${args.width}x${args.height}, background [${args.bg_color.join(", ")}]. Draw with the pen_* tools, then pen_save.`,
            },
          ],
        };
      }),
  );

  server.registerTool(
    "pen_line",
    {
      title: "Pen Line",
      description: "Draws a straight line.",
      inputSchema: z.object({
        x1: z.number(),
        y1: z.number(),
        x2: z.number(),
        y2: z.number(),
        color: color.default([0, 0, 0, 255]),
        width: z.number().min(1).default(2),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_line", args.canvas_id, {
        kind: "line",
        from: [args.x1, args.y1],
        to: [args.x2, args.y2],
        color: args.color,
        width: args.width,
      }),
  );

  server.registerTool(
    "pen_lines",
    {
      title: "Pen Polyline",
      description: "Draws a polyline with rounded joins; closed joins the last point to the first.",
      inputSchema: z.object({
        points: z.array(point).min(2),
        color: color.default([0, 0, 0, 255]),
        width: z.number().min(1).default(2),
        closed: z.boolean().default(false),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_lines", args.canvas_id, {
        kind: "lines",
        points: args.points,
        color: args.color,
        width: args.width,
        closed: args.closed,
      }),
  );

  server.registerTool(
    "pen_rect",
    {
      title: "Pen Rectangle",
      description: "Draws a rectangle; fill is optional, the border defaults to black, 2px.",
      inputSchema: z.object({
        x: z.number(),
        y: z.number(),
        width: z.number(),
        height: z.number(),
        ...outlined,
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_rect", args.canvas_id, {
        kind: "rect",
        x: args.x,
        y: args.y,
        width: args.width,
        height: args.height,
        fill: args.fill_color,
        border: args.border_color,
        borderWidth: args.border_width,
      }),
  );

  server.registerTool(
    "pen_ellipse",
    {
      title: "Pen Ellipse",
      description: "Draws the ellipse inscribed in a box; fill is optional, the border defaults to black, 2px.",
      inputSchema: z.object({
        x: z.number(),
        y: z.number(),
        width: z.number(),
        height: z.number(),
        ...outlined,
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_ellipse", args.canvas_id, {
        kind: "ellipse",
        x: args.x,
        y: args.y,
        width: args.width,
        height: args.height,
        fill: args.fill_color,
        border: args.border_color,
        borderWidth: args.border_width,
      }),
  );

  server.registerTool(
    "pen_polygon",
    {
      title: "Pen Polygon",
      description: "Draws a polygon through the given vertices (even-odd fill).",
      inputSchema: z.object({
        points: z.array(point).min(1),
        ...outlined,
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_polygon", args.canvas_id, {
        kind: "polygon",
        points: args.points,
        fill: args.fill_color,
        border: args.border_color,
        borderWidth: args.border_width,
      }),
  );

  server.registerTool(
    "pen_regular_polygon",
    {
      title: "Pen Regular Polygon",
      description: "Draws a regular polygon; with rotation 0 one vertex points up.",
      inputSchema: z.object({
        sides: z.number().int().min(3).max(64),
        cx: z.number(),
        cy: z.number(),
        radius: z.number().min(0),
        rotation: z.number().default(0),
        ...outlined,
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_regular_polygon", args.canvas_id, {
        kind: "regular_polygon",
        sides: args.sides,
        cx: args.cx,
        cy: args.cy,
        radius: args.radius,
        rotation: args.rotation,
        fill: args.fill_color,
        border: args.border_color,
        borderWidth: args.border_width,
      }),
  );

  server.registerTool(
    "pen_arc",
    {
      title: "Pen Arc",
      description: "Draws an elliptical arc inside a box. 0° points right and angles grow clockwise.",
      inputSchema: z.object({
        x: z.number(),
        y: z.number(),
        width: z.number(),
        height: z.number(),
        start_angle: z.number().default(0),
        end_angle: z.number().default(180),
        color: color.default([0, 0, 0, 255]),
        line_width: z.number().min(1).default(2),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_arc", args.canvas_id, {
        kind: "arc",
        x: args.x,
        y: args.y,
        width: args.width,
        height: args.height,
        startAngle: args.start_angle,
        endAngle: args.end_angle,
        color: args.color,
        lineWidth: args.line_width,
      }),
  );

  server.registerTool(
    "pen_bezier",
    {
      title: "Pen Bezier",
      description: "Draws a Bezier curve through 2 (linear), 3 (quadratic) or 4 (cubic) control points.",
      inputSchema: z.object({
        points: z.array(point).min(2).max(4),
        color: color.default([0, 0, 0, 255]),
        width: z.number().min(1).default(2),
        steps: z.number().int().min(1).max(1000).default(50),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_bezier", args.canvas_id, {
        kind: "bezier",
        points: args.points,
        color: args.color,
        width: args.width,
        steps: args.steps,
      }),
  );

  server.registerTool(
    "pen_point",
    {
      title: "Pen Point",
      description: "Draws a filled dot of the given diameter.",
      inputSchema: z.object({
        x: z.number(),
        y: z.number(),
        color: color.default([0, 0, 0, 255]),
        size: z.number().min(1).default(3),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_point", args.canvas_id, { kind: "point", x: args.x, y: args.y, color: args.color, size: args.size }),
  );

  server.registerTool(
    "pen_text",
    {
      title: "Pen Text",
      description: "Writes text with its top-left corner at (x, y). Falls back to a built-in bitmap font when no font file is usable.",
      inputSchema: z.object({
        x: z.number(),
        y: z.number(),
        text: z.string(),
        color: color.default([0, 0, 0, 255]),
        font_size: z.number().min(1).max(512).default(16),
        font_path: z.string().optional(),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_text", args.canvas_id, {
        kind: "text",
        x: args.x,
        y: args.y,
        text: args.text,
        color: args.color,
        fontSize: args.font_size,
        fontPath: args.font_path,
      }),
  );

  server.registerTool(
    "pen_fill",
    {
      title: "Pen Fill",
      description: "Flood-fills the 4-connected region around a seed pixel (at most 100000 pixels).",
      inputSchema: z.object({
        x: z.number().int(),
        y: z.number().int(),
        color: color.default([255, 0, 0, 255]),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_fill", args.canvas_id, { kind: "fill", x: args.x, y: args.y, color: args.color }),
  );

  server.registerTool(
    "pen_draw_preset",
    {
      title: "Pen Preset",
      description: "Draws a car, house or tree from pen primitives at a position and scale.",
      inputSchema: z.object({
        preset: z.enum(PRESETS).default("car"),
        x: z.number().default(0),
        y: z.number().default(0),
        scale: z.number().positive().default(1),
        primary_color: color.optional().describe("Car body, house wall or tree leaf color"),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      draw("pen_draw_preset", args.canvas_id, {
        kind: "preset",
        preset: args.preset,
        x: args.x,
        y: args.y,
        scale: args.scale,
        primary: args.primary_color,
      }),
  );

  server.registerTool(
    "pen_save",
    {
      title: "Save Pen Canvas",
      description: "Saves a pen canvas to a file. The canvas remains available for drawing.",
      inputSchema: z.object({
        filename: z.string().default("canvas.png"),
        output_dir: outputDir,
        format: z.enum(IMAGE_FORMATS).optional().describe("Defaults to the filename's extension"),
        canvas_id: canvasId,
      }),
    },
    async (args): Promise<CallToolResult> =>
      run("pen_save", async () => {
        const saved = await registry.save(args.canvas_id, {
          filename: args.filename,
          outputDir: args.output_dir,
          format: args.format,
        });
        if (!saved.ok) return errorResult(saved.message);
        const { canvas, path: file } = saved.value;
        return imageResult(`Canvas '${args.canvas_id}' saved: ${file}\nSize: ${canvas.width}x${canvas.height}`, canvas);
      }),
  );

  server.registerTool(
    "pen_list_canvases",
    {
      title: "List Pen Canvases",
      description: "Lists the pen canvases currently held by the server.",
      annotations: { readOnlyHint: true },
    },
    async (): Promise<CallToolResult> => {
      const canvases = registry.list();
      const text =
        canvases.length === 0
          ? "No canvases. Create one with pen_create_canvas."
          : canvases.map((c) => `${c.id}: ${c.width}x${c.height}`).join("\n");
      return { content: [{ type: "text", text }] };
    },
  );

  server.registerTool(
    "pen_delete_canvas",
    {
      title: "Delete Pen Canvas",
      description: "Removes a pen canvas from the server.",
      inputSchema: z.object({ canvas_id: canvasId }),
    },
    async (args): Promise<CallToolResult> => {
      if (!registry.delete(args.canvas_id)) {
        const missing = registry.get(args.canvas_id);
        return errorResult(missing.ok ? `Canvas '${args.canvas_id}' could not be deleted.` : missing.message);
      }
      return { content: [{ type: "text", text: `Canvas '${args.canvas_id}' deleted.` }] };
    },
  );
}

/**
 * Registers all game UI tools on the given McpServer.
 */
export function registerTools(server: McpServer, ctx: ServerContext): void {
  server.registerTool(
    "read_me",
    {
      description: "Returns the tool guide: shape families, variants, the pen workflow and coordinate conventions. Call this before drawing for the first time.",
      annotations: { readOnlyHint: true },
    },
    async (): Promise<CallToolResult> => {
      return { content: [{ type: "text", text: USAGE_GUIDE }] };
    },
  );

  registerImageTools(server, ctx);
  registerPenTools(server, ctx);
}

/**
 * Creates a new MCP server instance over the given canvas registry.
 */
export function createServer(ctx: ServerContext): McpServer {
  const server = new McpServer({
    name: "Game UI Painter",
    version: "1.0.0",
  });
  registerTools(server, ctx);
  return server;
}
