#!/usr/bin/env node
/**
 * Entry point for running the MCP server.
 * Run with: node dist/main.js [--stdio | --demo [dir]]
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import path from "node:path";
import { createHttpApp, createPreviewOnlyApp } from "./create-http-app.js";
import { createServer, type ServerContext } from "./server.js";
import { CanvasRegistry } from "./src/registry.js";
import { generateUiKit } from "./src/ui-kit.js";

function createContext(): ServerContext {
  const outputDir = path.resolve(process.env.GAME_UI_OUTPUT_DIR ?? path.join(process.cwd(), "output"));
  return { registry: new CanvasRegistry({ outputDir }), outputDir };
}

/**
 * Starts an MCP server with Streamable HTTP transport in stateless mode.
 */
export async function startStreamableHTTPServer(ctx: ServerContext): Promise<void> {
  const port = parseInt(process.env.PORT ?? "3001", 10);
  const app = createHttpApp(ctx);

  const httpServer = app.listen(port, () => {
    console.log(`MCP server listening on http://localhost:${port}/mcp`);
    console.log(`Canvas previews: http://localhost:${port}/api/canvas/<id>`);
    console.log(`Saving images under ${ctx.outputDir}`);
  });

  const shutdown = () => {
    console.log("\nShutting down...");
    httpServer.close(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/**
 * Starts an MCP server with stdio transport, plus the preview routes over HTTP.
 * stdout carries the protocol, so everything is logged to stderr.
 */
export async function startStdioServer(ctx: ServerContext): Promise<void> {
  const port = parseInt(process.env.PORT ?? "3001", 10);
  const app = createPreviewOnlyApp(ctx);

  const httpServer = app.listen(port, () => {
    console.error(`Canvas previews: http://localhost:${port}/api/canvas/<id>`);
  });
  httpServer.on("error", (e) => {
    console.error("Preview server unavailable:", e);
  });

  await createServer(ctx).connect(new StdioServerTransport());
}

/** Writes the demo UI kit and returns. */
export async function runDemo(ctx: ServerContext, dir: string | undefined): Promise<void> {
  const kit = await generateUiKit({ directory: path.resolve(ctx.outputDir, dir ?? "demo") });
  console.log(`Wrote ${kit.files.length} files to ${kit.directory}`);
  for (const file of kit.files) console.log(`  ${file}`);
}

async function main() {
  const ctx = createContext();
  const args = process.argv.slice(2);
  const demo = args.indexOf("--demo");
  if (demo !== -1) {
    const dir = args[demo + 1];
    await runDemo(ctx, dir !== undefined && !dir.startsWith("--") ? dir : undefined);
  } else if (args.includes("--stdio")) {
    await startStdioServer(ctx);
  } else {
    await startStreamableHTTPServer(ctx);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
