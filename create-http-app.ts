/**
 * Creates the Express app for HTTP mode.
 * Used by main.ts; the preview-only variant runs beside the stdio transport.
 */

import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import cors from "cors";
import express from "express";
import type { Request, Response } from "express";
import { toBytes } from "./src/encode.js";
import { createServer, type ServerContext } from "./server.js";

function addPreviewRoutes(app: express.Express, { registry }: ServerContext): void {
  app.get("/api/canvas", (_req: Request, res: Response) => {
    res.json({ canvases: registry.list() });
  });

  app.get("/api/canvas/:id", async (req: Request<{ id: string }>, res: Response) => {
    const found = registry.get(req.params.id);
    if (!found.ok) {
      res.status(404).json({ error: found.error, message: found.message });
      return;
    }
    try {
      const png = await toBytes(found.value, "png");
      res.setHeader("Content-Type", "image/png");
      res.setHeader("Cache-Control", "no-store");
      res.send(png);
    } catch (e) {
      console.error("Failed to encode canvas preview:", e);
      res.status(500).json({ error: "Failed to encode canvas" });
    }
  });
}

export function createHttpApp(ctx: ServerContext): express.Express {
  const app = createMcpExpressApp({ host: "0.0.0.0" });
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  addPreviewRoutes(app, ctx);

  // Stateless: a fresh server per request, all of them over the same registry.
  app.all("/mcp", async (req: Request, res: Response) => {
    const server = createServer(ctx);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      transport.close().catch((e: unknown) => console.error("Failed to close transport:", e));
      server.close().catch((e: unknown) => console.error("Failed to close server:", e));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("MCP error:", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  return app;
}

/** Express app with only the canvas preview routes (for stdio mode, no /mcp). */
export function createPreviewOnlyApp(ctx: ServerContext): express.Express {
  const app = express();
  app.use(cors());
  addPreviewRoutes(app, ctx);
  return app;
}
