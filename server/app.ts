// server/app.ts
import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import type { WebSocketServer } from "ws";

import { config } from "./config";
import { registerRoutes, type RouteDeps } from "./routes";
import { getErrorMessage, isAppError } from "./utils/errors";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

export interface AppOptions {
  requestLog?: boolean;
}

export async function createApp(
  deps: RouteDeps,
  { requestLog = !config.isTest }: AppOptions = {},
): Promise<{ app: express.Express; server: Server; wss: WebSocketServer }> {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // ────────── request-logging middleware ──────────
  if (requestLog) {
    app.use((req, res, next) => {
      const start = Date.now();
      const reqPath = req.path;
      let capturedJson: unknown;

      const originalJson = res.json.bind(res);
      res.json = (body: unknown) => {
        capturedJson = body;
        return originalJson(body);
      };

      res.on("finish", () => {
        if (!reqPath.startsWith("/api")) return;
        let line = `${req.method} ${reqPath} ${res.statusCode} in ${Date.now() - start}ms`;
        if (capturedJson !== undefined) line += ` :: ${JSON.stringify(capturedJson)}`;
        if (line.length > 400) line = line.slice(0, 399) + "…";
        log(line);
      });

      next();
    });
  }

  const { server, wss } = await registerRoutes(app, deps);

  // ─── global error handler ───
  // express.json() parse failures land here as well
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = isAppError(err) ? err.statusCode : statusOf(err);
    const message = getErrorMessage(err) || "Internal Server Error";
    console.error("[express-error]", message, err instanceof Error ? err.stack ?? "" : "");
    res.status(status).json({ error: message });
  });

  return { app, server, wss };
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}
