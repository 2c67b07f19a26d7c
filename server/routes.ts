// server/routes.ts
import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import fs from "fs/promises";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";

import { researchRequestSchema, type JobStatusResponse } from "@shared/schema";
import type { JobService } from "./services/jobs";
import { NotFoundError, getErrorMessage, isAppError, validationDetails } from "./utils/errors";
import type { FileStorage } from "./utils/fileStorage";
import type { Logger } from "./utils/logger";

export interface RouteDeps {
  jobs: JobService;
  storage: FileStorage;
  logger: Logger;
}

export const SERVICE_NAME = "research-agent-api";

const CONTENT_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
};

function sendError(res: Response, error: unknown) {
  const status = isAppError(error) ? error.statusCode : 500;
  res.status(status).json({ error: getErrorMessage(error) });
}

/* ───────────────────────────── REST API ───────────────────────────── */

export function registerApi(app: Express, { jobs, storage, logger }: RouteDeps) {
  app.get("/", (_req, res) => {
    res.json({
      name: "Research Agent API",
      version: "1.0.0",
      endpoints: {
        submit_research: "POST /api/research",
        check_status: "GET /api/research/{job_id}",
        download_file: "GET /api/outputs/{filename}",
        list_jobs: "GET /api/jobs",
        job_logs: "GET /api/logs/{job_id}",
        realtime: "WS /ws",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: SERVICE_NAME });
  });

  app.post("/api/research", async (req, res) => {
    const parsed = researchRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "Validation failed", details: validationDetails(parsed.error) });
    }
    try {
      res.json(await jobs.submit(parsed.data));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/api/research/:jobId", async (req, res) => {
    try {
      const job = await jobs.get(req.params.jobId);
      if (!job) throw new NotFoundError(`Job ${req.params.jobId} not found`);
      res.json(job);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/api/jobs", async (_req, res) => {
    try {
      const all = await jobs.list();
      res.json({ jobs: Object.fromEntries(all.map((j) => [j.job_id, j])) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // logger writes run_<jobId>.log.txt
  app.get("/api/logs/:jobId", async (req, res) => {
    try {
      const txt = await fs.readFile(logger.logPath(req.params.jobId), "utf8");
      res.type("text/plain; charset=utf-8").send(txt);
    } catch {
      res.status(404).send("No logs for that job yet");
    }
  });

  app.get("/api/outputs/:filename", async (req, res) => {
    const filename = req.params.filename;
    try {
      const stats = await storage.getFileStats(filename);
      if (!stats.exists) throw new NotFoundError(`File ${filename} not found`);

      const fileBuffer = await storage.readFile(filename);
      const ext = filename.split(".").pop()?.toLowerCase() ?? "";
      res.setHeader("Content-Type", CONTENT_TYPES[ext] ?? "application/octet-stream");
      res.setHeader("Content-Disposition", `attachment; filename="${encodeURIComponent(filename)}"`);
      res.setHeader("Content-Length", String(stats.size));
      res.send(fileBuffer);
    } catch (error) {
      sendError(res, error);
    }
  });
}

/* ─────────────────────────── WebSocket setup ─────────────────────────── */

const WsMessageSchema = z.object({
  type: z.enum(["subscribe", "unsubscribe"]),
  jobId: z.string().min(1),
});

interface WebSocketConnection extends WebSocket {
  jobIds?: Set<string>;
  isAlive?: boolean;
}

export const HEARTBEAT_MS = 30_000;

function safeJsonParse(data: RawData): unknown {
  try {
    const str = Array.isArray(data)
      ? Buffer.concat(data).toString("utf8")
      : Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data).toString("utf8");
    return JSON.parse(str);
  } catch {
    return null;
  }
}

function safeSend(ws: WebSocket, payload: unknown) {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(JSON.stringify(payload), (err) => {
    if (err) console.error("WebSocket send failed:", err.message);
  });
}

/** Job status and log events for subscribed clients on /ws. */
export function attachRealtime(httpServer: Server, { jobs, logger }: RouteDeps): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: "/ws" });
  const connections = new Set<WebSocketConnection>();

  const fanOut = (jobId: string, payload: unknown) => {
    connections.forEach((ws) => {
      if (ws.jobIds?.has(jobId)) safeSend(ws, payload);
    });
  };

  wss.on("connection", (ws: WebSocketConnection) => {
    ws.isAlive = true;
    ws.jobIds = new Set();
    connections.add(ws);

    ws.on("message", async (raw) => {
      const msg = WsMessageSchema.safeParse(safeJsonParse(raw));
      if (!msg.success) {
        return safeSend(ws, { type: "error", data: { message: "Invalid message" } });
      }
      const { type, jobId } = msg.data;
      if (type === "unsubscribe") {
        ws.jobIds?.delete(jobId);
        return;
      }

      ws.jobIds?.add(jobId);
      try {
        const job = await jobs.get(jobId);
        if (job) safeSend(ws, { type: "status", data: job });
        else safeSend(ws, { type: "error", data: { message: `Job ${jobId} not found` } });
      } catch (err) {
        safeSend(ws, { type: "error", data: { message: getErrorMessage(err) } });
      }
    });

    ws.on("pong", () => {
      ws.isAlive = true;
    });

    ws.on("close", () => {
      connections.delete(ws);
    });
  });

  const offStatus = jobs.onStatusUpdate((job: JobStatusResponse) => {
    fanOut(job.job_id, { type: "status", data: job });
  });
  const offLog = logger.onLog((entry) => {
    fanOut(entry.taskId, {
      type: "log",
      data: { id: entry.id, type: entry.type, message: entry.message, timestamp: entry.timestamp },
    });
  });

  // Heartbeat: drop clients that missed the previous ping
  const heartbeat = setInterval(() => {
    connections.forEach((c) => {
      if (c.isAlive === false) {
        c.terminate();
        connections.delete(c);
        return;
      }
      c.isAlive = false;
      c.ping();
    });
  }, HEARTBEAT_MS);
  heartbeat.unref();

  wss.on("close", () => {
    clearInterval(heartbeat);
    offStatus();
    offLog();
  });

  return wss;
}

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<{ server: Server; wss: WebSocketServer }> {
  registerApi(app, deps);
  const server = createServer(app);
  const wss = attachRealtime(server, deps);
  return { server, wss };
}
