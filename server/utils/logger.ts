// server/utils/logger.ts
import fs from "fs/promises";
import path from "path";
import { config } from "../config";

export type LogType = "trace" | "step_start" | "step_end" | "delivery";

export interface LogEntry {
  id: string;
  taskId: string;
  type: LogType;
  message: string;
  timestamp: Date;
}

export interface LoggerOptions {
  logsDir: string;
  toConsole: boolean;
  toFile: boolean;
}

export class Logger {
  private logCallbacks: ((entry: LogEntry) => void)[] = [];
  private ready: Promise<void> | null = null;

  constructor(private readonly options: LoggerOptions) {}

  private ensureLogsDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.options.logsDir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  onLog(callback: (entry: LogEntry) => void): () => void {
    this.logCallbacks.push(callback);
    return () => {
      this.logCallbacks = this.logCallbacks.filter((cb) => cb !== callback);
    };
  }

  logPath(taskId: string): string {
    return path.join(this.options.logsDir, `run_${safeName(taskId)}.log.txt`);
  }

  async log(taskId: string, type: LogType, message: string): Promise<LogEntry> {
    const entry: LogEntry = {
      id: `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`,
      taskId,
      type,
      message,
      timestamp: new Date(),
    };

    if (this.options.toConsole) {
      const hhmmss = entry.timestamp.toISOString().slice(11, 19);
      console.log(`[${hhmmss}] [${type}] [${taskId}] ${message}`);
    }

    if (this.options.toFile) {
      const line = `[${entry.timestamp.toISOString()}] [${type}] ${message}\n`;
      try {
        await this.ensureLogsDirectory();
        await fs.appendFile(this.logPath(taskId), line);
      } catch (err) {
        console.error("Failed to write log file:", err);
      }
    }

    for (const cb of this.logCallbacks) {
      try {
        cb(entry);
      } catch (err) {
        console.error("Log listener failed:", err);
      }
    }

    return entry;
  }

  trace(taskId: string, message: string): Promise<LogEntry> {
    return this.log(taskId, "trace", message);
  }

  stepStart(taskId: string, stepName: string): Promise<LogEntry> {
    return this.log(taskId, "step_start", `Starting: ${stepName}`);
  }

  stepEnd(taskId: string, stepName: string, duration?: number): Promise<LogEntry> {
    const suffix = duration ? ` (${duration}ms)` : "";
    return this.log(taskId, "step_end", `Completed: ${stepName}${suffix}`);
  }

  delivery(taskId: string, artifact: string): Promise<LogEntry> {
    return this.log(taskId, "delivery", `Artifacts emitted: ${artifact}`);
  }
}

function safeName(s: string): string {
  // filesystem-safe but readable
  return (s || "task").replace(/[^a-zA-Z0-9._-]/g, "_").slice(0, 80);
}

export const logger = new Logger({
  logsDir: config.logsDir,
  toConsole: !config.isTest,
  toFile: !config.isTest,
});
