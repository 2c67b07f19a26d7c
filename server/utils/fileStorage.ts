// server/utils/fileStorage.ts
import fs from "fs/promises";
import path from "path";
import { nanoid } from "nanoid";
import { config } from "../config";
import { ValidationError } from "./errors";

/** Reduces a caller-supplied name to its base name and ensures the extension (e.g. ".pdf"). */
export function normalizeFilename(filename: string, extension: string): string {
  const base = path.basename(filename.trim());
  return base.toLowerCase().endsWith(extension) ? base : `${base}${extension}`;
}

export class FileStorage {
  readonly dir: string;
  private ready: Promise<void> | null = null;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  // prevent ../../ traversal and enforce writing only under dir
  private safePath(filename: string): string {
    const target = path.resolve(this.dir, filename);
    if (!target.startsWith(this.dir + path.sep)) {
      throw new ValidationError("Invalid filename path", { filename });
    }
    return target;
  }

  /**
   * Writes to a temporary sibling first and renames it into place, so a
   * failed write never leaves a partial file under the final name.
   */
  async saveFile(filename: string, data: Uint8Array): Promise<string> {
    await this.ensureDirectory();
    const filePath = this.safePath(filename);
    const tmpPath = `${filePath}.${nanoid(8)}.tmp`;
    try {
      await fs.writeFile(tmpPath, data);
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    return filePath;
  }

  async getFileStats(filename: string): Promise<{ size: number; exists: boolean }> {
    await this.ensureDirectory();
    const filePath = this.safePath(filename);
    try {
      const stats = await fs.stat(filePath);
      return { size: stats.size, exists: stats.isFile() };
    } catch {
      return { size: 0, exists: false };
    }
  }

  getPublicUrl(filename: string): string {
    return `/api/outputs/${encodeURIComponent(filename)}`;
  }

  getFilePath(filename: string): string {
    return this.safePath(filename);
  }

  async readFile(filename: string): Promise<Buffer> {
    await this.ensureDirectory();
    return await fs.readFile(this.safePath(filename));
  }

  async listFiles(): Promise<string[]> {
    await this.ensureDirectory();
    const names = await fs.readdir(this.dir);
    return names.filter((n) => !n.endsWith(".tmp"));
  }
}

export const fileStorage = new FileStorage(config.outputDir);
