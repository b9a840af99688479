/**
 * File Transport
 *
 * Appends JSON lines to a dated log file and rotates by size.
 * Writes are synchronous: a single-session CLI logs little and must not
 * lose the tail of a turn when the process exits.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "reelbot") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 5MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private currentPath: string;
  private currentSize = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "debug";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "reelbot";
    this.maxSize = options.maxSize ?? 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.currentPath = this.getLogPath();
    this.currentSize = this.sizeOf(this.currentPath);
  }

  get path(): string {
    return this.currentPath;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";

    // New day, new file
    const expectedPath = this.getLogPath();
    if (expectedPath !== this.currentPath) {
      this.currentPath = expectedPath;
      this.currentSize = this.sizeOf(expectedPath);
    }

    if (this.currentSize + line.length > this.maxSize) {
      this.rotate();
    }

    fs.appendFileSync(this.currentPath, line, "utf-8");
    this.currentSize += Buffer.byteLength(line);
  }

  private getLogPath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private sizeOf(filePath: string): number {
    try {
      return fs.statSync(filePath).size;
    } catch {
      return 0;
    }
  }

  private rotate(): void {
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }
    this.currentSize = 0;
  }
}
