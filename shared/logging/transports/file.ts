/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>-<YYYY-MM-DD>.log`, opening a new
 * file when the date changes and rotating `.1`..`.N` copies past `maxSize`.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  /** Minimum level to log */
  minLevel?: LogLevel;
  /** Directory to write log files */
  logDir: string;
  /** Base filename (default: "tickwatch") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Max number of rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private currentPath = "";
  private currentSize = 0;
  private stream: fs.WriteStream | null = null;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.logDir = options.logDir;
    this.filename = options.filename || "tickwatch";
    this.maxSize = options.maxSize || 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 5;
    fs.mkdirSync(this.logDir, { recursive: true });
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const stream = this.streamFor(Buffer.byteLength(line));
    stream.write(line);
    this.currentSize += Buffer.byteLength(line);
  }

  /** Path of the file entries are currently appended to. */
  get activePath(): string {
    return this.currentPath;
  }

  private pathForToday(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private streamFor(incomingBytes: number): fs.WriteStream {
    const expected = this.pathForToday();

    if (this.stream && expected !== this.currentPath) {
      this.stream.end();
      this.stream = null;
    }

    if (this.stream && this.currentSize + incomingBytes > this.maxSize) {
      this.stream.end();
      this.stream = null;
      this.rotate(expected);
    }

    if (!this.stream) {
      this.currentPath = expected;
      this.currentSize = fs.existsSync(expected) ? fs.statSync(expected).size : 0;
      this.stream = fs.createWriteStream(expected, { flags: "a" });
      this.stream.on("error", (err: Error) => {
        console.error("[FileTransport] Write error:", err);
      });
    }

    return this.stream;
  }

  private rotate(filePath: string): void {
    const oldest = `${filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${filePath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${filePath}.${i + 1}`);
      }
    }
    if (fs.existsSync(filePath)) {
      fs.renameSync(filePath, `${filePath}.1`);
    }
  }

  /** Resolves once every line written so far has reached the file. */
  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.writableLength === 0) return;
    // Writes complete in order, so an empty write's callback trails the rest.
    await new Promise<void>(resolve => stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}
