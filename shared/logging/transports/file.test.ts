import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { FileTransport } from "./file.js";
import type { LogEntry } from "../types.js";

const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "file-transport-"));
  dirs.push(dir);
  return dir;
}

function entry(message: string): LogEntry {
  return { timestamp: "2026-01-05T09:30:00.000Z", level: "info", component: "agent", message };
}

afterEach(async () => {
  for (const dir of dirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe("FileTransport", () => {
  it("appends one JSON line per entry to the dated file", async () => {
    const dir = await tempDir();
    const transport = new FileTransport({ logDir: dir, filename: "agent" });

    transport.log(entry("first"));
    transport.log({ ...entry("second"), data: { task: "task" } });
    const written = transport.activePath;
    await transport.close();

    const date = new Date().toISOString().split("T")[0];
    expect(written).toBe(path.join(dir, `agent-${date}.log`));
    const lines = (await readFile(written, "utf-8")).trim().split("\n");
    expect(lines.map(line => JSON.parse(line))).toEqual([
      entry("first"),
      { ...entry("second"), data: { task: "task" } },
    ]);
  });

  it("flush resolves once pending lines are on disk", async () => {
    const dir = await tempDir();
    const transport = new FileTransport({ logDir: dir, filename: "agent" });

    transport.log(entry("pending"));
    await transport.flush();

    const lines = (await readFile(transport.activePath, "utf-8")).trim().split("\n");
    expect(lines.map(line => JSON.parse(line))).toEqual([entry("pending")]);
    await transport.close();
  });

  it("flush resolves when nothing was written", async () => {
    const transport = new FileTransport({ logDir: await tempDir() });
    await expect(transport.flush()).resolves.toBeUndefined();
  });

  it("creates the log directory", async () => {
    const dir = path.join(await tempDir(), "nested", "logs");
    const transport = new FileTransport({ logDir: dir });

    transport.log(entry("hello"));
    await transport.close();

    expect(path.basename(transport.activePath)).toMatch(/^tickwatch-\d{4}-\d{2}-\d{2}\.log$/);
  });
});
