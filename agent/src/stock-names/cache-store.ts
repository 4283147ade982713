/**
 * Stock name cache stores.
 */

import { promises as fs } from "fs";
import path from "path";
import { SNAPSHOT_VERSION, type NameMap, type StockNameCacheStore, type StockNameSnapshot } from "./types.js";

export const CACHE_FILENAME = "stock_names.json";

/**
 * Keeps the snapshot as pretty-printed JSON in `<dir>/stock_names.json`.
 */
export class JsonFileCacheStore implements StockNameCacheStore {
  readonly location: string;

  constructor(cacheDir: string) {
    this.location = path.join(cacheDir, CACHE_FILENAME);
  }

  async load(): Promise<StockNameSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.location, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
    return parseSnapshot(JSON.parse(raw), this.location);
  }

  async save(snapshot: StockNameSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    await fs.writeFile(this.location, JSON.stringify(snapshot, null, 2), "utf-8");
  }
}

/** Snapshot held in memory only; for tests and one-off runs. */
export class MemoryCacheStore implements StockNameCacheStore {
  readonly location = "memory";
  private snapshot: StockNameSnapshot | null;

  constructor(initial: StockNameSnapshot | null = null) {
    this.snapshot = initial ? cloneSnapshot(initial) : null;
  }

  async load(): Promise<StockNameSnapshot | null> {
    return this.snapshot ? cloneSnapshot(this.snapshot) : null;
  }

  async save(snapshot: StockNameSnapshot): Promise<void> {
    this.snapshot = cloneSnapshot(snapshot);
  }
}

// ============================================
// HELPERS
// ============================================

export function parseSnapshot(value: unknown, source: string): StockNameSnapshot {
  if (!isRecord(value)) {
    throw new Error(`Stock name cache ${source} is not a JSON object`);
  }
  const lastUpdate = value.lastUpdate;
  return {
    a: parseNameMap(value.a, `${source}#a`),
    hk: parseNameMap(value.hk, `${source}#hk`),
    us: parseNameMap(value.us, `${source}#us`),
    lastUpdate: typeof lastUpdate === "string" ? lastUpdate : null,
    version: typeof value.version === "number" ? value.version : SNAPSHOT_VERSION,
  };
}

/** Accepts `{ code: name }` with string values only. Missing maps are empty. */
export function parseNameMap(value: unknown, source: string): NameMap {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`${source}: expected an object of code -> name`);
  }
  const result: NameMap = {};
  for (const [code, name] of Object.entries(value)) {
    if (typeof name !== "string") {
      throw new Error(`${source}: name for ${code} is not a string`);
    }
    result[code] = name;
  }
  return result;
}

function cloneSnapshot(snapshot: StockNameSnapshot): StockNameSnapshot {
  return { ...snapshot, a: { ...snapshot.a }, hk: { ...snapshot.hk }, us: { ...snapshot.us } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
