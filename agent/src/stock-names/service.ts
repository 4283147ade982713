/**
 * Stock Name Service
 *
 * Code -> name lookup across A-share, Hong Kong and US listings, backed by a
 * cache store and refreshed from per-market list providers. Callers own the
 * instance; nothing here is process-global.
 *
 * Call init() once before the first lookup.
 */

import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import {
  MARKETS,
  emptySnapshot,
  type Market,
  type MarketCounts,
  type NameMap,
  type NewListings,
  type StockListProvider,
  type StockNameCacheStore,
  type StockNameSnapshot,
  type StockNameStatistics,
} from "./types.js";

const DEFAULT_TTL_HOURS = 24;
const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

export interface StockNameServiceOptions {
  store: StockNameCacheStore;
  providers?: StockListProvider[];
  /** Cache is considered fresh for this long after a refresh (default: 24) */
  ttlHours?: number;
  /** Deadline for one provider call (default: 60s) */
  fetchTimeoutMs?: number;
  logger?: ILogger;
}

export class StockNameService {
  private readonly store: StockNameCacheStore;
  private readonly providers: StockListProvider[];
  private readonly ttlMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly log: ILogger;
  private snapshot: StockNameSnapshot = emptySnapshot();

  constructor(options: StockNameServiceOptions) {
    this.store = options.store;
    this.providers = options.providers ?? [];
    this.ttlMs = (options.ttlHours ?? DEFAULT_TTL_HOURS) * 60 * 60 * 1000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.log = options.logger ?? createComponentLogger("stock-names");
  }

  /**
   * Load the cached snapshot. A missing or unreadable cache leaves the
   * service empty.
   */
  async init(): Promise<void> {
    try {
      const loaded = await this.store.load();
      if (!loaded) {
        this.log.info("No stock name cache yet", { location: this.store.location });
        return;
      }
      this.snapshot = loaded;
      this.log.info("Stock name cache loaded", { ...this.counts(), location: this.store.location });
    } catch (error) {
      this.log.warn("Stock name cache unreadable, starting empty", {
        location: this.store.location,
        error: error instanceof Error ? error.message : String(error),
      });
      this.snapshot = emptySnapshot();
    }
  }

  // ----------------------------------------
  // Lookup
  // ----------------------------------------

  /**
   * Resolve a code. Tries A-share, then Hong Kong (with an "HK" marker
   * removed and padded to five digits), then US.
   */
  getStockName(code: string): string | null {
    const normalized = code.toUpperCase().trim();

    const aShare = lookup(this.snapshot.a, normalized);
    if (aShare !== undefined) return aShare;

    const hk = lookup(this.snapshot.hk, normalizeHkCode(normalized)) ?? lookup(this.snapshot.hk, normalized);
    if (hk !== undefined) return hk;

    return lookup(this.snapshot.us, normalized) ?? null;
  }

  // ----------------------------------------
  // Refresh
  // ----------------------------------------

  isCacheExpired(now: Date = new Date()): boolean {
    if (!this.snapshot.lastUpdate) return true;
    const updatedAt = Date.parse(this.snapshot.lastUpdate);
    if (Number.isNaN(updatedAt)) return true;
    return now.getTime() - updatedAt > this.ttlMs;
  }

  /**
   * Merge fresh listings from every provider into the cache and save it.
   * Skipped while the cache is fresh unless forced. A provider that fails or
   * exceeds its deadline leaves that market as it was.
   */
  async refreshAll(force = false): Promise<MarketCounts> {
    if (!force && !this.isCacheExpired()) {
      this.log.info("Stock name cache is fresh, skipping refresh", { lastUpdate: this.snapshot.lastUpdate });
      return this.counts();
    }

    this.log.info("Refreshing stock lists", { markets: this.providers.map(p => p.market) });

    for (const provider of this.providers) {
      try {
        const list = await provider.fetchList(AbortSignal.timeout(this.fetchTimeoutMs));
        const target = this.snapshot[provider.market];
        for (const [code, name] of Object.entries(list)) {
          if (!code || !name) continue;
          target[provider.market === "hk" ? code.padStart(5, "0") : code] = name;
        }
        this.log.info("Stock list refreshed", { market: provider.market, count: Object.keys(target).length });
      } catch (error) {
        this.log.error("Stock list refresh failed", error, { market: provider.market });
      }
    }

    this.snapshot.lastUpdate = new Date().toISOString();

    try {
      await this.store.save(this.snapshot);
    } catch (error) {
      this.log.error("Failed to save stock name cache", error, { location: this.store.location });
    }

    const counts = this.counts();
    this.log.info("Stock list refresh complete", counts);
    return counts;
  }

  /**
   * Force a refresh and report codes that were not in the cache before it.
   */
  async checkNewStocks(): Promise<NewListings> {
    const before: Record<Market, Set<string>> = {
      a: new Set(Object.keys(this.snapshot.a)),
      hk: new Set(Object.keys(this.snapshot.hk)),
      us: new Set(Object.keys(this.snapshot.us)),
    };

    await this.refreshAll(true);

    const listings: NewListings = { a: [], hk: [], us: [] };
    for (const market of MARKETS) {
      for (const [code, name] of Object.entries(this.snapshot[market])) {
        if (!before[market].has(code)) {
          listings[market].push({ code, name });
        }
      }
    }
    return listings;
  }

  // ----------------------------------------
  // Export / stats
  // ----------------------------------------

  /** All markets merged into one code -> name record. */
  exportToRecord(): NameMap {
    const result: NameMap = { ...this.snapshot.a };
    for (const [code, name] of Object.entries(this.snapshot.hk)) {
      result[code.padStart(5, "0")] = name;
    }
    Object.assign(result, this.snapshot.us);
    return result;
  }

  getStatistics(): StockNameStatistics {
    const counts = this.counts();
    return {
      counts,
      total: counts.a + counts.hk + counts.us,
      lastUpdate: this.snapshot.lastUpdate,
      cacheLocation: this.store.location,
    };
  }

  private counts(): MarketCounts {
    return {
      a: Object.keys(this.snapshot.a).length,
      hk: Object.keys(this.snapshot.hk).length,
      us: Object.keys(this.snapshot.us).length,
    };
  }
}

// ============================================
// HELPERS
// ============================================

/** "HK00700" / "700" / "00700" -> "00700" */
export function normalizeHkCode(code: string): string {
  return code.replace(/HK/g, "").replace(/^0+/, "").padStart(5, "0");
}

function lookup(map: NameMap, key: string): string | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}
