/**
 * Stock Name Types
 */

export type Market = "a" | "hk" | "us";

export const MARKETS: readonly Market[] = ["a", "hk", "us"];

export const MARKET_LABELS: Record<Market, string> = {
  a: "A-share",
  hk: "Hong Kong",
  us: "US",
};

export type NameMap = Record<string, string>;

/** Persisted form of the name cache. */
export interface StockNameSnapshot {
  a: NameMap;
  hk: NameMap;
  us: NameMap;
  /** ISO timestamp of the last successful refresh */
  lastUpdate: string | null;
  version: number;
}

export type MarketCounts = Record<Market, number>;

export type NewListings = Record<Market, Array<{ code: string; name: string }>>;

export interface StockNameStatistics {
  counts: MarketCounts;
  total: number;
  lastUpdate: string | null;
  cacheLocation: string;
}

/**
 * Where the snapshot lives between runs.
 */
export interface StockNameCacheStore {
  /** Returns null when nothing has been stored yet. */
  load(): Promise<StockNameSnapshot | null>;
  save(snapshot: StockNameSnapshot): Promise<void>;
  /** Human-readable location for statistics and logs */
  readonly location: string;
}

/**
 * Source of the full code -> name listing for one market.
 * Implementations must honor the abort signal.
 */
export interface StockListProvider {
  readonly market: Market;
  fetchList(signal: AbortSignal): Promise<NameMap>;
}

export const SNAPSHOT_VERSION = 1;

export function emptySnapshot(): StockNameSnapshot {
  return { a: {}, hk: {}, us: {}, lastUpdate: null, version: SNAPSHOT_VERSION };
}
