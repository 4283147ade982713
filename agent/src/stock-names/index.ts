/**
 * Stock Names Module
 */

export { StockNameService, normalizeHkCode } from "./service.js";
export type { StockNameServiceOptions } from "./service.js";
export { JsonFileCacheStore, MemoryCacheStore, CACHE_FILENAME, parseSnapshot, parseNameMap } from "./cache-store.js";
export { JsonUrlListProvider } from "./providers.js";
export { createStockNameRefreshTask } from "./refresh-task.js";
export { MARKETS, MARKET_LABELS, SNAPSHOT_VERSION, emptySnapshot } from "./types.js";
export type {
  Market,
  NameMap,
  MarketCounts,
  NewListings,
  StockNameSnapshot,
  StockNameStatistics,
  StockNameCacheStore,
  StockListProvider,
} from "./types.js";
