import { describe, it, expect, vi } from "vitest";
import { Logger } from "@tickwatch/shared/logging";
import { MemoryCacheStore } from "./cache-store.js";
import { StockNameService, normalizeHkCode } from "./service.js";
import { createStockNameRefreshTask } from "./refresh-task.js";
import { emptySnapshot, type Market, type NameMap, type StockListProvider, type StockNameSnapshot } from "./types.js";

function testLogger(): Logger {
  return new Logger({ minLevel: "trace", component: "test", transports: [] });
}

function snapshot(overrides: Partial<StockNameSnapshot> = {}): StockNameSnapshot {
  return { ...emptySnapshot(), ...overrides };
}

function provider(market: Market, list: NameMap): StockListProvider & { calls: number } {
  return {
    market,
    calls: 0,
    async fetchList() {
      this.calls++;
      return list;
    },
  };
}

function failingProvider(market: Market): StockListProvider {
  return {
    market,
    async fetchList() {
      throw new Error("list unavailable");
    },
  };
}

async function createService(
  initial: StockNameSnapshot | null,
  providers: StockListProvider[] = [],
  logger: Logger = testLogger(),
): Promise<{ service: StockNameService; store: MemoryCacheStore }> {
  const store = new MemoryCacheStore(initial);
  const service = new StockNameService({ store, providers, logger });
  await service.init();
  return { service, store };
}

describe("normalizeHkCode", () => {
  it("strips the HK marker and pads to five digits", () => {
    expect(normalizeHkCode("HK00700")).toBe("00700");
    expect(normalizeHkCode("700")).toBe("00700");
    expect(normalizeHkCode("09988")).toBe("09988");
  });
});

describe("StockNameService.getStockName", () => {
  const cached = snapshot({
    a: { "600519": "Kweichow Moutai" },
    hk: { "00700": "Tencent" },
    us: { AAPL: "Apple" },
  });

  it("looks up A-share codes after trimming", async () => {
    const { service } = await createService(cached);
    expect(service.getStockName(" 600519 ")).toBe("Kweichow Moutai");
  });

  it("normalizes Hong Kong codes", async () => {
    const { service } = await createService(cached);
    expect(service.getStockName("hk700")).toBe("Tencent");
    expect(service.getStockName("00700")).toBe("Tencent");
    expect(service.getStockName("700")).toBe("Tencent");
  });

  it("upper-cases US tickers", async () => {
    const { service } = await createService(cached);
    expect(service.getStockName("aapl")).toBe("Apple");
  });

  it("returns null for unknown codes", async () => {
    const { service } = await createService(cached);
    expect(service.getStockName("ZZZZ")).toBeNull();
  });
});

describe("StockNameService.init", () => {
  it("starts empty when nothing is cached", async () => {
    const logger = testLogger();
    const { service } = await createService(null, [], logger);

    expect(service.getStatistics().total).toBe(0);
    expect(logger.getRecentLogs().map(e => e.message)).toContain("No stock name cache yet");
  });

  it("starts empty when the cache cannot be read", async () => {
    const logger = testLogger();
    const service = new StockNameService({
      store: {
        location: "broken",
        load: () => Promise.reject(new Error("corrupt")),
        save: () => Promise.resolve(),
      },
      logger,
    });

    await service.init();

    expect(service.getStatistics().total).toBe(0);
    const warning = logger.getRecentLogs().find(e => e.level === "warn");
    expect(warning?.message).toBe("Stock name cache unreadable, starting empty");
    expect(warning?.data).toEqual({ location: "broken", error: "corrupt" });
  });
});

describe("StockNameService.refreshAll", () => {
  it("skips the refresh while the cache is fresh", async () => {
    const a = provider("a", { "000001": "Ping An Bank" });
    const { service } = await createService(snapshot({ lastUpdate: new Date().toISOString() }), [a]);

    const counts = await service.refreshAll();

    expect(a.calls).toBe(0);
    expect(counts).toEqual({ a: 0, hk: 0, us: 0 });
  });

  it("refreshes an expired cache", async () => {
    const a = provider("a", { "000001": "Ping An Bank" });
    const stale = new Date(Date.now() - 25 * 60 * 60 * 1000).toISOString();
    const { service } = await createService(snapshot({ lastUpdate: stale }), [a]);

    expect(service.isCacheExpired()).toBe(true);
    await service.refreshAll();

    expect(a.calls).toBe(1);
    expect(service.getStockName("000001")).toBe("Ping An Bank");
  });

  it("merges results, pads HK codes and saves the snapshot", async () => {
    const { service, store } = await createService(
      snapshot({ a: { "600519": "Kweichow Moutai" } }),
      [provider("a", { "000001": "Ping An Bank" }), provider("hk", { "5": "HSBC" })],
    );

    const counts = await service.refreshAll(true);

    expect(counts).toEqual({ a: 2, hk: 1, us: 0 });
    const saved = await store.load();
    expect(saved?.hk).toEqual({ "00005": "HSBC" });
    expect(saved?.a).toEqual({ "600519": "Kweichow Moutai", "000001": "Ping An Bank" });
    expect(saved?.lastUpdate).not.toBeNull();
  });

  it("leaves a market untouched when its provider fails", async () => {
    const logger = testLogger();
    const { service } = await createService(
      snapshot({ us: { MSFT: "Microsoft" } }),
      [failingProvider("us"), provider("a", { "000001": "Ping An Bank" })],
      logger,
    );

    const counts = await service.refreshAll(true);

    expect(counts).toEqual({ a: 1, hk: 0, us: 1 });
    const failure = logger.getRecentLogs().find(e => e.level === "error");
    expect(failure?.message).toBe("Stock list refresh failed");
    expect(failure?.data).toEqual({ market: "us" });
    expect(failure?.error?.message).toBe("list unavailable");
  });

  it("passes an abort signal to each provider", async () => {
    const fetchList = vi.fn(async (_signal: AbortSignal): Promise<NameMap> => ({}));
    const { service } = await createService(null, [{ market: "a", fetchList }]);

    await service.refreshAll(true);

    expect(fetchList).toHaveBeenCalledTimes(1);
    expect(fetchList.mock.calls[0]?.[0]).toBeInstanceOf(AbortSignal);
  });
});

describe("StockNameService.checkNewStocks", () => {
  it("reports codes that were not cached before", async () => {
    const { service } = await createService(
      snapshot({ a: { "600519": "Kweichow Moutai" } }),
      [provider("a", { "600519": "Kweichow Moutai", "688981": "SMIC" }), provider("us", { NVDA: "Nvidia" })],
    );

    const listings = await service.checkNewStocks();

    expect(listings).toEqual({
      a: [{ code: "688981", name: "SMIC" }],
      hk: [],
      us: [{ code: "NVDA", name: "Nvidia" }],
    });
  });
});

describe("StockNameService export and statistics", () => {
  it("merges all markets into one record", async () => {
    const { service } = await createService(
      snapshot({ a: { "600519": "Kweichow Moutai" }, hk: { "00700": "Tencent" }, us: { AAPL: "Apple" } }),
    );

    expect(service.exportToRecord()).toEqual({
      "600519": "Kweichow Moutai",
      "00700": "Tencent",
      AAPL: "Apple",
    });
  });

  it("reports counts and the cache location", async () => {
    const { service } = await createService(
      snapshot({ a: { "600519": "Kweichow Moutai" }, us: { AAPL: "Apple", MSFT: "Microsoft" }, lastUpdate: "2026-01-05T01:00:00.000Z" }),
    );

    expect(service.getStatistics()).toEqual({
      counts: { a: 1, hk: 0, us: 2 },
      total: 3,
      lastUpdate: "2026-01-05T01:00:00.000Z",
      cacheLocation: "memory",
    });
  });
});

describe("createStockNameRefreshTask", () => {
  it("logs up to five new listings per market and the remainder", async () => {
    const list: NameMap = {};
    for (let i = 1; i <= 7; i++) list[`AAA${i}`] = `Company ${i}`;
    const { service } = await createService(null, [provider("us", list)]);
    const logger = testLogger();

    await createStockNameRefreshTask(service, logger)();

    const entries = logger.getRecentLogs();
    const us = entries.find(e => e.message === "New US listings");
    expect(us?.data).toEqual({
      market: "us",
      count: 7,
      shown: ["AAA1 Company 1", "AAA2 Company 2", "AAA3 Company 3", "AAA4 Company 4", "AAA5 Company 5"],
      more: 2,
    });
    expect(entries.at(-1)?.message).toBe("Stock name cache statistics");
    expect(entries.at(-1)?.data).toMatchObject({ a: 0, hk: 0, us: 7, total: 7, location: "memory" });
  });

  it("says so when nothing is new", async () => {
    const { service } = await createService(snapshot({ a: { "600519": "Kweichow Moutai" } }), [
      provider("a", { "600519": "Kweichow Moutai" }),
    ]);
    const logger = testLogger();

    await createStockNameRefreshTask(service, logger)();

    expect(logger.getRecentLogs().map(e => e.message)).toEqual([
      "Refreshing stock name cache",
      "No new listings",
      "Stock name cache statistics",
    ]);
  });
});
