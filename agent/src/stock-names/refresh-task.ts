import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ScheduledCallback } from "../scheduler/types.js";
import type { StockNameService } from "./service.js";
import { MARKETS, MARKET_LABELS } from "./types.js";

const LISTINGS_SHOWN_PER_MARKET = 5;

/**
 * Scheduled callback for the daily cache refresh: reports new listings per
 * market, then the cache totals.
 */
export function createStockNameRefreshTask(
  service: StockNameService,
  logger: ILogger = createComponentLogger("stock-names"),
): ScheduledCallback {
  return async () => {
    logger.info("Refreshing stock name cache");
    const listings = await service.checkNewStocks();

    const total = MARKETS.reduce((sum, market) => sum + listings[market].length, 0);
    if (total === 0) {
      logger.info("No new listings");
    } else {
      logger.info("New listings found", { total });
      for (const market of MARKETS) {
        const stocks = listings[market];
        if (stocks.length === 0) continue;
        logger.info(`New ${MARKET_LABELS[market]} listings`, {
          market,
          count: stocks.length,
          shown: stocks.slice(0, LISTINGS_SHOWN_PER_MARKET).map(s => `${s.code} ${s.name}`),
          more: Math.max(0, stocks.length - LISTINGS_SHOWN_PER_MARKET),
        });
      }
    }

    const stats = service.getStatistics();
    logger.info("Stock name cache statistics", {
      ...stats.counts,
      total: stats.total,
      lastUpdate: stats.lastUpdate,
      location: stats.cacheLocation,
    });
  };
}
