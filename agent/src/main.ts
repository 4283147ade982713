/**
 * Tickwatch Agent
 *
 * Runs SCHEDULE_COMMAND once, or on the configured schedule alongside the
 * daily stock-name cache refresh. Configuration comes from the environment
 * and an optional `.env` in the working directory.
 */

import { config as loadDotenv } from "dotenv";
import { ConfigError, loadConfig, type AgentConfig } from "./config.js";
import { createComponentLogger, initAgentLogging } from "./logging.js";
import { runWithSchedule } from "./scheduler/run-with-schedule.js";
import type { ScheduledCallback } from "./scheduler/types.js";
import { JsonFileCacheStore } from "./stock-names/cache-store.js";
import { JsonUrlListProvider } from "./stock-names/providers.js";
import { StockNameService } from "./stock-names/service.js";
import { MARKETS, type StockListProvider } from "./stock-names/types.js";
import { createCommandTask } from "./tasks/command-task.js";

loadDotenv();

async function main(): Promise<number> {
  let config: AgentConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Agent] Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = initAgentLogging({
    minLevel: config.logging.level,
    file: config.logging.file,
    logDir: config.logging.dir,
  });
  const log = createComponentLogger("main");

  const task: ScheduledCallback = config.schedule.command
    ? createCommandTask(config.schedule.command)
    : () => log.warn("SCHEDULE_COMMAND is not set, nothing to run");

  try {
    if (!config.schedule.enabled) {
      log.info("Scheduling disabled, running task once");
      try {
        await task();
      } catch (error) {
        log.error("Task failed", error);
        return 1;
      }
      return 0;
    }

    await runWithSchedule(task, {
      schedule: config.schedule.spec,
      runImmediately: config.schedule.runImmediately,
      pollIntervalMs: config.schedule.pollIntervalMs,
      stockNameRefresh: config.stockNames.refreshEnabled
        ? { service: await createStockNameService(config), schedule: config.stockNames.refreshSpec }
        : undefined,
    });
    return 0;
  } finally {
    await logger.close();
  }
}

async function createStockNameService(config: AgentConfig): Promise<StockNameService> {
  const { cacheDir, listUrls, ttlHours, fetchTimeoutMs } = config.stockNames;
  const providers: StockListProvider[] = [];
  for (const market of MARKETS) {
    const url = listUrls[market];
    if (url) providers.push(new JsonUrlListProvider(market, url));
  }

  const service = new StockNameService({
    store: new JsonFileCacheStore(cacheDir),
    providers,
    ttlHours,
    fetchTimeoutMs,
  });
  await service.init();
  return service;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[Agent] Fatal error:", error);
    process.exitCode = 1;
  },
);
