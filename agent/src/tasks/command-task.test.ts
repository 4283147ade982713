import { describe, it, expect } from "vitest";
import { Logger } from "@tickwatch/shared/logging";
import { createCommandTask } from "./command-task.js";

const node = JSON.stringify(process.execPath);
const logger = new Logger({ minLevel: "trace", component: "test", transports: [] });

describe("createCommandTask", () => {
  it("resolves when the command exits cleanly", async () => {
    await expect(createCommandTask(`${node} -e "process.exit(0)"`, logger)()).resolves.toBeUndefined();
  });

  it("rejects with the exit code on failure", async () => {
    await expect(createCommandTask(`${node} -e "process.exit(3)"`, logger)()).rejects.toThrow(
      "Command exited with code 3",
    );
  });

  it("spawns a fresh process on every run", async () => {
    const runLogger = new Logger({ minLevel: "trace", component: "test", transports: [] });
    const task = createCommandTask(`${node} -e "process.exit(0)"`, runLogger);
    await task();
    await task();
    expect(runLogger.getRecentLogs().filter(e => e.message === "Spawning command")).toHaveLength(2);
  });
});
