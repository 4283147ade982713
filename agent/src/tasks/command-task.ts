/**
 * Shell command as a scheduled task.
 */

import { spawn } from "child_process";
import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ScheduledCallback } from "../scheduler/types.js";

/**
 * Each run spawns `command` through the shell with the parent's stdio and
 * rejects when it exits non-zero or is killed by a signal.
 */
export function createCommandTask(
  command: string,
  logger: ILogger = createComponentLogger("command"),
): ScheduledCallback {
  return () =>
    new Promise<void>((resolve, reject) => {
      logger.debug("Spawning command", { command });
      const proc = spawn(command, { shell: true, stdio: "inherit" });

      proc.on("error", (err: Error) => {
        reject(new Error(`Failed to start command: ${err.message}`));
      });

      proc.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          logger.debug("Command exited", { command, code });
          resolve();
        } else if (signal) {
          reject(new Error(`Command was killed by ${signal}`));
        } else {
          reject(new Error(`Command exited with code ${code}`));
        }
      });
    });
}
