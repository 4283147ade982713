/**
 * Graceful Shutdown
 *
 * Turns SIGINT/SIGTERM into a flag that schedule loops read between ticks,
 * so a task in progress is allowed to finish before the process exits.
 */

import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ShutdownSignal } from "./types.js";

export interface GracefulShutdownOptions {
  /** Signals to listen for (default: SIGINT, SIGTERM) */
  signals?: NodeJS.Signals[];
  logger?: ILogger;
}

export class GracefulShutdown implements ShutdownSignal {
  private requested = false;
  private reason: string | null = null;
  private installed = false;
  private readonly signals: NodeJS.Signals[];
  private readonly log: ILogger;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.request(signal);
  };

  constructor(options: GracefulShutdownOptions = {}) {
    this.signals = options.signals ?? ["SIGINT", "SIGTERM"];
    this.log = options.logger ?? createComponentLogger("shutdown");
  }

  /** Subscribe to the process signals. Safe to call more than once. */
  install(): this {
    if (this.installed) return this;
    for (const signal of this.signals) {
      process.on(signal, this.onSignal);
    }
    this.installed = true;
    return this;
  }

  dispose(): void {
    if (!this.installed) return;
    for (const signal of this.signals) {
      process.off(signal, this.onSignal);
    }
    this.installed = false;
  }

  /** Raise the flag. Only the first request is recorded. */
  request(reason: string): void {
    if (this.requested) return;
    this.requested = true;
    this.reason = reason;
    this.log.info("Shutdown requested, waiting for the current task to finish", { reason });
  }

  get shouldShutdown(): boolean {
    return this.requested;
  }

  get shutdownReason(): string | null {
    return this.reason;
  }
}
