/**
 * Raised when the engine is used out of order: registering twice,
 * running while already running, or running after it stopped.
 */
export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulerError";
  }
}
