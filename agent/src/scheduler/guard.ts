/**
 * Single-flight flag for the scheduled task. Acquisition never waits:
 * a caller that loses the race is told so and moves on.
 */
export class ExecutionGuard {
  private locked = false;
  private holder: string | null = null;

  /** Returns false if the guard is already held. */
  tryAcquire(holder: string): boolean {
    if (this.locked) return false;
    this.locked = true;
    this.holder = holder;
    return true;
  }

  release(): void {
    this.locked = false;
    this.holder = null;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Run id of the execution holding the guard, if any. */
  get currentHolder(): string | null {
    return this.holder;
  }
}
