/**
 * Blocking request throttle.
 * The first call returns immediately; every later call waits the full
 * interval before resolving. The caller is suspended for the wait, so with a
 * single caller no two requests are ever in flight together.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class Throttle {
  private started = false;

  constructor(
    private readonly intervalMs: number,
    private readonly sleepFn: Sleep = sleep
  ) {}

  /** Resolves when the next request may be issued. Returns the delay applied. */
  async wait(): Promise<number> {
    if (!this.started) {
      this.started = true;
      return 0;
    }
    await this.sleepFn(this.intervalMs);
    return this.intervalMs;
  }
}
