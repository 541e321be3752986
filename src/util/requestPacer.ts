/**
 * Request Pacer
 *
 * Keeps a fixed pause between consecutive requests to the league site.
 * Requests are issued one at a time; the pacer only decides how long to
 * wait before the next one may start.
 */

import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Calculates how long to wait before the next request may start
 *
 * @param delayMs - Required pause between requests
 * @param lastFinishedAt - Epoch ms when the previous request finished, or null if none yet
 * @param now - Current epoch ms
 * @returns Milliseconds to wait (0 when the pause has already elapsed)
 *
 * @example
 * nextRequestDelayMs(1000, null, 5000)  // 0, first request
 * nextRequestDelayMs(1000, 4600, 5000)  // 600
 * nextRequestDelayMs(1000, 3000, 5000)  // 0
 */
export function nextRequestDelayMs(delayMs: number, lastFinishedAt: number | null, now: number): number {
  if (lastFinishedAt === null) return 0;
  return Math.max(0, lastFinishedAt + delayMs - now);
}

export class RequestPacer {
  private lastFinishedAt: number | null = null;

  constructor(private readonly delayMs: number, private readonly clock: () => number = Date.now) {}

  /**
   * Runs a request once the pause since the previous one has elapsed
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const wait = nextRequestDelayMs(this.delayMs, this.lastFinishedAt, this.clock());
    if (wait > 0) await sleep(wait);
    try {
      return await task();
    } finally {
      this.lastFinishedAt = this.clock();
    }
  }
}
