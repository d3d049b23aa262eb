/**
 * Modelsync Transfer - Bandwidth Limiter
 * One-second window accounting; bytes beyond the budget carry into later windows
 */

import { sleep } from '@modelsync/shared';

export interface LimiterClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const systemClock: LimiterClock = {
  now: () => Date.now(),
  sleep,
};

const WINDOW_MS = 1000;

export class BandwidthLimiter {
  readonly bytesPerSecond: number | null;
  private clock: LimiterClock;
  private windowStart: number;
  private windowBytes = 0;

  constructor(bytesPerSecond?: number | null, clock: LimiterClock = systemClock) {
    this.bytesPerSecond = bytesPerSecond && bytesPerSecond > 0 ? bytesPerSecond : null;
    this.clock = clock;
    this.windowStart = clock.now();
  }

  get enabled(): boolean {
    return this.bytesPerSecond !== null;
  }

  /**
   * Account for `bytes`, waiting first if the current window's budget is spent
   */
  async consume(bytes: number, signal?: AbortSignal): Promise<void> {
    const rate = this.bytesPerSecond;
    if (rate === null || bytes <= 0) return;

    while (true) {
      this.roll(rate);
      if (this.windowBytes === 0 || this.windowBytes + bytes <= rate) break;
      await this.clock.sleep(this.windowStart + WINDOW_MS - this.clock.now(), signal);
    }

    this.windowBytes += bytes;
  }

  /**
   * Pass-through stream that throttles as chunks flow
   */
  throttle(stream: ReadableStream<Uint8Array>, signal?: AbortSignal): ReadableStream<Uint8Array> {
    if (!this.enabled) return stream;

    return stream.pipeThrough(
      new TransformStream<Uint8Array, Uint8Array>({
        transform: async (chunk, controller) => {
          await this.consume(chunk.length, signal);
          controller.enqueue(chunk);
        },
      })
    );
  }

  private roll(rate: number): void {
    const elapsed = this.clock.now() - this.windowStart;
    if (elapsed < WINDOW_MS) return;

    const windows = Math.floor(elapsed / WINDOW_MS);
    this.windowStart += windows * WINDOW_MS;
    this.windowBytes = Math.max(0, this.windowBytes - rate * windows);
  }
}
