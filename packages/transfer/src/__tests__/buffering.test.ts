// ── Modelsync Transfer: Relay Buffer & Bandwidth Limiter ──

import { getEventListeners } from 'node:events';
import { describe, it, expect } from 'vitest';
import { RelayBuffer, RelayBufferClosedError } from '../relay-buffer.js';
import { BandwidthLimiter, type LimiterClock } from '../bandwidth-limiter.js';

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

// ── Helper: clock that advances only when slept on ──
function manualClock() {
  let now = 0;
  const sleeps: number[] = [];
  const clock: LimiterClock = {
    now: () => now,
    sleep: async ms => {
      sleeps.push(ms);
      now += ms;
    },
  };
  return { clock, sleeps, advance: (ms: number) => { now += ms; } };
}

// ─────────────────────────────────────────
describe('RelayBuffer', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new RelayBuffer(0)).toThrow(RangeError);
  });

  it('suspends the writer until a reader makes room', async () => {
    const relay = new RelayBuffer(4);
    await relay.write(bytes(1, 2, 3, 4));

    let written = false;
    const pending = relay.write(bytes(5, 6)).then(() => {
      written = true;
    });
    await Promise.resolve();
    expect(written).toBe(false);

    expect(Array.from((await relay.read(2)) ?? [])).toEqual([1, 2]);
    await pending;
    expect(written).toBe(true);
    expect(relay.getStats()).toEqual({ buffered: 4, bytesWritten: 6, bytesRead: 2, peak: 4 });
  });

  it('splits writes larger than the capacity', async () => {
    const relay = new RelayBuffer(2);
    const writing = relay.write(bytes(1, 2, 3, 4, 5)).then(() => relay.close());

    const received: number[] = [];
    let chunk = await relay.read(10);
    while (chunk !== null) {
      received.push(...chunk);
      chunk = await relay.read(10);
    }
    await writing;

    expect(received).toEqual([1, 2, 3, 4, 5]);
    expect(relay.getStats().peak).toBe(2);
  });

  it('drains queued bytes after close, then reports end of stream', async () => {
    const relay = new RelayBuffer(8);
    await relay.write(bytes(7, 8));
    relay.close();

    expect(Array.from((await relay.read(8)) ?? [])).toEqual([7, 8]);
    expect(await relay.read(8)).toBeNull();
    await expect(relay.write(bytes(9))).rejects.toBeInstanceOf(RelayBufferClosedError);
  });

  it('fails a pending read when the producer fails', async () => {
    const relay = new RelayBuffer(8);
    const reading = relay.read(8);
    relay.closeWithError(new Error('download failed'));

    await expect(reading).rejects.toThrow('download failed');
  });

  it('fails both sides when the signal aborts', async () => {
    const controller = new AbortController();
    const relay = new RelayBuffer(1, { signal: controller.signal });
    await relay.write(bytes(1));
    const blocked = relay.write(bytes(2));

    controller.abort(new Error('cancelled'));

    await expect(blocked).rejects.toThrow('cancelled');
    await expect(relay.read(1)).rejects.toThrow('cancelled');
  });

  it('stops listening to the signal once closed', () => {
    const controller = new AbortController();
    const relays = Array.from({ length: 12 }, () => new RelayBuffer(4, { signal: controller.signal }));
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(12);

    relays.slice(0, 6).forEach(relay => relay.close());
    relays.slice(6).forEach(relay => relay.closeWithError(new Error('upload failed')));

    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('exposes the consumer side as a web stream', async () => {
    const relay = new RelayBuffer(3);
    const producing = (async () => {
      await relay.write(bytes(1, 2, 3));
      await relay.write(bytes(4, 5));
      relay.close();
    })();

    const body = new Uint8Array(await new Response(relay.toReadableStream(2)).arrayBuffer());
    await producing;

    expect(Array.from(body)).toEqual([1, 2, 3, 4, 5]);
  });

  it('abandons the producer when the stream is cancelled', async () => {
    const relay = new RelayBuffer(1);
    await relay.write(bytes(1));
    const blocked = relay.write(bytes(2));

    await relay.toReadableStream(1).cancel(new Error('upload rejected'));

    await expect(blocked).rejects.toThrow('upload rejected');
  });
});

// ─────────────────────────────────────────
describe('BandwidthLimiter', () => {
  it('is a no-op without a rate', async () => {
    const { clock, sleeps } = manualClock();
    const limiter = new BandwidthLimiter(null, clock);

    await limiter.consume(10_000_000);
    expect(limiter.enabled).toBe(false);
    expect(sleeps).toEqual([]);
  });

  it('waits for the next window once the budget is spent', async () => {
    const { clock, sleeps, advance } = manualClock();
    const limiter = new BandwidthLimiter(100, clock);

    await limiter.consume(60);
    advance(250);
    await limiter.consume(40);
    await limiter.consume(50);

    expect(sleeps).toEqual([750]);
  });

  it('carries overspend into later windows', async () => {
    const { clock, sleeps } = manualClock();
    const limiter = new BandwidthLimiter(100, clock);

    await limiter.consume(250);
    await limiter.consume(10);

    expect(sleeps).toEqual([1000, 1000]);
  });

  it('throttles a stream chunk by chunk', async () => {
    const { clock, sleeps } = manualClock();
    const limiter = new BandwidthLimiter(4, clock);
    const source = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes(1, 2, 3));
        controller.enqueue(bytes(4, 5, 6));
        controller.close();
      },
    });

    const body = new Uint8Array(await new Response(limiter.throttle(source)).arrayBuffer());

    expect(Array.from(body)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(sleeps).toEqual([1000]);
  });
});
