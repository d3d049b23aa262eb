// ── Modelsync Shared: Unit Tests ──

import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseSize, formatBytes } from '../size.js';
import { withRetry, backoffDelay, sleep, scopedSignal } from '../async.js';
import { LogStreamer } from '../logger.js';

// ─────────────────────────────────────────
describe('parseSize', () => {
  it('parses 1024-based units case-insensitively', () => {
    expect(parseSize('512MB')).toBe(512 * 1024 * 1024);
    expect(parseSize('80kb')).toBe(80 * 1024);
    expect(parseSize('2GB')).toBe(2 * 1024 * 1024 * 1024);
    expect(parseSize('100')).toBe(100);
    expect(parseSize('7B')).toBe(7);
  });

  it('accepts a per-second suffix for rates', () => {
    expect(parseSize('10MB/s')).toBe(10 * 1024 * 1024);
  });

  it('accepts fractional values', () => {
    expect(parseSize('1.5KB')).toBe(1536);
  });

  it('rejects unknown units', () => {
    expect(() => parseSize('10TB')).toThrow('Invalid size "10TB"');
    expect(() => parseSize('fast')).toThrow('Invalid size');
  });
});

describe('formatBytes', () => {
  it('renders human-readable sizes', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024 * 1024)).toBe('5.00 GB');
  });
});

// ─────────────────────────────────────────
describe('backoffDelay', () => {
  it('doubles per attempt and respects the cap', () => {
    const opts = { baseDelayMs: 5000, maxDelayMs: 30000 };
    expect([1, 2, 3, 4, 5].map(a => backoffDelay(a, opts))).toEqual([5000, 10000, 20000, 30000, 30000]);
  });

  it('grows linearly when requested', () => {
    expect([1, 2, 3].map(a => backoffDelay(a, { baseDelayMs: 1000, linear: true }))).toEqual([1000, 2000, 3000]);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('reset'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { attempts: 3, baseDelayMs: 1, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 1);
  });

  it('rethrows after the attempt budget is spent', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));
    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops when shouldRetry declines', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    await expect(
      withRetry(fn, { attempts: 5, baseDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort(new Error('cancelled'));
      throw new Error('request aborted');
    });

    await expect(
      withRetry(fn, { attempts: 5, baseDelayMs: 1, signal: controller.signal })
    ).rejects.toThrow('request aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });
});

describe('scopedSignal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts with the timeout reason once the timer fires', () => {
    vi.useFakeTimers();
    const scoped = scopedSignal(undefined, 500, () => new Error('timed out'));

    vi.advanceTimersByTime(499);
    expect(scoped.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(scoped.signal.reason).toEqual(new Error('timed out'));
  });

  it('forwards the parent reason', () => {
    const parent = new AbortController();
    const scoped = scopedSignal(parent.signal, false, () => new Error('timed out'));

    parent.abort(new Error('cancelled'));
    expect(scoped.signal.reason).toEqual(new Error('cancelled'));
  });

  it('stops following the parent once disposed', () => {
    const parent = new AbortController();
    const scoped = scopedSignal(parent.signal, 1000, () => new Error('timed out'));

    scoped.dispose();
    parent.abort(new Error('cancelled'));
    expect(scoped.signal.aborted).toBe(false);
  });
});

// ─────────────────────────────────────────
describe('LogStreamer', () => {
  it('drops entries below the minimum level', () => {
    const logger = new LogStreamer(100, 'info');
    const seen: string[] = [];
    logger.on('log', (entry: { message: string }) => seen.push(entry.message));

    logger.debug('test', 'hidden');
    logger.info('test', 'shown');

    expect(seen).toEqual(['shown']);
    expect(logger.getLevelCounts()).toEqual({ debug: 0, info: 1, warn: 0, error: 0 });
  });

  it('emits entries to listeners through child loggers', () => {
    const logger = new LogStreamer(100, 'debug');
    const seen: string[] = [];
    logger.on('log', (entry: { source: string; message: string }) => seen.push(`${entry.source}:${entry.message}`));

    const child = logger.child('transfer');
    child.warn('slow layer');

    expect(seen).toEqual(['transfer:slow layer']);
    expect(logger.getLevelCounts().warn).toBe(1);
  });

  it('keeps a bounded history', () => {
    const logger = new LogStreamer(2, 'debug');
    logger.info('a', 'one');
    logger.info('a', 'two');
    logger.warn('a', 'three');
    expect(logger.getLevelCounts()).toEqual({ debug: 0, info: 1, warn: 1, error: 0 });
  });
});
