// ── Modelsync CLI: Output Formatting ──

import { describe, it, expect, vi } from 'vitest';
import type { ModelSummary } from '@modelsync/ai-gateway';
import { describeTransferEvent, formatAge, formatDigest, formatLogEntry, formatTable } from '../output.js';
import { isListOrder, matchesModelPattern, renderModelTable, sortModels } from '../models.js';
import { InterruptHandler, FORCED_EXIT_CODE } from '../interrupt.js';

// ── Helpers ──
const DIGEST = 'sha256:0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';

function model(name: string, size: number, modifiedAt: string): ModelSummary {
  return { name, size, digest: DIGEST, modifiedAt, details: {} };
}

// ─────────────────────────────────────────
describe('formatting', () => {
  it('aligns table columns', () => {
    expect(formatTable(['NAME', 'SIZE'], [['llama3.2:latest', '2.0 GB'], ['phi', '1 B']])).toBe(
      ['NAME             SIZE', 'llama3.2:latest  2.0 GB', 'phi              1 B'].join('\n')
    );
  });

  it('renders relative ages', () => {
    const now = new Date('2026-05-10T12:00:00.000Z');
    expect(formatAge('2026-05-10T11:59:30.000Z', now)).toBe('just now');
    expect(formatAge('2026-05-10T11:00:00.000Z', now)).toBe('1 hour ago');
    expect(formatAge('2026-05-07T12:00:00.000Z', now)).toBe('3 days ago');
    expect(formatAge('not a date', now)).toBe('-');
  });

  it('shortens digests and formats log entries', () => {
    expect(formatDigest(DIGEST)).toBe('0123456789ab');
    expect(formatLogEntry({ level: 'warn', source: 'transfer', message: 'slow link' })).toBe('[warn] transfer: slow link');
  });

  it('describes transfer progress', () => {
    expect(describeTransferEvent({ type: 'layer-progress', digest: DIGEST, completed: 512, size: 2048 })).toBe(
      'Sending 0123456789ab 25% of 2.00 KB'
    );
    expect(describeTransferEvent({ type: 'layer-skipped', digest: DIGEST, size: 1 })).toBe(
      'Skipped 0123456789ab, already present'
    );
    expect(describeTransferEvent({ type: 'manifest-created', model: 'llama3.2:latest' })).toBe('Created llama3.2:latest');
  });
});

// ─────────────────────────────────────────
describe('model listing', () => {
  const models = [
    model('llama3.2:latest', 2_000, '2026-05-01T00:00:00.000Z'),
    model('llama3.2:3b-q8_0', 3_000, '2026-05-03T00:00:00.000Z'),
    model('qwen2.5:7b', 1_000, '2026-05-02T00:00:00.000Z'),
  ];

  it('matches plain names, full names and wildcards', () => {
    expect(models.filter(m => matchesModelPattern(m.name, 'llama3.2')).map(m => m.name)).toEqual([
      'llama3.2:latest',
      'llama3.2:3b-q8_0',
    ]);
    expect(matchesModelPattern('llama3.2:latest', 'LLAMA3.2:latest')).toBe(true);
    expect(models.filter(m => matchesModelPattern(m.name, '*:7b')).map(m => m.name)).toEqual(['qwen2.5:7b']);
  });

  it('sorts by name, size and time', () => {
    expect(sortModels(models, 'name').map(m => m.name)).toEqual(['llama3.2:3b-q8_0', 'llama3.2:latest', 'qwen2.5:7b']);
    expect(sortModels(models, 'size').map(m => m.size)).toEqual([3_000, 2_000, 1_000]);
    expect(sortModels(models, 'time-asc').map(m => m.name)).toEqual(['llama3.2:latest', 'qwen2.5:7b', 'llama3.2:3b-q8_0']);
    expect(isListOrder('size-asc')).toBe(true);
    expect(isListOrder('random')).toBe(false);
  });

  it('renders the listing table', () => {
    const table = renderModelTable([model('phi:latest', 2048, '2026-05-01T00:00:00.000Z')], new Date('2026-05-01T02:00:00.000Z'));
    expect(table).toBe(['NAME        ID            SIZE     MODIFIED', 'phi:latest  0123456789ab  2.00 KB  2 hours ago'].join('\n'));
  });
});

// ─────────────────────────────────────────
describe('InterruptHandler', () => {
  it('cancels on the first interrupt without a confirmation prompt', async () => {
    const onCancel = vi.fn();
    const exit = vi.fn();
    const handler = new InterruptHandler({ onCancel, exit });

    await handler.handle();
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(handler.isCancelled).toBe(true);

    await handler.handle();
    expect(exit).toHaveBeenCalledWith(FORCED_EXIT_CODE);
  });

  it('asks first and keeps running when the user declines', async () => {
    const onCancel = vi.fn();
    const handler = new InterruptHandler({ confirm: async () => false, onCancel, exit: vi.fn() });

    await handler.handle();

    expect(onCancel).not.toHaveBeenCalled();
    expect(handler.isCancelled).toBe(false);
  });

  it('forces exit on a second interrupt while asking', async () => {
    let answer: (value: boolean) => void = () => {};
    const exit = vi.fn();
    const onCancel = vi.fn();
    const handler = new InterruptHandler({
      confirm: () => new Promise<boolean>(resolve => (answer = resolve)),
      onCancel,
      exit,
    });

    const first = handler.handle();
    await handler.handle();
    expect(exit).toHaveBeenCalledWith(FORCED_EXIT_CODE);

    answer(true);
    await first;
    expect(onCancel).toHaveBeenCalledTimes(1);
  });
});
