/**
 * Modelsync CLI - Console Output
 * Log subscription and plain-text formatting shared by the commands
 */

import chalk from 'chalk';
import { formatBytes, rootLogger, type LogEntry, type LogLevel } from '@modelsync/shared';
import type { TransferEvent } from '@modelsync/transfer';

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function formatLogEntry(entry: Pick<LogEntry, 'level' | 'source' | 'message'>): string {
  return `[${entry.level}] ${entry.source}: ${entry.message}`;
}

/**
 * Print library log entries; info and debug only with --verbose
 */
export function attachConsoleLogger(verbose: boolean): () => void {
  rootLogger.setLevel(verbose ? 'debug' : 'info');

  const onLog = (entry: LogEntry) => {
    if (!verbose && (entry.level === 'debug' || entry.level === 'info')) return;
    const line = LEVEL_COLORS[entry.level](formatLogEntry(entry));
    if (entry.level === 'debug' || entry.level === 'info') {
      console.log(line);
    } else {
      console.error(line);
    }
  };

  rootLogger.on('log', onLog);
  return () => {
    rootLogger.off('log', onLog);
  };
}

/**
 * Left-aligned columns separated by two spaces
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length))
  );
  const line = (cells: string[]) =>
    widths
      .map((width, column) => (cells[column] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  return [line(headers), ...rows.map(line)].join('\n');
}

export function formatAge(timestamp: string | Date, now: Date = new Date()): string {
  const time = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  if (isNaN(time.getTime())) return '-';

  const seconds = Math.max(0, Math.floor((now.getTime() - time.getTime()) / 1000));
  if (seconds < 60) return 'just now';
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes} minute${minutes === 1 ? '' : 's'} ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours} hour${hours === 1 ? '' : 's'} ago`;
  const days = Math.floor(hours / 24);
  return `${days} day${days === 1 ? '' : 's'} ago`;
}

export function formatDigest(digest: string): string {
  return digest.replace(/^sha256[:-]/, '').slice(0, 12);
}

/**
 * Spinner text for a transfer event; undefined leaves the spinner as is
 */
export function describeTransferEvent(event: TransferEvent): string | undefined {
  switch (event.type) {
    case 'start':
      return `Copying ${event.source} to ${event.destination} (${event.layers} layers)`;
    case 'layer-start':
      return `Sending ${formatDigest(event.digest)} (${formatBytes(event.size)})`;
    case 'layer-progress': {
      const percent = event.size > 0 ? Math.floor((event.completed / event.size) * 100) : 100;
      return `Sending ${formatDigest(event.digest)} ${percent}% of ${formatBytes(event.size)}`;
    }
    case 'layer-skipped':
      return `Skipped ${formatDigest(event.digest)}, already present`;
    case 'layer-done':
      return `Sent ${formatDigest(event.digest)}`;
    case 'status':
      return event.message;
    case 'manifest-created':
      return `Created ${event.model}`;
  }
}
