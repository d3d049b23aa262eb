/**
 * Modelsync Shared - Log Streamer
 * Bounded in-memory log history with event fan-out to subscribers
 */

import { EventEmitter } from 'events';
import type { LogEntry, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class LogStreamer extends EventEmitter {
  private entries: LogEntry[] = [];
  private maxEntries: number;
  private minLevel: LogLevel;

  constructor(maxEntries = 10000, minLevel: LogLevel = 'info') {
    super();
    this.maxEntries = maxEntries;
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  log(
    level: LogLevel,
    source: string,
    message: string,
    metadata?: Record<string, unknown>,
    stackTrace?: string
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      source,
      message,
      metadata,
      stackTrace,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emit('log', entry);
  }

  debug(source: string, message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', source, message, metadata);
  }

  info(source: string, message: string, metadata?: Record<string, unknown>): void {
    this.log('info', source, message, metadata);
  }

  warn(source: string, message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', source, message, metadata);
  }

  error(source: string, message: string, metadata?: Record<string, unknown>, error?: Error): void {
    this.log('error', source, message, metadata, error?.stack);
  }

  /**
   * Bind a source name so callers can log without repeating it
   */
  child(source: string): Logger {
    return {
      debug: (message, metadata) => this.debug(source, message, metadata),
      info: (message, metadata) => this.info(source, message, metadata),
      warn: (message, metadata) => this.warn(source, message, metadata),
      error: (message, metadata, error) => this.error(source, message, metadata, error),
    };
  }

  /**
   * Entries per level in the retained history
   */
  getLevelCounts(): Record<LogLevel, number> {
    const counts: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };
    for (const entry of this.entries) {
      counts[entry.level]++;
    }
    return counts;
  }
}

/**
 * Source-bound logging surface handed to library classes
 */
export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>, error?: Error): void;
}

/**
 * Process-wide streamer used when no logger is injected
 */
export const rootLogger = new LogStreamer();

export function createLogger(source: string): Logger {
  return rootLogger.child(source);
}
