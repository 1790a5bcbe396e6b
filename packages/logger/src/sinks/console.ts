import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Anything with a string `write`, e.g. process.stderr
 */
export interface TextStream {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions {
  color?: boolean;
  stream?: TextStream;
}

const ANSI_RESET = '\x1b[0m';

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * `[HH:MM:SS] LEVEL [category] message {key=json, ...}`, in local time
 */
export function formatConsoleLine(entry: LogEntry, color = false): string {
  const time = entry.timestamp.toTimeString().slice(0, 8);
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_COLORS[entry.level]}${label}${ANSI_RESET}` : label;
  const context = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';

  return `[${time}] ${level} [${entry.category}] ${entry.msg}${context}\n`;
}

/**
 * Human-readable sink. Writes to stderr by default: stdout carries the ledger.
 */
export class ConsoleSink implements Sink {
  private readonly stream: TextStream;
  private readonly color: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.color = options.color ?? false;
  }

  write(entry: LogEntry): void {
    this.stream.write(formatConsoleLine(entry, this.color));
  }
}
