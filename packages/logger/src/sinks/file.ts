import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

import type { LogEntry, Sink } from '../logger.js';

/**
 * JSON-lines sink. The file (and its directory) is created on the first entry,
 * so a run that logs nothing leaves nothing behind.
 */
export class FileSink implements Sink {
  private fd: number | undefined;

  constructor(private readonly path: string) {}

  write(entry: LogEntry): void {
    if (this.fd === undefined) {
      mkdirSync(dirname(this.path), { recursive: true });
      this.fd = openSync(this.path, 'a');
    }

    const record = {
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    };
    writeSync(this.fd, `${JSON.stringify(record)}\n`);
  }

  close(): void {
    if (this.fd !== undefined) {
      closeSync(this.fd);
      this.fd = undefined;
    }
  }
}
