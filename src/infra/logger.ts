import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Append-only NDJSON event log. One line per call:
 * `{ ts, level, event, ...data }`.
 */
export class EventLogger {
  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    const line = JSON.stringify({ ts: isoNow(), level, event, ...data });
    await fs.appendFile(this.logFilePath, `${line}\n`);
  }
}
