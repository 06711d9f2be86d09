import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface EventLoggerOptions {
  minLevel?: LogLevel;
  mirrorToConsole?: boolean;
}

/**
 * Append-only NDJSON event log. One line per event: `{ ts, level, event, ...data }`.
 */
export class EventLogger {
  private readonly minLevel: LogLevel;
  private readonly mirrorToConsole: boolean;

  constructor(private readonly logFilePath: string, options: EventLoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.mirrorToConsole = options.mirrorToConsole ?? true;
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
    try {
      await fs.access(this.logFilePath);
    } catch {
      await fs.writeFile(this.logFilePath, '');
    }
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = JSON.stringify({
      ts: isoNow(),
      level,
      event,
      ...data,
    });

    await fs.appendFile(this.logFilePath, `${line}\n`);

    if (!this.mirrorToConsole) return;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
