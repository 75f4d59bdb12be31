import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface EventLoggerOptions {
  echo?: boolean;
  minLevel?: LogLevel;
}

export class EventLogger {
  private readonly echo: boolean;
  private readonly minLevel: LogLevel;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string, options: EventLoggerOptions = {}) {
    this.echo = options.echo ?? true;
    this.minLevel = options.minLevel ?? 'info';
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
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const line = JSON.stringify({
      ts: isoNow(),
      level,
      event,
      ...data,
    });

    // Appends are chained so concurrent order callbacks keep file order.
    const write = this.writes.then(() => fs.appendFile(this.logFilePath, `${line}\n`));
    this.writes = write.catch(() => undefined);
    await write;

    if (!this.echo) return;
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  async flush(): Promise<void> {
    await this.writes;
  }
}
