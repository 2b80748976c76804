import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../errors/taxonomy.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

const DEFAULT_RECENT_LIMIT = 500;

/**
 * Structured event log. Entries stay in a bounded in-memory buffer and, when a
 * file path is configured, are appended to it as NDJSON in emission order.
 */
export class EventLogger {
  private readonly recentEntries: LogEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private failedWrites = 0;

  constructor(
    private readonly logFilePath?: string,
    private readonly recentLimit = DEFAULT_RECENT_LIMIT,
  ) {}

  async init(): Promise<void> {
    if (!this.logFilePath) return;
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  log(level: LogLevel, event: string, data: Record<string, unknown> = {}): void {
    const entry: LogEntry = { ts: isoNow(), level, event, data };

    this.recentEntries.push(entry);
    if (this.recentEntries.length > this.recentLimit) {
      this.recentEntries.splice(0, this.recentEntries.length - this.recentLimit);
    }

    const filePath = this.logFilePath;
    if (!filePath) return;

    const line = `${JSON.stringify(entry)}\n`;
    this.writeChain = this.writeChain
      .then(() => fs.appendFile(filePath, line, 'utf-8'))
      .catch((error: unknown) => {
        this.failedWrites += 1;
        console.error(`[logger] failed to append ${event} to ${filePath}: ${errorMessage(error)}`);
      });
  }

  /** Most recent entries, oldest first. */
  recent(limit = this.recentLimit, level?: LogLevel): LogEntry[] {
    const filtered = level ? this.recentEntries.filter((e) => e.level === level) : this.recentEntries;
    return filtered.slice(-limit).map((e) => structuredClone(e));
  }

  get writeFailures(): number {
    return this.failedWrites;
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }
}
