import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';

const isRecord = (value: unknown): value is Record<string, unknown> => (
  typeof value === 'object' && value !== null && !Array.isArray(value)
);

/**
 * Fill in whatever an older or partial state file lacks. Entries are
 * trusted as written: the file is only ever produced by this store.
 */
const normalizeState = (raw: unknown): AppState => {
  const defaults = createDefaultState();
  if (!isRecord(raw)) return defaults;

  const parsed = raw as Partial<AppState>;

  return {
    actions: isRecord(parsed.actions) ? parsed.actions : defaults.actions,
    decisions: Array.isArray(parsed.decisions) ? parsed.decisions : defaults.decisions,
    executionLog: Array.isArray(parsed.executionLog) ? parsed.executionLog : defaults.executionLog,
    notifications: Array.isArray(parsed.notifications) ? parsed.notifications : defaults.notifications,
    metrics: {
      ...defaults.metrics,
      ...(isRecord(parsed.metrics) ? parsed.metrics : {}),
    },
  };
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export class StateStore {
  private state: AppState = createDefaultState();
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly stateFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState();
      await this.persist();
      return;
    }

    this.state = normalizeState(JSON.parse(raw));
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const result = await work(this.state);
      await this.persist();
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(this.state, null, 2));
  }
}
