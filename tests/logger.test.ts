import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventLogger } from '../src/infra/logger.js';

describe('EventLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-log-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends entries as NDJSON in emission order', async () => {
    const logFile = path.join(dir, 'nested', 'events.ndjson');
    const logger = new EventLogger(logFile);
    await logger.init();

    logger.log('info', 'approval.queued', { actionId: 'act_1' });
    logger.log('warn', 'execution.invalid', { actionId: 'act_2', reason: 'bad' });
    await logger.flush();

    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n');
    const parsed = lines.map((line) => JSON.parse(line));

    expect(parsed.map((e) => [e.level, e.event, e.data])).toEqual([
      ['info', 'approval.queued', { actionId: 'act_1' }],
      ['warn', 'execution.invalid', { actionId: 'act_2', reason: 'bad' }],
    ]);
  });

  it('keeps a bounded buffer of recent entries', () => {
    const logger = new EventLogger(undefined, 2);

    logger.log('info', 'a');
    logger.log('warn', 'b');
    logger.log('info', 'c');

    expect(logger.recent().map((e) => e.event)).toEqual(['b', 'c']);
    expect(logger.recent(1).map((e) => e.event)).toEqual(['c']);
    expect(logger.recent(10, 'warn').map((e) => e.event)).toEqual(['b']);
  });

  it('counts failed writes without throwing from log', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new EventLogger(path.join(dir, 'missing-dir', 'events.ndjson'));

    logger.log('info', 'lost');
    await logger.flush();

    expect(logger.writeFailures).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(logger.recent().map((e) => e.event)).toEqual(['lost']);
  });
});
