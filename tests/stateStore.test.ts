import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createProposedAction } from '../src/domain/actions/actionLifecycle.js';
import { StateStore } from '../src/infra/storage/stateStore.js';

describe('StateStore', () => {
  let dir: string;
  let stateFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-state-'));
    stateFile = path.join(dir, 'state.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates a default state file on first init', async () => {
    const store = new StateStore(stateFile);
    await store.init();

    const onDisk = JSON.parse(await fs.readFile(stateFile, 'utf-8'));
    expect(onDisk.actions).toEqual({});
    expect(onDisk.decisions).toEqual([]);
    expect(onDisk.metrics.actionsProposed).toBe(0);
  });

  it('persists transactions and reloads them', async () => {
    const store = new StateStore(stateFile);
    await store.init();

    const action = createProposedAction({ id: 'act_1', title: 'Tag lunch', description: '', actionType: 'tag_expense' });
    await store.transaction((state) => {
      state.actions[action.id] = action;
      state.metrics.actionsProposed += 1;
    });

    const reloaded = new StateStore(stateFile);
    await reloaded.init();
    const snapshot = reloaded.snapshot();

    expect(snapshot.actions.act_1?.title).toBe('Tag lunch');
    expect(snapshot.metrics.actionsProposed).toBe(1);
  });

  it('serializes concurrent transactions', async () => {
    const store = new StateStore(stateFile);
    await store.init();

    await Promise.all([1, 2, 3].map((n) => store.transaction(async (state) => {
      const current = state.metrics.executionsRecorded;
      await new Promise((resolve) => setTimeout(resolve, 5 * (4 - n)));
      state.metrics.executionsRecorded = current + 1;
    })));

    expect(store.snapshot().metrics.executionsRecorded).toBe(3);
  });

  it('fills in sections a partial file lacks', async () => {
    await fs.writeFile(stateFile, JSON.stringify({ decisions: [], metrics: { actionsRejected: 4 } }));

    const store = new StateStore(stateFile);
    await store.init();
    const snapshot = store.snapshot();

    expect(snapshot.actions).toEqual({});
    expect(snapshot.executionLog).toEqual([]);
    expect(snapshot.metrics.actionsRejected).toBe(4);
    expect(snapshot.metrics.actionsApproved).toBe(0);
  });

  it('hands out snapshots detached from the live state', async () => {
    const store = new StateStore(stateFile);
    await store.init();

    store.snapshot().metrics.actionsProposed = 99;

    expect(store.snapshot().metrics.actionsProposed).toBe(0);
  });
});
