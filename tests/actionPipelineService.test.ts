import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ApprovalGate } from '../src/domain/approval/approvalGate.js';
import { ExecutionEngine } from '../src/domain/execution/executionEngine.js';
import { CategorizationExecutor } from '../src/domain/execution/executors/categorizationExecutor.js';
import { DomainError, ErrorCode } from '../src/errors/taxonomy.js';
import { eventBus } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { InMemoryTransactionLedger } from '../src/integrations/bookkeeping/transactionLedger.js';
import { ActionPipelineService } from '../src/services/actionPipelineService.js';

const captureError = async (work: () => Promise<unknown>): Promise<DomainError | undefined> => {
  try {
    await work();
  } catch (error) {
    if (error instanceof DomainError) return error;
    throw error;
  }
  return undefined;
};

describe('ActionPipelineService', () => {
  let dir: string;
  let store: StateStore;
  let ledger: InMemoryTransactionLedger;
  let service: ActionPipelineService;

  beforeEach(async () => {
    eventBus.clear();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-service-'));
    store = new StateStore(path.join(dir, 'state.json'));
    await store.init();

    const logger = new EventLogger();
    ledger = new InMemoryTransactionLedger({ tx_9: null });
    const engine = new ExecutionEngine({
      approvalGate: new ApprovalGate({ logger }),
      executors: [new CategorizationExecutor(ledger, logger)],
      dryRunByDefault: true,
      logger,
    });
    service = new ActionPipelineService(store, engine, logger);
  });

  afterEach(async () => {
    await store.flush();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('proposes actions, persists them and counts the approvals', async () => {
    const outcome = await service.propose([
      { id: 'g1', title: 'Tag lunch', description: '', actionType: 'tag_expense' },
      { id: 'r1', title: 'Cancel gym', description: '', actionType: 'cancel_subscription' },
    ]);

    expect(outcome.autoApproved.map((a) => a.id)).toEqual(['g1']);
    expect(outcome.needsApproval.map((a) => a.id)).toEqual(['r1']);

    const snapshot = store.snapshot();
    expect(Object.keys(snapshot.actions)).toEqual(['g1', 'r1']);
    expect(snapshot.actions.g1?.status).toBe('approved');
    expect(snapshot.metrics.actionsProposed).toBe(2);
    expect(snapshot.metrics.actionsApproved).toBe(1);
    expect(snapshot.decisions).toHaveLength(1);
  });

  it('refuses duplicate ids within a batch and across batches', async () => {
    await service.propose([{ id: 'dup', title: 'One', description: '' }]);

    const across = await captureError(() => service.propose([{ id: 'dup', title: 'Two', description: '' }]));
    const within = await captureError(() => service.propose([
      { id: 'x', title: 'A', description: '' },
      { id: 'x', title: 'B', description: '' },
    ]));

    expect(across?.code).toBe(ErrorCode.ActionAlreadyExists);
    expect(across?.statusCode).toBe(409);
    expect(within?.code).toBe(ErrorCode.ActionAlreadyExists);
    expect(service.getAction('x')).toBeUndefined();
  });

  it('approves, executes and rolls back through the engine', async () => {
    await service.propose([{
      id: 'bulk',
      title: 'Recategorize',
      description: '',
      actionType: 'update_category_bulk',
      parameters: { transactionIds: ['tx_9'], category: 'Travel' },
    }]);

    const [executed] = await service.execute(['bulk'], false);
    expect(executed?.status).toBe('completed');
    expect(ledger.categoryOf('tx_9')).toBe('Travel');

    const [rolledBack] = await service.rollback(['bulk']);
    expect(rolledBack?.status).toBe('rolled_back');
    expect(ledger.categoryOf('tx_9')).toBeNull();

    expect(service.executions('bulk').map((r) => r.status)).toEqual(['completed', 'rolled_back']);
    expect(service.listActions('rolled_back').map((a) => a.id)).toEqual(['bulk']);

    const metrics = store.snapshot().metrics;
    expect(metrics.executionsRecorded).toBe(2);
    expect(metrics.rollbacksRecorded).toBe(1);
  });

  it('rejects queued actions and records the decision', async () => {
    await service.propose([{ id: 'pay', title: 'Pay invoice', description: '', actionType: 'pay_invoice' }]);

    const rejected = await service.reject({ actionIds: ['pay'], rejectedBy: 'alice', reason: 'already paid' });

    expect(rejected.map((a) => a.status)).toEqual(['rejected']);
    expect(service.pending()).toEqual([]);
    expect(service.decisions('pay').map((d) => [d.decision, d.decidedBy, d.reason])).toEqual([
      ['rejected', 'alice', 'already paid'],
    ]);
    expect(store.snapshot().metrics.actionsRejected).toBe(1);
  });

  it('appends each decision once when approvals overlap', async () => {
    await service.propose([
      { id: 'r1', title: 'Pay invoice 1', description: '', actionType: 'pay_invoice' },
      { id: 'r2', title: 'Pay invoice 2', description: '', actionType: 'pay_invoice' },
    ]);

    await Promise.all([
      service.approve({ actionIds: ['r1'], approvedBy: 'alice' }),
      service.approve({ actionIds: ['r2'], approvedBy: 'bob' }),
    ]);

    const snapshot = store.snapshot();
    expect(snapshot.decisions.map((d) => d.actionId)).toEqual(['r1', 'r2']);
    expect(snapshot.metrics.actionsApproved).toBe(2);
  });

  it('appends each execution result once when runs overlap', async () => {
    await service.propose([
      { id: 't1', title: 'Tag 1', description: '', actionType: 'tag_expense' },
      { id: 't2', title: 'Tag 2', description: '', actionType: 'tag_expense' },
    ]);

    await Promise.all([service.execute(['t1'], true), service.execute(['t2'], true)]);

    const snapshot = store.snapshot();
    expect(snapshot.executionLog.map((r) => r.actionId).sort()).toEqual(['t1', 't2']);
    expect(snapshot.metrics.executionsRecorded).toBe(2);
  });

  it('runs queued approvals through executeApproved', async () => {
    await service.propose([{ id: 'pay', title: 'Pay invoice', description: '', actionType: 'pay_invoice' }]);
    await service.approve({ actionIds: ['pay'], approvedBy: 'alice' });

    const results = await service.executeApproved(false);

    expect(results.map((r) => [r.actionId, r.summary])).toEqual([['pay', '[LOGGED] Pay invoice']]);
    expect(store.snapshot().actions.pay?.status).toBe('completed');
  });

  it('reports an unknown id on execute as not found', async () => {
    const error = await captureError(() => service.execute(['ghost'], false));

    expect(error?.code).toBe(ErrorCode.ActionNotFound);
    expect(error?.statusCode).toBe(404);
  });

  it('persists notifications before draining them', async () => {
    await service.propose([{
      id: 'remind',
      title: 'Remind AP',
      description: '',
      actionType: 'send_reminder',
      estimatedSavings: 1234.5,
    }]);

    const drained = await service.drainNotifications();

    expect(drained.map((n) => n.message)).toEqual(['Auto-approved action: Remind AP (saves $1,234.50)']);
    expect(service.notifications()).toEqual([]);
    expect(store.snapshot().notifications).toHaveLength(1);
  });
});
