/**
 * Hosts the approval gate and execution engine for the API.
 *
 * Keeps the registry of every action it has seen and, after each call that
 * changes something, persists the actions and appends the new ledger and
 * execution-log entries to the state store.
 */

import {
  ActionModifications,
  ActionStatus,
  ApprovalDecision,
  ApprovalNotification,
  ExecutionResult,
  ProposedAction,
} from '../domain/actions/actionTypes.js';
import { ProposedActionInput, createProposedAction } from '../domain/actions/actionLifecycle.js';
import { GateOutcome } from '../domain/approval/approvalGate.js';
import { EngineSummary, ExecutionEngine } from '../domain/execution/executionEngine.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';

export interface ApproveInput {
  actionIds: string[];
  approvedBy: string;
  reason?: string;
  modifications?: Record<string, ActionModifications>;
}

export interface RejectInput {
  actionIds: string[];
  rejectedBy: string;
  reason?: string;
}

export class ActionPipelineService {
  private readonly actions: Map<string, ProposedAction> = new Map();
  private persistedDecisions = 0;
  private persistedResults = 0;
  private readonly persistedNotifications: Set<string> = new Set();

  constructor(
    private readonly store: StateStore,
    private readonly engine: ExecutionEngine,
    private readonly logger: EventLogger,
  ) {}

  async propose(inputs: ProposedActionInput[]): Promise<GateOutcome> {
    const created = inputs.map((input) => createProposedAction(input));

    const seen = new Set<string>();
    for (const action of created) {
      if (this.actions.has(action.id) || seen.has(action.id)) {
        throw new DomainError(ErrorCode.ActionAlreadyExists, 409, `Action ${action.id} already exists.`, {
          actionId: action.id,
        });
      }
      seen.add(action.id);
    }

    for (const action of created) {
      this.actions.set(action.id, action);
      eventBus.emit('action.proposed', { actionId: action.id, actionType: action.actionType, level: action.approvalLevel });
    }

    const outcome = this.engine.propose(created);
    this.logger.log('info', 'pipeline.proposed', {
      submitted: created.length,
      autoApproved: outcome.autoApproved.length,
      needsApproval: outcome.needsApproval.length,
    });

    await this.persist(created.length);
    return outcome;
  }

  async approve(input: ApproveInput): Promise<ProposedAction[]> {
    const approved = this.engine.approve(input.actionIds, input.approvedBy, input.reason ?? '', input.modifications);
    await this.persist();
    return approved;
  }

  async reject(input: RejectInput): Promise<ProposedAction[]> {
    const rejected = this.engine.reject(input.actionIds, input.rejectedBy, input.reason ?? '');
    await this.persist();
    return rejected;
  }

  async execute(actionIds: string[], dryRun?: boolean): Promise<ExecutionResult[]> {
    const actions = actionIds.map((id) => this.mustGetAction(id));
    const results = await this.engine.execute(actions, dryRun);
    await this.persist();
    return results;
  }

  async executeApproved(dryRun?: boolean): Promise<ExecutionResult[]> {
    const results = await this.engine.executeApproved(dryRun);
    await this.persist();
    return results;
  }

  async rollback(actionIds: string[]): Promise<ExecutionResult[]> {
    const results = await this.engine.rollback(actionIds);
    await this.persist();
    return results;
  }

  listActions(status?: ActionStatus): ProposedAction[] {
    const all = [...this.actions.values()];
    return status ? all.filter((a) => a.status === status) : all;
  }

  getAction(actionId: string): ProposedAction | undefined {
    return this.actions.get(actionId);
  }

  pending(): ProposedAction[] {
    return this.engine.approvalGate.pendingActions;
  }

  overdue(now?: Date): ProposedAction[] {
    return this.engine.approvalGate.overdueActions(now);
  }

  decisions(actionId?: string): ApprovalDecision[] {
    const all = this.engine.approvalGate.decisions;
    return actionId ? all.filter((d) => d.actionId === actionId) : all;
  }

  notifications(): ApprovalNotification[] {
    return this.engine.approvalGate.notifications;
  }

  /** Persist first: drained notifications must already be on disk. */
  async drainNotifications(): Promise<ApprovalNotification[]> {
    await this.persist();
    return this.engine.approvalGate.drainNotifications();
  }

  executions(actionId?: string): ExecutionResult[] {
    const all = this.engine.executionLog;
    return actionId ? all.filter((r) => r.actionId === actionId) : all;
  }

  summary(): EngineSummary {
    return this.engine.summary();
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private mustGetAction(actionId: string): ProposedAction {
    const action = this.actions.get(actionId);
    if (!action) {
      throw new DomainError(ErrorCode.ActionNotFound, 404, `Action ${actionId} not found.`, { actionId });
    }
    return action;
  }

  /**
   * Slices are taken inside the store lock so overlapping calls never append
   * the same ledger entries twice.
   */
  private async persist(proposedCount = 0): Promise<void> {
    const gate = this.engine.approvalGate;

    await this.store.transaction((state) => {
      const newDecisions = gate.decisions.slice(this.persistedDecisions);
      const newResults = this.engine.executionLog.slice(this.persistedResults);
      const newNotifications = gate.notifications.filter((n) => !this.persistedNotifications.has(n.actionId));

      for (const action of this.actions.values()) {
        state.actions[action.id] = structuredClone(action);
      }
      state.decisions.push(...newDecisions);
      state.executionLog.push(...newResults);
      state.notifications.push(...newNotifications);

      state.metrics.actionsProposed += proposedCount;
      state.metrics.actionsApproved += newDecisions.filter((d) => d.decision === 'approved').length;
      state.metrics.actionsRejected += newDecisions.filter((d) => d.decision === 'rejected').length;
      state.metrics.executionsRecorded += newResults.length;
      state.metrics.rollbacksRecorded += newResults.filter((r) => r.status === 'rolled_back').length;

      this.persistedDecisions += newDecisions.length;
      this.persistedResults += newResults.length;
      for (const notification of newNotifications) {
        this.persistedNotifications.add(notification.actionId);
      }
      return undefined;
    });
  }
}
