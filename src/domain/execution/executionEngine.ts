/**
 * Execution engine: runs approved actions through their executors.
 *
 *   1. Filters a batch down to approved actions and caps it per run.
 *   2. Routes each action to the first executor that claims it.
 *   3. Validates before executing; a rejected action never reaches execute.
 *   4. Converts executor errors into failed results so the batch continues.
 *   5. Appends every result to an immutable execution log.
 *   6. Rolls back completed actions whose result offered it.
 */

import {
  ActionModifications,
  ExecutionResult,
  ProposedAction,
} from '../actions/actionTypes.js';
import { createExecutionResult, isActionable, transitionAction } from '../actions/actionLifecycle.js';
import { ApprovalGate, GateOutcome } from '../approval/approvalGate.js';
import { ExecutionFailure, errorMessage } from '../../errors/taxonomy.js';
import { eventBus } from '../../infra/eventBus.js';
import { EventLogger } from '../../infra/logger.js';
import { isoNow } from '../../utils/time.js';
import { ExecutorRegistry } from './executorRegistry.js';
import { ActionExecutor, ValidationOutcome } from './executors/baseExecutor.js';
import { LogOnlyExecutor } from './executors/logOnlyExecutor.js';

const DEFAULT_MAX_ACTIONS_PER_RUN = 50;

export interface ExecutionEngineOptions {
  approvalGate?: ApprovalGate;
  executors?: ActionExecutor[];
  maxActionsPerRun?: number;
  dryRunByDefault?: boolean;
  logger?: EventLogger;
}

export interface EngineSummary {
  registeredExecutors: string[];
  pendingActions: number;
  totalExecuted: number;
  succeeded: number;
  failed: number;
  dryRunByDefault: boolean;
  maxActionsPerRun: number;
}

export class ExecutionEngine {
  private readonly gate: ApprovalGate;
  private readonly registry: ExecutorRegistry;
  private readonly maxActionsPerRun: number;
  private readonly dryRunByDefault: boolean;
  private readonly logger: EventLogger;

  private readonly log: ExecutionResult[] = [];
  /** actionId → most recent result that a rollback would start from */
  private readonly latestResults: Map<string, ExecutionResult> = new Map();
  /** actionId → action and the executor that ran it for real */
  private readonly executed: Map<string, { action: ProposedAction; executor: ActionExecutor }> = new Map();

  constructor(options: ExecutionEngineOptions = {}) {
    this.logger = options.logger ?? new EventLogger();
    this.gate = options.approvalGate ?? new ApprovalGate({ logger: this.logger });
    this.registry = new ExecutorRegistry(options.executors ?? [], new LogOnlyExecutor(this.logger));
    this.maxActionsPerRun = options.maxActionsPerRun ?? DEFAULT_MAX_ACTIONS_PER_RUN;
    this.dryRunByDefault = options.dryRunByDefault ?? true;
  }

  get approvalGate(): ApprovalGate {
    return this.gate;
  }

  get executionLog(): ExecutionResult[] {
    return [...this.log];
  }

  get executors(): ActionExecutor[] {
    return this.registry.list();
  }

  registerExecutor(executor: ActionExecutor): void {
    this.registry.register(executor);
    this.logger.log('info', 'executor.registered', { name: executor.name });
  }

  getExecutor(action: ProposedAction): ActionExecutor {
    return this.registry.resolve(action);
  }

  latestResult(actionId: string): ExecutionResult | undefined {
    return this.latestResults.get(actionId);
  }

  propose(actions: ProposedAction[]): GateOutcome {
    return this.gate.process(actions);
  }

  approve(
    actionIds: string[],
    approvedBy = 'user',
    reason = '',
    modifications?: Record<string, ActionModifications>,
  ): ProposedAction[] {
    return this.gate.approve(actionIds, approvedBy, reason, modifications);
  }

  reject(actionIds: string[], rejectedBy = 'user', reason = ''): ProposedAction[] {
    return this.gate.reject(actionIds, rejectedBy, reason);
  }

  /**
   * Execute the approved actions in a batch, in order. Actions in any other
   * state are skipped and a repeated id runs once; approved actions beyond the per-run cap are left
   * untouched for the caller to resubmit.
   */
  async execute(actions: ProposedAction[], dryRun?: boolean): Promise<ExecutionResult[]> {
    const isDryRun = dryRun ?? this.dryRunByDefault;
    const results: ExecutionResult[] = [];

    const seen = new Set<string>();
    let actionable = actions.filter((action) => {
      if (!isActionable(action) || seen.has(action.id)) return false;
      seen.add(action.id);
      return true;
    });
    if (actionable.length === 0) {
      this.logger.log('warn', 'execution.nothing_to_run', { submitted: actions.length });
      return results;
    }

    if (actionable.length > this.maxActionsPerRun) {
      this.logger.log('warn', 'execution.rate_limited', {
        limit: this.maxActionsPerRun,
        approved: actionable.length,
        deferred: actionable.length - this.maxActionsPerRun,
      });
      actionable = actionable.slice(0, this.maxActionsPerRun);
    }

    for (const action of actionable) {
      // an earlier item may have moved it on
      if (!isActionable(action)) {
        this.logger.log('warn', 'execution.skipped', { actionId: action.id, status: action.status });
        continue;
      }
      results.push(await this.executeOne(action, isDryRun));
    }

    this.logger.log('info', 'execution.batch', {
      total: results.length,
      succeeded: results.filter((r) => r.succeeded).length,
      failed: results.filter((r) => r.status === 'failed').length,
      dryRun: isDryRun,
    });

    return results;
  }

  /** Execute every queued action the gate has since approved. */
  async executeApproved(dryRun?: boolean): Promise<ExecutionResult[]> {
    return this.execute(this.gate.approvedFromQueue(), dryRun);
  }

  async rollback(actionIds: string[]): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];

    for (const actionId of actionIds) {
      const result = await this.rollbackOne(actionId);
      this.log.push(result);
      results.push(result);
    }

    return results;
  }

  summary(): EngineSummary {
    return {
      registeredExecutors: this.registry.names(),
      pendingActions: this.gate.pendingActions.length,
      totalExecuted: this.log.length,
      succeeded: this.log.filter((r) => r.succeeded).length,
      failed: this.log.filter((r) => r.status === 'failed').length,
      dryRunByDefault: this.dryRunByDefault,
      maxActionsPerRun: this.maxActionsPerRun,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────

  /**
   * A dry run leaves the action approved: the preview is recorded, the
   * lifecycle does not advance.
   */
  private async executeOne(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult> {
    const executor = this.registry.resolve(action);
    const startedAt = isoNow();

    const validation = await this.safeValidate(executor, action);
    if (!validation.ok) {
      const result = createExecutionResult({
        actionId: action.id,
        status: 'failed',
        summary: `Validation failed: ${validation.reason}`,
        details: { executor: executor.name },
        error: validation.reason,
        dryRun,
        startedAt,
      });
      if (!dryRun) transitionAction(action, 'failed');
      this.record(result);
      this.logger.log('warn', 'execution.invalid', { actionId: action.id, executor: executor.name, reason: validation.reason });
      return result;
    }

    if (!dryRun) {
      transitionAction(action, 'executing');
      action.executedAt = isoNow();
      this.executed.set(action.id, { action, executor });
    }

    let result: ExecutionResult;
    try {
      result = this.normalizeOutcome(await executor.execute(action, dryRun), dryRun, startedAt);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.log('error', 'execution.error', { actionId: action.id, executor: executor.name, error: message });
      result = createExecutionResult({
        actionId: action.id,
        status: 'failed',
        summary: `Execution error: ${message}`,
        details: { executor: executor.name },
        error: message,
        dryRun,
        startedAt,
      });
    }

    if (!dryRun) {
      if (result.status === 'completed') {
        transitionAction(action, 'completed');
        action.completedAt = isoNow();
      } else {
        transitionAction(action, 'failed');
      }
    }

    this.record(result);
    this.logger.log(result.succeeded ? 'info' : 'warn', result.succeeded ? 'execution.completed' : 'execution.failed', {
      actionId: action.id,
      executor: executor.name,
      summary: result.summary,
      dryRun,
    });
    return result;
  }

  private async safeValidate(executor: ActionExecutor, action: ProposedAction): Promise<ValidationOutcome> {
    try {
      return await executor.validate(action);
    } catch (error) {
      return { ok: false, reason: `Validator error: ${errorMessage(error)}` };
    }
  }

  /** execute may only complete or fail; anything else counts as a failure. */
  private normalizeOutcome(result: ExecutionResult, dryRun: boolean, startedAt: string): ExecutionResult {
    if (result.status === 'completed' || result.status === 'failed') return result;
    return createExecutionResult({
      actionId: result.actionId,
      status: 'failed',
      summary: `Executor returned unexpected status ${result.status}`,
      details: { reported: result.summary },
      error: ExecutionFailure.UnexpectedStatus,
      dryRun,
      startedAt,
    });
  }

  private async rollbackOne(actionId: string): Promise<ExecutionResult> {
    const prior = this.latestResults.get(actionId);
    const entry = this.executed.get(actionId);

    if (!prior || !entry) {
      this.logger.log('warn', 'rollback.no_record', { actionId });
      return createExecutionResult({
        actionId,
        status: 'failed',
        summary: 'No execution record for this action.',
        error: ExecutionFailure.RollbackNotAvailable,
      });
    }

    if (!prior.rollbackAvailable) {
      this.logger.log('warn', 'rollback.unavailable', { actionId });
      return createExecutionResult({
        actionId,
        status: 'failed',
        summary: 'Rollback not available for this action.',
        error: ExecutionFailure.RollbackNotAvailable,
      });
    }

    const { action, executor } = entry;
    if (action.status !== 'completed') {
      return createExecutionResult({
        actionId,
        status: 'failed',
        summary: `Cannot roll back an action in state ${action.status}.`,
        error: ExecutionFailure.InvalidState,
      });
    }

    if (!executor.rollback) {
      return createExecutionResult({
        actionId,
        status: 'failed',
        summary: `Executor ${executor.name} does not implement rollback.`,
        error: ExecutionFailure.RollbackNotImplemented,
      });
    }

    const startedAt = isoNow();
    let result: ExecutionResult;
    try {
      result = await executor.rollback(action, prior);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.log('error', 'rollback.error', { actionId, executor: executor.name, error: message });
      return createExecutionResult({
        actionId,
        status: 'failed',
        summary: `Rollback error: ${message}`,
        error: message,
        startedAt,
      });
    }

    if (result.status === 'rolled_back') {
      transitionAction(action, 'rolled_back');
      this.latestResults.set(actionId, result);
      eventBus.emit('action.rolled_back', { actionId, summary: result.summary });
      this.logger.log('info', 'rollback.completed', { actionId, executor: executor.name, summary: result.summary });
    } else {
      this.logger.log('warn', 'rollback.failed', { actionId, executor: executor.name, error: result.error });
    }

    return result;
  }

  private record(result: ExecutionResult): void {
    this.log.push(result);
    this.latestResults.set(result.actionId, result);
    eventBus.emit(result.succeeded ? 'action.executed' : 'action.failed', {
      actionId: result.actionId,
      status: result.status,
      summary: result.summary,
      dryRun: result.dryRun,
    });
  }
}
