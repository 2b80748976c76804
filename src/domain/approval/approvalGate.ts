/**
 * Approval gate: tiered human oversight for proposed actions.
 *
 *   green    → auto-approve
 *   yellow   → auto-approve and queue a notification
 *   red      → wait for an explicit approval
 *   critical → wait for approval, multi-party when a rule names several approvers
 *
 * The pending queue, the decision ledger and the notification queue belong to
 * the gate instance. The ledger only ever grows.
 */

import {
  ActionModifications,
  ApprovalDecision,
  ApprovalLevel,
  ApprovalNotification,
  ApprovalRule,
  DecisionKind,
  ProposedAction,
} from '../actions/actionTypes.js';
import { createApprovalDecision, transitionAction } from '../actions/actionLifecycle.js';
import { eventBus } from '../../infra/eventBus.js';
import { EventLogger } from '../../infra/logger.js';
import { hoursBetween, isoNow } from '../../utils/time.js';

export const SYSTEM_AUTO_APPROVER = 'system:auto';

export interface ApprovalGateOptions {
  rules?: ApprovalRule[];
  /** false approves everything on arrival. */
  requireApproval?: boolean;
  autoApproveGreen?: boolean;
  autoApproveYellow?: boolean;
  logger?: EventLogger;
}

export interface GateOutcome {
  autoApproved: ProposedAction[];
  needsApproval: ProposedAction[];
}

const formatUsd = (amount: number): string => amount.toLocaleString('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export class ApprovalGate {
  private readonly rules: Map<ApprovalLevel, ApprovalRule> = new Map();
  private readonly requireApproval: boolean;
  private readonly autoApproveGreen: boolean;
  private readonly autoApproveYellow: boolean;
  private readonly logger: EventLogger;

  /** actionId → action held for a human decision */
  private readonly pending: Map<string, ProposedAction> = new Map();
  /** actionId → ISO time it entered the queue */
  private readonly queuedAt: Map<string, string> = new Map();
  private readonly decisionLog: ApprovalDecision[] = [];
  private notificationQueue: ApprovalNotification[] = [];

  constructor(options: ApprovalGateOptions = {}) {
    for (const rule of options.rules ?? []) {
      this.rules.set(rule.level, rule);
    }
    this.requireApproval = options.requireApproval ?? true;
    this.autoApproveGreen = options.autoApproveGreen ?? true;
    this.autoApproveYellow = options.autoApproveYellow ?? true;
    this.logger = options.logger ?? new EventLogger();
  }

  /** Queued actions still waiting for a decision. */
  get pendingActions(): ProposedAction[] {
    return [...this.pending.values()].filter((a) => a.status === 'proposed');
  }

  get decisions(): ApprovalDecision[] {
    return [...this.decisionLog];
  }

  get notifications(): ApprovalNotification[] {
    return this.notificationQueue.map((n) => ({ ...n }));
  }

  /** Hand queued notifications to a delivery sink and clear the queue. */
  drainNotifications(): ApprovalNotification[] {
    const drained = this.notificationQueue;
    this.notificationQueue = [];
    return drained;
  }

  ruleFor(level: ApprovalLevel): ApprovalRule | undefined {
    return this.rules.get(level);
  }

  getAction(actionId: string): ProposedAction | undefined {
    return this.pending.get(actionId);
  }

  /** Queued actions that have since been approved and not yet executed. */
  approvedFromQueue(): ProposedAction[] {
    return [...this.pending.values()].filter((a) => a.status === 'approved');
  }

  process(actions: ProposedAction[]): GateOutcome {
    const autoApproved: ProposedAction[] = [];
    const needsApproval: ProposedAction[] = [];

    for (const action of actions) {
      if (action.status !== 'proposed') {
        this.logger.log('warn', 'approval.skipped', { actionId: action.id, verb: 'process', status: action.status });
        continue;
      }

      if (!this.requireApproval) {
        this.autoApprove(action, 'Approval disabled globally');
        autoApproved.push(action);
        continue;
      }

      const level = action.approvalLevel;

      if (level === 'green' && this.autoApproveGreen) {
        this.autoApprove(action, 'Green auto-approve');
        autoApproved.push(action);
        this.logger.log('debug', 'approval.auto', { actionId: action.id, level });
      } else if (level === 'yellow' && this.autoApproveYellow) {
        this.autoApprove(action, 'Yellow auto-approve + notify');
        autoApproved.push(action);

        const notification: ApprovalNotification = {
          actionId: action.id,
          title: action.title,
          level,
          message: `Auto-approved action: ${action.title} (saves $${formatUsd(action.estimatedSavings)})`,
          createdAt: isoNow(),
        };
        this.notificationQueue.push(notification);
        eventBus.emit('action.notification', { ...notification });
        this.logger.log('debug', 'approval.auto', { actionId: action.id, level, notified: true });
      } else {
        this.pending.set(action.id, action);
        this.queuedAt.set(action.id, isoNow());
        needsApproval.push(action);
        eventBus.emit('action.queued', { actionId: action.id, level });
        this.logger.log('info', 'approval.queued', {
          actionId: action.id,
          title: action.title,
          level,
        });
      }
    }

    return { autoApproved, needsApproval };
  }

  approve(
    actionIds: string[],
    approvedBy = 'user',
    reason = '',
    modifications: Record<string, ActionModifications> = {},
  ): ProposedAction[] {
    const approved: ProposedAction[] = [];

    for (const actionId of actionIds) {
      const action = this.pendingProposed(actionId, 'approve');
      if (!action) continue;

      const rule = this.rules.get(action.approvalLevel);
      if (rule && rule.requireAll && rule.approvers.length > 0) {
        if (!action.collectedApprovals.includes(approvedBy)) {
          action.collectedApprovals.push(approvedBy);
        }

        const covered = rule.approvers.filter((a) => action.collectedApprovals.includes(a)).length;
        if (covered < rule.approvers.length) {
          this.recordDecision(action, 'partial_approval', approvedBy, `Multi-party: ${covered}/${rule.approvers.length}`);
          eventBus.emit('action.partially_approved', {
            actionId,
            approvedBy,
            covered,
            required: rule.approvers.length,
          });
          this.logger.log('info', 'approval.partial', {
            actionId,
            approvedBy,
            covered,
            required: rule.approvers.length,
          });
          continue;
        }
      }

      const changes = modifications[actionId];
      if (changes) {
        this.applyModifications(action, changes);
      }

      transitionAction(action, 'approved');
      action.approvedAt = isoNow();
      action.approvedBy = approvedBy;
      approved.push(action);
      this.recordDecision(action, 'approved', approvedBy, reason);
      eventBus.emit('action.approved', { actionId, approvedBy });
      this.logger.log('info', 'approval.approved', { actionId, title: action.title, approvedBy });
    }

    return approved;
  }

  reject(actionIds: string[], rejectedBy = 'user', reason = ''): ProposedAction[] {
    const rejected: ProposedAction[] = [];

    for (const actionId of actionIds) {
      const action = this.pendingProposed(actionId, 'reject');
      if (!action) continue;

      transitionAction(action, 'rejected');
      rejected.push(action);
      this.recordDecision(action, 'rejected', rejectedBy, reason);
      eventBus.emit('action.rejected', { actionId, rejectedBy, reason });
      this.logger.log('info', 'approval.rejected', { actionId, title: action.title, rejectedBy, reason });
    }

    return rejected;
  }

  /**
   * Pending actions whose rule timeout has elapsed. The gate never expires
   * anything itself; a scheduler reads this and calls reject.
   */
  overdueActions(now: Date = new Date()): ProposedAction[] {
    return this.pendingActions.filter((action) => {
      const rule = this.rules.get(action.approvalLevel);
      const since = this.queuedAt.get(action.id);
      if (!rule || !since) return false;
      return hoursBetween(since, now) >= rule.timeoutHours;
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private pendingProposed(actionId: string, verb: 'approve' | 'reject'): ProposedAction | undefined {
    const action = this.pending.get(actionId);
    if (!action) {
      this.logger.log('warn', 'approval.not_found', { actionId, verb });
      return undefined;
    }
    if (action.status !== 'proposed') {
      this.logger.log('warn', 'approval.skipped', { actionId, verb, status: action.status });
      return undefined;
    }
    return action;
  }

  private autoApprove(action: ProposedAction, reason: string): void {
    transitionAction(action, 'approved');
    action.approvedAt = isoNow();
    action.approvedBy = SYSTEM_AUTO_APPROVER;
    this.recordDecision(action, 'approved', SYSTEM_AUTO_APPROVER, reason);
    eventBus.emit('action.approved', { actionId: action.id, approvedBy: SYSTEM_AUTO_APPROVER });
  }

  /** Only the fields in ActionModifications can change; id, type, tier and status cannot. */
  private applyModifications(action: ProposedAction, changes: ActionModifications): void {
    if (changes.title !== undefined) action.title = changes.title;
    if (changes.description !== undefined) action.description = changes.description;
    if (changes.parameters !== undefined) action.parameters = { ...changes.parameters };
    if (changes.estimatedSavings !== undefined) action.estimatedSavings = changes.estimatedSavings;
    if (changes.steps !== undefined) action.steps = [...changes.steps];
    if (changes.executor !== undefined) action.executor = changes.executor;
    if (changes.metadata !== undefined) action.metadata = { ...changes.metadata };
  }

  private recordDecision(action: ProposedAction, decision: DecisionKind, decidedBy: string, reason: string): void {
    this.decisionLog.push(createApprovalDecision(action.id, decision, decidedBy, reason));
  }
}
