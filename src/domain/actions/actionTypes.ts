/**
 * Proposed-action types.
 *
 * A proposed action is a candidate operation produced by an audit. It carries
 * an approval tier, a status that only moves forward, and the free-form
 * parameters its executor consumes.
 */

export const ACTION_TYPES = [
  'categorize_transaction',
  'tag_expense',
  'update_category_bulk',
  'generate_report',
  'create_budget_alert',
  'send_reminder',
  'flag_for_review',
  'cancel_subscription',
  'pay_invoice',
  'renegotiate_vendor',
  'request_refund',
  'transfer_funds',
  'change_payroll',
  'modify_tax_filing',
  'custom',
] as const;

export type ActionType = typeof ACTION_TYPES[number];

export const APPROVAL_LEVELS = ['green', 'yellow', 'red', 'critical'] as const;

/** Risk tier, ordered least to most oversight. */
export type ApprovalLevel = typeof APPROVAL_LEVELS[number];

export const ACTION_STATUSES = [
  'proposed',
  'approved',
  'rejected',
  'executing',
  'completed',
  'failed',
  'rolled_back',
] as const;

export type ActionStatus = typeof ACTION_STATUSES[number];

/**
 * Default tier per action type.
 *
 * green: reversible, touches few records.
 * yellow: touches many records or sends communication.
 * red: financially consequential but individually reversible.
 * critical: irreversible or carries legal/compliance weight.
 */
export const DEFAULT_APPROVAL_MAP: Readonly<Record<ActionType, ApprovalLevel>> = {
  categorize_transaction: 'green',
  tag_expense: 'green',
  generate_report: 'green',
  create_budget_alert: 'green',
  update_category_bulk: 'yellow',
  send_reminder: 'yellow',
  flag_for_review: 'yellow',
  cancel_subscription: 'red',
  pay_invoice: 'red',
  renegotiate_vendor: 'red',
  request_refund: 'red',
  custom: 'red',
  change_payroll: 'critical',
  modify_tax_filing: 'critical',
  transfer_funds: 'critical',
};

export interface ActionStep {
  order: number;
  description: string;
  reversible: boolean;
}

export interface ProposedAction {
  id: string;
  title: string;
  description: string;
  actionType: ActionType;
  approvalLevel: ApprovalLevel;
  status: ActionStatus;
  steps: ActionStep[];
  parameters: Record<string, unknown>;
  /** Explicit executor name; overrides type-based routing. */
  executor: string | null;
  estimatedSavings: number;
  confidence: number;
  findingIds: string[];
  createdAt: string;
  approvedAt: string | null;
  executedAt: string | null;
  completedAt: string | null;
  approvedBy: string | null;
  /** Approver identities collected so far under a multi-party rule. */
  collectedApprovals: string[];
  metadata: Record<string, unknown>;
}

/** Fields an approver may change while approving. */
export type ActionModifications = Partial<Pick<
  ProposedAction,
  'title' | 'description' | 'parameters' | 'estimatedSavings' | 'steps' | 'executor' | 'metadata'
>>;

export interface ApprovalRule {
  level: ApprovalLevel;
  approvers: string[];
  /** true: every named approver must sign off. false: any one suffices. */
  requireAll: boolean;
  /** Advisory only; nothing expires on its own. */
  timeoutHours: number;
}

export type DecisionKind = 'approved' | 'rejected' | 'partial_approval';

export interface ApprovalDecision {
  readonly actionId: string;
  readonly decision: DecisionKind;
  readonly decidedBy: string;
  readonly reason: string;
  readonly decidedAt: string;
}

export interface ExecutionResult {
  readonly actionId: string;
  readonly status: ActionStatus;
  readonly summary: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly error: string | null;
  readonly dryRun: boolean;
  readonly rollbackAvailable: boolean;
  readonly succeeded: boolean;
  readonly startedAt: string;
  readonly finishedAt: string | null;
}

export interface ApprovalNotification {
  actionId: string;
  title: string;
  level: ApprovalLevel;
  message: string;
  createdAt: string;
}
