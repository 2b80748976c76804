import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { isoNow } from '../../utils/time.js';
import {
  ACTION_TYPES,
  APPROVAL_LEVELS,
  ActionStatus,
  ApprovalDecision,
  ApprovalLevel,
  DEFAULT_APPROVAL_MAP,
  DecisionKind,
  ExecutionResult,
  ProposedAction,
} from './actionTypes.js';

// ─── Producer input ─────────────────────────────────────────────────────────

export const actionStepSchema = z.object({
  order: z.number().int().nonnegative(),
  description: z.string().min(1),
  reversible: z.boolean(),
});

export const proposedActionInputSchema = z.object({
  id: z.string().min(1).max(120).optional(),
  title: z.string().min(1).max(300),
  description: z.string().max(5000),
  actionType: z.enum(ACTION_TYPES).optional(),
  approvalLevel: z.enum(APPROVAL_LEVELS).optional(),
  steps: z.array(actionStepSchema).optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
  executor: z.string().min(1).nullable().optional(),
  estimatedSavings: z.number().nonnegative().optional(),
  confidence: z.number().min(0).max(1).optional(),
  findingIds: z.array(z.string()).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
}).strict();

export type ProposedActionInput = z.infer<typeof proposedActionInputSchema>;

const DEFAULT_CONFIDENCE = 0.8;

export const createProposedAction = (input: ProposedActionInput): ProposedAction => {
  const actionType = input.actionType ?? 'custom';

  return {
    id: input.id ?? `act_${uuid().replace(/-/g, '').slice(0, 8)}`,
    title: input.title,
    description: input.description,
    actionType,
    approvalLevel: input.approvalLevel ?? DEFAULT_APPROVAL_MAP[actionType],
    status: 'proposed',
    steps: [...(input.steps ?? [])].sort((a, b) => a.order - b.order),
    parameters: { ...(input.parameters ?? {}) },
    executor: input.executor ?? null,
    estimatedSavings: input.estimatedSavings ?? 0,
    confidence: input.confidence ?? DEFAULT_CONFIDENCE,
    findingIds: [...(input.findingIds ?? [])],
    createdAt: isoNow(),
    approvedAt: null,
    executedAt: null,
    completedAt: null,
    approvedBy: null,
    collectedApprovals: [],
    metadata: { ...(input.metadata ?? {}) },
  };
};

// ─── State machine ──────────────────────────────────────────────────────────

const ALLOWED_TRANSITIONS: Readonly<Record<ActionStatus, readonly ActionStatus[]>> = {
  proposed: ['approved', 'rejected'],
  approved: ['executing', 'failed'],
  executing: ['completed', 'failed'],
  completed: ['rolled_back'],
  rejected: [],
  failed: [],
  rolled_back: [],
};

const TERMINAL_STATUSES: ReadonlySet<ActionStatus> = new Set(['completed', 'failed', 'rejected', 'rolled_back']);

export const canTransition = (from: ActionStatus, to: ActionStatus): boolean => (
  ALLOWED_TRANSITIONS[from].includes(to)
);

export function transitionAction(action: ProposedAction, to: ActionStatus): void {
  if (!canTransition(action.status, to)) {
    throw new DomainError(
      ErrorCode.InvalidTransition,
      409,
      `Action ${action.id} cannot move from ${action.status} to ${to}.`,
      { actionId: action.id, from: action.status, to },
    );
  }
  action.status = to;
}

export const isActionable = (action: ProposedAction): boolean => action.status === 'approved';

/** Completed counts as terminal even though a rollback may still follow. */
export const isTerminal = (action: ProposedAction): boolean => TERMINAL_STATUSES.has(action.status);

const LEVEL_RANK: Readonly<Record<ApprovalLevel, number>> = {
  green: 0,
  yellow: 1,
  red: 2,
  critical: 3,
};

export const compareApprovalLevels = (a: ApprovalLevel, b: ApprovalLevel): number => LEVEL_RANK[a] - LEVEL_RANK[b];

export const isAutoApprovable = (level: ApprovalLevel): boolean => compareApprovalLevels(level, 'yellow') <= 0;

// ─── Ledger records ─────────────────────────────────────────────────────────

export interface ExecutionResultInput {
  actionId: string;
  status: ActionStatus;
  summary: string;
  details?: Record<string, unknown>;
  error?: string | null;
  dryRun?: boolean;
  rollbackAvailable?: boolean;
  startedAt?: string;
  finishedAt?: string | null;
}

export const createExecutionResult = (input: ExecutionResultInput): ExecutionResult => Object.freeze({
  actionId: input.actionId,
  status: input.status,
  summary: input.summary,
  details: Object.freeze({ ...(input.details ?? {}) }),
  error: input.error ?? null,
  dryRun: input.dryRun ?? false,
  rollbackAvailable: input.rollbackAvailable ?? false,
  succeeded: input.status === 'completed' || input.status === 'rolled_back',
  startedAt: input.startedAt ?? isoNow(),
  finishedAt: input.finishedAt === undefined ? isoNow() : input.finishedAt,
});

export const createApprovalDecision = (
  actionId: string,
  decision: DecisionKind,
  decidedBy: string,
  reason: string,
): ApprovalDecision => Object.freeze({
  actionId,
  decision,
  decidedBy,
  reason,
  decidedAt: isoNow(),
});
