import {
  ApprovalDecision,
  ApprovalNotification,
  ExecutionResult,
  ProposedAction,
} from './domain/actions/actionTypes.js';

export interface PipelineMetrics {
  startedAt: string;
  actionsProposed: number;
  actionsApproved: number;
  actionsRejected: number;
  executionsRecorded: number;
  rollbacksRecorded: number;
}

/**
 * Durable view of the pipeline. Actions are upserted by id; decisions,
 * execution results and notifications are append-only sequences.
 */
export interface AppState {
  actions: Record<string, ProposedAction>;
  decisions: ApprovalDecision[];
  executionLog: ExecutionResult[];
  notifications: ApprovalNotification[];
  metrics: PipelineMetrics;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  pendingActions: number;
  connectedClients: number;
  processPid: number;
}
