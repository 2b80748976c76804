/**
 * Executors are pluggable handlers for one category of action. Each one
 * validates parameters without side effects, executes for real or as a
 * preview, and may roll back where the effect is mechanically undoable.
 */

import { z } from 'zod';
import { ActionType, ExecutionResult, ProposedAction } from '../../actions/actionTypes.js';
import { createExecutionResult } from '../../actions/actionLifecycle.js';
import { ExecutionFailure } from '../../../errors/taxonomy.js';
import { EventLogger } from '../../../infra/logger.js';

export type ValidationOutcome = { ok: true } | { ok: false; reason: string };

export interface ActionExecutor {
  readonly name: string;
  readonly description: string;
  readonly supportedActionTypes: readonly ActionType[];
  canHandle(action: ProposedAction): boolean;
  validate(action: ProposedAction): Promise<ValidationOutcome>;
  /** Under dryRun the executor describes the effect and mutates nothing. */
  execute(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult>;
  rollback?(action: ProposedAction, priorResult: ExecutionResult): Promise<ExecutionResult>;
}

export abstract class BaseExecutor implements ActionExecutor {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly supportedActionTypes: readonly ActionType[] = [];

  constructor(protected readonly logger: EventLogger = new EventLogger()) {}

  abstract validate(action: ProposedAction): Promise<ValidationOutcome>;

  abstract execute(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult>;

  /** Not supported unless a subclass overrides it. */
  async rollback(action: ProposedAction, _priorResult: ExecutionResult): Promise<ExecutionResult> {
    return createExecutionResult({
      actionId: action.id,
      status: 'failed',
      summary: 'Rollback not supported for this action type.',
      error: ExecutionFailure.RollbackNotImplemented,
    });
  }

  canHandle(action: ProposedAction): boolean {
    return this.supportedActionTypes.includes(action.actionType) || action.executor === this.name;
  }
}

/** Turn parameter schema issues into a single validation reason. */
export const validateParameters = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  parameters: Record<string, unknown>,
): { ok: true; value: T } | { ok: false; reason: string } => {
  const parsed = schema.safeParse(parameters);
  if (parsed.success) return { ok: true, value: parsed.data };

  const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.') || '(root)'))];
  return { ok: false, reason: `Missing or invalid parameters: ${fields.join(', ')}` };
};
