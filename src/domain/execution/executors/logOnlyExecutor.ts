import { ExecutionResult, ProposedAction } from '../../actions/actionTypes.js';
import { createExecutionResult } from '../../actions/actionLifecycle.js';
import { isoNow } from '../../../utils/time.js';
import { BaseExecutor, ValidationOutcome } from './baseExecutor.js';

/**
 * Fallback for actions no registered executor claims. Logs the action and
 * completes without touching any external system; never offers rollback.
 */
export class LogOnlyExecutor extends BaseExecutor {
  readonly name = 'log_only';
  readonly description = 'Logs the action without performing any external operations';

  async validate(_action: ProposedAction): Promise<ValidationOutcome> {
    return { ok: true };
  }

  async execute(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult> {
    const startedAt = isoNow();
    const mode = dryRun ? 'DRY-RUN' : 'LOGGED';

    this.logger.log('info', 'executor.log_only', {
      mode,
      actionId: action.id,
      title: action.title,
      actionType: action.actionType,
      estimatedSavings: action.estimatedSavings,
      steps: action.steps.map((s) => s.description),
    });

    return createExecutionResult({
      actionId: action.id,
      status: 'completed',
      summary: `[${mode}] ${action.title}`,
      details: {
        actionType: action.actionType,
        estimatedSavings: action.estimatedSavings,
        stepsCount: action.steps.length,
        mode,
      },
      dryRun,
      rollbackAvailable: false,
      startedAt,
    });
  }
}
