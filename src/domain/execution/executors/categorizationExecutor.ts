import { z } from 'zod';
import { ExecutionResult, ProposedAction } from '../../actions/actionTypes.js';
import { createExecutionResult } from '../../actions/actionLifecycle.js';
import { ExecutionFailure } from '../../../errors/taxonomy.js';
import { EventLogger } from '../../../infra/logger.js';
import { InMemoryTransactionLedger, TransactionLedger } from '../../../integrations/bookkeeping/transactionLedger.js';
import { isoNow } from '../../../utils/time.js';
import { BaseExecutor, ValidationOutcome, validateParameters } from './baseExecutor.js';

export const categorizationParamsSchema = z.object({
  transactionIds: z.array(z.string().min(1)).min(1),
  category: z.string().min(1),
});

const originalCategoriesSchema = z.record(z.string(), z.string().nullable());

/**
 * Categorizes and tags transactions through the ledger's write-back API.
 * The categories it overwrites are kept in the result so the change can be
 * reverted.
 */
export class CategorizationExecutor extends BaseExecutor {
  readonly name = 'categorization';
  readonly description = 'Categorizes and tags transactions';
  readonly supportedActionTypes = ['categorize_transaction', 'tag_expense', 'update_category_bulk'] as const;

  constructor(
    private readonly ledger: TransactionLedger = new InMemoryTransactionLedger(),
    logger?: EventLogger,
  ) {
    super(logger);
  }

  async validate(action: ProposedAction): Promise<ValidationOutcome> {
    const checked = validateParameters(categorizationParamsSchema, action.parameters);
    return checked.ok ? { ok: true } : checked;
  }

  async execute(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult> {
    const startedAt = isoNow();
    const { transactionIds, category } = categorizationParamsSchema.parse(action.parameters);
    const originalCategories = await this.ledger.getCategories(transactionIds);

    let summary: string;
    if (dryRun) {
      summary = `Would categorize ${transactionIds.length} transaction(s) as '${category}'`;
    } else {
      await this.ledger.setCategories(Object.fromEntries(transactionIds.map((id) => [id, category])));
      summary = `Categorized ${transactionIds.length} transaction(s) as '${category}'`;
      this.logger.log('info', 'executor.categorization.applied', {
        actionId: action.id,
        category,
        count: transactionIds.length,
      });
    }

    return createExecutionResult({
      actionId: action.id,
      status: 'completed',
      summary,
      details: {
        transactionIds,
        category,
        count: transactionIds.length,
        originalCategories,
      },
      dryRun,
      rollbackAvailable: !dryRun,
      startedAt,
    });
  }

  async rollback(action: ProposedAction, priorResult: ExecutionResult): Promise<ExecutionResult> {
    const startedAt = isoNow();
    const parsed = originalCategoriesSchema.safeParse(priorResult.details.originalCategories);
    const original = parsed.success ? parsed.data : {};

    if (Object.keys(original).length === 0) {
      return createExecutionResult({
        actionId: action.id,
        status: 'failed',
        summary: 'Cannot roll back: original categories were not recorded.',
        error: ExecutionFailure.NoOriginalData,
        startedAt,
      });
    }

    await this.ledger.setCategories(original);
    this.logger.log('info', 'executor.categorization.reverted', {
      actionId: action.id,
      count: Object.keys(original).length,
    });

    return createExecutionResult({
      actionId: action.id,
      status: 'rolled_back',
      summary: `Rolled back ${Object.keys(original).length} transaction categories to originals`,
      details: { restoredCategories: original },
      startedAt,
    });
  }
}
