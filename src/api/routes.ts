import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { ACTION_STATUSES } from '../domain/actions/actionTypes.js';
import { actionStepSchema, proposedActionInputSchema } from '../domain/actions/actionLifecycle.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { ActionPipelineService } from '../services/actionPipelineService.js';
import { RuntimeMetrics } from '../types.js';

interface RouteDeps {
  config: AppConfig;
  pipeline: ActionPipelineService;
  logger: EventLogger;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const actionIdsSchema = z.array(z.string().min(1)).min(1).max(500);

const proposeSchema = z.object({
  actions: z.array(proposedActionInputSchema).min(1).max(500),
});

const modificationsSchema = z.object({
  title: z.string().min(1).max(300).optional(),
  description: z.string().max(5000).optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
  estimatedSavings: z.number().nonnegative().optional(),
  steps: z.array(actionStepSchema).optional(),
  executor: z.string().min(1).nullable().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
}).strict();

const approveSchema = z.object({
  actionIds: actionIdsSchema,
  approvedBy: z.string().min(1).max(200),
  reason: z.string().max(2000).optional(),
  modifications: z.record(z.string(), modificationsSchema).optional(),
});

const rejectSchema = z.object({
  actionIds: actionIdsSchema,
  rejectedBy: z.string().min(1).max(200),
  reason: z.string().max(2000).optional(),
});

const executeSchema = z.object({
  actionIds: actionIdsSchema,
  dryRun: z.boolean().optional(),
});

const executeApprovedSchema = z.object({
  dryRun: z.boolean().optional(),
});

const rollbackSchema = z.object({
  actionIds: actionIdsSchema,
});

const listActionsQuerySchema = z.object({
  status: z.enum(ACTION_STATUSES).optional(),
});

const byActionQuerySchema = z.object({
  actionId: z.string().min(1).optional(),
});

const overdueQuerySchema = z.object({
  asOf: z.string().datetime().optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, message: string, error: z.ZodError): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { pipeline } = deps;

  app.get('/', async () => ({
    name: deps.config.app.name,
    status: 'ok',
    dryRunByDefault: deps.config.execution.dryRunByDefault,
  }));

  app.get('/health', async () => ({
    status: 'ok',
    env: deps.config.app.env,
    requireApproval: deps.config.approval.requireApproval,
    runtime: deps.getRuntimeMetrics(),
  }));

  // ─── Actions ────────────────────────────────────────────────────────

  app.get('/actions', async (request, reply) => {
    const parse = listActionsQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);
    return { actions: pipeline.listActions(parse.data.status) };
  });

  app.get<{ Params: { actionId: string } }>('/actions/:actionId', async (request, reply) => {
    const action = pipeline.getAction(request.params.actionId);
    if (!action) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.ActionNotFound, 'Action not found.'));
    }
    return {
      action,
      decisions: pipeline.decisions(action.id),
      executions: pipeline.executions(action.id),
    };
  });

  app.post('/actions', async (request, reply) => {
    const parse = proposeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const outcome = await pipeline.propose(parse.data.actions);
      return reply.code(201).send(outcome);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/actions/approve', async (request, reply) => {
    const parse = approveSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const approved = await pipeline.approve(parse.data);
      return { approved };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/actions/reject', async (request, reply) => {
    const parse = rejectSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const rejected = await pipeline.reject(parse.data);
      return { rejected };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/actions/execute', async (request, reply) => {
    const parse = executeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const results = await pipeline.execute(parse.data.actionIds, parse.data.dryRun);
      return { results };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/actions/execute-approved', async (request, reply) => {
    const parse = executeApprovedSchema.safeParse(request.body ?? {});
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const results = await pipeline.executeApproved(parse.data.dryRun);
      return { results };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/actions/rollback', async (request, reply) => {
    const parse = rollbackSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const results = await pipeline.rollback(parse.data.actionIds);
      return { results };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Approvals ──────────────────────────────────────────────────────

  app.get('/approvals/pending', async () => ({ actions: pipeline.pending() }));

  app.get('/approvals/overdue', async (request, reply) => {
    const parse = overdueQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);
    const asOf = parse.data.asOf ? new Date(parse.data.asOf) : new Date();
    return { asOf: asOf.toISOString(), actions: pipeline.overdue(asOf) };
  });

  app.get('/approvals/decisions', async (request, reply) => {
    const parse = byActionQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);
    return { decisions: pipeline.decisions(parse.data.actionId) };
  });

  // ─── Notifications, executions, engine ──────────────────────────────

  app.get('/notifications', async () => ({ notifications: pipeline.notifications() }));

  app.post('/notifications/drain', async (_request, reply) => {
    try {
      return { notifications: await pipeline.drainNotifications() };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/executions', async (request, reply) => {
    const parse = byActionQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);
    return { results: pipeline.executions(parse.data.actionId) };
  });

  app.get('/engine/summary', async () => pipeline.summary());

  app.get('/logs', async () => ({ entries: deps.logger.recent(100) }));
}
