import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { connectedClients, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { ApprovalGate } from './domain/approval/approvalGate.js';
import { loadApprovalRules } from './domain/approval/approvalRules.js';
import { ExecutionEngine } from './domain/execution/executionEngine.js';
import { CategorizationExecutor } from './domain/execution/executors/categorizationExecutor.js';
import { NotificationExecutor } from './domain/execution/executors/notificationExecutor.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { InMemoryTransactionLedger, TransactionLedger } from './integrations/bookkeeping/transactionLedger.js';
import { LoggingNotificationChannel, NotificationChannel } from './integrations/notify/notificationChannel.js';
import { ActionPipelineService } from './services/actionPipelineService.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  pipeline: ActionPipelineService;
  engine: ExecutionEngine;
  stateStore: StateStore;
  logger: EventLogger;
}

export interface AppOverrides {
  ledger?: TransactionLedger;
  channel?: NotificationChannel;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile, config.logging.recentBufferSize);
  await logger.init();

  const rules = await loadApprovalRules(config.paths.approvalRulesFile);
  const approvalGate = new ApprovalGate({
    rules,
    requireApproval: config.approval.requireApproval,
    autoApproveGreen: config.approval.autoApproveGreen,
    autoApproveYellow: config.approval.autoApproveYellow,
    logger,
  });

  const engine = new ExecutionEngine({
    approvalGate,
    executors: [
      new CategorizationExecutor(overrides.ledger ?? new InMemoryTransactionLedger(), logger),
      new NotificationExecutor(overrides.channel ?? new LoggingNotificationChannel(logger), logger),
    ],
    maxActionsPerRun: config.execution.maxActionsPerRun,
    dryRunByDefault: config.execution.dryRunByDefault,
    logger,
  });

  const pipeline = new ActionPipelineService(stateStore, engine, logger);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    pipeline,
    logger,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      pendingActions: pipeline.pending().length,
      connectedClients: connectedClients(),
      processPid: process.pid,
    }),
  });

  const detachFeed = await registerWebSocket(app);
  app.addHook('onClose', async () => {
    detachFeed();
  });

  logger.log('info', 'app.ready', {
    rules: rules.map((r) => r.level),
    executors: engine.executors.map((e) => e.name),
  });

  return { app, pipeline, engine, stateStore, logger };
}
