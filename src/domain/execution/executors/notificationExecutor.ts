import { z } from 'zod';
import { ExecutionResult, ProposedAction } from '../../actions/actionTypes.js';
import { createExecutionResult } from '../../actions/actionLifecycle.js';
import { EventLogger } from '../../../infra/logger.js';
import {
  LoggingNotificationChannel,
  NOTIFICATION_CHANNELS,
  NotificationChannel,
} from '../../../integrations/notify/notificationChannel.js';
import { isoNow } from '../../../utils/time.js';
import { BaseExecutor, ValidationOutcome, validateParameters } from './baseExecutor.js';

export const notificationParamsSchema = z.object({
  recipients: z.array(z.string().min(1)).min(1),
  channel: z.enum(NOTIFICATION_CHANNELS).default('email'),
  message: z.string().min(1).optional(),
});

const MESSAGE_PREVIEW_LENGTH = 200;

/**
 * Sends reminders and review flags. A sent message cannot be recalled, so
 * results never offer rollback.
 */
export class NotificationExecutor extends BaseExecutor {
  readonly name = 'notification';
  readonly description = 'Sends notifications and reminders';
  readonly supportedActionTypes = ['send_reminder', 'flag_for_review'] as const;
  private readonly channel: NotificationChannel;

  constructor(channel?: NotificationChannel, logger?: EventLogger) {
    super(logger);
    this.channel = channel ?? new LoggingNotificationChannel(this.logger);
  }

  async validate(action: ProposedAction): Promise<ValidationOutcome> {
    const checked = validateParameters(notificationParamsSchema, action.parameters);
    return checked.ok ? { ok: true } : checked;
  }

  async execute(action: ProposedAction, dryRun: boolean): Promise<ExecutionResult> {
    const startedAt = isoNow();
    const params = notificationParamsSchema.parse(action.parameters);
    const message = params.message ?? action.description;

    let summary: string;
    if (dryRun) {
      summary = `Would send ${params.channel} notification to ${params.recipients.length} recipient(s)`;
    } else {
      await this.channel.send({
        actionId: action.id,
        channel: params.channel,
        recipients: params.recipients,
        message,
      });
      summary = `Sent ${params.channel} notification to ${params.recipients.length} recipient(s)`;
    }

    return createExecutionResult({
      actionId: action.id,
      status: 'completed',
      summary,
      details: {
        channel: params.channel,
        recipients: params.recipients,
        message: message.slice(0, MESSAGE_PREVIEW_LENGTH),
      },
      dryRun,
      rollbackAvailable: false,
      startedAt,
    });
  }
}
