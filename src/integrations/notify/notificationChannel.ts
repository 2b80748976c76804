import { EventLogger } from '../../infra/logger.js';

export const NOTIFICATION_CHANNELS = ['email', 'slack', 'sms'] as const;

export type ChannelKind = typeof NOTIFICATION_CHANNELS[number];

export interface OutboundNotification {
  actionId: string;
  channel: ChannelKind;
  recipients: string[];
  message: string;
}

/** Delivery transport for executor-sent notifications. */
export interface NotificationChannel {
  send(notification: OutboundNotification): Promise<void>;
}

/**
 * Records outbound messages in the event log instead of delivering them.
 * Hosts wire a real email or chat transport in its place.
 */
export class LoggingNotificationChannel implements NotificationChannel {
  constructor(private readonly logger: EventLogger) {}

  async send(notification: OutboundNotification): Promise<void> {
    this.logger.log('info', 'notification.sent', {
      actionId: notification.actionId,
      channel: notification.channel,
      recipients: notification.recipients,
      message: notification.message,
    });
  }
}
