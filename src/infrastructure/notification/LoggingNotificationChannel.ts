import type {
  INotificationChannel,
  NotificationResult,
  VisitorNotification,
} from '../../domain/ports/INotificationChannel.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

/**
 * Channel used when no relay is configured: the notification only goes to the log
 */
export class LoggingNotificationChannel implements INotificationChannel {
  readonly name = 'log';

  constructor(private readonly logger: ILogger) {}

  async notify(notification: VisitorNotification): Promise<NotificationResult> {
    this.logger.info('Visitor notification', {
      sessionId: notification.sessionId,
      to: notification.recipientHandle,
      text: notification.message,
    });
    return { success: true };
  }
}
