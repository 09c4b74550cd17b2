import type { INameDirectory } from '../../domain/ports/INameDirectory.js';
import type {
  INotificationChannel,
  NotificationResult,
} from '../../domain/ports/INotificationChannel.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

export interface NotifyRecipientInput {
  sessionId: string;
  recipient: string;
  requester: string;
}

/**
 * Use case for telling the person being visited that someone is waiting.
 * Delivery failures are logged and reported in the result, never thrown.
 */
export class NotifyRecipient {
  constructor(
    private readonly channel: INotificationChannel,
    private readonly directory: INameDirectory,
    private readonly logger: ILogger
  ) {}

  async execute(input: NotifyRecipientInput): Promise<NotificationResult> {
    const handle = this.directory.lookup(input.recipient);
    if (!handle) {
      this.logger.warn('Recipient not in directory, using spoken name', {
        sessionId: input.sessionId,
        recipient: input.recipient,
      });
    }

    this.logger.info('Executing NotifyRecipient use case', {
      sessionId: input.sessionId,
      channel: this.channel.name,
      recipient: input.recipient,
      handle,
    });

    try {
      const result = await this.channel.notify({
        sessionId: input.sessionId,
        recipientName: input.recipient,
        recipientHandle: handle ?? input.recipient,
        requesterName: input.requester,
        message: `${input.requester} is at the front desk to see you.`,
      });

      if (result.success) {
        this.logger.info('Recipient notified', { sessionId: input.sessionId });
      } else {
        this.logger.warn('Notification was not delivered', {
          sessionId: input.sessionId,
          error: result.error,
        });
      }
      return result;
    } catch (error) {
      this.logger.error('Error notifying recipient', error, { sessionId: input.sessionId });
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
