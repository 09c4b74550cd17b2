/**
 * A completed front-desk request ready to be delivered
 */
export interface VisitorNotification {
  sessionId: string;
  recipientName: string;
  /** Address on the destination channel, falls back to the spoken name */
  recipientHandle: string;
  requesterName: string;
  message: string;
}

export interface NotificationResult {
  success: boolean;
  error?: string;
}

/**
 * Port interface for delivering notifications to the person being visited
 */
export interface INotificationChannel {
  readonly name: string;

  notify(notification: VisitorNotification): Promise<NotificationResult>;
}
