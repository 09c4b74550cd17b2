import { describe, it, expect, vi } from 'vitest';
import { LoggingNotificationChannel } from './LoggingNotificationChannel.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

describe('LoggingNotificationChannel', () => {
  it('should log the notification and report success', async () => {
    const mockLogger: ILogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    const channel = new LoggingNotificationChannel(mockLogger);

    const result = await channel.notify({
      sessionId: 's1',
      recipientName: 'Kevin',
      recipientHandle: '@kevin',
      requesterName: 'Sam',
      message: 'Sam is at the front desk to see you.',
    });

    expect(result).toEqual({ success: true });
    expect(mockLogger.info).toHaveBeenCalledWith('Visitor notification', {
      sessionId: 's1',
      to: '@kevin',
      text: 'Sam is at the front desk to see you.',
    });
  });
});
