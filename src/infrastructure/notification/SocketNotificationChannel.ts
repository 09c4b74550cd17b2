import { io, Socket } from 'socket.io-client';
import type {
  INotificationChannel,
  NotificationResult,
  VisitorNotification,
} from '../../domain/ports/INotificationChannel.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

export interface SocketNotificationChannelConfig {
  socketUrl: string;
  apiKey: string;
  deskId: string;
  /** How long to wait for the relay to acknowledge a notification (ms) */
  timeoutMs?: number;
}

export type RelayConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Acknowledgement sent back by the relay for `visitor:notify`
 */
export interface RelayAck {
  ok: boolean;
  error?: string;
}

export const NOTIFY_EVENT = 'visitor:notify';

function parseAck(value: unknown): RelayAck {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return { ok: false, error: 'Malformed acknowledgement from relay' };
  }
  const error = 'error' in value && typeof value.error === 'string' ? value.error : undefined;
  return { ok: value.ok === true, ...(error && { error }) };
}

/**
 * Socket.IO client that forwards visitor notifications to a messaging relay.
 * Connects on first use and reuses the connection afterwards.
 */
export class SocketNotificationChannel implements INotificationChannel {
  readonly name = 'socket';
  private socket: Socket | null = null;
  private _connectionState: RelayConnectionState = 'disconnected';
  private connecting: Promise<void> | null = null;

  constructor(
    private readonly config: SocketNotificationChannelConfig,
    private readonly logger: ILogger
  ) {
    this.logger.info('SocketNotificationChannel initialized', {
      socketUrl: config.socketUrl,
      deskId: config.deskId,
    });
  }

  get connectionState(): RelayConnectionState {
    return this._connectionState;
  }

  private setConnectionState(state: RelayConnectionState): void {
    if (this._connectionState !== state) {
      this._connectionState = state;
      this.logger.info('Relay connection state changed', { state });
    }
  }

  async notify(notification: VisitorNotification): Promise<NotificationResult> {
    try {
      await this.ensureConnected();
      const ack = await this.emitWithCallback(
        NOTIFY_EVENT,
        {
          deskId: this.config.deskId,
          sessionId: notification.sessionId,
          to: notification.recipientHandle,
          recipientName: notification.recipientName,
          requesterName: notification.requesterName,
          text: notification.message,
          sentAt: new Date().toISOString(),
        },
        this.config.timeoutMs ?? 10000
      );

      return ack.ok ? { success: true } : { success: false, error: ack.error ?? 'Rejected by relay' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Relay notification failed', { sessionId: notification.sessionId, error: message });
      return { success: false, error: message };
    }
  }

  private ensureConnected(): Promise<void> {
    if (this.socket?.connected) return Promise.resolve();
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private connect(): Promise<void> {
    this.setConnectionState('connecting');
    this.socket?.disconnect();

    return new Promise((resolve, reject) => {
      const socket = io(this.config.socketUrl, {
        auth: {
          apiKey: this.config.apiKey,
          deskId: this.config.deskId,
        },
        reconnection: true,
        reconnectionAttempts: 10,
        reconnectionDelay: 5000,
        timeout: this.config.timeoutMs ?? 10000,
        transports: ['websocket', 'polling'],
      });
      this.socket = socket;

      socket.on('connect', () => {
        this.logger.info('Connected to relay', { socketId: socket.id });
        this.setConnectionState('connected');
        resolve();
      });

      socket.on('disconnect', (reason) => {
        this.logger.warn('Disconnected from relay', { reason });
        this.setConnectionState('disconnected');
      });

      socket.on('connect_error', (error) => {
        const wasConnecting = this._connectionState === 'connecting';
        this.logger.error('Relay connection error', error);
        this.setConnectionState('error');
        if (wasConnecting) {
          reject(error);
        }
      });
    });
  }

  private emitWithCallback(event: string, data: Record<string, unknown>, timeout: number): Promise<RelayAck> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket?.connected) {
        reject(new Error('Not connected to relay'));
        return;
      }

      const timeoutId = setTimeout(() => {
        reject(new Error(`Timeout waiting for ${event} acknowledgement`));
      }, timeout);

      socket.emit(event, data, (response: unknown) => {
        clearTimeout(timeoutId);
        resolve(parseAck(response));
      });
      this.logger.debug('Event emitted to relay with callback', { event });
    });
  }

  async disconnect(): Promise<void> {
    if (this.socket) {
      this.socket.disconnect();
      this.socket = null;
    }
    this.setConnectionState('disconnected');
  }
}
