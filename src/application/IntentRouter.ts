import type { Decision } from '../domain/entities/Decision.js';
import type { AbstractOutput } from '../domain/entities/Output.js';
import type { Trigger } from '../domain/entities/Trigger.js';
import { UnknownIntentError } from '../domain/errors/UnknownIntentError.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ISessionStore } from '../domain/ports/ISessionStore.js';
import type { DialogStateResolver } from './DialogStateResolver.js';
import type { ResponseBuilder } from './ResponseBuilder.js';
import type { NotifyRecipient } from './use-cases/NotifyRecipient.js';

export interface IntentRouterOptions {
  /**
   * Skip the notification when a completed turn repeats the pair already
   * notified in this conversation. A changed recipient or requester is
   * always notified. Repeated turns still repeat the confirmation.
   */
  notifyOncePerSession?: boolean;
}

/**
 * Dispatches one trigger per turn, either to the dialog resolver or to a
 * canned response. Returns null for lifecycle events that produce no output.
 */
export class IntentRouter {
  private readonly notifyOncePerSession: boolean;

  constructor(
    private readonly resolver: DialogStateResolver,
    private readonly responses: ResponseBuilder,
    private readonly sessions: ISessionStore,
    private readonly notifier: Pick<NotifyRecipient, 'execute'>,
    private readonly logger: ILogger,
    options: IntentRouterOptions = {}
  ) {
    this.notifyOncePerSession = options.notifyOncePerSession ?? true;
  }

  route(trigger: Trigger): AbstractOutput | null {
    this.logger.info('Routing trigger', {
      kind: trigger.kind,
      sessionId: trigger.sessionId,
      requestId: trigger.requestId,
    });

    switch (trigger.kind) {
      case 'direct-request':
        return this.respond(
          trigger.sessionId,
          this.resolver.resolveOneShot(trigger.sessionId, trigger.slots)
        );

      case 'dialog-continuation':
        return this.respond(
          trigger.sessionId,
          this.resolver.resolveDialog(trigger.sessionId, trigger.slots)
        );

      case 'launch':
        return this.responses.welcome();

      case 'help':
        return this.responses.help();

      case 'cancel':
      case 'stop':
        // The goodbye ends the conversation; platforms send no session-end after it
        this.sessions.close(trigger.sessionId);
        return this.responses.goodbye();

      case 'session-start':
        this.sessions.open(trigger.sessionId);
        this.logger.info('Session started', { sessionId: trigger.sessionId });
        return null;

      case 'session-end':
        this.sessions.close(trigger.sessionId);
        this.logger.info('Session ended', { sessionId: trigger.sessionId });
        return null;

      default: {
        const unhandled: never = trigger;
        throw new UnknownIntentError(describeTrigger(unhandled));
      }
    }
  }

  private respond(sessionId: string, decision: Decision): AbstractOutput {
    if (decision.type === 'complete') {
      this.dispatchNotification(sessionId, decision.recipient, decision.requester);
    }
    return this.responses.build(decision);
  }

  /**
   * Fire-and-forget: the spoken confirmation never waits on delivery
   */
  private dispatchNotification(sessionId: string, recipient: string, requester: string): void {
    if (this.notifyOncePerSession) {
      const previous = this.sessions.get(sessionId).notifiedFor;
      if (previous?.recipient === recipient && previous.requester === requester) {
        this.logger.debug('Recipient already notified in this session', { sessionId });
        return;
      }
      this.sessions.set(sessionId, 'notifiedFor', { recipient, requester });
    }

    this.notifier.execute({ sessionId, recipient, requester }).catch((error) => {
      this.logger.error('Notification dispatch failed', error, { sessionId });
    });
  }
}

function describeTrigger(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return String(value);
}
