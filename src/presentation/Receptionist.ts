import type { AbstractOutput } from '../domain/entities/Output.js';
import type { Trigger } from '../domain/entities/Trigger.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { INameDirectory } from '../domain/ports/INameDirectory.js';
import type { INotificationChannel } from '../domain/ports/INotificationChannel.js';
import type { ISessionStore } from '../domain/ports/ISessionStore.js';
import {
  DialogStateResolver,
  IntentRouter,
  NotifyRecipient,
  ResponseBuilder,
} from '../application/index.js';
import { TriggerMapper } from '../infrastructure/mappers/TriggerMapper.js';

export interface ReceptionistConfig {
  officeName: string;
  cardTitle: string;
  oneShotSessionFallback?: boolean;
  notifyOncePerSession?: boolean;
}

export interface ReceptionistDependencies {
  sessions: ISessionStore;
  channel: INotificationChannel;
  directory: INameDirectory;
}

/**
 * Front-desk skill: takes platform envelopes, returns abstract output
 */
export class Receptionist {
  private readonly router: IntentRouter;
  private readonly sessions: ISessionStore;
  private readonly directory: INameDirectory;

  constructor(
    dependencies: ReceptionistDependencies,
    private readonly logger: ILogger,
    config: ReceptionistConfig
  ) {
    this.sessions = dependencies.sessions;
    this.directory = dependencies.directory;

    const resolver = new DialogStateResolver(
      dependencies.sessions,
      logger.child({ component: 'DialogStateResolver' }),
      { oneShotSessionFallback: config.oneShotSessionFallback }
    );
    const responses = new ResponseBuilder({
      officeName: config.officeName,
      cardTitle: config.cardTitle,
    });
    const notifier = new NotifyRecipient(
      dependencies.channel,
      dependencies.directory,
      logger.child({ component: 'NotifyRecipient' })
    );

    this.router = new IntentRouter(
      resolver,
      responses,
      dependencies.sessions,
      notifier,
      logger.child({ component: 'IntentRouter' }),
      { notifyOncePerSession: config.notifyOncePerSession }
    );
  }

  /**
   * Handle one raw request body from the platform
   */
  handle(body: unknown): AbstractOutput | null {
    const envelope = TriggerMapper.parseEnvelope(body);
    return this.handleTrigger(TriggerMapper.toTrigger(envelope));
  }

  handleTrigger(trigger: Trigger): AbstractOutput | null {
    const output = this.router.route(trigger);
    this.logger.debug('Turn handled', {
      sessionId: trigger.sessionId,
      output: output?.type ?? 'none',
    });
    return output;
  }

  get activeSessions(): number {
    return this.sessions.size();
  }

  get directoryNames(): number {
    return this.directory.size();
  }
}
