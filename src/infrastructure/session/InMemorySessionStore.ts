import type { ISessionStore } from '../../domain/ports/ISessionStore.js';
import type {
  SessionAttributes,
  SessionAttributeKey,
} from '../../domain/entities/SessionAttributes.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

export interface InMemorySessionStoreOptions {
  /**
   * Drop a conversation nobody has touched for this long. Platforms do not
   * always send a session-end event.
   */
  idleTtlMs?: number;
}

interface SessionEntry {
  attributes: SessionAttributes;
  touchedAt: number;
}

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000;

/**
 * Process-local session store keyed by conversation id.
 * Reads return copies; only `set` changes what is held.
 */
export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly idleTtlMs: number;

  constructor(
    private readonly logger: ILogger,
    options: InMemorySessionStoreOptions = {}
  ) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_TTL_MS;
  }

  open(sessionId: string): void {
    this.evictIdle();
    const entry = this.sessions.get(sessionId);
    if (entry) {
      this.logger.warn('Session already open, keeping its attributes', { sessionId });
      entry.touchedAt = Date.now();
      return;
    }
    this.sessions.set(sessionId, { attributes: {}, touchedAt: Date.now() });
  }

  get(sessionId: string): SessionAttributes {
    const entry = this.sessions.get(sessionId);
    if (!entry) return {};

    if (this.isIdle(entry, Date.now())) {
      this.drop(sessionId);
      return {};
    }
    entry.touchedAt = Date.now();
    return { ...entry.attributes };
  }

  set<K extends SessionAttributeKey>(
    sessionId: string,
    key: K,
    value: NonNullable<SessionAttributes[K]>
  ): void {
    this.evictIdle();
    // Platforms may skip the session-start event; open lazily
    const entry = this.sessions.get(sessionId) ?? { attributes: {}, touchedAt: 0 };
    entry.attributes[key] = value;
    entry.touchedAt = Date.now();
    this.sessions.set(sessionId, entry);
    this.logger.trace('Session attribute set', { sessionId, key });
  }

  close(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  size(): number {
    this.evictIdle();
    return this.sessions.size;
  }

  private isIdle(entry: SessionEntry, now: number): boolean {
    return now - entry.touchedAt >= this.idleTtlMs;
  }

  private evictIdle(): void {
    const now = Date.now();
    for (const [sessionId, entry] of this.sessions) {
      if (this.isIdle(entry, now)) {
        this.drop(sessionId);
      }
    }
  }

  private drop(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.logger.debug('Idle session expired', { sessionId });
  }
}
