import { Inject, Injectable, Logger } from '@nestjs/common';
import { ExclusiveResource } from '../../common/exclusive-resource';
import { ASSISTANT_CONFIG, AssistantConfig } from '../../config/assistant.config';
import { ContextStore } from './context.store';

export interface Session {
  id: string;
  store: ContextStore;
  /** Serializes turns: one utterance is fully handled before the next. */
  lease: ExclusiveResource;
  lastActiveAt: number;
}

/** Context stores keyed by session id, evicted after an idle TTL. */
@Injectable()
export class ContextStoreRegistry {
  private readonly logger = new Logger(ContextStoreRegistry.name);
  private readonly sessions = new Map<string, Session>();

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  getOrCreate(sessionId: string, now: number = Date.now()): Session {
    this.cleanup(now);
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        id: sessionId,
        store: new ContextStore({
          historyCapacity: this.config.historyCapacity,
          visionStaleAfterTurns: this.config.visionStaleAfterTurns,
        }),
        lease: new ExclusiveResource(`session:${sessionId}`),
        lastActiveAt: now,
      };
      this.sessions.set(sessionId, session);
      this.logger.debug(`Session ${sessionId} created`);
    }
    session.lastActiveAt = now;
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  private cleanup(now: number): void {
    for (const [id, session] of this.sessions) {
      const age = now - session.lastActiveAt;
      if (age > this.config.sessionTtlMs && !session.lease.busy) {
        this.sessions.delete(id);
        this.logger.debug(`Session ${id} expired`);
      }
    }
  }
}
