/**
 * SessionRegistry - in-memory map of live chat sessions
 *
 * Sessions idle for longer than `idleMs` are dropped by `sweep`, which the
 * HTTP host runs on an interval. Both a turn and a lookup through `get`
 * count as activity. A session with a turn in flight is never swept.
 * Nothing survives a restart.
 */

import { v4 as uuidv4 } from 'uuid';
import { ChatSession } from '../orchestrator/chat-session';
import { NotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionRegistry');

export type SessionFactory = (sessionId: string) => ChatSession;

export interface SessionRegistryOptions {
  idleMs: number;
  now?: () => number;
}

interface RegistryEntry {
  session: ChatSession;
  accessedAt: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, RegistryEntry>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(
    private readonly factory: SessionFactory,
    private readonly options: SessionRegistryOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  create(): ChatSession {
    const session = this.factory(uuidv4());
    this.sessions.set(session.id, { session, accessedAt: this.now() });
    logger.info('Session created', { sessionId: session.id, active: this.sessions.size });
    return session;
  }

  /**
   * Look up a session and mark it active
   *
   * @throws NotFoundError for an unknown or expired session
   */
  get(sessionId: string): ChatSession {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new NotFoundError('Session', sessionId);
    }
    entry.accessedAt = this.now();
    return entry.session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  delete(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.info('Session closed', { sessionId, active: this.sessions.size });
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Drop idle sessions; returns how many were removed
   */
  sweep(): number {
    const cutoff = this.now() - this.options.idleMs;
    let removed = 0;

    for (const [sessionId, { session, accessedAt }] of this.sessions) {
      const lastSeen = Math.max(accessedAt, session.lastActivityAt.getTime());
      if (session.pendingTurns === 0 && lastSeen < cutoff) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }

    if (removed > 0) {
      logger.info(`Expired ${removed} idle sessions`, { active: this.sessions.size });
    }
    return removed;
  }

  /**
   * Sweep periodically without keeping the process alive
   */
  startSweeping(intervalMs: number = 60 * 1000): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  clear(): void {
    this.sessions.clear();
  }
}
