import { randomUUID } from 'node:crypto';
import type { SessionState } from '../types';
import { deepFreeze } from '../util/freeze';

export function newSessionId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Process-local holder of the latest snapshot per interactive session.
 * Snapshots are replaced, never edited; nothing outlives the process.
 */
export class SessionStore {
  private sessions: Map<string, SessionState> = new Map();

  create(sessionId: string = newSessionId()): SessionState {
    const session: SessionState = Object.freeze({ sessionId, status: 'idle' });
    this.sessions.set(sessionId, session);
    return session;
  }

  get(sessionId: string): SessionState | null {
    return this.sessions.get(sessionId) ?? null;
  }

  require(sessionId: string): SessionState {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /** Overwrite the session with a newer snapshot. The snapshot is frozen in place, stage results included. */
  commit(snapshot: SessionState): void {
    this.require(snapshot.sessionId);
    this.sessions.set(snapshot.sessionId, deepFreeze(snapshot));
  }

  /** Drop every stage result and return the session to idle. */
  reset(sessionId: string): SessionState {
    this.require(sessionId);
    return this.create(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}
