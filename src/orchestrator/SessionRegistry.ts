/**
 * SessionRegistry - At most one live completion session per path.
 *
 * Beginning a session for a path that already has a pending one supersedes
 * it: the old session's signal is aborted and its state becomes `superseded`,
 * so its result is thrown away when it arrives.
 */

import { v4 as uuidv4 } from 'uuid';
import { FileSession, SessionState } from '../types';

interface SessionEntry {
  session: FileSession;
  controller: AbortController;
}

export type TerminalState = Extract<SessionState, 'completed' | 'failed' | 'superseded'>;

export class SessionRegistry {
  private sessions: Map<string, SessionEntry> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Start a session for `filePath`, superseding any pending one.
   */
  begin(filePath: string): FileSession {
    this.supersede(filePath);

    const controller = new AbortController();
    const session: FileSession = {
      id: uuidv4(),
      path: filePath,
      state: 'pending',
      startedAt: this.now(),
      signal: controller.signal,
    };
    this.sessions.set(filePath, { session, controller });
    return session;
  }

  /**
   * Supersede the pending session for `filePath`, if any.
   *
   * @returns The superseded session
   */
  supersede(filePath: string): FileSession | undefined {
    const entry = this.sessions.get(filePath);
    if (!entry) {
      return undefined;
    }
    this.sessions.delete(filePath);
    if (entry.session.state === 'pending') {
      entry.session.state = 'superseded';
      entry.controller.abort();
    }
    return entry.session;
  }

  /**
   * True while `session` is the pending session for its path.
   */
  isCurrent(session: FileSession): boolean {
    const entry = this.sessions.get(session.path);
    return entry?.session.id === session.id && session.state === 'pending';
  }

  /**
   * Move a pending session to a terminal state and tear it down. A session
   * that is no longer pending keeps its state.
   */
  finish(session: FileSession, state: TerminalState): boolean {
    if (session.state !== 'pending') {
      return false;
    }
    session.state = state;
    const entry = this.sessions.get(session.path);
    if (entry?.session.id === session.id) {
      this.sessions.delete(session.path);
    }
    return true;
  }

  get(filePath: string): FileSession | undefined {
    return this.sessions.get(filePath)?.session;
  }

  /** State of `filePath`; `idle` when no session is live */
  stateOf(filePath: string): SessionState {
    return this.sessions.get(filePath)?.session.state ?? 'idle';
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Supersede every pending session (shutdown).
   */
  cancelAll(): number {
    let cancelled = 0;
    for (const filePath of [...this.sessions.keys()]) {
      if (this.supersede(filePath)?.state === 'superseded') {
        cancelled++;
      }
    }
    return cancelled;
  }
}
