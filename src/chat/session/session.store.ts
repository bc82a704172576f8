import { Injectable } from '@nestjs/common';
import type { ConversationTurn } from '../../agents/agent.types';

export interface SessionMessage extends ConversationTurn {
  timestamp: string;
}

export interface ChatSession {
  sessionId: string;
  userId: string;
  /** Profile bound on the first turn; null when the session started without one. */
  profileId: string | null;
  history: SessionMessage[];
  userTurns: number;
  /** Epoch ms of the last lookup or recorded turn. */
  lastActiveAt: number;
}

export const MAX_SESSION_MESSAGES = 20;

/** In-process conversation history, dropped after 30 minutes of inactivity. */
@Injectable()
export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly TTL_MS = 30 * 60 * 1000; // 30 minutes

  get(sessionId: string): ChatSession | undefined {
    this.cleanup();
    const session = this.sessions.get(sessionId);
    if (session) session.lastActiveAt = Date.now();
    return session;
  }

  getOrCreate(
    sessionId: string,
    userId: string,
    profileId: string | null,
  ): ChatSession {
    const existing = this.get(sessionId);
    if (existing) return existing;

    const session: ChatSession = {
      sessionId,
      userId,
      profileId,
      history: [],
      userTurns: 0,
      lastActiveAt: Date.now(),
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  recordTurn(sessionId: string, userMessage: string, reply: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    const timestamp = new Date().toISOString();
    session.history.push(
      { role: 'user', content: userMessage, timestamp },
      { role: 'assistant', content: reply, timestamp },
    );
    session.userTurns += 1;
    session.lastActiveAt = Date.now();
    if (session.history.length > MAX_SESSION_MESSAGES) {
      session.history = session.history.slice(-MAX_SESSION_MESSAGES);
    }
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [id, session] of this.sessions) {
      if (now - session.lastActiveAt > this.TTL_MS) {
        this.sessions.delete(id);
      }
    }
  }
}
