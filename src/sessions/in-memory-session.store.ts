import { Injectable } from '@nestjs/common';
import { Session, SessionStore } from './session.types';

/** Process-local store; sessions are lost on restart. */
@Injectable()
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  async get(userId: string): Promise<Session | null> {
    const session = this.sessions.get(userId);
    return session ? structuredClone(session) : null;
  }

  async set(session: Session): Promise<void> {
    this.sessions.set(session.userId, structuredClone(session));
  }

  async clear(userId: string): Promise<void> {
    this.sessions.delete(userId);
  }
}
