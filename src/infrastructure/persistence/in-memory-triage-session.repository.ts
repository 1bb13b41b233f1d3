import { Injectable } from '@nestjs/common';
import { TriageSession } from '../../core/domain/entities/triage-session.entity';
import { TriageSessionRepository } from '../../core/domain/repositories/triage-session.repository';

/**
 * In-memory session store. Sessions do not survive a restart.
 */
@Injectable()
export class InMemoryTriageSessionRepository implements TriageSessionRepository {
  private sessions: Map<string, TriageSession> = new Map();

  async save(session: TriageSession): Promise<TriageSession> {
    this.sessions.set(session.id, session);
    return session;
  }

  async findById(id: string): Promise<TriageSession | null> {
    return this.sessions.get(id) ?? null;
  }

  async delete(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }
}
