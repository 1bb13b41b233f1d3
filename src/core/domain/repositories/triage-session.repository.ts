import { TriageSession } from '../entities/triage-session.entity';

export interface TriageSessionRepository {
  save(session: TriageSession): Promise<TriageSession>;
  findById(id: string): Promise<TriageSession | null>;
  delete(id: string): Promise<boolean>;
}
