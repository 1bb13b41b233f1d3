import { Inject, Injectable } from '@nestjs/common';
import type { TriageSessionRepository } from '../domain/repositories/triage-session.repository';
import { TRIAGE_SESSION_REPOSITORY_TOKEN } from '../domain/repositories/injection-tokens';
import { SessionNotFoundError } from '../domain/errors/triage.errors';
import { TriageReportService } from '../services/triage-report.service';
import { TriageOverview } from './start-triage.usecase';

@Injectable()
export class GetTriageSessionUseCase {
  constructor(
    @Inject(TRIAGE_SESSION_REPOSITORY_TOKEN) private readonly sessions: TriageSessionRepository,
    private readonly reports: TriageReportService,
  ) {}

  async execute(sessionId: string): Promise<TriageOverview> {
    const session = await this.sessions.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return { session, distribution: this.reports.buildDistribution(session.batch) };
  }
}
