import { Inject, Injectable } from '@nestjs/common';
import type { TriageSessionRepository } from '../domain/repositories/triage-session.repository';
import { TRIAGE_SESSION_REPOSITORY_TOKEN } from '../domain/repositories/injection-tokens';
import { DirectiveResolution, DirectiveSelection } from '../domain/entities/directive-selection.entity';
import { RemediationInProgressError, SessionNotFoundError } from '../domain/errors/triage.errors';
import { DirectiveResolverService } from '../services/directive-resolver.service';

@Injectable()
export class ResolveDirectivesUseCase {
  constructor(
    @Inject(TRIAGE_SESSION_REPOSITORY_TOKEN) private readonly sessions: TriageSessionRepository,
    private readonly resolver: DirectiveResolverService,
  ) {}

  async execute(sessionId: string, selections: DirectiveSelection[]): Promise<DirectiveResolution> {
    const session = await this.sessions.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    if (session.isRunning) {
      throw new RemediationInProgressError(sessionId);
    }
    return this.resolver.resolve(session.batch, selections);
  }
}
