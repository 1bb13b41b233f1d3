import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PlatformGatewayRegistry } from '../domain/repositories/platform-gateway.repository';
import type { RemediationAction } from '../domain/repositories/remediation-action.repository';
import type { TriageSessionRepository } from '../domain/repositories/triage-session.repository';
import {
  PLATFORM_GATEWAY_REGISTRY_TOKEN,
  REMEDIATION_ACTION_TOKEN,
  TRIAGE_SESSION_REPOSITORY_TOKEN,
} from '../domain/repositories/injection-tokens';
import { FinalReport } from '../domain/entities/triage-report.entity';
import { TriageSession } from '../domain/entities/triage-session.entity';
import { SessionNotFoundError } from '../domain/errors/triage.errors';
import { DEFAULT_CONCURRENCY, RemediationOrchestratorService } from '../services/remediation-orchestrator.service';
import { TriageReportService } from '../services/triage-report.service';

export interface RunRemediationOptions {
  concurrency?: number;
}

@Injectable()
export class RunRemediationUseCase {
  private readonly logger = new Logger(RunRemediationUseCase.name);

  constructor(
    @Inject(PLATFORM_GATEWAY_REGISTRY_TOKEN) private readonly gateways: PlatformGatewayRegistry,
    @Inject(REMEDIATION_ACTION_TOKEN) private readonly remediation: RemediationAction,
    @Inject(TRIAGE_SESSION_REPOSITORY_TOKEN) private readonly sessions: TriageSessionRepository,
    private readonly orchestrator: RemediationOrchestratorService,
    private readonly reports: TriageReportService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Drive every directive-set comment of the session and return the final report.
   * The session is discarded afterwards unless a comment still waits for a rationale.
   */
  async execute(sessionId: string, options: RunRemediationOptions = {}): Promise<FinalReport> {
    const session = await this.requireSession(sessionId);
    const { batch } = session;
    const signal = session.beginRun();

    try {
      const run = await this.orchestrator.run(
        batch,
        { gateway: this.gateways.forPlatform(batch.reviewRef.platform), remediation: this.remediation },
        { concurrency: options.concurrency ?? this.defaultConcurrency(), signal },
      );
      const report = this.reports.buildFinalReport(batch, run);

      if (batch.all().some((comment) => comment.awaitingRationale)) {
        this.logger.log(`Keeping session ${sessionId}: won't-fix rationale still missing`);
      } else {
        await this.sessions.delete(sessionId);
      }
      return report;
    } finally {
      session.endRun();
    }
  }

  async cancel(sessionId: string): Promise<boolean> {
    const session = await this.requireSession(sessionId);
    const cancelled = session.cancel();
    if (cancelled) {
      this.logger.warn(`Cancelling remediation for session ${sessionId}`);
    }
    return cancelled;
  }

  private defaultConcurrency(): number {
    const configured = Number(this.configService.get<string | number>('REMEDIATION_CONCURRENCY', DEFAULT_CONCURRENCY));
    return Number.isInteger(configured) && configured > 0 ? configured : DEFAULT_CONCURRENCY;
  }

  private async requireSession(sessionId: string): Promise<TriageSession> {
    const session = await this.sessions.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}
