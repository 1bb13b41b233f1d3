import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ReviewRef } from '../domain/entities/raw-comment.entity';
import { DistributionReport } from '../domain/entities/triage-report.entity';
import { TriageSession } from '../domain/entities/triage-session.entity';
import type { PlatformGatewayRegistry } from '../domain/repositories/platform-gateway.repository';
import type { TriageSessionRepository } from '../domain/repositories/triage-session.repository';
import {
  PLATFORM_GATEWAY_REGISTRY_TOKEN,
  TRIAGE_SESSION_REPOSITORY_TOKEN,
} from '../domain/repositories/injection-tokens';
import { CommentStoreService } from '../services/comment-store.service';
import { CommentClassifierService } from '../services/comment-classifier.service';
import { TriageReportService } from '../services/triage-report.service';

export interface TriageOverview {
  session: TriageSession;
  distribution: DistributionReport;
}

/**
 * Fetch, ingest and classify the comments of one merge/pull request, and
 * open a session holding the resulting batch.
 */
@Injectable()
export class StartTriageUseCase {
  private readonly logger = new Logger(StartTriageUseCase.name);

  constructor(
    @Inject(PLATFORM_GATEWAY_REGISTRY_TOKEN) private readonly gateways: PlatformGatewayRegistry,
    @Inject(TRIAGE_SESSION_REPOSITORY_TOKEN) private readonly sessions: TriageSessionRepository,
    private readonly commentStore: CommentStoreService,
    private readonly classifier: CommentClassifierService,
    private readonly reports: TriageReportService,
  ) {}

  async execute(reviewRef: ReviewRef): Promise<TriageOverview> {
    const gateway = this.gateways.forPlatform(reviewRef.platform);

    // FetchError and IngestError propagate: nothing has been posted yet
    const rawComments = await gateway.fetchComments(reviewRef);
    const batch = this.commentStore.ingest(reviewRef, rawComments);
    this.classifier.classifyBatch(batch);

    const session = await this.sessions.save(new TriageSession(uuidv4(), batch));
    this.logger.log(`Opened triage session ${session.id} with ${batch.size} comment(s)`);

    return { session, distribution: this.reports.buildDistribution(batch) };
  }
}
