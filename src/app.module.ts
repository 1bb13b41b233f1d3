import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';

// Core domain providers
import { CommentSanitizerService, DEFAULT_MAX_COMMENT_LENGTH } from './core/services/comment-sanitizer.service';
import { CommentStoreService } from './core/services/comment-store.service';
import { CommentClassifierService } from './core/services/comment-classifier.service';
import { DirectiveResolverService } from './core/services/directive-resolver.service';
import { RemediationOrchestratorService } from './core/services/remediation-orchestrator.service';
import { TriageReportService } from './core/services/triage-report.service';
import { StartTriageUseCase } from './core/usecases/start-triage.usecase';
import { GetTriageSessionUseCase } from './core/usecases/get-triage-session.usecase';
import { ResolveDirectivesUseCase } from './core/usecases/resolve-directives.usecase';
import { RunRemediationUseCase } from './core/usecases/run-remediation.usecase';
import {
  PLATFORM_GATEWAY_REGISTRY_TOKEN,
  REMEDIATION_ACTION_TOKEN,
  TRIAGE_SESSION_REPOSITORY_TOKEN,
} from './core/domain/repositories/injection-tokens';

// Infrastructure providers
import { GithubPlatformGateway } from './infrastructure/github/github-platform.gateway';
import { GitlabPlatformGateway } from './infrastructure/gitlab/gitlab-platform.gateway';
import { PlatformGatewayFactory } from './infrastructure/platform/platform-gateway.factory';
import { DEFAULT_PLATFORM_TIMEOUT_MS } from './infrastructure/platform/platform-gateway.adapter';
import { HttpRemediationAction } from './infrastructure/remediation/http-remediation.action';
import { InMemoryTriageSessionRepository } from './infrastructure/persistence/in-memory-triage-session.repository';

// Controllers
import { TriageController } from './presentation/controllers/triage.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    HttpModule.registerAsync({
      useFactory: (configService: ConfigService) => ({
        timeout:
          Number(configService.get<string | number>('PLATFORM_TIMEOUT_MS', DEFAULT_PLATFORM_TIMEOUT_MS)) ||
          DEFAULT_PLATFORM_TIMEOUT_MS,
      }),
      inject: [ConfigService],
    }),
  ],
  controllers: [TriageController],
  providers: [
    // Services
    {
      provide: CommentSanitizerService,
      useFactory: (configService: ConfigService) => {
        const maxLength = Number(configService.get<string | number>('COMMENT_MAX_LENGTH', DEFAULT_MAX_COMMENT_LENGTH));
        return new CommentSanitizerService(maxLength > 0 ? maxLength : DEFAULT_MAX_COMMENT_LENGTH);
      },
      inject: [ConfigService],
    },
    CommentStoreService,
    CommentClassifierService,
    DirectiveResolverService,
    RemediationOrchestratorService,
    TriageReportService,

    // Platform gateways
    GithubPlatformGateway,
    GitlabPlatformGateway,
    { provide: PLATFORM_GATEWAY_REGISTRY_TOKEN, useClass: PlatformGatewayFactory },

    // Remediation and session storage
    { provide: REMEDIATION_ACTION_TOKEN, useClass: HttpRemediationAction },
    { provide: TRIAGE_SESSION_REPOSITORY_TOKEN, useClass: InMemoryTriageSessionRepository },

    // Use cases
    StartTriageUseCase,
    GetTriageSessionUseCase,
    ResolveDirectivesUseCase,
    RunRemediationUseCase,
  ],
})
export class AppModule {}
