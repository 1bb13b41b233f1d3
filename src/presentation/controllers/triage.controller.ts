import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StartTriageDto } from '../dtos/start-triage.dto';
import { ResolveDirectivesDto, toDirectiveSelection } from '../dtos/resolve-directives.dto';
import { RunRemediationDto } from '../dtos/run-remediation.dto';
import { toHttpException } from '../http-error.mapper';
import { StartTriageUseCase, TriageOverview } from '../../core/usecases/start-triage.usecase';
import { GetTriageSessionUseCase } from '../../core/usecases/get-triage-session.usecase';
import { ResolveDirectivesUseCase } from '../../core/usecases/resolve-directives.usecase';
import { RunRemediationUseCase } from '../../core/usecases/run-remediation.usecase';
import { ReviewRef } from '../../core/domain/entities/raw-comment.entity';
import { CommentSnapshot } from '../../core/domain/entities/review-comment.entity';
import { PostingWarning } from '../../core/domain/entities/comment-batch.entity';
import { DirectiveResolution } from '../../core/domain/entities/directive-selection.entity';
import { DistributionReport, FinalReport } from '../../core/domain/entities/triage-report.entity';

export interface TriageSessionView {
  id: string;
  createdAt: string;
  running: boolean;
  reviewRef: ReviewRef;
  comments: CommentSnapshot[];
  distribution: DistributionReport;
  warnings: PostingWarning[];
}

@ApiTags('triage')
@Controller('triage')
export class TriageController {
  constructor(
    private readonly startTriageUseCase: StartTriageUseCase,
    private readonly getTriageSessionUseCase: GetTriageSessionUseCase,
    private readonly resolveDirectivesUseCase: ResolveDirectivesUseCase,
    private readonly runRemediationUseCase: RunRemediationUseCase,
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Fetch and classify the review comments of a merge/pull request',
    description: 'Opens a triage session holding the classified comments and returns their distribution',
  })
  @ApiBody({
    type: StartTriageDto,
    examples: {
      github: { summary: 'GitHub pull request', value: { platform: 'github', projectId: 'owner/repo', mergeRequestId: 42 } },
      gitlab: { summary: 'GitLab merge request', value: { platform: 'gitlab', projectId: '12345', mergeRequestId: 7 } },
    },
  })
  @ApiResponse({ status: 201, description: 'Session opened.' })
  @ApiResponse({ status: 422, description: 'Comments could not be ingested (missing or duplicate ids).' })
  @ApiResponse({ status: 502, description: 'The platform could not be reached.' })
  async start(@Body() startTriageDto: StartTriageDto): Promise<TriageSessionView> {
    try {
      return this.toView(await this.startTriageUseCase.execute(startTriageDto.toReviewRef()));
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':sessionId')
  @ApiOperation({ summary: 'Get a triage session with its comments and distribution' })
  @ApiParam({ name: 'sessionId', description: 'The triage session id' })
  @ApiResponse({ status: 200, description: 'The session.' })
  @ApiResponse({ status: 404, description: 'Unknown session.' })
  async get(@Param('sessionId') sessionId: string): Promise<TriageSessionView> {
    try {
      return this.toView(await this.getTriageSessionUseCase.execute(sessionId));
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post(':sessionId/directives')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Assign directives to comments',
    description: 'Each selection targets comments by ids, categories or severities. The call is all-or-nothing.',
  })
  @ApiParam({ name: 'sessionId', description: 'The triage session id' })
  @ApiBody({
    type: ResolveDirectivesDto,
    examples: {
      bySeverity: {
        summary: 'Auto-fix critical comments, mark one as won\'t fix',
        value: {
          selections: [
            { directive: 'auto_fix', severities: ['critical'] },
            { directive: 'wont_fix', ids: ['issue-comment:101'], note: 'Out of scope for this change.' },
          ],
        },
      },
    },
  })
  @ApiResponse({ status: 200, description: 'Directives applied.' })
  @ApiResponse({ status: 400, description: 'A selection targets no axis or more than one.' })
  @ApiResponse({ status: 404, description: 'Unknown session or comment id.' })
  @ApiResponse({ status: 409, description: 'Conflicting directives for a comment, or a remediation run is in progress.' })
  async resolveDirectives(
    @Param('sessionId') sessionId: string,
    @Body() resolveDirectivesDto: ResolveDirectivesDto,
  ): Promise<DirectiveResolution> {
    try {
      const selections = resolveDirectivesDto.selections.map((selection, index) => toDirectiveSelection(selection, index));
      return await this.resolveDirectivesUseCase.execute(sessionId, selections);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post(':sessionId/remediation')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run remediation for every comment with a directive',
    description: 'Returns the final report once every selected comment reached a terminal state or the run was cancelled',
  })
  @ApiParam({ name: 'sessionId', description: 'The triage session id' })
  @ApiBody({ type: RunRemediationDto, required: false })
  @ApiResponse({ status: 200, description: 'The final report.' })
  @ApiResponse({ status: 404, description: 'Unknown session.' })
  @ApiResponse({ status: 409, description: 'A remediation run is already in progress for this session.' })
  async runRemediation(
    @Param('sessionId') sessionId: string,
    @Body() runRemediationDto: RunRemediationDto,
  ): Promise<FinalReport> {
    try {
      return await this.runRemediationUseCase.execute(sessionId, { concurrency: runRemediationDto.concurrency });
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':sessionId/remediation')
  @ApiOperation({ summary: 'Cancel the running remediation of a session' })
  @ApiParam({ name: 'sessionId', description: 'The triage session id' })
  @ApiResponse({ status: 200, description: '`cancelled` is false when nothing was running.' })
  @ApiResponse({ status: 404, description: 'Unknown session.' })
  async cancelRemediation(@Param('sessionId') sessionId: string): Promise<{ cancelled: boolean }> {
    try {
      return { cancelled: await this.runRemediationUseCase.cancel(sessionId) };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  private toView({ session, distribution }: TriageOverview): TriageSessionView {
    return {
      id: session.id,
      createdAt: session.createdAt.toISOString(),
      running: session.isRunning,
      reviewRef: session.batch.reviewRef,
      comments: session.batch.all().map((comment) => comment.toJSON()),
      distribution,
      warnings: session.batch.postingWarnings(),
    };
  }
}
