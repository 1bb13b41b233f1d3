import { describe, it, expect, beforeEach } from 'vitest';
import { TriageReportService } from '../../../src/core/services/triage-report.service';
import { RemediationOrchestratorService } from '../../../src/core/services/remediation-orchestrator.service';
import { DirectiveResolverService } from '../../../src/core/services/directive-resolver.service';
import { CommentBatch, StatusKind } from '../../../src/core/domain/entities/comment-batch.entity';
import {
  CommentCategory,
  CommentSeverity,
  CommentState,
  Directive,
} from '../../../src/core/domain/entities/review-comment.entity';
import { MockPlatformGateway } from '../../mocks/platform-gateway.mock';
import { MockRemediationAction } from '../../mocks/remediation-action.mock';
import { ingest, ingestAndClassify, rawComment, reviewRef } from '../../mocks/comment.fixtures';

function scenarioBatch(): CommentBatch {
  return ingestAndClassify([
    rawComment('c1', {
      body: 'This concatenation allows SQL injection.',
      location: { filePath: 'src/db.ts', line: 12 },
      mergeBlocking: true,
      onChangedLine: true,
    }),
    rawComment('c2', { body: 'Why does this loop start at 1?', isQuestion: true }),
    rawComment('c3', { body: 'Typo: "recieve" should be "receive".', location: { filePath: 'README.md', line: 3 } }),
  ]);
}

describe('TriageReportService', () => {
  let reports: TriageReportService;

  beforeEach(() => {
    reports = new TriageReportService();
  });

  describe('buildDistribution', () => {
    it('counts classified comments by category and severity', () => {
      const distribution = reports.buildDistribution(scenarioBatch());

      expect(distribution.total).toBe(3);
      expect(distribution.unclassified).toBe(0);
      expect(distribution.reviewRef).toEqual(reviewRef);
      expect(distribution.matrix[CommentCategory.SECURITY][CommentSeverity.CRITICAL]).toBe(1);
      expect(distribution.matrix[CommentCategory.CLARIFICATIONS][CommentSeverity.MEDIUM]).toBe(1);
      expect(distribution.matrix[CommentCategory.DOCUMENTATION][CommentSeverity.MEDIUM]).toBe(1);
      expect(distribution.byCategory).toEqual({
        [CommentCategory.SECURITY]: 1,
        [CommentCategory.CODE_CHANGES]: 0,
        [CommentCategory.DOCUMENTATION]: 1,
        [CommentCategory.CLARIFICATIONS]: 1,
        [CommentCategory.BUGS_AND_SMELLS]: 0,
        [CommentCategory.OTHER]: 0,
      });
      expect(distribution.bySeverity).toEqual({
        [CommentSeverity.CRITICAL]: 1,
        [CommentSeverity.HIGH]: 0,
        [CommentSeverity.MEDIUM]: 2,
        [CommentSeverity.INFO]: 0,
      });
    });

    it('counts unclassified comments separately', () => {
      const distribution = reports.buildDistribution(ingest([rawComment('c1'), rawComment('c2')]));

      expect(distribution.total).toBe(2);
      expect(distribution.unclassified).toBe(2);
      expect(Object.values(distribution.bySeverity)).toEqual([0, 0, 0, 0]);
    });
  });

  describe('buildFinalReport', () => {
    it('partitions the scenario batch after an auto-fix of critical comments', async () => {
      const batch = scenarioBatch();
      new DirectiveResolverService().resolve(batch, [
        { target: { kind: 'severities', severities: [CommentSeverity.CRITICAL] }, directive: Directive.AUTO_FIX },
      ]);
      const run = await new RemediationOrchestratorService().run(batch, {
        gateway: new MockPlatformGateway(),
        remediation: new MockRemediationAction(),
      });

      const report = reports.buildFinalReport(batch, run);

      expect(report.total).toBe(3);
      expect(report.cancelled).toBe(false);
      expect(report.generatedAt).toEqual(expect.any(String));
      expect(report.partitions.autoFixed).toEqual([
        {
          id: 'c1',
          category: CommentCategory.SECURITY,
          severity: CommentSeverity.CRITICAL,
          state: CommentState.FIXED,
          directive: Directive.AUTO_FIX,
          location: { filePath: 'src/db.ts', line: 12 },
          summary: 'Fixed in fix-c1',
        },
      ]);
      expect(report.partitions.unaddressed.map((entry) => [entry.id, entry.summary])).toEqual([
        ['c2', 'No directive given'],
        ['c3', 'No directive given'],
      ]);
      expect(report.partitions.autoFixFailed).toEqual([]);
      expect(report.partitions.wontFix).toEqual([]);
      expect(report.partitions.manual).toEqual([]);
    });

    it('summarises every outcome', async () => {
      const batch = ingestAndClassify([
        rawComment('failed'),
        rawComment('wontfix'),
        rawComment('manual'),
        rawComment('norationale'),
      ]);
      batch.get('failed').assignDirective(Directive.AUTO_FIX);
      batch.get('wontfix').assignDirective(Directive.WONT_FIX, 'Kept for compatibility');
      batch.get('manual').assignDirective(Directive.MANUAL);
      batch.get('norationale').assignDirective(Directive.WONT_FIX);
      const gateway = new MockPlatformGateway().failPostsOf(StatusKind.WONT_FIX_RATIONALE);
      const remediation = new MockRemediationAction().on('failed', async () => ({ ok: false, reason: 'lint errors' }));

      const run = await new RemediationOrchestratorService().run(batch, { gateway, remediation });
      const report = reports.buildFinalReport(batch, run);

      expect(report.partitions.autoFixFailed.map((entry) => entry.summary)).toEqual(['Fix failed: lint errors']);
      expect(report.partitions.wontFix.map((entry) => entry.summary)).toEqual(['Kept for compatibility']);
      expect(report.partitions.manual.map((entry) => entry.summary)).toEqual(['acknowledged for manual follow-up']);
      expect(report.partitions.unaddressed.map((entry) => [entry.id, entry.summary])).toEqual([
        ['norationale', "Awaiting a won't-fix rationale"],
      ]);
      expect(report.rejections.map((rejection) => rejection.code)).toEqual(['MISSING_RATIONALE']);
      expect(report.warnings).toEqual([
        {
          type: 'PostingIncomplete',
          commentId: 'wontfix',
          kind: StatusKind.WONT_FIX_RATIONALE,
          reason: 'wont_fix_rationale rejected by platform',
        },
      ]);
    });

    it('lists unclassified comments as unaddressed', () => {
      const report = reports.buildFinalReport(ingest([rawComment('c1')]));

      expect(report.cancelled).toBe(false);
      expect(report.rejections).toEqual([]);
      expect(report.partitions.unaddressed.map((entry) => entry.summary)).toEqual(['Not classified']);
    });
  });
});
