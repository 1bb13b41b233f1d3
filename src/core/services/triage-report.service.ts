import { Injectable } from '@nestjs/common';
import { CommentBatch } from '../domain/entities/comment-batch.entity';
import {
  CommentCategory,
  CommentSeverity,
  CommentState,
  Directive,
  ReviewComment,
} from '../domain/entities/review-comment.entity';
import {
  DistributionMatrix,
  DistributionReport,
  FinalReport,
  ReportEntry,
  ReportPartitions,
} from '../domain/entities/triage-report.entity';
import { RemediationRunResult } from './remediation-orchestrator.service';

/**
 * Read-only projections over a batch. Nothing here mutates comment state.
 */
@Injectable()
export class TriageReportService {
  buildDistribution(batch: CommentBatch): DistributionReport {
    const matrix = this.emptyMatrix();
    const byCategory = this.categoryCounts();
    const bySeverity = this.severityCounts();
    let unclassified = 0;

    for (const comment of batch.all()) {
      if (comment.category === undefined || comment.severity === undefined) {
        unclassified++;
        continue;
      }
      matrix[comment.category][comment.severity]++;
      byCategory[comment.category]++;
      bySeverity[comment.severity]++;
    }

    return {
      reviewRef: batch.reviewRef,
      total: batch.size,
      unclassified,
      matrix,
      byCategory,
      bySeverity,
    };
  }

  buildFinalReport(batch: CommentBatch, run?: RemediationRunResult): FinalReport {
    const partitions: ReportPartitions = {
      autoFixed: [],
      autoFixFailed: [],
      wontFix: [],
      manual: [],
      unaddressed: [],
    };

    for (const comment of batch.all()) {
      partitions[this.partitionOf(comment)].push(this.toEntry(comment));
    }

    return {
      reviewRef: batch.reviewRef,
      generatedAt: new Date().toISOString(),
      total: batch.size,
      cancelled: run?.cancelled ?? false,
      partitions,
      warnings: batch.postingWarnings(),
      rejections: run?.rejections ?? [],
    };
  }

  private partitionOf(comment: ReviewComment): keyof ReportPartitions {
    switch (comment.state) {
      case CommentState.FIXED:
        return 'autoFixed';
      case CommentState.FIX_FAILED:
        return 'autoFixFailed';
      case CommentState.WONT_FIX_POSTED:
        return 'wontFix';
      case CommentState.MANUAL_ACKNOWLEDGED:
        return 'manual';
      default:
        return 'unaddressed';
    }
  }

  private toEntry(comment: ReviewComment): ReportEntry {
    return {
      id: comment.id,
      category: comment.category,
      severity: comment.severity,
      state: comment.state,
      directive: comment.directive,
      location: comment.location,
      summary: this.summarize(comment),
    };
  }

  private summarize(comment: ReviewComment): string {
    const { outcome } = comment;
    if (outcome) {
      if (!outcome.success) {
        return `Fix failed: ${outcome.reason}`;
      }
      if (comment.state === CommentState.FIXED) {
        return `Fixed in ${outcome.reference}`;
      }
      return outcome.reference;
    }
    if (comment.awaitingRationale) {
      return 'Awaiting a won\'t-fix rationale';
    }
    if (comment.directive === Directive.UNSET) {
      return comment.state === CommentState.PENDING ? 'Not classified' : 'No directive given';
    }
    return 'Not processed';
  }

  private emptyMatrix(): DistributionMatrix {
    return {
      [CommentCategory.SECURITY]: this.severityCounts(),
      [CommentCategory.CODE_CHANGES]: this.severityCounts(),
      [CommentCategory.DOCUMENTATION]: this.severityCounts(),
      [CommentCategory.CLARIFICATIONS]: this.severityCounts(),
      [CommentCategory.BUGS_AND_SMELLS]: this.severityCounts(),
      [CommentCategory.OTHER]: this.severityCounts(),
    };
  }

  private categoryCounts(): Record<CommentCategory, number> {
    return {
      [CommentCategory.SECURITY]: 0,
      [CommentCategory.CODE_CHANGES]: 0,
      [CommentCategory.DOCUMENTATION]: 0,
      [CommentCategory.CLARIFICATIONS]: 0,
      [CommentCategory.BUGS_AND_SMELLS]: 0,
      [CommentCategory.OTHER]: 0,
    };
  }

  private severityCounts(): Record<CommentSeverity, number> {
    return {
      [CommentSeverity.CRITICAL]: 0,
      [CommentSeverity.HIGH]: 0,
      [CommentSeverity.MEDIUM]: 0,
      [CommentSeverity.INFO]: 0,
    };
  }
}
