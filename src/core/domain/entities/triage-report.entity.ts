import { CommentLocation, ReviewRef } from './raw-comment.entity';
import { PostingWarning } from './comment-batch.entity';
import { CommentCategory, CommentSeverity, CommentState, Directive } from './review-comment.entity';

export type DistributionMatrix = Record<CommentCategory, Record<CommentSeverity, number>>;

/**
 * Pre-decision view: how classified comments spread over category and severity.
 */
export interface DistributionReport {
  reviewRef: ReviewRef;
  total: number;
  unclassified: number;
  matrix: DistributionMatrix;
  byCategory: Record<CommentCategory, number>;
  bySeverity: Record<CommentSeverity, number>;
}

export interface ReportEntry {
  id: string;
  category?: CommentCategory;
  severity?: CommentSeverity;
  state: CommentState;
  directive: Directive;
  location?: CommentLocation;
  summary: string;
}

export interface ReportPartitions {
  autoFixed: ReportEntry[];
  autoFixFailed: ReportEntry[];
  wontFix: ReportEntry[];
  manual: ReportEntry[];
  unaddressed: ReportEntry[];
}

export interface RunRejection {
  commentId: string;
  code: string;
  message: string;
}

export interface FinalReport {
  reviewRef: ReviewRef;
  generatedAt: string;
  total: number;
  cancelled: boolean;
  partitions: ReportPartitions;
  warnings: PostingWarning[];
  rejections: RunRejection[];
}
