import { ReviewRef } from '../entities/raw-comment.entity';
import { ReviewComment } from '../entities/review-comment.entity';

export type RemediationResult =
  | { ok: true; changeRef: string }
  | { ok: false; reason: string };

export interface RemediationContext {
  reviewRef: ReviewRef;
  signal: AbortSignal;
}

/**
 * The capability that performs the actual fix for an auto-fix comment.
 * Treated as opaque: only success or failure is observed.
 */
export interface RemediationAction {
  attemptFix(comment: ReviewComment, context: RemediationContext): Promise<RemediationResult>;
}
