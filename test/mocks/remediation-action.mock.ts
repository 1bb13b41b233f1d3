import { ReviewComment } from '../../src/core/domain/entities/review-comment.entity';
import {
  RemediationAction,
  RemediationContext,
  RemediationResult,
} from '../../src/core/domain/repositories/remediation-action.repository';

export type RemediationHandler = (comment: ReviewComment, context: RemediationContext) => Promise<RemediationResult>;

/**
 * Succeeds with `fix-<comment id>` unless a handler says otherwise
 */
export class MockRemediationAction implements RemediationAction {
  readonly attempts: string[] = [];
  private readonly handlers = new Map<string, RemediationHandler>();

  constructor(private readonly fallback: RemediationHandler = async (comment) => ({ ok: true, changeRef: `fix-${comment.id}` })) {}

  on(commentId: string, handler: RemediationHandler): this {
    this.handlers.set(commentId, handler);
    return this;
  }

  async attemptFix(comment: ReviewComment, context: RemediationContext): Promise<RemediationResult> {
    this.attempts.push(comment.id);
    const handler = this.handlers.get(comment.id) ?? this.fallback;
    return handler(comment, context);
  }
}
