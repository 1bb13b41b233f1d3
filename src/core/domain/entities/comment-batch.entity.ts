import { ReviewRef } from './raw-comment.entity';
import { ReviewComment } from './review-comment.entity';
import { CommentNotFoundError, IngestError } from '../errors/triage.errors';

export enum StatusKind {
  ACKNOWLEDGEMENT = 'acknowledgement',
  COMPLETION = 'completion',
  FAILURE = 'failure',
  WONT_FIX_RATIONALE = 'wont_fix_rationale',
}

/**
 * A terminal status that could not be posted back to the platform.
 * The comment's state has already moved on; this only flags the gap.
 */
export interface PostingWarning {
  type: 'PostingIncomplete';
  commentId: string;
  kind: StatusKind;
  reason: string;
}

/**
 * All comments of one review session, in ingest order.
 *
 * Also carries the per-comment attempt guard: at most one pipeline may hold a
 * given comment id at a time, whichever run it belongs to.
 */
export class CommentBatch {
  private readonly comments = new Map<string, ReviewComment>();
  private readonly claimed = new Set<string>();
  private readonly warnings: PostingWarning[] = [];

  constructor(
    public readonly id: string,
    public readonly reviewRef: ReviewRef,
    comments: ReviewComment[],
    public readonly createdAt: Date = new Date(),
  ) {
    for (const comment of comments) {
      if (this.comments.has(comment.id)) {
        throw new IngestError(`Duplicate comment id ${comment.id}`, [comment.id]);
      }
      this.comments.set(comment.id, comment);
    }
  }

  get size(): number {
    return this.comments.size;
  }

  get(id: string): ReviewComment {
    const comment = this.comments.get(id);
    if (!comment) {
      throw new CommentNotFoundError(id);
    }
    return comment;
  }

  has(id: string): boolean {
    return this.comments.has(id);
  }

  all(): ReviewComment[] {
    return Array.from(this.comments.values());
  }

  tryClaim(id: string): boolean {
    if (this.claimed.has(id)) {
      return false;
    }
    this.claimed.add(id);
    return true;
  }

  release(id: string): void {
    this.claimed.delete(id);
  }

  recordPostingIncomplete(commentId: string, kind: StatusKind, reason: string): void {
    this.warnings.push({ type: 'PostingIncomplete', commentId, kind, reason });
  }

  postingWarnings(): PostingWarning[] {
    return [...this.warnings];
  }
}
