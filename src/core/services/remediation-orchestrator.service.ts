import { Injectable, Logger } from '@nestjs/common';
import { CommentBatch, StatusKind } from '../domain/entities/comment-batch.entity';
import { CommentState, Directive, ReviewComment } from '../domain/entities/review-comment.entity';
import { RunRejection } from '../domain/entities/triage-report.entity';
import type { PlatformGateway } from '../domain/repositories/platform-gateway.repository';
import type { RemediationAction, RemediationResult } from '../domain/repositories/remediation-action.repository';
import {
  AlreadyInProgressError,
  MissingRationaleError,
  TriageError,
  describeError,
} from '../domain/errors/triage.errors';

export const CANCELLED_REASON = 'Cancelled';
export const DEFAULT_CONCURRENCY = 4;

export interface RemediationCollaborators {
  gateway: PlatformGateway;
  remediation: RemediationAction;
}

export interface RemediationRunOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface RemediationRunResult {
  processed: string[];
  rejections: RunRejection[];
  cancelled: boolean;
}

class CancelledError extends Error {
  constructor() {
    super(CANCELLED_REASON);
  }
}

/**
 * Drives directive-set comments to a terminal state.
 *
 * Comments are processed by a bounded pool of workers. Within one comment every
 * transition and status post happens in order; across comments nothing is ordered.
 * Each auto-fix gets exactly one attempt.
 */
@Injectable()
export class RemediationOrchestratorService {
  private readonly logger = new Logger(RemediationOrchestratorService.name);

  async run(
    batch: CommentBatch,
    collaborators: RemediationCollaborators,
    options: RemediationRunOptions = {},
  ): Promise<RemediationRunResult> {
    const signal = options.signal ?? new AbortController().signal;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    const queue = batch
      .all()
      .filter((comment) => comment.state === CommentState.DIRECTIVE_SET && !comment.awaitingRationale);

    const processed: string[] = [];
    const rejections: RunRejection[] = [];
    let cursor = 0;

    this.logger.log(`Starting remediation of ${queue.length} comment(s) with ${concurrency} worker(s)`);

    const worker = async (): Promise<void> => {
      while (cursor < queue.length && !signal.aborted) {
        const comment = queue[cursor++];
        if (comment.state !== CommentState.DIRECTIVE_SET) {
          // Picked up by another run on the same batch
          this.logger.debug(`Comment ${comment.id} already taken (${comment.state}), skipping`);
          continue;
        }
        try {
          await this.processComment(batch, comment, collaborators, signal);
          processed.push(comment.id);
        } catch (error) {
          rejections.push(this.toRejection(comment.id, error));
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, queue.length) }, () => worker()));

    if (signal.aborted) {
      this.logger.warn(`Remediation cancelled, ${queue.length - cursor} comment(s) left unprocessed`);
    }
    this.logger.log(`Remediation finished: ${processed.length} processed, ${rejections.length} rejected`);

    return { processed, rejections, cancelled: signal.aborted };
  }

  /**
   * Run the pipeline for a single comment. Terminal comments are a no-op.
   */
  async processComment(
    batch: CommentBatch,
    comment: ReviewComment,
    collaborators: RemediationCollaborators,
    signal: AbortSignal,
  ): Promise<void> {
    if (comment.isTerminal || comment.directive === Directive.UNSET) {
      return;
    }
    if (!batch.tryClaim(comment.id)) {
      throw new AlreadyInProgressError(comment.id);
    }

    try {
      // Another pipeline may have finished this comment while we waited for the claim
      if (comment.isTerminal) {
        return;
      }
      switch (comment.directive) {
        case Directive.AUTO_FIX:
          await this.autoFix(batch, comment, collaborators, signal);
          break;
        case Directive.WONT_FIX:
          await this.postWontFix(batch, comment, collaborators.gateway);
          break;
        case Directive.MANUAL:
          comment.markManualAcknowledged();
          this.logger.debug(`Comment ${comment.id} acknowledged for manual follow-up`);
          break;
      }
    } finally {
      batch.release(comment.id);
    }
  }

  private async autoFix(
    batch: CommentBatch,
    comment: ReviewComment,
    { gateway, remediation }: RemediationCollaborators,
    signal: AbortSignal,
  ): Promise<void> {
    comment.beginAttempt();

    try {
      await this.untilAborted(
        gateway.postStatus(
          batch.reviewRef,
          comment.id,
          StatusKind.ACKNOWLEDGEMENT,
          'Working on an automated fix for this comment.',
          { author: comment.author, signal },
        ),
        signal,
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        this.logger.debug(`Acknowledgement for comment ${comment.id} abandoned on cancel`);
      } else {
        this.logger.warn(`Acknowledgement for comment ${comment.id} could not be posted: ${describeError(error)}`);
      }
    }

    const result = await this.attempt(comment, batch, remediation, signal);

    if (result.ok) {
      comment.markFixed(result.changeRef);
      this.logger.debug(`Comment ${comment.id} fixed in ${result.changeRef}`);
      await this.postTerminal(batch, gateway, comment, StatusKind.COMPLETION, `Fixed in ${result.changeRef}.`);
    } else {
      comment.markFixFailed(result.reason);
      this.logger.debug(`Fix for comment ${comment.id} failed: ${result.reason}`);
      await this.postTerminal(
        batch,
        gateway,
        comment,
        StatusKind.FAILURE,
        `The automated fix did not succeed: ${result.reason}. This needs a manual look.`,
      );
    }
  }

  private async attempt(
    comment: ReviewComment,
    batch: CommentBatch,
    remediation: RemediationAction,
    signal: AbortSignal,
  ): Promise<RemediationResult> {
    if (signal.aborted) {
      return { ok: false, reason: CANCELLED_REASON };
    }

    try {
      return await this.untilAborted(remediation.attemptFix(comment, { reviewRef: batch.reviewRef, signal }), signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        return { ok: false, reason: CANCELLED_REASON };
      }
      return { ok: false, reason: describeError(error) };
    }
  }

  /**
   * Settles with `work`, or rejects with CancelledError as soon as the signal aborts.
   */
  private async untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    let rejectCancelled: (error: Error) => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    const onAbort = (): void => rejectCancelled(new CancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      return await Promise.race([work, cancelled]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async postWontFix(batch: CommentBatch, comment: ReviewComment, gateway: PlatformGateway): Promise<void> {
    const rationale = comment.note;
    if (!rationale) {
      comment.markAwaitingRationale();
      throw new MissingRationaleError(comment.id);
    }

    comment.markWontFixPosted(rationale);
    await this.postTerminal(batch, gateway, comment, StatusKind.WONT_FIX_RATIONALE, `Won't fix: ${rationale}`);
  }

  private async postTerminal(
    batch: CommentBatch,
    gateway: PlatformGateway,
    comment: ReviewComment,
    kind: StatusKind,
    message: string,
  ): Promise<void> {
    try {
      await gateway.postStatus(batch.reviewRef, comment.id, kind, message, { author: comment.author });
    } catch (error) {
      const reason = describeError(error);
      batch.recordPostingIncomplete(comment.id, kind, reason);
      this.logger.warn(`Posting ${kind} for comment ${comment.id} failed: ${reason}`);
    }
  }

  private toRejection(commentId: string, error: unknown): RunRejection {
    if (error instanceof AlreadyInProgressError) {
      this.logger.error(`Invariant violation: ${error.message}`);
    } else if (!(error instanceof MissingRationaleError)) {
      this.logger.error(`Unexpected failure while processing comment ${commentId}`, error instanceof Error ? error.stack : undefined);
    }

    return {
      commentId,
      code: error instanceof TriageError ? error.code : 'UNEXPECTED_ERROR',
      message: describeError(error),
    };
  }
}
