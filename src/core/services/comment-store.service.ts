import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CommentBatch } from '../domain/entities/comment-batch.entity';
import { RawComment, ReviewRef } from '../domain/entities/raw-comment.entity';
import { ReviewComment } from '../domain/entities/review-comment.entity';
import { IngestError } from '../domain/errors/triage.errors';
import { CommentSanitizerService } from './comment-sanitizer.service';

@Injectable()
export class CommentStoreService {
  private readonly logger = new Logger(CommentStoreService.name);

  constructor(private readonly sanitizer: CommentSanitizerService) {}

  /**
   * Normalise raw platform comments into a new batch.
   * Fails on a missing id or on ids that collide once normalised to strings.
   */
  ingest(reviewRef: ReviewRef, rawComments: RawComment[]): CommentBatch {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    const comments: ReviewComment[] = [];

    rawComments.forEach((raw, index) => {
      const id = this.normalizeId(raw.id);
      if (id === null) {
        throw new IngestError(`Comment at position ${index} has no id`);
      }
      if (seen.has(id)) {
        duplicates.add(id);
        return;
      }
      seen.add(id);
      comments.push(this.toComment(id, raw));
    });

    if (duplicates.size > 0) {
      const ids = Array.from(duplicates);
      throw new IngestError(`Duplicate comment ids: ${ids.join(', ')}`, ids);
    }

    const batch = new CommentBatch(uuidv4(), reviewRef, comments);
    this.logger.log(
      `Ingested ${batch.size} comments for ${reviewRef.platform}:${reviewRef.projectId}!${reviewRef.mergeRequestId}`,
    );
    return batch;
  }

  private toComment(id: string, raw: RawComment): ReviewComment {
    const sanitized = this.sanitizer.sanitize(raw.body ?? '');
    if (sanitized.isSuspicious) {
      this.logger.warn(`Comment ${id} flagged while sanitizing: ${sanitized.redFlags.join(', ')}`);
    }

    return new ReviewComment(
      id,
      raw.author,
      this.normalizeCreatedAt(raw.createdAt),
      raw.body ?? '',
      sanitized,
      {
        labels: (raw.labels ?? []).map((label) => label.toLowerCase()),
        hasSuggestion: raw.hasSuggestion ?? false,
        isQuestion: raw.isQuestion ?? false,
        onChangedLine: raw.onChangedLine ?? false,
        mergeBlocking: raw.mergeBlocking ?? false,
      },
      raw.location,
    );
  }

  private normalizeCreatedAt(createdAt: RawComment['createdAt']): string {
    if (createdAt instanceof Date) {
      return Number.isNaN(createdAt.getTime()) ? String(createdAt) : createdAt.toISOString();
    }
    return createdAt;
  }

  private normalizeId(id: RawComment['id']): string | null {
    if (id === undefined || id === null) {
      return null;
    }
    const normalized = String(id).trim();
    return normalized.length > 0 ? normalized : null;
  }
}
