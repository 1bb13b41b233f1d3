import { Injectable, Logger } from '@nestjs/common';
import { CommentBatch } from '../domain/entities/comment-batch.entity';
import {
  DirectiveAssignment,
  DirectiveResolution,
  DirectiveSelection,
} from '../domain/entities/directive-selection.entity';
import { AssignableDirective, Directive, ReviewComment } from '../domain/entities/review-comment.entity';
import { AmbiguousSelectionError } from '../domain/errors/triage.errors';

interface PendingAssignment {
  comment: ReviewComment;
  directive: AssignableDirective;
  note?: string;
}

@Injectable()
export class DirectiveResolverService {
  private readonly logger = new Logger(DirectiveResolverService.name);

  /**
   * Apply operator selections to a batch.
   *
   * The call is all-or-nothing: selections are matched first, and only when no
   * comment is targeted by two different directives are they applied.
   */
  resolve(batch: CommentBatch, selections: DirectiveSelection[]): DirectiveResolution {
    const pending = new Map<string, PendingAssignment>();
    const conflicts = new Set<string>();
    const skipped = new Set<string>();

    for (const selection of selections) {
      for (const comment of this.match(batch, selection)) {
        if (!comment.acceptsDirective) {
          skipped.add(comment.id);
          continue;
        }

        const existing = pending.get(comment.id);
        if (!existing) {
          pending.set(comment.id, { comment, directive: selection.directive, note: selection.note });
        } else if (existing.directive !== selection.directive) {
          conflicts.add(comment.id);
        } else if (!existing.note && selection.note) {
          existing.note = selection.note;
        }
      }
    }

    if (conflicts.size > 0) {
      throw new AmbiguousSelectionError(Array.from(conflicts));
    }

    const applied: DirectiveAssignment[] = [];
    for (const { comment, directive, note } of pending.values()) {
      comment.assignDirective(directive, note);
      applied.push({ commentId: comment.id, directive });
    }

    const unaddressed = batch
      .all()
      .filter((comment) => comment.directive === Directive.UNSET)
      .map((comment) => comment.id);

    this.logger.log(
      `Resolved ${applied.length} directive(s), ${skipped.size} skipped, ${unaddressed.length} unaddressed`,
    );

    return { applied, skipped: Array.from(skipped), unaddressed };
  }

  private match(batch: CommentBatch, selection: DirectiveSelection): ReviewComment[] {
    const { target } = selection;
    switch (target.kind) {
      case 'ids':
        // Unknown ids are an operator error: get() throws CommentNotFoundError
        return Array.from(new Set(target.ids)).map((id) => batch.get(id));
      case 'categories':
        return batch
          .all()
          .filter((comment) => comment.category !== undefined && target.categories.includes(comment.category));
      case 'severities':
        return batch
          .all()
          .filter((comment) => comment.severity !== undefined && target.severities.includes(comment.severity));
    }
  }
}
