import { describe, it, expect, beforeEach } from 'vitest';
import { CommentStoreService } from '../../../src/core/services/comment-store.service';
import { CommentSanitizerService } from '../../../src/core/services/comment-sanitizer.service';
import { CommentState, Directive } from '../../../src/core/domain/entities/review-comment.entity';
import { StatusKind } from '../../../src/core/domain/entities/comment-batch.entity';
import { CommentNotFoundError, IngestError } from '../../../src/core/domain/errors/triage.errors';
import { rawComment, reviewRef } from '../../mocks/comment.fixtures';

describe('CommentStoreService', () => {
  let store: CommentStoreService;

  beforeEach(() => {
    store = new CommentStoreService(new CommentSanitizerService());
  });

  describe('ingest', () => {
    it('keeps ingest order and normalises ids to strings', () => {
      const batch = store.ingest(reviewRef, [
        rawComment('b'),
        { ...rawComment('ignored'), id: 7 },
        rawComment(' a '),
      ]);

      expect(batch.all().map((comment) => comment.id)).toEqual(['b', '7', 'a']);
      expect(batch.size).toBe(3);
      expect(batch.reviewRef).toEqual(reviewRef);
    });

    it('creates pending comments with default attributes', () => {
      const batch = store.ingest(reviewRef, [rawComment('c1', { labels: ['Nitpick', 'Blocking'] })]);
      const comment = batch.get('c1');

      expect(comment.state).toBe(CommentState.PENDING);
      expect(comment.directive).toBe(Directive.UNSET);
      expect(comment.createdAt).toBe('2024-05-01T10:00:00Z');
      expect(comment.attributes).toEqual({
        labels: ['nitpick', 'blocking'],
        hasSuggestion: false,
        isQuestion: false,
        onChangedLine: false,
        mergeBlocking: false,
      });
    });

    it('keeps the raw body and stores a sanitised copy', () => {
      const batch = store.ingest(reviewRef, [rawComment('c1', { body: 'Fix  this.\n\n\nThanks' })]);
      const comment = batch.get('c1');

      expect(comment.body).toBe('Fix  this.\n\n\nThanks');
      expect(comment.sanitized.content).toBe('Fix this.\nThanks');
    });

    it('keeps createdAt as reported, even when it is not a date', () => {
      const batch = store.ingest(reviewRef, [
        rawComment('c1', { createdAt: 'yesterday' }),
        rawComment('c2', { createdAt: new Date('2024-05-03T12:00:00Z') }),
      ]);

      expect(batch.get('c1').toJSON().createdAt).toBe('yesterday');
      expect(batch.get('c2').toJSON().createdAt).toBe('2024-05-03T12:00:00.000Z');
    });

    it('accepts an empty comment list', () => {
      expect(store.ingest(reviewRef, []).size).toBe(0);
    });

    it('rejects a comment without an id', () => {
      const call = () => store.ingest(reviewRef, [rawComment('c1'), { ...rawComment('c2'), id: undefined }]);

      expect(call).toThrow(IngestError);
      expect(call).toThrow('Comment at position 1 has no id');
    });

    it('rejects a blank id', () => {
      expect(() => store.ingest(reviewRef, [rawComment('   ')])).toThrow('Comment at position 0 has no id');
    });

    it('rejects ids that collide once normalised', () => {
      let caught: unknown;
      try {
        store.ingest(reviewRef, [rawComment('7'), { ...rawComment('x'), id: 7 }, rawComment('c3')]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(IngestError);
      if (caught instanceof IngestError) {
        expect(caught.commentIds).toEqual(['7']);
        expect(caught.message).toBe('Duplicate comment ids: 7');
      }
    });
  });

  describe('CommentBatch', () => {
    it('raises CommentNotFoundError for an unknown id', () => {
      const batch = store.ingest(reviewRef, [rawComment('c1')]);

      expect(batch.has('c1')).toBe(true);
      expect(batch.has('nope')).toBe(false);
      expect(() => batch.get('nope')).toThrow(CommentNotFoundError);
    });

    it('lets only one holder claim a comment at a time', () => {
      const batch = store.ingest(reviewRef, [rawComment('c1')]);

      expect(batch.tryClaim('c1')).toBe(true);
      expect(batch.tryClaim('c1')).toBe(false);
      batch.release('c1');
      expect(batch.tryClaim('c1')).toBe(true);
    });

    it('collects posting warnings', () => {
      const batch = store.ingest(reviewRef, [rawComment('c1')]);
      batch.recordPostingIncomplete('c1', StatusKind.COMPLETION, 'timeout');

      expect(batch.postingWarnings()).toEqual([
        { type: 'PostingIncomplete', commentId: 'c1', kind: StatusKind.COMPLETION, reason: 'timeout' },
      ]);
    });
  });
});
