import { describe, it, expect } from 'vitest';
import {
  CommentCategory,
  CommentSeverity,
  CommentState,
  Directive,
  ReviewComment,
} from '../../../../src/core/domain/entities/review-comment.entity';
import { AlreadyInProgressError, InvalidTransitionError } from '../../../../src/core/domain/errors/triage.errors';
import { ingest, rawComment } from '../../../mocks/comment.fixtures';

function freshComment(): ReviewComment {
  return ingest([rawComment('c1', { body: 'Please rename this variable.' })]).get('c1');
}

function classifiedComment(): ReviewComment {
  const comment = freshComment();
  comment.classify(CommentCategory.CODE_CHANGES, CommentSeverity.MEDIUM);
  return comment;
}

describe('ReviewComment', () => {
  it('starts pending with no directive and no outcome', () => {
    const comment = freshComment();

    expect(comment.state).toBe(CommentState.PENDING);
    expect(comment.directive).toBe(Directive.UNSET);
    expect(comment.outcome).toBeUndefined();
    expect(comment.isTerminal).toBe(false);
    expect(comment.acceptsDirective).toBe(false);
  });

  describe('classify', () => {
    it('moves a pending comment to classified', () => {
      const comment = classifiedComment();

      expect(comment.state).toBe(CommentState.CLASSIFIED);
      expect(comment.category).toBe(CommentCategory.CODE_CHANGES);
      expect(comment.severity).toBe(CommentSeverity.MEDIUM);
    });

    it('can be repeated before remediation starts', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.MANUAL);

      comment.classify(CommentCategory.SECURITY, CommentSeverity.CRITICAL);

      expect(comment.state).toBe(CommentState.DIRECTIVE_SET);
      expect(comment.category).toBe(CommentCategory.SECURITY);
    });

    it('is rejected once the comment is terminal', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.MANUAL);
      comment.markManualAcknowledged();

      expect(() => comment.classify(CommentCategory.OTHER, CommentSeverity.INFO)).toThrow(InvalidTransitionError);
    });
  });

  describe('assignDirective', () => {
    it('is rejected while the comment is still pending', () => {
      const comment = freshComment();

      expect(() => comment.assignDirective(Directive.AUTO_FIX)).toThrow(InvalidTransitionError);
      expect(comment.state).toBe(CommentState.PENDING);
    });

    it('trims the note and drops a blank one', () => {
      const withNote = classifiedComment();
      withNote.assignDirective(Directive.WONT_FIX, '  out of scope  ');
      const blank = classifiedComment();
      blank.assignDirective(Directive.WONT_FIX, '   ');

      expect(withNote.note).toBe('out of scope');
      expect(blank.note).toBeUndefined();
    });

    it('cannot overwrite a directive that was already set', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.AUTO_FIX);

      expect(comment.acceptsDirective).toBe(false);
      expect(() => comment.assignDirective(Directive.MANUAL)).toThrow(InvalidTransitionError);
    });

    it('accepts a new directive while a rationale is awaited', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.WONT_FIX);
      comment.markAwaitingRationale();

      expect(comment.acceptsDirective).toBe(true);

      comment.assignDirective(Directive.WONT_FIX, 'Handled in a follow-up');

      expect(comment.awaitingRationale).toBe(false);
      expect(comment.state).toBe(CommentState.DIRECTIVE_SET);
      expect(comment.note).toBe('Handled in a follow-up');
    });
  });

  describe('remediation transitions', () => {
    it('records a successful fix with its reference', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.AUTO_FIX);
      comment.beginAttempt();
      comment.markFixed('abc123');

      expect(comment.state).toBe(CommentState.FIXED);
      expect(comment.outcome).toEqual({ success: true, reference: 'abc123' });
      expect(comment.isTerminal).toBe(true);
    });

    it('records a failed fix with its reason', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.AUTO_FIX);
      comment.beginAttempt();
      comment.markFixFailed('tests failed');

      expect(comment.state).toBe(CommentState.FIX_FAILED);
      expect(comment.outcome).toEqual({ success: false, reason: 'tests failed' });
    });

    it('refuses a second attempt on a comment already in progress', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.AUTO_FIX);
      comment.beginAttempt();

      expect(() => comment.beginAttempt()).toThrow(AlreadyInProgressError);
    });

    it('refuses an attempt for a comment that is not auto-fix', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.MANUAL);

      expect(() => comment.beginAttempt()).toThrow(InvalidTransitionError);
      expect(comment.state).toBe(CommentState.DIRECTIVE_SET);
    });

    it('cannot be marked fixed without an attempt', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.AUTO_FIX);

      expect(() => comment.markFixed('abc123')).toThrow(InvalidTransitionError);
      expect(comment.outcome).toBeUndefined();
    });

    it('keeps the rationale as the outcome of a won\'t-fix', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.WONT_FIX, 'Intentional');
      comment.markWontFixPosted('Intentional');

      expect(comment.state).toBe(CommentState.WONT_FIX_POSTED);
      expect(comment.outcome).toEqual({ success: true, reference: 'Intentional' });
    });

    it('acknowledges manual follow-up with the note or a default reference', () => {
      const withNote = classifiedComment();
      withNote.assignDirective(Directive.MANUAL, 'Alice will pair on this');
      withNote.markManualAcknowledged();
      const withoutNote = classifiedComment();
      withoutNote.assignDirective(Directive.MANUAL);
      withoutNote.markManualAcknowledged();

      expect(withNote.outcome).toEqual({ success: true, reference: 'Alice will pair on this' });
      expect(withoutNote.outcome).toEqual({ success: true, reference: 'acknowledged for manual follow-up' });
    });

    it('only waits for a rationale on won\'t-fix comments', () => {
      const comment = classifiedComment();
      comment.assignDirective(Directive.MANUAL);

      expect(() => comment.markAwaitingRationale()).toThrow(InvalidTransitionError);
    });
  });

  it('serialises to a plain snapshot', () => {
    const comment = classifiedComment();
    comment.assignDirective(Directive.MANUAL, 'later');

    expect(comment.toJSON()).toEqual({
      id: 'c1',
      author: 'reviewer',
      createdAt: '2024-05-01T10:00:00Z',
      body: 'Please rename this variable.',
      location: undefined,
      category: CommentCategory.CODE_CHANGES,
      severity: CommentSeverity.MEDIUM,
      state: CommentState.DIRECTIVE_SET,
      directive: Directive.MANUAL,
      note: 'later',
      outcome: undefined,
      redFlags: [],
      awaitingRationale: false,
    });
  });
});
