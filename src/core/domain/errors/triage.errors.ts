/**
 * Base class for every failure the triage workflow raises on purpose.
 * `code` is stable and used by the presentation layer to pick an HTTP status.
 */
export abstract class TriageError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or duplicate input at ingest. Aborts the run before classification.
 */
export class IngestError extends TriageError {
  readonly code = 'INGEST_ERROR';

  constructor(
    message: string,
    public readonly commentIds: string[] = [],
  ) {
    super(message);
  }
}

export class CommentNotFoundError extends TriageError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly commentId: string) {
    super(`Comment ${commentId} not found in batch`);
  }
}

export class SessionNotFoundError extends TriageError {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(public readonly sessionId: string) {
    super(`Triage session ${sessionId} not found`);
  }
}

/**
 * Raised when one resolution call targets a comment with two different directives.
 * Nothing from the call is applied.
 */
export class AmbiguousSelectionError extends TriageError {
  readonly code = 'AMBIGUOUS_SELECTION';

  constructor(public readonly commentIds: string[]) {
    super(`Conflicting directives for comment(s): ${commentIds.join(', ')}`);
  }
}

export class InvalidSelectionError extends TriageError {
  readonly code = 'INVALID_SELECTION';
}

export class AlreadyInProgressError extends TriageError {
  readonly code = 'ALREADY_IN_PROGRESS';

  constructor(public readonly commentId: string) {
    super(`A remediation attempt is already running for comment ${commentId}`);
  }
}

export class MissingRationaleError extends TriageError {
  readonly code = 'MISSING_RATIONALE';

  constructor(public readonly commentId: string) {
    super(`Won't-fix directive for comment ${commentId} has no rationale`);
  }
}

export class InvalidTransitionError extends TriageError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    public readonly commentId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Comment ${commentId} cannot move from ${from} to ${to}`);
  }
}

/**
 * Network or auth failure while retrieving comments from the platform.
 */
export class FetchError extends TriageError {
  readonly code = 'FETCH_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class RemediationInProgressError extends TriageError {
  readonly code = 'REMEDIATION_IN_PROGRESS';

  constructor(public readonly sessionId: string) {
    super(`A remediation run is already in progress for session ${sessionId}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
