import { HttpException, HttpStatus, InternalServerErrorException, Logger } from '@nestjs/common';
import {
  AlreadyInProgressError,
  AmbiguousSelectionError,
  CommentNotFoundError,
  FetchError,
  IngestError,
  RemediationInProgressError,
  SessionNotFoundError,
  TriageError,
} from '../core/domain/errors/triage.errors';

const logger = new Logger('HttpErrorMapper');

function statusOf(error: TriageError): HttpStatus {
  if (error instanceof CommentNotFoundError || error instanceof SessionNotFoundError) {
    return HttpStatus.NOT_FOUND;
  }
  if (
    error instanceof AmbiguousSelectionError ||
    error instanceof RemediationInProgressError ||
    error instanceof AlreadyInProgressError
  ) {
    return HttpStatus.CONFLICT;
  }
  if (error instanceof IngestError) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  if (error instanceof FetchError) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.BAD_REQUEST;
}

/**
 * Translate a failure raised by a use case into the HTTP error returned to the client.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof TriageError) {
    const status = statusOf(error);
    const commentIds =
      error instanceof IngestError || error instanceof AmbiguousSelectionError ? error.commentIds : undefined;
    return new HttpException(
      { statusCode: status, code: error.code, message: error.message, ...(commentIds ? { commentIds } : {}) },
      status,
      { cause: error },
    );
  }

  logger.error('Unhandled error', error instanceof Error ? error.stack : String(error));
  return new InternalServerErrorException('Internal server error', { cause: error });
}
