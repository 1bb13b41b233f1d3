import { CommentBatch } from './comment-batch.entity';
import { RemediationInProgressError } from '../errors/triage.errors';

/**
 * Holds one batch between operator interactions.
 * A session runs at most one remediation at a time; `cancel` aborts it.
 */
export class TriageSession {
  private abortController: AbortController | null = null;

  constructor(
    public readonly id: string,
    public readonly batch: CommentBatch,
    public readonly createdAt: Date = new Date(),
  ) {}

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  beginRun(): AbortSignal {
    if (this.abortController) {
      throw new RemediationInProgressError(this.id);
    }
    this.abortController = new AbortController();
    return this.abortController.signal;
  }

  endRun(): void {
    this.abortController = null;
  }

  cancel(): boolean {
    if (!this.abortController || this.abortController.signal.aborted) {
      return false;
    }
    this.abortController.abort();
    return true;
  }
}
