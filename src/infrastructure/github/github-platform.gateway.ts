import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { StatusKind } from '../../core/domain/entities/comment-batch.entity';
import { RawComment, ReviewRef } from '../../core/domain/entities/raw-comment.entity';
import { FetchError } from '../../core/domain/errors/triage.errors';
import { PostStatusOptions } from '../../core/domain/repositories/platform-gateway.repository';
import { PlatformGatewayAdapter } from '../platform/platform-gateway.adapter';

interface GithubUser {
  login: string;
}

/**
 * Inline comment on a line of the diff
 */
interface PullRequestReviewComment {
  id: number;
  body: string;
  user: GithubUser | null;
  created_at: string;
  path: string;
  line: number | null;
  in_reply_to_id?: number;
  pull_request_review_id: number | null;
}

/**
 * Comment on the conversation tab
 */
interface IssueComment {
  id: number;
  body: string | null;
  user: GithubUser | null;
  created_at: string;
}

interface PullRequestReview {
  id: number;
  body: string | null;
  state: 'APPROVED' | 'CHANGES_REQUESTED' | 'COMMENTED' | 'DISMISSED' | 'PENDING';
  user: GithubUser | null;
  submitted_at?: string;
}

type CommentSource = 'review-comment' | 'issue-comment' | 'review';

const PAGE_SIZE = 100;

/**
 * GitHub pull request transport.
 * Comment ids are namespaced by source, e.g. `review-comment:42`.
 */
@Injectable()
export class GithubPlatformGateway extends PlatformGatewayAdapter {
  private readonly logger = new Logger(GithubPlatformGateway.name);

  constructor(configService: ConfigService, httpService: HttpService) {
    super(configService, httpService, 'GITHUB_API_URL', 'GITHUB_API_TOKEN', 'https://api.github.com');
  }

  async fetchComments(reviewRef: ReviewRef): Promise<RawComment[]> {
    const base = this.pullRequestPath(reviewRef);

    try {
      const [reviews, reviewComments, issueComments] = await Promise.all([
        this.apiGet<PullRequestReview[]>(`${base.pulls}/reviews`, { params: { per_page: PAGE_SIZE } }),
        this.apiGet<PullRequestReviewComment[]>(`${base.pulls}/comments`, { params: { per_page: PAGE_SIZE } }),
        this.apiGet<IssueComment[]>(`${base.issues}/comments`, { params: { per_page: PAGE_SIZE } }),
      ]);

      const blockingReviews = new Set(
        reviews.filter((review) => review.state === 'CHANGES_REQUESTED').map((review) => review.id),
      );

      const comments: RawComment[] = [
        ...reviewComments
          .filter((comment) => comment.in_reply_to_id === undefined && !this.isStatusComment(comment.body))
          .map((comment) => this.fromReviewComment(comment, blockingReviews)),
        ...issueComments
          .filter((comment) => !this.isStatusComment(comment.body))
          .map((comment) => this.fromIssueComment(comment)),
        ...reviews
          .filter((review) => !!review.body && review.body.trim().length > 0 && !this.isStatusComment(review.body))
          .map((review) => this.fromReview(review)),
      ];

      this.logger.log(`Fetched ${comments.length} comment(s) from ${reviewRef.projectId}#${reviewRef.mergeRequestId}`);
      return comments;
    } catch (error) {
      throw new FetchError(
        `Failed to fetch comments for ${reviewRef.projectId}#${reviewRef.mergeRequestId}: ${this.describeHttpError(error)}`,
        error,
      );
    }
  }

  async postStatus(
    reviewRef: ReviewRef,
    commentId: string,
    kind: StatusKind,
    message: string,
    options: PostStatusOptions = {},
  ): Promise<void> {
    const base = this.pullRequestPath(reviewRef);
    const { source, nativeId } = this.parseCommentId(commentId);
    const body = this.formatStatus(kind, message);

    if (source === 'review-comment') {
      await this.apiPost(`${base.pulls}/comments/${nativeId}/replies`, { body }, options.signal);
      return;
    }

    // Conversation comments and review bodies have no thread: reply on the conversation
    const mention = options.author ? `@${options.author} ` : '';
    await this.apiPost(
      `${base.issues}/comments`,
      { body: `${body}\n\n> ${mention}(re: ${commentId})` },
      options.signal,
    );
  }

  protected getAuthHeaders(): Record<string, string> {
    return {
      Authorization: `token ${this.apiToken}`,
      Accept: 'application/vnd.github.v3+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
  }

  private fromReviewComment(comment: PullRequestReviewComment, blockingReviews: Set<number>): RawComment {
    return {
      id: `review-comment:${comment.id}`,
      author: comment.user?.login ?? 'ghost',
      createdAt: comment.created_at,
      body: comment.body,
      location: { filePath: comment.path, line: comment.line },
      mergeBlocking: comment.pull_request_review_id !== null && blockingReviews.has(comment.pull_request_review_id),
      onChangedLine: comment.line !== null,
      ...this.extractAttributes(comment.body),
    };
  }

  private fromIssueComment(comment: IssueComment): RawComment {
    const body = comment.body ?? '';
    return {
      id: `issue-comment:${comment.id}`,
      author: comment.user?.login ?? 'ghost',
      createdAt: comment.created_at,
      body,
      ...this.extractAttributes(body),
    };
  }

  private fromReview(review: PullRequestReview): RawComment {
    const body = review.body ?? '';
    return {
      id: `review:${review.id}`,
      author: review.user?.login ?? 'ghost',
      createdAt: review.submitted_at ?? new Date().toISOString(),
      body,
      mergeBlocking: review.state === 'CHANGES_REQUESTED',
      ...this.extractAttributes(body),
    };
  }

  private parseCommentId(commentId: string): { source: CommentSource; nativeId: string } {
    const separator = commentId.indexOf(':');
    const source = commentId.slice(0, separator);
    const nativeId = commentId.slice(separator + 1);
    if (separator < 0 || !/^\d+$/.test(nativeId)) {
      throw new Error(`Invalid GitHub comment id: ${commentId}`);
    }
    switch (source) {
      case 'review-comment':
      case 'issue-comment':
      case 'review':
        return { source, nativeId };
      default:
        throw new Error(`Invalid GitHub comment id: ${commentId}`);
    }
  }

  private pullRequestPath(reviewRef: ReviewRef): { pulls: string; issues: string } {
    const parts = reviewRef.projectId.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new FetchError(`Invalid GitHub project ID format: ${reviewRef.projectId}. Expected format: 'owner/repo'`);
    }
    const repo = `repos/${parts[0]}/${parts[1]}`;
    return {
      pulls: `${repo}/pulls/${reviewRef.mergeRequestId}`,
      issues: `${repo}/issues/${reviewRef.mergeRequestId}`,
    };
  }
}
