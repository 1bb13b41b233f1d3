import { PlatformType, RawComment, ReviewRef } from '../entities/raw-comment.entity';
import { StatusKind } from '../entities/comment-batch.entity';

export interface PostStatusOptions {
  // Author of the comment, for platforms that quote it in conversation replies
  author?: string;
  signal?: AbortSignal;
}

/**
 * Repository interface for the code-hosting platform a review lives on (GitHub, GitLab, etc.)
 */
export interface PlatformGateway {
  /**
   * Retrieve the review comments of a merge/pull request.
   * Network and auth failures are raised as FetchError.
   */
  fetchComments(reviewRef: ReviewRef): Promise<RawComment[]>;

  /**
   * Post a status message against a previously fetched comment
   */
  postStatus(
    reviewRef: ReviewRef,
    commentId: string,
    kind: StatusKind,
    message: string,
    options?: PostStatusOptions,
  ): Promise<void>;
}

/**
 * Looks up the gateway for a platform
 */
export interface PlatformGatewayRegistry {
  forPlatform(platform: PlatformType): PlatformGateway;
}
