import { StatusKind } from '../../src/core/domain/entities/comment-batch.entity';
import { PlatformType, RawComment, ReviewRef } from '../../src/core/domain/entities/raw-comment.entity';
import {
  PlatformGateway,
  PlatformGatewayRegistry,
  PostStatusOptions,
} from '../../src/core/domain/repositories/platform-gateway.repository';

export interface PostedStatus {
  commentId: string;
  kind: StatusKind;
  message: string;
}

export class MockPlatformGateway implements PlatformGateway {
  readonly posts: PostedStatus[] = [];
  readonly postOptions: Array<{ commentId: string; kind: StatusKind; options: PostStatusOptions }> = [];
  private readonly failingKinds = new Set<StatusKind>();
  private readonly hangingKinds = new Map<StatusKind, () => void>();
  private fetchFailure: Error | null = null;

  constructor(public comments: RawComment[] = []) {}

  failPostsOf(kind: StatusKind): this {
    this.failingKinds.add(kind);
    return this;
  }

  /**
   * Posts of this kind never settle; `onStart` runs when one is sent
   */
  hangPostsOf(kind: StatusKind, onStart: () => void = () => undefined): this {
    this.hangingKinds.set(kind, onStart);
    return this;
  }

  failFetch(error: Error): this {
    this.fetchFailure = error;
    return this;
  }

  postsFor(commentId: string): PostedStatus[] {
    return this.posts.filter((post) => post.commentId === commentId);
  }

  async fetchComments(_reviewRef: ReviewRef): Promise<RawComment[]> {
    if (this.fetchFailure) {
      throw this.fetchFailure;
    }
    return this.comments;
  }

  async postStatus(
    _reviewRef: ReviewRef,
    commentId: string,
    kind: StatusKind,
    message: string,
    options: PostStatusOptions = {},
  ): Promise<void> {
    this.postOptions.push({ commentId, kind, options });
    const onHang = this.hangingKinds.get(kind);
    if (onHang) {
      onHang();
      return new Promise<void>(() => undefined);
    }
    if (this.failingKinds.has(kind)) {
      throw new Error(`${kind} rejected by platform`);
    }
    this.posts.push({ commentId, kind, message });
  }
}

export class MockPlatformGatewayRegistry implements PlatformGatewayRegistry {
  readonly requested: PlatformType[] = [];

  constructor(private readonly gateway: PlatformGateway) {}

  forPlatform(platform: PlatformType): PlatformGateway {
    this.requested.push(platform);
    return this.gateway;
  }
}
