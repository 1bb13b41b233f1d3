import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { StatusKind } from '../../core/domain/entities/comment-batch.entity';
import { CommentLocation, RawComment, ReviewRef } from '../../core/domain/entities/raw-comment.entity';
import { FetchError } from '../../core/domain/errors/triage.errors';
import { PostStatusOptions } from '../../core/domain/repositories/platform-gateway.repository';
import { PlatformGatewayAdapter } from '../platform/platform-gateway.adapter';

interface NotePosition {
  new_path: string | null;
  old_path: string | null;
  new_line: number | null;
  old_line: number | null;
}

interface DiscussionNote {
  id: number;
  body: string;
  author: { username: string };
  created_at: string;
  system: boolean;
  resolvable: boolean;
  resolved?: boolean;
  position?: NotePosition | null;
}

interface Discussion {
  id: string;
  individual_note: boolean;
  notes: DiscussionNote[];
}

const PAGE_SIZE = 100;

/**
 * GitLab merge request transport. Each unresolved discussion becomes one comment
 * identified as `<discussionId>:<noteId>` of its first note.
 */
@Injectable()
export class GitlabPlatformGateway extends PlatformGatewayAdapter {
  private readonly logger = new Logger(GitlabPlatformGateway.name);
  private readonly unresolvedThreadsBlockMerge: boolean;

  constructor(configService: ConfigService, httpService: HttpService) {
    super(configService, httpService, 'GITLAB_API_URL', 'GITLAB_API_TOKEN', 'https://gitlab.com/api/v4');
    this.unresolvedThreadsBlockMerge =
      String(this.configService.get<string | boolean>('GITLAB_UNRESOLVED_THREADS_BLOCK_MERGE', false)).toLowerCase() ===
      'true';
  }

  async fetchComments(reviewRef: ReviewRef): Promise<RawComment[]> {
    try {
      const discussions = await this.apiGet<Discussion[]>(`${this.mergeRequestPath(reviewRef)}/discussions`, {
        params: { per_page: PAGE_SIZE },
      });

      const comments: RawComment[] = [];
      for (const discussion of discussions) {
        const [first] = discussion.notes;
        if (!first || first.system || first.resolved === true || this.isStatusComment(first.body)) {
          continue;
        }
        comments.push(this.fromNote(discussion.id, first));
      }

      this.logger.log(`Fetched ${comments.length} unresolved discussion(s) from ${reviewRef.projectId}!${reviewRef.mergeRequestId}`);
      return comments;
    } catch (error) {
      throw new FetchError(
        `Failed to fetch discussions for ${reviewRef.projectId}!${reviewRef.mergeRequestId}: ${this.describeHttpError(error)}`,
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
    const separator = commentId.lastIndexOf(':');
    if (separator <= 0) {
      throw new Error(`Invalid GitLab comment id: ${commentId}`);
    }
    const discussionId = commentId.slice(0, separator);

    await this.apiPost(
      `${this.mergeRequestPath(reviewRef)}/discussions/${discussionId}/notes`,
      { body: this.formatStatus(kind, message) },
      options.signal,
    );
  }

  protected getAuthHeaders(): Record<string, string> {
    return {
      'PRIVATE-TOKEN': this.apiToken,
    };
  }

  private fromNote(discussionId: string, note: DiscussionNote): RawComment {
    return {
      id: `${discussionId}:${note.id}`,
      author: note.author.username,
      createdAt: note.created_at,
      body: note.body,
      location: this.toLocation(note.position),
      mergeBlocking: this.unresolvedThreadsBlockMerge && note.resolvable,
      onChangedLine: (note.position?.new_line ?? null) !== null,
      ...this.extractAttributes(note.body),
    };
  }

  private toLocation(position: NotePosition | null | undefined): CommentLocation | undefined {
    const filePath = position?.new_path ?? position?.old_path;
    if (!position || !filePath) {
      return undefined;
    }
    return { filePath, line: position.new_line ?? position.old_line ?? null };
  }

  private mergeRequestPath(reviewRef: ReviewRef): string {
    return `projects/${encodeURIComponent(reviewRef.projectId)}/merge_requests/${reviewRef.mergeRequestId}`;
  }
}
