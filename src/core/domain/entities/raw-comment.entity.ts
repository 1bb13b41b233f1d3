export enum PlatformType {
  GITHUB = 'github',
  GITLAB = 'gitlab',
}

/**
 * Identifies the merge/pull request a batch of comments belongs to.
 * `projectId` is `owner/repo` on GitHub and the numeric or path id on GitLab.
 */
export interface ReviewRef {
  platform: PlatformType;
  projectId: string;
  mergeRequestId: number;
}

export interface CommentLocation {
  filePath: string;
  line: number | null;
}

/**
 * A comment as handed over by a platform gateway, before ingest.
 */
export interface RawComment {
  id?: string | number | null;
  author: string;
  createdAt: string | Date;
  body: string;
  location?: CommentLocation;
  // Explicit merge-blocking flag from the platform (e.g. a "changes requested" review)
  mergeBlocking?: boolean;
  labels?: string[];
  hasSuggestion?: boolean;
  isQuestion?: boolean;
  onChangedLine?: boolean;
}
