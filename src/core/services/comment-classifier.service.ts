import { Injectable, Logger } from '@nestjs/common';
import { CommentBatch } from '../domain/entities/comment-batch.entity';
import {
  CommentCategory,
  CommentSeverity,
  CommentState,
  ReviewComment,
} from '../domain/entities/review-comment.entity';

export interface Classification {
  category: CommentCategory;
  severity: CommentSeverity;
}

const SECURITY_LABELS = ['security', 'vulnerability', 'credential'];
const SECURITY_KEYWORDS = [
  /\bvulnerab(le|ility|ilities)\b/i,
  /\b(sql |command |code )?injection\b/i,
  /\bxss\b/i,
  /\bcsrf\b/i,
  /\bcredentials?\b/i,
  /\bsecrets?\b/i,
  /\bpasswords?\b/i,
  /\bapi[ _-]?keys?\b/i,
  /\bexploit(s|able)?\b/i,
  /\bcve-\d{4}-\d+\b/i,
];

const BUG_LABELS = ['bug', 'smell', 'code-smell', 'anti-pattern'];
const BUG_KEYWORDS = [
  /\bbugs?\b/i,
  /\banti-?patterns?\b/i,
  /\bcode smells?\b/i,
  /\brace conditions?\b/i,
  /\bmemory leaks?\b/i,
  /\bnull pointer\b/i,
  /\boff[- ]by[- ]one\b/i,
];

const QUESTION_LABELS = ['question'];
const DOCUMENTATION_LABELS = ['documentation', 'docs'];
const DOCUMENTATION_FILE = /(^|\/)(readme[^/]*|changelog[^/]*|contributing[^/]*|[^/]+\.(md|mdx|rst|txt|adoc))$|(^|\/)docs?\//i;

const CLASSIFIABLE_STATES: ReadonlySet<CommentState> = new Set([
  CommentState.PENDING,
  CommentState.CLASSIFIED,
  CommentState.DIRECTIVE_SET,
]);

/**
 * Deterministic, rule-based classification over structured comment attributes.
 * Rules are evaluated in priority order and the first match wins.
 */
@Injectable()
export class CommentClassifierService {
  private readonly logger = new Logger(CommentClassifierService.name);

  classify(comment: ReviewComment): Classification {
    const category = this.categorize(comment);
    return { category, severity: this.rateSeverity(comment, category) };
  }

  /**
   * Classify every comment that has not started remediation yet.
   */
  classifyBatch(batch: CommentBatch): void {
    for (const comment of batch.all()) {
      if (!CLASSIFIABLE_STATES.has(comment.state)) {
        continue;
      }
      const { category, severity } = this.classify(comment);
      comment.classify(category, severity);
      this.logger.debug(`Comment ${comment.id} classified as ${category}/${severity}`);
    }
  }

  private categorize(comment: ReviewComment): CommentCategory {
    const { labels, isQuestion, hasSuggestion } = comment.attributes;

    if (this.hasAny(labels, SECURITY_LABELS) || this.matchesAny(comment.body, SECURITY_KEYWORDS)) {
      return CommentCategory.SECURITY;
    }
    if (this.hasAny(labels, BUG_LABELS) || this.matchesAny(comment.body, BUG_KEYWORDS)) {
      return CommentCategory.BUGS_AND_SMELLS;
    }
    if ((isQuestion || this.hasAny(labels, QUESTION_LABELS)) && !hasSuggestion) {
      return CommentCategory.CLARIFICATIONS;
    }
    if (this.isDocumentationFile(comment) || this.hasAny(labels, DOCUMENTATION_LABELS)) {
      return CommentCategory.DOCUMENTATION;
    }
    if (hasSuggestion) {
      return CommentCategory.CODE_CHANGES;
    }
    return CommentCategory.OTHER;
  }

  private rateSeverity(comment: ReviewComment, category: CommentCategory): CommentSeverity {
    if (category === CommentCategory.SECURITY && comment.attributes.mergeBlocking) {
      return CommentSeverity.CRITICAL;
    }
    const escalates = category === CommentCategory.SECURITY || category === CommentCategory.BUGS_AND_SMELLS;
    if (escalates && comment.isInline && comment.attributes.onChangedLine) {
      return CommentSeverity.HIGH;
    }
    return CommentSeverity.MEDIUM;
  }

  private isDocumentationFile(comment: ReviewComment): boolean {
    return comment.location !== undefined && DOCUMENTATION_FILE.test(comment.location.filePath);
  }

  private hasAny(labels: string[], candidates: string[]): boolean {
    return labels.some((label) => candidates.includes(label));
  }

  private matchesAny(text: string, patterns: RegExp[]): boolean {
    return patterns.some((pattern) => pattern.test(text));
  }
}
