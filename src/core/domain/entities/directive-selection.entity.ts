import { AssignableDirective, CommentCategory, CommentSeverity } from './review-comment.entity';

export type SelectionTarget =
  | { kind: 'ids'; ids: string[] }
  | { kind: 'categories'; categories: CommentCategory[] }
  | { kind: 'severities'; severities: CommentSeverity[] };

/**
 * One operator instruction: a selection over a single axis paired with a directive.
 * `note` is the rationale for won't-fix and a free note for manual follow-up.
 */
export interface DirectiveSelection {
  target: SelectionTarget;
  directive: AssignableDirective;
  note?: string;
}

export interface DirectiveAssignment {
  commentId: string;
  directive: AssignableDirective;
}

export interface DirectiveResolution {
  applied: DirectiveAssignment[];
  // Targeted but not eligible (unclassified, already directed or past remediation)
  skipped: string[];
  unaddressed: string[];
}
