import { CommentLocation } from './raw-comment.entity';
import { AlreadyInProgressError, InvalidTransitionError } from '../errors/triage.errors';

export enum CommentCategory {
  SECURITY = 'security',
  CODE_CHANGES = 'code_changes',
  DOCUMENTATION = 'documentation',
  CLARIFICATIONS = 'clarifications',
  BUGS_AND_SMELLS = 'bugs_and_smells',
  OTHER = 'other',
}

export enum CommentSeverity {
  CRITICAL = 'critical',
  HIGH = 'high',
  MEDIUM = 'medium',
  INFO = 'info',
}

export enum CommentState {
  PENDING = 'pending',
  CLASSIFIED = 'classified',
  DIRECTIVE_SET = 'directive_set',
  IN_PROGRESS = 'in_progress',
  FIXED = 'fixed',
  FIX_FAILED = 'fix_failed',
  WONT_FIX_POSTED = 'wont_fix_posted',
  MANUAL_ACKNOWLEDGED = 'manual_acknowledged',
}

export enum Directive {
  UNSET = 'unset',
  AUTO_FIX = 'auto_fix',
  WONT_FIX = 'wont_fix',
  MANUAL = 'manual',
}

export type AssignableDirective = Exclude<Directive, Directive.UNSET>;

export type CommentOutcome =
  | { success: true; reference: string }
  | { success: false; reason: string };

export interface CommentAttributes {
  labels: string[];
  hasSuggestion: boolean;
  isQuestion: boolean;
  onChangedLine: boolean;
  mergeBlocking: boolean;
}

export interface SanitizedContent {
  content: string;
  redFlags: string[];
  isSuspicious: boolean;
}

/**
 * Plain view of a comment, used in API responses and reports.
 */
export interface CommentSnapshot {
  id: string;
  author: string;
  createdAt: string;
  body: string;
  location?: CommentLocation;
  category?: CommentCategory;
  severity?: CommentSeverity;
  state: CommentState;
  directive: Directive;
  note?: string;
  outcome?: CommentOutcome;
  redFlags: string[];
  awaitingRationale: boolean;
}

export const TERMINAL_STATES: ReadonlySet<CommentState> = new Set([
  CommentState.FIXED,
  CommentState.FIX_FAILED,
  CommentState.WONT_FIX_POSTED,
  CommentState.MANUAL_ACKNOWLEDGED,
]);

const TRANSITIONS: Record<CommentState, CommentState[]> = {
  [CommentState.PENDING]: [CommentState.CLASSIFIED],
  [CommentState.CLASSIFIED]: [CommentState.DIRECTIVE_SET],
  [CommentState.DIRECTIVE_SET]: [
    CommentState.IN_PROGRESS,
    CommentState.WONT_FIX_POSTED,
    CommentState.MANUAL_ACKNOWLEDGED,
  ],
  [CommentState.IN_PROGRESS]: [CommentState.FIXED, CommentState.FIX_FAILED],
  [CommentState.FIXED]: [],
  [CommentState.FIX_FAILED]: [],
  [CommentState.WONT_FIX_POSTED]: [],
  [CommentState.MANUAL_ACKNOWLEDGED]: [],
};

// States in which category and severity may still be (re)assigned
const CLASSIFIABLE_STATES: ReadonlySet<CommentState> = new Set([
  CommentState.PENDING,
  CommentState.CLASSIFIED,
  CommentState.DIRECTIVE_SET,
]);

/**
 * One unit of reviewer feedback and its triage lifecycle.
 *
 * All mutation goes through the transition methods below, which enforce the
 * lifecycle `Pending → Classified → DirectiveSet → (InProgress) → terminal`
 * and keep `outcome` set exactly when the state is terminal.
 */
export class ReviewComment {
  private _category?: CommentCategory;
  private _severity?: CommentSeverity;
  private _state: CommentState = CommentState.PENDING;
  private _directive: Directive = Directive.UNSET;
  private _note?: string;
  private _outcome?: CommentOutcome;
  private _awaitingRationale = false;

  constructor(
    public readonly id: string,
    public readonly author: string,
    // Informational only, kept as the platform reported it
    public readonly createdAt: string,
    public readonly body: string,
    public readonly sanitized: SanitizedContent,
    public readonly attributes: CommentAttributes,
    public readonly location?: CommentLocation,
  ) {}

  get category(): CommentCategory | undefined {
    return this._category;
  }

  get severity(): CommentSeverity | undefined {
    return this._severity;
  }

  get state(): CommentState {
    return this._state;
  }

  get directive(): Directive {
    return this._directive;
  }

  get note(): string | undefined {
    return this._note;
  }

  get outcome(): CommentOutcome | undefined {
    return this._outcome;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this._state);
  }

  get isInline(): boolean {
    return this.location !== undefined;
  }

  /**
   * True when a won't-fix directive was sent back for lack of a rationale.
   */
  get awaitingRationale(): boolean {
    return this._awaitingRationale;
  }

  /**
   * Whether the directive resolver may (re)assign a directive.
   */
  get acceptsDirective(): boolean {
    if (this._state === CommentState.CLASSIFIED) {
      return this._directive === Directive.UNSET;
    }
    return this._state === CommentState.DIRECTIVE_SET && this._awaitingRationale;
  }

  classify(category: CommentCategory, severity: CommentSeverity): void {
    if (!CLASSIFIABLE_STATES.has(this._state)) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.CLASSIFIED);
    }
    this._category = category;
    this._severity = severity;
    if (this._state === CommentState.PENDING) {
      this.transition(CommentState.CLASSIFIED);
    }
  }

  assignDirective(directive: AssignableDirective, note?: string): void {
    if (!this.acceptsDirective) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.DIRECTIVE_SET);
    }
    this._directive = directive;
    this._note = note?.trim() ? note.trim() : undefined;
    this._awaitingRationale = false;
    if (this._state === CommentState.CLASSIFIED) {
      this.transition(CommentState.DIRECTIVE_SET);
    }
  }

  markAwaitingRationale(): void {
    if (this._state !== CommentState.DIRECTIVE_SET || this._directive !== Directive.WONT_FIX) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.DIRECTIVE_SET);
    }
    this._awaitingRationale = true;
  }

  beginAttempt(): void {
    if (this._state === CommentState.IN_PROGRESS) {
      throw new AlreadyInProgressError(this.id);
    }
    if (this._directive !== Directive.AUTO_FIX) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.IN_PROGRESS);
    }
    this.transition(CommentState.IN_PROGRESS);
  }

  markFixed(reference: string): void {
    this.transition(CommentState.FIXED, { success: true, reference });
  }

  markFixFailed(reason: string): void {
    this.transition(CommentState.FIX_FAILED, { success: false, reason });
  }

  markWontFixPosted(rationale: string): void {
    if (this._directive !== Directive.WONT_FIX) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.WONT_FIX_POSTED);
    }
    this.transition(CommentState.WONT_FIX_POSTED, { success: true, reference: rationale });
  }

  markManualAcknowledged(): void {
    if (this._directive !== Directive.MANUAL) {
      throw new InvalidTransitionError(this.id, this._state, CommentState.MANUAL_ACKNOWLEDGED);
    }
    this.transition(CommentState.MANUAL_ACKNOWLEDGED, {
      success: true,
      reference: this._note ?? 'acknowledged for manual follow-up',
    });
  }

  toJSON(): CommentSnapshot {
    return {
      id: this.id,
      author: this.author,
      createdAt: this.createdAt,
      body: this.body,
      location: this.location,
      category: this._category,
      severity: this._severity,
      state: this._state,
      directive: this._directive,
      note: this._note,
      outcome: this._outcome,
      redFlags: this.sanitized.redFlags,
      awaitingRationale: this._awaitingRationale,
    };
  }

  private transition(to: CommentState, outcome?: CommentOutcome): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new InvalidTransitionError(this.id, this._state, to);
    }
    this._state = to;
    if (TERMINAL_STATES.has(to)) {
      this._outcome = outcome;
    }
  }
}
