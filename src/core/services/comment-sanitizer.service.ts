import { Injectable } from '@nestjs/common';
import { SanitizedContent } from '../domain/entities/review-comment.entity';

export const DEFAULT_MAX_COMMENT_LENGTH = 4000;

const REDACTED = '[REDACTED]';
const TRUNCATED = '...[TRUNCATED]';

// Directives smuggled into review text to steer an automated fixer
const INJECTION_PATTERNS: Record<string, RegExp> = {
  systemInstruction: /\[SYSTEM[:\]].+/gi,
  ignoreDirective: /\[IGNORE\].+/gi,
  overrideDirective: /\[(BYPASS|OVERRIDE|SECURITY)[:\]].+/gi,
  htmlCommentInjection: /<!--\s*(SYSTEM|IGNORE|BYPASS)[\s\S]*?-->/gi,
  yamlInjection: /^\s*(SYSTEM|IGNORE|BYPASS):.+$/gim,
  templateLiteral: /\{\{.+?(SYSTEM|IGNORE|BYPASS).+?\}\}/gi,
  jinjaInjection: /\{%.*?(SYSTEM|IGNORE|BYPASS).*?%\}/gi,
};

const SUSPICIOUS_PHRASES = [
  'ALWAYS BYPASS',
  'NEVER REVIEW',
  'AUTO-APPROVE',
  'SKIP VALIDATION',
  'SKIP CHECKS',
  'DISABLE SECURITY',
  'OVERRIDE RULES',
  'IGNORE POLICY',
  'FORCE MERGE',
  'URGENT - BYPASS',
  'CRITICAL - SKIP',
];

/**
 * Cleans untrusted comment text before it reaches the remediation action.
 */
@Injectable()
export class CommentSanitizerService {
  constructor(private readonly maxLength: number = DEFAULT_MAX_COMMENT_LENGTH) {}

  sanitize(body: string): SanitizedContent {
    const redFlags: string[] = [];
    let content = body;

    for (const [name, pattern] of Object.entries(INJECTION_PATTERNS)) {
      const replaced = content.replace(pattern, REDACTED);
      if (replaced !== content) {
        redFlags.push(name);
        content = replaced;
      }
    }

    for (const phrase of SUSPICIOUS_PHRASES) {
      const words = phrase.split(' ').map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      if (new RegExp(words.join('.*'), 'i').test(content)) {
        redFlags.push(`suspicious_keyword_${phrase.replace(/\s+/g, '_')}`);
      }
    }

    content = content
      .replace(/\n\n+/g, '\n')
      .replace(/ {2,}/g, ' ')
      .trim();

    // Measured in code points so a cut never splits a surrogate pair
    const codePoints = Array.from(content);
    if (codePoints.length > this.maxLength) {
      content = codePoints.slice(0, this.maxLength).join('') + TRUNCATED;
      redFlags.push('content_truncated');
    }

    return {
      content,
      redFlags,
      isSuspicious: redFlags.length > 0,
    };
  }
}
