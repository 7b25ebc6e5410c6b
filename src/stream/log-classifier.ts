/**
 * Log Classifier
 *
 * Deterministic text -> level mapping. Rules are evaluated in order and the
 * first match wins:
 *
 *   1. error    word markers: error, fatal, exception, traceback, failed, failure; or ❌ ✖ ✗
 *   2. warning  word markers: warn, warning, deprecated; or ⚠
 *   3. success  word markers: success, successful, successfully, succeeded, completed, done; or ✅ ✔ 🎉
 *   4. info     everything else
 *
 * Word markers are matched case-insensitively on word boundaries, so
 * "ERROR: x" is an error while "terrorist" is not.
 */

import { LogLevel } from '../models/log-record';

/**
 * Pattern sources per level (regular expression source strings)
 */
export interface ClassificationPatterns {
  error: string[];
  warning: string[];
  success: string[];
}

export const DEFAULT_CLASSIFICATION_PATTERNS: ClassificationPatterns = {
  error: ['\\b(error|fatal|exception|traceback|failed|failure)\\b', '❌|✖|✗'],
  warning: ['\\b(warn|warning|deprecated)\\b', '⚠'],
  success: ['\\b(success|successful|successfully|succeeded|completed|done)\\b', '✅|✔|🎉'],
};

const RULE_ORDER: readonly Exclude<LogLevel, 'info'>[] = ['error', 'warning', 'success'];

export class LogClassifier {
  private readonly rules: Array<{ level: LogLevel; patterns: RegExp[] }>;

  /**
   * @throws SyntaxError when a pattern source is not a valid regular expression
   */
  constructor(patterns: Partial<ClassificationPatterns> = {}) {
    const merged: ClassificationPatterns = {
      ...DEFAULT_CLASSIFICATION_PATTERNS,
      ...patterns,
    };
    this.rules = RULE_ORDER.map(level => ({
      level,
      patterns: merged[level].map(source => new RegExp(source, 'iu')),
    }));
  }

  classify(text: string): LogLevel {
    for (const rule of this.rules) {
      if (rule.patterns.some(pattern => pattern.test(text))) {
        return rule.level;
      }
    }
    return 'info';
  }
}
