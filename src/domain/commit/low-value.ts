import { DEFAULT_LOW_VALUE_PATTERNS } from '../../shared/constants';

/**
 * Flags titles that describe debug scaffolding or trivial edits.
 */
export class LowValueFilter {
  private readonly patterns: RegExp[];

  constructor(patterns: readonly string[] = DEFAULT_LOW_VALUE_PATTERNS) {
    this.patterns = patterns.map((pattern) => new RegExp(pattern, 'i'));
  }

  isLowValue(title: string): boolean {
    return this.patterns.some((pattern) => pattern.test(title));
  }
}
