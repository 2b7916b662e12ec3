// Regular-expression exclusion rules

import { IndexOutOfRangeError, InvalidPatternError } from './errors';

/**
 * Compile a pattern, throwing InvalidPatternError when it is blank or not a
 * valid regular expression
 */
export function validatePattern(pattern: string): RegExp {
  if (pattern.trim().length === 0) {
    throw new InvalidPatternError(pattern);
  }

  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidPatternError(pattern, error);
  }
}

/**
 * True when any pattern matches somewhere in the filename (search, not full match).
 * Patterns that do not compile never match.
 */
export function isExcluded(fileName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    try {
      return new RegExp(pattern).test(fileName);
    } catch {
      return false;
    }
  });
}

/**
 * Ordered set of exclusion patterns with their compiled expressions.
 * Only patterns that compile are ever stored.
 */
export class ExclusionFilter {
  private readonly patterns: string[] = [];
  private readonly compiled: RegExp[] = [];

  constructor(patterns: readonly string[] = []) {
    for (const pattern of patterns) {
      this.addPattern(pattern);
    }
  }

  addPattern(pattern: string): void {
    const expression = validatePattern(pattern);
    this.patterns.push(pattern);
    this.compiled.push(expression);
  }

  /**
   * Remove the pattern at a zero-based position and return it
   */
  removePattern(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.patterns.length) {
      throw new IndexOutOfRangeError(index, this.patterns.length);
    }

    this.compiled.splice(index, 1);
    return this.patterns.splice(index, 1)[0];
  }

  matches(fileName: string): boolean {
    return this.compiled.some((expression) => expression.test(fileName));
  }

  list(): string[] {
    return [...this.patterns];
  }

  get size(): number {
    return this.patterns.length;
  }
}
