/**
 * Code Analysis Domain Types
 *
 * Errors are produced by the code-analysis collaborator and consumed by the
 * hint ladder and the flashcard curator. They are never stored on their own;
 * they live on inside a ladder's subject or a flashcard's signature.
 */

/** Category of a detected problem. */
export type ErrorType = 'syntax' | 'logic' | 'runtime';

/** Allowed severity values, 1 (cosmetic) to 5 (breaks the program). */
export type Severity = 1 | 2 | 3 | 4 | 5;

/**
 * A single problem found in submitted code.
 *
 * @example
 * ```typescript
 * const error: CodeError = {
 *   errorType: 'logic',
 *   lineNumber: 10,
 *   description: 'Loop never terminates because i is never incremented',
 *   severity: 5,
 * };
 * ```
 */
export interface CodeError {
  errorType: ErrorType;
  /** 1-based line, or null when the problem is not tied to a line */
  lineNumber: number | null;
  description: string;
  severity: Severity;
}

/**
 * A detected error paired with the correction the analyzer proposes.
 * The correction becomes the back of a flashcard.
 */
export interface CodeAnalysisFinding {
  error: CodeError;
  correction: string;
}

/** Full result of analyzing one code submission. */
export interface CodeAnalysis {
  findings: CodeAnalysisFinding[];
  /** Short overall assessment shown to the learner */
  summary: string;
}

/**
 * Orders errors for processing: severity descending, then line number
 * ascending (errors without a line go last), then first-seen order.
 *
 * Used both to pick a hint ladder's subject and to order flashcard curation.
 */
export function compareBySeverity(
  a: { error: CodeError; index: number },
  b: { error: CodeError; index: number }
): number {
  if (a.error.severity !== b.error.severity) {
    return b.error.severity - a.error.severity;
  }
  const lineA = a.error.lineNumber ?? Number.POSITIVE_INFINITY;
  const lineB = b.error.lineNumber ?? Number.POSITIVE_INFINITY;
  if (lineA !== lineB) {
    return lineA - lineB;
  }
  return a.index - b.index;
}

/**
 * Returns the items sorted with {@link compareBySeverity}, leaving the input untouched.
 */
export function orderBySeverity<T>(items: readonly T[], getError: (item: T) => CodeError): T[] {
  return items
    .map((item, index) => ({ item, error: getError(item), index }))
    .sort(compareBySeverity)
    .map((entry) => entry.item);
}
