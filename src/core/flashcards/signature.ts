/**
 * Error Signatures
 *
 * Two errors are "the same" for flashcard purposes when their type, line and
 * normalized description match. Normalization lower-cases, collapses
 * whitespace, trims, and drops trailing punctuation, so "Missing colon." and
 * "missing  colon" share a signature.
 */

import type { CodeError, ErrorSignature } from '../models';

const TRAILING_PUNCTUATION = /[\s.,;:!?]+$/;

export function normalizeDescription(description: string): string {
  return description.toLowerCase().replace(/\s+/g, ' ').trim().replace(TRAILING_PUNCTUATION, '');
}

export function signatureOf(error: CodeError): ErrorSignature {
  return {
    errorType: error.errorType,
    description: normalizeDescription(error.description),
    lineNumber: error.lineNumber,
  };
}

/**
 * Serialized form stored on the flashcard: `type|description|line`, with `-`
 * for a missing line.
 */
export function serializeSignature(signature: ErrorSignature): string {
  const line = signature.lineNumber === null ? '-' : String(signature.lineNumber);
  return `${signature.errorType}|${signature.description}|${line}`;
}
