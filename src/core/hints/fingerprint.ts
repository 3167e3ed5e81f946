import { createHash } from 'crypto';

/**
 * Stable fingerprint of a code submission. Line endings and trailing
 * whitespace are ignored so a resubmission of the same code matches.
 */
export function fingerprintCode(code: string): string {
  const normalized = code
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
  return createHash('sha256').update(normalized).digest('hex').slice(0, 16);
}
