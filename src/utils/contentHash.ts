import { createHash } from 'crypto';

/**
 * Creates a SHA-256 hash hex string from input text.
 */
export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Hash of a single body line, ignoring surrounding whitespace.
 */
export function lineHash(line: string): string {
  return sha256Hex(line.trim());
}
