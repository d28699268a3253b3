import { randomBytes } from 'node:crypto';

const MAX_PREFIX_LENGTH = 50;

/**
 * Prefixes are restricted so IDs are safe to use as file names.
 */
const SAFE_PREFIX_PATTERN = /^[a-z0-9]+$/i;

/**
 * Generate a unique, file-name-safe ID.
 *
 * Format: `{prefix}-{timestamp}-{random}` where timestamp is base36 epoch
 * milliseconds and random is 12 characters of base64url (with `-` mapped to
 * `_` so the three parts stay splittable on `-`).
 *
 * @example
 * generateId('run') // => 'run-m5x8z7k-A3bC9dE2fG1h'
 */
export function generateId(prefix: string): string {
  if (!prefix || typeof prefix !== 'string') {
    throw new Error('Prefix must be a non-empty string');
  }

  if (prefix.length > MAX_PREFIX_LENGTH) {
    throw new Error(`Prefix must be ${MAX_PREFIX_LENGTH} characters or less`);
  }

  if (!SAFE_PREFIX_PATTERN.test(prefix)) {
    throw new Error('Prefix must contain only alphanumeric characters');
  }

  const timestamp = Date.now().toString(36);
  const random = randomBytes(9).toString('base64url').slice(0, 12).replace(/-/g, '_');

  return `${prefix}-${timestamp}-${random}`;
}

export function generateRunId(): string {
  return generateId('run');
}
