import { resolve, relative, isAbsolute, normalize, join } from 'node:path';
import { existsSync, statSync } from 'node:fs';

/**
 * Error thrown when a path would escape its allowed root.
 */
export class PathTraversalError extends Error {
  constructor(
    public readonly attemptedPath: string,
    public readonly resolvedPath: string,
    public readonly allowedRoot: string
  ) {
    super(
      `Path traversal attempt detected: "${attemptedPath}" resolves to "${resolvedPath}" which is outside allowed root "${allowedRoot}"`
    );
    this.name = 'PathTraversalError';
  }
}

export class InvalidPathError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Invalid path "${path}": ${reason}`);
    this.name = 'InvalidPathError';
  }
}

export interface ValidatePathOptions {
  /** Root directory the path must stay within. Defaults to process.cwd(). */
  allowedRoot?: string;
  /** Whether the path must exist. Defaults to true. */
  mustExist?: boolean;
  /** Require a directory (true) or a regular file (false). */
  mustBeDirectory?: boolean;
  /** Defaults to 4096 characters. */
  maxLength?: number;
}

const DEFAULT_MAX_PATH_LENGTH = 4096;

const DANGEROUS_PATH_PATTERN = /[\x00-\x1f]/;

/**
 * Validate and normalise a path, keeping it inside `allowedRoot`.
 *
 * Used for every user-supplied document path (URD, SRS, slice files) and for
 * every report the store writes.
 *
 * @returns The normalised absolute path
 * @throws {InvalidPathError} empty, over-long, control characters, missing, wrong type
 * @throws {PathTraversalError} when the path escapes the root
 *
 * @example
 * validatePath('docs/SRS_v1.md') // => '/work/project/docs/SRS_v1.md'
 * validatePath('../../etc/passwd') // throws PathTraversalError
 */
export function validatePath(inputPath: string, options: ValidatePathOptions = {}): string {
  const {
    allowedRoot = process.cwd(),
    mustExist = true,
    mustBeDirectory,
    maxLength = DEFAULT_MAX_PATH_LENGTH,
  } = options;

  if (!inputPath || typeof inputPath !== 'string') {
    throw new InvalidPathError(String(inputPath), 'path must be a non-empty string');
  }

  if (inputPath.length > maxLength) {
    throw new InvalidPathError(
      inputPath.slice(0, 50) + '...',
      `path exceeds maximum length of ${maxLength} characters`
    );
  }

  if (DANGEROUS_PATH_PATTERN.test(inputPath)) {
    throw new InvalidPathError(inputPath, 'path contains null bytes or control characters');
  }

  const normalizedRoot = resolve(allowedRoot);
  const resolvedPath = isAbsolute(inputPath)
    ? normalize(inputPath)
    : resolve(normalizedRoot, inputPath);

  const relativePath = relative(normalizedRoot, resolvedPath);
  if (relativePath.startsWith('..') || isAbsolute(relativePath)) {
    throw new PathTraversalError(inputPath, resolvedPath, normalizedRoot);
  }

  if (mustExist && !existsSync(resolvedPath)) {
    throw new InvalidPathError(inputPath, 'path does not exist');
  }

  if (mustExist && mustBeDirectory !== undefined) {
    let isDirectory: boolean;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidPathError(inputPath, `cannot stat path: ${reason}`);
    }
    if (mustBeDirectory && !isDirectory) {
      throw new InvalidPathError(inputPath, 'path is not a directory');
    }
    if (!mustBeDirectory && isDirectory) {
      throw new InvalidPathError(inputPath, 'path is a directory, expected a file');
    }
  }

  return resolvedPath;
}

/**
 * Turn a slice or document name into a file-name-safe slug.
 *
 * Keeps letters, digits, hyphens and underscores; whitespace runs become a
 * single underscore; everything else is dropped. Falls back to `unnamed`.
 *
 * @example
 * toFileSlug('User Authentication') // => 'User_Authentication'
 * toFileSlug('../../etc')           // => 'etc'
 */
export function toFileSlug(name: string): string {
  const slug = name
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '')
    .replace(/^[_-]+|[_-]+$/g, '')
    .slice(0, 100);
  return slug.length > 0 ? slug : 'unnamed';
}

/**
 * Join segments under `root`, refusing any result that leaves it.
 */
export function resolveInside(root: string, ...segments: string[]): string {
  return validatePath(join(...segments), { allowedRoot: root, mustExist: false });
}
