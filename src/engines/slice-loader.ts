/**
 * Slice Loader
 *
 * Reads requirements slices from a YAML file. A slice is either given
 * inline or cut from a section of a source document (an SRS, usually).
 *
 * @example
 * ```yaml
 * slices:
 *   - name: User Login
 *     text: |
 *       The user signs in with email and password...
 *   - name: Payment Processing
 *     source: SRS_v3.md
 *     section: 3.2 Payment Processing
 * ```
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import * as yaml from 'yaml';
import { type RequirementsSlice, type SliceDefinition, SlicesFileSchema } from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { validatePath } from '../utils/path-security.js';

const HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;

function normalizeHeading(text: string): string {
  return text.replace(/\*\*/g, '').replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Return the body of the markdown section whose heading matches `heading`
 * (case-insensitive, leading `#`s and bold markers ignored), up to the next
 * heading of the same or a higher level. Undefined when no heading matches.
 */
export function extractSection(document: string, heading: string): string | undefined {
  const wanted = normalizeHeading(heading.replace(/^#+\s*/, ''));
  const lines = document.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const match = (lines[i] ?? '').match(HEADING);
    if (!match?.[1] || normalizeHeading(match[2] ?? '') !== wanted) continue;

    const level = match[1].length;
    const body: string[] = [];
    for (let j = i + 1; j < lines.length; j++) {
      const line = lines[j] ?? '';
      const next = line.match(HEADING);
      if (next?.[1] && next[1].length <= level) break;
      body.push(line);
    }
    return body.join('\n').trim();
  }
  return undefined;
}

export interface LoadSlicesOptions {
  /** Root that the slices file and its source documents must stay within */
  allowedRoot?: string | undefined;
}

/**
 * Parse slice definitions from YAML text. Source documents are read
 * relative to `baseDir`.
 *
 * @throws {ValidationError} on malformed YAML, a schema mismatch or a duplicate name
 * @throws {NotFoundError} when a referenced section does not exist
 */
export async function parseSlices(
  content: string,
  baseDir: string,
  options: LoadSlicesOptions = {}
): Promise<RequirementsSlice[]> {
  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    throw new ValidationError(`Slices file is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = SlicesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }

  const seen = new Set<string>();
  for (const definition of parsed.data.slices) {
    if (seen.has(definition.name)) {
      throw new ValidationError(`Duplicate slice name: ${definition.name}`, [
        { path: 'slices', message: `"${definition.name}" is defined more than once` },
      ]);
    }
    seen.add(definition.name);
  }

  const documents = new Map<string, string>();
  const readSource = async (source: string): Promise<string> => {
    const path = validatePath(source, {
      allowedRoot: options.allowedRoot ?? baseDir,
      mustBeDirectory: false,
    });
    const cached = documents.get(path);
    if (cached !== undefined) return cached;
    const text = await readFile(path, 'utf-8');
    documents.set(path, text);
    return text;
  };

  const resolveSlice = async (definition: SliceDefinition): Promise<RequirementsSlice> => {
    if ('text' in definition) {
      return { name: definition.name, text: definition.text };
    }
    const document = await readSource(resolve(baseDir, definition.source));
    const text = extractSection(document, definition.section);
    if (text === undefined) {
      throw new NotFoundError('Section', definition.section, { source: definition.source, slice: definition.name });
    }
    return { name: definition.name, text };
  };

  const slices: RequirementsSlice[] = [];
  for (const definition of parsed.data.slices) {
    slices.push(await resolveSlice(definition));
  }

  logger.debug('Slices loaded', undefined, { count: slices.length, names: slices.map((s) => s.name) });
  return slices;
}

/**
 * Load slices from a YAML file
 */
export async function loadSlicesFile(path: string, options: LoadSlicesOptions = {}): Promise<RequirementsSlice[]> {
  const resolved = validatePath(path, {
    allowedRoot: options.allowedRoot ?? process.cwd(),
    mustBeDirectory: false,
  });
  const content = await readFile(resolved, 'utf-8');
  return parseSlices(content, dirname(resolved), {
    allowedRoot: options.allowedRoot ?? process.cwd(),
  });
}
