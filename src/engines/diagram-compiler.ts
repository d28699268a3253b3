/**
 * Diagram compiler adapter: renders PlantUML source to PNG through the
 * PlantUML jar.
 */

import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { RunAbortedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveInside, toFileSlug } from '../utils/path-security.js';
import type { CompileRequest, CompileResult, DiagramCompiler, InstallationStatus } from './adapters.js';

const START_MARKER = '@startuml';
const END_MARKER = '@enduml';

export interface CommandResult {
  /** null when the process never produced an exit code (spawn failure, kill) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs: number; signal?: AbortSignal | undefined }
) => Promise<CommandResult>;

/**
 * Runs a command to completion. Only an aborted signal rejects; every other
 * failure is reported through the result.
 */
export const execFileRunner: CommandRunner = (command, args, options) =>
  new Promise((resolvePromise, reject) => {
    execFile(
      command,
      [...args],
      { timeout: options.timeoutMs, signal: options.signal, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (options.signal?.aborted) {
          reject(new RunAbortedError(options.signal.reason));
          return;
        }
        if (!error) {
          resolvePromise({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        resolvePromise({
          exitCode: typeof error.code === 'number' ? error.code : null,
          stdout,
          stderr: stderr || error.message,
          timedOut: error.killed === true,
        });
      }
    );
  });

/**
 * Pull the PlantUML block out of model output.
 *
 * Takes the text from the first `@startuml` through the first `@enduml`
 * after it. Without both markers, drops markdown fence lines and adds
 * whichever marker is missing.
 */
export function extractPlantUml(response: string): string {
  const startIndex = response.indexOf(START_MARKER);
  const endIndex = startIndex === -1 ? -1 : response.indexOf(END_MARKER, startIndex);

  if (startIndex !== -1 && endIndex !== -1) {
    return response.slice(startIndex, endIndex + END_MARKER.length).trim();
  }

  let cleaned = response
    .trim()
    .split('\n')
    .filter((line) => !line.trim().startsWith('```'))
    .join('\n')
    .trim();

  if (!cleaned.startsWith(START_MARKER)) {
    cleaned = `${START_MARKER}\n${cleaned}`;
  }
  if (!cleaned.endsWith(END_MARKER)) {
    cleaned = `${cleaned}\n${END_MARKER}`;
  }
  return cleaned;
}

/**
 * Structural checks run before paying for a JVM start
 */
export function precheckPlantUml(source: string): string | null {
  const trimmed = source.trim();
  if (!trimmed) return 'Empty PlantUML source';
  if (!trimmed.startsWith(START_MARKER)) return `Missing ${START_MARKER} directive`;
  if (!trimmed.endsWith(END_MARKER)) return `Missing ${END_MARKER} directive`;
  return null;
}

export interface PlantUmlCompilerOptions {
  jarPath: string;
  outputDir: string;
  javaBin?: string | undefined;
  timeoutMs?: number | undefined;
  runner?: CommandRunner | undefined;
}

export class PlantUmlCompiler implements DiagramCompiler {
  private readonly jarPath: string;
  private readonly outputDir: string;
  private readonly javaBin: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: PlantUmlCompilerOptions) {
    this.jarPath = options.jarPath;
    this.outputDir = options.outputDir;
    this.javaBin = options.javaBin ?? 'java';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.runner = options.runner ?? execFileRunner;
  }

  normalize(text: string): string {
    return extractPlantUml(text);
  }

  /**
   * Where the source for a request is written:
   * `<outputDir>/<slice>/<kind>/<kind>_v<version>.puml`
   */
  sourcePathFor(request: CompileRequest): string {
    const slice = toFileSlug(request.sliceName);
    const fileName = request.version !== undefined
      ? `${request.kind}_v${request.version}.puml`
      : `${request.kind}_${Date.now()}.puml`;
    return resolveInside(this.outputDir, slice, request.kind, fileName);
  }

  async compile(request: CompileRequest, signal?: AbortSignal): Promise<CompileResult> {
    const problem = precheckPlantUml(request.sourceText);
    if (problem) {
      return { status: 'failed', reason: problem };
    }

    const pumlPath = this.sourcePathFor(request);
    try {
      await mkdir(dirname(pumlPath), { recursive: true });
      await writeFile(pumlPath, request.sourceText, 'utf-8');
    } catch (error) {
      logger.warn('Could not write PlantUML source', error, { pumlPath });
      return {
        status: 'failed',
        reason: `Failed to write diagram source: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    // PlantUML's own -timeout is in seconds
    const plantUmlTimeout = String(Math.max(1, Math.floor(this.timeoutMs / 1000)));
    const result = await this.runner(
      this.javaBin,
      ['-jar', this.jarPath, '-timeout', plantUmlTimeout, pumlPath],
      { timeoutMs: this.timeoutMs + 5_000, signal }
    );

    if (result.timedOut) {
      return { status: 'failed', reason: `PlantUML compilation timed out after ${this.timeoutMs}ms` };
    }
    if (result.exitCode !== 0) {
      const reason = (result.stderr || result.stdout).trim() || 'Unknown syntax error';
      logger.debug('PlantUML rejected diagram', undefined, { kind: request.kind, pumlPath, exitCode: result.exitCode });
      return { status: 'failed', reason };
    }

    const pngPath = pumlPath.replace(/\.puml$/, '.png');
    if (!existsSync(pngPath)) {
      return { status: 'failed', reason: 'Image file was not generated' };
    }

    logger.debug('Diagram rendered', undefined, { kind: request.kind, pngPath });
    return { status: 'succeeded', renderedLocation: pngPath };
  }

  /**
   * Checks the jar exists and that `java -jar <jar> -version` runs
   */
  async verifyInstallation(signal?: AbortSignal): Promise<InstallationStatus> {
    if (!existsSync(this.jarPath)) {
      return { ok: false, detail: `PlantUML JAR not found at: ${this.jarPath}` };
    }
    const result = await this.runner(this.javaBin, ['-jar', this.jarPath, '-version'], {
      timeoutMs: this.timeoutMs,
      signal,
    });
    if (result.exitCode !== 0) {
      return { ok: false, detail: `PlantUML test failed: ${(result.stderr || result.stdout).trim()}` };
    }
    const firstLine = result.stdout.split('\n')[0]?.trim() ?? '';
    return { ok: true, detail: firstLine || 'PlantUML available' };
  }
}
