/**
 * Contracts between the refinement loop and the outside world. The
 * controller depends only on these; tests supply in-process fakes.
 */

import type { ArtifactAttempt, ArtifactKind, RequirementsSlice } from '../types/index.js';

/**
 * Turns a prompt into text. Retries are the implementation's business; a
 * rejected promise means retries are exhausted.
 */
export interface TextGenerator {
  generateText(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface CompileRequest {
  kind: ArtifactKind;
  sliceName: string;
  sourceText: string;
  /** Iteration number, used to version the written source */
  version?: number | undefined;
}

export type CompileResult =
  | { status: 'succeeded'; renderedLocation: string }
  | { status: 'failed'; reason: string };

export interface InstallationStatus {
  ok: boolean;
  detail: string;
}

export interface DiagramCompiler {
  compile(request: CompileRequest, signal?: AbortSignal): Promise<CompileResult>;
  /**
   * Pull diagram source out of free-form model output
   */
  normalize?(text: string): string;
  /** Used by the health check when present */
  verifyInstallation?(signal?: AbortSignal): Promise<InstallationStatus>;
}

/**
 * Produces the free-text QA report for one iteration's attempts
 */
export interface Validator {
  validate(
    slice: RequirementsSlice,
    attempts: readonly ArtifactAttempt[],
    signal?: AbortSignal
  ): Promise<string>;
}
