/**
 * Requirements-document workflow
 *
 * URD -> SRS v1 -> validate -> (review -> SRS v(n+1) -> validate)* until the
 * audit reports no more than `targetErrors` problems or `maxIterations`
 * versions exist. Every version and audit is saved as SRS_v<n>.md and
 * SRSVR_v<n>.md.
 */

import type { TextGenerator } from '../engines/adapters.js';
import { extractErrorCount } from '../engines/score-extractor.js';
import { buildSrsPrompt, buildSrsReviewPrompt, buildSrsValidationPrompt, buildUrdPrompt } from '../prompts/index.js';
import type { ReportStore } from '../storage/index.js';
import type { SrsIteration, SrsOutcome, SrsRunOptions, SrsRunResult } from '../types/index.js';
import { SrsRunOptionsSchema } from '../types/index.js';
import { describeAbort, raceAbort } from '../utils/abort.js';
import { RunAbortedError, ValidationError, isAbortError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const SRS_BASE = 'SRS';
export const SRS_REPORT_BASE = 'SRSVR';
export const URD_BASE = 'URD';

export interface GeneratedUrd {
  text: string;
  path: string;
}

export class SrsWorkflow {
  constructor(
    private readonly generator: TextGenerator,
    private readonly store: ReportStore
  ) {}

  private async ask(prompt: string, signal: AbortSignal | undefined): Promise<string> {
    if (signal?.aborted) {
      throw new RunAbortedError(signal.reason);
    }
    return raceAbort(this.generator.generateText(prompt, signal), signal);
  }

  /**
   * Turn a short product brief into a User Requirements Document, saved
   * under the next free URD version
   */
  async generateUrd(brief: string, signal?: AbortSignal): Promise<GeneratedUrd> {
    if (!brief.trim()) {
      throw new ValidationError('A product brief is required to generate a URD');
    }
    const text = await this.ask(buildUrdPrompt(brief), signal);
    const version = await this.store.nextVersion('', URD_BASE);
    const path = await this.store.saveDocument(URD_BASE, version, text, 'User Requirements Document (URD)');
    logger.info('URD generated', { path, length: text.length });
    return { text, path };
  }

  /**
   * @throws {ValidationError} for invalid options
   * @throws {AdapterError} when the model cannot be reached after retries
   */
  async run(options: SrsRunOptions, signal?: AbortSignal): Promise<SrsRunResult> {
    const parsed = SrsRunOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    const { urd, standard, maxIterations, targetErrors } = parsed.data;

    const iterations: SrsIteration[] = [];
    const finish = (outcome: SrsOutcome): SrsRunResult => {
      const last = iterations[iterations.length - 1];
      logger.info('SRS workflow finished', {
        outcome,
        finalVersion: last?.version ?? 0,
        finalErrorCount: last?.errorCount ?? null,
      });
      return {
        outcome,
        finalVersion: last?.version ?? 0,
        finalErrorCount: last?.errorCount ?? null,
        iterations,
      };
    };

    try {
      let version = 1;
      let srs = await this.ask(buildSrsPrompt(urd, standard), signal);
      let documentPath = await this.store.saveDocument(SRS_BASE, version, srs);
      let previousReport: string | undefined;

      for (;;) {
        const report = await this.ask(buildSrsValidationPrompt(urd, srs, standard, previousReport), signal);
        const reportPath = await this.store.saveDocument(
          SRS_REPORT_BASE,
          version,
          report,
          'SRS Validation Report (SRSVR)'
        );
        const errorCount = extractErrorCount(report);
        iterations.push({ version, documentPath, reportPath, errorCount });

        if (errorCount === null) {
          logger.warn('Validation report has no <errors: N> tag; treating the audit as failed', undefined, { version });
        } else {
          logger.info('SRS validated', { version, errorCount });
        }

        if (errorCount !== null && errorCount <= targetErrors) {
          return finish('target-reached');
        }
        if (version >= maxIterations) {
          return finish('max-iterations-exhausted');
        }

        version += 1;
        srs = await this.ask(buildSrsReviewPrompt(srs, report, version), signal);
        documentPath = await this.store.saveDocument(SRS_BASE, version, srs);
        previousReport = report;
      }
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        logger.warn('SRS workflow aborted', undefined, {
          reason: describeAbort(signal?.reason ?? error, undefined),
          completedVersions: iterations.length,
        });
        return finish('aborted');
      }
      throw error;
    }
  }
}
