/**
 * Refinement Controller
 *
 * Drives one run for one requirements slice:
 *
 *   idle -> generating -> compiling -> validating -> scoring -> deciding
 *        -> generating (next iteration) | stopped
 *
 * - Per-kind generate/compile tasks run concurrently and are joined before
 *   validation
 * - A failed kind becomes a failed attempt, never a failed iteration
 * - Stops on target score, then on max iterations, in that order
 * - An AbortSignal or the time budget abandons the in-flight iteration
 */

import type {
  ArtifactAttempt,
  ArtifactKind,
  IterationFailure,
  IterationRecord,
  MetricsRecord,
  RefinementRun,
  RequirementsSlice,
  RunOutcome,
} from '../types/index.js';
import { DEFAULT_RUN_PARAMETERS, RequirementsSliceSchema, RunParametersSchema } from '../types/index.js';
import {
  ErrorCode,
  IterationHookError,
  RefinerError,
  RunAbortedError,
  ValidationError,
  isAbortError,
} from '../utils/errors.js';
import { describeAbort, raceAbort, runSignal } from '../utils/abort.js';
import { generateRunId } from '../utils/id.js';
import { logger } from '../utils/logger.js';
import type { DiagramCompiler, TextGenerator, Validator } from './adapters.js';
import { HistoryRecorder } from './history-recorder.js';
import { synthesize } from './prompt-synthesizer.js';
import { extract } from './score-extractor.js';

export type ControllerState =
  | 'idle'
  | 'generating'
  | 'compiling'
  | 'validating'
  | 'scoring'
  | 'deciding'
  | 'stopped';

export interface RefinementControllerDeps {
  generator: TextGenerator;
  compiler: DiagramCompiler;
  validator: Validator;
  recorder?: HistoryRecorder | undefined;
}

export interface RunOptions {
  kinds?: ArtifactKind[] | undefined;
  maxIterations?: number | undefined;
  targetScore?: number | undefined;
  signal?: AbortSignal | undefined;
  /** Wall-clock budget for the whole run; 0 or absent means none */
  timeBudgetMs?: number | undefined;
  runId?: string | undefined;
  /** Called after each iteration is recorded, e.g. to persist its report */
  onIteration?: ((run: RefinementRun, record: IterationRecord) => Promise<void> | void) | undefined;
}

type Decision = RunOutcome | 'continue';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface IterationContext {
  index: number;
  priorMetrics: MetricsRecord | undefined;
  previousSources: ReadonlyMap<ArtifactKind, string>;
  signal: AbortSignal | undefined;
}

export class RefinementController {
  private readonly generator: TextGenerator;
  private readonly compiler: DiagramCompiler;
  private readonly validator: Validator;
  private readonly recorder: HistoryRecorder;
  private state: ControllerState = 'idle';

  constructor(deps: RefinementControllerDeps) {
    this.generator = deps.generator;
    this.compiler = deps.compiler;
    this.validator = deps.validator;
    this.recorder = deps.recorder ?? new HistoryRecorder();
  }

  getState(): ControllerState {
    return this.state;
  }

  private transition(next: ControllerState): void {
    if (this.state === next) return;
    logger.debug('Controller state transition', undefined, { from: this.state, to: next });
    this.state = next;
  }

  /**
   * Run the loop for one slice until the target score, max iterations or
   * an abort. Resolves with a sealed run. A failing onIteration hook seals
   * the run `aborted` and then rejects with IterationHookError.
   *
   * @throws {ValidationError} for an invalid slice or run parameters
   * @throws {RefinerError} CONFLICT when this controller is already running
   */
  async run(slice: RequirementsSlice, options: RunOptions = {}): Promise<RefinementRun> {
    if (this.state !== 'idle' && this.state !== 'stopped') {
      throw new RefinerError('A refinement run is already in progress on this controller', ErrorCode.CONFLICT);
    }

    const sliceResult = RequirementsSliceSchema.safeParse(slice);
    if (!sliceResult.success) {
      throw ValidationError.fromZodError(sliceResult.error);
    }
    const params = RunParametersSchema.safeParse({
      kinds: options.kinds ?? DEFAULT_RUN_PARAMETERS.kinds,
      maxIterations: options.maxIterations ?? DEFAULT_RUN_PARAMETERS.maxIterations,
      targetScore: options.targetScore ?? DEFAULT_RUN_PARAMETERS.targetScore,
    });
    if (!params.success) {
      throw ValidationError.fromZodError(params.error);
    }

    const run: RefinementRun = {
      id: options.runId ?? generateRunId(),
      slice: { ...sliceResult.data },
      kinds: [...params.data.kinds],
      maxIterations: params.data.maxIterations,
      targetScore: params.data.targetScore,
      history: [],
      startedAt: new Date().toISOString(),
    };
    const signal = runSignal(options.signal, options.timeBudgetMs);

    return logger.withRequestContext({ runId: run.id, sliceName: run.slice.name }, async () => {
      logger.info('Refinement run started', {
        kinds: run.kinds,
        maxIterations: run.maxIterations,
        targetScore: run.targetScore,
      });

      try {
        await this.loop(run, signal, options.onIteration);
      } catch (error) {
        if (error instanceof IterationHookError) {
          logger.error('Iteration hook failed; stopping run', error.cause, { iteration: error.iteration });
          this.recorder.seal(run, 'aborted', error.message);
          this.transition('stopped');
          throw error;
        }
        if (isAbortError(error) || signal?.aborted) {
          const reason = describeAbort(signal?.reason ?? error, options.timeBudgetMs);
          logger.warn('Refinement run aborted', undefined, { reason, completedIterations: run.history.length });
          this.recorder.seal(run, 'aborted', reason);
        } else {
          this.transition('stopped');
          throw error;
        }
      }

      this.transition('stopped');
      return run;
    });
  }

  private async loop(
    run: RefinementRun,
    signal: AbortSignal | undefined,
    onIteration: RunOptions['onIteration']
  ): Promise<void> {
    let priorMetrics: MetricsRecord | undefined;
    const previousSources = new Map<ArtifactKind, string>();

    for (let index = 1; ; index++) {
      logger.updateContext({ iteration: index });

      const record = await this.runIteration(run, { index, priorMetrics, previousSources, signal });
      const recorded = this.recorder.append(run, record);
      if (onIteration) {
        try {
          await onIteration(run, recorded);
        } catch (error) {
          if (isAbortError(error)) throw error;
          throw new IterationHookError(index, error);
        }
      }

      if (recorded.metrics) {
        priorMetrics = recorded.metrics;
      }
      for (const attempt of recorded.artifactAttempts) {
        if (attempt.compileStatus.status === 'succeeded') {
          previousSources.set(attempt.kind, attempt.sourceText);
        } else if (attempt.sourceText.trim() && !previousSources.has(attempt.kind)) {
          // Nothing has compiled yet; improve the latest draft instead
          previousSources.set(attempt.kind, attempt.sourceText);
        }
      }

      this.transition('deciding');
      const decision = this.decide(run, recorded);
      logger.info('Iteration complete', {
        status: recorded.metrics ? 'scored' : recorded.failure?.stage,
        overallScore: recorded.metrics?.overallScore,
        delta: recorded.delta,
        decision,
      });

      if (decision !== 'continue') {
        this.recorder.seal(run, decision);
        return;
      }
    }
  }

  /**
   * Target first, then the iteration limit
   */
  private decide(run: RefinementRun, record: IterationRecord): Decision {
    if (record.metrics && record.metrics.overallScore >= run.targetScore) {
      return 'target-reached';
    }
    if (record.index >= run.maxIterations) {
      return 'max-iterations-exhausted';
    }
    return 'continue';
  }

  private async runIteration(run: RefinementRun, context: IterationContext): Promise<IterationRecord> {
    const startedAt = new Date().toISOString();
    const { signal } = context;

    const attempts = await this.produceArtifacts(run, context);
    if (signal?.aborted) {
      throw new RunAbortedError(signal.reason);
    }

    this.transition('validating');
    let report: string | undefined;
    let failure: IterationFailure | undefined;
    try {
      report = await raceAbort(this.validator.validate(run.slice, attempts, signal), signal);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;
      logger.warn('Validation failed; iteration recorded without metrics', error);
      failure = { stage: 'validation', reason: errorMessage(error) };
    }

    this.transition('scoring');
    let metrics: MetricsRecord | undefined;
    if (report !== undefined) {
      const result = extract(report);
      if (result.ok) {
        metrics = result.metrics;
      } else {
        logger.warn('QA report could not be scored', undefined, { reason: result.failure.reason });
        failure = { stage: 'parse', reason: result.failure.reason };
      }
    }

    const record: IterationRecord = {
      index: context.index,
      artifactAttempts: attempts,
      startedAt,
      completedAt: new Date().toISOString(),
    };
    if (metrics) {
      record.metrics = metrics;
      if (context.priorMetrics) {
        record.delta = metrics.overallScore - context.priorMetrics.overallScore;
      }
    }
    if (failure) record.failure = failure;
    if (report !== undefined && !metrics) record.validationReport = report;
    return record;
  }

  /**
   * One task per kind; all are joined before validation
   */
  private async produceArtifacts(run: RefinementRun, context: IterationContext): Promise<ArtifactAttempt[]> {
    this.transition('generating');

    let generating = run.kinds.length;
    const onGenerated = (): void => {
      generating -= 1;
      if (generating === 0 && this.state === 'generating') {
        this.transition('compiling');
      }
    };

    const settled = await Promise.allSettled(
      run.kinds.map((kind) => this.produceArtifact(run, kind, context, onGenerated))
    );

    return run.kinds.map((kind, position): ArtifactAttempt => {
      const result = settled[position];
      if (result?.status === 'fulfilled') return result.value;
      if (result && isAbortError(result.reason)) throw result.reason;
      return {
        kind,
        sourceText: '',
        compileStatus: {
          status: 'failed',
          stage: 'generation',
          reason: result ? errorMessage(result.reason) : 'Task did not settle',
        },
      };
    });
  }

  private async produceArtifact(
    run: RefinementRun,
    kind: ArtifactKind,
    context: IterationContext,
    onGenerated: () => void
  ): Promise<ArtifactAttempt> {
    const { signal } = context;
    const prompt = synthesize(run.slice, kind, context.priorMetrics, context.previousSources.get(kind));

    let raw: string;
    try {
      raw = await raceAbort(this.generator.generateText(prompt, signal), signal);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;
      logger.warn('Generation failed', error, { kind });
      return {
        kind,
        sourceText: '',
        compileStatus: { status: 'failed', stage: 'generation', reason: errorMessage(error) },
      };
    } finally {
      onGenerated();
    }

    let sourceText = raw.trim();
    try {
      if (this.compiler.normalize) {
        sourceText = this.compiler.normalize(raw);
      }
      const result = await raceAbort(
        this.compiler.compile({ kind, sliceName: run.slice.name, sourceText, version: context.index }, signal),
        signal
      );
      if (result.status === 'succeeded') {
        return {
          kind,
          sourceText,
          compileStatus: { status: 'succeeded' },
          renderedLocation: result.renderedLocation,
        };
      }
      return { kind, sourceText, compileStatus: { status: 'failed', stage: 'compile', reason: result.reason } };
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;
      logger.warn('Compilation failed', error, { kind });
      return { kind, sourceText, compileStatus: { status: 'failed', stage: 'compile', reason: errorMessage(error) } };
    }
  }
}
