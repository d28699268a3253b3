/**
 * History Recorder
 *
 * Owns the append-only iteration log of a run and every read-only view of
 * it: the summary, the progression table and the markdown reports.
 */

import type {
  IterationRecord,
  IterationStatus,
  ProgressionRow,
  RefinementRun,
  RunOutcome,
  RunSummary,
} from '../types/index.js';
import { ARTIFACT_KIND_LABELS, isFailedAttempt } from '../types/index.js';
import { ErrorCode, RefinerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Drops binary noise such as 1.2000000000000002 from display only
 */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(4)));
}

export function formatDelta(delta: number | undefined): string {
  if (delta === undefined) return '-';
  if (delta > 0) return `+${formatNumber(delta)}`;
  return formatNumber(delta);
}

export function iterationStatus(record: IterationRecord): IterationStatus {
  if (record.metrics) return 'scored';
  return record.failure?.stage === 'validation' ? 'validation-failure' : 'parse-failure';
}

function lastScored(run: RefinementRun): IterationRecord | undefined {
  for (let i = run.history.length - 1; i >= 0; i--) {
    const record = run.history[i];
    if (record?.metrics) return record;
  }
  return undefined;
}

function bulletList(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : empty;
}

function numberedList(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.map((item, index) => `${index + 1}. ${item}`).join('\n') : empty;
}

export class HistoryRecorder {
  /**
   * Append one completed iteration. Only the refinement controller calls
   * this.
   *
   * @throws {RefinerError} CONFLICT if the run is sealed,
   *   PRECONDITION_FAILED for a non-consecutive index or a record beyond
   *   maxIterations
   */
  append(run: RefinementRun, record: IterationRecord): IterationRecord {
    if (run.outcome !== undefined) {
      throw new RefinerError(`Run ${run.id} is sealed (${run.outcome}); no more iterations can be recorded`, ErrorCode.CONFLICT, {
        details: { runId: run.id, outcome: run.outcome },
      });
    }

    const expectedIndex = run.history.length + 1;
    if (record.index !== expectedIndex) {
      throw new RefinerError(
        `Iteration index ${record.index} is not consecutive; expected ${expectedIndex}`,
        ErrorCode.PRECONDITION_FAILED,
        { details: { runId: run.id, index: record.index, expectedIndex } }
      );
    }

    if (record.index > run.maxIterations) {
      throw new RefinerError(
        `Iteration ${record.index} exceeds maxIterations (${run.maxIterations})`,
        ErrorCode.PRECONDITION_FAILED,
        { details: { runId: run.id, index: record.index, maxIterations: run.maxIterations } }
      );
    }

    const frozen = deepFreeze(structuredClone(record));
    run.history.push(frozen);

    logger.debug('Iteration recorded', undefined, {
      runId: run.id,
      index: frozen.index,
      status: iterationStatus(frozen),
      overallScore: frozen.metrics?.overallScore,
    });
    return frozen;
  }

  /**
   * Assign the run's outcome. A run is sealed exactly once.
   */
  seal(run: RefinementRun, outcome: RunOutcome, abortReason?: string): void {
    if (run.outcome !== undefined) {
      throw new RefinerError(`Run ${run.id} is already sealed (${run.outcome})`, ErrorCode.CONFLICT, {
        details: { runId: run.id, outcome: run.outcome },
      });
    }
    run.outcome = outcome;
    run.sealedAt = new Date().toISOString();
    if (abortReason !== undefined) {
      run.abortReason = abortReason;
    }

    logger.info('Run sealed', {
      runId: run.id,
      outcome,
      iterations: run.history.length,
    });
  }

  /**
   * Derived view of a run. Never mutates the run, so repeated calls give
   * identical results.
   */
  summarize(run: RefinementRun): RunSummary {
    const progression: ProgressionRow[] = run.history.map((record) => ({
      index: record.index,
      status: iterationStatus(record),
      overallScore: record.metrics?.overallScore,
      delta: record.delta,
      failedKinds: record.artifactAttempts.filter(isFailedAttempt).map((attempt) => attempt.kind),
    }));

    const scores = run.history.flatMap((record) => (record.metrics ? [record.metrics.overallScore] : []));
    const latest = lastScored(run);

    return {
      runId: run.id,
      sliceName: run.slice.name,
      outcome: run.outcome ?? 'in-progress',
      targetReached: run.outcome === 'target-reached',
      targetScore: run.targetScore,
      maxIterations: run.maxIterations,
      iterations: run.history.length,
      finalScore: latest?.metrics?.overallScore,
      bestScore: scores.length > 0 ? Math.max(...scores) : undefined,
      progression,
      residualGaps: [...(latest?.metrics?.gaps ?? [])],
      residualRecommendations: [...(latest?.metrics?.recommendations ?? [])],
      residualScopeViolations: [...(latest?.metrics?.scopeViolations ?? [])],
      table: this.renderProgressionTable(progression),
    };
  }

  renderProgressionTable(rows: readonly ProgressionRow[]): string {
    const lines = [
      '| Iteration | Status | Overall Score | Delta | Failed Kinds |',
      '|---|---|---|---|---|',
    ];
    for (const row of rows) {
      const score = row.overallScore === undefined ? '-' : formatNumber(row.overallScore);
      const failed = row.failedKinds.length > 0 ? row.failedKinds.join(', ') : '-';
      lines.push(`| ${row.index} | ${row.status} | ${score} | ${formatDelta(row.delta)} | ${failed} |`);
    }
    return lines.join('\n');
  }

  /**
   * Per-iteration QA report, saved as qa_report_<slice>_v<n>.md
   */
  renderIterationReport(run: RefinementRun, record: IterationRecord): string {
    const sections: string[] = [
      `# QA Report: ${run.slice.name} (Iteration ${record.index})`,
      '',
      `**Run:** ${run.id}`,
      `**Completed:** ${record.completedAt}`,
      `**Status:** ${iterationStatus(record)}`,
    ];

    const { metrics } = record;
    if (metrics) {
      const delta = record.delta === undefined ? '' : ` (${formatDelta(record.delta)})`;
      sections.push(`**Overall Score:** ${formatNumber(metrics.overallScore)}/10${delta}`);
      const sub = metrics.subScores;
      if (sub.consistency !== undefined) sections.push(`**Consistency Score:** ${formatNumber(sub.consistency)}/10`);
      if (sub.completeness !== undefined) sections.push(`**Completeness Score:** ${formatNumber(sub.completeness)}/10`);
      if (sub.quality !== undefined) sections.push(`**Quality Score:** ${formatNumber(sub.quality)}/10`);
      if (sub.scopeAdherence !== undefined) sections.push(`**Scope Adherence Score:** ${formatNumber(sub.scopeAdherence)}/10`);
    } else if (record.failure) {
      sections.push(`**Failure:** ${record.failure.stage}: ${record.failure.reason}`);
    }

    sections.push('', '## Artifacts', '', '| Kind | Result | Detail |', '|---|---|---|');
    for (const attempt of record.artifactAttempts) {
      const status = attempt.compileStatus;
      const result = status.status === 'succeeded' ? 'compiled' : `failed (${status.stage})`;
      const detail = status.status === 'succeeded'
        ? attempt.renderedLocation ?? '-'
        : status.reason.replace(/\s*\n\s*/g, ' ').replace(/\|/g, '\\|');
      sections.push(`| ${ARTIFACT_KIND_LABELS[attempt.kind]} | ${result} | ${detail} |`);
    }

    if (metrics) {
      sections.push(
        '',
        '## Identified Gaps',
        '',
        bulletList(metrics.gaps, 'No gaps identified.'),
        '',
        '## Scope Violations',
        '',
        bulletList(metrics.scopeViolations, 'No scope violations identified.'),
        '',
        '## Recommendations',
        '',
        numberedList(metrics.recommendations, 'No specific recommendations provided.')
      );
    }

    const raw = metrics?.rawText ?? record.validationReport;
    if (raw !== undefined) {
      sections.push('', '## Raw Validation Report', '', raw.trim());
    }

    return `${sections.join('\n')}\n`;
  }

  /**
   * Run summary: outcome, progression table and residual feedback
   */
  renderRunReport(run: RefinementRun): string {
    const summary = this.summarize(run);
    const final = summary.finalScore === undefined ? 'n/a' : `${formatNumber(summary.finalScore)}/10`;
    const best = summary.bestScore === undefined ? 'n/a' : `${formatNumber(summary.bestScore)}/10`;

    const lines = [
      `# Refinement Summary: ${summary.sliceName}`,
      '',
      `**Run:** ${summary.runId}`,
      `**Outcome:** ${summary.outcome}`,
      `**Iterations:** ${summary.iterations} of ${summary.maxIterations}`,
      `**Target Score:** ${formatNumber(summary.targetScore)}/10`,
      `**Final Score:** ${final}`,
      `**Best Score:** ${best}`,
    ];
    if (run.abortReason) {
      lines.push(`**Abort Reason:** ${run.abortReason}`);
    }

    lines.push(
      '',
      '## Score Progression',
      '',
      summary.table,
      '',
      '## Residual Gaps',
      '',
      bulletList(summary.residualGaps, 'None.'),
      '',
      '## Residual Scope Violations',
      '',
      bulletList(summary.residualScopeViolations, 'None.'),
      '',
      '## Residual Recommendations',
      '',
      numberedList(summary.residualRecommendations, 'None.')
    );

    return `${lines.join('\n')}\n`;
  }
}
