/**
 * Prompt Synthesizer
 *
 * Folds the previous QA pass into the next generation prompt. Pure: the same
 * inputs always give the same prompt, and no input makes it fail.
 */

import type { ArtifactAttempt, ArtifactKind, MetricsRecord, RequirementsSlice } from '../types/index.js';
import {
  buildCorrectionsSection,
  buildDiagramPrompt,
  buildValidationPrompt as renderValidationPrompt,
  type ValidationDiagram,
} from '../prompts/index.js';

/**
 * Build the generation prompt for one kind.
 *
 * Without `priorMetrics` this is the baseline prompt. With it, a
 * corrections section restates the prior score, every gap, every scope
 * violation and every recommendation, numbered in record order.
 */
export function synthesize(
  slice: RequirementsSlice,
  kind: ArtifactKind,
  priorMetrics?: MetricsRecord,
  previous?: string
): string {
  const corrections = priorMetrics
    ? buildCorrectionsSection({
        overallScore: priorMetrics.overallScore,
        gaps: priorMetrics.gaps,
        scopeViolations: priorMetrics.scopeViolations,
        recommendations: priorMetrics.recommendations,
      })
    : undefined;

  return buildDiagramPrompt({
    sliceName: slice.name,
    sliceText: slice.text,
    kind,
    previous: previous?.trim() ? previous : undefined,
    corrections,
  });
}

function toValidationDiagram(attempt: ArtifactAttempt): ValidationDiagram {
  const { compileStatus } = attempt;
  return {
    kind: attempt.kind,
    source: attempt.sourceText,
    failure: compileStatus.status === 'failed' ? compileStatus.reason : undefined,
  };
}

/**
 * Build the joint QA prompt for every attempt of an iteration. Failed
 * attempts stay in, annotated with their reason, so the rubric can
 * penalise them.
 */
export function buildValidationPrompt(
  slice: RequirementsSlice,
  attempts: readonly ArtifactAttempt[]
): string {
  return renderValidationPrompt(slice.name, slice.text, attempts.map(toValidationDiagram));
}
