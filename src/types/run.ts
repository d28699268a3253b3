import { z } from 'zod';
import { RequirementsSliceSchema } from './slice.js';
import { ArtifactAttemptSchema, ArtifactKindSchema, type ArtifactKind } from './artifact.js';
import { MetricsRecordSchema, ScoreSchema } from './metrics.js';

export const IterationFailureSchema = z.object({
  stage: z.enum(['validation', 'parse']),
  reason: z.string(),
});

export type IterationFailure = z.infer<typeof IterationFailureSchema>;

/**
 * One generate -> compile -> validate -> score -> decide pass
 */
export const IterationRecordSchema = z.object({
  index: z.number().int().min(1),
  artifactAttempts: z.array(ArtifactAttemptSchema),
  // Absent only when validation or parsing failed; `failure` says which
  metrics: MetricsRecordSchema.optional(),
  delta: z.number().optional(),
  failure: IterationFailureSchema.optional(),
  validationReport: z.string().optional(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
});

export type IterationRecord = z.infer<typeof IterationRecordSchema>;

export const RunOutcomeSchema = z.enum([
  'target-reached',
  'max-iterations-exhausted',
  'aborted',
]);

export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

/**
 * The whole externally configurable surface of a run
 */
export const RunParametersSchema = z.object({
  kinds: z
    .array(ArtifactKindSchema)
    .min(1, 'At least one artifact kind is required')
    .refine((kinds) => new Set(kinds).size === kinds.length, 'Artifact kinds must be unique'),
  maxIterations: z.number().int().min(1).max(50),
  targetScore: ScoreSchema,
});

export type RunParameters = z.infer<typeof RunParametersSchema>;

export const DEFAULT_RUN_PARAMETERS: RunParameters = {
  kinds: ['class', 'sequence', 'activity'],
  maxIterations: 5,
  targetScore: 10,
};

export const RefinementRunSchema = z.object({
  id: z.string(),
  slice: RequirementsSliceSchema,
  kinds: z.array(ArtifactKindSchema),
  maxIterations: z.number().int().min(1),
  targetScore: ScoreSchema,
  history: z.array(IterationRecordSchema),
  outcome: RunOutcomeSchema.optional(),
  abortReason: z.string().optional(),
  startedAt: z.string().datetime(),
  sealedAt: z.string().datetime().optional(),
});

export type RefinementRun = z.infer<typeof RefinementRunSchema>;

export type IterationStatus = 'scored' | 'parse-failure' | 'validation-failure';

export interface ProgressionRow {
  index: number;
  status: IterationStatus;
  overallScore?: number | undefined;
  delta?: number | undefined;
  failedKinds: ArtifactKind[];
}

/**
 * Read-only view of a run for reporting and CLI layers
 */
export interface RunSummary {
  runId: string;
  sliceName: string;
  outcome: RunOutcome | 'in-progress';
  targetReached: boolean;
  targetScore: number;
  maxIterations: number;
  iterations: number;
  finalScore?: number | undefined;
  bestScore?: number | undefined;
  progression: ProgressionRow[];
  residualGaps: string[];
  residualRecommendations: string[];
  residualScopeViolations: string[];
  table: string;
}
