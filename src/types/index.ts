/**
 * design-refiner type definitions
 */

export {
  type RequirementsSlice,
  type SliceDefinition,
  type SlicesFile,
  RequirementsSliceSchema,
  SliceDefinitionSchema,
  SlicesFileSchema,
} from './slice.js';

export {
  type ArtifactKind,
  type ArtifactAttempt,
  type CompileStatus,
  type FailedStage,
  ARTIFACT_KINDS,
  ARTIFACT_KIND_LABELS,
  DEFAULT_ARTIFACT_KINDS,
  ArtifactKindSchema,
  ArtifactAttemptSchema,
  CompileStatusSchema,
  FailedStageSchema,
  isFailedAttempt,
} from './artifact.js';

export {
  type MetricsRecord,
  type SubScores,
  type SubScoreKey,
  type ParseFailure,
  type ExtractResult,
  SUB_SCORE_KEYS,
  MetricsRecordSchema,
  SubScoresSchema,
  ScoreSchema,
} from './metrics.js';

export {
  type IterationRecord,
  type IterationFailure,
  type IterationStatus,
  type RefinementRun,
  type RunOutcome,
  type RunParameters,
  type RunSummary,
  type ProgressionRow,
  DEFAULT_RUN_PARAMETERS,
  IterationRecordSchema,
  IterationFailureSchema,
  RefinementRunSchema,
  RunOutcomeSchema,
  RunParametersSchema,
} from './run.js';

export {
  type SrsOutcome,
  type SrsRunOptions,
  type SrsIteration,
  type SrsRunResult,
  SrsOutcomeSchema,
  SrsRunOptionsSchema,
} from './srs.js';
