import { z } from 'zod';

/**
 * Closed set of diagram kinds the refiner can request. Adding a kind means
 * adding its prompt constraints as well, so it is a code change.
 */
export const ARTIFACT_KINDS = [
  'class',      // structural
  'sequence',   // interaction
  'activity',   // workflow
  'usecase',
  'component',
  'state',
] as const;

export const ArtifactKindSchema = z.enum(ARTIFACT_KINDS);

export type ArtifactKind = z.infer<typeof ArtifactKindSchema>;

/**
 * The structural / interaction / workflow trio requested when a caller does not choose
 */
export const DEFAULT_ARTIFACT_KINDS: readonly ArtifactKind[] = ['class', 'sequence', 'activity'];

export const ARTIFACT_KIND_LABELS: Record<ArtifactKind, string> = {
  class: 'Class Diagram (Structure)',
  sequence: 'Sequence Diagram (Interactions)',
  activity: 'Activity Diagram (Logic/Workflow)',
  usecase: 'Use Case Diagram',
  component: 'Component Diagram',
  state: 'State Diagram',
};

export const FailedStageSchema = z.enum(['generation', 'compile']);

export type FailedStage = z.infer<typeof FailedStageSchema>;

export const CompileStatusSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded') }),
  z.object({
    status: z.literal('failed'),
    stage: FailedStageSchema,
    reason: z.string(),
  }),
]);

export type CompileStatus = z.infer<typeof CompileStatusSchema>;

/**
 * Outcome of generating and compiling one kind within one iteration
 */
export const ArtifactAttemptSchema = z.object({
  kind: ArtifactKindSchema,
  sourceText: z.string(),
  compileStatus: CompileStatusSchema,
  renderedLocation: z.string().optional(),
});

export type ArtifactAttempt = z.infer<typeof ArtifactAttemptSchema>;

export function isFailedAttempt(attempt: ArtifactAttempt): boolean {
  return attempt.compileStatus.status === 'failed';
}
