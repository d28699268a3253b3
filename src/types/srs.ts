import { z } from 'zod';

export const SrsOutcomeSchema = z.enum(['target-reached', 'max-iterations-exhausted', 'aborted']);

export type SrsOutcome = z.infer<typeof SrsOutcomeSchema>;

export const SrsRunOptionsSchema = z.object({
  urd: z.string().min(1, 'URD content is required'),
  standard: z.string().optional(),
  maxIterations: z.number().int().min(1).max(50).default(10),
  targetErrors: z.number().int().min(0).default(0),
});

export type SrsRunOptions = z.input<typeof SrsRunOptionsSchema>;

/**
 * One SRS version and the audit of it
 */
export interface SrsIteration {
  version: number;
  documentPath: string;
  reportPath?: string | undefined;
  // null when the report carried no <errors: N> tag
  errorCount: number | null;
}

export interface SrsRunResult {
  outcome: SrsOutcome;
  finalVersion: number;
  finalErrorCount: number | null;
  iterations: SrsIteration[];
}
