import { z } from 'zod';

/**
 * Every score lives on the same 0-10 scale
 */
export const ScoreSchema = z.number().min(0).max(10);

export const SUB_SCORE_KEYS = ['consistency', 'completeness', 'quality', 'scopeAdherence'] as const;

export type SubScoreKey = (typeof SUB_SCORE_KEYS)[number];

export const SubScoresSchema = z.object({
  consistency: ScoreSchema.optional(),
  completeness: ScoreSchema.optional(),
  quality: ScoreSchema.optional(),
  scopeAdherence: ScoreSchema.optional(),
});

export type SubScores = z.infer<typeof SubScoresSchema>;

/**
 * Structured result of one QA pass. `overallScore` is always present: a
 * report without one is a parse failure, never a zero.
 */
export const MetricsRecordSchema = z.object({
  overallScore: ScoreSchema,
  subScores: SubScoresSchema,
  gaps: z.array(z.string()),
  recommendations: z.array(z.string()),
  scopeViolations: z.array(z.string()),
  // Untouched report, kept for audit
  rawText: z.string(),
});

export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;

export interface ParseFailure {
  reason: string;
  rawText: string;
}

export type ExtractResult =
  | { ok: true; metrics: MetricsRecord }
  | { ok: false; failure: ParseFailure };
