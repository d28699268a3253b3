import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Services } from '../services/container.js';
import type { RefinementRun, RunSummary } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

const HistoryInputSchema = z.object({
  runId: z.string().min(1).optional(),
  sliceName: z.string().min(1).optional(),
  /** Include the full markdown run report */
  includeReport: z.boolean().default(false),
});

/**
 * refiner_history - summaries of stored runs
 */
export const historyTool: Tool = {
  name: 'refiner_history',
  description: `Show stored refinement runs.

- With **runId**: the summary of that run
- With **sliceName**: summaries of every run for that slice, newest first
- With neither: summaries of all stored runs

Each summary has the outcome, final and best scores, the score progression
table and the residual gaps and recommendations.`,

  inputSchema: {
    type: 'object',
    properties: {
      runId: {
        type: 'string',
        description: 'ID of a stored run (run-...)',
      },
      sliceName: {
        type: 'string',
        description: 'Name of a requirements slice',
      },
      includeReport: {
        type: 'boolean',
        description: 'Include the markdown run report',
        default: false,
      },
    },
  },
};

export interface HistoryEntry {
  summary: RunSummary;
  report?: string | undefined;
}

export interface HistoryResult {
  count: number;
  runs: HistoryEntry[];
}

export async function handleHistory(
  args: Record<string, unknown>,
  services: Services
): Promise<HistoryResult> {
  const input = HistoryInputSchema.parse(args);
  const { store, recorder } = services;

  const runs = input.runId
    ? [await store.loadRun(input.runId)].filter((run): run is RefinementRun => run !== undefined)
    : await store.listRuns(input.sliceName);

  if (input.runId && runs.length === 0) {
    throw new NotFoundError('Run', input.runId);
  }

  return {
    count: runs.length,
    runs: runs.map((run) => ({
      summary: recorder.summarize(run),
      report: input.includeReport ? recorder.renderRunReport(run) : undefined,
    })),
  };
}
