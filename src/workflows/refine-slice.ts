/**
 * One persisted refinement run: the controller, with every iteration report
 * and the final run written through the report store.
 */

import type { RunOptions } from '../engines/refinement-controller.js';
import { createController, type Services } from '../services/container.js';
import type { SavedRunPaths } from '../storage/index.js';
import type { RefinementRun, RequirementsSlice, RunSummary } from '../types/index.js';

export type RefineOptions = Omit<RunOptions, 'onIteration'>;

export interface RefineResult {
  run: RefinementRun;
  summary: RunSummary;
  iterationReports: string[];
  files: SavedRunPaths;
}

/**
 * Run parameters default to the resolved configuration
 */
export async function refineSlice(
  services: Services,
  slice: RequirementsSlice,
  options: RefineOptions = {}
): Promise<RefineResult> {
  const { config, store, recorder } = services;
  const iterationReports: string[] = [];

  const run = await createController(services).run(slice, {
    ...options,
    kinds: options.kinds ?? config.kinds,
    maxIterations: options.maxIterations ?? config.maxIterations,
    targetScore: options.targetScore ?? config.targetScore,
    timeBudgetMs: options.timeBudgetMs ?? config.timeBudgetMs,
    onIteration: async (current, record) => {
      iterationReports.push(await store.saveIterationReport(current, record));
    },
  });

  const files = await store.saveRun(run);
  return { run, summary: recorder.summarize(run), iterationReports, files };
}
