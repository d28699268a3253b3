#!/usr/bin/env tsx
/**
 * Print a recorded run, or every run for a slice, as a progression table
 */
import { getContainer } from '../src/services/container.js';

const key = process.argv[2];

if (!key) {
  console.error('Usage: npx tsx scripts/show-history.ts <runId|sliceName>');
  process.exit(1);
}

async function main(runIdOrSlice: string): Promise<void> {
  const { store, recorder } = getContainer().getAll();

  const runs = runIdOrSlice.startsWith('run-')
    ? [await store.loadRun(runIdOrSlice)].flatMap((run) => (run ? [run] : []))
    : await store.listRuns(runIdOrSlice);

  if (runs.length === 0) {
    console.error(`No runs found for: ${runIdOrSlice}`);
    process.exit(1);
  }

  for (const run of runs) {
    console.log(recorder.renderRunReport(run));
    console.log('');
  }
}

main(key).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
