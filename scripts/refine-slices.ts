#!/usr/bin/env tsx
/**
 * Refine every slice listed in a slices YAML file, one after another
 */
import { loadSlicesFile } from '../src/engines/slice-loader.js';
import { getContainer } from '../src/services/container.js';
import { refineSlice } from '../src/workflows/refine-slice.js';

const slicesPath = process.argv[2];

if (!slicesPath) {
  console.error('Usage: npx tsx scripts/refine-slices.ts <slices.yaml>');
  process.exit(1);
}

async function main(path: string): Promise<void> {
  const services = getContainer().getAll();
  const slices = await loadSlicesFile(path);

  console.log(`\nRefining ${slices.length} slice(s) into ${services.config.outputDir}\n`);

  let failures = 0;
  for (const slice of slices) {
    console.log('─'.repeat(70));
    console.log(`Slice: ${slice.name}`);

    try {
      const { summary, files } = await refineSlice(services, slice);
      console.log(`   Outcome: ${summary.outcome}`);
      console.log(`   Final score: ${summary.finalScore ?? '-'} / ${summary.targetScore}`);
      console.log(`   Iterations: ${summary.iterations} of ${summary.maxIterations}\n`);
      console.log(summary.table);
      console.log(`\n   Summary: ${files.summary}`);
    } catch (error) {
      failures++;
      console.error(`   Failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  console.log('─'.repeat(70));
  if (failures > 0) {
    console.error(`\n${failures} slice(s) failed`);
    process.exit(1);
  }
}

main(slicesPath).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
