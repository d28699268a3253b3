#!/usr/bin/env tsx
/**
 * Author an SRS from a URD file, optionally following a standard reference
 */
import { readFile } from 'node:fs/promises';
import { createSrsWorkflow, getContainer } from '../src/services/container.js';
import { validatePath } from '../src/utils/path-security.js';

const [urdPath, standardPath] = process.argv.slice(2);

if (!urdPath) {
  console.error('Usage: npx tsx scripts/run-srs.ts <URD.md> [standard.txt]');
  process.exit(1);
}

async function readDocument(path: string): Promise<string> {
  return readFile(validatePath(path, { mustBeDirectory: false }), 'utf-8');
}

async function main(path: string): Promise<void> {
  const services = getContainer().getAll();
  const urd = await readDocument(path);
  const standard = standardPath ? await readDocument(standardPath) : undefined;

  const result = await createSrsWorkflow(services).run({ urd, standard });

  for (const iteration of result.iterations) {
    const errors = iteration.errorCount === null ? 'unknown' : String(iteration.errorCount);
    console.log(`SRS v${iteration.version}: ${errors} error(s)  ${iteration.documentPath}`);
  }

  console.log(`\nOutcome: ${result.outcome} (final version v${result.finalVersion})`);
  if (result.outcome !== 'target-reached') {
    process.exit(1);
  }
}

main(urdPath).catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
