import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { glob } from 'glob';
import * as yaml from 'yaml';

import { HistoryRecorder } from '../engines/history-recorder.js';
import { type IterationRecord, type RefinementRun, RefinementRunSchema } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveInside, toFileSlug } from '../utils/path-security.js';

export interface SavedRunPaths {
  json: string;
  yaml: string;
  summary: string;
}

const RUN_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const VERSION_PATTERN = /_v(\d+)\.[^.]+$/;

/**
 * @throws {ValidationError} for a run ID that is not file-name safe
 */
function assertRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new ValidationError(`Invalid run ID: ${runId}`, [
      { path: 'runId', message: 'must contain only letters, digits, hyphens and underscores' },
    ]);
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]{}()!]/g, '\\$&');
}

/**
 * Flat, versioned reports on disk
 *
 * Layout under the output directory:
 *   <slice>/qa_report_<slice>_v<n>.md   one per iteration
 *   <slice>/<runId>.json                the run, schema-checked on load
 *   <slice>/<runId>.yaml                the same run, for reading
 *   <slice>/<runId>.summary.md          progression table and residual feedback
 *   <base>_v<n>.md                      versioned documents (SRS, SRSVR)
 */
export class ReportStore {
  readonly outputDir: string;
  private readonly recorder: HistoryRecorder;

  constructor(outputDir: string, recorder: HistoryRecorder = new HistoryRecorder()) {
    this.outputDir = resolve(outputDir);
    this.recorder = recorder;
  }

  private async write(path: string, content: string): Promise<string> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
    return path;
  }

  sliceDir(sliceName: string): string {
    return resolveInside(this.outputDir, toFileSlug(sliceName));
  }

  async saveIterationReport(run: RefinementRun, record: IterationRecord): Promise<string> {
    const slug = toFileSlug(run.slice.name);
    const path = resolveInside(this.outputDir, slug, `qa_report_${slug}_v${record.index}.md`);
    await this.write(path, this.recorder.renderIterationReport(run, record));
    logger.debug('Iteration report saved', undefined, { path, index: record.index });
    return path;
  }

  /**
   * Files are named by the run ID as-is, so `loadRun(run.id)` finds them
   */
  async saveRun(run: RefinementRun): Promise<SavedRunPaths> {
    assertRunId(run.id);
    const slug = toFileSlug(run.slice.name);
    const base = run.id;
    const paths: SavedRunPaths = {
      json: resolveInside(this.outputDir, slug, `${base}.json`),
      yaml: resolveInside(this.outputDir, slug, `${base}.yaml`),
      summary: resolveInside(this.outputDir, slug, `${base}.summary.md`),
    };

    await this.write(paths.json, `${JSON.stringify(run, null, 2)}\n`);
    await this.write(paths.yaml, yaml.stringify(run));
    await this.write(paths.summary, this.recorder.renderRunReport(run));

    logger.info('Run saved', { runId: run.id, path: paths.json });
    return paths;
  }

  private async readRun(path: string): Promise<RefinementRun | undefined> {
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      logger.error('Failed to read stored run', error, { path });
      return undefined;
    }

    const parsed = RefinementRunSchema.safeParse(parsedJson);
    if (!parsed.success) {
      logger.error('Failed to validate stored run', parsed.error, { path });
      return undefined;
    }
    return parsed.data;
  }

  /**
   * @throws {ValidationError} for a run ID that is not file-name safe
   */
  async loadRun(runId: string): Promise<RefinementRun | undefined> {
    assertRunId(runId);
    const matches = await glob(`*/${runId}.json`, { cwd: this.outputDir, nodir: true });
    const first = matches.sort()[0];
    if (!first) return undefined;
    return this.readRun(join(this.outputDir, first));
  }

  /**
   * Stored runs, newest first, optionally for one slice
   */
  async listRuns(sliceName?: string): Promise<RefinementRun[]> {
    const dir = sliceName === undefined ? '*' : escapeGlob(toFileSlug(sliceName));
    const files = await glob(`${dir}/*.json`, { cwd: this.outputDir, nodir: true });

    const runs = await Promise.all(files.map((file) => this.readRun(join(this.outputDir, file))));
    return runs
      .filter((run): run is RefinementRun => run !== undefined)
      .filter((run) => sliceName === undefined || run.slice.name === sliceName)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
  }

  /**
   * Next free version number for `<base>_v<n>.*` files in `dir` (relative to
   * the output directory)
   */
  async nextVersion(dir: string, base: string): Promise<number> {
    const cwd = resolveInside(this.outputDir, dir);
    const files = await glob(`${escapeGlob(base)}_v*.*`, { cwd, nodir: true });

    let highest = 0;
    for (const file of files) {
      const match = file.match(VERSION_PATTERN);
      if (match?.[1] !== undefined) {
        highest = Math.max(highest, parseInt(match[1], 10));
      }
    }
    return highest + 1;
  }

  /**
   * Write `<base>_v<version>.md`, optionally under a generated-on header
   */
  async saveDocument(base: string, version: number, content: string, header?: string): Promise<string> {
    const path = resolveInside(this.outputDir, `${toFileSlug(base)}_v${version}.md`);
    const body = header
      ? `# ${header}\n\nGenerated on: ${new Date().toISOString()}\n\n---\n\n${content}`
      : content;
    await this.write(path, body.endsWith('\n') ? body : `${body}\n`);
    logger.debug('Document saved', undefined, { path, version });
    return path;
  }
}
