import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ReportStore } from './index.js';
import type { IterationRecord, RefinementRun } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

function createRun(overrides: Partial<RefinementRun> = {}): RefinementRun {
  const record: IterationRecord = {
    index: 1,
    artifactAttempts: [
      { kind: 'class', sourceText: '@startuml\nclass User\n@enduml', compileStatus: { status: 'succeeded' } },
    ],
    metrics: {
      overallScore: 9,
      subScores: { quality: 8 },
      gaps: [],
      recommendations: ['Name the associations'],
      scopeViolations: [],
      rawText: '<overall_score: 9>',
    },
    startedAt: '2026-01-05T10:00:00.000Z',
    completedAt: '2026-01-05T10:00:30.000Z',
  };
  return {
    id: 'run-abc123-XYZ',
    slice: { name: 'User Login', text: 'Users sign in.' },
    kinds: ['class'],
    maxIterations: 3,
    targetScore: 9,
    history: [record],
    outcome: 'target-reached',
    startedAt: '2026-01-05T10:00:00.000Z',
    sealedAt: '2026-01-05T10:00:31.000Z',
    ...overrides,
  };
}

describe('ReportStore', () => {
  let outputDir: string;
  let store: ReportStore;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'store-test-'));
    store = new ReportStore(outputDir);
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  describe('saveIterationReport', () => {
    it('writes a versioned QA report in the slice folder', async () => {
      const run = createRun();
      const record = run.history[0];
      if (!record) throw new Error('fixture has no record');

      const path = await store.saveIterationReport(run, record);

      expect(path).toBe(join(outputDir, 'User_Login', 'qa_report_User_Login_v1.md'));
      const content = await readFile(path, 'utf-8');
      expect(content.startsWith('# QA Report: User Login (Iteration 1)\n')).toBe(true);
    });
  });

  describe('saveRun and loadRun', () => {
    it('writes JSON, YAML and a summary', async () => {
      const paths = await store.saveRun(createRun());

      expect(paths).toEqual({
        json: join(outputDir, 'User_Login', 'run-abc123-XYZ.json'),
        yaml: join(outputDir, 'User_Login', 'run-abc123-XYZ.yaml'),
        summary: join(outputDir, 'User_Login', 'run-abc123-XYZ.summary.md'),
      });
      const fromYaml: unknown = yaml.parse(await readFile(paths.yaml, 'utf-8'));
      expect(fromYaml).toMatchObject({ id: 'run-abc123-XYZ', outcome: 'target-reached' });
      expect(await readFile(paths.summary, 'utf-8')).toContain('**Final Score:** 9/10');
    });

    it('round-trips a run through its JSON file', async () => {
      const run = createRun();
      await store.saveRun(run);

      expect(await store.loadRun('run-abc123-XYZ')).toEqual(run);
    });

    it('finds a run whose ID ends in an underscore', async () => {
      const run = createRun({ id: 'run-m5x8z7k-A3bC9dE2fG1_' });
      const paths = await store.saveRun(run);

      expect(paths.json).toBe(join(outputDir, 'User_Login', 'run-m5x8z7k-A3bC9dE2fG1_.json'));
      expect(await store.loadRun('run-m5x8z7k-A3bC9dE2fG1_')).toEqual(run);
    });

    it('refuses to save a run ID that is not file-name safe', async () => {
      await expect(store.saveRun(createRun({ id: '../escape' }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('returns undefined for an unknown run', async () => {
      expect(await store.loadRun('run-missing')).toBeUndefined();
    });

    it('returns undefined for a stored file that fails the schema', async () => {
      await mkdir(join(outputDir, 'Broken'), { recursive: true });
      await writeFile(join(outputDir, 'Broken', 'run-broken.json'), '{"id": "run-broken"}');

      expect(await store.loadRun('run-broken')).toBeUndefined();
    });

    it('rejects a run ID that could escape the folder', async () => {
      await expect(store.loadRun('../secrets')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('listRuns', () => {
    it('lists runs newest first, optionally for one slice', async () => {
      await store.saveRun(createRun({ id: 'run-older', startedAt: '2026-01-01T00:00:00.000Z' }));
      await store.saveRun(createRun({ id: 'run-newer', startedAt: '2026-01-02T00:00:00.000Z' }));
      await store.saveRun(createRun({ id: 'run-other', slice: { name: 'Checkout', text: 'Pay.' } }));

      const all = await store.listRuns();
      expect(all.map((run) => run.id)).toEqual(['run-other', 'run-newer', 'run-older']);

      const login = await store.listRuns('User Login');
      expect(login.map((run) => run.id)).toEqual(['run-newer', 'run-older']);
    });

    it('includes runs saved under a caller-chosen ID', async () => {
      await store.saveRun(createRun({ id: 'nightly_login' }));

      expect((await store.listRuns('User Login')).map((run) => run.id)).toEqual(['nightly_login']);
    });
  });

  describe('versioned documents', () => {
    it('starts at version 1 and continues after the highest existing one', async () => {
      expect(await store.nextVersion('', 'SRS')).toBe(1);

      await store.saveDocument('SRS', 1, 'first');
      await store.saveDocument('SRS', 3, 'third');
      await store.saveDocument('SRSVR', 7, 'report');

      expect(await store.nextVersion('', 'SRS')).toBe(4);
    });

    it('adds a generated-on header when asked', async () => {
      const path = await store.saveDocument('SRSVR', 2, '<errors: 0>', 'SRS Validation Report (SRSVR)');

      expect(path).toBe(join(outputDir, 'SRSVR_v2.md'));
      const content = await readFile(path, 'utf-8');
      expect(content).toMatch(/^# SRS Validation Report \(SRSVR\)\n\nGenerated on: \S+\n\n---\n\n<errors: 0>\n$/);
    });

    it('writes the content as-is without a header', async () => {
      const path = await store.saveDocument('URD', 1, 'URD body');
      expect(await readFile(path, 'utf-8')).toBe('URD body\n');
    });
  });
});
