import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryRecorder, formatDelta, formatNumber, iterationStatus } from './history-recorder.js';
import type { IterationRecord, MetricsRecord, RefinementRun } from '../types/index.js';
import { RefinerError } from '../utils/errors.js';

const STARTED = '2026-01-05T10:00:00.000Z';

function createRun(overrides: Partial<RefinementRun> = {}): RefinementRun {
  return {
    id: 'run-abc123-XYZ',
    slice: { name: 'User Login', text: 'Users sign in with email and password.' },
    kinds: ['class', 'activity'],
    maxIterations: 3,
    targetScore: 9,
    history: [],
    startedAt: STARTED,
    ...overrides,
  };
}

function createMetrics(overallScore: number, overrides: Partial<MetricsRecord> = {}): MetricsRecord {
  return {
    overallScore,
    subScores: {},
    gaps: [],
    recommendations: [],
    scopeViolations: [],
    rawText: `<overall_score: ${overallScore}>`,
    ...overrides,
  };
}

function createRecord(index: number, overrides: Partial<IterationRecord> = {}): IterationRecord {
  return {
    index,
    artifactAttempts: [
      {
        kind: 'class',
        sourceText: '@startuml\nclass User\n@enduml',
        compileStatus: { status: 'succeeded' },
        renderedLocation: '/out/User_Login/class/class_v1.png',
      },
      {
        kind: 'activity',
        sourceText: '@startuml\nstart\n@enduml',
        compileStatus: { status: 'failed', stage: 'compile', reason: 'Syntax Error? | line 2' },
      },
    ],
    startedAt: STARTED,
    completedAt: '2026-01-05T10:01:00.000Z',
    ...overrides,
  };
}

describe('formatting helpers', () => {
  it('trims binary noise from numbers', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(7)).toBe('7');
  });

  it('signs positive deltas and dashes missing ones', () => {
    expect(formatDelta(undefined)).toBe('-');
    expect(formatDelta(1.5)).toBe('+1.5');
    expect(formatDelta(-2)).toBe('-2');
    expect(formatDelta(0)).toBe('0');
  });

  it('derives the status of a record', () => {
    expect(iterationStatus(createRecord(1, { metrics: createMetrics(5) }))).toBe('scored');
    expect(iterationStatus(createRecord(1, { failure: { stage: 'validation', reason: 'timeout' } }))).toBe('validation-failure');
    expect(iterationStatus(createRecord(1, { failure: { stage: 'parse', reason: 'no marker' } }))).toBe('parse-failure');
  });
});

describe('HistoryRecorder', () => {
  let recorder: HistoryRecorder;
  let run: RefinementRun;

  beforeEach(() => {
    recorder = new HistoryRecorder();
    run = createRun();
  });

  describe('append', () => {
    it('stores a frozen copy of the record', () => {
      const record = createRecord(1, { metrics: createMetrics(5) });
      const stored = recorder.append(run, record);

      expect(run.history).toHaveLength(1);
      expect(stored).not.toBe(record);
      expect(stored).toEqual(record);
      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.artifactAttempts[0])).toBe(true);
    });

    it('is not affected by later changes to the caller\'s record', () => {
      const record = createRecord(1, { metrics: createMetrics(5, { gaps: ['No lockout'] }) });
      recorder.append(run, record);
      record.metrics?.gaps.push('Changed afterwards');

      expect(run.history[0]?.metrics?.gaps).toEqual(['No lockout']);
    });

    it('rejects a non-consecutive index', () => {
      expect(() => recorder.append(run, createRecord(2))).toThrow('Iteration index 2 is not consecutive; expected 1');
    });

    it('rejects a record beyond maxIterations', () => {
      const short = createRun({ maxIterations: 1 });
      recorder.append(short, createRecord(1));
      expect(() => recorder.append(short, createRecord(2))).toThrow('Iteration 2 exceeds maxIterations (1)');
    });

    it('rejects appends to a sealed run', () => {
      recorder.seal(run, 'aborted', 'cancelled');
      try {
        recorder.append(run, createRecord(1));
        expect.fail('append should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(RefinerError);
        expect(error instanceof RefinerError && error.code).toBe('CONFLICT');
      }
    });
  });

  describe('seal', () => {
    it('records the outcome, seal time and abort reason', () => {
      recorder.seal(run, 'aborted', 'Time budget of 100ms exhausted');

      expect(run.outcome).toBe('aborted');
      expect(run.abortReason).toBe('Time budget of 100ms exhausted');
      expect(run.sealedAt).toBeDefined();
    });

    it('seals exactly once', () => {
      recorder.seal(run, 'target-reached');
      expect(() => recorder.seal(run, 'aborted')).toThrow('Run run-abc123-XYZ is already sealed (target-reached)');
    });
  });

  describe('summarize', () => {
    beforeEach(() => {
      recorder.append(run, createRecord(1, {
        metrics: createMetrics(5, { gaps: ['No lockout state'] }),
      }));
      recorder.append(run, createRecord(2, {
        metrics: createMetrics(7, {
          gaps: ['Missing reset link'],
          recommendations: ['Add a reset link'],
          scopeViolations: ['Shows checkout'],
        }),
        delta: 2,
      }));
      recorder.append(run, createRecord(3, {
        failure: { stage: 'parse', reason: 'No overall score marker found in report' },
        validationReport: 'Looks fine.',
      }));
      recorder.seal(run, 'max-iterations-exhausted');
    });

    it('reports the latest scored iteration as final and the maximum as best', () => {
      const summary = recorder.summarize(run);

      expect(summary.outcome).toBe('max-iterations-exhausted');
      expect(summary.targetReached).toBe(false);
      expect(summary.iterations).toBe(3);
      expect(summary.finalScore).toBe(7);
      expect(summary.bestScore).toBe(7);
      expect(summary.residualGaps).toEqual(['Missing reset link']);
      expect(summary.residualRecommendations).toEqual(['Add a reset link']);
      expect(summary.residualScopeViolations).toEqual(['Shows checkout']);
    });

    it('renders the progression table', () => {
      expect(recorder.summarize(run).table).toBe([
        '| Iteration | Status | Overall Score | Delta | Failed Kinds |',
        '|---|---|---|---|---|',
        '| 1 | scored | 5 | - | activity |',
        '| 2 | scored | 7 | +2 | activity |',
        '| 3 | parse-failure | - | - | activity |',
      ].join('\n'));
    });

    it('gives identical results on repeated calls', () => {
      expect(recorder.summarize(run)).toEqual(recorder.summarize(run));
    });

    it('reports an unsealed run as in progress', () => {
      const summary = recorder.summarize(createRun());
      expect(summary.outcome).toBe('in-progress');
      expect(summary.finalScore).toBeUndefined();
      expect(summary.bestScore).toBeUndefined();
    });
  });

  describe('renderIterationReport', () => {
    it('renders scores, artifacts and feedback', () => {
      const record = createRecord(1, {
        metrics: createMetrics(6, {
          subScores: { consistency: 8 },
          gaps: ['No lockout state'],
          recommendations: ['Add an AccountLock class'],
        }),
      });
      recorder.append(run, record);

      const report = recorder.renderIterationReport(run, record);

      expect(report.startsWith('# QA Report: User Login (Iteration 1)\n')).toBe(true);
      expect(report).toContain('**Status:** scored\n**Overall Score:** 6/10\n**Consistency Score:** 8/10');
      expect(report).toContain('| Class Diagram (Structure) | compiled | /out/User_Login/class/class_v1.png |');
      expect(report).toContain('| Activity Diagram (Logic/Workflow) | failed (compile) | Syntax Error? \\| line 2 |');
      expect(report).toContain('## Identified Gaps\n\n- No lockout state');
      expect(report).toContain('## Scope Violations\n\nNo scope violations identified.');
      expect(report).toContain('## Recommendations\n\n1. Add an AccountLock class');
      expect(report).toContain('## Raw Validation Report\n\n<overall_score: 6>\n');
    });

    it('renders the failure of an unscored iteration', () => {
      const record = createRecord(1, {
        failure: { stage: 'validation', reason: 'validation adapter failed: timeout' },
      });

      const report = recorder.renderIterationReport(run, record);

      expect(report).toContain('**Status:** validation-failure\n**Failure:** validation: validation adapter failed: timeout');
      expect(report).not.toContain('## Raw Validation Report');
    });
  });

  describe('renderRunReport', () => {
    it('renders the summary with residual feedback', () => {
      recorder.append(run, createRecord(1, { metrics: createMetrics(9.5) }));
      recorder.seal(run, 'target-reached');

      const report = recorder.renderRunReport(run);

      expect(report).toContain('# Refinement Summary: User Login\n\n**Run:** run-abc123-XYZ\n**Outcome:** target-reached');
      expect(report).toContain('**Iterations:** 1 of 3\n**Target Score:** 9/10\n**Final Score:** 9.5/10\n**Best Score:** 9.5/10');
      expect(report).toContain('## Residual Gaps\n\nNone.');
      expect(report).not.toContain('Abort Reason');
    });
  });
});
