import { describe, it, expect } from 'vitest';
import { RefinementController } from './refinement-controller.js';
import { HistoryRecorder } from './history-recorder.js';
import { FakeCompiler, FakeGenerator, FakeValidator, kindOfPrompt } from '../../tests/helpers/fakes.js';
import type { IterationRecord, RefinementRun, RequirementsSlice } from '../types/index.js';
import { IterationHookError, RefinerError, ValidationError } from '../utils/errors.js';

const slice: RequirementsSlice = {
  name: 'User Login',
  text: 'A registered user signs in with email and password. Three failed attempts lock the account.',
};

function createController(
  validator: FakeValidator,
  generator: FakeGenerator = new FakeGenerator(),
  compiler: FakeCompiler = new FakeCompiler()
): RefinementController {
  return new RefinementController({ generator, compiler, validator });
}

describe('RefinementController', () => {
  it('stops after one iteration when the first report reaches the target', async () => {
    const validator = new FakeValidator(['<overall_score: 10>']);
    const generator = new FakeGenerator();
    const controller = createController(validator, generator);

    const run = await controller.run(slice, { targetScore: 10 });

    expect(run.outcome).toBe('target-reached');
    expect(run.history).toHaveLength(1);
    expect(run.history[0]?.metrics?.overallScore).toBe(10);
    expect(run.history[0]?.delta).toBeUndefined();
    expect(run.kinds).toEqual(['class', 'sequence', 'activity']);
    expect(generator.prompts).toHaveLength(3);
    expect(validator.calls).toHaveLength(1);
    expect(controller.getState()).toBe('stopped');
  });

  it('runs to maxIterations and records the delta of every scored iteration', async () => {
    const validator = new FakeValidator([
      '<overall_score: 5>',
      '<overall_score: 7>',
      '<overall_score: 8>',
      '<overall_score: 10>',
    ]);
    const controller = createController(validator);

    const run = await controller.run(slice, { kinds: ['class'], maxIterations: 3, targetScore: 9 });

    expect(run.outcome).toBe('max-iterations-exhausted');
    expect(run.history.map((record) => record.index)).toEqual([1, 2, 3]);
    expect(run.history.map((record) => record.metrics?.overallScore)).toEqual([5, 7, 8]);
    expect(run.history.map((record) => record.delta)).toEqual([undefined, 2, 1]);
    expect(validator.calls).toHaveLength(3);
  });

  it('checks the target before the iteration limit', async () => {
    const validator = new FakeValidator(['<overall_score: 4>', '<overall_score: 9>']);
    const run = await createController(validator).run(slice, { kinds: ['class'], maxIterations: 2, targetScore: 9 });

    expect(run.outcome).toBe('target-reached');
    expect(run.history).toHaveLength(2);
  });

  it('feeds the previous report and source into the next prompt', async () => {
    const validator = new FakeValidator([
      [
        '<overall_score: 4>',
        '<gaps>',
        '- No lockout state',
        '</gaps>',
        '<recommendations>',
        '- Add an AccountLock class',
        '</recommendations>',
      ].join('\n'),
      '<overall_score: 10>',
    ]);
    const generator = new FakeGenerator();
    await createController(validator, generator).run(slice, { kinds: ['class'], maxIterations: 2 });

    const [first, second] = generator.prompts;
    expect(first).not.toContain('MANDATORY CORRECTIONS');
    expect(second).toContain('The previous version scored 4/10 in QA review.');
    expect(second).toContain('### Identified Gaps\n1. No lockout state');
    expect(second).toContain('### Recommendations\n1. Add an AccountLock class');
    expect(second).toContain('```plantuml\n@startuml\nnote "class draft 1" as N\n@enduml\n```');
  });

  it('records a generation failure as a failed attempt and still validates', async () => {
    const generator = new FakeGenerator((prompt, call) => {
      if (kindOfPrompt(prompt) === 'sequence') {
        throw new Error('rate limited');
      }
      return `@startuml\nnote "draft ${call}" as N\n@enduml`;
    });
    const validator = new FakeValidator(['<overall_score: 5>']);

    const run = await createController(validator, generator).run(slice, { maxIterations: 1 });

    const attempts = run.history[0]?.artifactAttempts ?? [];
    expect(attempts.map((attempt) => attempt.kind)).toEqual(['class', 'sequence', 'activity']);
    expect(attempts[1]).toEqual({
      kind: 'sequence',
      sourceText: '',
      compileStatus: { status: 'failed', stage: 'generation', reason: 'rate limited' },
    });
    expect(attempts[0]?.compileStatus).toEqual({ status: 'succeeded' });
    expect(validator.calls[0]).toHaveLength(3);
    expect(run.outcome).toBe('max-iterations-exhausted');
  });

  it('records a compile failure with its source and reason', async () => {
    const compiler = new FakeCompiler({ activity: 'Syntax Error? (line 3)' });
    const validator = new FakeValidator(['<overall_score: 7>']);

    const run = await createController(validator, new FakeGenerator(), compiler).run(slice, { maxIterations: 1 });

    const activity = run.history[0]?.artifactAttempts.find((attempt) => attempt.kind === 'activity');
    expect(activity?.compileStatus).toEqual({ status: 'failed', stage: 'compile', reason: 'Syntax Error? (line 3)' });
    expect(activity?.sourceText).toBe('@startuml\nnote "activity draft 3" as N\n@enduml');
    expect(activity?.renderedLocation).toBeUndefined();

    const cls = run.history[0]?.artifactAttempts.find((attempt) => attempt.kind === 'class');
    expect(cls?.renderedLocation).toBe('/out/class_v1.png');

    const validated = validator.calls[0] ?? [];
    expect(validated.map((attempt) => attempt.kind)).toEqual(['class', 'sequence', 'activity']);
    expect(validated[2]?.compileStatus).toEqual({ status: 'failed', stage: 'compile', reason: 'Syntax Error? (line 3)' });
    expect(validated[0]?.compileStatus).toEqual({ status: 'succeeded' });
  });

  it('records a zero delta when the score holds steady at the limit', async () => {
    const validator = new FakeValidator(['<overall_score: 8>', '<overall_score: 8>']);

    const run = await createController(validator).run(slice, { kinds: ['class'], maxIterations: 2, targetScore: 10 });

    expect(run.outcome).toBe('max-iterations-exhausted');
    expect(run.history).toHaveLength(2);
    expect(run.history[1]?.delta).toBe(0);
  });

  it('passes the iteration number to the compiler as the version', async () => {
    const compiler = new FakeCompiler();
    const validator = new FakeValidator(['<overall_score: 3>']);

    await createController(validator, new FakeGenerator(), compiler).run(slice, { kinds: ['class'], maxIterations: 2 });

    expect(compiler.requests.map((request) => request.version)).toEqual([1, 2]);
    expect(compiler.requests[0]?.sliceName).toBe('User Login');
  });

  it('records a validation failure without metrics and keeps going', async () => {
    const validator = new FakeValidator([new Error('upstream 500'), '<overall_score: 10>']);

    const run = await createController(validator).run(slice, { kinds: ['class'], maxIterations: 3 });

    expect(run.history).toHaveLength(2);
    expect(run.history[0]?.metrics).toBeUndefined();
    expect(run.history[0]?.failure).toEqual({ stage: 'validation', reason: 'upstream 500' });
    expect(run.history[1]?.delta).toBeUndefined();
    expect(run.outcome).toBe('target-reached');
  });

  it('keeps the last scored metrics across an unparseable report', async () => {
    const validator = new FakeValidator(['<overall_score: 4>', 'The diagrams look fine.', '<overall_score: 6>']);
    const generator = new FakeGenerator();

    const run = await createController(validator, generator).run(slice, { kinds: ['class'], maxIterations: 3 });

    const failed: IterationRecord | undefined = run.history[1];
    expect(failed?.failure).toEqual({ stage: 'parse', reason: 'No overall score marker found in report' });
    expect(failed?.validationReport).toBe('The diagrams look fine.');
    expect(run.history[2]?.delta).toBe(2);
    expect(generator.prompts[2]).toContain('The previous version scored 4/10 in QA review.');
    expect(run.outcome).toBe('max-iterations-exhausted');
  });

  it('never records more than maxIterations iterations', async () => {
    const validator = new FakeValidator(['<overall_score: 1>']);
    const run = await createController(validator).run(slice, { kinds: ['state'], maxIterations: 4 });

    expect(run.history).toHaveLength(4);
    expect(run.outcome).toBe('max-iterations-exhausted');
  });

  it('calls onIteration with each recorded iteration', async () => {
    const seen: number[] = [];
    const validator = new FakeValidator(['<overall_score: 2>']);

    await createController(validator).run(slice, {
      kinds: ['class'],
      maxIterations: 2,
      onIteration: (_run, record) => {
        seen.push(record.index);
      },
    });

    expect(seen).toEqual([1, 2]);
  });

  it('seals the run before rethrowing a failing onIteration hook', async () => {
    const abort = new AbortController();
    const seen: RefinementRun[] = [];
    const controller = createController(new FakeValidator(['<overall_score: 2>']));

    const error: unknown = await controller
      .run(slice, {
        kinds: ['class'],
        maxIterations: 3,
        signal: abort.signal,
        onIteration: (run) => {
          seen.push(run);
          abort.abort('late cancel');
          throw new Error('disk full');
        },
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IterationHookError);
    expect(error).toMatchObject({ message: 'Iteration hook failed after iteration 1: disk full', iteration: 1 });
    expect(seen[0]?.outcome).toBe('aborted');
    expect(seen[0]?.abortReason).toBe('Iteration hook failed after iteration 1: disk full');
    expect(seen[0]?.history).toHaveLength(1);
    expect(controller.getState()).toBe('stopped');
  });

  it('uses the given recorder', async () => {
    const recorder = new HistoryRecorder();
    const controller = new RefinementController({
      generator: new FakeGenerator(),
      compiler: new FakeCompiler(),
      validator: new FakeValidator(['<overall_score: 10>']),
      recorder,
    });

    const run = await controller.run(slice, { kinds: ['class'], runId: 'run-fixed-id' });

    expect(run.id).toBe('run-fixed-id');
    expect(recorder.summarize(run).finalScore).toBe(10);
  });

  describe('aborting', () => {
    it('seals the run as aborted when the caller cancels mid-iteration', async () => {
      const abort = new AbortController();
      const generator = new FakeGenerator((prompt, call) => {
        if (call === 2) {
          abort.abort('cancelled by user');
          return new Promise<string>(() => undefined);
        }
        return '@startuml\nclass User\n@enduml';
      });
      const validator = new FakeValidator(['<overall_score: 3>']);
      const controller = createController(validator, generator);

      const run = await controller.run(slice, { kinds: ['class'], maxIterations: 5, signal: abort.signal });

      expect(run.outcome).toBe('aborted');
      expect(run.abortReason).toBe('cancelled by user');
      expect(run.history).toHaveLength(1);
      expect(validator.calls).toHaveLength(1);
      expect(controller.getState()).toBe('stopped');
    });

    it('names the time budget when it runs out', async () => {
      const generator = new FakeGenerator((_prompt, call) =>
        call === 1 ? '@startuml\nclass User\n@enduml' : new Promise<string>(() => undefined)
      );
      const validator = new FakeValidator(['<overall_score: 3>']);

      const run = await createController(validator, generator).run(slice, {
        kinds: ['class'],
        maxIterations: 5,
        timeBudgetMs: 50,
      });

      expect(run.outcome).toBe('aborted');
      expect(run.abortReason).toBe('Time budget of 50ms exhausted');
      expect(run.history).toHaveLength(1);
    });

    it('records nothing when the signal is already aborted', async () => {
      const abort = new AbortController();
      abort.abort('stopped before start');

      const run = await createController(new FakeValidator(['<overall_score: 3>'])).run(slice, {
        kinds: ['class'],
        signal: abort.signal,
      });

      expect(run.outcome).toBe('aborted');
      expect(run.history).toEqual([]);
    });
  });

  describe('input validation', () => {
    it('rejects maxIterations below 1', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 3>']));
      await expect(controller.run(slice, { maxIterations: 0 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects maxIterations above 50', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 3>']));
      await expect(controller.run(slice, { maxIterations: 51 })).rejects.toThrow(
        'Validation failed: Number must be less than or equal to 50'
      );
    });

    it('rejects an empty kind list', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 3>']));
      await expect(controller.run(slice, { kinds: [] })).rejects.toThrow(
        'Validation failed: At least one artifact kind is required'
      );
    });

    it('rejects duplicate kinds', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 3>']));
      await expect(controller.run(slice, { kinds: ['class', 'class'] })).rejects.toThrow(
        'Validation failed: Artifact kinds must be unique'
      );
    });

    it('rejects a blank slice name', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 3>']));
      await expect(controller.run({ name: '   ', text: 'x' })).rejects.toThrow(
        'Validation failed: Slice name must not be empty'
      );
    });

    it('refuses a second concurrent run on the same controller', async () => {
      const controller = createController(new FakeValidator(['<overall_score: 10>']));

      const first = controller.run(slice, { kinds: ['class'] });
      await expect(controller.run(slice)).rejects.toBeInstanceOf(RefinerError);
      await expect(first).resolves.toMatchObject({ outcome: 'target-reached' });
    });
  });
});
