import { describe, it, expect } from 'vitest';
import { LlmValidator } from './validator.js';
import type { GenerateOptions, LLMResponse } from './llm-client.js';
import type { ArtifactAttempt, RequirementsSlice } from '../types/index.js';
import { AdapterError, RunAbortedError } from '../utils/errors.js';

class RecordingClient {
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];

  constructor(private readonly outcome: string | Error) {}

  async generate(prompt: string, options: GenerateOptions): Promise<LLMResponse> {
    this.calls.push({ prompt, options });
    if (this.outcome instanceof Error) throw this.outcome;
    return { content: this.outcome, model: 'claude-test' };
  }
}

const slice: RequirementsSlice = { name: 'User Login', text: 'Users sign in with email and password.' };

const attempts: ArtifactAttempt[] = [
  { kind: 'class', sourceText: '@startuml\nclass User\n@enduml', compileStatus: { status: 'succeeded' } },
  {
    kind: 'activity',
    sourceText: '@startuml\nstart\n@enduml',
    compileStatus: { status: 'failed', stage: 'compile', reason: 'Syntax Error? (line 2)' },
  },
];

describe('LlmValidator', () => {
  it('sends every attempt in one low-temperature call and returns the report', async () => {
    const client = new RecordingClient('<overall_score: 7>');
    const validator = new LlmValidator(client, { model: 'haiku', maxTokens: 2048 });

    const report = await validator.validate(slice, attempts);

    expect(report).toBe('<overall_score: 7>');
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.options).toEqual({ model: 'haiku', maxTokens: 2048, temperature: 0.2, signal: undefined });
    expect(client.calls[0]?.prompt).toContain('## REQUIREMENTS SLICE: User Login');
    expect(client.calls[0]?.prompt).toContain(
      '### 2. ACTIVITY DIAGRAM (LOGIC/WORKFLOW)\nDiagram has errors. Compilation failed: Syntax Error? (line 2)'
    );
  });

  it('defaults to the sonnet model', async () => {
    const client = new RecordingClient('<overall_score: 9>');
    await new LlmValidator(client).validate(slice, attempts);

    expect(client.calls[0]?.options.model).toBe('sonnet');
  });

  it('wraps client failures as a validation adapter error', async () => {
    const validator = new LlmValidator(new RecordingClient(new Error('upstream 500')));

    const error: unknown = await validator.validate(slice, attempts).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AdapterError);
    expect(error).toMatchObject({ adapter: 'validation', message: 'validation adapter failed: upstream 500' });
  });

  it('lets aborts through unwrapped', async () => {
    const validator = new LlmValidator(new RecordingClient(new RunAbortedError('shutdown')));

    await expect(validator.validate(slice, attempts)).rejects.toBeInstanceOf(RunAbortedError);
  });
});
