/**
 * Validation adapter: asks the model to audit an iteration's diagrams.
 */

import type { LLMModel } from '../config/index.js';
import type { ArtifactAttempt, RequirementsSlice } from '../types/index.js';
import { AdapterError, isAbortError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Validator } from './adapters.js';
import type { LLMClient } from './llm-client.js';
import { buildValidationPrompt } from './prompt-synthesizer.js';

export interface LlmValidatorOptions {
  /** Defaults to sonnet; audits need the stronger model */
  model?: LLMModel | undefined;
  maxTokens?: number | undefined;
}

export class LlmValidator implements Validator {
  private readonly model: LLMModel;
  private readonly maxTokens: number | undefined;

  constructor(
    private readonly client: Pick<LLMClient, 'generate'>,
    options: LlmValidatorOptions = {}
  ) {
    this.model = options.model ?? 'sonnet';
    this.maxTokens = options.maxTokens;
  }

  async validate(
    slice: RequirementsSlice,
    attempts: readonly ArtifactAttempt[],
    signal?: AbortSignal
  ): Promise<string> {
    const prompt = buildValidationPrompt(slice, attempts);
    logger.debug('Requesting QA report', undefined, {
      slice: slice.name,
      attempts: attempts.length,
      promptLength: prompt.length,
    });

    try {
      const response = await this.client.generate(prompt, {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature: 0.2,
        signal,
      });
      return response.content;
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new AdapterError('validation', error instanceof Error ? error.message : String(error), error);
    }
  }
}
