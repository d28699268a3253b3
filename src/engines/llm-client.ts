/**
 * Generation adapter backed by the Anthropic Messages API.
 *
 * The SDK is imported lazily so that commands which never call the model
 * (history, health) work without an API key.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type Anthropic from '@anthropic-ai/sdk';
import type { LLMModel } from '../config/index.js';
import { AdapterError, RunAbortedError, isAbortError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { TextGenerator } from './adapters.js';

export interface LLMClientConfig {
  anthropicApiKey?: string | undefined;
  /** Model used by generateText. Defaults to sonnet. */
  model?: LLMModel | undefined;
  /** Replaces the SDK client; used by tests */
  createClient?: ((apiKey: string) => MessagesClient) | undefined;
  retry?: Partial<RetryConfig> | undefined;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  } | undefined;
}

export interface GenerateOptions {
  model: LLMModel;
  maxTokens?: number | undefined;
  /** Sampling temperature (0-1) */
  temperature?: number | undefined;
  systemPrompt?: string | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * The fields of an Anthropic message this adapter reads
 */
export interface MessageResult {
  model: string;
  content: ReadonlyArray<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the SDK client this adapter calls
 */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal | undefined }
    ): Promise<MessageResult>;
  };
}

export enum LLMErrorCode {
  NO_API_KEY = 'NO_API_KEY',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class LLMError extends Error {
  constructor(
    message: string,
    public code: LLMErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

const MODEL_NAMES: Record<LLMModel, string> = {
  haiku: 'claude-3-5-haiku-20241022',
  sonnet: 'claude-3-5-sonnet-20241022',
};

const DEFAULT_MAX_TOKENS: Record<LLMModel, number> = {
  haiku: 4096,
  sonnet: 8192,
};

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Amount of randomness added to each delay (0-1) */
  jitterFactor: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

/**
 * Exponential backoff with jitter: baseDelay * 2^attempt, capped, +/- jitter/2
 */
export function calculateBackoffDelay(attempt: number, retry: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const exponentialDelay = retry.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, retry.maxDelayMs);
  const jitter = cappedDelay * retry.jitterFactor * (Math.random() - 0.5);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Rate limiting (429), request timeout (408) and 5xx are worth another try
 */
function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 429 || status === 408 || (status >= 500 && status < 600);
}

export class LLMClient implements TextGenerator {
  private readonly apiKey: string | null;
  private readonly model: LLMModel;
  private readonly retry: RetryConfig;
  private readonly clientFactory: ((apiKey: string) => MessagesClient) | undefined;
  private anthropicClient: MessagesClient | null = null;

  constructor(config: LLMClientConfig = {}) {
    this.apiKey = config.anthropicApiKey ?? null;
    this.model = config.model ?? 'sonnet';
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.clientFactory = config.createClient;

    if (this.apiKey) {
      logger.debug('LLM client initialized with API key', undefined, { model: this.model });
    } else {
      logger.warn('LLM client initialized without API key; generation calls will fail');
    }
  }

  public isAvailable(): boolean {
    return this.apiKey !== null;
  }

  private async getAnthropicClient(): Promise<MessagesClient> {
    if (!this.apiKey) {
      throw new LLMError(
        'No API key available. Set ANTHROPIC_API_KEY or provide it in design-refiner.config.json.',
        LLMErrorCode.NO_API_KEY
      );
    }

    if (!this.anthropicClient) {
      if (this.clientFactory) {
        this.anthropicClient = this.clientFactory(this.apiKey);
      } else {
        try {
          const { default: AnthropicSdk } = await import('@anthropic-ai/sdk');
          this.anthropicClient = new AnthropicSdk({ apiKey: this.apiKey });
          logger.debug('Anthropic client initialized');
        } catch (error) {
          throw new LLMError(
            'Failed to initialize Anthropic SDK. Is @anthropic-ai/sdk installed?',
            LLMErrorCode.CONFIGURATION_ERROR,
            error
          );
        }
      }
    }

    return this.anthropicClient;
  }

  /**
   * TextGenerator entry point used by the refinement loop. Any failure left
   * after retries surfaces as a single AdapterError.
   */
  public async generateText(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.generate(prompt, { model: this.model, signal });
      return response.content;
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new AdapterError('generation', error instanceof Error ? error.message : String(error), error);
    }
  }

  /**
   * Generate with automatic retry on transient errors
   *
   * @throws {LLMError} if generation fails after all retries
   * @throws {RunAbortedError} if the signal fires first
   */
  public async generate(prompt: string, options: GenerateOptions): Promise<LLMResponse> {
    this.validatePrompt(prompt);

    const startTime = Date.now();
    const modelName = MODEL_NAMES[options.model];
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS[options.model];
    const { signal } = options;

    logger.debug('Starting LLM generation', undefined, {
      model: options.model,
      maxTokens,
      promptLength: prompt.length,
    });

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new RunAbortedError(signal.reason);
      }

      try {
        return await this.attemptGeneration(prompt, options, modelName, maxTokens, startTime);
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw new RunAbortedError(signal.reason);
        }
        if (error instanceof LLMError) {
          throw error;
        }

        const status = statusOf(error);
        if (!isRetryableStatus(status) || attempt >= this.retry.maxRetries) {
          throw this.wrapError(error, Date.now() - startTime);
        }

        const delayMs = calculateBackoffDelay(attempt, this.retry);
        logger.warn('LLM generation failed, retrying', error, {
          attempt: attempt + 1,
          maxRetries: this.retry.maxRetries,
          delayMs,
          status,
        });

        try {
          await delay(delayMs, undefined, { signal });
        } catch (sleepError) {
          throw new RunAbortedError(signal?.reason ?? sleepError);
        }
      }
    }
  }

  private async attemptGeneration(
    prompt: string,
    options: GenerateOptions,
    modelName: string,
    maxTokens: number,
    startTime: number
  ): Promise<LLMResponse> {
    const client = await this.getAnthropicClient();

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: modelName,
      max_tokens: maxTokens,
      temperature: options.temperature ?? 1.0,
      messages: [{ role: 'user', content: prompt }],
    };
    if (options.systemPrompt) {
      body.system = options.systemPrompt;
    }

    const response = await client.messages.create(body, { signal: options.signal });
    const content = this.extractContent(response);

    logger.info('LLM generation completed', {
      model: options.model,
      elapsedMs: Date.now() - startTime,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      contentLength: content.length,
    });

    return {
      content,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private wrapError(error: unknown, elapsedMs: number): LLMError {
    const status = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status === 429) {
      logger.warn('Rate limit exceeded', error, { elapsedMs });
      return new LLMError('Rate limit exceeded. Please try again later.', LLMErrorCode.RATE_LIMIT, error);
    }

    if (status !== undefined) {
      logger.error('API error during generation', error, { status, elapsedMs });
      return new LLMError(`API error: ${message || 'Unknown error'}`, LLMErrorCode.API_ERROR, error);
    }

    logger.error('Unknown error during generation', error, { elapsedMs });
    return new LLMError(`Failed to generate response: ${message}`, LLMErrorCode.API_ERROR, error);
  }

  /**
   * Concatenates every text block; tool-use blocks are not expected here
   */
  private extractContent(response: MessageResult): string {
    const text = response.content
      .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
      .join('');

    if (text.length === 0) {
      throw new LLMError(
        'Invalid API response: no text content found',
        LLMErrorCode.INVALID_RESPONSE,
        { stopReason: response.stop_reason }
      );
    }

    return text;
  }

  public validatePrompt(prompt: string): void {
    if (!prompt || prompt.trim().length === 0) {
      throw new LLMError('Prompt cannot be empty', LLMErrorCode.CONFIGURATION_ERROR);
    }

    if (prompt.length > 100000) {
      logger.warn('Very long prompt detected', undefined, { length: prompt.length });
    }
  }
}
