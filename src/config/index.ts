/**
 * Configuration resolution for design-refiner.
 *
 * Resolution order, later sources winning:
 * 1. Built-in defaults
 * 2. Config file: design-refiner.config.json in the working directory
 * 3. Environment variables (ANTHROPIC_API_KEY, PLANTUML_JAR, REFINER_*, JAVA_BIN)
 * 4. Explicit overrides passed by the caller
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ArtifactKindSchema, DEFAULT_ARTIFACT_KINDS, DEFAULT_RUN_PARAMETERS } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'design-refiner.config.json';

export const LLMModelSchema = z.enum(['haiku', 'sonnet']);

export type LLMModel = z.infer<typeof LLMModelSchema>;

export const RefinerConfigSchema = z.object({
  anthropicApiKey: z.string().min(1).optional(),
  model: LLMModelSchema,
  plantumlJarPath: z.string().min(1),
  javaBin: z.string().min(1),
  outputDir: z.string().min(1),
  maxIterations: z.number().int().min(1).max(50),
  targetScore: z.number().min(0).max(10),
  kinds: z.array(ArtifactKindSchema).min(1),
  // 0 disables the wall-clock budget
  timeBudgetMs: z.number().int().min(0),
  compileTimeoutMs: z.number().int().min(1000),
});

export type RefinerConfig = z.infer<typeof RefinerConfigSchema>;

export type ConfigOverrides = Partial<RefinerConfig>;

/**
 * Config file shape: every key optional, unknown keys tolerated
 */
const ConfigFileSchema = RefinerConfigSchema.partial().passthrough();

export const DEFAULT_CONFIG: RefinerConfig = {
  model: 'sonnet',
  plantumlJarPath: 'plantuml/plantuml.jar',
  javaBin: 'java',
  outputDir: 'design-output',
  maxIterations: DEFAULT_RUN_PARAMETERS.maxIterations,
  targetScore: DEFAULT_RUN_PARAMETERS.targetScore,
  kinds: [...DEFAULT_ARTIFACT_KINDS],
  timeBudgetMs: 0,
  compileTimeoutMs: 10_000,
};

export interface LoadConfigOptions {
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  overrides?: ConfigOverrides | undefined;
}

function readConfigFile(cwd: string): ConfigOverrides {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    logger.debug(`No config file found at ${CONFIG_FILE_NAME}`);
    return {};
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (parseError) {
    logger.warn('Config file contains invalid JSON, using defaults', parseError, { configPath });
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsedJson);
  if (!result.success) {
    logger.warn('Config file has invalid structure, using defaults', undefined, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      configPath,
    });
    return {};
  }

  const { anthropicApiKey, ...rest } = result.data;
  const fromFile: ConfigOverrides = {};
  if (anthropicApiKey) fromFile.anthropicApiKey = anthropicApiKey;
  if (rest.model) fromFile.model = rest.model;
  if (rest.plantumlJarPath) fromFile.plantumlJarPath = rest.plantumlJarPath;
  if (rest.javaBin) fromFile.javaBin = rest.javaBin;
  if (rest.outputDir) fromFile.outputDir = rest.outputDir;
  if (rest.maxIterations !== undefined) fromFile.maxIterations = rest.maxIterations;
  if (rest.targetScore !== undefined) fromFile.targetScore = rest.targetScore;
  if (rest.kinds) fromFile.kinds = rest.kinds;
  if (rest.timeBudgetMs !== undefined) fromFile.timeBudgetMs = rest.timeBudgetMs;
  if (rest.compileTimeoutMs !== undefined) fromFile.compileTimeoutMs = rest.compileTimeoutMs;
  return fromFile;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`Ignoring non-numeric ${name}`, undefined, { value: raw });
    return undefined;
  }
  return value;
}

function readEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  const fromEnv: ConfigOverrides = {};

  if (env.ANTHROPIC_API_KEY) fromEnv.anthropicApiKey = env.ANTHROPIC_API_KEY;
  if (env.PLANTUML_JAR) fromEnv.plantumlJarPath = env.PLANTUML_JAR;
  if (env.JAVA_BIN) fromEnv.javaBin = env.JAVA_BIN;
  if (env.REFINER_OUTPUT_DIR) fromEnv.outputDir = env.REFINER_OUTPUT_DIR;

  const model = LLMModelSchema.safeParse(env.REFINER_MODEL);
  if (model.success) {
    fromEnv.model = model.data;
  } else if (env.REFINER_MODEL) {
    logger.warn('Ignoring unknown REFINER_MODEL', undefined, { value: env.REFINER_MODEL });
  }

  const maxIterations = readNumber(env, 'REFINER_MAX_ITERATIONS');
  if (maxIterations !== undefined) fromEnv.maxIterations = maxIterations;
  const targetScore = readNumber(env, 'REFINER_TARGET_SCORE');
  if (targetScore !== undefined) fromEnv.targetScore = targetScore;
  const timeBudgetMs = readNumber(env, 'REFINER_TIME_BUDGET_MS');
  if (timeBudgetMs !== undefined) fromEnv.timeBudgetMs = timeBudgetMs;

  return fromEnv;
}

/**
 * Resolve the effective configuration.
 *
 * An unreadable or malformed config file only logs a warning. The merged
 * result is validated, so a bad environment variable or override raises a
 * ValidationError.
 */
export function loadConfig(options: LoadConfigOptions = {}): RefinerConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const merged = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(cwd),
    ...readEnvironment(env),
    ...options.overrides,
  };

  const result = RefinerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }

  logger.debug('Configuration resolved', undefined, {
    model: result.data.model,
    outputDir: result.data.outputDir,
    maxIterations: result.data.maxIterations,
    targetScore: result.data.targetScore,
    hasApiKey: Boolean(result.data.anthropicApiKey),
  });

  return result.data;
}
