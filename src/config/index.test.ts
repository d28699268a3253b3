import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig } from './index.js';
import { ValidationError } from '../utils/errors.js';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('returns the defaults when nothing is configured', () => {
    expect(loadConfig({ cwd, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('layers file, environment and overrides in that order', async () => {
    await writeFile(
      join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({ model: 'haiku', maxIterations: 8, outputDir: 'from-file', kinds: ['class', 'state'] })
    );

    const config = loadConfig({
      cwd,
      env: { REFINER_MAX_ITERATIONS: '6', REFINER_OUTPUT_DIR: 'from-env', ANTHROPIC_API_KEY: 'test-key' },
      overrides: { outputDir: 'from-override' },
    });

    expect(config.model).toBe('haiku');
    expect(config.kinds).toEqual(['class', 'state']);
    expect(config.maxIterations).toBe(6);
    expect(config.outputDir).toBe('from-override');
    expect(config.anthropicApiKey).toBe('test-key');
  });

  it('ignores a config file with invalid JSON', async () => {
    await writeFile(join(cwd, CONFIG_FILE_NAME), '{ not json');

    expect(loadConfig({ cwd, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('ignores a config file with the wrong shape', async () => {
    await writeFile(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ maxIterations: 'many' }));

    expect(loadConfig({ cwd, env: {} }).maxIterations).toBe(DEFAULT_CONFIG.maxIterations);
  });

  it('ignores an unknown model and non-numeric numbers from the environment', () => {
    const config = loadConfig({ cwd, env: { REFINER_MODEL: 'opus', REFINER_TARGET_SCORE: 'high' } });

    expect(config.model).toBe('sonnet');
    expect(config.targetScore).toBe(10);
  });

  it('reads the time budget and PlantUML settings from the environment', () => {
    const config = loadConfig({
      cwd,
      env: { REFINER_TIME_BUDGET_MS: '60000', PLANTUML_JAR: '/opt/plantuml.jar', JAVA_BIN: '/usr/bin/java' },
    });

    expect(config.timeBudgetMs).toBe(60000);
    expect(config.plantumlJarPath).toBe('/opt/plantuml.jar');
    expect(config.javaBin).toBe('/usr/bin/java');
  });

  it('rejects an out-of-range value from the environment', () => {
    expect(() => loadConfig({ cwd, env: { REFINER_TARGET_SCORE: '11' } })).toThrow(ValidationError);
  });
});
