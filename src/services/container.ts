/**
 * Dependency injection container for design-refiner services.
 *
 * Provides:
 * - One place where configuration turns into adapters
 * - Lazy initialization
 * - Factory overrides so tests can swap in fakes
 */

import { type ConfigOverrides, type RefinerConfig, loadConfig } from '../config/index.js';
import type { DiagramCompiler, TextGenerator, Validator } from '../engines/adapters.js';
import { PlantUmlCompiler } from '../engines/diagram-compiler.js';
import { HistoryRecorder } from '../engines/history-recorder.js';
import { LLMClient } from '../engines/llm-client.js';
import { RefinementController } from '../engines/refinement-controller.js';
import { LlmValidator } from '../engines/validator.js';
import { ReportStore } from '../storage/index.js';
import { resolveInside } from '../utils/path-security.js';
import { SrsWorkflow } from '../workflows/srs-workflow.js';

/**
 * Everything a tool handler needs
 */
export interface Services {
  config: RefinerConfig;
  store: ReportStore;
  generator: TextGenerator;
  compiler: DiagramCompiler;
  validator: Validator;
  recorder: HistoryRecorder;
}

/**
 * Factories used to build services lazily; override any of them in tests
 */
export interface ServiceFactories {
  createLLMClient: (config: RefinerConfig) => LLMClient;
  createGenerator: (config: RefinerConfig, client: LLMClient) => TextGenerator;
  createCompiler: (config: RefinerConfig) => DiagramCompiler;
  createValidator: (config: RefinerConfig, client: LLMClient) => Validator;
  createStore: (config: RefinerConfig, recorder: HistoryRecorder) => ReportStore;
}

export const defaultFactories: ServiceFactories = {
  createLLMClient: (config) => new LLMClient({ anthropicApiKey: config.anthropicApiKey, model: config.model }),
  createGenerator: (_config, client) => client,
  createCompiler: (config) =>
    new PlantUmlCompiler({
      jarPath: config.plantumlJarPath,
      javaBin: config.javaBin,
      outputDir: config.outputDir,
      timeoutMs: config.compileTimeoutMs,
    }),
  createValidator: (config, client) => new LlmValidator(client, { model: config.model }),
  createStore: (config, recorder) => new ReportStore(config.outputDir, recorder),
};

export class ServiceContainer {
  private services: Services | null = null;
  private overrides: ConfigOverrides;
  private readonly customFactories: Partial<ServiceFactories> = {};

  constructor(overrides: ConfigOverrides = {}) {
    this.overrides = overrides;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(key: K, factory: ServiceFactories[K]): this {
    this.customFactories[key] = factory;
    this.clear();
    return this;
  }

  getAll(): Services {
    if (!this.services) {
      const factories: ServiceFactories = { ...defaultFactories, ...this.customFactories };
      const config = loadConfig({ overrides: this.overrides });
      const recorder = new HistoryRecorder();
      const client = factories.createLLMClient(config);
      this.services = {
        config,
        recorder,
        generator: factories.createGenerator(config, client),
        compiler: factories.createCompiler(config),
        validator: factories.createValidator(config, client),
        store: factories.createStore(config, recorder),
      };
    }
    return this.services;
  }

  /**
   * Clear all services so they are rebuilt on next use
   */
  clear(): void {
    this.services = null;
  }

  configure(overrides: ConfigOverrides): this {
    this.overrides = { ...this.overrides, ...overrides };
    this.clear();
    return this;
  }
}

/**
 * A controller bound to the container's adapters. Controllers hold run
 * state, so each run gets its own.
 */
export function createController(services: Services): RefinementController {
  return new RefinementController({
    generator: services.generator,
    compiler: services.compiler,
    validator: services.validator,
    recorder: services.recorder,
  });
}

/**
 * SRS documents live in their own folder under the output directory
 */
export function createSrsWorkflow(services: Services): SrsWorkflow {
  const store = new ReportStore(resolveInside(services.store.outputDir, 'srs'), services.recorder);
  return new SrsWorkflow(services.generator, store);
}

let globalContainer: ServiceContainer | null = null;

export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

export function createContainer(overrides?: ConfigOverrides): ServiceContainer {
  return new ServiceContainer(overrides);
}

export function resetContainer(): void {
  globalContainer?.clear();
  globalContainer = null;
}
