import { access, constants, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/container.js';

export const SERVER_VERSION = '0.1.0';

/**
 * Tool definition for health check
 */
export const healthTool: Tool = {
  name: 'refiner_health',
  description: `Check whether the refiner can do its work.

Returns:
- Overall health status (healthy, degraded, unhealthy)
- Output directory writability
- Whether an Anthropic API key is configured
- PlantUML availability (with verbose, runs the compiler's self-test)
- Version information`,

  inputSchema: {
    type: 'object',
    properties: {
      verbose: {
        type: 'boolean',
        description: 'Run the PlantUML self-test instead of only checking the JAR exists',
        default: false,
      },
    },
  },
};

type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

interface CheckResult {
  status: HealthStatus;
  message: string;
}

export interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  version: string;
  checks: {
    outputDir: CheckResult;
    apiKey: CheckResult;
    plantuml: CheckResult;
  };
}

export async function handleHealth(
  args: Record<string, unknown>,
  services: Services
): Promise<HealthResult> {
  const verbose = args['verbose'] === true;

  const checks = {
    outputDir: await checkOutputDir(services.store.outputDir),
    apiKey: checkApiKey(services.config.anthropicApiKey),
    plantuml: await checkPlantUml(services, verbose),
  };

  const statuses = Object.values(checks).map((check) => check.status);
  let status: HealthStatus = 'healthy';
  if (statuses.includes('unhealthy')) {
    status = 'unhealthy';
  } else if (statuses.includes('degraded')) {
    status = 'degraded';
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    version: SERVER_VERSION,
    checks,
  };
}

async function checkOutputDir(outputDir: string): Promise<CheckResult> {
  try {
    await mkdir(outputDir, { recursive: true });
    await access(outputDir, constants.W_OK);
    return { status: 'healthy', message: `Output directory is writable: ${outputDir}` };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'unhealthy', message: `Output directory unusable: ${message}` };
  }
}

function checkApiKey(apiKey: string | undefined): CheckResult {
  return apiKey
    ? { status: 'healthy', message: 'ANTHROPIC_API_KEY is set' }
    : { status: 'degraded', message: 'ANTHROPIC_API_KEY is not set; generation and validation will fail' };
}

async function checkPlantUml(services: Services, verbose: boolean): Promise<CheckResult> {
  const { compiler, config } = services;

  if (verbose && compiler.verifyInstallation) {
    try {
      const installation = await compiler.verifyInstallation();
      return installation.ok
        ? { status: 'healthy', message: installation.detail }
        : { status: 'degraded', message: installation.detail };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'degraded', message: `PlantUML self-test failed: ${message}` };
    }
  }

  return existsSync(config.plantumlJarPath)
    ? { status: 'healthy', message: `PlantUML JAR found at: ${config.plantumlJarPath}` }
    : { status: 'degraded', message: `PlantUML JAR not found at: ${config.plantumlJarPath}` };
}
