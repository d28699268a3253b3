import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/container.js';
import { logger } from '../utils/logger.js';
import {
  classifyError,
  createErrorResponse,
  RefinerError,
  ErrorCode,
} from '../utils/errors.js';

import { refineTool, handleRefine } from './refine.js';
import { historyTool, handleHistory } from './history.js';
import { srsTool, handleSrs } from './srs.js';
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - refiner_refine: run the diagram refinement loop for one slice
 * - refiner_history: read back recorded runs
 * - refiner_srs: URD and SRS authoring
 * - refiner_health: health check
 */
export function registerTools(): Tool[] {
  return [refineTool, historyTool, srsTool, healthTool];
}

const TOOL_NAMES = registerTools().map((tool) => tool.name);

function validateArgs(args: unknown): args is Record<string, unknown> {
  return (
    args !== null &&
    typeof args === 'object' &&
    !Array.isArray(args)
  );
}

function extractContext(args: Record<string, unknown>): {
  runId?: string | undefined;
  sliceName?: string | undefined;
} {
  return {
    runId: typeof args['runId'] === 'string' ? args['runId'] : undefined,
    sliceName: typeof args['sliceName'] === 'string' ? args['sliceName'] : undefined,
  };
}

function textResponse(payload: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  services: Services
): Promise<{ content: TextContent[] }> {
  const { runId, sliceName } = validateArgs(args) ? extractContext(args) : {};

  return logger.withRequestContext(
    { toolName: name, runId, sliceName },
    async () => {
      const requestId = logger.getRequestId();

      try {
        if (!validateArgs(args)) {
          logger.warn('Invalid arguments received', undefined, {
            argType: typeof args,
            isNull: args === null,
            isArray: Array.isArray(args),
          });
          throw new RefinerError('Arguments must be a non-null object', ErrorCode.INVALID_ARGUMENTS, {
            details: { received: typeof args },
          });
        }

        logger.debug('Tool call started', undefined, {
          argKeys: Object.keys(args),
        });

        let result: unknown;

        switch (name) {
          case 'refiner_refine':
            result = await handleRefine(args, services);
            break;

          case 'refiner_history':
            result = await handleHistory(args, services);
            break;

          case 'refiner_srs':
            result = await handleSrs(args, services);
            break;

          case 'refiner_health':
            result = await handleHealth(args, services);
            break;

          default:
            logger.warn('Unknown tool requested', undefined, { tool: name });
            throw new RefinerError(
              `Unknown tool: ${name}. Available: ${TOOL_NAMES.join(', ')}`,
              ErrorCode.UNKNOWN_TOOL,
              { details: { tool: name } }
            );
        }

        logger.debug('Tool call completed', undefined, { elapsedMs: logger.getElapsedMs() });
        return textResponse(result);
      } catch (error) {
        const classified = classifyError(error);

        logger.error('Tool call failed', error, {
          code: classified.code,
          httpStatus: classified.httpStatus,
          isRetryable: classified.isRetryable,
          elapsedMs: logger.getElapsedMs(),
        });

        return textResponse(createErrorResponse(error, requestId));
      }
    }
  );
}
