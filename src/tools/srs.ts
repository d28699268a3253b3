import { readFile } from 'node:fs/promises';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { createSrsWorkflow, type Services } from '../services/container.js';
import type { SrsRunResult } from '../types/index.js';
import { runSignal } from '../utils/abort.js';
import { validatePath } from '../utils/path-security.js';

const SrsInputSchema = z
  .discriminatedUnion('action', [
    z.object({
      action: z.literal('urd'),
      brief: z.string().min(1, 'brief is required'),
    }),
    z.object({
      action: z.literal('run'),
      urd: z.string().min(1).optional(),
      urdPath: z.string().min(1).optional(),
      standardPath: z.string().min(1).optional(),
      maxIterations: z.number().int().min(1).max(50).optional(),
      targetErrors: z.number().int().min(0).optional(),
    }),
  ])
  .superRefine((input, ctx) => {
    if (input.action === 'run' && input.urd === undefined && input.urdPath === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Provide either urd or urdPath', path: ['urd'] });
    }
  });

/**
 * refiner_srs - requirements-document workflow
 */
export const srsTool: Tool = {
  name: 'refiner_srs',
  description: `Author a Software Requirements Specification iteratively.

## Actions

- **urd**: turn a short product brief into a User Requirements Document
- **run**: write SRS v1 from a URD, then audit and revise it until the audit
  finds no more than targetErrors problems (default 0) or maxIterations
  versions exist (default 10)

Every version is saved as SRS_v<n>.md with its audit as SRSVR_v<n>.md.

## Example

\`\`\`json
{ "action": "run", "urdPath": "docs/URD.md", "maxIterations": 4 }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['urd', 'run'],
        description: 'Which step to run',
      },
      brief: {
        type: 'string',
        description: 'Product brief (action "urd")',
      },
      urd: {
        type: 'string',
        description: 'URD text (action "run")',
      },
      urdPath: {
        type: 'string',
        description: 'Path to a URD file (action "run")',
      },
      standardPath: {
        type: 'string',
        description: 'Optional path to a standard reference text the SRS must follow',
      },
      maxIterations: {
        type: 'number',
        description: 'Maximum SRS versions (default 10)',
      },
      targetErrors: {
        type: 'number',
        description: 'Audit error count that ends the loop (default 0)',
      },
    },
    required: ['action'],
  },
};

export type SrsToolResult =
  | { action: 'urd'; path: string; length: number }
  | ({ action: 'run' } & SrsRunResult);

async function readDocument(path: string): Promise<string> {
  return readFile(validatePath(path, { mustBeDirectory: false }), 'utf-8');
}

export async function handleSrs(
  args: Record<string, unknown>,
  services: Services
): Promise<SrsToolResult> {
  const input = SrsInputSchema.parse(args);
  const workflow = createSrsWorkflow(services);
  const signal = runSignal(undefined, services.config.timeBudgetMs);

  if (input.action === 'urd') {
    const urd = await workflow.generateUrd(input.brief, signal);
    return { action: 'urd', path: urd.path, length: urd.text.length };
  }

  const urd = input.urd ?? (await readDocument(input.urdPath ?? ''));
  const standard = input.standardPath ? await readDocument(input.standardPath) : undefined;

  const result = await workflow.run(
    {
      urd,
      standard,
      maxIterations: input.maxIterations,
      targetErrors: input.targetErrors,
    },
    signal
  );
  return { action: 'run', ...result };
}
