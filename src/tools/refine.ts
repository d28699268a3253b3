import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { loadSlicesFile } from '../engines/slice-loader.js';
import type { Services } from '../services/container.js';
import { ArtifactKindSchema, type RequirementsSlice, type RunSummary } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import { refineSlice } from '../workflows/refine-slice.js';

const RefineInputSchema = z
  .object({
    sliceName: z.string().trim().min(1, 'sliceName is required'),
    sliceText: z.string().optional(),
    slicesFile: z.string().min(1).optional(),
    kinds: z.array(ArtifactKindSchema).optional(),
    maxIterations: z.number().int().optional(),
    targetScore: z.number().optional(),
    timeBudgetMs: z.number().int().min(0).optional(),
  })
  .refine((input) => input.sliceText !== undefined || input.slicesFile !== undefined, {
    message: 'Provide either sliceText or slicesFile',
    path: ['sliceText'],
  });

/**
 * refiner_refine - run the refinement loop for one requirements slice
 */
export const refineTool: Tool = {
  name: 'refiner_refine',
  description: `Generate and iteratively refine UML diagrams for one requirements slice.

Each iteration draws every requested diagram kind in PlantUML, compiles it,
asks for a joint QA review, and folds the review's gaps and recommendations
into the next prompt. Stops when the overall score reaches the target or the
iteration limit is used up.

## Example

\`\`\`json
{
  "sliceName": "User Login",
  "sliceText": "The user signs in with email and password. After 3 failed attempts the account is locked for 15 minutes.",
  "kinds": ["class", "sequence", "activity"],
  "maxIterations": 3,
  "targetScore": 9
}
\`\`\`

## What You Get Back

- **runId** and **outcome** (target-reached, max-iterations-exhausted, aborted)
- **summary** with the score progression table and residual feedback
- **files**: the per-iteration QA reports and the saved run`,

  inputSchema: {
    type: 'object',
    properties: {
      sliceName: {
        type: 'string',
        description: 'Name of the requirements slice',
      },
      sliceText: {
        type: 'string',
        description: 'Requirement text of the slice',
      },
      slicesFile: {
        type: 'string',
        description: 'YAML slices file to read the named slice from (instead of sliceText)',
      },
      kinds: {
        type: 'array',
        items: {
          type: 'string',
          enum: ['class', 'sequence', 'activity', 'usecase', 'component', 'state'],
        },
        description: 'Diagram kinds to generate (default: class, sequence, activity)',
      },
      maxIterations: {
        type: 'number',
        description: 'Maximum iterations (default 5)',
      },
      targetScore: {
        type: 'number',
        description: 'Overall score (0-10) that ends the run early (default 10)',
      },
      timeBudgetMs: {
        type: 'number',
        description: 'Wall-clock budget for the run in milliseconds (0 = none)',
      },
    },
    required: ['sliceName'],
  },
};

export interface RefineToolResult {
  runId: string;
  outcome: string;
  summary: RunSummary;
  files: {
    iterationReports: string[];
    run: string;
    yaml: string;
    summary: string;
  };
  nextStep: string;
}

async function resolveSlice(input: z.infer<typeof RefineInputSchema>): Promise<RequirementsSlice> {
  if (input.sliceText !== undefined) {
    return { name: input.sliceName, text: input.sliceText };
  }
  const slices = await loadSlicesFile(input.slicesFile ?? '');
  const slice = slices.find((candidate) => candidate.name === input.sliceName);
  if (!slice) {
    throw new NotFoundError('Slice', input.sliceName, {
      available: slices.map((candidate) => candidate.name),
    });
  }
  return slice;
}

export async function handleRefine(
  args: Record<string, unknown>,
  services: Services
): Promise<RefineToolResult> {
  const input = RefineInputSchema.parse(args);
  const slice = await resolveSlice(input);

  const result = await refineSlice(services, slice, {
    kinds: input.kinds,
    maxIterations: input.maxIterations,
    targetScore: input.targetScore,
    timeBudgetMs: input.timeBudgetMs,
  });

  const { summary } = result;
  const nextStep = summary.targetReached
    ? `Target reached in ${summary.iterations} iteration(s). Review the diagrams under ${services.store.sliceDir(slice.name)}.`
    : `Stopped (${summary.outcome}) with ${summary.residualRecommendations.length} open recommendation(s). Call refiner_refine again with a higher maxIterations, or review the last QA report.`;

  return {
    runId: result.run.id,
    outcome: summary.outcome,
    summary,
    files: {
      iterationReports: result.iterationReports,
      run: result.files.json,
      yaml: result.files.yaml,
      summary: result.files.summary,
    },
    nextStep,
  };
}
