import { z } from 'zod';

/**
 * A named, bounded fragment of a requirements document; the unit of
 * generation and validation for one refinement run.
 */
export const RequirementsSliceSchema = z.object({
  name: z.string().trim().min(1, 'Slice name must not be empty'),
  // May be empty; the synthesizer still produces a prompt
  text: z.string(),
});

export type RequirementsSlice = z.infer<typeof RequirementsSliceSchema>;

/**
 * Slice definition as written in a slices file: inline text, or a section
 * heading to cut out of a source document.
 */
export const SliceDefinitionSchema = z.union([
  z.object({
    name: z.string().trim().min(1),
    text: z.string(),
  }),
  z.object({
    name: z.string().trim().min(1),
    source: z.string().min(1),
    section: z.string().min(1),
  }),
]);

export type SliceDefinition = z.infer<typeof SliceDefinitionSchema>;

export const SlicesFileSchema = z.object({
  slices: z.array(SliceDefinitionSchema).min(1, 'A slices file must define at least one slice'),
});

export type SlicesFile = z.infer<typeof SlicesFileSchema>;
