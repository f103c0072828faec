/**
 * @module @repo-context/cli/cli/schemas
 * Input/Output schemas for CLI commands
 */

import { z } from 'zod';

// ============================================================================
// Generate Command
// ============================================================================

export const GenerateInputSchema = z.object({
  out: z.string().min(1).optional(),
  files: z.array(z.string().min(1)).optional(),
  exclude: z.array(z.string().min(1)).optional(),
  skipRelated: z.boolean().optional(),
  includeIgnored: z.boolean().optional(),
  /** `--no-tree` sets this to false; true means "not given" */
  tree: z.boolean().optional(),
  task: z.string().optional(),
  stripSelf: z.boolean().optional(),
  sort: z.boolean().optional(),
  maxLines: z.coerce.number().int().positive().optional(),
  config: z.string().min(1).optional(),
  json: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  verbose: z.boolean().optional().default(false),
});

export type GenerateInput = z.infer<typeof GenerateInputSchema>;

export const GenerateOutputSchema = z.object({
  ok: z.boolean(),
  root: z.string(),
  out: z.string().optional(),
  /** The document itself, present when it was not written to `out` */
  text: z.string().optional(),
  tokenCount: z.number(),
  files: z.number(),
  warnings: z.array(z.string()),
});

export type GenerateOutput = z.infer<typeof GenerateOutputSchema>;
