/**
 * @module @repo-context/core/config
 * Assembly policy schema, defaults and loading
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  DEFAULT_MAX_LINES,
  DEFAULT_PREAMBLE,
  DEFAULT_RELATED_KEEP_EXTENSIONS,
  DEFAULT_RULE_FILE,
  DEFAULT_TEMPLATE,
} from '../defaults.js';
import { createContextError, errorMessage } from '../error/context-error.js';

const extension = z
  .string()
  .min(1)
  .transform((value) => {
    const lower = value.toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  });

export const ContextTemplateSchema = z.object({
  preamble: z.string().default(DEFAULT_PREAMBLE),
  taskOpen: z.string().min(1).default(DEFAULT_TEMPLATE.taskOpen),
  taskClose: z.string().min(1).default(DEFAULT_TEMPLATE.taskClose),
});

export const AssemblyPolicySchema = z.object({
  /** Drop related-tree files instead of summarizing them */
  skipRelated: z.boolean().default(false),
  /** Include hidden files and paths matched by rule sets */
  includeIgnored: z.boolean().default(false),
  /** Explicit allow-list, relative to the root; bypasses the walk */
  files: z.array(z.string().min(1)).optional(),
  /** Names (or root-relative paths) that are always excluded */
  exclude: z.array(z.string().min(1)).default([]),
  includeTree: z.boolean().default(true),
  maxLines: z.number().int().positive().default(DEFAULT_MAX_LINES),
  relatedKeepExtensions: z.array(extension).default([...DEFAULT_RELATED_KEEP_EXTENSIONS]),
  /** Drop an implicit leading `self` from Python signatures */
  stripSelf: z.boolean().default(false),
  /** Sort directory listings by name before visiting them */
  sort: z.boolean().default(false),
  ruleFileName: z.string().min(1).default(DEFAULT_RULE_FILE),
  task: z.string().default(''),
  template: ContextTemplateSchema.default({}),
}).strict();

export type AssemblyPolicy = z.infer<typeof AssemblyPolicySchema>;
export type AssemblyPolicyInput = z.input<typeof AssemblyPolicySchema>;

/**
 * Validate a policy and fill in defaults
 */
export function parsePolicy(input: unknown = {}): AssemblyPolicy {
  const result = AssemblyPolicySchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw createContextError('CTX_INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Read a JSON policy file without validating it; callers merge it first
 */
export function readPolicyFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw createContextError('CTX_INVALID_CONFIG', `Cannot read config file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createContextError('CTX_INVALID_CONFIG', `Config file ${filePath} is not valid JSON: ${errorMessage(error)}`, { filePath });
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw createContextError('CTX_INVALID_CONFIG', `Config file ${filePath} must contain a JSON object`, { filePath });
  }
  return { ...parsed };
}
