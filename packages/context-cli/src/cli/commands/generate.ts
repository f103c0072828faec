/**
 * Generate context command
 */

import path from 'node:path';
import fs from 'fs-extra';
import {
  ContextError,
  createContextError,
  errorMessage,
  getExitCode,
  getLogger,
  parsePolicy,
  readPolicyFile,
  setLogLevel,
  wrapError,
} from '@repo-context/core';
import { assembleContext } from '@repo-context/pack';
import { GenerateInputSchema, GenerateOutputSchema, type GenerateInput } from '../schemas.js';
import type { CommandContext, CommandModule } from '../types.js';

const logger = getLogger('repo-context:cli:generate');

/**
 * Policy keys given on the command line; absent flags leave the config file's value
 */
function policyFromFlags(input: GenerateInput): Record<string, unknown> {
  const policy: Record<string, unknown> = {};
  if (input.files !== undefined) policy.files = input.files;
  if (input.exclude !== undefined) policy.exclude = input.exclude;
  if (input.skipRelated !== undefined) policy.skipRelated = input.skipRelated;
  if (input.includeIgnored !== undefined) policy.includeIgnored = input.includeIgnored;
  if (input.tree === false) policy.includeTree = false;
  if (input.task !== undefined) policy.task = input.task;
  if (input.stripSelf !== undefined) policy.stripSelf = input.stripSelf;
  if (input.sort !== undefined) policy.sort = input.sort;
  if (input.maxLines !== undefined) policy.maxLines = input.maxLines;
  return policy;
}

function report(ctx: CommandContext, error: ContextError, jsonMode: boolean, quiet: boolean): number {
  if (jsonMode) {
    ctx.presenter.json({ ok: false, code: error.code, message: error.message, hint: error.hint });
  } else {
    ctx.presenter.error(error.message);
    if (!quiet && error.hint) {
      ctx.presenter.info(error.hint);
    }
  }
  return getExitCode(error);
}

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const jsonMode = flags.json === true;
  const quiet = flags.quiet === true;

  const parsed = GenerateInputSchema.safeParse(flags);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return report(ctx, createContextError('CTX_BAD_FLAGS', `Invalid flags: ${issues.join('; ')}`, { issues }), jsonMode, quiet);
  }
  const input = parsed.data;

  if (input.verbose) {
    setLogLevel('debug');
  } else if (input.quiet || input.json) {
    setLogLevel('error');
  }

  const root = path.resolve(ctx.cwd, argv[0] ?? '.');
  const outFile = input.out ? path.resolve(ctx.cwd, input.out) : undefined;

  try {
    const fromFile = input.config ? readPolicyFile(path.resolve(ctx.cwd, input.config)) : {};
    const policy = parsePolicy({ ...fromFile, ...policyFromFlags(input) });

    const result = assembleContext(root, policy);

    if (outFile) {
      try {
        await fs.outputFile(outFile, result.text, 'utf8');
      } catch (writeError) {
        throw createContextError('CTX_WRITE_ERROR', `Cannot write context to ${outFile}: ${errorMessage(writeError)}`, {
          outFile,
        });
      }
      logger.debug('Context written', { outFile, bytes: Buffer.byteLength(result.text) });
    }

    // JSON mode keeps stdout to a single document; without --out the text rides inside it
    if (input.json) {
      const output = GenerateOutputSchema.parse({
        ok: true,
        root,
        ...(outFile ? { out: outFile } : { text: result.text }),
        tokenCount: result.tokenCount,
        files: result.files.length,
        warnings: result.warnings,
      });
      ctx.presenter.json(output);
      return 0;
    }

    if (!outFile) {
      ctx.presenter.write(result.text);
    }

    if (outFile && !quiet) {
      ctx.presenter.info(`✓ Context saved: ${outFile}`);
    }
    if (result.warnings.length > 0 && !quiet) {
      ctx.presenter.info(`${result.warnings.length} file(s) could not be read`);
    }
    ctx.presenter.info(`Total tokens: ${result.tokenCount}`);
    return 0;
  } catch (error) {
    return report(ctx, wrapError(error), jsonMode, quiet);
  }
};
