/**
 * Command-line program
 */

import { Command } from 'commander';
import { DEFAULT_MAX_LINES } from '@repo-context/core';
import { run as runGenerate } from './commands/generate.js';
import type { CommandContext, CommandFlags, CommandModule } from './types.js';

export interface ProgramOptions {
  run?: CommandModule['run'];
  /** Receives the command's exit code */
  onExit?: (code: number) => void;
}

export function createProgram(ctx: CommandContext, options: ProgramOptions = {}): Command {
  const run = options.run ?? runGenerate;

  return new Command('repo-context')
    .description('Assemble a repository into a single context document for a language model')
    .version('0.1.0')
    .argument('[root]', 'repository root', '.')
    .option('-o, --out <file>', 'write the document to a file instead of stdout')
    .option('-f, --files <names...>', 'only include these files, relative to the root')
    .option('-x, --exclude <names...>', 'names or root-relative paths to leave out')
    .option('--skip-related', 'drop files of nested repositories')
    .option('--include-ignored', 'include hidden and ignored files')
    .option('--no-tree', 'leave out the directory tree')
    .option('-t, --task <text>', 'task appended after the repository')
    .option('--strip-self', "drop a leading 'self' from Python signatures")
    .option('--sort', 'visit directory entries in name order')
    .option('--max-lines <n>', `lines kept from non-source files (default ${DEFAULT_MAX_LINES})`)
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--json', 'print a JSON summary')
    .option('-q, --quiet', 'only print errors and the token estimate')
    .option('-v, --verbose', 'debug logging')
    .action(async (root: string, flags: CommandFlags) => {
      const code = await run(ctx, [root], flags);
      options.onExit?.(code);
    });
}
