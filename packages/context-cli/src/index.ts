/**
 * @repo-context/cli
 */

export { createProgram, type ProgramOptions } from './cli/index.js';
export { createConsolePresenter } from './cli/presenter.js';
export { run as runGenerate } from './cli/commands/generate.js';
export * from './cli/schemas.js';
export type { CommandContext, CommandFlags, CommandModule, Presenter } from './cli/types.js';
