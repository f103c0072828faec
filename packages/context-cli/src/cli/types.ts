/**
 * CLI command module type definition
 */

/**
 * Output sink for commands: `write` carries the document, the rest is
 * operator feedback
 */
export interface Presenter {
  write(text: string): void;
  info(message: string): void;
  error(message: string): void;
  json(data: unknown): void;
}

export interface CommandContext {
  cwd: string;
  presenter: Presenter;
}

export type CommandFlags = Record<string, unknown>;

export type CommandModule = {
  run: (ctx: CommandContext, argv: string[], flags: CommandFlags) => Promise<number>;
};
