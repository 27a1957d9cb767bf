/**
 * CLI command contract and process exit codes.
 */

/** Exit statuses set by the CLI. */
export const ExitCode = {
  /** Unexpected failure inside a command */
  Failure: 1,
  /** Unknown command or subcommand, or rejected input, config or scenario */
  Usage: 2,
  /** `config validate` found problems */
  InvalidConfig: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Arguments after the command name, flags included. */
export type CommandArgs = readonly string[];

export interface Command {
  name: string;
  /** One line shown by `trustflow --help` */
  description: string;
  /** Shown by `trustflow <command> --help` */
  usage: string;
  handler: (args: CommandArgs) => Promise<void>;
}
