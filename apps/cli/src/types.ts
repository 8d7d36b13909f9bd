export const COMMANDS = ["create", "update", "verify"] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * Parsed command line
 */
export interface CLIOptions {
  /** First positional argument */
  command?: string;
  /** Remaining positional arguments */
  args: string[];
  /** `create`: output names for the diffs, one per old file */
  names: string[];
  /** `create`: bytes per chunk pair */
  chunkSize?: number;
  /** `create`: directory for the diffs; `update`: patched file path */
  output?: string;
  /** `verify`: file to check the diff's provenance against */
  source?: string;
  /** Flags that were not recognized */
  unknown: string[];
  help: boolean;
}

/**
 * Where commands print. Defaults to the process streams.
 */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}
