import { createNodeFilesApi } from "@mydiff/utils-node/files";
import { HELP_TEXT, parseArgs, validateOptions } from "./cli.js";
import { createCommand } from "./commands/create.js";
import { updateCommand } from "./commands/update.js";
import { verifyCommand } from "./commands/verify.js";
import { CliError } from "./errors.js";
import { paint } from "./shared/colors.js";
import { type Config, getConfig } from "./shared/config.js";
import { getLog } from "./shared/logger.js";
import { type CliOutput, isCommand } from "./types.js";

export { HELP_TEXT, parseArgs, validateOptions } from "./cli.js";
export type { CLIOptions, CliOutput, Command } from "./types.js";

export interface RunOptions {
  /** Directory relative paths resolve against (default: `process.cwd()`) */
  cwd?: string;
  output?: CliOutput;
}

const processOutput: CliOutput = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Run one mydiff invocation.
 *
 * @param args Command line without the node and script paths
 * @returns Process exit code: 0 on success, 1 on any error
 */
export async function run(args: string[], options: RunOptions = {}): Promise<number> {
  const output = options.output ?? processOutput;
  const cliOptions = parseArgs(args);

  if (cliOptions.help) {
    output.out(HELP_TEXT);
    return 0;
  }

  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    // Only the environment can turn color off until the config loads.
    const message = error instanceof Error ? error.message : String(error);
    output.err(`${paint("ERROR", "red", !process.env.NO_COLOR)}: ${message}`);
    return 1;
  }
  const color = !config.NO_COLOR;
  const reportError = (message: string) =>
    output.err(`${paint("ERROR", "red", color)}: ${message}`);

  const validationError = validateOptions(cliOptions);
  if (validationError || cliOptions.command === undefined || !isCommand(cliOptions.command)) {
    reportError(validationError ?? "No command specified. Use create, update or verify.");
    output.err(HELP_TEXT);
    return 1;
  }

  const files = createNodeFilesApi({ rootDir: options.cwd ?? process.cwd() });
  const { args: positionals } = cliOptions;

  try {
    switch (cliOptions.command) {
      case "create":
        await createCommand(
          files,
          {
            oldFiles: positionals.slice(0, -1),
            newFile: positionals[positionals.length - 1],
            names: cliOptions.names,
            chunkSize: cliOptions.chunkSize ?? config.MYDIFF_CHUNK_SIZE,
            outputDir: cliOptions.output,
            color,
          },
          output,
        );
        break;
      case "update":
        await updateCommand(
          files,
          { file: positionals[0], diff: positionals[1], output: cliOptions.output, color },
          output,
        );
        break;
      case "verify":
        await verifyCommand(
          files,
          { diff: positionals[0], source: cliOptions.source, color },
          output,
        );
        break;
      default: {
        const _exhaustive: never = cliOptions.command;
        throw new CliError(`Unknown command '${String(_exhaustive)}'`);
      }
    }
  } catch (error) {
    if (!(error instanceof CliError)) {
      getLog(import.meta).debug({ err: error }, "Command failed");
    }
    reportError(error instanceof Error ? error.message : String(error));
    return 1;
  }
  return 0;
}
