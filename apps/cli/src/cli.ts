import { type CLIOptions, isCommand } from "./types.js";

export const HELP_TEXT = `
mydiff - Generate and apply binary diffs

Usage:
  mydiff create <old>... <new> [options]   Create one diff per old file
  mydiff update <file> <diff> [options]    Check and apply a diff to <file>
  mydiff verify <diff> [options]           Check a diff and print its summary

Options:
  -n, --name <name>        create: diff name (without .diff), once per old file
  -c, --chunk-size <n>     create: bytes per chunk pair (default: 1048576)
  -o, --output <path>      create: directory for the diffs; update: patched file
  -s, --source <file>      verify: also check the diff was built from <file>
  -h, --help               Show this help message

Environment:
  MYDIFF_CHUNK_SIZE        Default chunk size
  MYDIFF_LOG_LEVEL         trace, debug, info, warn, error, fatal or silent (default: warn)
  NO_COLOR                 Disable colored output

Examples:
  mydiff create v1.bin v2.bin
  mydiff create v1.bin v2.bin v3.bin --name from-v1 --name from-v2
  mydiff update v1.bin v1-v3.diff --output v3.bin
  mydiff verify v1-v3.diff --source v1.bin
`;

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    args: [],
    names: [],
    unknown: [],
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case "-n":
      case "--name":
        options.names.push(args[++i] ?? "");
        break;

      case "-c":
      case "--chunk-size":
        options.chunkSize = Number(args[++i] ?? Number.NaN);
        break;

      case "-o":
      case "--output":
        options.output = args[++i];
        break;

      case "-s":
      case "--source":
        options.source = args[++i];
        break;

      case "-h":
      case "--help":
        options.help = true;
        break;

      default:
        if (arg.startsWith("-") && arg !== "-") {
          options.unknown.push(arg);
        } else if (options.command === undefined) {
          options.command = arg;
        } else {
          options.args.push(arg);
        }
        break;
    }

    i++;
  }

  return options;
}

/**
 * Validate CLI options
 */
export function validateOptions(options: CLIOptions): string | null {
  if (options.help) {
    return null;
  }

  if (options.unknown.length > 0) {
    return `Unknown option: ${options.unknown[0]}`;
  }

  if (options.command === undefined) {
    return "No command specified. Use create, update or verify.";
  }

  if (!isCommand(options.command)) {
    return `Unknown command '${options.command}'`;
  }

  if (
    options.chunkSize !== undefined &&
    (!Number.isSafeInteger(options.chunkSize) || options.chunkSize < 1)
  ) {
    return "Chunk size must be a positive integer";
  }

  if (options.names.some((name) => name === "")) {
    return "--name needs a value";
  }

  switch (options.command) {
    case "create":
      if (options.args.length < 2) {
        return "create needs at least one old file and the new file";
      }
      break;
    case "update":
      if (options.args.length !== 2) {
        return "update needs the file to update and the diff";
      }
      break;
    case "verify":
      if (options.args.length !== 1) {
        return "verify needs exactly one diff";
      }
      break;
  }

  return null;
}
