/**
 * A problem with the command line or its input files, reported without a
 * stack trace.
 */
export class CliError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CliError";
  }
}
