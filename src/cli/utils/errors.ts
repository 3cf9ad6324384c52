/**
 * Exit codes and error reporting for the item-store CLI.
 * @module cli/utils/errors
 */

/**
 * Process exit codes, one per failure class.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  /** Flags or configuration files failed validation */
  CONFIG_ERROR: 2,
  /** The HTTP server could not bind or stop */
  SERVER_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Error that ends the CLI with a specific exit code and an optional hint line.
 */
export class CLIError extends Error {
  readonly code: ExitCode;
  readonly hint: string | undefined;

  constructor(
    message: string,
    code: ExitCode = ExitCode.GENERAL_ERROR,
    hint?: string,
  ) {
    super(message);
    this.name = "CLIError";
    this.code = code;
    this.hint = hint;
  }
}

// ============================================
// Server Start Failures
// ============================================

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Turn a failed server start into a CLIError, with a hint for the
 * socket errors `listen()` reports.
 *
 * @param address - "host:port" the server tried to bind
 */
export function serverStartError(error: unknown, address: string): CLIError {
  const reason = error instanceof Error ? error.message : String(error);
  const message = `Cannot start server: ${reason}`;

  switch (isErrnoException(error) ? error.code : undefined) {
    case "EADDRINUSE":
      return new CLIError(
        message,
        ExitCode.SERVER_ERROR,
        `Stop the process using ${address} or pass --port`,
      );
    case "EACCES":
      return new CLIError(
        message,
        ExitCode.SERVER_ERROR,
        `Binding ${address} needs more privileges; pick a port above 1023`,
      );
    case "EADDRNOTAVAIL":
    case "ENOTFOUND":
      return new CLIError(
        message,
        ExitCode.SERVER_ERROR,
        `The host in ${address} is not an address of this machine; check --host`,
      );
    default:
      return new CLIError(message, ExitCode.SERVER_ERROR);
  }
}

// ============================================
// Reporting
// ============================================

/**
 * Lines written to stderr for an error.
 */
export function formatError(error: CLIError, json = false): string[] {
  if (json) {
    return [JSON.stringify({ error: error.message, code: error.code, hint: error.hint })];
  }
  return error.hint
    ? [`Error: ${error.message}`, `Hint: ${error.hint}`]
    : [`Error: ${error.message}`];
}

/**
 * Report an error on stderr and exit with its code. Anything that is not
 * a CLIError exits with GENERAL_ERROR.
 */
export function handleError(
  error: unknown,
  options: { json?: boolean } = {},
): never {
  const cliError =
    error instanceof CLIError
      ? error
      : new CLIError(error instanceof Error ? error.message : String(error));

  for (const line of formatError(cliError, options.json)) {
    console.error(line);
  }

  process.exit(cliError.code);
}
