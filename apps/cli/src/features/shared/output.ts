import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

export const DASH_ARGUMENT_TIP = 'Put -- before a memo or query that starts with a dash.';

const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: `Run spendlog help for usage information. ${DASH_ARGUMENT_TIP}`,
  DATABASE_ERROR: 'Check the DB_* (or PG*) connection settings and that the amount or id is a valid number.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 *
 * Text output is written line by line to stdout. JSON output is a single
 * CLIResponse envelope on stdout, so errors in JSON mode go to stdout too.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Print lines of text output (only in text mode).
   */
  lines(lines: readonly string[]): void {
    if (this.isTextMode()) {
      for (const line of lines) {
        console.log(line);
      }
    }
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.isJsonMode()) {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, {
        duration_ms,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.isJsonMode()) {
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      process.stderr.write(`${pc.red('✗')} Error: ${error.message}\n`);

      const tip = ERROR_TIPS[errorCode];
      if (tip) {
        process.stderr.write(`${pc.dim(tip)}\n`);
      }

      if (process.env['NODE_ENV'] === 'development' && error.stack) {
        process.stderr.write(`\n${pc.dim(error.stack)}\n`);
      }
    }

    exitWithCode(exitCode);
  }
}
