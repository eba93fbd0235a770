import type { Command } from 'commander';

import { firstIssueMessage } from '../shared/command-execution.js';
import { withExpenseRepository } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { promptKeystrokeConfirm } from '../shared/prompts.js';
import { ClearCommandSchema } from '../shared/schemas.js';

import { ClearHandler } from './clear-handler.js';

export const CLEAR_PROMPT = 'This will remove all expenses. Are you sure? (y/n)';

/**
 * Register the clear command.
 */
export function registerClearCommand(program: Command): void {
  program
    .command('clear')
    .description('delete all expenses')
    .option('--confirm', 'Skip confirmation prompt')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeClearCommand(rawOptions);
    });
}

/**
 * Execute the clear command.
 *
 * Asks for a single keystroke first unless --confirm is given. Any answer
 * other than y/Y leaves the table untouched and exits quietly.
 */
export async function executeClearCommand(rawOptions: unknown): Promise<void> {
  // Validate options at CLI boundary with Zod
  const validationResult = ClearCommandSchema.safeParse({ options: rawOptions });
  if (!validationResult.success) {
    const output = new OutputManager('text');
    output.error('clear', new Error(firstIssueMessage(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { options } = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  if (!options.confirm) {
    // Keep stdout a single JSON document in JSON mode
    const promptOutput = output.isJsonMode() ? process.stderr : process.stdout;
    const confirmed = await promptKeystrokeConfirm(CLEAR_PROMPT, promptOutput);
    if (!confirmed) {
      output.json('clear', { deleted: 0, cancelled: true });
      return;
    }
  }

  const result = await withExpenseRepository((repo) => new ClearHandler(repo).execute());
  if (result.isErr()) {
    output.error('clear', result.error, ExitCodes.DATABASE_ERROR);
    return;
  }

  output.json('clear', { deleted: result.value.deleted, cancelled: false });
  output.lines(['All expenses have been deleted.']);
}
