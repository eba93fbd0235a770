import type { Result } from 'neverthrow';

/**
 * Command handler interface.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
}

/**
 * First validation message from a failed zod parse.
 */
export function firstIssueMessage(error: { issues: readonly { message: string }[] }, fallback = 'Invalid arguments'): string {
  return error.issues[0]?.message ?? fallback;
}
