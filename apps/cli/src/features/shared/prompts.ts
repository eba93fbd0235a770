import { readKeystroke, type KeystrokeInput } from './keystroke.js';

export interface PromptOutput {
  write(text: string): unknown;
}

/**
 * Ask a yes/no question answered by a single keystroke.
 *
 * Only `y` or `Y` confirms. Any other key, Ctrl-C included, declines.
 */
export async function promptKeystrokeConfirm(
  message: string,
  output: PromptOutput = process.stdout,
  input: KeystrokeInput = process.stdin
): Promise<boolean> {
  output.write(`${message} `);
  const key = await readKeystroke(input);
  output.write('\n');
  return key === 'y' || key === 'Y';
}
