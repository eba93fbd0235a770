/**
 * The parts of process.stdin used to read a single key.
 */
export interface KeystrokeInput {
  isTTY?: boolean | undefined;
  isRaw?: boolean | undefined;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Read one keystroke without waiting for Enter.
 *
 * On a terminal the input is switched to raw mode for the read and put
 * back to its previous mode afterwards, whether the read succeeds or not.
 * Piped input is read as-is and its first character is taken. End of input
 * resolves to an empty string.
 */
export async function readKeystroke(input: KeystrokeInput = process.stdin): Promise<string> {
  const useRawMode = input.isTTY === true && input.setRawMode !== undefined;
  const wasRaw = input.isRaw === true;

  if (useRawMode) {
    input.setRawMode?.(true);
  }

  try {
    return await new Promise<string>((resolve, reject) => {
      const cleanup = (): void => {
        input.off('data', onData);
        input.off('end', onEnd);
        input.off('error', onError);
      };
      const onData = (chunk: Buffer | string): void => {
        cleanup();
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        resolve(Array.from(text)[0] ?? '');
      };
      const onEnd = (): void => {
        cleanup();
        resolve('');
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };

      input.on('data', onData);
      input.on('end', onEnd);
      input.on('error', onError);
      input.resume();
    });
  } finally {
    if (useRawMode) {
      input.setRawMode?.(wasRaw);
    }
    input.pause();
  }
}
