import password from '@inquirer/password';

// -- Types ---

export interface SecretPromptOptions {
  /** Accept an empty value, as `lb set KEY ""` does. Defaults to false. */
  readonly allowEmpty?: boolean;
}

/**
 * Error when user cancels the prompt (Ctrl+C / ESC).
 */
export class PromptCancelledError extends Error {
  override readonly name = 'PromptCancelledError' as const;

  constructor() {
    super('secret prompt cancelled by user');
  }
}

// -- Public API ---

/**
 * Read a secret value with masked input, so it stays out of shell history.
 *
 * @throws PromptCancelledError if user cancels (Ctrl+C)
 */
export async function promptForSecret(
  key: string,
  options: SecretPromptOptions = {},
): Promise<string> {
  const allowEmpty = options.allowEmpty ?? false;

  try {
    return await password({
      message: `Value for ${key}:`,
      mask: '*',
      validate: (value: string) => (allowEmpty || value.length > 0 ? true : 'Value must not be empty'),
    });
  } catch (error: unknown) {
    // @inquirer/password throws ExitPromptError on Ctrl+C
    if (error instanceof Error && error.name === 'ExitPromptError') {
      throw new PromptCancelledError();
    }
    throw error;
  }
}
