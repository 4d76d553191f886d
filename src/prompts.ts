import { input } from '@inquirer/prompts';
import { repoName } from './identity.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';

/**
 * Custom error class for user-initiated cancellation events.
 *
 * Thrown when the user presses Ctrl+C or ESC while a prompt is open.
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * What to sync: the remote to clone and the branch to bring it to.
 */
export type SyncSelection = {
  remote: string;
  branch: string;
};

export const DEFAULT_BRANCH = 'main';

/**
 * Fills in whatever the command line left out.
 *
 * Values already given are only trimmed; `Repository` validates them. Missing ones
 * are asked for when `interactive` is true; otherwise they are an error,
 * since nobody is there to answer.
 *
 * @throws {UserCancelledError} When the user cancels a prompt
 * @throws {Error} When a value is missing and prompting is not allowed
 */
export async function getSyncSelection(
  given: Partial<SyncSelection>,
  interactive: boolean
): Promise<SyncSelection> {
  try {
    const remote = given.remote ?? await ask(interactive, 'remote', {
      message: 'Remote repository to sync (URL or host:org/repo.git):',
      validate: validateRemoteAnswer
    });

    const branch = given.branch ?? await ask(interactive, 'branch', {
      message: `Branch to check out in ${repoName(remote.trim())}:`,
      default: DEFAULT_BRANCH,
      validate: validateBranchAnswer
    });

    return { remote: remote.trim(), branch: branch.trim() };
  } catch (error) {
    if (error instanceof Error) {
      if (error.name === 'ExitPromptError' || error.message.includes('User force closed')) {
        throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
      }
      throw error;
    }
    throw new Error('An unexpected error occurred during user interaction');
  }
}

async function ask(
  interactive: boolean,
  field: keyof SyncSelection,
  config: Parameters<typeof input>[0]
): Promise<string> {
  if (!interactive) {
    throw new Error(`Missing ${field}: pass it on the command line when not running interactively`);
  }
  return input(config);
}

function validateRemoteAnswer(value: string): string | boolean {
  const trimmed = value.trim();
  if (!trimmed) {
    return 'Remote cannot be empty';
  }
  try {
    SecurityValidator.validateRemote(trimmed, repoName(trimmed));
    return true;
  } catch (error) {
    return ErrorUtils.extractErrorMessage(error);
  }
}

function validateBranchAnswer(value: string): string | boolean {
  const trimmed = value.trim();
  if (!trimmed) {
    return 'Branch cannot be empty';
  }
  try {
    SecurityValidator.validateRef(trimmed);
    return true;
  } catch (error) {
    return ErrorUtils.extractErrorMessage(error);
  }
}
