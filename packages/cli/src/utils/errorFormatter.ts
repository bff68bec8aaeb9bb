/**
 * Standardized error formatting for CLI commands.
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { FencelineError } from '@fenceline/core';

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('Input document not found: response.md', [
 *   'Run: fenceline extract path/to/response.md'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * Report a thrown value from a command action.
 * FencelineErrors carry their own suggestion; anything else is rethrown.
 */
export function exitWithFencelineError(err: unknown): never {
  if (err instanceof FencelineError) {
    exitWithError(err.message, err.suggestion ? [err.suggestion] : undefined);
  }
  throw err;
}
