import chalk from 'chalk';
import { ConnectionError, TimeoutError, isDriverError } from '../../errors.js';

export const EXIT_FAILURE = 1;
export const EXIT_TIMEOUT = 2;

export function exitCodeFor(error: unknown): number {
  return error instanceof TimeoutError ? EXIT_TIMEOUT : EXIT_FAILURE;
}

export function reportCliError(error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ ${message}`));
  if (error instanceof ConnectionError && (error.reason === 'missing' || error.reason === 'unreachable')) {
    console.error(chalk.gray('   Is Ghostty running with its control socket enabled? Pass --socket to point at another path.'));
  } else if (!isDriverError(error) && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  return exitCodeFor(error);
}

/**
 * Run a command handler, turning failures into a message and an exit code
 * instead of an unhandled rejection.
 */
export async function runCliCommand(command: () => Promise<void>): Promise<void> {
  try {
    await command();
  } catch (error) {
    process.exitCode = reportCliError(error);
  }
}
