/**
 * Shared CLI option helpers for Threatline commands.
 *
 * Provides reusable option registration functions, path resolution and
 * number parsing helpers, and the chalk-colored message printers used
 * across all commands.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export interface CommonOptions {
  storage?: string;
  verbose?: boolean;
}

/**
 * Add the --storage option (overrides THREATLINE_STORAGE_PATH).
 */
export function addStorageOption(cmd: Command): Command {
  return cmd.option('-s, --storage <dir>', 'Storage directory (default: THREATLINE_STORAGE_PATH or ./storage)');
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/**
 * Commander argument parser for non-negative integers.
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file/directory exists.
 * Prints a chalk-colored error and exits if not found.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(
      chalk.red(`Error: Input path does not exist: ${resolved}`),
    );
    process.exit(1);
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a command banner.
 */
export function printBanner(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  Threatline: ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

/**
 * Print an informational message.
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
