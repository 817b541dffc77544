#!/usr/bin/env node

/**
 * Threatline CLI: evidence analysis, threat scoring and ATT&CK mapping
 *
 * Usage:
 *   threatline ingest ./evidence/auth.jsonl
 *   threatline analyze <uploadId> --report ./report.json
 *   threatline show <analysisId>
 *   threatline delete <analysisId>
 *   threatline score ./matches.json
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import { registerIngestCommand } from './commands/ingest.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerShowCommand } from './commands/show.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerScoreCommand } from './commands/score.js';
import { readPackageVersion } from './version.js';

const program = new Command();

program
  .name('threatline')
  .description('Threat scoring, MITRE ATT&CK mapping and timelines for evidence files')
  .version(readPackageVersion());

// Register all commands
registerIngestCommand(program);
registerAnalyzeCommand(program);
registerShowCommand(program);
registerDeleteCommand(program);
registerScoreCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected, not an error
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "threatline --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
