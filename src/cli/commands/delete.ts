/**
 * Delete command: remove a persisted analysis and its working directory.
 */

import type { Command } from 'commander';

import { createAnalysisContext } from '../context.js';
import {
  addStorageOption,
  addVerboseOption,
  printSuccess,
  printWarning,
  type CommonOptions,
} from '../options.js';

export function registerDeleteCommand(program: Command): void {
  const cmd = program
    .command('delete')
    .description('Delete a stored analysis')
    .argument('<analysisId>', 'Analysis id');

  addStorageOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (analysisId: string, options: CommonOptions) => {
    const { orchestrator } = await createAnalysisContext(options);
    if (await orchestrator.deleteAnalysis(analysisId)) {
      printSuccess(`Deleted analysis ${analysisId}`);
    } else {
      printWarning(`No stored analysis ${analysisId}`);
      process.exitCode = 1;
    }
  });
}
