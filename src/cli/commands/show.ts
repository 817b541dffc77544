/**
 * Show command: print a persisted analysis.
 */

import type { Command } from 'commander';

import { createAnalysisContext } from '../context.js';
import { readPackageVersion } from '../version.js';
import { addStorageOption, addVerboseOption, printError, type CommonOptions } from '../options.js';
import { buildAnalysisReport, generateJsonReport, printSummary } from '../../reporting/index.js';

interface ShowOptions extends CommonOptions {
  json?: boolean;
  text?: boolean;
}

export function registerShowCommand(program: Command): void {
  const cmd = program
    .command('show')
    .description('Show a stored analysis')
    .argument('<analysisId>', 'Analysis id')
    .option('--json', 'Print the full JSON report')
    .option('--text', 'Print the plain-text summary');

  addStorageOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (analysisId: string, options: ShowOptions) => {
    await runShow(analysisId, options);
  });
}

async function runShow(analysisId: string, options: ShowOptions): Promise<void> {
  const { orchestrator } = await createAnalysisContext(options);
  const analysis = await orchestrator.getAnalysis(analysisId);

  if (!analysis) {
    printError(`Analysis not found: ${analysisId}`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(generateJsonReport(buildAnalysisReport(analysis, { version: readPackageVersion() })));
  } else if (options.text) {
    console.log(analysis.summary ?? `Analysis ${analysis.id} is ${analysis.status}; no summary was generated.`);
  } else {
    printSummary(analysis);
  }
}
