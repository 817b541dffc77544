/**
 * Analyze command: run the full analysis pipeline over an upload.
 *
 * Progress is shown on a spinner; Ctrl-C cancels the run, which is then
 * persisted as cancelled.  Exits with code 1 unless the run completed.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { readPackageVersion } from '../version.js';
import { createAnalysisContext } from '../context.js';
import { SpinnerNotifier } from '../progress.js';
import {
  addStorageOption,
  addVerboseOption,
  parseNonNegativeInt,
  printBanner,
  printError,
  printInfo,
  printSuccess,
  type CommonOptions,
} from '../options.js';
import type { AnalysisOutcome } from '../../orchestration/orchestrator.js';
import { buildAnalysisReport, printSummary, writeAnalysisReport } from '../../reporting/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface AnalyzeOptions extends CommonOptions {
  rules?: string;
  parser?: string;
  mitre: boolean;
  timeline: boolean;
  iocs: boolean;
  maxEvents?: number;
  timeout?: number;
  report?: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerAnalyzeCommand(program: Command): void {
  const cmd = program
    .command('analyze')
    .description('Analyze an uploaded evidence file')
    .argument('<uploadId>', 'Upload id printed by "threatline ingest"')
    .option('-r, --rules <path>', 'Rule pack file or directory (default: THREATLINE_RULES_PATH or bundled rules)')
    .option('-p, --parser <id>', 'Preferred parser id')
    .option('--no-mitre', 'Skip MITRE ATT&CK mapping')
    .option('--no-timeline', 'Skip timeline construction')
    .option('--no-iocs', 'Skip indicator of compromise extraction')
    .option('--max-events <n>', 'Keep at most this many parsed events (0 = no limit)', parseNonNegativeInt)
    .option('--timeout <minutes>', 'Fail the run after this many minutes (0 = no limit)', parseNonNegativeInt)
    .option('--report <file>', 'Write a JSON report to this path');

  addStorageOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (uploadId: string, options: AnalyzeOptions) => {
    await runAnalyze(uploadId, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runAnalyze(uploadId: string, options: AnalyzeOptions): Promise<void> {
  printBanner('Analyze');

  const spinner = ora('Loading rules and reference data...').start();
  const { orchestrator, ruleEngine, config } = await createAnalysisContext(
    options,
    new SpinnerNotifier(spinner),
  );
  spinner.text = `Loaded ${ruleEngine.ruleCount} rules`;

  const controller = new AbortController();
  const onInterrupt = (): void => {
    spinner.text = chalk.yellow('Cancelling...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let outcome: AnalysisOutcome;
  try {
    outcome = await orchestrator.analyze(uploadId, {
      preferredParserId: options.parser,
      mapToMitre: options.mitre,
      generateTimeline: options.timeline,
      extractIocs: options.iocs,
      maxEvents: options.maxEvents ?? config.analysis.maxEvents,
      timeoutMinutes: options.timeout ?? config.analysis.timeoutMinutes,
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  if (spinner.isSpinning) {
    if (outcome.ok) {
      spinner.succeed(chalk.green('Analysis complete'));
    } else if (outcome.error.kind === 'cancelled') {
      spinner.warn(chalk.yellow('Analysis cancelled'));
    } else {
      spinner.fail(chalk.red(`Analysis failed (${outcome.error.kind})`));
    }
  }

  if (!outcome.analysis) {
    printError(outcome.ok ? 'Analysis produced no record' : outcome.error.message);
    process.exitCode = 1;
    return;
  }

  console.log('');
  printSummary(outcome.analysis);
  console.log('');
  printInfo(`Analysis id: ${outcome.analysis.id}`);

  if (options.report) {
    const reportPath = resolve(options.report);
    const report = buildAnalysisReport(outcome.analysis, { version: readPackageVersion() });
    writeAnalysisReport(report, reportPath);
    printSuccess(`Report written to ${reportPath}`);
  }
  console.log('');

  if (!outcome.ok) {
    printError(outcome.error.message);
    process.exitCode = 1;
  }
}
