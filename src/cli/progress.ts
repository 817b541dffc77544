/**
 * ProgressNotifier that drives an ora spinner.
 */

import chalk from 'chalk';
import type { Ora } from 'ora';

import type { AnalysisCompletedPayload } from '../types/analysis.js';
import type { ProgressNotifier } from '../types/collaborators.js';

export class SpinnerNotifier implements ProgressNotifier {
  constructor(private readonly spinner: Ora) {}

  progress(_analysisId: string, percent: number, message: string): void {
    this.spinner.text = `${chalk.gray(`[${String(percent).padStart(3)}%]`)} ${message}`;
  }

  completed(payload: AnalysisCompletedPayload): void {
    if (payload.status === 'completed') {
      this.spinner.succeed(
        chalk.green(
          `Analysis complete: ${payload.ruleMatchCount} rule match(es), threat score ${payload.threatScore}/100`,
        ),
      );
    } else {
      this.spinner.fail(chalk.red(`Analysis ${payload.status}`));
    }
  }
}
