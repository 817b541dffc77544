/**
 * Score command: aggregate a saved list of rule matches into a threat
 * score and a MITRE ATT&CK mapping, without running the pipeline.
 */

import { readFile } from 'fs/promises';
import type { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

import { loadConfig } from '../../config.js';
import { AttackReferenceData } from '../../knowledge/mitre-attack/loader.js';
import { mapToMitre } from '../../mapping/mitre-mapper.js';
import { RuleMatchResultSchema } from '../../orchestration/serialization.js';
import { calculateThreatScore } from '../../scoring/threat-score.js';
import { setLogLevel } from '../../utils/logger.js';
import {
  addVerboseOption,
  printBanner,
  printInfo,
  resolveInputPath,
} from '../options.js';

interface ScoreOptions {
  reference?: string;
  json?: boolean;
  verbose?: boolean;
}

const MatchFileSchema = z.union([
  z.array(RuleMatchResultSchema),
  z.object({ ruleMatches: z.array(RuleMatchResultSchema) }).transform((doc) => doc.ruleMatches),
]);

export function registerScoreCommand(program: Command): void {
  const cmd = program
    .command('score')
    .description('Score a saved list of rule matches')
    .argument('<matchesFile>', 'JSON file: an array of rule matches or an analysis record')
    .option('--reference <file>', 'ATT&CK reference table (default: THREATLINE_REFERENCE_DATA or bundled)')
    .option('--json', 'Print the result as JSON');

  addVerboseOption(cmd);

  cmd.action(async (matchesFile: string, options: ScoreOptions) => {
    await runScore(matchesFile, options);
  });
}

async function runScore(matchesFile: string, options: ScoreOptions): Promise<void> {
  const config = loadConfig();
  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  const inputPath = resolveInputPath(matchesFile);
  const parsed = MatchFileSchema.safeParse(JSON.parse(await readFile(inputPath, 'utf-8')));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid rule match file ${inputPath}: ${issues}`);
  }

  const matches = parsed.data;
  const reference = await AttackReferenceData.load(options.reference ?? config.referenceDataPath);
  const { score, severity } = calculateThreatScore(matches);
  const mitre = mapToMitre(matches, reference);

  if (options.json) {
    console.log(JSON.stringify({ threatScore: score, severity, mitre }, null, 2));
    return;
  }

  printBanner('Score');
  printInfo(`Rule matches: ${matches.length}`);
  printInfo(`Threat score: ${chalk.bold(`${score}/100`)} (${severity.toUpperCase()})`);
  printInfo(`ATT&CK techniques: ${mitre.statistics.totalTechniques}  │  tactics: ${mitre.statistics.totalTactics}`);
  if (mitre.killChainPhases.length > 0) {
    printInfo(`Kill chain: ${mitre.killChainPhases.join(' → ')}`);
  }
  for (const technique of mitre.techniques) {
    console.log(
      `    ${chalk.bold(technique.id)} ${technique.name} ${chalk.gray(
        `(x${technique.matchCount}, confidence ${technique.confidence.toFixed(2)})`,
      )}`,
    );
  }
  printInfo(`Tactic-weighted score: ${mitre.statistics.overallThreatScore.toFixed(1)}/100`);
  console.log('');
}
