/**
 * Terminal summary table renderer.
 *
 * Produces a formatted, colorized terminal summary of an analysis using
 * box-drawing characters and chalk colors. Designed to be printed directly
 * to stdout once a run has finished.
 */

import chalk from 'chalk';

import type { Analysis } from '../types/analysis.js';
import type { Severity } from '../types/rule-match.js';
import { processingTimeMs } from './json-reporter.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 60;

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.green,
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format an analysis into a colorized terminal table string.
 */
export function formatSummaryTable(analysis: Analysis): string {
  const lines: string[] = [];
  const separator = chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine('Threatline Analysis Summary', true));
  lines.push(separator);

  lines.push(formatLine(`File: ${analysis.fileName || '(unknown)'}`));
  lines.push(formatLine(`Type: ${analysis.fileType || '-'}  │  Size: ${formatNumber(analysis.fileSize)} bytes`));
  lines.push(formatLine(`SHA-256: ${analysis.fileHash.slice(0, 16) || '-'}${analysis.fileHash ? '…' : ''}`));
  lines.push(formatLineRaw(`Status: ${colorizeStatus(analysis.status)}`));
  const elapsed = processingTimeMs(analysis);
  if (elapsed !== null) {
    lines.push(formatLine(`Processing Time: ${formatDuration(elapsed)}`));
  }
  if (analysis.errorMessage && analysis.status !== 'completed') {
    lines.push(formatLineRaw(chalk.red(fit(`Error: ${analysis.errorMessage}`))));
  }

  lines.push(separator);
  lines.push(formatSectionHeader('FINDINGS'));
  const stats = analysis.statistics;
  lines.push(formatLine(`  Events: ${formatNumber(stats.totalEvents)}  │  Rule matches: ${formatNumber(analysis.ruleMatches.length)}`));
  lines.push(
    formatLine(
      `  Critical: ${stats.criticalFindings}  High: ${stats.highFindings}  Medium: ${stats.mediumFindings}  Low: ${stats.lowFindings}`,
    ),
  );

  if (analysis.iocs && analysis.iocs.length > 0) {
    lines.push(separator);
    lines.push(formatSectionHeader('INDICATORS'));
    lines.push(formatLine(`  Total: ${formatNumber(analysis.iocs.length)}`));
    const byType = new Map<string, number>();
    for (const ioc of analysis.iocs) byType.set(ioc.type, (byType.get(ioc.type) ?? 0) + 1);
    lines.push(formatLine(`  ${[...byType].map(([type, count]) => `${type}: ${count}`).join('  ')}`));
  }

  if (analysis.mitre) {
    lines.push(separator);
    lines.push(formatSectionHeader('MITRE ATT&CK'));
    lines.push(
      formatLine(
        `  Techniques: ${analysis.mitre.statistics.totalTechniques}  │  Tactics: ${analysis.mitre.statistics.totalTactics}`,
      ),
    );
    if (analysis.mitre.killChainPhases.length > 0) {
      lines.push(formatLine(`  Kill chain: ${analysis.mitre.killChainPhases.join(' → ')}`));
    }
    if (analysis.mitre.statistics.mostCommonTechniques.length > 0) {
      lines.push(formatLine(`  Top: ${analysis.mitre.statistics.mostCommonTechniques.join(', ')}`));
    }
  }

  if (analysis.timelineStatistics && analysis.timelineStatistics.totalEvents > 0) {
    const timeline = analysis.timelineStatistics;
    lines.push(separator);
    lines.push(formatSectionHeader('TIMELINE'));
    lines.push(formatLine(`  Entries: ${formatNumber(timeline.totalEvents)}  │  Anomalous: ${formatNumber(timeline.anomalousEvents)}`));
    if (timeline.firstEvent && timeline.lastEvent) {
      lines.push(formatLine(`  From: ${timeline.firstEvent}`));
      lines.push(formatLine(`  To:   ${timeline.lastEvent}`));
    }
  }

  lines.push(separator);
  const score = `${analysis.threatScore}/100 (${analysis.severity.toUpperCase()})`;
  lines.push(formatLineRaw(`${chalk.bold('Threat Score:')} ${SEVERITY_COLORS[analysis.severity](score)}`));

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));

  return lines.join('\n');
}

/**
 * Print the formatted summary table to stdout.
 */
export function printSummary(analysis: Analysis): void {
  console.log(formatSummaryTable(analysis));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

/**
 * Format a line of text padded within the box borders.
 * Text is left-aligned with padding to fill the box width.
 */
function formatLine(text: string): string {
  const padded = fit(text).padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments.
 *
 * Since chalk adds invisible ANSI escape codes, we cannot rely on
 * `.length` for padding. Instead, we compute padding from the
 * "visible" (strip-ANSI) length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

function colorizeStatus(status: Analysis['status']): string {
  switch (status) {
    case 'completed':
      return chalk.green(status);
    case 'failed':
      return chalk.red(status);
    case 'cancelled':
      return chalk.yellow(status);
    default:
      return chalk.gray(status);
  }
}

/** Truncate plain text to the box interior. */
function fit(text: string): string {
  const max = BOX_WIDTH - 2;
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Strip ANSI escape codes from a string to get its visible length.
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
