/**
 * Plain-text summary and per-analysis statistics, produced once every
 * analysis phase has run.
 */

import type { Analysis, AnalysisStatistics } from '../types/analysis.js';
import type { Ioc, IocType } from '../types/ioc.js';
import type { LogEvent } from '../types/log-event.js';
import type { RuleMatchResult, Severity } from '../types/rule-match.js';
import { emptyStatistics } from './lifecycle.js';

const SUMMARY_SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

/** IOC breakdown lines of the summary, in print order. */
const IOC_GROUPS: ReadonlyArray<[label: string, types: readonly IocType[]]> = [
  ['IP addresses', ['ipv4']],
  ['domains', ['domain']],
  ['file hashes', ['md5', 'sha1', 'sha256']],
  ['URLs', ['url']],
  ['email addresses', ['email']],
  ['file paths', ['filepath_windows', 'filepath_linux']],
  ['registry keys', ['registry_key']],
  ['CVE IDs', ['cve']],
];

export function buildStatistics(
  events: readonly LogEvent[],
  matches: readonly RuleMatchResult[],
): AnalysisStatistics {
  const stats = emptyStatistics();
  stats.totalEvents = events.length;
  stats.totalRuleMatches = matches.length;

  for (const event of events) {
    const level = event.level.trim().toUpperCase() || 'UNKNOWN';
    stats.eventsByLevel[level] = (stats.eventsByLevel[level] ?? 0) + 1;
  }

  for (const match of matches) {
    stats.matchesByRuleType[match.ruleType] = (stats.matchesByRuleType[match.ruleType] ?? 0) + 1;
    switch (match.severity) {
      case 'critical':
        stats.criticalFindings += 1;
        break;
      case 'high':
        stats.highFindings += 1;
        break;
      case 'medium':
        stats.mediumFindings += 1;
        break;
      case 'low':
        stats.lowFindings += 1;
        break;
    }
  }

  return stats;
}

export function buildSummary(
  analysis: Analysis,
  events: readonly LogEvent[],
  matches: readonly RuleMatchResult[],
): string {
  const lines: string[] = [
    `Analysis of ${analysis.fileName} completed.`,
    `File size: ${analysis.fileSize} bytes`,
    `File hash: ${analysis.fileHash}`,
    '',
    `Parsed ${events.length} events.`,
  ];

  if (matches.length > 0) {
    lines.push(`Found ${matches.length} rule matches:`);
    for (const severity of SUMMARY_SEVERITIES) {
      const count = matches.filter((m) => m.severity === severity).length;
      if (count > 0) lines.push(`- ${count} ${severity} severity matches`);
    }
  } else {
    lines.push('No rule matches found.');
  }

  if (analysis.iocs) lines.push(...iocSummary(analysis.iocs));

  if (analysis.mitre && analysis.mitre.techniques.length > 0) {
    lines.push(
      `Mapped ${analysis.mitre.statistics.totalTechniques} MITRE ATT&CK techniques across ${analysis.mitre.statistics.totalTactics} tactics.`,
    );
  }

  lines.push('', `Threat score: ${analysis.threatScore}/100`, `Severity: ${analysis.severity.toUpperCase()}`);
  return lines.join('\n');
}

function iocSummary(iocs: readonly Ioc[]): string[] {
  if (iocs.length === 0) return ['No indicators of compromise found.'];

  const lines = [`Extracted ${iocs.length} indicators of compromise (IOCs).`];
  for (const [label, types] of IOC_GROUPS) {
    const count = iocs.filter((ioc) => types.includes(ioc.type)).length;
    if (count > 0) lines.push(`- ${count} ${label}`);
  }
  return lines;
}
