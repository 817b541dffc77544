/**
 * Threat score aggregation over rule matches.
 *
 * Each match contributes its severity's base score weighted by how many
 * times it fired and how confident the rule engine was; the total is the
 * match-count-weighted mean, truncated to an integer in [0, 100].
 */

import type { FieldValue } from '../types/log-event.js';
import type { MatchDetail, MetadataValue, RuleMatchResult, Severity } from '../types/rule-match.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SEVERITY_BASE_SCORES: Readonly<Record<Severity, number>> = {
  critical: 100,
  high: 75,
  medium: 50,
  low: 25,
};

/** Base score for a severity the table does not know. */
export const UNKNOWN_SEVERITY_SCORE = 10;

/** Lower bounds of each severity label, highest first. */
const SEVERITY_THRESHOLDS: ReadonlyArray<[number, Severity]> = [
  [80, 'critical'],
  [60, 'high'],
  [30, 'medium'],
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface ThreatScore {
  score: number;
  severity: Severity;
}

export function severityBaseScore(severity: string): number {
  switch (severity.toLowerCase()) {
    case 'critical':
      return SEVERITY_BASE_SCORES.critical;
    case 'high':
      return SEVERITY_BASE_SCORES.high;
    case 'medium':
      return SEVERITY_BASE_SCORES.medium;
    case 'low':
      return SEVERITY_BASE_SCORES.low;
    default:
      return UNKNOWN_SEVERITY_SCORE;
  }
}

export function severityFromScore(score: number): Severity {
  for (const [threshold, severity] of SEVERITY_THRESHOLDS) {
    if (score >= threshold) return severity;
  }
  return 'low';
}

/**
 * Aggregate rule matches into a 0-100 score and its severity label.
 * Never throws; an empty list scores 0 / "low".
 */
export function calculateThreatScore(matches: readonly RuleMatchResult[]): ThreatScore {
  let weighted = 0;
  let totalMatches = 0;

  for (const match of matches) {
    const count = normalizeMatchCount(match.matchCount);
    weighted += severityBaseScore(match.severity) * count * clampUnit(match.confidence);
    totalMatches += count;
  }

  const score = clampScore(Math.trunc(weighted / Math.max(1, totalMatches)));
  return { score, severity: severityFromScore(score) };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Clamp a confidence-like value into [0, 1]; NaN becomes 0. */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Clamp a score into [0, 100]; NaN becomes 0. */
export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function normalizeMatchCount(count: number): number {
  return Number.isFinite(count) && count >= 1 ? Math.floor(count) : 1;
}

/**
 * Copy of a rule match with every number in range and finite, so that the
 * match survives a JSON round trip unchanged.  Non-finite numeric metadata
 * is dropped.
 */
export function normalizeRuleMatch(match: RuleMatchResult): RuleMatchResult {
  const metadata: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(match.metadata)) {
    if (value.kind === 'number' && !Number.isFinite(value.value)) continue;
    metadata[key] = value;
  }

  return {
    ...match,
    matchCount: normalizeMatchCount(match.matchCount),
    confidence: clampUnit(match.confidence),
    matches: match.matches.map(normalizeDetail),
    mitreAttackIds: [...match.mitreAttackIds],
    metadata,
  };
}

function normalizeDetail(detail: MatchDetail): MatchDetail {
  return {
    ...detail,
    offset: finiteOrNull(detail.offset),
    lineNumber: finiteOrNull(detail.lineNumber),
    fields: normalizeFields(detail.fields),
    confidence: clampUnit(detail.confidence),
  };
}

function normalizeFields(fields: Record<string, FieldValue>): Record<string, FieldValue> {
  const result: Record<string, FieldValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = typeof value === 'number' ? finiteOrNull(value) : value;
  }
  return result;
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}
