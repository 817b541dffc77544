/**
 * Timeline builder.
 *
 * Turns parsed log events and rule-match details into one chronologically
 * ordered list of `TimelineEvent`s and computes its statistics.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LogEvent } from '../types/log-event.js';
import type { RuleMatchResult } from '../types/rule-match.js';
import type { TimelineEvent, TimelineResult, TimelineSeverity } from '../types/timeline.js';
import { throwIfCancelled } from '../orchestration/errors.js';
import { clampUnit } from '../scoring/threat-score.js';
import { calculateTimelineStatistics, timestampMs } from './statistics.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface BuildTimelineOptions {
  signal?: AbortSignal;
  /** Timestamp for rule matches that carry none. Default: the time of the call */
  now?: Date;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build a sorted timeline.  The result holds exactly one entry per log event
 * and one per match detail; entries with equal timestamps keep their
 * insertion order, log events first.
 *
 * Throws `AnalysisError('cancelled')` when `signal` aborts mid-build.
 */
export function buildTimeline(
  events: readonly LogEvent[],
  matches: readonly RuleMatchResult[],
  options: BuildTimelineOptions = {},
): TimelineResult {
  const now = (options.now ?? new Date()).toISOString();
  const timeline: TimelineEvent[] = [];

  for (const event of events) {
    throwIfCancelled(options.signal);
    timeline.push(fromLogEvent(event));
  }

  for (const match of matches) {
    throwIfCancelled(options.signal);
    timeline.push(...fromRuleMatch(match, now));
  }

  // Array.prototype.sort is stable, so ties keep insertion order.
  const sorted = timeline
    .map((event) => ({ event, ms: timestampMs(event.timestamp) ?? 0 }))
    .sort((a, b) => a.ms - b.ms)
    .map(({ event }) => event);

  return { events: sorted, statistics: calculateTimelineStatistics(sorted) };
}

export function severityFromLogLevel(level: string): TimelineSeverity {
  switch (level.trim().toUpperCase()) {
    case 'CRITICAL':
    case 'FATAL':
      return 'critical';
    case 'ERROR':
      return 'high';
    case 'WARNING':
    case 'WARN':
      return 'medium';
    case 'INFO':
      return 'low';
    default:
      return 'info';
  }
}

/** Timeline severity of a rule match; unrecognised labels become `info`. */
export function severityFromMatch(severity: string): TimelineSeverity {
  switch (severity.trim().toLowerCase()) {
    case 'critical':
      return 'critical';
    case 'high':
      return 'high';
    case 'medium':
      return 'medium';
    case 'low':
      return 'low';
    default:
      return 'info';
  }
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

function fromLogEvent(event: LogEvent): TimelineEvent {
  const level = event.level.trim().toLowerCase();
  return {
    id: uuidv4(),
    timestamp: event.timestamp,
    type: 'log_event',
    title: event.message,
    description: event.message,
    severity: severityFromLogLevel(event.level),
    source: event.source,
    category: 'log',
    fields: { ...event.fields },
    tags: level ? [level] : [],
    mitreAttackIds: [],
    confidence: 1,
    isAnomalous: false,
    lineNumber: event.lineNumber,
    rawData: event.raw,
  };
}

function fromRuleMatch(match: RuleMatchResult, now: string): TimelineEvent[] {
  const confidence = clampUnit(match.confidence);
  const tags = [match.ruleType, ...match.mitreAttackIds];

  return match.matches.map((detail): TimelineEvent => ({
    id: uuidv4(),
    timestamp: detail.timestamp ?? now,
    type: 'rule_match',
    title: `Rule Match: ${match.ruleName}`,
    description: detail.matchedContent,
    severity: severityFromMatch(match.severity),
    source: 'rule_engine',
    category: 'detection',
    fields: {
      rule_id: match.ruleId,
      rule_name: match.ruleName,
      rule_type: match.ruleType,
      confidence,
      context: detail.context,
    },
    tags: [...tags],
    mitreAttackIds: [...match.mitreAttackIds],
    confidence,
    isAnomalous: true,
    lineNumber: detail.lineNumber,
    rawData: detail.matchedContent,
  }));
}
