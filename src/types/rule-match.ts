/**
 * Rule engine output types.
 */

import type { FieldValue } from './log-event.js';

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type RuleType = 'sigma' | 'yara' | 'stix' | 'pattern' | 'custom';

/**
 * Closed tagged value used for rule metadata, so that every consumer can
 * switch over `kind` exhaustively.
 */
export type MetadataValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'timestamp'; value: string };

export interface MatchDetail {
  matchedContent: string;
  offset: number | null;         // byte offset into the raw artifact
  lineNumber: number | null;
  context: string;
  fields: Record<string, FieldValue>;
  timestamp: string | null;
  confidence: number;            // 0..1
}

export interface RuleMatchResult {
  ruleId: string;
  ruleName: string;
  ruleType: RuleType;
  severity: Severity;
  matchCount: number;            // >= 1
  confidence: number;            // 0..1
  matches: MatchDetail[];
  mitreAttackIds: string[];      // e.g. ["T1059.001"]
  metadata: Record<string, MetadataValue>;
}
