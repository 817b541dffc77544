/**
 * The Analysis aggregate and the options that drive one pipeline run.
 */

import type { RuleMatchResult, Severity } from './rule-match.js';
import type { TimelineEvent, TimelineStatistics } from './timeline.js';
import type { MitreMappingResult } from './mitre-attack.js';
import type { Ioc } from './ioc.js';

export type AnalysisStatus =
  | 'pending'
  | 'processing'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type AnalysisErrorKind =
  | 'not_found'
  | 'unsupported_format'
  | 'parse_failure'
  | 'rule_engine_failure'
  | 'cancelled'
  | 'timeout'
  | 'internal';

export interface AnalysisStatistics {
  totalEvents: number;
  totalRuleMatches: number;
  criticalFindings: number;
  highFindings: number;
  mediumFindings: number;
  lowFindings: number;
  eventsByLevel: Record<string, number>;
  matchesByRuleType: Record<string, number>;
}

export interface Analysis {
  id: string;
  uploadId: string;

  // Evidence file
  fileName: string;
  fileSize: number;
  fileType: string;              // upper-cased extension, e.g. "JSON"
  fileHash: string;              // sha256, lower-case hex
  parserId: string | null;

  // Lifecycle
  status: AnalysisStatus;
  progress: number;              // 0..100
  uploadTime: string;
  startTime: string | null;
  completionTime: string | null;
  errorMessage: string | null;
  errorKind: AnalysisErrorKind | null;

  // Results
  threatScore: number;           // 0..100
  severity: Severity;
  summary: string | null;
  ruleMatches: RuleMatchResult[];
  timeline: TimelineEvent[];
  timelineStatistics: TimelineStatistics | null;
  mitre: MitreMappingResult | null;
  iocs: Ioc[] | null;            // null when extraction was skipped
  statistics: AnalysisStatistics;
}

export interface AnalysisOptions {
  /** Parser tried before the priority order. */
  preferredParserId?: string;
  /** Default: true */
  mapToMitre?: boolean;
  /** Default: true */
  generateTimeline?: boolean;
  /** Default: true */
  extractIocs?: boolean;
  /** Parsed events beyond this count are dropped. 0 disables the limit. Default: 100000 */
  maxEvents?: number;
  /** Run time limit; a run that exceeds it is marked failed. Default: 30 */
  timeoutMinutes?: number;
  /** Caller-owned cancellation. */
  signal?: AbortSignal;
}

/** Payload pushed to the notifier once a run reaches a terminal status. */
export interface AnalysisCompletedPayload {
  analysisId: string;
  fileName: string;
  fileHash: string;
  status: AnalysisStatus;
  threatScore: number;
  severity: Severity;
  completionTime: string | null;
  ruleMatchCount: number;
}
