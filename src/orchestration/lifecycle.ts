/**
 * Analysis record creation and the forward-only status machine:
 * pending → processing → completed | failed | cancelled.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Analysis, AnalysisErrorKind, AnalysisStatistics, AnalysisStatus } from '../types/analysis.js';

const TRANSITIONS: Readonly<Record<AnalysisStatus, readonly AnalysisStatus[]>> = {
  pending: ['processing', 'failed', 'cancelled'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function emptyStatistics(): AnalysisStatistics {
  return {
    totalEvents: 0,
    totalRuleMatches: 0,
    criticalFindings: 0,
    highFindings: 0,
    mediumFindings: 0,
    lowFindings: 0,
    eventsByLevel: {},
    matchesByRuleType: {},
  };
}

export function createAnalysis(uploadId: string, now: Date): Analysis {
  return {
    id: uuidv4(),
    uploadId,
    fileName: '',
    fileSize: 0,
    fileType: '',
    fileHash: '',
    parserId: null,
    status: 'pending',
    progress: 0,
    uploadTime: now.toISOString(),
    startTime: null,
    completionTime: null,
    errorMessage: null,
    errorKind: null,
    threatScore: 0,
    severity: 'low',
    summary: null,
    ruleMatches: [],
    timeline: [],
    timelineStatistics: null,
    mitre: null,
    iocs: null,
    statistics: emptyStatistics(),
  };
}

export function isTerminal(status: AnalysisStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: AnalysisStatus, to: AnalysisStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move `analysis` to `to`. Returns false, leaving the record untouched, when
 * the move would go backwards or leave a terminal status.
 */
export function transition(analysis: Analysis, to: AnalysisStatus): boolean {
  if (!canTransition(analysis.status, to)) return false;
  analysis.status = to;
  return true;
}

/**
 * Mark a run as failed, stamping the completion time. No-op once terminal.
 */
export function markFailed(
  analysis: Analysis,
  kind: AnalysisErrorKind,
  message: string,
  now: Date,
): boolean {
  if (!transition(analysis, 'failed')) return false;
  analysis.errorKind = kind;
  analysis.errorMessage = message;
  analysis.completionTime = now.toISOString();
  return true;
}

export function markCancelled(analysis: Analysis, now: Date): boolean {
  if (!transition(analysis, 'cancelled')) return false;
  analysis.errorKind = 'cancelled';
  analysis.errorMessage = 'Analysis was cancelled';
  analysis.completionTime = now.toISOString();
  return true;
}
