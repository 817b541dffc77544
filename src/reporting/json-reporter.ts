/**
 * Machine-readable JSON report generator.
 *
 * Wraps a finished Analysis (file metadata, rule matches, threat score,
 * ATT&CK mapping, timeline and statistics) with report metadata.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import type { Analysis } from '../types/analysis.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface AnalysisReport {
  metadata: {
    generatedAt: string;
    threatlineVersion: string;
    analysisId: string;
    fileName: string;
    processingTimeMs: number | null;
  };
  analysis: Analysis;
}

export interface ReportOptions {
  version: string;
  /** Default: now */
  generatedAt?: Date;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function buildAnalysisReport(analysis: Analysis, options: ReportOptions): AnalysisReport {
  return {
    metadata: {
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
      threatlineVersion: options.version,
      analysisId: analysis.id,
      fileName: analysis.fileName,
      processingTimeMs: processingTimeMs(analysis),
    },
    analysis,
  };
}

/**
 * Pretty-printed (2-space) JSON for a report.
 */
export function generateJsonReport(report: AnalysisReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Write the report to a JSON file on disk, creating parent directories if
 * they do not already exist.
 */
export function writeAnalysisReport(report: AnalysisReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateJsonReport(report), 'utf-8');
}

/** Milliseconds between start and completion, or null while either is missing. */
export function processingTimeMs(analysis: Analysis): number | null {
  if (!analysis.startTime || !analysis.completionTime) return null;
  const elapsed = Date.parse(analysis.completionTime) - Date.parse(analysis.startTime);
  return Number.isNaN(elapsed) ? null : Math.max(0, elapsed);
}
