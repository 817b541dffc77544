/**
 * Error taxonomy for analysis runs.
 *
 * Expected outcomes (no evidence, no parser, parser failure) are reported as
 * values by the orchestrator; `AnalysisError` is what those values carry.
 * It is only thrown across phase boundaries for cancellation and for
 * collaborator faults the orchestrator converts back into a value.
 */

import type { AnalysisErrorKind } from '../types/analysis.js';

export class AnalysisError extends Error {
  constructor(
    public readonly kind: AnalysisErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

/**
 * Cooperative cancellation checkpoint used between phases and inside the
 * per-item loops of the mapper and the timeline builder.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AnalysisError('cancelled', 'Analysis was cancelled');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
