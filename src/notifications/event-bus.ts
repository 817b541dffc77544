/**
 * In-process progress notifier backed by an EventEmitter.  Subscribers
 * listen per analysis id or on the shared "completed" channel.
 */

import { EventEmitter } from 'node:events';
import type { AnalysisCompletedPayload } from '../types/analysis.js';
import type { ProgressNotifier } from '../types/collaborators.js';

export interface ProgressEvent {
  analysisId: string;
  percent: number;
  message: string;
}

export type ProgressListener = (event: ProgressEvent) => void;
export type CompletedListener = (payload: AnalysisCompletedPayload) => void;

const PROGRESS_CHANNEL = 'analysis:progress';
const COMPLETED_CHANNEL = 'analysis:completed';

export class EventBusProgressNotifier implements ProgressNotifier {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  progress(analysisId: string, percent: number, message: string): void {
    const event: ProgressEvent = { analysisId, percent, message };
    this.emitter.emit(progressChannel(analysisId), event);
    this.emitter.emit(PROGRESS_CHANNEL, event);
  }

  completed(payload: AnalysisCompletedPayload): void {
    this.emitter.emit(COMPLETED_CHANNEL, payload);
  }

  subscribe(analysisId: string, listener: ProgressListener): () => void {
    const channel = progressChannel(analysisId);
    this.emitter.on(channel, listener);
    return () => this.emitter.off(channel, listener);
  }

  /** Progress of every analysis. */
  onProgress(listener: ProgressListener): () => void {
    this.emitter.on(PROGRESS_CHANNEL, listener);
    return () => this.emitter.off(PROGRESS_CHANNEL, listener);
  }

  onCompleted(listener: CompletedListener): () => void {
    this.emitter.on(COMPLETED_CHANNEL, listener);
    return () => this.emitter.off(COMPLETED_CHANNEL, listener);
  }
}

function progressChannel(analysisId: string): string {
  return `${PROGRESS_CHANNEL}:${analysisId}`;
}
