/**
 * Contracts of the collaborators the analysis core depends on. The core only
 * ever talks to these interfaces; bundled implementations live under
 * src/storage, src/ingestion, src/rules, src/notifications and
 * src/knowledge.
 */

import type { Readable } from 'node:stream';
import type { LogEvent } from './log-event.js';
import type { RuleMatchResult } from './rule-match.js';
import type { AnalysisCompletedPayload } from './analysis.js';
import type { TacticReference, TechniqueReference } from './mitre-attack.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export interface Storage {
  /** File names stored for an upload, sorted. Empty when the upload is unknown. */
  listFiles(uploadId: string): Promise<string[]>;
  openFile(uploadId: string, fileName: string): Promise<Readable>;
  saveResult(analysisId: string, resultType: string, data: unknown): Promise<void>;
  /** `null` when nothing is stored under that key. */
  getResult(analysisId: string, resultType: string): Promise<unknown>;
  deleteResult(analysisId: string, resultType: string): Promise<boolean>;
  deleteAnalysisDirectory(analysisId: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type ParseResult =
  | { success: true; events: LogEvent[] }
  | { success: false; errorMessage: string };

export interface EvidenceParser {
  readonly id: string;
  readonly name: string;
  matches(fileName: string, content: string): boolean;
  parse(fileName: string, content: string, signal?: AbortSignal): Promise<ParseResult>;
}

export interface ParserResolver {
  resolve(
    fileName: string,
    content: string,
    preferredParserId?: string,
  ): Promise<EvidenceParser | null>;
}

// ---------------------------------------------------------------------------
// Rule engine
// ---------------------------------------------------------------------------

export interface RuleEngineInput {
  analysisId: string;
  events: readonly LogEvent[];
  rawContent: string;
  signal?: AbortSignal;
}

export interface RuleEngine {
  process(input: RuleEngineInput): Promise<RuleMatchResult[]>;
  /** Swap in a freshly loaded rule set. Runs already in flight keep theirs. */
  reload(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export interface ProgressNotifier {
  progress(analysisId: string, percent: number, message: string): Promise<void> | void;
  completed(payload: AnalysisCompletedPayload): Promise<void> | void;
}

// ---------------------------------------------------------------------------
// Reference data
// ---------------------------------------------------------------------------

export interface ReferenceData {
  getTechnique(id: string): TechniqueReference | undefined;
  /** Accepts a display name ("Credential Access") or short name ("credential-access"). */
  getTactic(nameOrShortName: string): TacticReference | undefined;
  /** Base severity of a tactic, 50 for tactics the table does not know. */
  tacticSeverity(nameOrShortName: string): number;
}
