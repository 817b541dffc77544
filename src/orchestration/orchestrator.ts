/**
 * Analysis orchestrator.
 *
 * Runs one uploaded artifact through the whole pipeline: locate and hash the
 * file, resolve a parser, parse, run the rule engine, then score, map to
 * MITRE ATT&CK, build the timeline and summarize.  Each step reports
 * progress before the next one starts, and a cancellation signal is checked
 * between steps and inside the mapper and timeline loops.
 *
 * Expected failures come back as values (`{ ok: false, error, analysis }`);
 * `analyze` itself does not throw.
 */

import { extname } from 'node:path';
import type { Analysis, AnalysisOptions } from '../types/analysis.js';
import type { AnalysisDefaults } from '../types/config.js';
import type {
  EvidenceParser,
  ParseResult,
  ParserResolver,
  ProgressNotifier,
  ReferenceData,
  RuleEngine,
  Storage,
} from '../types/collaborators.js';
import type { LogEvent } from '../types/log-event.js';
import type { RuleMatchResult } from '../types/rule-match.js';
import { extractIocs } from '../extraction/ioc-extractor.js';
import { mapToMitre } from '../mapping/mitre-mapper.js';
import { calculateThreatScore, normalizeRuleMatch } from '../scoring/threat-score.js';
import { buildTimeline } from '../timeline/timeline-builder.js';
import { readAndHash } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';
import { AnalysisError, errorMessage, isAnalysisError, throwIfCancelled } from './errors.js';
import { createAnalysis, isTerminal, markCancelled, markFailed, transition } from './lifecycle.js';
import { deserializeAnalysis, serializeAnalysis } from './serialization.js';
import { buildStatistics, buildSummary } from './summary.js';

const logger = createLogger('orchestrator');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type AnalysisOutcome =
  | { ok: true; analysis: Analysis }
  | { ok: false; error: AnalysisError; analysis: Analysis | null };

export interface AnalysisOrchestratorDeps {
  storage: Storage;
  parsers: ParserResolver;
  ruleEngine: RuleEngine;
  notifier: ProgressNotifier;
  reference: ReferenceData;
  /** Fallbacks for options a caller leaves out. */
  defaults?: Partial<AnalysisDefaults>;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

/** Result type under which analysis records are persisted. */
export const ANALYSIS_RESULT_TYPE = 'analysis';

export const DEFAULT_MAX_EVENTS = 100_000;
export const DEFAULT_TIMEOUT_MINUTES = 30;

/** Longest delay a timer accepts; larger ones fire immediately. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

interface ActiveRun {
  analysis: Analysis;
  controller: AbortController;
  timedOut: boolean;
}

interface LoadedFile {
  fileName: string;
  content: string;
}

// ---------------------------------------------------------------------------
// AnalysisOrchestrator
// ---------------------------------------------------------------------------

export class AnalysisOrchestrator {
  private readonly storage: Storage;
  private readonly parsers: ParserResolver;
  private readonly ruleEngine: RuleEngine;
  private readonly notifier: ProgressNotifier;
  private readonly reference: ReferenceData;
  private readonly defaults: AnalysisDefaults;
  private readonly now: () => Date;
  private readonly active = new Map<string, ActiveRun>();

  constructor(deps: AnalysisOrchestratorDeps) {
    this.storage = deps.storage;
    this.parsers = deps.parsers;
    this.ruleEngine = deps.ruleEngine;
    this.notifier = deps.notifier;
    this.reference = deps.reference;
    this.defaults = {
      maxEvents: deps.defaults?.maxEvents ?? DEFAULT_MAX_EVENTS,
      timeoutMinutes: deps.defaults?.timeoutMinutes ?? DEFAULT_TIMEOUT_MINUTES,
    };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Analyze the first file stored under `uploadId`.
   */
  async analyze(uploadId: string, options: AnalysisOptions = {}): Promise<AnalysisOutcome> {
    const analysis = createAnalysis(uploadId, this.now());
    const run: ActiveRun = { analysis, controller: new AbortController(), timedOut: false };
    this.active.set(analysis.id, run);

    const onExternalAbort = (): void => run.controller.abort();
    if (options.signal?.aborted) run.controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const timeoutMinutes = options.timeoutMinutes ?? this.defaults.timeoutMinutes;
    const timer =
      timeoutMinutes > 0
        ? setTimeout(() => {
            run.timedOut = true;
            run.controller.abort();
          }, Math.min(timeoutMinutes * 60_000, MAX_TIMER_DELAY_MS))
        : null;
    timer?.unref();

    try {
      return await this.execute(run, options);
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.active.delete(analysis.id);
    }
  }

  /**
   * Cancel an in-flight analysis.  The record becomes `cancelled`
   * immediately; the run stops at its next checkpoint.  Returns false for
   * unknown or already finished runs.
   */
  cancel(analysisId: string): boolean {
    const run = this.active.get(analysisId);
    if (!run || !markCancelled(run.analysis, this.now())) return false;

    logger.info(`Cancelling analysis ${analysisId}`);
    void this.report(run.analysis, run.analysis.progress, 'Analysis cancelled');
    run.controller.abort();
    return true;
  }

  /** The live record of a run still in flight. */
  getActiveAnalysis(analysisId: string): Analysis | undefined {
    return this.active.get(analysisId)?.analysis;
  }

  /** Load a persisted analysis, or `null` when none is stored. */
  async getAnalysis(analysisId: string): Promise<Analysis | null> {
    const stored = await this.storage.getResult(analysisId, ANALYSIS_RESULT_TYPE);
    return stored === null || stored === undefined ? null : deserializeAnalysis(stored);
  }

  /**
   * Delete a persisted analysis and its working directory.  Returns false
   * when nothing was stored.
   */
  async deleteAnalysis(analysisId: string): Promise<boolean> {
    const deleted = await this.storage.deleteResult(analysisId, ANALYSIS_RESULT_TYPE);
    await this.storage.deleteAnalysisDirectory(analysisId);
    return deleted;
  }

  // -----------------------------------------------------------------------
  // Pipeline
  // -----------------------------------------------------------------------

  private async execute(run: ActiveRun, options: AnalysisOptions): Promise<AnalysisOutcome> {
    const { analysis } = run;
    const signal = run.controller.signal;

    transition(analysis, 'processing');
    analysis.startTime = this.now().toISOString();
    logger.info(`Starting analysis ${analysis.id} for upload ${analysis.uploadId}`);

    // Step 1: locate the evidence.  Nothing is persisted when it is missing.
    let files: string[];
    try {
      files = await this.storage.listFiles(analysis.uploadId);
    } catch (error) {
      const failure = new AnalysisError(
        'internal',
        `Failed to list files for upload ${analysis.uploadId}: ${errorMessage(error)}`,
        { cause: error },
      );
      markFailed(analysis, failure.kind, failure.message, this.now());
      logger.error(failure.message);
      return { ok: false, error: failure, analysis: null };
    }

    const fileName = files[0];
    if (fileName === undefined) {
      const failure = new AnalysisError('not_found', `No files found for upload ${analysis.uploadId}`);
      markFailed(analysis, failure.kind, failure.message, this.now());
      logger.warn(failure.message);
      return { ok: false, error: failure, analysis: null };
    }

    try {
      await this.report(analysis, 5, `Found ${files.length} file(s)`);
      const outcome = await this.runPhases(analysis, fileName, options, signal);
      return await this.finish(analysis, outcome);
    } catch (error) {
      return await this.finish(analysis, this.toFailure(run, error));
    }
  }

  /**
   * Steps 2 to 9.  Returns `null` when the run succeeded, or the error that
   * ended it as a value for expected failures.
   */
  private async runPhases(
    analysis: Analysis,
    fileName: string,
    options: AnalysisOptions,
    signal: AbortSignal,
  ): Promise<AnalysisError | null> {
    // Step 2: load and hash.
    throwIfCancelled(signal);
    const loaded = await this.loadFile(analysis, fileName);
    throwIfCancelled(signal);
    await this.report(analysis, 10, `File loaded: ${loaded.fileName}`);

    // Step 3: resolve a parser.
    throwIfCancelled(signal);
    const parser = await this.parsers.resolve(
      loaded.fileName,
      loaded.content,
      options.preferredParserId,
    );
    throwIfCancelled(signal);
    if (!parser) {
      return new AnalysisError('unsupported_format', `No parser found for file ${loaded.fileName}`);
    }
    analysis.parserId = parser.id;
    await this.report(analysis, 15, `Using parser: ${parser.name}`);

    // Step 4: parse.
    const events = await this.parse(parser, loaded, options, signal);
    if (events instanceof AnalysisError) return events;
    await this.report(analysis, 30, `Parsed ${events.length} events`);

    // Step 5: rule engine.
    throwIfCancelled(signal);
    let found: RuleMatchResult[];
    try {
      found = await this.ruleEngine.process({
        analysisId: analysis.id,
        events,
        rawContent: loaded.content,
        signal,
      });
    } catch (error) {
      throwIfCancelled(signal);
      throw new AnalysisError('rule_engine_failure', `Rule engine failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    throwIfCancelled(signal);
    const matches = found.map(normalizeRuleMatch);
    analysis.ruleMatches = matches;
    await this.report(analysis, 50, `Rule engine found ${matches.length} matches`);

    // Step 5b: indicators of compromise.
    if (options.extractIocs ?? true) {
      throwIfCancelled(signal);
      const iocs = extractIocs(events, loaded.content, { signal });
      throwIfCancelled(signal);
      analysis.iocs = iocs;
      await this.report(analysis, 55, `Extracted ${iocs.length} IOCs`);
    }

    // Step 6: threat score.
    throwIfCancelled(signal);
    const { score, severity } = calculateThreatScore(matches);
    analysis.threatScore = score;
    analysis.severity = severity;
    await this.report(analysis, 60, `Threat score: ${score}/100 (${severity})`);

    // Step 7: MITRE ATT&CK mapping.
    if (options.mapToMitre ?? true) {
      throwIfCancelled(signal);
      const mitre = mapToMitre(matches, this.reference, { signal });
      throwIfCancelled(signal);
      analysis.mitre = mitre;
      await this.report(
        analysis,
        75,
        `Mapped ${mitre.statistics.totalTechniques} MITRE ATT&CK techniques`,
      );
    }

    // Step 8: timeline.
    if (options.generateTimeline ?? true) {
      throwIfCancelled(signal);
      const timeline = buildTimeline(events, matches, { signal, now: this.now() });
      throwIfCancelled(signal);
      analysis.timeline = timeline.events;
      analysis.timelineStatistics = timeline.statistics;
      await this.report(analysis, 90, `Timeline built with ${timeline.events.length} events`);
    }

    // Step 9: summary and statistics.
    throwIfCancelled(signal);
    analysis.statistics = buildStatistics(events, matches);
    analysis.summary = buildSummary(analysis, events, matches);
    await this.report(analysis, 95, 'Summary generated');

    throwIfCancelled(signal);
    return null;
  }

  private async loadFile(analysis: Analysis, fileName: string): Promise<LoadedFile> {
    const stream = await this.storage.openFile(analysis.uploadId, fileName);
    const { content, sha256, size } = await readAndHash(stream);

    analysis.fileName = fileName;
    analysis.fileSize = size;
    analysis.fileHash = sha256;
    analysis.fileType = extname(fileName).slice(1).toUpperCase() || 'UNKNOWN';

    return { fileName, content: content.toString('utf-8') };
  }

  private async parse(
    parser: EvidenceParser,
    file: LoadedFile,
    options: AnalysisOptions,
    signal: AbortSignal,
  ): Promise<LogEvent[] | AnalysisError> {
    throwIfCancelled(signal);
    let result: ParseResult;
    try {
      result = await parser.parse(file.fileName, file.content, signal);
    } catch (error) {
      throwIfCancelled(signal);
      return new AnalysisError('parse_failure', `Parser ${parser.id} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    throwIfCancelled(signal);

    if (!result.success) {
      return new AnalysisError('parse_failure', result.errorMessage);
    }

    const maxEvents = options.maxEvents ?? this.defaults.maxEvents;
    if (maxEvents > 0 && result.events.length > maxEvents) {
      logger.warn(
        `Parser ${parser.id} produced ${result.events.length} events; keeping the first ${maxEvents}`,
      );
      return result.events.slice(0, maxEvents);
    }
    return result.events;
  }

  // -----------------------------------------------------------------------
  // Completion
  // -----------------------------------------------------------------------

  private toFailure(run: ActiveRun, error: unknown): AnalysisError {
    if (isAnalysisError(error) && error.kind === 'cancelled' && run.timedOut) {
      return new AnalysisError('timeout', 'Analysis timed out', { cause: error });
    }
    if (isAnalysisError(error)) return error;
    return new AnalysisError('internal', `Analysis failed: ${errorMessage(error)}`, { cause: error });
  }

  /**
   * Step 10: stamp the terminal status, persist and notify.
   */
  private async finish(analysis: Analysis, failure: AnalysisError | null): Promise<AnalysisOutcome> {
    const now = this.now();

    if (failure?.kind === 'cancelled') {
      // Runs aborted through the caller's signal have not been marked yet.
      if (markCancelled(analysis, now)) {
        await this.report(analysis, analysis.progress, 'Analysis cancelled');
      }
    } else if (failure) {
      markFailed(analysis, failure.kind, failure.message, now);
    } else if (!isTerminal(analysis.status)) {
      analysis.completionTime = now.toISOString();
      transition(analysis, 'completed');
    }

    if (failure) {
      logger.warn(`Analysis ${analysis.id} ended as ${analysis.status}: ${failure.message}`);
    } else {
      analysis.progress = 100;
      logger.info(
        `Analysis ${analysis.id} completed: score ${analysis.threatScore}/100 (${analysis.severity})`,
      );
    }

    try {
      await this.storage.saveResult(analysis.id, ANALYSIS_RESULT_TYPE, serializeAnalysis(analysis));
    } catch (error) {
      const persistFailure = new AnalysisError(
        'internal',
        `Failed to persist analysis ${analysis.id}: ${errorMessage(error)}`,
        { cause: error },
      );
      logger.error(persistFailure.message);
      return { ok: false, error: persistFailure, analysis };
    }

    if (analysis.status !== 'cancelled') {
      if (!failure) await this.report(analysis, 100, 'Analysis completed');
      await this.notifyCompleted(analysis);
    }

    return failure ? { ok: false, error: failure, analysis } : { ok: true, analysis };
  }

  // -----------------------------------------------------------------------
  // Notifications (best effort)
  // -----------------------------------------------------------------------

  private async report(analysis: Analysis, percent: number, message: string): Promise<void> {
    analysis.progress = percent;
    try {
      await this.notifier.progress(analysis.id, percent, message);
    } catch (error) {
      logger.warn(`Progress notification failed for ${analysis.id}: ${errorMessage(error)}`);
    }
  }

  private async notifyCompleted(analysis: Analysis): Promise<void> {
    try {
      await this.notifier.completed({
        analysisId: analysis.id,
        fileName: analysis.fileName,
        fileHash: analysis.fileHash,
        status: analysis.status,
        threatScore: analysis.threatScore,
        severity: analysis.severity,
        completionTime: analysis.completionTime,
        ruleMatchCount: analysis.ruleMatches.length,
      });
    } catch (error) {
      logger.warn(`Completion notification failed for ${analysis.id}: ${errorMessage(error)}`);
    }
  }
}
