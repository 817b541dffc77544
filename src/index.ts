/**
 * Threatline library entry point.
 */

export type * from './types/index.js';

export {
  calculateThreatScore,
  severityBaseScore,
  severityFromScore,
  SEVERITY_BASE_SCORES,
  normalizeRuleMatch,
  type ThreatScore,
} from './scoring/threat-score.js';
export {
  mapToMitre,
  collectTechniqueIds,
  extractTechniqueIds,
  type MapToMitreOptions,
} from './mapping/mitre-mapper.js';
export {
  buildTimeline,
  severityFromLogLevel,
  severityFromMatch,
  type BuildTimelineOptions,
} from './timeline/timeline-builder.js';
export { calculateTimelineStatistics } from './timeline/statistics.js';
export {
  extractIocs,
  findIocs,
  isPrivateIp,
  type IocCandidate,
  type IocExtractionOptions,
} from './extraction/ioc-extractor.js';

export {
  AnalysisOrchestrator,
  ANALYSIS_RESULT_TYPE,
  type AnalysisOrchestratorDeps,
  type AnalysisOutcome,
} from './orchestration/orchestrator.js';
export { AnalysisError, isAnalysisError } from './orchestration/errors.js';
export { canTransition, isTerminal } from './orchestration/lifecycle.js';
export { serializeAnalysis, deserializeAnalysis } from './orchestration/serialization.js';

export { AttackReferenceData, DEFAULT_REFERENCE_PATH } from './knowledge/mitre-attack/loader.js';
export { LocalStorage } from './storage/local-storage.js';
export { ParserRegistry, createDefaultParserRegistry } from './ingestion/parser-registry.js';
export { JsonEventsParser } from './ingestion/parsers/json-events.js';
export { PatternRuleEngine, type PatternRuleEngineOptions } from './rules/pattern-engine.js';
export { loadRules, compileRules, type RuleDefinition } from './rules/loader.js';
export { EventBusProgressNotifier, type ProgressEvent, type ProgressListener, type CompletedListener } from './notifications/event-bus.js';
export { loadConfig } from './config.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export * from './reporting/index.js';
