/**
 * Wires the bundled collaborators into an orchestrator for CLI commands.
 */

import { resolve } from 'path';

import { loadConfig } from '../config.js';
import { createDefaultParserRegistry } from '../ingestion/parser-registry.js';
import { AttackReferenceData } from '../knowledge/mitre-attack/loader.js';
import { AnalysisOrchestrator } from '../orchestration/orchestrator.js';
import { PatternRuleEngine } from '../rules/pattern-engine.js';
import { LocalStorage } from '../storage/local-storage.js';
import type { ProgressNotifier } from '../types/collaborators.js';
import type { ThreatlineConfig } from '../types/config.js';
import { setLogLevel } from '../utils/logger.js';

export interface ContextOverrides {
  storage?: string;
  rules?: string;
  verbose?: boolean;
}

export interface CliContext {
  config: ThreatlineConfig;
  storage: LocalStorage;
}

export interface AnalysisContext extends CliContext {
  reference: AttackReferenceData;
  ruleEngine: PatternRuleEngine;
  orchestrator: AnalysisOrchestrator;
}

/** Notifier for commands that do not display progress. */
export const silentNotifier: ProgressNotifier = {
  progress: () => undefined,
  completed: () => undefined,
};

/**
 * Configuration and storage, with command-line overrides applied.
 */
export function createCliContext(overrides: ContextOverrides = {}): CliContext {
  const config = loadConfig();
  if (overrides.storage) config.storage.basePath = resolve(overrides.storage);
  if (overrides.rules) config.rulesPath = resolve(overrides.rules);

  setLogLevel(overrides.verbose ? 'debug' : config.logging.level);

  return { config, storage: new LocalStorage(config.storage) };
}

/**
 * Everything `createCliContext` provides plus loaded rules, reference data
 * and an orchestrator reporting to `notifier`.
 */
export async function createAnalysisContext(
  overrides: ContextOverrides = {},
  notifier: ProgressNotifier = silentNotifier,
): Promise<AnalysisContext> {
  const base = createCliContext(overrides);
  const [reference, ruleEngine] = await Promise.all([
    AttackReferenceData.load(base.config.referenceDataPath),
    PatternRuleEngine.fromPath(base.config.rulesPath),
  ]);

  const orchestrator = new AnalysisOrchestrator({
    storage: base.storage,
    parsers: createDefaultParserRegistry(),
    ruleEngine,
    notifier,
    reference,
    defaults: base.config.analysis,
  });

  return { ...base, reference, ruleEngine, orchestrator };
}
