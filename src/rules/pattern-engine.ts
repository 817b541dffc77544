/**
 * Regex rule engine.
 *
 * Each rule's pattern is run against every parsed event (its message, or a
 * named field) or, when a parser produced no events, against every line of
 * the raw content.  Rules that fire produce one RuleMatchResult carrying a
 * MatchDetail per hit.
 */

import type { RuleEngine, RuleEngineInput } from '../types/collaborators.js';
import type { LogEvent } from '../types/log-event.js';
import type { MatchDetail, RuleMatchResult } from '../types/rule-match.js';
import { throwIfCancelled } from '../orchestration/errors.js';
import { createLogger } from '../utils/logger.js';
import { compileRules, loadRules, type CompiledRule, type RuleDefinition } from './loader.js';

const logger = createLogger('rule-engine');

export interface PatternRuleEngineOptions {
  /** Rule pack file or directory read by `reload()`. */
  rulesPath?: string;
  /** Hits recorded per rule per run. Default: 1000 */
  maxMatchesPerRule?: number;
}

const DEFAULT_MAX_MATCHES_PER_RULE = 1000;
const MAX_CONTEXT_LENGTH = 500;

export class PatternRuleEngine implements RuleEngine {
  private rules: readonly CompiledRule[] = [];
  private readonly rulesPath: string | null;
  private readonly maxMatchesPerRule: number;

  constructor(options: PatternRuleEngineOptions = {}) {
    this.rulesPath = options.rulesPath ?? null;
    this.maxMatchesPerRule = options.maxMatchesPerRule ?? DEFAULT_MAX_MATCHES_PER_RULE;
  }

  /**
   * Engine loaded from a rule pack file or directory.
   */
  static async fromPath(
    rulesPath: string,
    options: Omit<PatternRuleEngineOptions, 'rulesPath'> = {},
  ): Promise<PatternRuleEngine> {
    const engine = new PatternRuleEngine({ ...options, rulesPath });
    await engine.reload();
    return engine;
  }

  /**
   * Engine over in-memory rule definitions (useful for tests).
   */
  static fromDefinitions(
    definitions: readonly RuleDefinition[],
    options: Omit<PatternRuleEngineOptions, 'rulesPath'> = {},
  ): PatternRuleEngine {
    const engine = new PatternRuleEngine(options);
    engine.rules = compileRules(definitions);
    return engine;
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  /**
   * Re-read the rule packs.  The new set replaces the old one in a single
   * assignment, so runs already in `process()` finish on the set they
   * started with.
   */
  async reload(): Promise<void> {
    if (!this.rulesPath) {
      logger.debug('No rules path configured; keeping the current rule set');
      return;
    }
    this.rules = await loadRules(this.rulesPath);
  }

  async process(input: RuleEngineInput): Promise<RuleMatchResult[]> {
    const rules = this.rules;
    const results: RuleMatchResult[] = [];

    for (const rule of rules) {
      throwIfCancelled(input.signal);

      const details =
        input.events.length > 0
          ? this.matchEvents(rule, input.events, input.signal)
          : this.matchLines(rule, input.rawContent, input.signal);
      if (details.length === 0) continue;

      results.push({
        ruleId: rule.id,
        ruleName: rule.name,
        ruleType: rule.type,
        severity: rule.severity,
        matchCount: details.length,
        confidence: rule.confidence,
        matches: details,
        mitreAttackIds: [...rule.mitreAttackIds],
        metadata: { ...rule.metadata },
      });
    }

    logger.info(
      `Analysis ${input.analysisId}: ${results.length} of ${rules.length} rules matched`,
    );
    return results;
  }

  // -----------------------------------------------------------------------
  // Matching
  // -----------------------------------------------------------------------

  private matchEvents(
    rule: CompiledRule,
    events: readonly LogEvent[],
    signal: AbortSignal | undefined,
  ): MatchDetail[] {
    const details: MatchDetail[] = [];

    for (const event of events) {
      if (details.length >= this.maxMatchesPerRule) break;
      throwIfCancelled(signal);

      const target = rule.field === null ? event.message : event.fields[rule.field];
      if (target === undefined || target === null) continue;

      const matched = firstMatch(rule.regex, String(target));
      if (matched === null) continue;

      details.push({
        matchedContent: matched.text,
        offset: null,
        lineNumber: event.lineNumber,
        context: truncate(event.raw || event.message),
        fields: { ...event.fields },
        timestamp: event.timestamp,
        confidence: rule.confidence,
      });
    }

    return details;
  }

  private matchLines(
    rule: CompiledRule,
    rawContent: string,
    signal: AbortSignal | undefined,
  ): MatchDetail[] {
    const details: MatchDetail[] = [];
    let offset = 0;

    for (const [index, line] of rawContent.split('\n').entries()) {
      if (details.length >= this.maxMatchesPerRule) break;
      throwIfCancelled(signal);

      const matched = firstMatch(rule.regex, line);
      if (matched !== null) {
        details.push({
          matchedContent: matched.text,
          offset: Buffer.byteLength(rawContent.slice(0, offset + matched.index), 'utf-8'),
          lineNumber: index + 1,
          context: truncate(line.trimEnd()),
          fields: {},
          timestamp: null,
          confidence: rule.confidence,
        });
      }
      offset += line.length + 1;
    }

    return details;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function firstMatch(regex: RegExp, text: string): { text: string; index: number } | null {
  regex.lastIndex = 0;
  const match = regex.exec(text);
  return match ? { text: match[0], index: match.index } : null;
}

function truncate(text: string): string {
  return text.length > MAX_CONTEXT_LENGTH ? `${text.slice(0, MAX_CONTEXT_LENGTH)}...` : text;
}
