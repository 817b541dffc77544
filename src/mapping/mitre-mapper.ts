/**
 * MITRE ATT&CK mapper.
 *
 * Collects every technique id a set of rule matches carries (explicit
 * `mitreAttackIds` first, then ids mentioned in string metadata, matched
 * content and context) and folds them into techniques, sub-techniques and
 * tactics, plus frequency tables and a tactic-weighted threat score.
 */

import type { ReferenceData } from '../types/collaborators.js';
import type {
  MitreMappingResult,
  MitreStatistics,
  SubTechnique,
  Tactic,
  Technique,
} from '../types/mitre-attack.js';
import type { RuleMatchResult } from '../types/rule-match.js';
import { throwIfCancelled } from '../orchestration/errors.js';
import { clampScore, clampUnit } from '../scoring/threat-score.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('mitre-mapper');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface MapToMitreOptions {
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Technique or sub-technique id, not embedded in a longer token or digit run. */
const TECHNIQUE_ID_PATTERN = /\bT\d{4}(?:\.\d{3})?(?!\d)/gi;

/** A whole attached id, already upper-cased. */
const ATTACHED_ID_PATTERN = /^T\d{4}(?:\.\d{3})?$/;

/** Severity of a technique none of whose tactics are known. */
const NO_TACTIC_SEVERITY = 50;

const TOP_TECHNIQUES_LIMIT = 5;
const HIGH_CONFIDENCE_THRESHOLD = 0.8;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map rule matches onto ATT&CK techniques and tactics.
 *
 * Throws `AnalysisError('cancelled')` when `signal` aborts between matches;
 * never throws on empty or degenerate input.
 */
export function mapToMitre(
  matches: readonly RuleMatchResult[],
  reference: ReferenceData,
  options: MapToMitreOptions = {},
): MitreMappingResult {
  const state = new MappingState(reference);

  for (const match of matches) {
    throwIfCancelled(options.signal);

    const confidence = clampUnit(match.confidence);
    const firstDetail = match.matches[0];
    const evidence = firstDetail
      ? `Rule '${match.ruleName}' matched: ${firstDetail.matchedContent}`
      : null;

    for (const id of collectTechniqueIds(match)) {
      state.record(id, confidence, evidence);
    }
  }

  return state.finish();
}

/**
 * Technique ids a single match refers to, in discovery order.  Repeats are
 * kept: every occurrence counts towards the frequency tables.
 */
export function collectTechniqueIds(match: RuleMatchResult): string[] {
  const ids: string[] = [];

  for (const id of match.mitreAttackIds) {
    const normalized = id.trim().toUpperCase();
    if (ATTACHED_ID_PATTERN.test(normalized)) {
      ids.push(normalized);
    } else if (normalized.length > 0) {
      logger.debug(`Ignoring malformed technique id '${id}' on rule ${match.ruleId}`);
    }
  }

  for (const value of Object.values(match.metadata)) {
    if (value.kind === 'string') ids.push(...extractTechniqueIds(value.value));
  }

  for (const detail of match.matches) {
    ids.push(...extractTechniqueIds(detail.matchedContent));
  }
  for (const detail of match.matches) {
    ids.push(...extractTechniqueIds(detail.context));
  }

  return ids;
}

export function extractTechniqueIds(text: string): string[] {
  return Array.from(text.matchAll(TECHNIQUE_ID_PATTERN), (m) => m[0].toUpperCase());
}

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

class MappingState {
  private readonly techniques = new Map<string, Technique>();
  private readonly subTechniques = new Map<string, SubTechnique>();
  private readonly tactics = new Map<string, Tactic>();
  private readonly techniqueFrequency: Record<string, number> = {};
  private readonly tacticFrequency: Record<string, number> = {};

  constructor(private readonly reference: ReferenceData) {}

  record(id: string, confidence: number, evidence: string | null): void {
    const parentId = id.split('.')[0] ?? id;

    this.techniqueFrequency[id] = (this.techniqueFrequency[id] ?? 0) + 1;

    const technique = this.getOrCreateTechnique(parentId);
    technique.matchCount += 1;
    technique.confidence = Math.max(technique.confidence, confidence);
    addEvidence(technique.evidence, evidence);

    if (id !== parentId) {
      const sub = this.getOrCreateSubTechnique(technique, id);
      sub.matchCount += 1;
      sub.confidence = Math.max(sub.confidence, confidence);
      addEvidence(sub.evidence, evidence);
    }

    for (const tacticName of technique.tactics) {
      this.tacticFrequency[tacticName] = (this.tacticFrequency[tacticName] ?? 0) + 1;

      const tactic = this.getOrCreateTactic(tacticName);
      if (!tactic.techniqueIds.includes(parentId)) {
        tactic.techniqueIds.push(parentId);
        tactic.techniqueCount = tactic.techniqueIds.length;
      }
    }
  }

  finish(): MitreMappingResult {
    const techniques = [...this.techniques.values()];
    const tactics = [...this.tactics.values()];

    return {
      techniques,
      tactics,
      killChainPhases: this.killChainPhases(tactics),
      techniqueFrequency: this.techniqueFrequency,
      tacticFrequency: this.tacticFrequency,
      statistics: this.statistics(techniques, tactics),
    };
  }

  // -----------------------------------------------------------------------
  // Lookups
  // -----------------------------------------------------------------------

  private getOrCreateTechnique(id: string): Technique {
    const existing = this.techniques.get(id);
    if (existing) return existing;

    const ref = this.reference.getTechnique(id);
    const technique: Technique = {
      id,
      name: ref?.name ?? `Technique ${id}`,
      tactics: (ref?.tactics ?? []).map(
        (shortName) => this.reference.getTactic(shortName)?.name ?? shortName,
      ),
      confidence: 0,
      matchCount: 0,
      evidence: [],
      subTechniques: [],
    };
    this.techniques.set(id, technique);
    return technique;
  }

  private getOrCreateSubTechnique(parent: Technique, id: string): SubTechnique {
    const existing = this.subTechniques.get(id);
    if (existing) return existing;

    const sub: SubTechnique = {
      id,
      name: this.reference.getTechnique(id)?.name ?? `Technique ${id}`,
      confidence: 0,
      matchCount: 0,
      evidence: [],
    };
    this.subTechniques.set(id, sub);
    parent.subTechniques.push(sub);
    return sub;
  }

  private getOrCreateTactic(name: string): Tactic {
    const existing = this.tactics.get(name);
    if (existing) return existing;

    const ref = this.reference.getTactic(name);
    const tactic: Tactic = {
      id: ref?.id ?? '',
      name,
      shortName: ref?.shortName ?? name.toLowerCase().replace(/\s+/g, '-'),
      techniqueIds: [],
      techniqueCount: 0,
    };
    this.tactics.set(name, tactic);
    return tactic;
  }

  // -----------------------------------------------------------------------
  // Derived views
  // -----------------------------------------------------------------------

  private killChainPhases(tactics: Tactic[]): string[] {
    const order = (tactic: Tactic): number =>
      this.reference.getTactic(tactic.name)?.order ?? Number.MAX_SAFE_INTEGER;
    return [...tactics].sort((a, b) => order(a) - order(b)).map((t) => t.name);
  }

  private statistics(techniques: Technique[], tactics: Tactic[]): MitreStatistics {
    const techniquesByTactic: Record<string, number> = {};
    const confidenceByTactic: Record<string, number> = {};

    for (const tactic of tactics) {
      techniquesByTactic[tactic.name] = tactic.techniqueCount;

      let total = 0;
      for (const id of tactic.techniqueIds) {
        total += this.techniques.get(id)?.confidence ?? 0;
      }
      confidenceByTactic[tactic.name] =
        tactic.techniqueIds.length > 0 ? total / tactic.techniqueIds.length : 0;
    }

    const mostCommonTechniques = Object.entries(this.techniqueFrequency)
      .sort((a, b) => b[1] - a[1])
      .slice(0, TOP_TECHNIQUES_LIMIT)
      .map(([id]) => id);

    const highConfidenceTechniques = techniques
      .filter((t) => t.confidence >= HIGH_CONFIDENCE_THRESHOLD)
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, TOP_TECHNIQUES_LIMIT)
      .map((t) => t.id);

    return {
      totalTechniques: techniques.length,
      totalTactics: tactics.length,
      totalSubTechniques: this.subTechniques.size,
      techniquesByTactic,
      confidenceByTactic,
      mostCommonTechniques,
      highConfidenceTechniques,
      overallThreatScore: this.overallThreatScore(techniques),
    };
  }

  private overallThreatScore(techniques: Technique[]): number {
    let weightedSeverity = 0;
    let totalWeight = 0;

    for (const technique of techniques) {
      const weight = technique.matchCount * technique.confidence;
      weightedSeverity += weight * this.techniqueSeverity(technique);
      totalWeight += weight;
    }

    return totalWeight > 0 ? clampScore(weightedSeverity / totalWeight) : 0;
  }

  private techniqueSeverity(technique: Technique): number {
    if (technique.tactics.length === 0) return NO_TACTIC_SEVERITY;
    const total = technique.tactics.reduce(
      (sum, name) => sum + this.reference.tacticSeverity(name),
      0,
    );
    return total / technique.tactics.length;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function addEvidence(evidence: string[], entry: string | null): void {
  if (entry !== null && !evidence.includes(entry)) evidence.push(entry);
}
