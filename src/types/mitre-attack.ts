/**
 * MITRE ATT&CK types: the static reference table and the per-analysis
 * mapping result.
 */

// ---------------------------------------------------------------------------
// Reference data
// ---------------------------------------------------------------------------

export interface TechniqueReference {
  id: string;                    // e.g. "T1059.001"
  name: string;                  // e.g. "PowerShell"
  tactics: string[];             // tactic short names, e.g. ["execution"]
}

export interface TacticReference {
  id: string;                    // e.g. "TA0002"
  name: string;                  // e.g. "Execution"
  shortName: string;             // e.g. "execution"
  severity: number;              // 0..100 base severity
  order: number;                 // position in the kill chain
}

// ---------------------------------------------------------------------------
// Mapping result
// ---------------------------------------------------------------------------

export interface SubTechnique {
  id: string;                    // parent id + ".NNN"
  name: string;
  confidence: number;
  matchCount: number;
  evidence: string[];
}

export interface Technique {
  id: string;
  name: string;
  tactics: string[];             // tactic display names
  confidence: number;
  matchCount: number;
  evidence: string[];
  subTechniques: SubTechnique[];
}

export interface Tactic {
  id: string;
  name: string;
  shortName: string;
  techniqueIds: string[];        // parent technique ids, no duplicates
  techniqueCount: number;
}

export interface MitreStatistics {
  totalTechniques: number;
  totalTactics: number;
  totalSubTechniques: number;
  techniquesByTactic: Record<string, number>;
  confidenceByTactic: Record<string, number>;
  mostCommonTechniques: string[];
  highConfidenceTechniques: string[];
  overallThreatScore: number;    // 0..100
}

export interface MitreMappingResult {
  techniques: Technique[];
  tactics: Tactic[];
  killChainPhases: string[];
  techniqueFrequency: Record<string, number>;
  tacticFrequency: Record<string, number>;
  statistics: MitreStatistics;
}
