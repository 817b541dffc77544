/**
 * Persisted form of an Analysis. Records are stored as plain JSON and
 * validated on the way back in.
 */

import { z } from 'zod';
import type { Analysis } from '../types/analysis.js';
import type { RuleMatchResult } from '../types/rule-match.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const FieldsSchema = z.record(z.string(), FieldValueSchema);
const CountsSchema = z.record(z.string(), z.number());

export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);
export const RuleTypeSchema = z.enum(['sigma', 'yara', 'stix', 'pattern', 'custom']);

export const MetadataValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('string'), value: z.string() }),
  z.object({ kind: z.literal('number'), value: z.number() }),
  z.object({ kind: z.literal('boolean'), value: z.boolean() }),
  z.object({ kind: z.literal('timestamp'), value: z.string() }),
]);

const MatchDetailSchema = z.object({
  matchedContent: z.string(),
  offset: z.number().nullable(),
  lineNumber: z.number().nullable(),
  context: z.string(),
  fields: FieldsSchema,
  timestamp: z.string().nullable(),
  confidence: z.number(),
});

export const RuleMatchResultSchema: z.ZodType<RuleMatchResult> = z.object({
  ruleId: z.string(),
  ruleName: z.string(),
  ruleType: RuleTypeSchema,
  severity: SeveritySchema,
  matchCount: z.number(),
  confidence: z.number(),
  matches: z.array(MatchDetailSchema),
  mitreAttackIds: z.array(z.string()),
  metadata: z.record(z.string(), MetadataValueSchema),
});

const TimelineEventSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  type: z.enum(['log_event', 'rule_match']),
  title: z.string(),
  description: z.string(),
  severity: z.enum(['critical', 'high', 'medium', 'low', 'info']),
  source: z.string(),
  category: z.string(),
  fields: FieldsSchema,
  tags: z.array(z.string()),
  mitreAttackIds: z.array(z.string()),
  confidence: z.number(),
  isAnomalous: z.boolean(),
  lineNumber: z.number().nullable(),
  rawData: z.string().nullable(),
});

const TimelineStatisticsSchema = z.object({
  totalEvents: z.number(),
  firstEvent: z.string().nullable(),
  lastEvent: z.string().nullable(),
  timeRangeMs: z.number(),
  eventsByType: CountsSchema,
  eventsBySeverity: CountsSchema,
  eventsBySource: CountsSchema,
  eventsByCategory: CountsSchema,
  eventsByHour: CountsSchema,
  topTags: z.array(z.string()),
  anomalousEvents: z.number(),
});

const SubTechniqueSchema = z.object({
  id: z.string(),
  name: z.string(),
  confidence: z.number(),
  matchCount: z.number(),
  evidence: z.array(z.string()),
});

const MitreMappingSchema = z.object({
  techniques: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      tactics: z.array(z.string()),
      confidence: z.number(),
      matchCount: z.number(),
      evidence: z.array(z.string()),
      subTechniques: z.array(SubTechniqueSchema),
    }),
  ),
  tactics: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      shortName: z.string(),
      techniqueIds: z.array(z.string()),
      techniqueCount: z.number(),
    }),
  ),
  killChainPhases: z.array(z.string()),
  techniqueFrequency: CountsSchema,
  tacticFrequency: CountsSchema,
  statistics: z.object({
    totalTechniques: z.number(),
    totalTactics: z.number(),
    totalSubTechniques: z.number(),
    techniquesByTactic: CountsSchema,
    confidenceByTactic: CountsSchema,
    mostCommonTechniques: z.array(z.string()),
    highConfidenceTechniques: z.array(z.string()),
    overallThreatScore: z.number(),
  }),
});

const IocSchema = z.object({
  value: z.string(),
  type: z.enum([
    'ipv4',
    'domain',
    'url',
    'email',
    'md5',
    'sha1',
    'sha256',
    'filepath_windows',
    'filepath_linux',
    'registry_key',
    'cve',
  ]),
  context: z.string(),
  source: z.string(),
  lineNumber: z.number().nullable(),
  firstSeen: z.string().nullable(),
  lastSeen: z.string().nullable(),
  occurrences: z.number(),
});

export const AnalysisSchema: z.ZodType<Analysis> = z.object({
  id: z.string(),
  uploadId: z.string(),
  fileName: z.string(),
  fileSize: z.number(),
  fileType: z.string(),
  fileHash: z.string(),
  parserId: z.string().nullable(),
  status: z.enum(['pending', 'processing', 'completed', 'failed', 'cancelled']),
  progress: z.number().min(0).max(100),
  uploadTime: z.string(),
  startTime: z.string().nullable(),
  completionTime: z.string().nullable(),
  errorMessage: z.string().nullable(),
  errorKind: z
    .enum([
      'not_found',
      'unsupported_format',
      'parse_failure',
      'rule_engine_failure',
      'cancelled',
      'timeout',
      'internal',
    ])
    .nullable(),
  threatScore: z.number().min(0).max(100),
  severity: SeveritySchema,
  summary: z.string().nullable(),
  ruleMatches: z.array(RuleMatchResultSchema),
  timeline: z.array(TimelineEventSchema),
  timelineStatistics: TimelineStatisticsSchema.nullable(),
  mitre: MitreMappingSchema.nullable(),
  iocs: z.array(IocSchema).nullable(),
  statistics: z.object({
    totalEvents: z.number(),
    totalRuleMatches: z.number(),
    criticalFindings: z.number(),
    highFindings: z.number(),
    mediumFindings: z.number(),
    lowFindings: z.number(),
    eventsByLevel: CountsSchema,
    matchesByRuleType: CountsSchema,
  }),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** JSON-ready copy of an analysis, detached from the live record. */
export function serializeAnalysis(analysis: Analysis): unknown {
  return JSON.parse(JSON.stringify(analysis));
}

/**
 * Validate a stored document as an Analysis. Throws with the zod issue list
 * when it does not fit.
 */
export function deserializeAnalysis(data: unknown): Analysis {
  const result = AnalysisSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid analysis record: ${issues}`);
  }
  return result.data;
}
