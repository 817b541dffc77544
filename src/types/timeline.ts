/**
 * Timeline types.
 */

import type { FieldValue } from './log-event.js';

export type TimelineEventType = 'log_event' | 'rule_match';

export type TimelineSeverity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export interface TimelineEvent {
  id: string;
  timestamp: string;
  type: TimelineEventType;
  title: string;
  description: string;
  severity: TimelineSeverity;
  source: string;
  category: string;
  fields: Record<string, FieldValue>;
  tags: string[];
  mitreAttackIds: string[];
  confidence: number;
  isAnomalous: boolean;
  lineNumber: number | null;
  rawData: string | null;
}

export interface TimelineStatistics {
  totalEvents: number;
  firstEvent: string | null;
  lastEvent: string | null;
  timeRangeMs: number;
  eventsByType: Record<string, number>;
  eventsBySeverity: Record<string, number>;
  eventsBySource: Record<string, number>;
  eventsByCategory: Record<string, number>;
  eventsByHour: Record<string, number>;   // key: ISO timestamp floored to the hour
  topTags: string[];
  anomalousEvents: number;
}

export interface TimelineResult {
  events: TimelineEvent[];
  statistics: TimelineStatistics;
}
