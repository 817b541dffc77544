/**
 * Timeline statistics: counts by type, severity, source, category and hour,
 * the most frequent tags and the covered time range.
 */

import type { TimelineEvent, TimelineStatistics } from '../types/timeline.js';

const TOP_TAGS_LIMIT = 10;
const HOUR_MS = 60 * 60 * 1000;

export function calculateTimelineStatistics(
  timeline: readonly TimelineEvent[],
): TimelineStatistics {
  const stats: TimelineStatistics = {
    totalEvents: timeline.length,
    firstEvent: null,
    lastEvent: null,
    timeRangeMs: 0,
    eventsByType: {},
    eventsBySeverity: {},
    eventsBySource: {},
    eventsByCategory: {},
    eventsByHour: {},
    topTags: [],
    anomalousEvents: 0,
  };

  let firstMs = Number.POSITIVE_INFINITY;
  let lastMs = Number.NEGATIVE_INFINITY;
  const tagCounts = new Map<string, number>();

  for (const event of timeline) {
    increment(stats.eventsByType, event.type);
    increment(stats.eventsBySeverity, event.severity);
    if (event.source) increment(stats.eventsBySource, event.source);
    if (event.category) increment(stats.eventsByCategory, event.category);
    if (event.isAnomalous) stats.anomalousEvents += 1;

    for (const tag of event.tags) {
      tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
    }

    const ms = timestampMs(event.timestamp);
    if (ms === null) continue;

    increment(stats.eventsByHour, new Date(Math.floor(ms / HOUR_MS) * HOUR_MS).toISOString());
    if (ms < firstMs) {
      firstMs = ms;
      stats.firstEvent = event.timestamp;
    }
    if (ms > lastMs) {
      lastMs = ms;
      stats.lastEvent = event.timestamp;
    }
  }

  if (stats.firstEvent !== null) stats.timeRangeMs = lastMs - firstMs;

  // Stable sort: equally frequent tags keep first-seen order.
  stats.topTags = [...tagCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_TAGS_LIMIT)
    .map(([tag]) => tag);

  return stats;
}

/** Milliseconds since the epoch, or `null` for an unparseable timestamp. */
export function timestampMs(timestamp: string): number | null {
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? null : ms;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}
