import { describe, it, expect } from 'vitest';
import {
  normalizeRuleMatch,
  calculateThreatScore,
  severityBaseScore,
  severityFromScore,
} from '@/scoring/threat-score.js';
import { makeDetail, makeMatch } from '../../helpers/fakes.js';

describe('calculateThreatScore', () => {
  it('should score an empty match list as 0 / low', () => {
    expect(calculateThreatScore([])).toEqual({ score: 0, severity: 'low' });
  });

  it('should score a single fully confident low match as 25', () => {
    const result = calculateThreatScore([makeMatch({ severity: 'low', confidence: 1 })]);
    expect(result).toEqual({ score: 25, severity: 'low' });
  });

  it('should score a single fully confident critical match as 100', () => {
    const result = calculateThreatScore([makeMatch({ severity: 'critical', confidence: 1 })]);
    expect(result).toEqual({ score: 100, severity: 'critical' });
  });

  it('should weight each match by its match count', () => {
    // (100 * 1 + 25 * 3) / 4 = 43.75
    const result = calculateThreatScore([
      makeMatch({ severity: 'critical', matchCount: 1 }),
      makeMatch({ severity: 'low', matchCount: 3 }),
    ]);
    expect(result).toEqual({ score: 43, severity: 'medium' });
  });

  it('should scale contributions by confidence and truncate', () => {
    // 75 * 2 * 0.5 / 2 = 37.5
    const result = calculateThreatScore([
      makeMatch({ severity: 'high', matchCount: 2, confidence: 0.5 }),
    ]);
    expect(result).toEqual({ score: 37, severity: 'medium' });
  });

  it('should not decrease when a higher severity match is added', () => {
    const low = calculateThreatScore([makeMatch({ severity: 'low' })]);
    const mixed = calculateThreatScore([
      makeMatch({ severity: 'low' }),
      makeMatch({ severity: 'critical' }),
    ]);
    expect(mixed.score).toBe(62);
    expect(mixed.score).toBeGreaterThanOrEqual(low.score);
    expect(mixed.severity).toBe('high');
  });

  it('should clamp degenerate confidence and match counts', () => {
    expect(calculateThreatScore([makeMatch({ severity: 'high', confidence: Number.NaN })]).score).toBe(0);
    expect(calculateThreatScore([makeMatch({ severity: 'high', confidence: 7 })]).score).toBe(75);
    expect(calculateThreatScore([makeMatch({ severity: 'high', confidence: -1 })]).score).toBe(0);
    expect(calculateThreatScore([makeMatch({ severity: 'medium', matchCount: 0 })]).score).toBe(50);
  });

  it('should keep every score within 0..100', () => {
    const matches = Array.from({ length: 20 }, (_, i) =>
      makeMatch({ severity: 'critical', matchCount: i + 1, confidence: 1 }),
    );
    const { score } = calculateThreatScore(matches);
    expect(score).toBe(100);
  });
});

describe('severityBaseScore', () => {
  it('should map known severities case-insensitively', () => {
    expect(severityBaseScore('critical')).toBe(100);
    expect(severityBaseScore('HIGH')).toBe(75);
    expect(severityBaseScore('Medium')).toBe(50);
    expect(severityBaseScore('low')).toBe(25);
  });

  it('should fall back to 10 for unknown severities', () => {
    expect(severityBaseScore('informational')).toBe(10);
    expect(severityBaseScore('')).toBe(10);
  });
});

describe('severityFromScore', () => {
  it('should apply the label thresholds', () => {
    expect(severityFromScore(100)).toBe('critical');
    expect(severityFromScore(80)).toBe('critical');
    expect(severityFromScore(79)).toBe('high');
    expect(severityFromScore(60)).toBe('high');
    expect(severityFromScore(59)).toBe('medium');
    expect(severityFromScore(30)).toBe('medium');
    expect(severityFromScore(29)).toBe('low');
    expect(severityFromScore(0)).toBe('low');
  });
});

describe('normalizeRuleMatch', () => {
  it('should clamp confidences and match counts on the match and its details', () => {
    const match = makeMatch({
      matchCount: Number.NaN,
      confidence: Number.POSITIVE_INFINITY,
      matches: [
        makeDetail({
          confidence: Number.NaN,
          offset: Number.POSITIVE_INFINITY,
          lineNumber: 4,
          fields: { pid: Number.NaN, user: 'root' },
        }),
      ],
    });

    const normalized = normalizeRuleMatch(match);

    expect(normalized.matchCount).toBe(1);
    expect(normalized.confidence).toBe(1);
    expect(normalized.matches[0]).toMatchObject({
      confidence: 0,
      offset: null,
      lineNumber: 4,
      fields: { pid: null, user: 'root' },
    });
  });

  it('should drop non-finite numeric metadata and keep the rest', () => {
    const normalized = normalizeRuleMatch(
      makeMatch({
        metadata: {
          weight: { kind: 'number', value: Number.NaN },
          author: { kind: 'string', value: 'soc' },
        },
      }),
    );

    expect(normalized.metadata).toEqual({ author: { kind: 'string', value: 'soc' } });
  });

  it('should leave the input untouched', () => {
    const match = makeMatch({ confidence: 7 });

    normalizeRuleMatch(match);

    expect(match.confidence).toBe(7);
  });
});
