/**
 * IOC extractor.
 *
 * Regex-based indicator extraction over parsed log events and the raw
 * artifact.  Every event is scanned through its raw line, its message and its
 * string fields; the raw artifact is scanned last and only contributes
 * indicators no event carried.  Indicators are deduplicated per type,
 * case-insensitively, and remember the first and last time they were seen.
 *
 * Supported IOC types:
 *   IPv4, domains, URLs, emails, MD5, SHA1, SHA256,
 *   Windows/Linux file paths, registry keys, CVE IDs
 */

import type { Ioc, IocType } from '../types/ioc.js';
import type { LogEvent } from '../types/log-event.js';
import { throwIfCancelled } from '../orchestration/errors.js';
import { timestampMs } from '../timeline/statistics.js';
import { detectHashType } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ioc-extractor');

// ---------------------------------------------------------------------------
// Regex Patterns
// ---------------------------------------------------------------------------

const OCTET = '(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';
const IPV4_PATTERN = new RegExp(`\\b(?:${OCTET}\\.){3}${OCTET}\\b`, 'g');

const URL_PATTERN = /\b(?:https?|ftp):\/\/[^\s<>"'`{}|\\^]+/gi;
const URL_HOST = /^[a-z]+:\/\/(?:[^@/?#]*@)?([^:/?#]+)/i;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const DOMAIN_TLDS = [
  'com', 'net', 'org', 'io', 'info', 'biz', 'xyz', 'top', 'ru', 'cn', 'de',
  'uk', 'fr', 'nl', 'cc', 'tk', 'pw', 'club', 'online', 'site', 'tech',
  'store', 'app', 'dev', 'cloud', 'co', 'me', 'pro', 'eu', 'gov', 'mil', 'edu',
];
const DOMAIN_PATTERN = new RegExp(
  `\\b(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\\.)+(?:${DOMAIN_TLDS.join('|')})\\b`,
  'gi',
);

// MD5 (32 hex), SHA1 (40 hex), SHA256 (64 hex)
const HASH_PATTERN = /\b(?:[a-f0-9]{64}|[a-f0-9]{40}|[a-f0-9]{32})\b/gi;

const WINDOWS_PATH = /\b[A-Za-z]:\\(?:[^\s<>"|?*:\\]+\\)*[^\s<>"|?*:\\]+\.[A-Za-z0-9]{1,10}(?![A-Za-z0-9])/g;

const LINUX_PATH =
  /(?<=^|[\s,;|("'[=])\/(?:usr|etc|var|tmp|opt|home|root|bin|sbin|dev|proc|sys|run|mnt|media)\/[^\s<>"'|]+/g;

const REGISTRY_KEY =
  /\b(?:HKEY_LOCAL_MACHINE|HKEY_CURRENT_USER|HKEY_CLASSES_ROOT|HKEY_USERS|HKEY_CURRENT_CONFIG|HKLM|HKCU|HKCR|HKU|HKCC)\\[^\s<>"']+/gi;

const CVE_PATTERN = /\bCVE-\d{4}-\d{4,}\b/gi;

const TRAILING_PUNCTUATION = /[.,;:!?)\]]+$/;

// Unspecified, broadcast, multicast and reserved ranges
const BENIGN_IP_PREFIXES = ['0.', '255.', '224.', '240.'];

// ---------------------------------------------------------------------------
// Extraction context window
// ---------------------------------------------------------------------------

const CONTEXT_CHARS = 50;

function extractContext(text: string, matchIndex: number, matchLength: number): string {
  const start = Math.max(0, matchIndex - CONTEXT_CHARS);
  const end = Math.min(text.length, matchIndex + matchLength + CONTEXT_CHARS);
  let context = text.substring(start, end).trim();
  if (start > 0) context = '...' + context;
  if (end < text.length) context = context + '...';
  return context.replace(/\n+/g, ' ');
}

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface IocExtractionOptions {
  /** Keep RFC 1918, loopback and link-local addresses. Default: true */
  includePrivateIps?: boolean;
  /** Maximum IOCs kept per type. Default: 500 */
  maxPerType?: number;
  signal?: AbortSignal;
}

/** One indicator found in a piece of text. */
export interface IocCandidate {
  value: string;
  type: IocType;
  index: number;
  length: number;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract deduplicated indicators from parsed events and the raw artifact.
 *
 * Throws `AnalysisError('cancelled')` when `signal` aborts between events.
 */
export function extractIocs(
  events: readonly LogEvent[],
  rawContent: string,
  options: IocExtractionOptions = {},
): Ioc[] {
  const { includePrivateIps = true, maxPerType = 500, signal } = options;
  const collector = new IocCollector(maxPerType);

  for (const event of events) {
    throwIfCancelled(signal);

    const texts = [
      event.raw,
      event.message,
      ...Object.values(event.fields).filter((value): value is string => typeof value === 'string'),
    ];
    const timestamp = timestampMs(event.timestamp) === null ? null : event.timestamp;
    const sighting: Sighting = {
      source: event.source || 'unknown',
      lineNumber: event.lineNumber,
      timestamp,
    };

    const seenInEvent = new Set<string>();
    for (const text of texts) {
      for (const candidate of findIocs(text, { includePrivateIps })) {
        const key = iocKey(candidate);
        if (seenInEvent.has(key)) continue;
        seenInEvent.add(key);
        collector.record(candidate, text, sighting);
      }
    }
  }

  throwIfCancelled(signal);
  for (const candidate of findIocs(rawContent, { includePrivateIps })) {
    collector.addIfNew(candidate, rawContent);
  }

  const iocs = collector.result();
  logger.debug(`Extracted ${iocs.length} unique IOCs from ${events.length} events`);
  return iocs;
}

/**
 * Every indicator in `text`, grouped by type in a fixed order and in text
 * order within a type.  Repeats are kept.
 */
export function findIocs(
  text: string,
  options: Pick<IocExtractionOptions, 'includePrivateIps'> = {},
): IocCandidate[] {
  const { includePrivateIps = true } = options;
  const results: IocCandidate[] = [];

  const add = (value: string, type: IocType, index: number, length: number = value.length): void => {
    results.push({ value, type, index, length });
  };

  // --- IPv4 addresses ---
  for (const match of text.matchAll(IPV4_PATTERN)) {
    const value = match[0];
    if (BENIGN_IP_PREFIXES.some((prefix) => value.startsWith(prefix))) continue;
    if (!includePrivateIps && isPrivateIp(value)) continue;
    add(value, 'ipv4', match.index ?? 0);
  }

  // --- URLs and emails; domains inside them are not reported on their own ---
  const covered: Array<[number, number]> = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const value = match[0].replace(TRAILING_PUNCTUATION, '');
    if (!URL_HOST.test(value)) continue;
    const index = match.index ?? 0;
    covered.push([index, index + value.length]);
    add(value, 'url', index);
  }

  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const index = match.index ?? 0;
    covered.push([index, index + match[0].length]);
    add(match[0], 'email', index);
  }

  // --- Domains ---
  for (const match of text.matchAll(DOMAIN_PATTERN)) {
    const index = match.index ?? 0;
    if (covered.some(([start, end]) => index >= start && index < end)) continue;
    add(match[0].toLowerCase(), 'domain', index, match[0].length);
  }

  // --- Hashes ---
  for (const match of text.matchAll(HASH_PATTERN)) {
    const value = match[0];
    const hashType = detectHashType(value);
    if (!hashType) continue;
    // Skip values that are all one character
    if (/^(.)\1+$/.test(value)) continue;
    add(value.toLowerCase(), hashType, match.index ?? 0, value.length);
  }

  // --- File paths ---
  for (const match of text.matchAll(WINDOWS_PATH)) {
    add(match[0], 'filepath_windows', match.index ?? 0);
  }

  for (const match of text.matchAll(LINUX_PATH)) {
    const value = match[0].replace(TRAILING_PUNCTUATION, '');
    add(value, 'filepath_linux', match.index ?? 0);
  }

  // --- Registry keys (JSON-escaped separators collapse to one) ---
  for (const match of text.matchAll(REGISTRY_KEY)) {
    const raw = match[0].replace(TRAILING_PUNCTUATION, '');
    add(raw.replace(/\\+/g, '\\'), 'registry_key', match.index ?? 0, raw.length);
  }

  // --- CVE IDs ---
  for (const match of text.matchAll(CVE_PATTERN)) {
    add(match[0].toUpperCase(), 'cve', match.index ?? 0, match[0].length);
  }

  return results;
}

export function isPrivateIp(ip: string): boolean {
  const [a = -1, b = -1] = ip.split('.').map(Number);
  return (
    a === 10 ||
    a === 127 ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    (a === 169 && b === 254)
  );
}

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

interface Sighting {
  source: string;
  lineNumber: number | null;
  timestamp: string | null;
}

const CONTENT_SIGHTING: Sighting = { source: 'content', lineNumber: null, timestamp: null };

function iocKey(candidate: IocCandidate): string {
  return `${candidate.type}:${candidate.value.toLowerCase()}`;
}

class IocCollector {
  private readonly iocs = new Map<string, Ioc>();
  private readonly typeCounts: Partial<Record<IocType, number>> = {};

  constructor(private readonly maxPerType: number) {}

  /** Add a new indicator, or count another sighting of a known one. */
  record(candidate: IocCandidate, text: string, sighting: Sighting): void {
    const existing = this.iocs.get(iocKey(candidate));
    if (!existing) {
      this.add(candidate, text, sighting);
      return;
    }

    existing.occurrences += 1;
    const { timestamp } = sighting;
    if (timestamp === null) return;

    const seen = timestampMs(timestamp);
    const first = existing.firstSeen === null ? null : timestampMs(existing.firstSeen);
    const last = existing.lastSeen === null ? null : timestampMs(existing.lastSeen);
    if (seen === null) return;
    if (first === null || seen < first) existing.firstSeen = timestamp;
    if (last === null || seen > last) existing.lastSeen = timestamp;
  }

  addIfNew(candidate: IocCandidate, text: string): void {
    if (!this.iocs.has(iocKey(candidate))) this.add(candidate, text, CONTENT_SIGHTING);
  }

  result(): Ioc[] {
    return [...this.iocs.values()];
  }

  private add(candidate: IocCandidate, text: string, sighting: Sighting): void {
    const count = this.typeCounts[candidate.type] ?? 0;
    if (count >= this.maxPerType) return;
    this.typeCounts[candidate.type] = count + 1;

    this.iocs.set(iocKey(candidate), {
      value: candidate.value,
      type: candidate.type,
      context: extractContext(text, candidate.index, candidate.length),
      source: sighting.source,
      lineNumber: sighting.lineNumber,
      firstSeen: sighting.timestamp,
      lastSeen: sighting.timestamp,
      occurrences: 1,
    });
  }
}
