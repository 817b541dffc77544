/**
 * Indicators of compromise found in evidence.
 */

export type IocType =
  | 'ipv4'
  | 'domain'
  | 'url'
  | 'email'
  | 'md5'
  | 'sha1'
  | 'sha256'
  | 'filepath_windows'
  | 'filepath_linux'
  | 'registry_key'
  | 'cve';

export interface Ioc {
  value: string;
  type: IocType;
  context: string;               // text around the first sighting
  source: string;                // event source, or "content" for the raw artifact
  lineNumber: number | null;
  firstSeen: string | null;
  lastSeen: string | null;
  occurrences: number;           // events (plus the raw artifact) it appeared in
}
