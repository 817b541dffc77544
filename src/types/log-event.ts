/**
 * Parsed log events, as handed over by an evidence parser.
 */

/** Scalar values a parser may attach to an event field. */
export type FieldValue = string | number | boolean | null;

export interface LogEvent {
  timestamp: string;             // ISO-8601, UTC
  level: string;                 // e.g. "ERROR", "warning"
  source: string;                // e.g. "sshd", "Security"
  message: string;
  lineNumber: number | null;
  raw: string;
  fields: Record<string, FieldValue>;
}
