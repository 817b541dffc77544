/**
 * YAML parsing utilities.
 * Wraps the 'yaml' package with error handling.
 */

import { parse, YAMLParseError } from 'yaml';

export type YamlParseResult =
  | { valid: true; data: unknown }
  | { valid: false; error: string };

/**
 * Parse a YAML document. Returns the parsed value or a syntax error message.
 */
export function parseYaml(input: string): YamlParseResult {
  try {
    return { valid: true, data: parse(input) };
  } catch (e) {
    if (e instanceof YAMLParseError) {
      return { valid: false, error: e.message };
    }
    throw e;
  }
}
