/**
 * Rule pack loader.
 *
 * Reads regex rule definitions from YAML rule packs (a single file or every
 * .yml/.yaml file under a directory, recursively), validates them and
 * compiles their patterns.
 */

import { existsSync } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { MetadataValue, RuleType, Severity } from '../types/rule-match.js';
import { createLogger } from '../utils/logger.js';
import { parseYaml } from '../utils/yaml.js';
import { RuleTypeSchema, SeveritySchema } from '../orchestration/serialization.js';

const logger = createLogger('rule-loader');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const RuleDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: RuleTypeSchema.default('pattern'),
  severity: SeveritySchema,
  confidence: z.number().min(0).max(1).default(0.8),
  description: z.string().optional(),
  pattern: z.string().min(1),
  /** RegExp flags; `g` is always added. */
  flags: z.string().regex(/^[imsu]*$/).default('i'),
  /** Event field to match instead of the message. */
  field: z.string().optional(),
  mitre: z.array(z.string()).default([]),
  /** Sigma-style tags; `attack.tNNNN` entries add technique ids. */
  tags: z.array(z.string()).default([]),
  metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
  enabled: z.boolean().default(true),
});

const RulePackSchema = z.object({
  rules: z.array(RuleDefinitionSchema),
});

export type RuleDefinition = z.input<typeof RuleDefinitionSchema>;

export interface CompiledRule {
  id: string;
  name: string;
  type: RuleType;
  severity: Severity;
  confidence: number;
  field: string | null;
  regex: RegExp;
  mitreAttackIds: string[];
  metadata: Record<string, MetadataValue>;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and compile every enabled rule under `path`.  Throws on unreadable
 * packs, schema violations, invalid patterns and duplicate rule ids.
 */
export async function loadRules(path: string): Promise<CompiledRule[]> {
  const files = await collectRuleFiles(path);
  const definitions: RuleDefinition[] = [];

  for (const file of files) {
    const parsed = parseYaml(await readFile(file, 'utf-8'));
    if (!parsed.valid) {
      throw new Error(`Invalid YAML in rule pack ${file}: ${parsed.error}`);
    }
    const pack = RulePackSchema.safeParse(parsed.data);
    if (!pack.success) {
      const issues = pack.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid rule pack ${file}: ${issues}`);
    }
    definitions.push(...pack.data.rules);
  }

  const rules = compileRules(definitions);
  logger.info(`Loaded ${rules.length} rules from ${files.length} rule pack(s)`);
  return rules;
}

export function compileRules(definitions: readonly RuleDefinition[]): CompiledRule[] {
  const seen = new Set<string>();
  const rules: CompiledRule[] = [];

  for (const input of definitions) {
    const definition = RuleDefinitionSchema.parse(input);
    if (seen.has(definition.id)) {
      throw new Error(`Duplicate rule id: ${definition.id}`);
    }
    seen.add(definition.id);
    if (!definition.enabled) continue;

    let regex: RegExp;
    try {
      regex = new RegExp(definition.pattern, `${definition.flags}g`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid pattern in rule ${definition.id}: ${message}`);
    }

    const metadata: Record<string, MetadataValue> = {};
    if (definition.description) {
      metadata.description = { kind: 'string', value: definition.description };
    }
    for (const [key, value] of Object.entries(definition.metadata)) {
      metadata[key] = toMetadataValue(value);
    }

    rules.push({
      id: definition.id,
      name: definition.name,
      type: definition.type,
      severity: definition.severity,
      confidence: definition.confidence,
      field: definition.field ?? null,
      regex,
      mitreAttackIds: unique([
        ...definition.mitre.map((id) => id.trim().toUpperCase()),
        ...extractTechniques(definition.tags),
      ]),
      metadata,
    });
  }

  return rules;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract ATT&CK technique IDs from Sigma tags.
 * Tags like `attack.t1059.001` become `T1059.001`.
 */
function extractTechniques(tags: string[]): string[] {
  return tags
    .filter((tag) => /^attack\.t\d{4}/i.test(tag))
    .map((tag) => tag.replace(/^attack\./i, '').toUpperCase());
}

function toMetadataValue(value: string | number | boolean): MetadataValue {
  if (typeof value === 'number') return { kind: 'number', value };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  return { kind: 'string', value };
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * `path` itself when it is a file, otherwise every .yml/.yaml file below it.
 */
async function collectRuleFiles(path: string): Promise<string[]> {
  if (!existsSync(path)) {
    throw new Error(`Rule path not found: ${path}`);
  }
  if ((await stat(path)).isFile()) return [path];

  const results: string[] = [];
  const entries = await readdir(path, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = join(path, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await collectRuleFiles(fullPath)));
    } else if (entry.name.endsWith('.yml') || entry.name.endsWith('.yaml')) {
      results.push(fullPath);
    }
  }
  return results;
}
