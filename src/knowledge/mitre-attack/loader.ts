/**
 * Loads the MITRE ATT&CK reference table (techniques, tactics and tactic
 * base severities) from disk and exposes it as a singleton so that every
 * analysis shares the same frozen data.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ReferenceData } from '../../types/collaborators.js';
import type { TacticReference, TechniqueReference } from '../../types/mitre-attack.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('attack-reference');

// ---------------------------------------------------------------------------
// File schema
// ---------------------------------------------------------------------------

const TechniqueEntrySchema = z.object({
  id: z.string().regex(/^T\d{4}(\.\d{3})?$/),
  name: z.string().min(1),
  tactics: z.array(z.string().min(1)),
});

const TacticEntrySchema = z.object({
  id: z.string().regex(/^TA\d{4}$/),
  name: z.string().min(1),
  shortName: z.string().min(1),
  severity: z.number().min(0).max(100),
  order: z.number().int(),
});

export const ReferenceFileSchema = z.object({
  version: z.string(),
  tactics: z.array(TacticEntrySchema),
  techniques: z.array(TechniqueEntrySchema),
});

export type ReferenceFile = z.infer<typeof ReferenceFileSchema>;

// ---------------------------------------------------------------------------
// AttackReferenceData
// ---------------------------------------------------------------------------

export const DEFAULT_REFERENCE_PATH = fileURLToPath(
  new URL('../../../data/mitre-attack/reference.json', import.meta.url),
);

/** Severity used for tactics the table does not know. */
export const DEFAULT_TACTIC_SEVERITY = 50;

export class AttackReferenceData implements ReferenceData {
  private static instance: AttackReferenceData | null = null;
  private static loadedPath: string | null = null;

  public readonly version: string;
  private readonly techniques: ReadonlyMap<string, TechniqueReference>;
  private readonly tactics: ReadonlyMap<string, TacticReference>;

  private constructor(file: ReferenceFile) {
    this.version = file.version;

    const techniques = new Map<string, TechniqueReference>();
    for (const entry of file.techniques) {
      techniques.set(entry.id.toUpperCase(), Object.freeze({ ...entry, tactics: [...entry.tactics] }));
    }

    // Indexed under both the display name and the short name.
    const tactics = new Map<string, TacticReference>();
    for (const entry of file.tactics) {
      const tactic = Object.freeze({ ...entry });
      tactics.set(normalizeTacticKey(entry.name), tactic);
      tactics.set(normalizeTacticKey(entry.shortName), tactic);
    }

    this.techniques = techniques;
    this.tactics = tactics;
  }

  /**
   * Load the reference table.  Returns the cached singleton when called with
   * the same `dataPath` (or the default).
   */
  static async load(dataPath?: string): Promise<AttackReferenceData> {
    const resolvedPath = dataPath ?? DEFAULT_REFERENCE_PATH;

    if (
      AttackReferenceData.instance &&
      AttackReferenceData.loadedPath === resolvedPath
    ) {
      return AttackReferenceData.instance;
    }

    const raw = await readFile(resolvedPath, 'utf-8');
    const result = ReferenceFileSchema.safeParse(JSON.parse(raw));
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid ATT&CK reference data in ${resolvedPath}: ${issues}`);
    }

    const reference = new AttackReferenceData(result.data);
    AttackReferenceData.instance = reference;
    AttackReferenceData.loadedPath = resolvedPath;

    logger.debug(
      `Loaded ${result.data.techniques.length} techniques and ${result.data.tactics.length} tactics from ${resolvedPath}`,
    );
    return reference;
  }

  /**
   * Create a reference table from an in-memory object (useful for tests).
   * Does not touch the cached singleton.
   */
  static fromData(data: ReferenceFile): AttackReferenceData {
    return new AttackReferenceData(ReferenceFileSchema.parse(data));
  }

  /**
   * Reset the singleton (primarily for tests).
   */
  static reset(): void {
    AttackReferenceData.instance = null;
    AttackReferenceData.loadedPath = null;
  }

  // -----------------------------------------------------------------------
  // ReferenceData
  // -----------------------------------------------------------------------

  getTechnique(id: string): TechniqueReference | undefined {
    return this.techniques.get(id.toUpperCase());
  }

  getTactic(nameOrShortName: string): TacticReference | undefined {
    return this.tactics.get(normalizeTacticKey(nameOrShortName));
  }

  tacticSeverity(nameOrShortName: string): number {
    return this.getTactic(nameOrShortName)?.severity ?? DEFAULT_TACTIC_SEVERITY;
  }

  get techniqueCount(): number {
    return this.techniques.size;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** "Command and Control", "command-and-control" and "command_and_control" share a key. */
function normalizeTacticKey(value: string): string {
  return value.toLowerCase().replace(/[\s_-]+/g, '');
}
