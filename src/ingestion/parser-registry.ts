/**
 * Priority-ordered parser registry.
 *
 * Parsers are tried in ascending priority order; the first whose
 * `matches()` accepts the file wins.  A preferred parser id is tried first
 * and skipped when it does not accept the file.
 */

import type { EvidenceParser, ParserResolver } from '../types/collaborators.js';
import { createLogger } from '../utils/logger.js';
import { JsonEventsParser } from './parsers/json-events.js';

const logger = createLogger('parsers');

interface RegisteredParser {
  parser: EvidenceParser;
  priority: number;
}

export class ParserRegistry implements ParserResolver {
  private readonly entries: RegisteredParser[] = [];

  /**
   * Register a parser.  Lower priorities are tried first; equal priorities
   * keep registration order.  Re-registering an id replaces the parser.
   */
  register(parser: EvidenceParser, priority = 100): this {
    const existing = this.entries.findIndex((e) => e.parser.id === parser.id);
    if (existing !== -1) this.entries.splice(existing, 1);

    this.entries.push({ parser, priority });
    this.entries.sort((a, b) => a.priority - b.priority);
    return this;
  }

  get(id: string): EvidenceParser | undefined {
    return this.entries.find((e) => e.parser.id === id)?.parser;
  }

  list(): EvidenceParser[] {
    return this.entries.map((e) => e.parser);
  }

  async resolve(
    fileName: string,
    content: string,
    preferredParserId?: string,
  ): Promise<EvidenceParser | null> {
    if (preferredParserId) {
      const preferred = this.get(preferredParserId);
      if (preferred?.matches(fileName, content)) {
        logger.info(`Using preferred parser ${preferred.name} for ${fileName}`);
        return preferred;
      }
      logger.warn(
        preferred
          ? `Preferred parser ${preferredParserId} does not accept ${fileName}; falling back`
          : `Preferred parser ${preferredParserId} is not registered; falling back`,
      );
    }

    for (const { parser } of this.entries) {
      if (parser.matches(fileName, content)) {
        logger.debug(`Selected parser ${parser.name} for ${fileName}`);
        return parser;
      }
    }

    logger.warn(`No parser accepts ${fileName}`);
    return null;
  }
}

/**
 * Registry holding the bundled parsers.
 */
export function createDefaultParserRegistry(): ParserRegistry {
  return new ParserRegistry().register(new JsonEventsParser(), 10);
}
