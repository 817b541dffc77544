import { describe, it, expect } from 'vitest';
import { ParserRegistry, createDefaultParserRegistry } from '@/ingestion/parser-registry.js';
import { StubParser } from '../../helpers/fakes.js';

const EMPTY = { success: true as const, events: [] };

function parser(id: string, extension: string): StubParser {
  return new StubParser(id, EMPTY, (fileName) => fileName.endsWith(extension));
}

describe('ParserRegistry', () => {
  it('should order parsers by ascending priority, keeping registration order on ties', () => {
    const registry = new ParserRegistry()
      .register(parser('late', '.log'), 50)
      .register(parser('early', '.log'), 10)
      .register(parser('also-late', '.log'), 50);

    expect(registry.list().map((p) => p.id)).toEqual(['early', 'late', 'also-late']);
  });

  it('should replace a parser registered under the same id', () => {
    const replacement = parser('csv', '.tsv');
    const registry = new ParserRegistry().register(parser('csv', '.csv')).register(replacement);

    expect(registry.list()).toEqual([replacement]);
    expect(registry.get('csv')).toBe(replacement);
  });

  it('should resolve the first parser that accepts the file', async () => {
    const registry = new ParserRegistry()
      .register(parser('csv', '.csv'), 10)
      .register(parser('log', '.log'), 20);

    await expect(registry.resolve('auth.log', '')).resolves.toBe(registry.get('log'));
  });

  it('should try the preferred parser first', async () => {
    const registry = new ParserRegistry()
      .register(parser('first', '.log'), 10)
      .register(parser('second', '.log'), 20);

    await expect(registry.resolve('auth.log', '', 'second')).resolves.toBe(registry.get('second'));
  });

  it('should fall back when the preferred parser rejects the file or is unknown', async () => {
    const registry = new ParserRegistry()
      .register(parser('csv', '.csv'), 10)
      .register(parser('log', '.log'), 20);

    await expect(registry.resolve('auth.log', '', 'csv')).resolves.toBe(registry.get('log'));
    await expect(registry.resolve('auth.log', '', 'nope')).resolves.toBe(registry.get('log'));
  });

  it('should return null when no parser accepts the file', async () => {
    const registry = new ParserRegistry().register(parser('csv', '.csv'));
    await expect(registry.resolve('image.png', '')).resolves.toBeNull();
  });

  it('should bundle the JSON events parser', () => {
    expect(createDefaultParserRegistry().list().map((p) => p.id)).toEqual(['json-events']);
  });
});
