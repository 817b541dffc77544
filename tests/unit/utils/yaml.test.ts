import { describe, it, expect } from 'vitest';
import { parseYaml } from '@/utils/yaml.js';

describe('parseYaml', () => {
  it('returns the parsed document', () => {
    expect(parseYaml('rules:\n  - id: r1\n    confidence: 0.5\n')).toEqual({
      valid: true,
      data: { rules: [{ id: 'r1', confidence: 0.5 }] },
    });
  });

  it('returns the syntax error for malformed YAML', () => {
    const result = parseYaml('rules: [\n');

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.error.length).toBeGreaterThan(0);
  });
});
