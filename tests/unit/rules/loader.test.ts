import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { compileRules, loadRules } from '@/rules/loader.js';
import { DEFAULT_RULES_PATH } from '@/config.js';

describe('compileRules', () => {
  it('should apply defaults to a minimal definition', () => {
    const [rule] = compileRules([{ id: 'r1', name: 'Failure', severity: 'high', pattern: 'fail' }]);

    expect(rule).toMatchObject({
      id: 'r1',
      name: 'Failure',
      type: 'pattern',
      severity: 'high',
      confidence: 0.8,
      field: null,
      mitreAttackIds: [],
      metadata: {},
    });
    expect(rule?.regex.flags).toBe('gi');
    expect(rule?.regex.source).toBe('fail');
  });

  it('should merge explicit technique ids with attack tags', () => {
    const [rule] = compileRules([
      {
        id: 'r1',
        name: 'Brute force',
        severity: 'medium',
        pattern: 'fail',
        mitre: ['t1110 ', 'T1110.001'],
        tags: ['attack.credential_access', 'attack.t1110.001', 'attack.t1078'],
      },
    ]);

    expect(rule?.mitreAttackIds).toEqual(['T1110', 'T1110.001', 'T1078']);
  });

  it('should turn description and metadata into typed metadata values', () => {
    const [rule] = compileRules([
      {
        id: 'r1',
        name: 'Brute force',
        severity: 'medium',
        pattern: 'fail',
        description: 'Repeated failures',
        metadata: { category: 'authentication', weight: 3, noisy: false },
      },
    ]);

    expect(rule?.metadata).toEqual({
      description: { kind: 'string', value: 'Repeated failures' },
      category: { kind: 'string', value: 'authentication' },
      weight: { kind: 'number', value: 3 },
      noisy: { kind: 'boolean', value: false },
    });
  });

  it('should skip disabled rules', () => {
    const rules = compileRules([
      { id: 'on', name: 'On', severity: 'low', pattern: 'a' },
      { id: 'off', name: 'Off', severity: 'low', pattern: 'b', enabled: false },
    ]);

    expect(rules.map((r) => r.id)).toEqual(['on']);
  });

  it('should reject duplicate ids', () => {
    expect(() =>
      compileRules([
        { id: 'r1', name: 'A', severity: 'low', pattern: 'a' },
        { id: 'r1', name: 'B', severity: 'low', pattern: 'b' },
      ]),
    ).toThrow('Duplicate rule id: r1');
  });

  it('should reject invalid patterns', () => {
    expect(() => compileRules([{ id: 'r1', name: 'A', severity: 'low', pattern: '(' }])).toThrow(
      /^Invalid pattern in rule r1: /,
    );
  });
});

describe('loadRules', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'threatline-rules-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load the bundled rule pack', async () => {
    const rules = await loadRules(DEFAULT_RULES_PATH);

    expect(rules).toHaveLength(10);
    expect(rules.find((r) => r.id === 'cron-modified')?.mitreAttackIds).toEqual(['T1053.003']);
  });

  it('should read every YAML file below a directory in name order', async () => {
    await mkdir(join(dir, 'nested'));
    await writeFile(
      join(dir, 'b.yaml'),
      'rules:\n  - id: b\n    name: B\n    severity: low\n    pattern: b\n',
    );
    await writeFile(
      join(dir, 'nested', 'a.yml'),
      'rules:\n  - id: a\n    name: A\n    severity: low\n    pattern: a\n',
    );
    await writeFile(join(dir, 'notes.txt'), 'not a rule pack');

    const rules = await loadRules(dir);

    expect(rules.map((r) => r.id)).toEqual(['b', 'a']);
  });

  it('should report YAML syntax errors with the pack path', async () => {
    const file = join(dir, 'broken.yaml');
    await writeFile(file, 'rules: [\n');

    await expect(loadRules(file)).rejects.toThrow(`Invalid YAML in rule pack ${file}`);
  });

  it('should report schema violations with the offending path', async () => {
    const file = join(dir, 'invalid.yaml');
    await writeFile(file, 'rules:\n  - id: r1\n    name: R\n    severity: severe\n    pattern: x\n');

    await expect(loadRules(file)).rejects.toThrow(`Invalid rule pack ${file}: rules.0.severity: `);
  });

  it('should reject a missing path', async () => {
    const missing = join(dir, 'missing');
    await expect(loadRules(missing)).rejects.toThrow(`Rule path not found: ${missing}`);
  });
});
