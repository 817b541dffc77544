import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PatternRuleEngine } from '@/rules/pattern-engine.js';
import type { RuleDefinition } from '@/rules/loader.js';
import { DEFAULT_RULES_PATH } from '@/config.js';
import { AnalysisError } from '@/orchestration/errors.js';
import { makeLogEvent } from '../../helpers/fakes.js';

const SSH_FAILURE: RuleDefinition = {
  id: 'ssh-fail',
  name: 'SSH failure',
  severity: 'medium',
  confidence: 0.7,
  pattern: 'failed password for \\S+',
  mitre: ['T1110.001'],
};

describe('PatternRuleEngine', () => {
  describe('event matching', () => {
    it('should produce one result per rule with a detail per matching event', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);
      const events = [
        makeLogEvent({ message: 'Failed password for root from 192.0.2.10', lineNumber: 1, raw: 'raw-1' }),
        makeLogEvent({ message: 'Accepted publickey for deploy', lineNumber: 2 }),
        makeLogEvent({
          message: 'failed password for admin',
          lineNumber: 3,
          raw: 'raw-3',
          fields: { pid: 7 },
          timestamp: '2024-03-01T11:00:00.000Z',
        }),
      ];

      const results = await engine.process({ analysisId: 'a1', events, rawContent: '' });

      expect(results).toEqual([
        {
          ruleId: 'ssh-fail',
          ruleName: 'SSH failure',
          ruleType: 'pattern',
          severity: 'medium',
          matchCount: 2,
          confidence: 0.7,
          matches: [
            {
              matchedContent: 'Failed password for root',
              offset: null,
              lineNumber: 1,
              context: 'raw-1',
              fields: {},
              timestamp: '2024-03-01T10:00:00.000Z',
              confidence: 0.7,
            },
            {
              matchedContent: 'failed password for admin',
              offset: null,
              lineNumber: 3,
              context: 'raw-3',
              fields: { pid: 7 },
              timestamp: '2024-03-01T11:00:00.000Z',
              confidence: 0.7,
            },
          ],
          mitreAttackIds: ['T1110.001'],
          metadata: {},
        },
      ]);
    });

    it('should match a named field instead of the message', async () => {
      const engine = PatternRuleEngine.fromDefinitions([
        { id: 'scanner', name: 'Scanner', severity: 'low', pattern: 'sqlmap', field: 'user_agent' },
      ]);
      const events = [
        makeLogEvent({ message: 'sqlmap in the message only' }),
        makeLogEvent({ fields: { user_agent: 'sqlmap/1.7' } }),
      ];

      const [result] = await engine.process({ analysisId: 'a1', events, rawContent: '' });

      expect(result?.matchCount).toBe(1);
      expect(result?.matches[0]?.matchedContent).toBe('sqlmap');
    });

    it('should return nothing when no rule fires', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);
      await expect(
        engine.process({ analysisId: 'a1', events: [makeLogEvent()], rawContent: '' }),
      ).resolves.toEqual([]);
    });

    it('should cap the hits recorded per rule', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE], { maxMatchesPerRule: 1 });
      const events = [
        makeLogEvent({ message: 'Failed password for root' }),
        makeLogEvent({ message: 'Failed password for admin' }),
      ];

      const [result] = await engine.process({ analysisId: 'a1', events, rawContent: '' });

      expect(result?.matchCount).toBe(1);
    });

    it('should truncate long context', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);
      const raw = `Failed password for root ${'x'.repeat(600)}`;

      const [result] = await engine.process({
        analysisId: 'a1',
        events: [makeLogEvent({ message: 'Failed password for root', raw })],
        rawContent: '',
      });

      expect(result?.matches[0]?.context).toBe(`${raw.slice(0, 500)}...`);
    });
  });

  describe('raw line matching', () => {
    it('should scan raw lines with byte offsets when there are no events', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);

      const [result] = await engine.process({
        analysisId: 'a1',
        events: [],
        rawContent: 'café ok\nsshd: Failed password for root  \n',
      });

      expect(result?.matches).toEqual([
        {
          matchedContent: 'Failed password for root',
          offset: 15,
          lineNumber: 2,
          context: 'sshd: Failed password for root',
          fields: {},
          timestamp: null,
          confidence: 0.7,
        },
      ]);
    });
  });

  it('should stop when the signal is aborted', async () => {
    const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      engine.process({ analysisId: 'a1', events: [], rawContent: 'x', signal: controller.signal }),
    ).rejects.toBeInstanceOf(AnalysisError);
  });

  describe('rule sets', () => {
    let dir: string | null = null;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = null;
    });

    it('should keep its rules on reload without a rules path', async () => {
      const engine = PatternRuleEngine.fromDefinitions([SSH_FAILURE]);
      await engine.reload();
      expect(engine.ruleCount).toBe(1);
    });

    it('should pick up rule pack changes on reload', async () => {
      dir = await mkdtemp(join(tmpdir(), 'threatline-engine-'));
      const file = join(dir, 'pack.yaml');
      await writeFile(file, 'rules:\n  - id: a\n    name: A\n    severity: low\n    pattern: a\n');

      const engine = await PatternRuleEngine.fromPath(file);
      expect(engine.ruleCount).toBe(1);

      await writeFile(
        file,
        'rules:\n  - id: a\n    name: A\n    severity: low\n    pattern: a\n  - id: b\n    name: B\n    severity: low\n    pattern: b\n',
      );
      await engine.reload();
      expect(engine.ruleCount).toBe(2);
    });

    it('should flag an SSH brute-force line with the bundled rules', async () => {
      const engine = await PatternRuleEngine.fromPath(DEFAULT_RULES_PATH);

      const results = await engine.process({
        analysisId: 'a1',
        events: [],
        rawContent: 'Mar  1 10:00:00 host sshd[1]: Failed password for invalid user admin from 192.0.2.1',
      });

      expect(engine.ruleCount).toBe(10);
      expect(results.map((r) => [r.ruleId, r.matches[0]?.matchedContent])).toEqual([
        ['auth-failed-password', 'Failed password for invalid user admin'],
        ['auth-invalid-user', 'invalid user admin'],
      ]);
    });
  });
});
