import { describe, it, expect } from 'vitest';
import {
  collectTechniqueIds,
  extractTechniqueIds,
  mapToMitre,
} from '@/mapping/mitre-mapper.js';
import { AnalysisError } from '@/orchestration/errors.js';
import { makeDetail, makeMatch, makeReference } from '../../helpers/fakes.js';

const reference = makeReference();

describe('extractTechniqueIds', () => {
  it('should find technique and sub-technique ids case-insensitively', () => {
    expect(extractTechniqueIds('ran t1059.001 then T1486')).toEqual(['T1059.001', 'T1486']);
  });

  it('should ignore ids embedded in longer tokens or digit runs', () => {
    expect(extractTechniqueIds('T10590 XT1059 t1078.003')).toEqual(['T1078.003']);
  });

  it('should return an empty list for text without ids', () => {
    expect(extractTechniqueIds('Failed password for root')).toEqual([]);
  });
});

describe('collectTechniqueIds', () => {
  it('should read explicit ids, then metadata, then content, then context', () => {
    const match = makeMatch({
      mitreAttackIds: [' t1078 '],
      metadata: {
        reference: { kind: 'string', value: 'see T1053.005' },
        score: { kind: 'number', value: 1059 },
      },
      matches: [
        makeDetail({ matchedContent: 'powershell T1059.001', context: 'ctx T1486' }),
      ],
    });

    expect(collectTechniqueIds(match)).toEqual(['T1078', 'T1053.005', 'T1059.001', 'T1486']);
  });

  it('should scan every detail content before any detail context', () => {
    const match = makeMatch({
      matches: [
        makeDetail({ matchedContent: 'A T1110', context: 'c T1070' }),
        makeDetail({ matchedContent: 'B T1486', context: 'nothing here' }),
      ],
    });

    expect(collectTechniqueIds(match)).toEqual(['T1110', 'T1486', 'T1070']);
  });

  it('should skip blank explicit ids', () => {
    expect(collectTechniqueIds(makeMatch({ mitreAttackIds: ['  ', 'T1110'] }))).toEqual(['T1110']);
  });

  it('should drop explicit ids that are not technique or sub-technique ids', () => {
    const match = makeMatch({
      mitreAttackIds: ['T1059.001.002', 'attack.execution', 'T105', 't1053.005'],
    });

    expect(collectTechniqueIds(match)).toEqual(['T1053.005']);
  });
});

describe('mapToMitre', () => {
  it('should return an empty mapping for no matches', () => {
    const result = mapToMitre([], reference);

    expect(result.techniques).toEqual([]);
    expect(result.tactics).toEqual([]);
    expect(result.killChainPhases).toEqual([]);
    expect(result.techniqueFrequency).toEqual({});
    expect(result.statistics.totalTechniques).toBe(0);
    expect(result.statistics.overallThreatScore).toBe(0);
  });

  it('should fold a sub-technique into its parent technique', () => {
    const result = mapToMitre(
      [makeMatch({ confidence: 0.9, mitreAttackIds: ['T1059', 'T1059.001'] })],
      reference,
    );

    expect(result.techniques).toHaveLength(1);
    const [technique] = result.techniques;
    expect(technique?.id).toBe('T1059');
    expect(technique?.name).toBe('Command and Scripting Interpreter');
    expect(technique?.tactics).toEqual(['Execution']);
    expect(technique?.matchCount).toBe(2);
    expect(technique?.confidence).toBe(0.9);
    expect(technique?.evidence).toEqual(["Rule 'Failed password' matched: Failed password for root"]);
    expect(technique?.subTechniques).toEqual([
      {
        id: 'T1059.001',
        name: 'PowerShell',
        confidence: 0.9,
        matchCount: 1,
        evidence: ["Rule 'Failed password' matched: Failed password for root"],
      },
    ]);

    expect(result.techniqueFrequency).toEqual({ T1059: 1, 'T1059.001': 1 });
    expect(result.tacticFrequency).toEqual({ Execution: 2 });
    expect(result.tactics).toEqual([
      {
        id: 'TA0002',
        name: 'Execution',
        shortName: 'execution',
        techniqueIds: ['T1059'],
        techniqueCount: 1,
      },
    ]);
    expect(result.statistics.totalSubTechniques).toBe(1);
    expect(result.statistics.overallThreatScore).toBeCloseTo(80);
  });

  it('should build no techniques from malformed explicit ids', () => {
    const result = mapToMitre(
      [makeMatch({ mitreAttackIds: ['T1059.001.002', 'attack.execution'] })],
      reference,
    );

    expect(result.techniques).toEqual([]);
    expect(result.techniqueFrequency).toEqual({});
    expect(result.statistics.totalSubTechniques).toBe(0);
  });

  it('should give unknown techniques a placeholder name and the neutral severity', () => {
    const result = mapToMitre([makeMatch({ mitreAttackIds: ['T9999'] })], reference);

    expect(result.techniques[0]?.name).toBe('Technique T9999');
    expect(result.techniques[0]?.tactics).toEqual([]);
    expect(result.tactics).toEqual([]);
    expect(result.statistics.overallThreatScore).toBe(50);
  });

  it('should keep the highest confidence and deduplicate evidence', () => {
    const result = mapToMitre(
      [
        makeMatch({ confidence: 0.4, mitreAttackIds: ['T1110'] }),
        makeMatch({ confidence: 0.7, mitreAttackIds: ['T1110'] }),
      ],
      reference,
    );

    const technique = result.techniques[0];
    expect(technique?.confidence).toBe(0.7);
    expect(technique?.matchCount).toBe(2);
    expect(technique?.evidence).toHaveLength(1);
  });

  it('should record no evidence for matches without details', () => {
    const result = mapToMitre([makeMatch({ matches: [], mitreAttackIds: ['T1486'] })], reference);
    expect(result.techniques[0]?.evidence).toEqual([]);
  });

  it('should order kill chain phases by tactic order', () => {
    const result = mapToMitre([makeMatch({ mitreAttackIds: ['T1486', 'T1053'] })], reference);

    expect(result.tactics.map((t) => t.name)).toEqual([
      'Impact',
      'Execution',
      'Persistence',
      'Privilege Escalation',
    ]);
    expect(result.killChainPhases).toEqual([
      'Execution',
      'Persistence',
      'Privilege Escalation',
      'Impact',
    ]);
  });

  it('should average technique confidence per tactic and weight the overall score', () => {
    const result = mapToMitre(
      [
        makeMatch({ confidence: 0.6, mitreAttackIds: ['T1078'] }),
        makeMatch({ confidence: 1, mitreAttackIds: ['T1053'] }),
      ],
      reference,
    );

    const { statistics } = result;
    expect(statistics.techniquesByTactic['Persistence']).toBe(2);
    expect(statistics.confidenceByTactic['Persistence']).toBeCloseTo(0.8);
    expect(statistics.confidenceByTactic['Defense Evasion']).toBeCloseTo(0.6);
    expect(statistics.highConfidenceTechniques).toEqual(['T1053']);
    // (0.6 * 67.5 + 1 * 75) / 1.6
    expect(statistics.overallThreatScore).toBeCloseTo(72.1875);
  });

  it('should list the five most frequent techniques with ties in first-seen order', () => {
    const result = mapToMitre(
      [
        makeMatch({
          mitreAttackIds: ['T1110', 'T1059', 'T1053', 'T1070', 'T1078', 'T1486', 'T1059'],
        }),
      ],
      reference,
    );

    expect(result.statistics.mostCommonTechniques).toEqual([
      'T1059',
      'T1110',
      'T1053',
      'T1070',
      'T1078',
    ]);
  });

  it('should stop with a cancelled error when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();

    let thrown: unknown = null;
    try {
      mapToMitre([makeMatch({ mitreAttackIds: ['T1110'] })], reference, {
        signal: controller.signal,
      });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AnalysisError);
    expect(thrown instanceof AnalysisError ? thrown.kind : null).toBe('cancelled');
  });
});
