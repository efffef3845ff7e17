import { pruneDanglingOverrides, resolve, summarizeOverrides } from '../../engine/overrides';
import { BaseFacts } from '../../models/Plan';
import { Override, patch, removal } from '../../models/Scenario';
import {
  DanglingOverrideReferenceError,
  IncompleteEntityError,
  InvalidOverrideValueError,
  OverlappingIntervalsError,
  UnknownOverrideFieldError,
} from '../../utils/errors';
import { householdBaseFacts } from '../fixtures/plans';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolve - base case', () => {
  it('should convert every collection to effective entities', () => {
    const entities = resolve(householdBaseFacts);

    expect(entities.assets.map((a) => a.assetId)).toEqual([1, 2, 3]);
    expect(entities.liabilities.map((l) => l.liabilityId)).toEqual([1, 2]);
    expect(entities.flows.map((f) => f.flowId)).toEqual([1, 2]);
    expect(entities.incomeStreams.map((s) => s.incomeId)).toEqual([1, 2]);
    expect(entities.assets[1].value.toString()).toBe('200000');
    expect(entities.liabilities[0].interestRate).toBeNull();
    expect(entities.liabilities[1].interestRate?.toString()).toBe('0.1');
  });

  it('should default retirement spending to zero', () => {
    expect(resolve(householdBaseFacts).assumptions.annualRetirementSpending.toString()).toBe('0');
  });

  it('should be deterministic', () => {
    expect(resolve(householdBaseFacts)).toEqual(resolve(householdBaseFacts));
  });
});

describe('resolve - scenario assumptions', () => {
  it('should take scenario values field by field', () => {
    const entities = resolve(householdBaseFacts, [], {
      defaultGrowthRate: '0.03',
      retirementAge1: 62,
      annualRetirementSpending: 20000,
    });

    expect(entities.assumptions.defaultGrowthRate.toString()).toBe('0.03');
    expect(entities.assumptions.inflationRate.toString()).toBe('0.02');
    expect(entities.assumptions.retirementAge1).toBe(62);
    expect(entities.assumptions.retirementAge2).toBe(67);
    expect(entities.assumptions.annualRetirementSpending.toString()).toBe('20000');
  });

  it('should fall back to base values for null scenario fields', () => {
    const entities = resolve(householdBaseFacts, [], { inflationRate: null });
    expect(entities.assumptions.inflationRate.toString()).toBe('0.02');
  });
});

describe('resolve - patches', () => {
  it('should let the last writer win for the same field', () => {
    const entities = resolve(householdBaseFacts, [
      patch('asset', 2, 'value', '250000'),
      patch('asset', 2, 'value', 300000),
    ]);

    expect(entities.assets[1].value.toString()).toBe('300000');
  });

  it('should apply patches to different fields independently', () => {
    const entities = resolve(householdBaseFacts, [
      patch('asset', 2, 'value', '250000'),
      patch('asset', 2, 'name', 'Rollover IRA'),
    ]);

    expect(entities.assets[1].value.toString()).toBe('250000');
    expect(entities.assets[1].name).toBe('Rollover IRA');
  });

  it('should coerce boolean tokens', () => {
    const entities = resolve(householdBaseFacts, [
      patch('asset', 3, 'includeInNestEgg', 'yes'),
      patch('flow', 2, 'applyInflation', 'OFF'),
      patch('income', 2, 'includeInNestEgg', 1),
    ]);

    expect(entities.assets[2].includeInNestEgg).toBe(true);
    expect(entities.flows[1].applyInflation).toBe(false);
    expect(entities.incomeStreams[1].includeInNestEgg).toBe(true);
  });

  it('should clear nullable fields with null tokens', () => {
    const entities = resolve(householdBaseFacts, [
      patch('liability', 2, 'interestRate', 'none'),
      patch('flow', 1, 'endYear', ''),
      patch('income', 2, 'endAge', null),
    ]);

    expect(entities.liabilities[1].interestRate).toBeNull();
    expect(entities.flows[0].endYear).toBeNull();
    expect(entities.incomeStreams[1].endAge).toBeNull();
  });

  it('should coerce integers, owners and flow types', () => {
    const entities = resolve(householdBaseFacts, [
      patch('income', 1, 'endAge', '70'),
      patch('flow', 1, 'type', 'outflow'),
      patch('asset', 1, 'owner', 'Person2'),
      patch('liability', 1, 'name', 42),
    ]);

    expect(entities.incomeStreams[0].endAge).toBe(70);
    expect(entities.flows[0].type).toBe('OUTFLOW');
    expect(entities.assets[0].owner).toBe('person2');
    expect(entities.liabilities[0].name).toBe('42');
  });

  it('should turn a growth rate patch into a fixed-rate override', () => {
    const entities = resolve(householdBaseFacts, [patch('asset', 1, 'growthRate', '0.07')]);
    const growth = entities.assets[0].growth;

    expect(growth.type).toBe('OVERRIDE');
    if (growth.type === 'OVERRIDE') {
      expect(growth.rate.toString()).toBe('0.07');
    }
  });

  it('should restore default growth with the "default" token', () => {
    const entities = resolve(householdBaseFacts, [patch('asset', 2, 'growthRate', 'default')]);
    expect(entities.assets[1].growth).toEqual({ type: 'DEFAULT' });
  });

  it('should not mutate base facts', () => {
    const before = JSON.stringify(householdBaseFacts);

    const entities = resolve(householdBaseFacts, [
      patch('asset', 1, 'value', '1'),
      patch('flow', 1, 'annualAmount', '99'),
      removal('liability', 2),
    ]);

    expect(JSON.stringify(householdBaseFacts)).toBe(before);
    expect(entities.assets[0].value.toString()).toBe('1');
    expect(resolve(householdBaseFacts).assets[0].value.toString()).toBe('100000');
  });
});

describe('resolve - removals', () => {
  it('should drop removed entities and keep base order', () => {
    const entities = resolve(householdBaseFacts, [removal('asset', 2)]);
    expect(entities.assets.map((a) => a.assetId)).toEqual([1, 3]);
  });

  it('should dominate patches regardless of list position', () => {
    const entities = resolve(householdBaseFacts, [
      patch('asset', 1, 'value', '1'),
      removal('asset', 1),
      patch('asset', 1, 'value', '2'),
    ]);

    expect(entities.assets.map((a) => a.assetId)).toEqual([2, 3]);
  });

  it('should ignore uncoercible patches to a removed entity', () => {
    const entities = resolve(householdBaseFacts, [removal('flow', 1), patch('flow', 1, 'startYear', 'soon')]);
    expect(entities.flows.map((f) => f.flowId)).toEqual([2]);
  });
});

describe('resolve - faults', () => {
  it('should reject an override targeting a missing entity', () => {
    const error = thrownBy(() => resolve(householdBaseFacts, [patch('asset', 1, 'value', 5), patch('asset', 99, 'value', 5)]));

    expect(error).toBeInstanceOf(DanglingOverrideReferenceError);
    expect(error).toMatchObject({
      code: 'DANGLING_OVERRIDE_REFERENCE',
      context: { entity: 'asset', id: 99, overrideIndex: 1 },
    });
  });

  it('should reject a removal of a missing entity', () => {
    expect(() => resolve(householdBaseFacts, [removal('income', 7)])).toThrow(DanglingOverrideReferenceError);
  });

  it('should reject a field the entity kind does not have', () => {
    const error = thrownBy(() => resolve(householdBaseFacts, [patch('asset', 1, 'interestRate', '0.05')]));

    expect(error).toBeInstanceOf(UnknownOverrideFieldError);
    expect(error).toMatchObject({ context: { entity: 'asset', field: 'interestRate', overrideIndex: 0 } });
  });

  it('should reject unknown fields even on removed entities', () => {
    expect(() => resolve(householdBaseFacts, [removal('asset', 1), patch('asset', 1, 'color', 'red')])).toThrow(
      UnknownOverrideFieldError
    );
  });

  it('should reject a value that cannot be coerced', () => {
    const run = () => resolve(householdBaseFacts, [patch('asset', 1, 'value', 'lots')]);

    expect(run).toThrow(InvalidOverrideValueError);
    expect(run).toThrow('Override #0 value "lots" is not valid for asset field "value"');
  });

  it('should reject an unknown boolean token', () => {
    expect(() => resolve(householdBaseFacts, [patch('flow', 1, 'applyInflation', 'maybe')])).toThrow(
      InvalidOverrideValueError
    );
  });

  it('should reject a fractional year', () => {
    expect(() => resolve(householdBaseFacts, [patch('flow', 1, 'startYear', 2025.5)])).toThrow(InvalidOverrideValueError);
  });
});

describe('resolve - base facts validation', () => {
  function withAssets(assets: BaseFacts['assets']): BaseFacts {
    return { ...householdBaseFacts, assets };
  }

  it('should reject a non-numeric value', () => {
    const facts = withAssets([{ ...householdBaseFacts.assets[0], value: 'abc' }]);
    expect(() => resolve(facts)).toThrow('asset 1: field "value" is not numeric');
  });

  it('should reject duplicate ids', () => {
    const facts = withAssets([householdBaseFacts.assets[0], householdBaseFacts.assets[0]]);
    expect(() => resolve(facts)).toThrow(IncompleteEntityError);
  });

  it('should reject overlapping stepwise intervals', () => {
    const facts = withAssets([
      {
        ...householdBaseFacts.assets[0],
        growth: {
          type: 'STEPWISE',
          intervals: [
            { startYear: 2025, endYear: 2028, rate: '0.05' },
            { startYear: 2028, endYear: 2030, rate: '0.04' },
          ],
        },
      },
    ]);
    expect(() => resolve(facts)).toThrow(OverlappingIntervalsError);
  });
});

describe('summarizeOverrides', () => {
  it('should count overrides per entity kind and removals', () => {
    const overrides: Override[] = [patch('asset', 1, 'value', 1), removal('asset', 2), patch('flow', 1, 'name', 'x')];

    expect(summarizeOverrides(overrides)).toEqual({ asset: 2, liability: 0, flow: 1, income: 0, removals: 1 });
  });
});

describe('pruneDanglingOverrides', () => {
  it('should split overrides by whether their target exists', () => {
    const overrides: Override[] = [
      patch('asset', 1, 'value', 1),
      patch('asset', 9, 'value', 1),
      removal('income', 2),
      removal('liability', 5),
    ];

    const { kept, dropped } = pruneDanglingOverrides(householdBaseFacts, overrides);

    expect(kept).toEqual([overrides[0], overrides[2]]);
    expect(dropped).toEqual([overrides[1], overrides[3]]);
  });
});
