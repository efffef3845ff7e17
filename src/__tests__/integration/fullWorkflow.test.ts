import * as fs from 'fs';
import * as path from 'path';
import { ProjectionPlanner } from '../../planner/scenarioComparator';
import { serializeComparison } from '../../utils/serialization';
import { CompareRequestSchema } from '../../utils/validation';

function loadExamplePlan() {
  const raw = fs.readFileSync(path.join(__dirname, '../../../example-plan.json'), 'utf-8');
  const parsed = CompareRequestSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`example-plan.json is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

describe('Full projection workflow', () => {
  const { household, plan, scenarios } = loadExamplePlan();
  const planner = new ProjectionPlanner({ household, plan });
  const comparison = planner.compare(scenarios);

  it('should validate the example input', () => {
    expect(plan.baseFacts.assets).toHaveLength(3);
    expect(scenarios).toHaveLength(2);
  });

  it('should cover the plan window for every series', () => {
    // person1 born 1965, final age 92
    expect(comparison.startYear).toBe(2025);
    expect(comparison.endYear).toBe(2057);
    expect(comparison.years).toHaveLength(33);
    expect(comparison.base.points).toHaveLength(33);
    for (const scenario of comparison.scenarios) {
      expect(scenario.series.points).toHaveLength(33);
      expect(scenario.series.window.startYear).toBe(2025);
      expect(scenario.series.window.endYear).toBe(2057);
    }
  });

  it('should give each scenario its own retirement year', () => {
    expect(comparison.base.window.retirementYear).toBe(2030);
    expect(comparison.scenarios[0].series.window.retirementYear).toBe(2027);
    expect(comparison.scenarios[1].series.window.retirementYear).toBe(2030);
  });

  it('should compute the first year from stored values', () => {
    // brokerage 450000 * 1.06, 401(k) 620000 * 1.07, contributions 30000 * 1.06
    expect(comparison.base.points[0].nestEgg.toFixed(2)).toBe('1172200.00');
    // plus residence 700000 * 1.03, minus mortgage 180000
    expect(comparison.base.points[0].netWorth.toFixed(2)).toBe('1713200.00');
  });

  it('should count the downsized home in the nest egg', () => {
    const downsize = comparison.scenarios[1];
    // residence 721000 now included and the mortgage removed
    expect(downsize.series.points[0].nestEgg.toFixed(2)).toBe('1893200.00');
    expect(downsize.series.points[0].netWorth.toFixed(2)).toBe('1893200.00');
  });

  it('should serialize every amount as a fixed-place string', () => {
    const serialized = serializeComparison(comparison);

    expect(serialized.base.points[0]).toEqual({ year: 2025, nestEgg: '1172200.00', netWorth: '1713200.00' });
    expect(serialized.scenarios.map((s) => s.name)).toEqual(['Retire at 62', 'Downsize home']);
    for (const scenario of serialized.scenarios) {
      expect(scenario.finalNestEggDelta).toMatch(/^-?\d+\.\d{2}$/);
    }
  });

  it('should produce identical results on a second run', () => {
    expect(planner.compare(scenarios)).toEqual(comparison);
  });
});
