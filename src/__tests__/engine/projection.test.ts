import { resolve } from '../../engine/overrides';
import { project } from '../../engine/projection';
import { BaseFacts, Plan } from '../../models/Plan';
import { IncompleteEntityError, InvalidWindowError } from '../../utils/errors';
import { projectionWindow } from '../../utils/time';
import { coupleHousehold, singlePersonHousehold } from '../fixtures/households';
import { householdPlan, singleAssetPlan } from '../fixtures/plans';

const window = projectionWindow(singlePersonHousehold, singleAssetPlan);

describe('project - base case', () => {
  const series = project(resolve(singleAssetPlan.baseFacts), window);

  it('should produce one point per year of the window', () => {
    expect(series.points).toHaveLength(8);
    expect(series.points.map((p) => p.year)).toEqual([2025, 2026, 2027, 2028, 2029, 2030, 2031, 2032]);
  });

  it('should apply a full year of growth in the start year', () => {
    expect(series.points[0].nestEgg.toFixed(2)).toBe('530000.00');
    expect(series.points[1].nestEgg.toFixed(2)).toBe('561800.00');
  });

  it('should compound through the end year', () => {
    expect(series.points[4].nestEgg.toFixed(2)).toBe('669112.79');
    expect(series.points[7].nestEgg.toFixed(2)).toBe('796924.04');
    expect(series.points[7].netWorth.toFixed(2)).toBe('796924.04');
  });

  it('should return the window it projected over', () => {
    expect(series.window).toBe(window);
  });

  it('should omit the breakdown unless requested', () => {
    expect(series.breakdown).toBeUndefined();
  });
});

describe('project - retirement spending', () => {
  const entities = resolve(singleAssetPlan.baseFacts, [], { annualRetirementSpending: '20000' });
  const series = project(entities, window, { includeBreakdown: true });

  it('should leave pre-retirement years unchanged', () => {
    expect(series.points[4].nestEgg.toFixed(2)).toBe('669112.79');
  });

  it('should subtract spending before growth in the retirement year', () => {
    expect(series.points[5].year).toBe(2030);
    expect(series.points[5].nestEgg.toFixed(2)).toBe('688059.56');
  });

  it('should inflate spending after the retirement year', () => {
    expect(series.points[6].nestEgg.toFixed(2)).toBe('707549.53');
    expect(series.points[7].nestEgg.toFixed(2)).toBe('727598.68');
  });

  it('should report the per-year breakdown', () => {
    const breakdown = series.breakdown ?? [];

    expect(breakdown).toHaveLength(8);
    expect(breakdown[0].assetValues[1].toFixed(2)).toBe('530000.00');
    expect(breakdown[5].activity.retirementSpending.toFixed(2)).toBe('20000.00');
    expect(breakdown[5].nestEggCash.toFixed(2)).toBe('-21200.00');
    expect(breakdown[6].activity.retirementSpending.toFixed(2)).toBe('20560.00');
    expect(breakdown[4].activity.retirementSpending.toFixed(2)).toBe('0.00');
  });
});

describe('project - category totals', () => {
  const baseFacts: BaseFacts = {
    ...singleAssetPlan.baseFacts,
    assumptions: { ...singleAssetPlan.baseFacts.assumptions, defaultGrowthRate: '0' },
    assets: [
      { assetId: 1, name: 'Index fund', owner: 'person1', value: '1000', includeInNestEgg: true, categoryId: 10, growth: { type: 'DEFAULT' } },
      { assetId: 2, name: 'Bond fund', owner: 'person1', value: '500', includeInNestEgg: true, categoryId: 10, growth: { type: 'OVERRIDE', rate: '0.1' } },
      { assetId: 3, name: 'Car', owner: 'person1', value: '200', includeInNestEgg: false, growth: { type: 'DEFAULT' } },
    ],
    liabilities: [
      { liabilityId: 1, name: 'Card', owner: 'person1', value: '300', includeInNestEgg: true, categoryId: 20, interestRate: '0.1' },
      { liabilityId: 2, name: 'Loan', owner: 'person1', value: '100', includeInNestEgg: true, categoryId: 20 },
    ],
  };
  const series = project(resolve(baseFacts), window, { includeBreakdown: true });

  it('should total year-end values per category', () => {
    const [first, second] = series.breakdown ?? [];

    expect(first.assetCategoryTotals[10].toFixed(2)).toBe('1550.00');
    expect(first.liabilityCategoryTotals[20].toFixed(2)).toBe('430.00');
    expect(second.assetCategoryTotals[10].toFixed(2)).toBe('1605.00');
    expect(second.liabilityCategoryTotals[20].toFixed(2)).toBe('463.00');
  });

  it('should leave uncategorized entities out of the category totals', () => {
    const first = (series.breakdown ?? [])[0];

    expect(Object.keys(first.assetCategoryTotals)).toEqual(['10']);
    expect(first.assetValues[3].toFixed(2)).toBe('200.00');
  });
});

describe('project - options', () => {
  it('should round points to the requested places', () => {
    const series = project(resolve(singleAssetPlan.baseFacts), window, { decimalPlaces: 0 });

    expect(series.points[0].nestEgg.toString()).toBe('530000');
    expect(series.points[4].nestEgg.toString()).toBe('669113');
  });

  it('should reject negative decimal places', () => {
    expect(() => project(resolve(singleAssetPlan.baseFacts), window, { decimalPlaces: -1 })).toThrow(RangeError);
  });
});

describe('project - mixed entities', () => {
  const coupleWindow = projectionWindow(coupleHousehold, householdPlan);
  const series = project(resolve(householdPlan.baseFacts), coupleWindow, { includeBreakdown: true });

  it('should use the reference person for the window', () => {
    expect(coupleWindow.startYear).toBe(2025);
    expect(coupleWindow.retirementYear).toBe(2030);
    expect(coupleWindow.endYear).toBe(2032);
  });

  it('should keep excluded entities out of the nest egg', () => {
    // 2025: brokerage 105000, IRA 208000, contributions 10000 * 1.05, car loan 11000
    expect(series.points[0].nestEgg.toFixed(2)).toBe('312500.00');
    // plus home 400000, minus mortgage 150000
    expect(series.points[0].netWorth.toFixed(2)).toBe('562500.00');
  });

  it('should route excluded income to the outside pool', () => {
    const breakdown = series.breakdown ?? [];

    // annuity for person2 (born 1962) pays at ages 64-65: 2026 and 2027
    expect(breakdown[0].otherCash.toFixed(2)).toBe('0.00');
    expect(breakdown[1].otherCash.toFixed(2)).toBe('12600.00');
    expect(breakdown[2].otherCash.toFixed(2)).toBe('25830.00');
    expect(breakdown[3].activity.retirementIncome.toFixed(2)).toBe('0.00');
  });

  it('should be deterministic', () => {
    const again = project(resolve(householdPlan.baseFacts), coupleWindow, { includeBreakdown: true });
    expect(again).toEqual(series);
  });
});

describe('project - faults', () => {
  it('should reject an inverted window', () => {
    const inverted = { ...window, retirementYear: 2033 };
    expect(() => project(resolve(singleAssetPlan.baseFacts), inverted)).toThrow(InvalidWindowError);
  });

  it('should reject income owned by a person without a date of birth', () => {
    const plan: Plan = {
      ...singleAssetPlan,
      baseFacts: {
        ...singleAssetPlan.baseFacts,
        incomeStreams: [
          {
            incomeId: 1,
            name: 'Pension',
            owner: 'person2',
            annualIncome: '10000',
            startAge: 65,
            endAge: null,
            applyInflation: false,
            includeInNestEgg: true,
          },
        ],
      },
    };

    expect(() => project(resolve(plan.baseFacts), window)).toThrow(IncompleteEntityError);
  });

  it('should reject a flow that ends before it starts', () => {
    const plan: Plan = {
      ...singleAssetPlan,
      baseFacts: {
        ...singleAssetPlan.baseFacts,
        flows: [
          {
            flowId: 4,
            name: 'Gift',
            owner: 'joint',
            type: 'INFLOW',
            annualAmount: '1000',
            startYear: 2030,
            endYear: 2028,
            applyInflation: false,
          },
        ],
      },
    };

    expect(() => project(resolve(plan.baseFacts), window)).toThrow('flow 4: field "endYear" (2028) is before startYear (2030)');
  });

  it('should reject an income stream whose end age is below its start age', () => {
    const plan: Plan = {
      ...singleAssetPlan,
      baseFacts: {
        ...singleAssetPlan.baseFacts,
        incomeStreams: [
          {
            incomeId: 2,
            name: 'Annuity',
            owner: 'person1',
            annualIncome: '5000',
            startAge: 66,
            endAge: 62,
            applyInflation: false,
            includeInNestEgg: true,
          },
        ],
      },
    };

    expect(() => project(resolve(plan.baseFacts), window)).toThrow(IncompleteEntityError);
  });
});
