import Decimal from "decimal.js";
import { ownerSlot } from "../models/Household";
import { EffectiveEntitySet, EffectiveFlow, EffectiveIncomeStream } from "../models/EffectiveEntitySet";
import { ProjectionPoint, ProjectionSeries, ProjectionWindow, YearBreakdown } from "../models/ProjectionResult";
import { IncompleteEntityError } from "../utils/errors";
import { ZERO, roundToCurrency } from "../utils/money";
import { projectionYears, validateTimeline, yearForAgeInWindow } from "../utils/time";
import { DEFAULT_DECIMAL_PLACES } from "../utils/constants";
import { createRateSchedule } from "./rateResolver";
import { Balances, PreparedEntities, PreparedIncomeStream, YearState, advance } from "./transition";

export interface ProjectionOptions {
  decimalPlaces?: number; // output rounding, half-up
  includeBreakdown?: boolean;
}

function prepareFlow(flow: EffectiveFlow): EffectiveFlow {
  if (flow.endYear !== null && flow.endYear < flow.startYear) {
    throw new IncompleteEntityError("flow", flow.flowId, "endYear", `(${flow.endYear}) is before startYear (${flow.startYear})`);
  }
  return flow;
}

function prepareIncomeStream(stream: EffectiveIncomeStream, window: ProjectionWindow): PreparedIncomeStream {
  if (stream.endAge !== null && stream.endAge < stream.startAge) {
    throw new IncompleteEntityError("income", stream.incomeId, "endAge", `(${stream.endAge}) is below startAge (${stream.startAge})`);
  }
  const slot = ownerSlot(stream.owner, window.referencePerson);
  return {
    stream,
    startYear: yearForAgeInWindow(window, slot, stream.startAge),
    endYear: stream.endAge === null ? null : yearForAgeInWindow(window, slot, stream.endAge),
    schedule: stream.growth ? createRateSchedule(stream.growth, window.endYear, `income ${stream.incomeId}`) : null,
  };
}

/**
 * Validates effective entities against a window and builds their rate schedules.
 * Runs before the first projection year.
 *
 * @throws InvalidWindowError when the window ordering is violated
 * @throws IncompleteEntityError for inverted spans or an income owner without a date of birth
 * @throws OverlappingIntervalsError for malformed stepwise intervals
 */
export function prepare(entities: EffectiveEntitySet, window: ProjectionWindow): PreparedEntities {
  validateTimeline(window.startYear, window.retirementYear, window.endYear);
  return {
    assumptions: entities.assumptions,
    assets: entities.assets.map((asset) => ({
      asset,
      schedule: createRateSchedule(asset.growth, window.endYear, `asset ${asset.assetId}`),
    })),
    liabilities: entities.liabilities,
    flows: entities.flows.map(prepareFlow),
    incomeStreams: entities.incomeStreams.map((stream) => prepareIncomeStream(stream, window)),
  };
}

/**
 * Prior balances for the first projection year: each entity's stored value, empty cash pools.
 */
export function seedBalances(entities: PreparedEntities): Balances {
  return {
    assets: new Map(entities.assets.map(({ asset }): [number, Decimal] => [asset.assetId, asset.value])),
    liabilities: new Map(
      entities.liabilities.map((liability): [number, Decimal] => [liability.liabilityId, liability.value])
    ),
    nestEggCash: ZERO,
    otherCash: ZERO,
  };
}

function roundValues(values: ReadonlyMap<number, Decimal>, decimalPlaces: number): Record<number, Decimal> {
  const rounded: Record<number, Decimal> = {};
  for (const [id, value] of values) {
    rounded[id] = roundToCurrency(value, decimalPlaces);
  }
  return rounded;
}

function categoryTotals(
  entities: { id: number; categoryId?: number | null }[],
  values: ReadonlyMap<number, Decimal>
): Map<number, Decimal> {
  const totals = new Map<number, Decimal>();
  for (const { id, categoryId } of entities) {
    if (categoryId === undefined || categoryId === null) {
      continue;
    }
    const value = values.get(id) ?? ZERO;
    totals.set(categoryId, (totals.get(categoryId) ?? ZERO).plus(value));
  }
  return totals;
}

function toBreakdown(
  state: YearState,
  point: ProjectionPoint,
  entities: PreparedEntities,
  decimalPlaces: number
): YearBreakdown {
  const assetCategories = categoryTotals(
    entities.assets.map(({ asset }) => ({ id: asset.assetId, categoryId: asset.categoryId })),
    state.balances.assets
  );
  const liabilityCategories = categoryTotals(
    entities.liabilities.map((liability) => ({ id: liability.liabilityId, categoryId: liability.categoryId })),
    state.balances.liabilities
  );
  const round = (value: Decimal) => roundToCurrency(value, decimalPlaces);
  return {
    ...point,
    activity: {
      inflows: round(state.activity.inflows),
      outflows: round(state.activity.outflows),
      retirementIncome: round(state.activity.retirementIncome),
      retirementSpending: round(state.activity.retirementSpending),
    },
    assetValues: roundValues(state.balances.assets, decimalPlaces),
    liabilityValues: roundValues(state.balances.liabilities, decimalPlaces),
    assetCategoryTotals: roundValues(assetCategories, decimalPlaces),
    liabilityCategoryTotals: roundValues(liabilityCategories, decimalPlaces),
    nestEggCash: round(state.balances.nestEggCash),
    otherCash: round(state.balances.otherCash),
  };
}

/**
 * Runs the annual state transition over every year of the window.
 *
 * The first year starts from the stored entity values and already applies the full
 * annual calculation, so a 500,000 asset at 6% closes the start year at 530,000.
 * Balances carry full precision between years; only the reported points are rounded.
 *
 * @param entities - Effective entity set (from `resolve`)
 * @param window - Fixed projection window
 * @param options - Output rounding and breakdown
 * @returns One point per year, `endYear - startYear + 1` in total
 *
 * @example
 * ```ts
 * const window = projectionWindow(household, plan);
 * const series = project(resolve(plan.baseFacts), window);
 * series.points[0] // { year: 2025, nestEgg: 530000, netWorth: 530000 }
 * ```
 */
export function project(
  entities: EffectiveEntitySet,
  window: ProjectionWindow,
  options: ProjectionOptions = {}
): ProjectionSeries {
  const decimalPlaces = options.decimalPlaces ?? DEFAULT_DECIMAL_PLACES;
  if (!Number.isInteger(decimalPlaces) || decimalPlaces < 0) {
    throw new RangeError(`decimalPlaces must be a non-negative integer, got ${decimalPlaces}`);
  }

  const prepared = prepare(entities, window);
  let balances = seedBalances(prepared);
  const points: ProjectionPoint[] = [];
  const breakdown: YearBreakdown[] = [];

  for (const year of projectionYears(window)) {
    const state = advance(balances, prepared, year, window);
    const point: ProjectionPoint = {
      year,
      nestEgg: roundToCurrency(state.totals.nestEgg, decimalPlaces),
      netWorth: roundToCurrency(state.totals.netWorth, decimalPlaces),
    };
    points.push(point);
    if (options.includeBreakdown) {
      breakdown.push(toBreakdown(state, point, prepared, decimalPlaces));
    }
    balances = state.balances;
  }

  return options.includeBreakdown ? { window, points, breakdown } : { window, points };
}
