import Decimal from "decimal.js";
import {
  ProjectionPoint,
  ProjectionSeries,
  ProjectionWindow,
  ScenarioComparison,
  YearBreakdown,
} from "../models/ProjectionResult";
import { formatAmount } from "./money";

/**
 * JSON shapes of projection output. Amounts are fixed-place strings so no precision is lost
 * in transit.
 */

export interface SerializedPoint {
  year: number;
  nestEgg: string;
  netWorth: string;
}

export interface SerializedBreakdown extends SerializedPoint {
  activity: {
    inflows: string;
    outflows: string;
    retirementIncome: string;
    retirementSpending: string;
  };
  assetValues: Record<number, string>;
  liabilityValues: Record<number, string>;
  assetCategoryTotals: Record<number, string>;
  liabilityCategoryTotals: Record<number, string>;
  nestEggCash: string;
  otherCash: string;
}

export interface SerializedSeries {
  window: ProjectionWindow;
  points: SerializedPoint[];
  breakdown?: SerializedBreakdown[];
}

export interface SerializedComparison {
  startYear: number;
  endYear: number;
  years: number[];
  base: SerializedSeries;
  scenarios: {
    scenarioId: number;
    name: string;
    series: SerializedSeries;
    finalNestEggDelta: string;
  }[];
}

export function serializePoint(point: ProjectionPoint, decimalPlaces = 2): SerializedPoint {
  return {
    year: point.year,
    nestEgg: formatAmount(point.nestEgg, decimalPlaces),
    netWorth: formatAmount(point.netWorth, decimalPlaces),
  };
}

function serializeValues(values: Record<number, Decimal>, decimalPlaces: number): Record<number, string> {
  const serialized: Record<number, string> = {};
  for (const [id, value] of Object.entries(values)) {
    serialized[Number(id)] = formatAmount(value, decimalPlaces);
  }
  return serialized;
}

function serializeBreakdown(row: YearBreakdown, decimalPlaces: number): SerializedBreakdown {
  const format = (value: Decimal) => formatAmount(value, decimalPlaces);
  return {
    ...serializePoint(row, decimalPlaces),
    activity: {
      inflows: format(row.activity.inflows),
      outflows: format(row.activity.outflows),
      retirementIncome: format(row.activity.retirementIncome),
      retirementSpending: format(row.activity.retirementSpending),
    },
    assetValues: serializeValues(row.assetValues, decimalPlaces),
    liabilityValues: serializeValues(row.liabilityValues, decimalPlaces),
    assetCategoryTotals: serializeValues(row.assetCategoryTotals, decimalPlaces),
    liabilityCategoryTotals: serializeValues(row.liabilityCategoryTotals, decimalPlaces),
    nestEggCash: format(row.nestEggCash),
    otherCash: format(row.otherCash),
  };
}

export function serializeSeries(series: ProjectionSeries, decimalPlaces = 2): SerializedSeries {
  const serialized: SerializedSeries = {
    window: series.window,
    points: series.points.map((point) => serializePoint(point, decimalPlaces)),
  };
  if (series.breakdown) {
    serialized.breakdown = series.breakdown.map((row) => serializeBreakdown(row, decimalPlaces));
  }
  return serialized;
}

export function serializeComparison(comparison: ScenarioComparison, decimalPlaces = 2): SerializedComparison {
  return {
    startYear: comparison.startYear,
    endYear: comparison.endYear,
    years: comparison.years,
    base: serializeSeries(comparison.base, decimalPlaces),
    scenarios: comparison.scenarios.map((scenario) => ({
      scenarioId: scenario.scenarioId,
      name: scenario.name,
      series: serializeSeries(scenario.series, decimalPlaces),
      finalNestEggDelta: formatAmount(scenario.finalNestEggDelta, decimalPlaces),
    })),
  };
}
