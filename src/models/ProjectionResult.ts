import Decimal from "decimal.js";
import { PersonSlot } from "./Household";

/**
 * Projection window and output data structures
 */

export interface ProjectionWindow {
  startYear: number; // plan creation year
  retirementYear: number;
  endYear: number;
  referencePerson: PersonSlot;
  birthYears: {
    person1: number | null;
    person2: number | null;
  };
}

export interface ProjectionPoint {
  year: number;
  nestEgg: Decimal;
  netWorth: Decimal;
}

/** Amounts applied in steps 1-4 of a year. */
export interface YearActivity {
  inflows: Decimal;
  outflows: Decimal;
  retirementIncome: Decimal;
  retirementSpending: Decimal;
}

export interface YearBreakdown extends ProjectionPoint {
  activity: YearActivity;
  assetValues: Record<number, Decimal>; // assetId -> year-end value
  liabilityValues: Record<number, Decimal>; // liabilityId -> year-end value
  assetCategoryTotals: Record<number, Decimal>; // categoryId -> year-end total, categorized assets only
  liabilityCategoryTotals: Record<number, Decimal>;
  nestEggCash: Decimal;
  otherCash: Decimal;
}

export interface ProjectionSeries {
  window: ProjectionWindow;
  points: ProjectionPoint[];
  breakdown?: YearBreakdown[];
}

export interface ScenarioProjection {
  scenarioId: number;
  name: string;
  series: ProjectionSeries;
  finalNestEggDelta: Decimal; // versus the base case, in the last year
}

export interface ScenarioComparison {
  startYear: number;
  endYear: number;
  years: number[];
  base: ProjectionSeries;
  scenarios: ScenarioProjection[];
}

/**
 * Get the final point of a series
 */
export function getFinalPoint(series: ProjectionSeries): ProjectionPoint {
  return series.points[series.points.length - 1];
}
