import Decimal from "decimal.js";
import {
  EffectiveAssumptions,
  EffectiveAsset,
  EffectiveFlow,
  EffectiveIncomeStream,
  EffectiveLiability,
} from "../models/EffectiveEntitySet";
import { hasInterest } from "../models/Liability";
import { ProjectionWindow, YearActivity } from "../models/ProjectionResult";
import { applyAnnualCompoundRate, applyAnnualInflation, ZERO } from "../utils/money";
import { isActiveInYear } from "../utils/time";
import { RateSchedule } from "./rateResolver";

/**
 * Annual state transition.
 *
 * Annual calculation order:
 * 1. Apply scheduled inflows (inflation-adjusted if enabled)
 * 2. Apply scheduled outflows (inflation-adjusted if enabled)
 * 3. Apply retirement income
 * 4. Apply retirement spending (scenario only, always inflation-adjusted)
 * 5. Apply growth: asset-specific rates, default rate to the cash pools
 * 6. Apply liability interest
 * 7. Calculate year-end totals
 *
 * Cash movements in steps 1-4 land in one of two cash pools: the nest-egg pool, or the
 * outside pool for income streams excluded from the nest egg. Both pools grow at the
 * effective default rate in step 5.
 */

export interface Balances {
  assets: ReadonlyMap<number, Decimal>;
  liabilities: ReadonlyMap<number, Decimal>;
  nestEggCash: Decimal;
  otherCash: Decimal;
}

export interface PreparedAsset {
  asset: EffectiveAsset;
  schedule: RateSchedule;
}

export interface PreparedIncomeStream {
  stream: EffectiveIncomeStream;
  startYear: number;
  endYear: number | null;
  schedule: RateSchedule | null;
}

/** Effective entities with rate schedules built and age-based timing converted to years. */
export interface PreparedEntities {
  assumptions: EffectiveAssumptions;
  assets: PreparedAsset[];
  liabilities: EffectiveLiability[];
  flows: EffectiveFlow[];
  incomeStreams: PreparedIncomeStream[];
}

export interface YearTotals {
  nestEgg: Decimal;
  netWorth: Decimal;
}

export interface YearState {
  year: number;
  balances: Balances;
  activity: YearActivity;
  totals: YearTotals;
}

/**
 * Amount of a scheduled flow in a year, inflated from the flow's own start year when enabled.
 */
export function flowAmount(flow: EffectiveFlow, year: number, inflationRate: Decimal): Decimal {
  if (!flow.applyInflation) {
    return flow.annualAmount;
  }
  return applyAnnualInflation(flow.annualAmount, inflationRate, year - flow.startYear);
}

/**
 * Amount of a retirement income stream in a year.
 * The stored amount is as of the plan start year. A stream with its own growth config compounds
 * from its first active year, or the plan start year when it is already paying; inflation, when
 * enabled, is compounded from the plan start year.
 */
export function incomeAmount(
  prepared: PreparedIncomeStream,
  year: number,
  assumptions: EffectiveAssumptions,
  window: ProjectionWindow
): Decimal {
  let amount = prepared.stream.annualIncome;
  if (prepared.schedule) {
    for (let y = Math.max(prepared.startYear, window.startYear); y < year; y++) {
      amount = applyAnnualCompoundRate(amount, prepared.schedule.rateFor(y, assumptions.defaultGrowthRate));
    }
  }
  if (prepared.stream.applyInflation) {
    amount = applyAnnualInflation(amount, assumptions.inflationRate, year - window.startYear);
  }
  return amount;
}

/**
 * Retirement spending for a year: zero before the retirement year, otherwise the scenario's
 * annual spending inflated from the retirement year.
 */
export function retirementSpending(
  assumptions: EffectiveAssumptions,
  year: number,
  retirementYear: number
): Decimal {
  if (year < retirementYear || assumptions.annualRetirementSpending.isZero()) {
    return ZERO;
  }
  return applyAnnualInflation(assumptions.annualRetirementSpending, assumptions.inflationRate, year - retirementYear);
}

/**
 * Sums year-end totals. Nest egg counts only entities flagged for it plus the nest-egg pool;
 * net worth counts everything. Liabilities subtract.
 */
export function calculateTotals(balances: Balances, entities: PreparedEntities): YearTotals {
  let nestEgg = balances.nestEggCash;
  let netWorth = balances.nestEggCash.plus(balances.otherCash);

  for (const { asset } of entities.assets) {
    const value = balances.assets.get(asset.assetId) ?? ZERO;
    netWorth = netWorth.plus(value);
    if (asset.includeInNestEgg) {
      nestEgg = nestEgg.plus(value);
    }
  }

  for (const liability of entities.liabilities) {
    const value = balances.liabilities.get(liability.liabilityId) ?? ZERO;
    netWorth = netWorth.minus(value);
    if (liability.includeInNestEgg) {
      nestEgg = nestEgg.minus(value);
    }
  }

  return { nestEgg, netWorth };
}

/**
 * Advances prior year-end balances through one projection year.
 * Pure: the prior balances are left untouched and a new state is returned.
 *
 * @param prior - Previous year-end balances (or the seed balances for the first year)
 * @param entities - Prepared effective entities
 * @param year - Year being calculated
 * @param window - Projection window (supplies retirement year and plan start year)
 */
export function advance(
  prior: Balances,
  entities: PreparedEntities,
  year: number,
  window: ProjectionWindow
): YearState {
  const { assumptions } = entities;
  let nestEggCash = prior.nestEggCash;
  let otherCash = prior.otherCash;

  // Steps 1 and 2
  let inflows: Decimal = ZERO;
  let outflows: Decimal = ZERO;
  for (const flow of entities.flows) {
    if (!isActiveInYear(year, flow.startYear, flow.endYear)) {
      continue;
    }
    const amount = flowAmount(flow, year, assumptions.inflationRate);
    if (flow.type === "INFLOW") {
      inflows = inflows.plus(amount);
    } else {
      outflows = outflows.plus(amount);
    }
  }
  nestEggCash = nestEggCash.plus(inflows).minus(outflows);

  // Step 3
  let income: Decimal = ZERO;
  for (const prepared of entities.incomeStreams) {
    if (!isActiveInYear(year, prepared.startYear, prepared.endYear)) {
      continue;
    }
    const amount = incomeAmount(prepared, year, assumptions, window);
    income = income.plus(amount);
    if (prepared.stream.includeInNestEgg) {
      nestEggCash = nestEggCash.plus(amount);
    } else {
      otherCash = otherCash.plus(amount);
    }
  }

  // Step 4
  const spending = retirementSpending(assumptions, year, window.retirementYear);
  nestEggCash = nestEggCash.minus(spending);

  // Step 5
  const assets = new Map<number, Decimal>();
  for (const { asset, schedule } of entities.assets) {
    const value = prior.assets.get(asset.assetId) ?? asset.value;
    assets.set(asset.assetId, applyAnnualCompoundRate(value, schedule.rateFor(year, assumptions.defaultGrowthRate)));
  }
  nestEggCash = applyAnnualCompoundRate(nestEggCash, assumptions.defaultGrowthRate);
  otherCash = applyAnnualCompoundRate(otherCash, assumptions.defaultGrowthRate);

  // Step 6
  const liabilities = new Map<number, Decimal>();
  for (const liability of entities.liabilities) {
    const value = prior.liabilities.get(liability.liabilityId) ?? liability.value;
    liabilities.set(
      liability.liabilityId,
      hasInterest(liability) ? applyAnnualCompoundRate(value, liability.interestRate) : value
    );
  }

  // Step 7
  const balances: Balances = { assets, liabilities, nestEggCash, otherCash };
  return {
    year,
    balances,
    activity: { inflows, outflows, retirementIncome: income, retirementSpending: spending },
    totals: calculateTotals(balances, entities),
  };
}
