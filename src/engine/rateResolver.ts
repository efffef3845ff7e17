import Decimal from "decimal.js";
import { GrowthConfig, RateInterval, RateSource } from "../models/GrowthConfig";
import { OverlappingIntervalsError } from "../utils/errors";

/**
 * Stepwise rate resolution.
 *
 * Growth handling per entity:
 * 1. DEFAULT uses the plan (or scenario) default rate
 * 2. OVERRIDE uses one fixed rate for every year
 * 3. STEPWISE uses the rate of the interval containing the year
 * 4. Gaps between stepwise intervals fall back to the default rate
 */

export interface RateSchedule {
  config: GrowthConfig<Decimal>;
  rateFor(year: number, defaultRate: Decimal): Decimal;
  sourceFor(year: number): RateSource;
}

/**
 * Validates a list of stepwise intervals in list order.
 * Intervals must be non-overlapping, chronologically ordered, each with start <= end,
 * and only the last one may be open-ended.
 *
 * @param intervals - Intervals as configured on one entity
 * @param label - Entity label used in error messages (e.g. "asset 3")
 * @throws OverlappingIntervalsError on any violation
 */
export function validateIntervals<M>(intervals: RateInterval<M>[], label = "growth"): void {
  for (let i = 0; i < intervals.length; i++) {
    const current = intervals[i];
    if (current.endYear !== null && current.endYear < current.startYear) {
      throw new OverlappingIntervalsError(
        `${label} interval ${current.startYear}-${current.endYear} ends before it starts`,
        { label, startYear: current.startYear, endYear: current.endYear }
      );
    }

    if (i === intervals.length - 1) {
      break;
    }

    const next = intervals[i + 1];
    if (current.endYear === null) {
      throw new OverlappingIntervalsError(
        `${label} has an open-ended interval starting ${current.startYear} that is not last`,
        { label, startYear: current.startYear, endYear: null }
      );
    }
    if (next.startYear <= current.endYear) {
      throw new OverlappingIntervalsError(
        `${label} intervals ${current.startYear}-${current.endYear} and ${next.startYear}-${next.endYear ?? "open"} overlap or are out of order`,
        { label, startYear: next.startYear, endYear: next.endYear }
      );
    }
  }
}

function findInterval(
  intervals: RateInterval<Decimal>[],
  year: number,
  horizonEndYear?: number
): RateInterval<Decimal> | undefined {
  return intervals.find((interval) => {
    const end = interval.endYear ?? horizonEndYear ?? null;
    return interval.startYear <= year && (end === null || year <= end);
  });
}

/**
 * Answers "effective rate for year Y" for one entity's growth configuration.
 *
 * @param config - Entity growth configuration
 * @param year - Projection year
 * @param defaultRate - Plan or scenario default growth rate
 * @param horizonEndYear - Projection end year; open-ended intervals stop here
 * @returns The rate to compound once for `year`
 *
 * @example
 * ```ts
 * const cfg = { type: "STEPWISE", intervals: [{ startYear: 2026, endYear: 2030, rate: d("0.05") }] };
 * effectiveRate(cfg, 2027, d("0.06")) // 0.05
 * effectiveRate(cfg, 2031, d("0.06")) // 0.06
 * ```
 */
export function effectiveRate(
  config: GrowthConfig<Decimal>,
  year: number,
  defaultRate: Decimal,
  horizonEndYear?: number
): Decimal {
  switch (config.type) {
    case "DEFAULT":
      return defaultRate;
    case "OVERRIDE":
      return config.rate;
    case "STEPWISE": {
      const interval = findInterval(config.intervals, year, horizonEndYear);
      return interval ? interval.rate : defaultRate;
    }
  }
}

/**
 * Reports which branch of the growth hierarchy supplies the rate for a year.
 */
export function rateSource(config: GrowthConfig<Decimal>, year: number, horizonEndYear?: number): RateSource {
  switch (config.type) {
    case "DEFAULT":
      return "default";
    case "OVERRIDE":
      return "override";
    case "STEPWISE":
      return findInterval(config.intervals, year, horizonEndYear) ? "stepwise" : "default";
  }
}

/**
 * Validates a growth configuration once and returns a reusable resolver.
 * Used by the projection driver so malformed intervals fail before the year loop.
 *
 * @throws OverlappingIntervalsError for malformed stepwise intervals
 */
export function createRateSchedule(
  config: GrowthConfig<Decimal>,
  horizonEndYear?: number,
  label?: string
): RateSchedule {
  if (config.type === "STEPWISE") {
    validateIntervals(config.intervals, label);
  }
  return {
    config,
    rateFor: (year, defaultRate) => effectiveRate(config, year, defaultRate, horizonEndYear),
    sourceFor: (year) => rateSource(config, year, horizonEndYear),
  };
}
