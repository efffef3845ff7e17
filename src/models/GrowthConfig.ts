import { Numeric } from "../utils/money";

/**
 * Growth rate configuration shared by assets and retirement income streams.
 * M is the amount type: Numeric on input records, Decimal once resolved.
 */

export interface RateInterval<M = Numeric> {
  startYear: number;
  endYear: number | null; // null = open-ended through the projection's end year
  rate: M;
}

export interface DefaultGrowth {
  type: "DEFAULT";
}

export interface OverrideGrowth<M = Numeric> {
  type: "OVERRIDE";
  rate: M;
}

export interface StepwiseGrowth<M = Numeric> {
  type: "STEPWISE";
  intervals: RateInterval<M>[];
}

export type GrowthConfig<M = Numeric> = DefaultGrowth | OverrideGrowth<M> | StepwiseGrowth<M>;

export type RateSource = "default" | "override" | "stepwise";

export const DEFAULT_GROWTH: DefaultGrowth = { type: "DEFAULT" };
