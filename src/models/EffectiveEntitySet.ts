import Decimal from "decimal.js";
import { PersonSlot } from "./Household";
import { AssetRecord } from "./Asset";
import { LiabilityRecord } from "./Liability";
import { ScheduledFlowRecord } from "./ScheduledFlow";
import { RetirementIncomeStreamRecord } from "./RetirementIncome";

/**
 * Effective (resolved) entity set: base facts with scenario assumptions and overrides applied,
 * every amount and rate converted to a decimal. This is what the projection driver consumes.
 */

export type EffectiveAsset = AssetRecord<Decimal>;
export type EffectiveLiability = LiabilityRecord<Decimal>;
export type EffectiveFlow = ScheduledFlowRecord<Decimal>;
export type EffectiveIncomeStream = RetirementIncomeStreamRecord<Decimal>;

export interface EffectiveAssumptions {
  defaultGrowthRate: Decimal;
  inflationRate: Decimal;
  retirementAge1: number | null;
  retirementAge2: number | null;
  finalAge1: number | null;
  finalAge2: number | null;
  finalAgeSelector: PersonSlot;
  annualRetirementSpending: Decimal;
}

export interface EffectiveEntitySet {
  assumptions: EffectiveAssumptions;
  assets: EffectiveAsset[];
  liabilities: EffectiveLiability[];
  flows: EffectiveFlow[];
  incomeStreams: EffectiveIncomeStream[];
}
