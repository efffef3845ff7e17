import { Numeric } from "../utils/money";
import { Owner } from "./Household";
import { GrowthConfig } from "./GrowthConfig";

/**
 * Retirement income data structures (Social Security, pensions, deferred compensation).
 * Timing is age-based and converted to years through the owner's date of birth.
 */

export interface RetirementIncomeStreamRecord<M> {
  incomeId: number;
  name: string;
  owner: Owner;
  annualIncome: M;
  startAge: number;
  endAge: number | null; // null = lifetime
  applyInflation: boolean;
  includeInNestEgg: boolean;
  growth?: GrowthConfig<M> | null;
}

export type RetirementIncomeStream = RetirementIncomeStreamRecord<Numeric>;
