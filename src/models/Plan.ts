import { Numeric } from "../utils/money";
import { PersonSlot } from "./Household";
import { Asset } from "./Asset";
import { Liability } from "./Liability";
import { ScheduledFlow } from "./ScheduledFlow";
import { RetirementIncomeStream } from "./RetirementIncome";

/**
 * Plan and base facts data structures
 */

export interface BaseAssumptions {
  defaultGrowthRate: Numeric; // e.g. 0.06 for 6%
  inflationRate: Numeric; // e.g. 0.028 for 2.8%
  retirementAge1?: number | null;
  retirementAge2?: number | null;
  finalAge1?: number | null;
  finalAge2?: number | null;
  finalAgeSelector: PersonSlot; // whose final age bounds the window
}

/**
 * Plan-level inputs shared by the base case and every scenario.
 * Retirement spending lives on scenarios only.
 */
export interface BaseFacts {
  assumptions: BaseAssumptions;
  assets: Asset[];
  liabilities: Liability[];
  flows: ScheduledFlow[];
  incomeStreams: RetirementIncomeStream[];
}

export interface Plan {
  planId: number;
  name: string;
  planCreationYear: number; // frozen at creation
  referencePerson: PersonSlot;
  baseFacts: BaseFacts;
}

/**
 * Get the configured retirement age for a person slot
 */
export function getRetirementAge(
  ages: { retirementAge1?: number | null; retirementAge2?: number | null },
  slot: PersonSlot
): number | null {
  const age = slot === 1 ? ages.retirementAge1 : ages.retirementAge2;
  return age ?? null;
}

/**
 * Get the configured final age for a person slot
 */
export function getFinalAge(assumptions: BaseAssumptions, slot: PersonSlot): number | null {
  const age = slot === 1 ? assumptions.finalAge1 : assumptions.finalAge2;
  return age ?? null;
}

/**
 * Count entities in base facts (used for reporting)
 */
export function countEntities(baseFacts: BaseFacts): number {
  return (
    baseFacts.assets.length +
    baseFacts.liabilities.length +
    baseFacts.flows.length +
    baseFacts.incomeStreams.length
  );
}
