import { Numeric } from "../utils/money";
import { Owner } from "./Household";

/**
 * Liability data structures.
 * A liability either compounds at a fixed interest rate or stays at its stored value.
 */

export interface LiabilityRecord<M> {
  liabilityId: number;
  name: string;
  owner: Owner;
  value: M;
  includeInNestEgg: boolean;
  categoryId?: number | null;
  interestRate?: M | null;
}

export type Liability = LiabilityRecord<Numeric>;

/**
 * Check whether a liability accrues interest
 */
export function hasInterest<M>(liability: LiabilityRecord<M>): liability is LiabilityRecord<M> & { interestRate: M } {
  return liability.interestRate !== undefined && liability.interestRate !== null;
}
