/**
 * Household data structures
 */

export type PersonSlot = 1 | 2;

export type Owner = "person1" | "person2" | "joint";

export const OWNERS: readonly Owner[] = ["person1", "person2", "joint"];

export interface Person {
  name?: string;
  dateOfBirth: string; // ISO date, e.g. "1965-04-12"
}

export interface Household {
  householdId?: number;
  name?: string;
  person1?: Person;
  person2?: Person;
}

/**
 * Get the person in a household slot, if present
 */
export function getPerson(household: Household, slot: PersonSlot): Person | undefined {
  return slot === 1 ? household.person1 : household.person2;
}

/**
 * Map an entity owner to the person slot whose age governs it.
 * Joint entities follow the plan's reference person.
 */
export function ownerSlot(owner: Owner, referencePerson: PersonSlot): PersonSlot {
  if (owner === "person1") {
    return 1;
  }
  if (owner === "person2") {
    return 2;
  }
  return referencePerson;
}
