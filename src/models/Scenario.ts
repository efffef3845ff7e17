import { Numeric } from "../utils/money";

/**
 * Scenario data structures: assumption overrides, retirement spending and entity overrides.
 */

export type EntityKind = "asset" | "liability" | "flow" | "income";

export const ENTITY_KINDS: readonly EntityKind[] = ["asset", "liability", "flow", "income"];

export interface EntityRef {
  entity: EntityKind;
  id: number;
}

/** Raw override value; coerced to the target field's native type at resolution time. */
export type OverrideValue = string | number | boolean | null;

export interface PatchOverride {
  kind: "patch";
  target: EntityRef;
  field: string;
  value: OverrideValue;
}

export interface RemoveOverride {
  kind: "remove";
  target: EntityRef;
}

export type Override = PatchOverride | RemoveOverride;

export interface ScenarioAssumptions {
  defaultGrowthRate?: Numeric | null;
  inflationRate?: Numeric | null;
  retirementAge1?: number | null;
  retirementAge2?: number | null;
  annualRetirementSpending?: Numeric | null; // exists only on scenarios
}

export interface Scenario {
  scenarioId: number;
  name: string;
  color?: string;
  assumptions: ScenarioAssumptions;
  overrides: Override[];
}

/**
 * Build a patch override
 */
export function patch(entity: EntityKind, id: number, field: string, value: OverrideValue): PatchOverride {
  return { kind: "patch", target: { entity, id }, field, value };
}

/**
 * Build a removal override
 */
export function removal(entity: EntityKind, id: number): RemoveOverride {
  return { kind: "remove", target: { entity, id } };
}
