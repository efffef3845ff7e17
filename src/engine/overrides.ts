import Decimal from "decimal.js";
import { BaseFacts } from "../models/Plan";
import { OWNERS, Owner } from "../models/Household";
import { FlowType } from "../models/ScheduledFlow";
import { DEFAULT_GROWTH, GrowthConfig } from "../models/GrowthConfig";
import {
  EntityKind,
  ENTITY_KINDS,
  Override,
  OverrideValue,
  PatchOverride,
  ScenarioAssumptions,
} from "../models/Scenario";
import {
  EffectiveAsset,
  EffectiveEntitySet,
  EffectiveFlow,
  EffectiveIncomeStream,
  EffectiveLiability,
} from "../models/EffectiveEntitySet";
import {
  DanglingOverrideReferenceError,
  InvalidOverrideValueError,
  UnknownOverrideFieldError,
} from "../utils/errors";
import { DEFAULT_GROWTH_TOKEN, FALSE_TOKENS, NULL_TOKENS, TRUE_TOKENS } from "../utils/constants";
import { tryDecimal } from "../utils/money";
import { toEffectiveEntitySet } from "./entities";

/**
 * Scenario override resolution.
 *
 * A scenario inherits every base fact and patches it field by field. Base facts are never
 * mutated: each call builds a fresh effective entity set from (base facts, overrides).
 * Removals dominate patches for the same entity regardless of list position; patches apply
 * in list order, so the last writer wins for a repeated (entity, field).
 */

type Coerced<T> = { ok: true; value: T } | { ok: false };

type Coercer<T> = (raw: OverrideValue) => Coerced<T>;

/** Applies one raw override value to an entity; null when the value cannot be coerced. */
type Patcher<E> = (entity: E, raw: OverrideValue) => E | null;

function accept<T>(value: T): Coerced<T> {
  return { ok: true, value };
}

const REJECT: { ok: false } = { ok: false };

function token(raw: OverrideValue): string | null {
  if (typeof raw === "string") {
    return raw.trim().toLowerCase();
  }
  if (typeof raw === "number") {
    return String(raw);
  }
  return null;
}

function isNullToken(raw: OverrideValue): boolean {
  if (raw === null) {
    return true;
  }
  return typeof raw === "string" && NULL_TOKENS.has(raw.trim().toLowerCase());
}

const asText: Coercer<string> = (raw) =>
  typeof raw === "string" || typeof raw === "number" ? accept(String(raw)) : REJECT;

const asOwner: Coercer<Owner> = (raw) => {
  const owner = OWNERS.find((candidate) => candidate === token(raw));
  return owner ? accept(owner) : REJECT;
};

const asDecimal: Coercer<Decimal> = (raw) => {
  if (typeof raw === "boolean") {
    return REJECT;
  }
  const parsed = tryDecimal(raw);
  return parsed === null ? REJECT : accept(parsed);
};

const asNullableDecimal: Coercer<Decimal | null> = (raw) => (isNullToken(raw) ? accept(null) : asDecimal(raw));

const asInteger: Coercer<number> = (raw) => {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? accept(raw) : REJECT;
  }
  if (typeof raw === "string" && /^-?\d+$/.test(raw.trim())) {
    return accept(Number(raw.trim()));
  }
  return REJECT;
};

const asNullableInteger: Coercer<number | null> = (raw) => (isNullToken(raw) ? accept(null) : asInteger(raw));

const asBoolean: Coercer<boolean> = (raw) => {
  if (typeof raw === "boolean") {
    return accept(raw);
  }
  const normalized = token(raw);
  if (normalized !== null && TRUE_TOKENS.has(normalized)) {
    return accept(true);
  }
  if (normalized !== null && FALSE_TOKENS.has(normalized)) {
    return accept(false);
  }
  return REJECT;
};

const asFlowType: Coercer<FlowType> = (raw) => {
  const normalized = token(raw);
  if (normalized === "inflow") {
    return accept<FlowType>("INFLOW");
  }
  if (normalized === "outflow") {
    return accept<FlowType>("OUTFLOW");
  }
  return REJECT;
};

const asGrowthRate: Coercer<GrowthConfig<Decimal>> = (raw) => {
  if (token(raw) === DEFAULT_GROWTH_TOKEN) {
    return accept(DEFAULT_GROWTH);
  }
  const rate = asDecimal(raw);
  return rate.ok ? accept<GrowthConfig<Decimal>>({ type: "OVERRIDE", rate: rate.value }) : REJECT;
};

function field<E, T>(coerce: Coercer<T>, apply: (entity: E, value: T) => E): Patcher<E> {
  return (entity, raw) => {
    const coerced = coerce(raw);
    return coerced.ok ? apply(entity, coerced.value) : null;
  };
}

export type AssetField = "name" | "owner" | "value" | "includeInNestEgg" | "growthRate";
export type LiabilityField = "name" | "owner" | "value" | "interestRate" | "includeInNestEgg";
export type FlowField = "name" | "owner" | "type" | "annualAmount" | "startYear" | "endYear" | "applyInflation";
export type IncomeField =
  | "name"
  | "owner"
  | "annualIncome"
  | "startAge"
  | "endAge"
  | "applyInflation"
  | "includeInNestEgg"
  | "growthRate";

const ASSET_FIELDS: Record<AssetField, Patcher<EffectiveAsset>> = {
  name: field(asText, (asset: EffectiveAsset, name) => ({ ...asset, name })),
  owner: field(asOwner, (asset: EffectiveAsset, owner) => ({ ...asset, owner })),
  value: field(asDecimal, (asset: EffectiveAsset, value) => ({ ...asset, value })),
  includeInNestEgg: field(asBoolean, (asset: EffectiveAsset, includeInNestEgg) => ({ ...asset, includeInNestEgg })),
  growthRate: field(asGrowthRate, (asset: EffectiveAsset, growth) => ({ ...asset, growth })),
};

const LIABILITY_FIELDS: Record<LiabilityField, Patcher<EffectiveLiability>> = {
  name: field(asText, (liability: EffectiveLiability, name) => ({ ...liability, name })),
  owner: field(asOwner, (liability: EffectiveLiability, owner) => ({ ...liability, owner })),
  value: field(asDecimal, (liability: EffectiveLiability, value) => ({ ...liability, value })),
  interestRate: field(asNullableDecimal, (liability: EffectiveLiability, interestRate) => ({ ...liability, interestRate })),
  includeInNestEgg: field(asBoolean, (liability: EffectiveLiability, includeInNestEgg) => ({ ...liability, includeInNestEgg })),
};

const FLOW_FIELDS: Record<FlowField, Patcher<EffectiveFlow>> = {
  name: field(asText, (flow: EffectiveFlow, name) => ({ ...flow, name })),
  owner: field(asOwner, (flow: EffectiveFlow, owner) => ({ ...flow, owner })),
  type: field(asFlowType, (flow: EffectiveFlow, type) => ({ ...flow, type })),
  annualAmount: field(asDecimal, (flow: EffectiveFlow, annualAmount) => ({ ...flow, annualAmount })),
  startYear: field(asInteger, (flow: EffectiveFlow, startYear) => ({ ...flow, startYear })),
  endYear: field(asNullableInteger, (flow: EffectiveFlow, endYear) => ({ ...flow, endYear })),
  applyInflation: field(asBoolean, (flow: EffectiveFlow, applyInflation) => ({ ...flow, applyInflation })),
};

const INCOME_FIELDS: Record<IncomeField, Patcher<EffectiveIncomeStream>> = {
  name: field(asText, (stream: EffectiveIncomeStream, name) => ({ ...stream, name })),
  owner: field(asOwner, (stream: EffectiveIncomeStream, owner) => ({ ...stream, owner })),
  annualIncome: field(asDecimal, (stream: EffectiveIncomeStream, annualIncome) => ({ ...stream, annualIncome })),
  startAge: field(asInteger, (stream: EffectiveIncomeStream, startAge) => ({ ...stream, startAge })),
  endAge: field(asNullableInteger, (stream: EffectiveIncomeStream, endAge) => ({ ...stream, endAge })),
  applyInflation: field(asBoolean, (stream: EffectiveIncomeStream, applyInflation) => ({ ...stream, applyInflation })),
  includeInNestEgg: field(asBoolean, (stream: EffectiveIncomeStream, includeInNestEgg) => ({ ...stream, includeInNestEgg })),
  growthRate: field(asGrowthRate, (stream: EffectiveIncomeStream, growth) => ({ ...stream, growth })),
};

/** Overridable field names per entity kind. */
export const OVERRIDABLE_FIELDS: Record<EntityKind, readonly string[]> = {
  asset: Object.keys(ASSET_FIELDS),
  liability: Object.keys(LIABILITY_FIELDS),
  flow: Object.keys(FLOW_FIELDS),
  income: Object.keys(INCOME_FIELDS),
};

function lookup<E>(table: Record<string, Patcher<E>>, name: string): Patcher<E> | undefined {
  return Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
}

interface IndexedPatch {
  index: number;
  override: PatchOverride;
}

/**
 * Applies the patches for one entity kind, in list order, skipping removed entities.
 */
function applyKind<E>(
  kind: EntityKind,
  entities: E[],
  idOf: (entity: E) => number,
  table: Record<string, Patcher<E>>,
  patches: IndexedPatch[],
  removed: Set<number>
): E[] {
  const byId = new Map<number, E>(entities.map((entity): [number, E] => [idOf(entity), entity]));

  for (const { index, override } of patches) {
    const id = override.target.id;
    const current = byId.get(id);
    const patcher = lookup(table, override.field);
    if (removed.has(id) || current === undefined || patcher === undefined) {
      continue;
    }
    const next = patcher(current, override.value);
    if (next === null) {
      throw new InvalidOverrideValueError(kind, override.field, String(override.value), index);
    }
    byId.set(id, next);
  }

  const result: E[] = [];
  for (const entity of entities) {
    const id = idOf(entity);
    const effective = byId.get(id);
    if (!removed.has(id) && effective !== undefined) {
      result.push(effective);
    }
  }
  return result;
}

function emptyKindMap<T>(make: () => T): Record<EntityKind, T> {
  return { asset: make(), liability: make(), flow: make(), income: make() };
}

/**
 * Produces the effective entity set for the base case or a scenario.
 *
 * @param baseFacts - Plan base facts; never modified
 * @param overrides - Scenario overrides in list order (empty for the base case)
 * @param scenarioAssumptions - Scenario assumption overrides and retirement spending
 * @returns Fresh entity collections with every override applied
 * @throws DanglingOverrideReferenceError when an override targets an id absent from base facts
 * @throws UnknownOverrideFieldError when a patch names a field that cannot be overridden
 * @throws InvalidOverrideValueError when a patch value cannot be coerced to the field's type
 * @throws IncompleteEntityError when a base record is missing a required field
 */
export function resolve(
  baseFacts: BaseFacts,
  overrides: Override[] = [],
  scenarioAssumptions?: ScenarioAssumptions
): EffectiveEntitySet {
  const base = toEffectiveEntitySet(baseFacts, scenarioAssumptions);

  const baseIds: Record<EntityKind, Set<number>> = {
    asset: new Set(base.assets.map((a) => a.assetId)),
    liability: new Set(base.liabilities.map((l) => l.liabilityId)),
    flow: new Set(base.flows.map((f) => f.flowId)),
    income: new Set(base.incomeStreams.map((s) => s.incomeId)),
  };
  const removed = emptyKindMap(() => new Set<number>());
  const patches = emptyKindMap((): IndexedPatch[] => []);

  overrides.forEach((override, index) => {
    const { entity, id } = override.target;
    if (!ENTITY_KINDS.includes(entity) || !baseIds[entity].has(id)) {
      throw new DanglingOverrideReferenceError(entity, id, index);
    }
    if (override.kind === "remove") {
      removed[entity].add(id);
      return;
    }
    if (!OVERRIDABLE_FIELDS[entity].includes(override.field)) {
      throw new UnknownOverrideFieldError(entity, override.field, index);
    }
    patches[entity].push({ index, override });
  });

  return {
    assumptions: base.assumptions,
    assets: applyKind("asset", base.assets, (a) => a.assetId, ASSET_FIELDS, patches.asset, removed.asset),
    liabilities: applyKind(
      "liability",
      base.liabilities,
      (l) => l.liabilityId,
      LIABILITY_FIELDS,
      patches.liability,
      removed.liability
    ),
    flows: applyKind("flow", base.flows, (f) => f.flowId, FLOW_FIELDS, patches.flow, removed.flow),
    incomeStreams: applyKind(
      "income",
      base.incomeStreams,
      (s) => s.incomeId,
      INCOME_FIELDS,
      patches.income,
      removed.income
    ),
  };
}

export interface OverrideSummary {
  asset: number;
  liability: number;
  flow: number;
  income: number;
  removals: number;
}

/**
 * Counts overrides per entity kind (patches and removals) plus the number of removals.
 */
export function summarizeOverrides(overrides: Override[]): OverrideSummary {
  const summary: OverrideSummary = { asset: 0, liability: 0, flow: 0, income: 0, removals: 0 };
  for (const override of overrides) {
    summary[override.target.entity] += 1;
    if (override.kind === "remove") {
      summary.removals += 1;
    }
  }
  return summary;
}

/**
 * Splits overrides into those whose target still exists in base facts and those that dangle.
 * Storage layers call this after deleting a base entity, mirroring a cascading delete.
 */
export function pruneDanglingOverrides(
  baseFacts: BaseFacts,
  overrides: Override[]
): { kept: Override[]; dropped: Override[] } {
  const ids: Record<EntityKind, Set<number>> = {
    asset: new Set(baseFacts.assets.map((a) => a.assetId)),
    liability: new Set(baseFacts.liabilities.map((l) => l.liabilityId)),
    flow: new Set(baseFacts.flows.map((f) => f.flowId)),
    income: new Set(baseFacts.incomeStreams.map((s) => s.incomeId)),
  };
  const kept: Override[] = [];
  const dropped: Override[] = [];
  for (const override of overrides) {
    const targetIds = ids[override.target.entity];
    if (targetIds !== undefined && targetIds.has(override.target.id)) {
      kept.push(override);
    } else {
      dropped.push(override);
    }
  }
  return { kept, dropped };
}
