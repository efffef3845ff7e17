import Decimal from "decimal.js";
import { OWNERS, Owner, PersonSlot } from "../models/Household";
import { BaseAssumptions, BaseFacts } from "../models/Plan";
import { Asset } from "../models/Asset";
import { Liability } from "../models/Liability";
import { ScheduledFlow } from "../models/ScheduledFlow";
import { RetirementIncomeStream } from "../models/RetirementIncome";
import { GrowthConfig, RateInterval } from "../models/GrowthConfig";
import { ScenarioAssumptions } from "../models/Scenario";
import {
  EffectiveAssumptions,
  EffectiveAsset,
  EffectiveEntitySet,
  EffectiveFlow,
  EffectiveIncomeStream,
  EffectiveLiability,
} from "../models/EffectiveEntitySet";
import { IncompleteEntityError } from "../utils/errors";
import { ZERO, tryDecimal } from "../utils/money";
import { validateIntervals } from "./rateResolver";

/**
 * Conversion of input records into effective (decimal) entities.
 * Every required field is checked here.
 */

function requireDecimal(entity: string, id: number | null, field: string, value: unknown): Decimal {
  const parsed = tryDecimal(value);
  if (parsed === null) {
    throw new IncompleteEntityError(entity, id, field, value === undefined || value === null ? "is missing" : "is not numeric");
  }
  return parsed;
}

function optionalDecimal(entity: string, id: number | null, field: string, value: unknown): Decimal | null {
  if (value === undefined || value === null) {
    return null;
  }
  return requireDecimal(entity, id, field, value);
}

function requireInteger(entity: string, id: number | null, field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new IncompleteEntityError(entity, id, field, value === undefined || value === null ? "is missing" : "must be a whole number");
  }
  return value;
}

function optionalInteger(entity: string, id: number | null, field: string, value: unknown): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  return requireInteger(entity, id, field, value);
}

function requireBoolean(entity: string, id: number, field: string, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new IncompleteEntityError(entity, id, field, "must be true or false");
  }
  return value;
}

function requireOwner(entity: string, id: number, value: unknown): Owner {
  const owner = OWNERS.find((candidate) => candidate === value);
  if (!owner) {
    throw new IncompleteEntityError(entity, id, "owner", "must be person1, person2 or joint");
  }
  return owner;
}

function requireSlot(field: string, value: unknown): PersonSlot {
  if (value === 1 || value === 2) {
    return value;
  }
  throw new IncompleteEntityError("assumptions", null, field, "must be 1 or 2");
}

function requireName(entity: string, id: number, value: unknown): string {
  if (typeof value !== "string") {
    throw new IncompleteEntityError(entity, id, "name", "is missing");
  }
  return value;
}

/**
 * Converts a growth configuration, validating stepwise intervals.
 *
 * @throws OverlappingIntervalsError for overlapping or unordered intervals
 */
export function toEffectiveGrowth(config: GrowthConfig | undefined, entity: string, id: number): GrowthConfig<Decimal> {
  if (!config) {
    throw new IncompleteEntityError(entity, id, "growth", "is missing");
  }
  switch (config.type) {
    case "DEFAULT":
      return { type: "DEFAULT" };
    case "OVERRIDE":
      return { type: "OVERRIDE", rate: requireDecimal(entity, id, "growth.rate", config.rate) };
    case "STEPWISE": {
      if (!Array.isArray(config.intervals)) {
        throw new IncompleteEntityError(entity, id, "growth.intervals", "is missing");
      }
      const intervals: RateInterval<Decimal>[] = config.intervals.map((interval) => ({
        startYear: requireInteger(entity, id, "growth.intervals.startYear", interval.startYear),
        endYear: optionalInteger(entity, id, "growth.intervals.endYear", interval.endYear),
        rate: requireDecimal(entity, id, "growth.intervals.rate", interval.rate),
      }));
      validateIntervals(intervals, `${entity} ${id}`);
      return { type: "STEPWISE", intervals };
    }
    default:
      throw new IncompleteEntityError(entity, id, "growth.type", "must be DEFAULT, OVERRIDE or STEPWISE");
  }
}

export function toEffectiveAsset(asset: Asset): EffectiveAsset {
  const id = requireInteger("asset", null, "assetId", asset.assetId);
  return {
    assetId: id,
    name: requireName("asset", id, asset.name),
    owner: requireOwner("asset", id, asset.owner),
    value: requireDecimal("asset", id, "value", asset.value),
    includeInNestEgg: requireBoolean("asset", id, "includeInNestEgg", asset.includeInNestEgg),
    categoryId: asset.categoryId ?? null,
    growth: toEffectiveGrowth(asset.growth, "asset", id),
  };
}

export function toEffectiveLiability(liability: Liability): EffectiveLiability {
  const id = requireInteger("liability", null, "liabilityId", liability.liabilityId);
  return {
    liabilityId: id,
    name: requireName("liability", id, liability.name),
    owner: requireOwner("liability", id, liability.owner),
    value: requireDecimal("liability", id, "value", liability.value),
    includeInNestEgg: requireBoolean("liability", id, "includeInNestEgg", liability.includeInNestEgg),
    categoryId: liability.categoryId ?? null,
    interestRate: optionalDecimal("liability", id, "interestRate", liability.interestRate),
  };
}

export function toEffectiveFlow(flow: ScheduledFlow): EffectiveFlow {
  const id = requireInteger("flow", null, "flowId", flow.flowId);
  if (flow.type !== "INFLOW" && flow.type !== "OUTFLOW") {
    throw new IncompleteEntityError("flow", id, "type", "must be INFLOW or OUTFLOW");
  }
  return {
    flowId: id,
    name: requireName("flow", id, flow.name),
    owner: requireOwner("flow", id, flow.owner),
    type: flow.type,
    annualAmount: requireDecimal("flow", id, "annualAmount", flow.annualAmount),
    startYear: requireInteger("flow", id, "startYear", flow.startYear),
    endYear: optionalInteger("flow", id, "endYear", flow.endYear),
    applyInflation: requireBoolean("flow", id, "applyInflation", flow.applyInflation),
  };
}

export function toEffectiveIncomeStream(stream: RetirementIncomeStream): EffectiveIncomeStream {
  const id = requireInteger("income", null, "incomeId", stream.incomeId);
  return {
    incomeId: id,
    name: requireName("income", id, stream.name),
    owner: requireOwner("income", id, stream.owner),
    annualIncome: requireDecimal("income", id, "annualIncome", stream.annualIncome),
    startAge: requireInteger("income", id, "startAge", stream.startAge),
    endAge: optionalInteger("income", id, "endAge", stream.endAge),
    applyInflation: requireBoolean("income", id, "applyInflation", stream.applyInflation),
    includeInNestEgg: requireBoolean("income", id, "includeInNestEgg", stream.includeInNestEgg),
    growth: stream.growth ? toEffectiveGrowth(stream.growth, "income", id) : null,
  };
}

/**
 * Resolves global assumptions field by field: the scenario value when present, else the base value.
 * Retirement spending exists only on scenarios and defaults to zero.
 */
export function resolveAssumptions(base: BaseAssumptions, scenario: ScenarioAssumptions = {}): EffectiveAssumptions {
  return {
    defaultGrowthRate: requireDecimal("assumptions", null, "defaultGrowthRate", scenario.defaultGrowthRate ?? base.defaultGrowthRate),
    inflationRate: requireDecimal("assumptions", null, "inflationRate", scenario.inflationRate ?? base.inflationRate),
    retirementAge1: optionalInteger("assumptions", null, "retirementAge1", scenario.retirementAge1 ?? base.retirementAge1),
    retirementAge2: optionalInteger("assumptions", null, "retirementAge2", scenario.retirementAge2 ?? base.retirementAge2),
    finalAge1: optionalInteger("assumptions", null, "finalAge1", base.finalAge1),
    finalAge2: optionalInteger("assumptions", null, "finalAge2", base.finalAge2),
    finalAgeSelector: requireSlot("finalAgeSelector", base.finalAgeSelector),
    annualRetirementSpending:
      optionalDecimal("assumptions", null, "annualRetirementSpending", scenario.annualRetirementSpending) ?? ZERO,
  };
}

function assertUniqueIds(entity: string, ids: number[]): void {
  const seen = new Set<number>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new IncompleteEntityError(entity, id, "id", "is used by more than one entity");
    }
    seen.add(id);
  }
}

/**
 * Converts every base-facts collection into fresh effective entities.
 * Nothing in the result shares mutable state with the input.
 */
export function toEffectiveEntitySet(baseFacts: BaseFacts, scenario?: ScenarioAssumptions): EffectiveEntitySet {
  const set: EffectiveEntitySet = {
    assumptions: resolveAssumptions(baseFacts.assumptions, scenario),
    assets: baseFacts.assets.map(toEffectiveAsset),
    liabilities: baseFacts.liabilities.map(toEffectiveLiability),
    flows: baseFacts.flows.map(toEffectiveFlow),
    incomeStreams: baseFacts.incomeStreams.map(toEffectiveIncomeStream),
  };
  assertUniqueIds("asset", set.assets.map((a) => a.assetId));
  assertUniqueIds("liability", set.liabilities.map((l) => l.liabilityId));
  assertUniqueIds("flow", set.flows.map((f) => f.flowId));
  assertUniqueIds("income", set.incomeStreams.map((s) => s.incomeId));
  return set;
}
