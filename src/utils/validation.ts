import { z } from "zod";

/**
 * Zod validation schemas for projection inputs.
 * These schemas check record shape at the delivery surfaces; numeric content
 * (amounts and rates given as strings) is checked again when records are resolved.
 */

/**
 * Amount or rate: a JSON number, or a decimal string such as "0.055" for exact input.
 */
export const NumericSchema = z.union([z.number(), z.string()]);

export const PersonSlotSchema = z.union([z.literal(1), z.literal(2)]);

export const OwnerSchema = z.enum(["person1", "person2", "joint"]);

export const PersonSchema = z.object({
  name: z.string().optional(),
  dateOfBirth: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO date (YYYY-MM-DD)"),
});

export const HouseholdSchema = z.object({
  householdId: z.number().int().optional(),
  name: z.string().optional(),
  person1: PersonSchema.optional(),
  person2: PersonSchema.optional(),
});

/**
 * Schema for one stepwise growth interval. A missing end year means open-ended.
 */
export const RateIntervalSchema = z.object({
  startYear: z.number().int(),
  endYear: z.number().int().nullable().default(null),
  rate: NumericSchema,
});

/**
 * Schema for a growth configuration, discriminated by `type`.
 */
export const GrowthConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("DEFAULT") }),
  z.object({ type: z.literal("OVERRIDE"), rate: NumericSchema }),
  z.object({ type: z.literal("STEPWISE"), intervals: z.array(RateIntervalSchema) }),
]);

export const AssetSchema = z.object({
  assetId: z.number().int(),
  name: z.string(),
  owner: OwnerSchema,
  value: NumericSchema,
  includeInNestEgg: z.boolean(),
  categoryId: z.number().int().nullable().optional(),
  growth: GrowthConfigSchema,
});

export const LiabilitySchema = z.object({
  liabilityId: z.number().int(),
  name: z.string(),
  owner: OwnerSchema,
  value: NumericSchema,
  includeInNestEgg: z.boolean(),
  categoryId: z.number().int().nullable().optional(),
  interestRate: NumericSchema.nullable().optional(),
});

export const ScheduledFlowSchema = z.object({
  flowId: z.number().int(),
  name: z.string(),
  owner: OwnerSchema,
  type: z.enum(["INFLOW", "OUTFLOW"]),
  annualAmount: NumericSchema,
  startYear: z.number().int(),
  endYear: z.number().int().nullable().default(null),
  applyInflation: z.boolean(),
});

export const RetirementIncomeStreamSchema = z.object({
  incomeId: z.number().int(),
  name: z.string(),
  owner: OwnerSchema,
  annualIncome: NumericSchema,
  startAge: z.number().int().min(0),
  endAge: z.number().int().min(0).nullable().default(null),
  applyInflation: z.boolean(),
  includeInNestEgg: z.boolean(),
  growth: GrowthConfigSchema.nullable().optional(),
});

export const BaseAssumptionsSchema = z.object({
  defaultGrowthRate: NumericSchema,
  inflationRate: NumericSchema,
  retirementAge1: z.number().int().min(0).nullable().optional(),
  retirementAge2: z.number().int().min(0).nullable().optional(),
  finalAge1: z.number().int().min(0).nullable().optional(),
  finalAge2: z.number().int().min(0).nullable().optional(),
  finalAgeSelector: PersonSlotSchema,
});

/**
 * Schema for plan base facts. Every collection defaults to empty.
 */
export const BaseFactsSchema = z.object({
  assumptions: BaseAssumptionsSchema,
  assets: z.array(AssetSchema).default([]),
  liabilities: z.array(LiabilitySchema).default([]),
  flows: z.array(ScheduledFlowSchema).default([]),
  incomeStreams: z.array(RetirementIncomeStreamSchema).default([]),
});

export const PlanSchema = z.object({
  planId: z.number().int(),
  name: z.string(),
  planCreationYear: z.number().int(),
  referencePerson: PersonSlotSchema,
  baseFacts: BaseFactsSchema,
});

export const EntityRefSchema = z.object({
  entity: z.enum(["asset", "liability", "flow", "income"]),
  id: z.number().int(),
});

/**
 * Schema for a scenario override: a field patch or an entity removal.
 */
export const OverrideSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("patch"),
    target: EntityRefSchema,
    field: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  }),
  z.object({
    kind: z.literal("remove"),
    target: EntityRefSchema,
  }),
]);

export const ScenarioAssumptionsSchema = z.object({
  defaultGrowthRate: NumericSchema.nullable().optional(),
  inflationRate: NumericSchema.nullable().optional(),
  retirementAge1: z.number().int().min(0).nullable().optional(),
  retirementAge2: z.number().int().min(0).nullable().optional(),
  annualRetirementSpending: NumericSchema.nullable().optional(),
});

export const ScenarioSchema = z.object({
  scenarioId: z.number().int(),
  name: z.string(),
  color: z.string().optional(),
  assumptions: ScenarioAssumptionsSchema.default({}),
  overrides: z.array(OverrideSchema).default([]),
});

/**
 * Body of POST /api/projection: the base case, or one scenario when given.
 */
export const ProjectionRequestSchema = z.object({
  household: HouseholdSchema,
  plan: PlanSchema,
  scenario: ScenarioSchema.optional(),
  includeBreakdown: z.boolean().optional(),
});

/**
 * Body of POST /api/compare, and the CLI input file.
 */
export const CompareRequestSchema = z.object({
  household: HouseholdSchema,
  plan: PlanSchema,
  scenarios: z.array(ScenarioSchema).default([]),
});

/**
 * Body of POST /api/resolve
 */
export const ResolveRequestSchema = z.object({
  plan: PlanSchema,
  scenario: ScenarioSchema.optional(),
});

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Flattens zod issues to `{ path, message }` pairs, e.g. `plan.baseFacts.assets.0.value`.
 */
export function formatIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
