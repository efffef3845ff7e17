export { resolve, summarizeOverrides, pruneDanglingOverrides, OVERRIDABLE_FIELDS } from "./engine/overrides";
export type { OverrideSummary } from "./engine/overrides";
export { project, prepare, seedBalances } from "./engine/projection";
export type { ProjectionOptions } from "./engine/projection";
export { advance } from "./engine/transition";
export type { Balances, PreparedEntities, YearState } from "./engine/transition";
export { effectiveRate, validateIntervals, createRateSchedule } from "./engine/rateResolver";
export type { RateSchedule } from "./engine/rateResolver";
export { compareScenarios, ProjectionPlanner } from "./planner/scenarioComparator";
export { projectionWindow, projectionYears, isYearInWindow, yearForAge, ageForYear } from "./utils/time";
export * from "./utils/errors";
export { serializeSeries, serializeComparison } from "./utils/serialization";
export * from "./models/Household";
export * from "./models/GrowthConfig";
export * from "./models/Asset";
export * from "./models/Liability";
export * from "./models/ScheduledFlow";
export * from "./models/RetirementIncome";
export * from "./models/Plan";
export * from "./models/Scenario";
export * from "./models/EffectiveEntitySet";
export * from "./models/ProjectionResult";
