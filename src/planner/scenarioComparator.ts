import { Household } from "../models/Household";
import { Plan } from "../models/Plan";
import { Scenario } from "../models/Scenario";
import {
  ProjectionSeries,
  ScenarioComparison,
  ScenarioProjection,
  getFinalPoint,
} from "../models/ProjectionResult";
import { resolve } from "../engine/overrides";
import { ProjectionOptions, project } from "../engine/projection";
import { projectionWindow, projectionYears } from "../utils/time";

/**
 * Planning context: one household and one plan, shared by the base case and every scenario.
 */
export interface ProjectionContext {
  household: Household;
  plan: Plan;
  options?: ProjectionOptions;
}

/**
 * Scenario planner for nest egg projections.
 *
 * Every run re-resolves the plan's base facts from scratch, so scenarios never see each
 * other's overrides. All runs share the plan's start and end years; a scenario may move the
 * retirement year through its own retirement ages.
 */
export class ProjectionPlanner {
  private context: ProjectionContext;

  constructor(context: ProjectionContext) {
    this.context = context;
  }

  /**
   * Base case: plan base facts with no scenario applied
   */
  projectBase(): ProjectionSeries {
    const { household, plan, options } = this.context;
    const window = projectionWindow(household, plan);
    return project(resolve(plan.baseFacts, []), window, options);
  }

  /**
   * One scenario over the plan window
   */
  projectScenario(scenario: Scenario): ProjectionSeries {
    const { household, plan, options } = this.context;
    const window = projectionWindow(household, plan, scenario.assumptions);
    const entities = resolve(plan.baseFacts, scenario.overrides, scenario.assumptions);
    return project(entities, window, options);
  }

  projectScenarios(scenarios: Scenario[]): ProjectionSeries[] {
    return scenarios.map((scenario) => this.projectScenario(scenario));
  }

  /**
   * Base case plus each scenario, aligned by year.
   * Each scenario also reports its final-year nest egg minus the base case's.
   */
  compare(scenarios: Scenario[]): ScenarioComparison {
    const base = this.projectBase();
    const baseFinal = getFinalPoint(base).nestEgg;

    const projections: ScenarioProjection[] = scenarios.map((scenario) => {
      const series = this.projectScenario(scenario);
      return {
        scenarioId: scenario.scenarioId,
        name: scenario.name,
        series,
        finalNestEggDelta: getFinalPoint(series).nestEgg.minus(baseFinal),
      };
    });

    return {
      startYear: base.window.startYear,
      endYear: base.window.endYear,
      years: projectionYears(base.window),
      base,
      scenarios: projections,
    };
  }
}

/**
 * Projects the base case and every scenario over the plan's window.
 *
 * @example
 * ```ts
 * const comparison = compareScenarios(household, plan, [earlyRetirement, lowerGrowth]);
 * comparison.scenarios[0].finalNestEggDelta // negative when the scenario ends below base
 * ```
 */
export function compareScenarios(
  household: Household,
  plan: Plan,
  scenarios: Scenario[],
  options?: ProjectionOptions
): ScenarioComparison {
  return new ProjectionPlanner({ household, plan, options }).compare(scenarios);
}
