import { Router, Request, Response } from "express";
import { ZodError } from "zod";
import { ProjectionPlanner } from "../planner/scenarioComparator";
import { resolve } from "../engine/overrides";
import { isProjectionError } from "../utils/errors";
import { loadConfig } from "../utils/config";
import { serializeComparison, serializeSeries } from "../utils/serialization";
import {
  CompareRequestSchema,
  ProjectionRequestSchema,
  ResolveRequestSchema,
  formatIssues,
} from "../utils/validation";

const router = Router();
const config = loadConfig();

function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: "Invalid request body",
    issues: formatIssues(error),
  });
}

/**
 * Engine faults are caller errors (422); anything else is ours (500).
 */
function sendEngineError(res: Response, error: unknown, operation: string): void {
  if (isProjectionError(error)) {
    console.error(`${operation} rejected: [${error.code}] ${error.message}`);
    res.status(422).json({
      error: error.code,
      message: error.message,
      context: error.context,
    });
    return;
  }
  console.error(`Error in ${operation}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * POST /api/projection
 * Project the base case, or a single scenario when one is supplied
 */
router.post("/projection", (req: Request, res: Response) => {
  const parsed = ProjectionRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendValidationError(res, parsed.error);
  }

  try {
    const { household, plan, scenario, includeBreakdown } = parsed.data;
    const planner = new ProjectionPlanner({
      household,
      plan,
      options: { decimalPlaces: config.decimalPlaces, includeBreakdown },
    });
    const series = scenario ? planner.projectScenario(scenario) : planner.projectBase();

    res.json({
      planId: plan.planId,
      scenarioId: scenario ? scenario.scenarioId : null,
      series: serializeSeries(series, config.decimalPlaces),
    });
  } catch (error) {
    sendEngineError(res, error, "projection");
  }
});

/**
 * POST /api/compare
 * Project the base case and every scenario over the plan's window
 */
router.post("/compare", (req: Request, res: Response) => {
  const parsed = CompareRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendValidationError(res, parsed.error);
  }

  try {
    const { household, plan, scenarios } = parsed.data;
    const planner = new ProjectionPlanner({
      household,
      plan,
      options: { decimalPlaces: config.decimalPlaces },
    });
    const comparison = planner.compare(scenarios);

    res.json({
      planId: plan.planId,
      comparison: serializeComparison(comparison, config.decimalPlaces),
    });
  } catch (error) {
    sendEngineError(res, error, "scenario comparison");
  }
});

/**
 * POST /api/resolve
 * Return the effective entity set for a plan and optional scenario.
 * Decimal amounts and rates are returned as strings.
 */
router.post("/resolve", (req: Request, res: Response) => {
  const parsed = ResolveRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendValidationError(res, parsed.error);
  }

  try {
    const { plan, scenario } = parsed.data;
    const entities = scenario
      ? resolve(plan.baseFacts, scenario.overrides, scenario.assumptions)
      : resolve(plan.baseFacts, []);

    res.json({
      planId: plan.planId,
      scenarioId: scenario ? scenario.scenarioId : null,
      entities,
    });
  } catch (error) {
    sendEngineError(res, error, "override resolution");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Nest Egg Projection API",
    version: "1.0.0",
    endpoints: {
      projection: "POST /api/projection - Project the base case or one scenario",
      compare: "POST /api/compare - Compare scenarios against the base case",
      resolve: "POST /api/resolve - Resolve scenario overrides into effective entities",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
