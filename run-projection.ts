import * as fs from "fs";
import * as path from "path";
import { ProjectionPlanner } from "./src/planner/scenarioComparator";
import { loadConfig } from "./src/utils/config";
import { isProjectionError } from "./src/utils/errors";
import { formatAmount } from "./src/utils/money";
import { serializeComparison } from "./src/utils/serialization";
import { CompareRequestSchema, formatIssues } from "./src/utils/validation";
import { ScenarioComparison } from "./src/models/ProjectionResult";
import { countEntities } from "./src/models/Plan";
import { summarizeOverrides } from "./src/engine/overrides";

/**
 * Project the base case and every scenario in an input file, print a per-year
 * nest egg table and write the comparison JSON.
 * Usage: npx ts-node run-projection.ts [input-file] [output-file]
 * Default input: example-plan.json, default output: projection-output.json
 */
const inputPath = process.argv[2] ?? "example-plan.json";
const outputPath = process.argv[3] ?? "projection-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = CompareRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file must contain household, plan and (optionally) scenarios:");
  for (const issue of formatIssues(parsed.error)) {
    console.error(`  ${issue.path || "(root)"}: ${issue.message}`);
  }
  process.exit(1);
}

function printTable(comparison: ScenarioComparison, decimalPlaces: number): void {
  const columns = ["Base", ...comparison.scenarios.map((scenario) => scenario.name)];
  console.log(["Year".padEnd(6), ...columns.map((name) => name.padStart(18))].join(" "));

  comparison.years.forEach((year, index) => {
    const values = [comparison.base, ...comparison.scenarios.map((scenario) => scenario.series)].map((series) =>
      formatAmount(series.points[index].nestEgg, decimalPlaces).padStart(18)
    );
    console.log([String(year).padEnd(6), ...values].join(" "));
  });

  for (const scenario of comparison.scenarios) {
    console.log(`${scenario.name}: final nest egg vs base ${formatAmount(scenario.finalNestEggDelta, decimalPlaces)}`);
  }
}

const { household, plan, scenarios } = parsed.data;
const { decimalPlaces } = loadConfig();

try {
  console.log(`Projecting plan "${plan.name}" (${countEntities(plan.baseFacts)} entities) with ${scenarios.length} scenario(s)...`);
  for (const scenario of scenarios) {
    const summary = summarizeOverrides(scenario.overrides);
    console.log(
      `  ${scenario.name}: ${scenario.overrides.length} override(s), ${summary.removals} removal(s)`
    );
  }
  const planner = new ProjectionPlanner({ household, plan, options: { decimalPlaces } });
  const comparison = planner.compare(scenarios);

  console.log(`Window: ${comparison.startYear}-${comparison.endYear} (retirement ${comparison.base.window.retirementYear})\n`);
  printTable(comparison, decimalPlaces);

  fs.writeFileSync(outputPath, JSON.stringify(serializeComparison(comparison, decimalPlaces), null, 2));
  console.log(`\nComparison saved to ${outputPath}`);
} catch (err) {
  if (isProjectionError(err)) {
    console.error(`Projection failed [${err.code}]: ${err.message}`);
  } else {
    console.error("Projection failed:", err);
  }
  process.exit(1);
}
