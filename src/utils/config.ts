import { z } from "zod";
import { DEFAULT_DECIMAL_PLACES, DEFAULT_PORT } from "./constants";

/**
 * Runtime configuration read from environment variables.
 */

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  PROJECTION_DECIMAL_PLACES: z.coerce.number().int().min(0).max(10).default(DEFAULT_DECIMAL_PLACES),
});

export interface AppConfig {
  port: number;
  decimalPlaces: number;
}

/**
 * Load configuration from an environment map.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error listing every invalid variable
 *
 * @example
 * ```ts
 * loadConfig({ PORT: "8080" }) // { port: 8080, decimalPlaces: 2 }
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse({
    PORT: env.PORT || undefined,
    PROJECTION_DECIMAL_PLACES: env.PROJECTION_DECIMAL_PLACES || undefined,
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${details.join("; ")}`);
  }
  return {
    port: result.data.PORT,
    decimalPlaces: result.data.PROJECTION_DECIMAL_PLACES,
  };
}
