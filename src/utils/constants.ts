/**
 * Shared constants for projection and override resolution.
 */

/** Override tokens read as boolean true (compared trimmed and lower-cased). */
export const TRUE_TOKENS: ReadonlySet<string> = new Set(["true", "t", "yes", "y", "on", "1"]);

/** Override tokens read as boolean false. */
export const FALSE_TOKENS: ReadonlySet<string> = new Set(["false", "f", "no", "n", "off", "0"]);

/** Override tokens that clear a nullable field. */
export const NULL_TOKENS: ReadonlySet<string> = new Set(["", "null", "none"]);

/** Growth-rate override token that restores the default growth treatment. */
export const DEFAULT_GROWTH_TOKEN = "default";

/** Decimal places of projection output values. */
export const DEFAULT_DECIMAL_PLACES = 2;

/** Default HTTP port for the API server. */
export const DEFAULT_PORT = 3000;
