import { z } from "zod";

import { environmentDefaults, LogLevel, RuntimeEnvironment } from "./constants.util";

/** Environment configuration schema for runtime validation */
const envSchema = z.object({
	/**
	 * Node.js's runtime environment.
	 *
	 * @default "development"
	 */
	NODE_ENV: z.enum(RuntimeEnvironment).default(environmentDefaults.NODE_ENV),

	/**
	 * Logging level for the application.
	 *
	 * @default "info"
	 */
	LOG_LEVEL: z.enum(LogLevel).default(environmentDefaults.LOG_LEVEL),

	/**
	 * Whether to enable console logging in addition to file logging.
	 *
	 * @default true
	 */
	LOG_TO_CONSOLE: z.stringbool().default(environmentDefaults.LOG_TO_CONSOLE),

	/**
	 * Path of the SQLite database holding the translations table.
	 * Use `":memory:"` for a throwaway database.
	 *
	 * @default "translations.sqlite"
	 */
	DATABASE_PATH: z.string().min(1).default(environmentDefaults.DATABASE_PATH),

	/**
	 * Redis connection URL used for invalidation Pub/Sub.
	 *
	 * When unset, invalidations stay local to the process.
	 */
	REDIS_URL: z.url().optional(),

	/**
	 * Redis channel carrying invalidation messages.
	 *
	 * @default "localization:invalidate"
	 */
	INVALIDATION_CHANNEL: z.string().min(1).default(environmentDefaults.INVALIDATION_CHANNEL),

	/**
	 * Time-to-live of each cached lookup, in **milliseconds**.
	 *
	 * @default 600000 (10 minutes)
	 */
	LOCALIZATION_CACHE_DURATION_MS: z.coerce
		.number()
		.positive()
		.default(environmentDefaults.LOCALIZATION_CACHE_DURATION_MS),

	/**
	 * Whether lookups walk the parent cultures (`"en-US"` → `"en"`).
	 *
	 * @default true
	 */
	LOCALIZATION_FALLBACK_TO_PARENT_CULTURES: z
		.stringbool()
		.default(environmentDefaults.LOCALIZATION_FALLBACK_TO_PARENT_CULTURES),

	/** Culture probed after the parent cultures and before the invariant culture */
	LOCALIZATION_GLOBAL_FALLBACK_CULTURE: z.string().optional(),

	/**
	 * Prefix of every cache key.
	 *
	 * @default "db_localize"
	 */
	LOCALIZATION_CACHE_KEY_PREFIX: z
		.string()
		.min(1)
		.default(environmentDefaults.LOCALIZATION_CACHE_KEY_PREFIX),

	/**
	 * Whether an unresolved key is surfaced as itself (`true`) or as an empty string.
	 *
	 * @default true
	 */
	LOCALIZATION_RETURN_KEY_IF_NOT_FOUND: z
		.stringbool()
		.default(environmentDefaults.LOCALIZATION_RETURN_KEY_IF_NOT_FOUND),
});

/** Type definition for the environment configuration */
export type Environment = z.infer<typeof envSchema>;

/**
 * Validates all environment variables against the defined schema.
 *
 * ### Workflow
 * 1. Parses environment variables using Zod schema
 * 2. Applies defaults for every optional variable
 * 3. Throws detailed error messages for invalid configurations
 *
 * @param source Optional environment object to validate (defaults to `process.env`)
 *
 * @throws {Error} Detailed validation errors if environment variables are invalid
 */
export function validateEnv(source: Record<string, string | undefined> = process.env): Environment {
	try {
		return envSchema.parse(source);
	} catch (error) {
		if (error instanceof z.ZodError) {
			const issues = error.issues
				.map((issue) => `- ${issue.path.join(".")}: ${issue.message}`)
				.join("\n");
			throw new Error(`❌ Invalid environment variables:\n${issues}`);
		}

		throw error;
	}
}

export const env = validateEnv();
