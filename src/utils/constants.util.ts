/**
 * Available runtime environments for the application.
 *
 * Maps to the `NODE_ENV` environment variable
 */
export enum RuntimeEnvironment {
	Development = "development",
	Test = "test",
	Staging = "staging",
	Production = "production",
}

/** Logging levels used throughout the application */
export enum LogLevel {
	Trace = "trace",
	Debug = "debug",
	Info = "info",
	Warn = "warn",
	Error = "error",
	Fatal = "fatal",
	Silent = "silent",
}

/** Identifier of the invariant (culture-neutral) culture, root of every fallback chain */
export const INVARIANT_CULTURE = "";

/**
 * Cache key segment used in place of the invariant culture.
 *
 * Keeps the last segment of a cache key non-empty.
 */
export const INVARIANT_CULTURE_SEGMENT = "_";

/** Separator between the segments of a cache key */
export const CACHE_KEY_SEPARATOR = ":";

/** Separator between the subtags of a culture identifier (e.g. `"en-US"`) */
export const CULTURE_SUBTAG_SEPARATOR = "-";

/** Default Redis Pub/Sub channel for invalidation messages */
export const DEFAULT_INVALIDATION_CHANNEL = "localization:invalidate";

/** Standard error messages used throughout the application */
export const errorMessages = {
	operationCancelled: (operation: string) => `Operation cancelled: ${operation}`,
	publishFailed: (channel: string) => `Failed to publish invalidation on channel "${channel}"`,
	invalidMessage: "Received malformed invalidation message",
	formatIndexOutOfRange: (index: number, count: number) =>
		`Format item index ${index} is out of range (${count} argument(s) supplied)`,
	formatMalformed: (position: number) => `Malformed format string at position ${position}`,
} as const;

export const environmentDefaults = {
	NODE_ENV: RuntimeEnvironment.Development,
	LOG_LEVEL: LogLevel.Info,
	LOG_TO_CONSOLE: true,
	DATABASE_PATH: "translations.sqlite",
	INVALIDATION_CHANNEL: DEFAULT_INVALIDATION_CHANNEL,
	LOCALIZATION_CACHE_DURATION_MS: 10 * 60 * 1_000,
	LOCALIZATION_FALLBACK_TO_PARENT_CULTURES: true,
	LOCALIZATION_CACHE_KEY_PREFIX: "db_localize",
	LOCALIZATION_RETURN_KEY_IF_NOT_FOUND: true,
} as const;
