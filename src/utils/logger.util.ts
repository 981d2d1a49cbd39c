import pino from "pino";

import type { TransportTargetOptions } from "pino";

import { LogLevel, RuntimeEnvironment } from "./constants.util";
import { env } from "./env.util";

/**
 * Determines the log level based on environment
 *
 * - Production: info and above
 * - Development: debug and above
 * - Can be overridden with `LOG_LEVEL` env var
 */
const logLevel =
	env.LOG_LEVEL ??
	(env.NODE_ENV === RuntimeEnvironment.Production ? LogLevel.Info : LogLevel.Debug);

/**
 * Transport targets.
 *
 * 1. File transport: structured JSON written under `logs/`
 * 2. Console transport: pretty-printed output, outside production only
 *
 * Tests log synchronously to stdout, so no worker thread outlives a run.
 */
function createTransportTargets(): TransportTargetOptions[] {
	if (env.NODE_ENV === RuntimeEnvironment.Test) return [];

	return [
		{
			target: "pino/file",
			level: "debug",
			options: {
				destination: `${process.cwd()}/logs/${new Date().toISOString().replace(/:/g, "-")}.pino.log`,
				mkdir: true,
			},
		},
		...(env.LOG_TO_CONSOLE && env.NODE_ENV !== RuntimeEnvironment.Production ?
			[
				{
					target: "pino-pretty",
					level: logLevel,
					options: {
						colorize: true,
						translateTime: "HH:MM:ss.l",
						ignore: "pid,hostname",
						singleLine: false,
					},
				},
			]
		:	[]),
	];
}

const targets = createTransportTargets();

/**
 * Main logger instance
 *
 * @example
 * ```typescript
 * import { logger } from "@/utils/";
 *
 * logger.info({ resource: "Greetings", culture: "en" }, "Resolving translation");
 *
 * // Create child logger with context
 * const componentLogger = logger.child({ component: "TranslationResolver" });
 * componentLogger.debug("Cache miss");
 * ```
 */
export const logger = pino({
	level: logLevel,
	base: {
		pid: process.pid,
		hostname: undefined,
	},

	/** Timestamp format - ISO 8601 */
	timestamp: pino.stdTimeFunctions.isoTime,

	serializers: {
		err: pino.stdSerializers.err,
	},

	...(targets.length > 0 ? { transport: { targets } } : {}),
});

/** Logger shape accepted by services that take an injected logger */
export type Logger = typeof logger;
