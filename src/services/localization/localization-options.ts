import { z } from "zod";

import type { Environment } from "@/utils/";

import type { LocalizationOptions } from "./localization.types";

import { ApplicationError, ErrorCode } from "@/errors/";
import { environmentDefaults } from "@/utils/";

/** Schema of programmatic {@link LocalizationOptions} */
const localizationOptionsSchema = z.object({
	cacheDurationMs: z
		.number()
		.positive()
		.default(environmentDefaults.LOCALIZATION_CACHE_DURATION_MS),
	fallbackToParentCultures: z
		.boolean()
		.default(environmentDefaults.LOCALIZATION_FALLBACK_TO_PARENT_CULTURES),
	globalFallbackCulture: z.string().optional(),
	cacheKeyPrefix: z.string().min(1).default(environmentDefaults.LOCALIZATION_CACHE_KEY_PREFIX),
	returnKeyIfNotFound: z
		.boolean()
		.default(environmentDefaults.LOCALIZATION_RETURN_KEY_IF_NOT_FOUND),
});

/**
 * Builds validated {@link LocalizationOptions}, filling in defaults.
 *
 * An empty `globalFallbackCulture` is treated as unset.
 *
 * @param overrides Options to override
 *
 * @throws {ApplicationError} with {@link ErrorCode.InvalidConfiguration} if an option is invalid
 *
 * @example
 * ```typescript
 * const options = createLocalizationOptions({ globalFallbackCulture: "en" });
 * // ^? { cacheDurationMs: 600000, fallbackToParentCultures: true, globalFallbackCulture: "en", ... }
 * ```
 */
export function createLocalizationOptions(
	overrides: Partial<LocalizationOptions> = {},
): LocalizationOptions {
	const result = localizationOptionsSchema.safeParse(overrides);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".")}: ${issue.message}`,
		);

		throw new ApplicationError(
			`Invalid localization options: ${issues.join("; ")}`,
			ErrorCode.InvalidConfiguration,
			createLocalizationOptions.name,
			{ issues },
		);
	}

	const { globalFallbackCulture, ...options } = result.data;

	return globalFallbackCulture ? { ...options, globalFallbackCulture } : options;
}

/** Reads {@link LocalizationOptions} from a validated environment */
export function createLocalizationOptionsFromEnv(environment: Environment): LocalizationOptions {
	return createLocalizationOptions({
		cacheDurationMs: environment.LOCALIZATION_CACHE_DURATION_MS,
		fallbackToParentCultures: environment.LOCALIZATION_FALLBACK_TO_PARENT_CULTURES,
		globalFallbackCulture: environment.LOCALIZATION_GLOBAL_FALLBACK_CULTURE,
		cacheKeyPrefix: environment.LOCALIZATION_CACHE_KEY_PREFIX,
		returnKeyIfNotFound: environment.LOCALIZATION_RETURN_KEY_IF_NOT_FOUND,
	});
}
