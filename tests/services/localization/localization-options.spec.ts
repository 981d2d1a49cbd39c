import { describe, expect, test } from "vitest";

import { ApplicationError, ErrorCode } from "@/errors/";
import {
	createLocalizationOptions,
	createLocalizationOptionsFromEnv,
} from "@/services/localization/localization-options";
import { validateEnv } from "@/utils/";

function captureError(run: () => unknown): unknown {
	try {
		run();
	} catch (error) {
		return error;
	}

	return undefined;
}

describe("createLocalizationOptions", () => {
	test("should fill in defaults", () => {
		const options = createLocalizationOptions();

		expect(options).toEqual({
			cacheDurationMs: 600_000,
			fallbackToParentCultures: true,
			cacheKeyPrefix: "db_localize",
			returnKeyIfNotFound: true,
		});
	});

	test("should keep overrides", () => {
		const options = createLocalizationOptions({
			cacheDurationMs: 1_000,
			globalFallbackCulture: "en",
			cacheKeyPrefix: "app",
		});

		expect(options.cacheDurationMs).toBe(1_000);
		expect(options.globalFallbackCulture).toBe("en");
		expect(options.cacheKeyPrefix).toBe("app");
	});

	test("should drop an empty global fallback culture", () => {
		const options = createLocalizationOptions({ globalFallbackCulture: "" });

		expect(options).not.toHaveProperty("globalFallbackCulture");
	});

	test("should throw InvalidConfiguration for a non-positive cache duration", () => {
		const error = captureError(() => createLocalizationOptions({ cacheDurationMs: 0 }));

		expect(error).toBeInstanceOf(ApplicationError);
		expect(error).toMatchObject({ code: ErrorCode.InvalidConfiguration });
	});

	test("should throw InvalidConfiguration for an empty cache key prefix", () => {
		const error = captureError(() => createLocalizationOptions({ cacheKeyPrefix: "" }));

		expect(error).toMatchObject({ code: ErrorCode.InvalidConfiguration });
	});
});

describe("createLocalizationOptionsFromEnv", () => {
	test("should map localization variables onto options", () => {
		const environment = validateEnv({
			LOCALIZATION_CACHE_DURATION_MS: "5000",
			LOCALIZATION_FALLBACK_TO_PARENT_CULTURES: "false",
			LOCALIZATION_GLOBAL_FALLBACK_CULTURE: "en",
			LOCALIZATION_CACHE_KEY_PREFIX: "tenant_a",
			LOCALIZATION_RETURN_KEY_IF_NOT_FOUND: "false",
		});

		const options = createLocalizationOptionsFromEnv(environment);

		expect(options).toEqual({
			cacheDurationMs: 5_000,
			fallbackToParentCultures: false,
			globalFallbackCulture: "en",
			cacheKeyPrefix: "tenant_a",
			returnKeyIfNotFound: false,
		});
	});
});
