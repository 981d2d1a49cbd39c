import { describe, expect, test } from "vitest";

import { buildFallbackChain, getParentCulture } from "@/services/localization/fallback-chain";

describe("getParentCulture", () => {
	test("should drop the last subtag", () => {
		expect(getParentCulture("en-US")).toBe("en");
		expect(getParentCulture("zh-Hant-TW")).toBe("zh-Hant");
	});

	test("should return the invariant culture for a single subtag", () => {
		expect(getParentCulture("en")).toBe("");
	});

	test("should return null for the invariant culture", () => {
		expect(getParentCulture("")).toBeNull();
	});
});

describe("buildFallbackChain", () => {
	test("should walk parents then end with the invariant culture", () => {
		const chain = buildFallbackChain("en-US", { fallbackToParentCultures: true });

		expect(chain).toEqual(["en-US", "en", ""]);
	});

	test("should walk every parent of a multi-subtag culture", () => {
		const chain = buildFallbackChain("zh-Hant-TW", { fallbackToParentCultures: true });

		expect(chain).toEqual(["zh-Hant-TW", "zh-Hant", "zh", ""]);
	});

	test("should skip parents when parent fallback is disabled", () => {
		const chain = buildFallbackChain("en-US", { fallbackToParentCultures: false });

		expect(chain).toEqual(["en-US", ""]);
	});

	test("should insert the global fallback before the invariant culture", () => {
		const chain = buildFallbackChain("fr-FR", {
			fallbackToParentCultures: true,
			globalFallbackCulture: "en",
		});

		expect(chain).toEqual(["fr-FR", "fr", "en", ""]);
	});

	test("should not duplicate a global fallback already in the chain", () => {
		const chain = buildFallbackChain("en-US", {
			fallbackToParentCultures: true,
			globalFallbackCulture: "en",
		});

		expect(chain).toEqual(["en-US", "en", ""]);
	});

	test("should return only the invariant culture when the active culture is invariant", () => {
		const chain = buildFallbackChain("", { fallbackToParentCultures: true });

		expect(chain).toEqual([""]);
	});

	test("should treat an empty global fallback as unset", () => {
		const chain = buildFallbackChain("de", {
			fallbackToParentCultures: true,
			globalFallbackCulture: "",
		});

		expect(chain).toEqual(["de", ""]);
	});

	test("should contain the invariant culture exactly once with a global fallback on an invariant request", () => {
		const chain = buildFallbackChain("", {
			fallbackToParentCultures: true,
			globalFallbackCulture: "en",
		});

		expect(chain).toEqual(["en", ""]);
	});
});
