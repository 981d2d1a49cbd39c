import { afterEach, beforeEach, describe, expect, test } from "vitest";

import type { CachedLookup } from "@/services/localization/";

import { CacheService } from "@/services/cache/cache.service";
import { SqliteTranslationStore } from "@/services/database/translation-store.service";
import {
	createLocalizationOptions,
	LocalizerFactory,
	TranslationResolver,
} from "@/services/localization/";

import { createTranslationFixture, greetingsFixture, seedStore } from "@tests/fixtures";
import { createMockTranslationStore } from "@tests/mocks";

describe("StringLocalizer", () => {
	let store: SqliteTranslationStore;
	let factory: LocalizerFactory;

	function createFactory(returnKeyIfNotFound: boolean): LocalizerFactory {
		const options = createLocalizationOptions({ returnKeyIfNotFound });
		const resolver = new TranslationResolver({
			store,
			cache: new CacheService<CachedLookup>(),
			options,
		});

		return new LocalizerFactory(resolver, options);
	}

	beforeEach(async () => {
		store = new SqliteTranslationStore(":memory:");
		factory = createFactory(true);

		await seedStore(store, [
			...greetingsFixture,
			createTranslationFixture({ key: "Welcome", culture: "en", value: "Welcome, {0}!" }),
			createTranslationFixture({ key: "Hello", culture: "fr", value: "Bonjour" }),
		]);
	});

	afterEach(() => {
		store.close();
	});

	describe("get", () => {
		test("should return the resolved value", async () => {
			const localizer = factory.create("Greetings", "en-US");

			const result = await localizer.get("Hello");

			expect(result).toEqual({ name: "Hello", value: "Hello", resourceNotFound: false });
		});

		test("should return the key when not found and returnKeyIfNotFound is enabled", async () => {
			const localizer = factory.create("Greetings", "en-US");

			const result = await localizer.get("Missing");

			expect(result).toEqual({ name: "Missing", value: "Missing", resourceNotFound: true });
		});

		test("should return an empty value when not found and returnKeyIfNotFound is disabled", async () => {
			const localizer = createFactory(false).create("Greetings", "en-US");

			const result = await localizer.get("Missing");

			expect(result).toEqual({ name: "Missing", value: "", resourceNotFound: true });
		});

		test("should resolve under the invariant culture when no culture is bound", async () => {
			const localizer = factory.create("Greetings");

			const result = await localizer.get("Hello");

			expect(result.value).toBe("HELLO");
		});
	});

	describe("format", () => {
		test("should substitute arguments into the resolved format", async () => {
			const localizer = factory.create("Greetings", "en");

			const result = await localizer.format("Welcome", ["Ada"]);

			expect(result).toEqual({ name: "Welcome", value: "Welcome, Ada!", resourceNotFound: false });
		});

		test("should flag a format that came from the not-found policy", async () => {
			const localizer = factory.create("Greetings", "en");

			const result = await localizer.format("Missing", ["Ada"]);

			expect(result).toEqual({ name: "Missing", value: "Missing", resourceNotFound: true });
		});
	});

	describe("getAllStrings", () => {
		test("should list strings of the whole chain", async () => {
			const localizer = factory.create("Greetings", "en-US");

			const result = await localizer.getAllStrings(true);

			expect(result).toEqual([
				{ name: "Hello", value: "Hello", resourceNotFound: false },
				{ name: "Welcome", value: "Welcome, {0}!", resourceNotFound: false },
			]);
		});
	});

	describe("withCulture", () => {
		test("should return a localizer bound to the new culture", async () => {
			const english = factory.create("Greetings", "en");

			const french = english.withCulture("fr-FR");

			expect(french).not.toBe(english);
			expect(french.culture).toBe("fr-FR");
			expect(french.resource).toBe("Greetings");
			expect((await french.get("Hello")).value).toBe("Bonjour");
			expect((await english.get("Hello")).value).toBe("Hello");
		});
	});
});

describe("LocalizerFactory", () => {
	const options = createLocalizationOptions();
	const resolver = new TranslationResolver({
		store: createMockTranslationStore(),
		cache: new CacheService<CachedLookup>(),
		options,
	});
	const factory = new LocalizerFactory(resolver, options);

	test("should name the resource after location and base name", () => {
		const localizer = factory.createFromLocation("Greetings", "Checkout");

		expect(localizer.resource).toBe("Checkout.Greetings");
	});

	test("should use the base name alone when location is empty", () => {
		const localizer = factory.createFromLocation("Greetings", "");

		expect(localizer.resource).toBe("Greetings");
	});

	test("should name the resource after a class", () => {
		class CheckoutPage {}

		const localizer = factory.createFor(CheckoutPage, "en");

		expect(localizer.resource).toBe("CheckoutPage");
		expect(localizer.culture).toBe("en");
	});
});
