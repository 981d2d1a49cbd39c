import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import type { CachedLookup } from "@/services/localization/";

import { ErrorCode } from "@/errors/";
import { CacheService } from "@/services/cache/cache.service";
import { SqliteTranslationStore } from "@/services/database/translation-store.service";
import {
	buildCacheKey,
	createLocalizationOptions,
	TranslationManager,
	TranslationResolver,
} from "@/services/localization/";

import { createTranslationFixture, greetingsFixture, seedStore } from "@tests/fixtures";
import { createMockInvalidationPublisher } from "@tests/mocks";

function cacheKeyOf(culture: string, key = "Hello"): string {
	return buildCacheKey("db_localize", "Greetings", key, culture);
}

describe("TranslationManager", () => {
	let store: SqliteTranslationStore;
	let cache: CacheService<CachedLookup>;
	let publisher: ReturnType<typeof createMockInvalidationPublisher>;
	let resolver: TranslationResolver;
	let manager: TranslationManager;

	beforeEach(async () => {
		const options = createLocalizationOptions();

		store = new SqliteTranslationStore(":memory:");
		cache = new CacheService<CachedLookup>();
		publisher = createMockInvalidationPublisher();
		resolver = new TranslationResolver({ store, cache, options });
		manager = new TranslationManager({ store, cache, options, publisher });

		await seedStore(store, greetingsFixture);
	});

	afterEach(() => {
		store.close();
	});

	describe("upsert", () => {
		test("should persist, evict the exact entry and publish a single invalidation", async () => {
			await resolver.resolve("Greetings", "Hello", "en-US");
			expect(cache.get(cacheKeyOf("en-US"))).toEqual({ found: false });

			await manager.upsert(createTranslationFixture({ culture: "en-US", value: "Howdy" }));

			expect(cache.get(cacheKeyOf("en-US"))).toBeNull();
			expect(cache.get(cacheKeyOf("en"))).toEqual({ found: true, value: "Hello" });
			expect(publisher.publishSingle).toHaveBeenCalledWith("Greetings", "Hello", "en-US");
			expect(await resolver.resolve("Greetings", "Hello", "en-US")).toEqual({
				value: "Howdy",
				found: true,
			});
		});

		test("should reflect an updated value in the same process immediately", async () => {
			await resolver.resolve("Greetings", "Hello", "en");

			await manager.upsert(createTranslationFixture({ culture: "en", value: "Hi" }));

			expect(await resolver.resolve("Greetings", "Hello", "en")).toEqual({
				value: "Hi",
				found: true,
			});
		});

		test("should keep one row when called twice with the same translation", async () => {
			const translation = createTranslationFixture({ culture: "de", value: "Hallo" });

			await manager.upsert(translation);
			await manager.upsert(translation);

			expect(await store.findAllByResource("Greetings")).toHaveLength(3);
			expect(await resolver.resolve("Greetings", "Hello", "de")).toEqual({
				value: "Hallo",
				found: true,
			});
		});

		test("should complete the write when publishing fails", async () => {
			publisher.publishSingle.mockRejectedValue(new Error("connection refused"));

			await manager.upsert(createTranslationFixture({ culture: "de", value: "Hallo" }));

			expect((await store.findOne("Greetings", "Hello", "de"))?.value).toBe("Hallo");
		});

		test("should reject with OperationCancelled and write nothing when signal is aborted", async () => {
			const controller = new AbortController();
			controller.abort();

			const result = manager.upsert(createTranslationFixture({ culture: "de" }), {
				signal: controller.signal,
			});

			await expect(result).rejects.toMatchObject({ code: ErrorCode.OperationCancelled });
			expect(await store.findAllByResource("Greetings")).toHaveLength(2);
			expect(publisher.publishSingle).not.toHaveBeenCalled();
		});

		test("should still evict and publish when the signal aborts after the write", async () => {
			const controller = new AbortController();
			const persist = store.upsert.bind(store);
			vi.spyOn(store, "upsert").mockImplementation(async (translation) => {
				await persist(translation);
				controller.abort();
			});
			const remove = vi.spyOn(cache, "remove");
			await resolver.resolve("Greetings", "Hello", "en-US");

			const result = manager.upsert(createTranslationFixture({ culture: "en-US", value: "Howdy" }), {
				signal: controller.signal,
			});

			await expect(result).resolves.toBeUndefined();
			expect(remove).toHaveBeenCalledWith(cacheKeyOf("en-US"));
			expect(publisher.publishSingle).toHaveBeenCalledWith("Greetings", "Hello", "en-US");
			expect(cache.get(cacheKeyOf("en-US"))).toBeNull();
			expect((await store.findOne("Greetings", "Hello", "en-US"))?.value).toBe("Howdy");
		});

		test("should use a no-op publisher when none is configured", async () => {
			const localManager = new TranslationManager({
				store,
				cache,
				options: createLocalizationOptions(),
			});

			await localManager.upsert(createTranslationFixture({ culture: "de", value: "Hallo" }));

			expect(await store.findAllByResource("Greetings")).toHaveLength(3);
		});
	});

	describe("remove", () => {
		test("should delete, evict and publish when the translation exists", async () => {
			await resolver.resolve("Greetings", "Hello", "en");

			const removed = await manager.remove("Greetings", "Hello", "en");

			expect(removed).toBe(true);
			expect(await store.findOne("Greetings", "Hello", "en")).toBeNull();
			expect(publisher.publishSingle).toHaveBeenCalledWith("Greetings", "Hello", "en");
			expect(await resolver.resolve("Greetings", "Hello", "en")).toEqual({
				value: "HELLO",
				found: true,
			});
		});

		test("should return false without publishing when the translation does not exist", async () => {
			const removed = await manager.remove("Greetings", "Hello", "de");

			expect(removed).toBe(false);
			expect(publisher.publishSingle).not.toHaveBeenCalled();
		});
	});

	describe("invalidateResource", () => {
		test("should evict every stored pair and publish them as one batch", async () => {
			await resolver.resolve("Greetings", "Hello", "en");
			await resolver.resolve("Greetings", "Hello", "");

			await manager.invalidateResource("Greetings");

			expect(cache.get(cacheKeyOf("en"))).toBeNull();
			expect(cache.get(cacheKeyOf(""))).toBeNull();
			expect(publisher.publishBatch).toHaveBeenCalledTimes(1);
			expect(publisher.publishBatch).toHaveBeenCalledWith("Greetings", [
				{ key: "Hello", culture: "" },
				{ key: "Hello", culture: "en" },
			]);
		});

		test("should leave entries of cultures without stored rows", async () => {
			await resolver.resolve("Greetings", "Hello", "fr-FR");

			await manager.invalidateResource("Greetings");

			expect(cache.get(cacheKeyOf("fr-FR"))).toEqual({ found: false });
		});

		test("should publish an empty batch for a resource without rows", async () => {
			await manager.invalidateResource("Empty");

			expect(publisher.publishBatch).toHaveBeenCalledWith("Empty", []);
		});

		test("should complete when publishing the batch fails", async () => {
			publisher.publishBatch.mockRejectedValue(new Error("connection refused"));

			await expect(manager.invalidateResource("Greetings")).resolves.toBeUndefined();
		});
	});

	describe("importTranslations", () => {
		test("should upsert every translation and publish one invalidation each", async () => {
			const imported = await manager.importTranslations([
				createTranslationFixture({ culture: "de", value: "Hallo" }),
				createTranslationFixture({ culture: "es", value: "Hola" }),
			]);

			expect(imported).toBe(2);
			expect(await store.findAllByResource("Greetings")).toHaveLength(4);
			expect(publisher.publishSingle).toHaveBeenCalledTimes(2);
		});
	});

	describe("exportTranslations", () => {
		test("should list every stored translation of the resource", async () => {
			const translations = await manager.exportTranslations("Greetings");

			expect(translations).toEqual([
				{ resource: "Greetings", key: "Hello", culture: "", value: "HELLO" },
				{ resource: "Greetings", key: "Hello", culture: "en", value: "Hello" },
			]);
		});
	});
});
