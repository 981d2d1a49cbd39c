import type { LookupCache } from "@/services/cache/cache.service";
import type { TranslationStore } from "@/services/database/translation-store.service";
import type {
	InvalidationKey,
	InvalidationPublisher,
} from "@/services/invalidation/invalidation.types";

import type {
	CachedLookup,
	LocalizationOptions,
	OperationOptions,
	Translation,
} from "./localization.types";

import { extractErrorMessage, throwIfAborted } from "@/errors/";
import { NoopInvalidationPublisher } from "@/services/invalidation/noop-publisher.service";
import { logger } from "@/utils/";

import { buildCacheKey } from "./cache-key";

/** Collaborators of the {@link TranslationManager} */
export interface TranslationManagerDependencies {
	store: TranslationStore;
	cache: LookupCache<CachedLookup>;
	options: Pick<LocalizationOptions, "cacheKeyPrefix">;

	/** Defaults to a {@link NoopInvalidationPublisher} */
	publisher?: InvalidationPublisher;
}

/**
 * Write path of the localization runtime.
 *
 * ### Workflow
 * 1. Persists the change in the store
 * 2. Evicts the matching local cache entry
 * 3. Publishes an invalidation so other instances evict theirs
 *
 * Publishing is best effort: a failure is logged and never undoes or fails
 * a write that already reached the store. Once the store has the write,
 * cancellation no longer interrupts the call.
 */
export class TranslationManager {
	private readonly logger = logger.child({ component: TranslationManager.name });

	private readonly store: TranslationStore;
	private readonly cache: LookupCache<CachedLookup>;
	private readonly publisher: InvalidationPublisher;
	private readonly cacheKeyPrefix: string;

	constructor(dependencies: TranslationManagerDependencies) {
		this.store = dependencies.store;
		this.cache = dependencies.cache;
		this.publisher = dependencies.publisher ?? new NoopInvalidationPublisher();
		this.cacheKeyPrefix = dependencies.options.cacheKeyPrefix;
	}

	/**
	 * Inserts or updates a translation, then invalidates it everywhere.
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.StoreFailure} when the store fails
	 * @throws {ApplicationError} with {@link ErrorCode.OperationCancelled} when `signal`
	 * aborts before the write
	 */
	public async upsert(translation: Translation, options: OperationOptions = {}): Promise<void> {
		const { resource, key, culture } = translation;

		throwIfAborted(options.signal, `${TranslationManager.name}.upsert`);

		await this.store.upsert(translation, options);
		await this.invalidateEntry(resource, key, culture);

		this.logger.info({ resource, key, culture }, "Translation upserted");
	}

	/**
	 * Deletes a translation, then invalidates it everywhere.
	 *
	 * @returns `false` without side effects if no such translation exists
	 */
	public async remove(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<boolean> {
		throwIfAborted(options.signal, `${TranslationManager.name}.remove`);

		const removed = await this.store.delete(resource, key, culture, options);

		if (!removed) {
			this.logger.debug({ resource, key, culture }, "Nothing to remove");
			return false;
		}

		await this.invalidateEntry(resource, key, culture);

		this.logger.info({ resource, key, culture }, "Translation removed");

		return true;
	}

	/**
	 * Evicts every cached entry of a resource.
	 *
	 * The `(key, culture)` pairs stored at call time are evicted locally and
	 * published as one batch, so subscribers evict the same set without
	 * querying the store.
	 */
	public async invalidateResource(resource: string, options: OperationOptions = {}): Promise<void> {
		const keys: InvalidationKey[] = [];
		const cultures = await this.store.distinctCultures(resource, options);

		for (const culture of cultures) {
			const cultureKeys = await this.store.distinctKeys(resource, culture, options);

			for (const key of cultureKeys) keys.push({ key, culture });
		}

		for (const { key, culture } of keys) {
			await this.cache.remove(buildCacheKey(this.cacheKeyPrefix, resource, key, culture));
		}

		try {
			await this.publisher.publishBatch(resource, keys);
		} catch (error) {
			this.logger.error(
				{ error: extractErrorMessage(error), resource, count: keys.length },
				"Failed to publish resource invalidation",
			);
		}

		this.logger.info({ resource, count: keys.length }, "Resource invalidated");
	}

	/**
	 * Upserts a batch of translations in order.
	 *
	 * Each row is invalidated like a single {@link upsert}. Stops at the
	 * first failing row; rows before it stay written.
	 *
	 * @returns Number of translations written
	 */
	public async importTranslations(
		translations: readonly Translation[],
		options: OperationOptions = {},
	): Promise<number> {
		let imported = 0;

		for (const translation of translations) {
			await this.upsert(translation, options);
			imported++;
		}

		this.logger.info({ imported }, "Translations imported");

		return imported;
	}

	/** Lists every stored translation of a resource, ordered by culture then key */
	public async exportTranslations(
		resource: string,
		options: OperationOptions = {},
	): Promise<Translation[]> {
		const translations = await this.store.findAllByResource(resource, options);

		this.logger.debug({ resource, count: translations.length }, "Translations exported");

		return translations;
	}

	/** Evicts one entry locally and publishes its invalidation */
	private async invalidateEntry(resource: string, key: string, culture: string): Promise<void> {
		await this.cache.remove(buildCacheKey(this.cacheKeyPrefix, resource, key, culture));

		try {
			await this.publisher.publishSingle(resource, key, culture);
		} catch (error) {
			this.logger.error(
				{ error: extractErrorMessage(error), resource, key, culture },
				"Failed to publish invalidation",
			);
		}
	}
}
