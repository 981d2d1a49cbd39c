import type { LookupCache } from "@/services/cache/cache.service";
import type { TranslationStore } from "@/services/database/translation-store.service";
import type { FormatArgument } from "@/utils/";

import type {
	CachedLookup,
	LocalizationOptions,
	OperationOptions,
	ResolvedTranslation,
	Translation,
} from "./localization.types";

import {
	ApplicationError,
	ErrorCode,
	extractErrorMessage,
	mapError,
	throwIfAborted,
} from "@/errors/";
import { formatString, logger } from "@/utils/";

import { buildCacheKey } from "./cache-key";
import { buildFallbackChain } from "./fallback-chain";

/** Collaborators of the {@link TranslationResolver} */
export interface TranslationResolverDependencies {
	store: TranslationStore;
	cache: LookupCache<CachedLookup>;
	options: LocalizationOptions;
}

/**
 * Read path of the localization runtime.
 *
 * Walks the fallback chain of the requested culture and answers from the
 * cache, consulting the store only on a miss. Each culture of the chain is
 * cached on its own, found or not, so a value added for a more specific
 * culture becomes visible as soon as that single entry is evicted.
 *
 * @example
 * ```typescript
 * const resolver = new TranslationResolver({ store, cache, options });
 *
 * const { value, found } = await resolver.resolve("Greetings", "Hello", "en-US");
 * ```
 */
export class TranslationResolver {
	private readonly logger = logger.child({ component: TranslationResolver.name });

	private readonly store: TranslationStore;
	private readonly cache: LookupCache<CachedLookup>;
	private readonly options: LocalizationOptions;

	constructor(dependencies: TranslationResolverDependencies) {
		this.store = dependencies.store;
		this.cache = dependencies.cache;
		this.options = dependencies.options;
	}

	/**
	 * Resolves a key under `culture`, walking its fallback chain.
	 *
	 * Stops at the first culture holding a value.
	 *
	 * @param resource Resource the key belongs to
	 * @param key Key to resolve
	 * @param culture Active culture, `""` for the invariant culture
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.StoreFailure} when the store fails
	 * @throws {ApplicationError} with {@link ErrorCode.OperationCancelled} when `signal` aborts
	 */
	public async resolve(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<ResolvedTranslation> {
		const chain = buildFallbackChain(culture, this.options);

		for (const candidate of chain) {
			throwIfAborted(options.signal, `${TranslationResolver.name}.resolve`);

			const lookup = await this.lookup(resource, key, candidate, options);

			if (lookup.found) {
				this.logger.debug(
					{ resource, key, culture, resolvedCulture: candidate },
					"Translation resolved",
				);

				return { value: lookup.value, found: true };
			}
		}

		this.logger.debug({ resource, key, culture, chain }, "Translation not found");

		return { value: "", found: false };
	}

	/**
	 * Resolves a composite format string and substitutes `args` into it.
	 *
	 * When the key is not found, the key itself (or `""`, depending on
	 * `returnKeyIfNotFound`) is used as the format and `found` is `false`.
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.FormatFailed} when
	 * substitution fails
	 */
	public async resolveFormatted(
		resource: string,
		key: string,
		args: readonly FormatArgument[],
		culture: string,
		options: OperationOptions = {},
	): Promise<ResolvedTranslation> {
		const resolved = await this.resolve(resource, key, culture, options);

		let format = resolved.value;
		if (!resolved.found) format = this.options.returnKeyIfNotFound ? key : "";

		return { value: formatString(format, args), found: resolved.found };
	}

	/**
	 * Lists every key of a resource with its best value along the chain.
	 *
	 * Bypasses the cache. With `includeParentCultures` (and parent fallback
	 * enabled) the whole chain is read; otherwise only the active culture and
	 * the global fallback culture. Earlier cultures win.
	 *
	 * @returns Map of key to value, in first-seen order
	 */
	public async resolveAll(
		resource: string,
		culture: string,
		includeParentCultures: boolean,
		options: OperationOptions = {},
	): Promise<Map<string, string>> {
		const cultures = this.getEnumerationCultures(culture, includeParentCultures);
		const merged = new Map<string, string>();

		for (const candidate of cultures) {
			throwIfAborted(options.signal, `${TranslationResolver.name}.resolveAll`);

			const translations = await this.store.findAllByCulture(resource, candidate, options);

			for (const translation of translations) {
				if (!merged.has(translation.key)) merged.set(translation.key, translation.value);
			}
		}

		this.logger.debug(
			{ resource, culture, cultures, count: merged.size },
			"Enumerated translations",
		);

		return merged;
	}

	private getEnumerationCultures(culture: string, includeParentCultures: boolean): string[] {
		if (includeParentCultures && this.options.fallbackToParentCultures) {
			return buildFallbackChain(culture, this.options);
		}

		const cultures = [culture];
		const globalFallback = this.options.globalFallbackCulture;

		if (globalFallback && globalFallback !== culture) cultures.push(globalFallback);

		return cultures;
	}

	/**
	 * Looks up a single culture through the cache.
	 *
	 * The computation is shared by every caller waiting on the same key, so it
	 * runs without any caller's signal; each caller's signal only ends its own
	 * wait. A failing cache is bypassed: the store answers and nothing is cached.
	 */
	private async lookup(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions,
	): Promise<CachedLookup> {
		const cacheKey = buildCacheKey(this.options.cacheKeyPrefix, resource, key, culture);

		try {
			return await this.cache.getOrCompute(
				cacheKey,
				this.options.cacheDurationMs,
				() => this.fetch(resource, key, culture, {}),
				options.signal,
			);
		} catch (error) {
			if (!isCacheFailure(error)) throw error;

			this.logger.warn(
				{ error: extractErrorMessage(error), cacheKey },
				"Cache failure, reading from store",
			);

			return this.fetch(resource, key, culture, options);
		}
	}

	/**
	 * Reads one culture from the store.
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.StoreFailure} or
	 * {@link ErrorCode.OperationCancelled}, whatever the store rejected with
	 */
	private async fetch(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions,
	): Promise<CachedLookup> {
		let translation: Translation | null;

		try {
			translation = await this.store.findOne(resource, key, culture, options);
		} catch (error) {
			throw toStoreError(error, `${TranslationResolver.name}.fetch`, { resource, key, culture });
		}

		if (!translation) return { found: false };

		return { found: true, value: translation.value };
	}
}

/** Whether an error carries a code the store path raises */
function isStoreError(error: ApplicationError): boolean {
	return error.code === ErrorCode.StoreFailure || error.code === ErrorCode.OperationCancelled;
}

/** Tags any store rejection so it cannot be mistaken for a cache failure */
function toStoreError(
	error: unknown,
	operation: string,
	metadata: Record<string, unknown>,
): ApplicationError {
	const mapped = mapError(error, operation, metadata, ErrorCode.StoreFailure);

	if (isStoreError(mapped)) return mapped;

	return new ApplicationError(mapped.message, ErrorCode.StoreFailure, operation, metadata, mapped);
}

/** Whether an error thrown by `getOrCompute` came from the cache itself */
function isCacheFailure(error: unknown): boolean {
	return !(error instanceof ApplicationError) || !isStoreError(error);
}
