/**
 * @fileoverview
 *
 * Type definitions shared by the read path, the write path and the
 * invalidation protocol.
 */

/** A single localized value identified by resource, key and culture */
export interface Translation {
	/**
	 * Logical namespace grouping translation keys.
	 *
	 * @example "Greetings"
	 */
	resource: string;

	/**
	 * Key of the string within its resource.
	 *
	 * @example "Hello"
	 */
	key: string;

	/**
	 * Culture identifier, `""` for the invariant culture.
	 *
	 * @example "en-US"
	 */
	culture: string;

	/** The translated value */
	value: string;
}

/** Identity triple of a {@link Translation} */
export type TranslationIdentity = Pick<Translation, "resource" | "key" | "culture">;

/** Outcome of a single-culture lookup as stored in the cache */
export type CachedLookup = { found: true; value: string } | { found: false };

/** Outcome of resolving a key along a fallback chain */
export interface ResolvedTranslation {
	/** The resolved value, `""` when nothing was found */
	value: string;

	/** Whether any culture of the chain produced a value */
	found: boolean;
}

/** Options recognized by the resolver, the manager and the cache key codec */
export interface LocalizationOptions {
	/** Time-to-live of each cached lookup, in milliseconds */
	cacheDurationMs: number;

	/** Whether lookups walk the parent cultures of the active culture */
	fallbackToParentCultures: boolean;

	/** Culture probed after the parent cultures, before the invariant culture */
	globalFallbackCulture?: string;

	/** Prefix of every cache key */
	cacheKeyPrefix: string;

	/** Whether an unresolved key is surfaced as itself rather than as `""` */
	returnKeyIfNotFound: boolean;
}

/** Options accepted by every asynchronous operation */
export interface OperationOptions {
	/** Aborts the pending store, cache or publish call */
	signal?: AbortSignal;
}
