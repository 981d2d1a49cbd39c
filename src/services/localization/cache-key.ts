import { CACHE_KEY_SEPARATOR, INVARIANT_CULTURE, INVARIANT_CULTURE_SEGMENT } from "@/utils/";

/**
 * Builds the cache key of a single-culture lookup.
 *
 * Format: `{prefix}:{resource}:{key}:{cultureSegment}`, where the invariant
 * culture is written as `_`. Publishers and subscribers must build keys with
 * this function so that evictions line up across instances.
 *
 * Keys are unambiguous only while `resource` and `key` contain no `:`.
 * This is not enforced.
 *
 * @example
 * ```typescript
 * buildCacheKey("db_localize", "Greetings", "Hello", "en-US");
 * // "db_localize:Greetings:Hello:en-US"
 * buildCacheKey("db_localize", "Greetings", "Hello", "");
 * // "db_localize:Greetings:Hello:_"
 * ```
 */
export function buildCacheKey(
	prefix: string,
	resource: string,
	key: string,
	culture: string,
): string {
	const cultureSegment = culture === INVARIANT_CULTURE ? INVARIANT_CULTURE_SEGMENT : culture;

	return [prefix, resource, key, cultureSegment].join(CACHE_KEY_SEPARATOR);
}
