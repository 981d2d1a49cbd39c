import { CULTURE_SUBTAG_SEPARATOR, INVARIANT_CULTURE } from "@/utils/";

import type { LocalizationOptions } from "./localization.types";

/** Subset of {@link LocalizationOptions} that shapes a fallback chain */
export type FallbackChainOptions = Pick<
	LocalizationOptions,
	"fallbackToParentCultures" | "globalFallbackCulture"
>;

/**
 * Returns the parent of a culture identifier.
 *
 * The last subtag is dropped (`"zh-Hant-TW"` → `"zh-Hant"` → `"zh"`), a
 * single subtag has the invariant culture as parent and the invariant
 * culture has none.
 *
 * @param culture Culture identifier
 *
 * @returns The parent culture, or `null` for the invariant culture
 */
export function getParentCulture(culture: string): string | null {
	if (culture === INVARIANT_CULTURE) return null;

	const separatorIndex = culture.lastIndexOf(CULTURE_SUBTAG_SEPARATOR);
	if (separatorIndex <= 0) return INVARIANT_CULTURE;

	return culture.slice(0, separatorIndex);
}

/**
 * Computes the ordered list of cultures to probe for a lookup.
 *
 * ### Order
 * 1. The active culture, when not invariant
 * 2. Its parent cultures, when parent fallback is enabled
 * 3. The global fallback culture, when configured
 * 4. The invariant culture
 *
 * The chain never contains duplicates and always holds the invariant
 * culture exactly once.
 *
 * @param activeCulture Culture of the current request
 * @param options Fallback configuration
 *
 * @example
 * ```typescript
 * buildFallbackChain("en-US", { fallbackToParentCultures: true });
 * // ["en-US", "en", ""]
 * ```
 */
export function buildFallbackChain(activeCulture: string, options: FallbackChainOptions): string[] {
	const chain: string[] = [];

	if (activeCulture !== INVARIANT_CULTURE) chain.push(activeCulture);

	if (options.fallbackToParentCultures) {
		let parent = getParentCulture(activeCulture);

		while (parent !== null && parent !== INVARIANT_CULTURE) {
			if (!chain.includes(parent)) chain.push(parent);

			parent = getParentCulture(parent);
		}
	}

	const globalFallback = options.globalFallbackCulture;
	if (globalFallback && !chain.includes(globalFallback)) chain.push(globalFallback);

	if (!chain.includes(INVARIANT_CULTURE)) chain.push(INVARIANT_CULTURE);

	return chain;
}
