import type { FormatArgument } from "@/utils/";

import type { LocalizationOptions, OperationOptions } from "./localization.types";
import type { TranslationResolver } from "./translation-resolver.service";

import { INVARIANT_CULTURE } from "@/utils/";

/** A localized value as handed to presentation code */
export interface LocalizedString {
	/** The key that was looked up */
	name: string;

	/** The resolved value, or the not-found placeholder */
	value: string;

	/** Whether no culture of the chain held the key */
	resourceNotFound: boolean;
}

/**
 * Localizer bound to one resource and one culture.
 *
 * Bridges request context to the {@link TranslationResolver}, which always
 * takes the culture explicitly. Unresolved keys surface as the key itself
 * or as `""`, depending on `returnKeyIfNotFound`.
 *
 * @example
 * ```typescript
 * const localizer = factory.create("Greetings", "en-US");
 *
 * const hello = await localizer.get("Hello");
 * const welcome = await localizer.format("Welcome", ["Ada"]);
 * const french = localizer.withCulture("fr-FR");
 * ```
 */
export class StringLocalizer {
	constructor(
		private readonly resolver: TranslationResolver,
		private readonly options: Pick<LocalizationOptions, "returnKeyIfNotFound">,

		/** Resource whose keys this localizer resolves */
		public readonly resource: string,

		/** Culture lookups run under */
		public readonly culture: string = INVARIANT_CULTURE,
	) {}

	public async get(name: string, options: OperationOptions = {}): Promise<LocalizedString> {
		const { value, found } = await this.resolver.resolve(
			this.resource,
			name,
			this.culture,
			options,
		);

		if (found) return { name, value, resourceNotFound: false };

		return {
			name,
			value: this.options.returnKeyIfNotFound ? name : "",
			resourceNotFound: true,
		};
	}

	/** Resolves `name` as a composite format string and substitutes `args` */
	public async format(
		name: string,
		args: readonly FormatArgument[],
		options: OperationOptions = {},
	): Promise<LocalizedString> {
		const { value, found } = await this.resolver.resolveFormatted(
			this.resource,
			name,
			args,
			this.culture,
			options,
		);

		return { name, value, resourceNotFound: !found };
	}

	/**
	 * Lists every string of the resource, earlier cultures first.
	 *
	 * @param includeParentCultures Whether parent cultures contribute keys
	 */
	public async getAllStrings(
		includeParentCultures: boolean,
		options: OperationOptions = {},
	): Promise<LocalizedString[]> {
		const strings = await this.resolver.resolveAll(
			this.resource,
			this.culture,
			includeParentCultures,
			options,
		);

		return Array.from(strings, ([name, value]) => ({ name, value, resourceNotFound: false }));
	}

	/** Returns a localizer for the same resource bound to `culture` */
	public withCulture(culture: string): StringLocalizer {
		return new StringLocalizer(this.resolver, this.options, this.resource, culture);
	}
}

/** Creates {@link StringLocalizer}s sharing one resolver */
export class LocalizerFactory {
	constructor(
		private readonly resolver: TranslationResolver,
		private readonly options: Pick<LocalizationOptions, "returnKeyIfNotFound">,
	) {}

	/**
	 * Creates a localizer for a resource name.
	 *
	 * @param resource Resource name
	 * @param culture Culture the localizer is bound to
	 */
	public create(resource: string, culture?: string): StringLocalizer {
		return new StringLocalizer(this.resolver, this.options, resource, culture);
	}

	/**
	 * Creates a localizer for a resource addressed by base name and location.
	 *
	 * The resource name is `"{location}.{baseName}"`, or `baseName` alone when
	 * `location` is empty.
	 */
	public createFromLocation(baseName: string, location: string, culture?: string): StringLocalizer {
		const resource = location ? `${location}.${baseName}` : baseName;

		return this.create(resource, culture);
	}

	/**
	 * Creates a localizer whose resource is named after a class.
	 *
	 * @example
	 * ```typescript
	 * class CheckoutPage {}
	 * factory.createFor(CheckoutPage).resource; // "CheckoutPage"
	 * ```
	 */
	public createFor(target: { readonly name: string }, culture?: string): StringLocalizer {
		return this.create(target.name, culture);
	}
}
