import type { OperationOptions, Translation } from "@/services/localization/localization.types";

import { ErrorCode, mapError, throwIfAborted } from "@/errors/";
import { logger } from "@/utils/";

import { BaseDatabaseService } from "./base.service";

/**
 * Authoritative store of translations.
 *
 * Every method may suspend. Absence is a result (`null`, `false`, empty
 * list), never an error; connectivity or constraint failures reject.
 */
export interface TranslationStore {
	findOne(
		resource: string,
		key: string,
		culture: string,
		options?: OperationOptions,
	): Promise<Translation | null>;

	/** Inserts or updates by identity triple; idempotent */
	upsert(translation: Translation, options?: OperationOptions): Promise<void>;

	/** @returns whether a row was removed */
	delete(resource: string, key: string, culture: string, options?: OperationOptions): Promise<boolean>;

	distinctCultures(resource: string, options?: OperationOptions): Promise<string[]>;

	distinctKeys(resource: string, culture: string, options?: OperationOptions): Promise<string[]>;

	/** Bulk enumeration of one resource in one culture */
	findAllByCulture(
		resource: string,
		culture: string,
		options?: OperationOptions,
	): Promise<Translation[]>;

	/** Every row of a resource, ordered by culture then key */
	findAllByResource(resource: string, options?: OperationOptions): Promise<Translation[]>;
}

interface TranslationRow extends Translation {
	id: number;
}

/**
 * SQLite-backed {@link TranslationStore}.
 *
 * ### Responsibilities
 *
 * - Owns the `translations` table and its unique identity index
 * - Translates SQLite failures into {@link ErrorCode.StoreFailure} errors
 * - Honors cancellation before touching the database
 *
 * @example
 * ```typescript
 * const store = new SqliteTranslationStore(":memory:");
 * await store.upsert({ resource: "Greetings", key: "Hello", culture: "en", value: "Hello" });
 * ```
 */
export class SqliteTranslationStore extends BaseDatabaseService implements TranslationStore {
	private readonly logger = logger.child({ component: SqliteTranslationStore.name });

	public async findOne(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<Translation | null> {
		return this.execute("findOne", options, { resource, key, culture }, () => {
			const row = this.findRow(resource, key, culture);

			if (!row) return null;

			return { resource: row.resource, key: row.key, culture: row.culture, value: row.value };
		});
	}

	/**
	 * Inserts the translation, or updates the value of the existing row.
	 *
	 * Lookup and write run in one transaction.
	 */
	public async upsert(translation: Translation, options: OperationOptions = {}): Promise<void> {
		const { resource, key, culture, value } = translation;

		this.execute("upsert", options, { resource, key, culture }, () => {
			const transaction = this.db.transaction(() => {
				const existing = this.findRow(resource, key, culture);

				if (existing) {
					this.db.prepare(this.scripts.update.translationValue).run(value, existing.id);
					return;
				}

				this.db.prepare(this.scripts.insert.translation).run(resource, key, culture, value);
			});

			transaction();
		});

		this.logger.debug({ resource, key, culture }, "Translation persisted");
	}

	public async delete(
		resource: string,
		key: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<boolean> {
		return this.execute("delete", options, { resource, key, culture }, () => {
			const result = this.db
				.prepare(this.scripts.delete.translationByIdentity)
				.run(resource, key, culture);

			return result.changes > 0;
		});
	}

	public async distinctCultures(
		resource: string,
		options: OperationOptions = {},
	): Promise<string[]> {
		return this.execute("distinctCultures", options, { resource }, () =>
			this.db
				.prepare<[string], { culture: string }>(this.scripts.select.distinctCultures)
				.all(resource)
				.map((row) => row.culture),
		);
	}

	public async distinctKeys(
		resource: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<string[]> {
		return this.execute("distinctKeys", options, { resource, culture }, () =>
			this.db
				.prepare<[string, string], { key: string }>(this.scripts.select.distinctKeys)
				.all(resource, culture)
				.map((row) => row.key),
		);
	}

	public async findAllByCulture(
		resource: string,
		culture: string,
		options: OperationOptions = {},
	): Promise<Translation[]> {
		return this.execute("findAllByCulture", options, { resource, culture }, () =>
			this.db
				.prepare<[string, string], Translation>(this.scripts.select.translationsByCulture)
				.all(resource, culture),
		);
	}

	public async findAllByResource(
		resource: string,
		options: OperationOptions = {},
	): Promise<Translation[]> {
		return this.execute("findAllByResource", options, { resource }, () =>
			this.db
				.prepare<[string], Translation>(this.scripts.select.translationsByResource)
				.all(resource),
		);
	}

	private findRow(resource: string, key: string, culture: string): TranslationRow | undefined {
		return this.db
			.prepare<[string, string, string], TranslationRow>(this.scripts.select.translationByIdentity)
			.get(resource, key, culture);
	}

	/**
	 * Runs a statement after checking for cancellation, mapping failures to
	 * {@link ErrorCode.StoreFailure}.
	 */
	private execute<R>(
		operation: string,
		options: OperationOptions,
		metadata: Record<string, unknown>,
		run: () => R,
	): R {
		const qualifiedOperation = `${SqliteTranslationStore.name}.${operation}`;

		try {
			throwIfAborted(options.signal, qualifiedOperation);

			return run();
		} catch (error) {
			throw mapError(error, qualifiedOperation, metadata, ErrorCode.StoreFailure);
		}
	}
}
