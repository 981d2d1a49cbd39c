import Database from "better-sqlite3";

/**
 * Base service for the persistent storage of translations.
 *
 * @see {@link https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md|better-sqlite3 API Docs}
 */
export class BaseDatabaseService {
	/** SQLite database connection instance */
	protected readonly db: Database.Database;

	/**
	 * Opens (or adopts) a database connection and creates required tables.
	 *
	 * @param source The filename of the database to open, `":memory:"` for an
	 * in-memory database, or an already open connection to adopt.
	 * @param options Options forwarded to the better-sqlite3 constructor.
	 */
	constructor(
		source: string | Database.Database = "translations.sqlite",
		options?: Database.Options,
	) {
		this.db = typeof source === "string" ? new Database(source, options) : source;
		this.initializeTables();
	}

	/** Closes the underlying connection */
	public close(): void {
		this.db.close();
	}

	/**
	 * Initializes database tables.
	 *
	 * Creates the `translations` table and its unique `(resource, key, culture)`
	 * index if they don't exist.
	 */
	private initializeTables(): void {
		for (const script of Object.values(this.scripts.createTable)) {
			const sanitizedScript = script.replace(/\s+/g, " ");

			this.db.exec(sanitizedScript);
		}
	}

	/** The SQL scripts for database operations */
	protected readonly scripts = {
		createTable: {
			/** Creates the translations table */
			translations: `
          CREATE TABLE IF NOT EXISTS translations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            resource TEXT NOT NULL,
            key TEXT NOT NULL,
            culture TEXT NOT NULL,
            value TEXT NOT NULL
          );
          CREATE UNIQUE INDEX IF NOT EXISTS idx_translations_identity
            ON translations(resource, key, culture);
        `,
		},
		select: {
			/** Selects one translation by its identity triple */
			translationByIdentity: `
          SELECT id, resource, key, culture, value
          FROM translations
          WHERE resource = ? AND key = ? AND culture = ?
        `,
			/** Selects every translation of a resource in one culture */
			translationsByCulture: `
          SELECT resource, key, culture, value
          FROM translations
          WHERE resource = ? AND culture = ?
          ORDER BY key
        `,
			/** Selects every translation of a resource */
			translationsByResource: `
          SELECT resource, key, culture, value
          FROM translations
          WHERE resource = ?
          ORDER BY culture, key
        `,
			/** Selects the distinct cultures stored for a resource */
			distinctCultures: `
          SELECT DISTINCT culture FROM translations WHERE resource = ? ORDER BY culture
        `,
			/** Selects the distinct keys stored for a resource in one culture */
			distinctKeys: `
          SELECT DISTINCT key FROM translations WHERE resource = ? AND culture = ? ORDER BY key
        `,
		},
		insert: {
			/** Inserts a new translation */
			translation: `
          INSERT INTO translations (resource, key, culture, value) VALUES (?, ?, ?, ?)
        `,
		},
		update: {
			/** Updates the value of an existing translation */
			translationValue: `UPDATE translations SET value = ? WHERE id = ?`,
		},
		delete: {
			/** Deletes a translation by its identity triple */
			translationByIdentity: `
          DELETE FROM translations WHERE resource = ? AND key = ? AND culture = ?
        `,
		},
	} as const;
}
