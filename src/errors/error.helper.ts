import Database from "better-sqlite3";

import { errorMessages } from "@/utils/constants.util";
import { logger as baseLogger } from "@/utils/logger.util";

import { ApplicationError, ErrorCode } from "./error";

type SqliteError = InstanceType<typeof Database.SqliteError>;

/** Metadata added by {@link mapError} for SQLite failures */
export interface StoreErrorMetadata {
	/** SQLite result code (e.g. `"SQLITE_CONSTRAINT_UNIQUE"`) */
	sqliteCode: string;
}

/**
 * Maps errors to {@link ApplicationError} with appropriate error codes.
 *
 * Existing {@link ApplicationError}s pass through untouched, aborts become
 * {@link ErrorCode.OperationCancelled}, SQLite errors become {@link ErrorCode.StoreFailure}.
 * Anything else keeps the `fallbackCode`.
 *
 * @param error The error to map
 * @param operation The operation that failed
 * @param metadata Optional additional debugging context
 * @param fallbackCode Code used for errors without a more specific mapping
 *
 * @returns An `ApplicationError` with appropriate code and context
 *
 * @example
 * ```typescript
 * try {
 *   statement.run(resource, key, culture, value);
 * } catch (error) {
 *   throw mapError(error, "SqliteTranslationStore.upsert", { resource, key, culture });
 * }
 * ```
 */
export function mapError<T extends Record<string, unknown> = Record<string, unknown>>(
	error: unknown,
	operation: string,
	metadata?: T,
	fallbackCode: ErrorCode = ErrorCode.UnknownError,
): ApplicationError {
	const logger = baseLogger.child({ component: mapError.name });

	if (error instanceof ApplicationError) return error;

	if (isAbortError(error)) {
		logger.debug({ operation, metadata }, "Operation aborted");

		return new ApplicationError(
			errorMessages.operationCancelled(operation),
			ErrorCode.OperationCancelled,
			operation,
			metadata,
			error,
		);
	}

	if (error instanceof Database.SqliteError || isUncastSqliteError(error)) {
		const errorMetadata: Record<string, unknown> & StoreErrorMetadata = {
			...metadata,
			sqliteCode: error.code,
		};

		logger.error({ err: error, operation, errorMetadata }, "SQLite error");

		return new ApplicationError(
			error.message,
			ErrorCode.StoreFailure,
			operation,
			errorMetadata,
			error,
		);
	}

	if (error instanceof Error) {
		logger.error({ err: error, operation, metadata }, "Unexpected error");

		return new ApplicationError(error.message, fallbackCode, operation, metadata, error);
	}

	logger.error({ error: String(error), operation, metadata }, "Unknown non-error Exception");

	return new ApplicationError(String(error), fallbackCode, operation, metadata);
}

/**
 * Checks whether the error was raised by an aborted {@link AbortSignal}.
 *
 * @param error The error to check
 */
export function isAbortError(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error != null &&
		"name" in error &&
		(error.name === "AbortError" || error.name === "TimeoutError")
	);
}

/**
 * Throws an {@link ErrorCode.OperationCancelled} error if the signal is aborted.
 *
 * @param signal Optional cancellation signal
 * @param operation The operation being cancelled
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
	if (!signal?.aborted) return;

	throw new ApplicationError(
		errorMessages.operationCancelled(operation),
		ErrorCode.OperationCancelled,
		operation,
		undefined,
		signal.reason,
	);
}

/**
 * Exhaustively checks wether the provided error matches the shape of a SQLite error
 *
 * @param error The error to check
 *
 * @returns `true` if the error matches {@link Database.SqliteError}'s shape, `false` otherwise
 */
function isUncastSqliteError(error: unknown): error is SqliteError {
	return (
		error instanceof Error &&
		error.name === "SqliteError" &&
		"code" in error &&
		typeof error.code === "string"
	);
}
