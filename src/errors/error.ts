/** Standardized error codes for the localization runtime */
export enum ErrorCode {
	// Collaborator Errors
	StoreFailure = "STORE_FAILURE",
	PublishFailed = "PUBLISH_FAILED",

	// Domain Validation Errors
	FormatFailed = "FORMAT_FAILED",
	InvalidConfiguration = "INVALID_CONFIGURATION",
	InvalidMessage = "INVALID_MESSAGE",

	// Control Flow
	OperationCancelled = "OPERATION_CANCELLED",

	// Fallback
	UnknownError = "UNKNOWN_ERROR",
}

/**
 * Base error class for all localization-related errors.
 *
 * Provides standardized error handling with error codes and optional metadata.
 *
 * @template T Type of the metadata object
 */
export class ApplicationError<
	T extends Record<string, unknown> = Record<string, unknown>,
> extends Error {
	/** Standardized error code */
	public readonly code: ErrorCode;

	/** The operation that failed */
	public readonly operation: string;

	/** Additional metadata for debugging */
	public readonly metadata?: T;

	/**
	 * Creates a new {@link ApplicationError} instance
	 *
	 * @param message Human-readable error message
	 * @param code Standardized error code
	 * @param operation The operation that failed
	 * @param metadata Additional metadata for debugging
	 * @param cause The underlying error, if any
	 */
	constructor(
		message: string,
		code: ErrorCode = ErrorCode.UnknownError,
		operation?: string,
		metadata?: T,
		cause?: unknown,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = this.constructor.name;
		this.code = code;
		this.operation = operation ?? "UnknownOperation";
		this.metadata = metadata;

		Object.setPrototypeOf(this, new.target.prototype);
	}

	/** Extracts a human-readable message from the error */
	public get displayMessage(): string {
		const operationSuffix = this.operation ? ` (in ${this.operation})` : "";

		return `${this.message}${operationSuffix}`;
	}
}

/**
 * Extracts a human-readable error message from various error types.
 *
 * @param error The error to extract a message from
 *
 * @returns Human-readable error message
 */
export function extractErrorMessage(error: unknown): string {
	if (error instanceof ApplicationError) return error.displayMessage;
	if (error instanceof Error) return error.message;

	return String(error);
}
