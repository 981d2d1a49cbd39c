import { ApplicationError, ErrorCode } from "@/errors/";

import { errorMessages } from "./constants.util";

/** Values accepted as positional format arguments */
export type FormatArgument = string | number | boolean | bigint | Date | null | undefined;

const PLACEHOLDER_PATTERN = /^(\d+)(?:,\s*(-?\d+))?$/;

/**
 * Applies positional substitution to a composite format string.
 *
 * Supports `{0}` placeholders, an optional alignment (`{0,8}` pads left,
 * `{0,-8}` pads right) and `{{` / `}}` escapes. `null` and `undefined`
 * arguments render as an empty string.
 *
 * @param format Composite format string
 * @param args Positional arguments
 *
 * @returns The formatted string
 *
 * @throws {ApplicationError} with {@link ErrorCode.FormatFailed} if a placeholder
 * is malformed or references a missing argument
 *
 * @example
 * ```typescript
 * formatString("Hello, {0}! You have {1} messages.", ["Ada", 3]);
 * // "Hello, Ada! You have 3 messages."
 * ```
 */
export function formatString(format: string, args: readonly FormatArgument[]): string {
	let result = "";
	let position = 0;

	while (position < format.length) {
		const char = format.charAt(position);

		if (char === "}") {
			if (format.charAt(position + 1) !== "}") throw createFormatError(format, position);

			result += "}";
			position += 2;
			continue;
		}

		if (char !== "{") {
			result += char;
			position++;
			continue;
		}

		if (format.charAt(position + 1) === "{") {
			result += "{";
			position += 2;
			continue;
		}

		const closing = format.indexOf("}", position + 1);
		if (closing === -1) throw createFormatError(format, position);

		const match = PLACEHOLDER_PATTERN.exec(format.slice(position + 1, closing).trim());
		if (!match?.[1]) throw createFormatError(format, position);

		const index = Number(match[1]);
		if (index >= args.length) {
			throw new ApplicationError(
				errorMessages.formatIndexOutOfRange(index, args.length),
				ErrorCode.FormatFailed,
				formatString.name,
				{ format, index, argumentCount: args.length },
			);
		}

		result += align(stringifyArgument(args[index]), match[2] ? Number(match[2]) : 0);
		position = closing + 1;
	}

	return result;
}

function stringifyArgument(value: FormatArgument): string {
	if (value === null || value === undefined) return "";
	if (value instanceof Date) return value.toISOString();

	return String(value);
}

function align(value: string, alignment: number): string {
	if (alignment > 0) return value.padStart(alignment);
	if (alignment < 0) return value.padEnd(-alignment);

	return value;
}

function createFormatError(format: string, position: number): ApplicationError {
	return new ApplicationError(
		errorMessages.formatMalformed(position),
		ErrorCode.FormatFailed,
		formatString.name,
		{ format, position },
	);
}
