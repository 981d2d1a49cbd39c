import { z } from "zod";

import type { InvalidationKey, InvalidationMessage } from "./invalidation.types";

import { ApplicationError, ErrorCode } from "@/errors/";
import { errorMessages } from "@/utils/";

const invalidationKeySchema = z.object({
	key: z.string(),
	culture: z.string(),
});

/** Wire schema of invalidation messages */
export const invalidationMessageSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("single"),
		resource: z.string(),
		key: z.string(),
		culture: z.string(),
	}),
	z.object({
		type: z.literal("batch"),
		resource: z.string(),
		keys: z.array(invalidationKeySchema),
	}),
]);

/** Creates the message invalidating one entry */
export function createSingleMessage(
	resource: string,
	key: string,
	culture: string,
): InvalidationMessage {
	return { type: "single", resource, key, culture };
}

/** Creates the message invalidating a list of entries of one resource */
export function createBatchMessage(
	resource: string,
	keys: InvalidationKey[],
): InvalidationMessage {
	return { type: "batch", resource, keys: keys.map(({ key, culture }) => ({ key, culture })) };
}

/** Serializes a message for the wire */
export function serializeMessage(message: InvalidationMessage): string {
	return JSON.stringify(message);
}

/**
 * Parses and validates a raw wire message.
 *
 * @param raw The message as received from the transport
 *
 * @throws {ApplicationError} with {@link ErrorCode.InvalidMessage} if the
 * payload is not JSON or does not match {@link invalidationMessageSchema}
 */
export function parseMessage(raw: string): InvalidationMessage {
	let payload: unknown;

	try {
		payload = JSON.parse(raw);
	} catch (error) {
		throw new ApplicationError(
			errorMessages.invalidMessage,
			ErrorCode.InvalidMessage,
			parseMessage.name,
			{ raw },
			error,
		);
	}

	const result = invalidationMessageSchema.safeParse(payload);

	if (!result.success) {
		throw new ApplicationError(
			errorMessages.invalidMessage,
			ErrorCode.InvalidMessage,
			parseMessage.name,
			{ raw, issues: result.error.issues.map((issue) => issue.message) },
		);
	}

	return result.data;
}

/** Flattens a message into the `(key, culture)` pairs it invalidates */
export function getInvalidatedKeys(message: InvalidationMessage): InvalidationKey[] {
	if (message.type === "single") return [{ key: message.key, culture: message.culture }];

	return message.keys;
}
