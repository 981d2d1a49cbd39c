import { describe, expect, test } from "vitest";

import { ApplicationError, ErrorCode } from "@/errors/";
import {
	createBatchMessage,
	createSingleMessage,
	getInvalidatedKeys,
	parseMessage,
	serializeMessage,
} from "@/services/invalidation/";

function captureError(run: () => unknown): unknown {
	try {
		run();
	} catch (error) {
		return error;
	}

	return undefined;
}

describe("invalidation messages", () => {
	describe("serializeMessage", () => {
		test("should serialize a single-entry message with exactly its payload fields", () => {
			const raw = serializeMessage(createSingleMessage("Greetings", "Hello", "en"));

			expect(raw).toBe('{"type":"single","resource":"Greetings","key":"Hello","culture":"en"}');
		});

		test("should serialize a batch message with its pair list", () => {
			const raw = serializeMessage(
				createBatchMessage("Greetings", [{ key: "Hello", culture: "" }]),
			);

			expect(raw).toBe('{"type":"batch","resource":"Greetings","keys":[{"key":"Hello","culture":""}]}');
		});
	});

	describe("parseMessage", () => {
		test("should parse a batch message", () => {
			const message = parseMessage(
				'{"type":"batch","resource":"Greetings","keys":[{"key":"Hello","culture":"en"}]}',
			);

			expect(message).toEqual({
				type: "batch",
				resource: "Greetings",
				keys: [{ key: "Hello", culture: "en" }],
			});
		});

		test("should throw InvalidMessage when the payload is not JSON", () => {
			const error = captureError(() => parseMessage("not json"));

			expect(error).toBeInstanceOf(ApplicationError);
			expect(error).toMatchObject({
				code: ErrorCode.InvalidMessage,
				operation: "parseMessage",
				metadata: { raw: "not json" },
			});
		});

		test("should throw InvalidMessage when a field is missing", () => {
			const error = captureError(() => parseMessage('{"type":"single","resource":"Greetings"}'));

			expect(error).toMatchObject({ code: ErrorCode.InvalidMessage });
		});

		test("should throw InvalidMessage for an unknown message type", () => {
			const error = captureError(() =>
				parseMessage('{"type":"all","resource":"Greetings","key":"Hello","culture":"en"}'),
			);

			expect(error).toMatchObject({ code: ErrorCode.InvalidMessage });
		});
	});

	describe("getInvalidatedKeys", () => {
		test("should return the single pair of a single-entry message", () => {
			const keys = getInvalidatedKeys(createSingleMessage("Greetings", "Hello", "en"));

			expect(keys).toEqual([{ key: "Hello", culture: "en" }]);
		});

		test("should return every pair of a batch message", () => {
			const pairs = [
				{ key: "Hello", culture: "" },
				{ key: "Bye", culture: "fr" },
			];

			const keys = getInvalidatedKeys(createBatchMessage("Greetings", pairs));

			expect(keys).toEqual(pairs);
		});
	});
});
