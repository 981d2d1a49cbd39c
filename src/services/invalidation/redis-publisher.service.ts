import type { InvalidationKey, InvalidationMessage, InvalidationPublisher } from "./invalidation.types";

import type { Logger } from "@/utils/";

import { ApplicationError, ErrorCode, throwIfAborted } from "@/errors/";
import { DEFAULT_INVALIDATION_CHANNEL, errorMessages, logger as baseLogger } from "@/utils/";

import { createBatchMessage, createSingleMessage, serializeMessage } from "./invalidation-message";

/** Subset of the ioredis client used for publishing */
export interface RedisPublisherClient {
	publish(channel: string, message: string): Promise<number>;
}

export interface RedisInvalidationPublisherConfig {
	/** Redis client used for `PUBLISH` (may be shared with other commands) */
	redis: RedisPublisherClient;

	/**
	 * Channel carrying invalidation messages.
	 *
	 * @default "localization:invalidate"
	 */
	channel?: string;

	logger?: Logger;
}

/**
 * Publishes invalidation messages on a Redis Pub/Sub channel.
 *
 * Message format: JSON, see {@link InvalidationMessage}.
 *
 * Failures reject with {@link ErrorCode.PublishFailed}; deciding whether they
 * are fatal belongs to the caller.
 */
export class RedisInvalidationPublisher implements InvalidationPublisher {
	private readonly redis: RedisPublisherClient;
	private readonly logger: Logger;

	/** Channel carrying invalidation messages */
	public readonly channel: string;

	constructor(config: RedisInvalidationPublisherConfig) {
		this.redis = config.redis;
		this.channel = config.channel ?? DEFAULT_INVALIDATION_CHANNEL;
		this.logger = (config.logger ?? baseLogger).child({
			component: RedisInvalidationPublisher.name,
		});
	}

	public async publishSingle(
		resource: string,
		key: string,
		culture: string,
		signal?: AbortSignal,
	): Promise<void> {
		await this.publish(createSingleMessage(resource, key, culture), signal);
	}

	public async publishBatch(
		resource: string,
		keys: InvalidationKey[],
		signal?: AbortSignal,
	): Promise<void> {
		await this.publish(createBatchMessage(resource, keys), signal);
	}

	private async publish(message: InvalidationMessage, signal?: AbortSignal): Promise<void> {
		const operation = `${RedisInvalidationPublisher.name}.publish`;

		throwIfAborted(signal, operation);

		try {
			const subscribers = await this.redis.publish(this.channel, serializeMessage(message));

			this.logger.debug(
				{ channel: this.channel, type: message.type, resource: message.resource, subscribers },
				"Published invalidation",
			);
		} catch (error) {
			throw new ApplicationError(
				errorMessages.publishFailed(this.channel),
				ErrorCode.PublishFailed,
				operation,
				{ channel: this.channel, type: message.type, resource: message.resource },
				error,
			);
		}
	}
}
