import type { InvalidationMessage, InvalidationSubscriber } from "./invalidation.types";

import type { LookupCache } from "@/services/cache/cache.service";
import type { Logger } from "@/utils/";

import { extractErrorMessage } from "@/errors/";
import { buildCacheKey } from "@/services/localization/cache-key";
import { DEFAULT_INVALIDATION_CHANNEL, logger as baseLogger } from "@/utils/";

import { getInvalidatedKeys, parseMessage } from "./invalidation-message";

type MessageListener = (channel: string, message: string) => void;

/** Subset of the ioredis client used for subscribing */
export interface RedisSubscriberClient {
	subscribe(...channels: string[]): Promise<unknown>;
	unsubscribe(...channels: string[]): Promise<unknown>;
	on(event: "message", listener: MessageListener): unknown;
	off(event: "message", listener: MessageListener): unknown;
}

export interface RedisInvalidationSubscriberConfig {
	/** Redis client for subscribing (must be a dedicated connection) */
	redis: RedisSubscriberClient;

	/** Cache to evict entries from */
	cache: Pick<LookupCache<unknown>, "remove">;

	/** Prefix used when the evicted keys were cached */
	cacheKeyPrefix: string;

	/**
	 * Channel carrying invalidation messages.
	 *
	 * @default "localization:invalidate"
	 */
	channel?: string;

	logger?: Logger;
}

/**
 * Evicts local cache entries named by invalidation messages received over
 * Redis Pub/Sub.
 *
 * Malformed messages are logged and dropped.
 */
export class RedisInvalidationSubscriber implements InvalidationSubscriber {
	private readonly redis: RedisSubscriberClient;
	private readonly cache: Pick<LookupCache<unknown>, "remove">;
	private readonly cacheKeyPrefix: string;
	private readonly logger: Logger;
	private readonly listener: MessageListener;
	private isSubscribed = false;

	/** Channel carrying invalidation messages */
	public readonly channel: string;

	constructor(config: RedisInvalidationSubscriberConfig) {
		this.redis = config.redis;
		this.cache = config.cache;
		this.cacheKeyPrefix = config.cacheKeyPrefix;
		this.channel = config.channel ?? DEFAULT_INVALIDATION_CHANNEL;
		this.logger = (config.logger ?? baseLogger).child({
			component: RedisInvalidationSubscriber.name,
		});

		this.listener = (channel, message) => {
			if (channel !== this.channel) return;

			this.handleMessage(message).catch((error: unknown) => {
				this.logger.error(
					{ error: extractErrorMessage(error), channel },
					"Error handling invalidation message",
				);
			});
		};
	}

	/** Whether the subscriber is currently listening */
	public get subscribed(): boolean {
		return this.isSubscribed;
	}

	/** Subscribes to the invalidation channel; calling it twice is a no-op */
	public async start(): Promise<void> {
		if (this.isSubscribed) return;

		this.redis.on("message", this.listener);

		try {
			await this.redis.subscribe(this.channel);
		} catch (error) {
			this.redis.off("message", this.listener);
			throw error;
		}

		this.isSubscribed = true;

		this.logger.info({ channel: this.channel }, "Subscribed to invalidation channel");
	}

	/** Unsubscribes and detaches the message listener */
	public async stop(): Promise<void> {
		if (!this.isSubscribed) return;

		this.redis.off("message", this.listener);
		await this.redis.unsubscribe(this.channel);
		this.isSubscribed = false;

		this.logger.info({ channel: this.channel }, "Unsubscribed from invalidation channel");
	}

	/**
	 * Evicts every entry named by a raw invalidation message.
	 *
	 * @param raw The message as received from the transport
	 *
	 * @returns Number of evicted entries, `0` for a malformed message
	 */
	public async handleMessage(raw: string): Promise<number> {
		let message: InvalidationMessage;

		try {
			message = parseMessage(raw);
		} catch (error) {
			this.logger.warn(
				{ error: extractErrorMessage(error) },
				"Dropping malformed invalidation message",
			);
			return 0;
		}

		const keys = getInvalidatedKeys(message);

		for (const { key, culture } of keys) {
			await this.cache.remove(buildCacheKey(this.cacheKeyPrefix, message.resource, key, culture));
		}

		this.logger.debug(
			{ type: message.type, resource: message.resource, evicted: keys.length },
			"Processed invalidation",
		);

		return keys.length;
	}
}
