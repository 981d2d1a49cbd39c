import { Redis } from "ioredis";

import type { InvalidationPublisher } from "./invalidation/invalidation.types";
import type { CachedLookup, LocalizationOptions } from "./localization/localization.types";

import { env, logger } from "@/utils/";

import { CacheService } from "./cache/cache.service";
import { SqliteTranslationStore } from "./database/translation-store.service";
import { NoopInvalidationPublisher } from "./invalidation/noop-publisher.service";
import { RedisInvalidationPublisher } from "./invalidation/redis-publisher.service";
import { RedisInvalidationSubscriber } from "./invalidation/redis-subscriber.service";
import { createLocalizationOptionsFromEnv } from "./localization/localization-options";
import { LocalizerFactory } from "./localization/string-localizer.service";
import { TranslationManager } from "./localization/translation-manager.service";
import { TranslationResolver } from "./localization/translation-resolver.service";

/** Configuration interface for service instantiation */
export interface ServiceConfig {
	/** SQLite database file, or `":memory:"` */
	databasePath: string;

	/** Redis settings; distributed invalidation is disabled when absent */
	redis?: {
		/** Connection URL */
		url: string;

		/** Pub/Sub channel for invalidation messages */
		channel: string;
	};

	/** Resolver and cache settings */
	localization: LocalizationOptions;
}

/** Creates service configuration from environment variables */
export function createServiceConfigFromEnv(): ServiceConfig {
	return {
		databasePath: env.DATABASE_PATH,
		redis:
			env.REDIS_URL ? { url: env.REDIS_URL, channel: env.INVALIDATION_CHANNEL } : undefined,
		localization: createLocalizationOptionsFromEnv(env),
	};
}

/**
 * Lightweight service factory for dependency injection.
 *
 * Creates and manages service instances with proper dependency injection.
 * Uses lazy instantiation and singleton pattern for shared services.
 *
 * ### Usage
 *
 * ```typescript
 * const factory = new ServiceFactory(createServiceConfigFromEnv());
 * await factory.startInvalidationSubscriber();
 *
 * const localizer = factory.createLocalizerFactory().create("Greetings", "en-US");
 * await factory.dispose();
 * ```
 *
 * @see {@link createServiceConfigFromEnv} for environment-based configuration
 */
export class ServiceFactory {
	private readonly logger = logger.child({ component: ServiceFactory.name });
	private readonly config: ServiceConfig;

	private store?: SqliteTranslationStore;
	private cache?: CacheService<CachedLookup>;
	private redis?: Redis;
	private subscriberRedis?: Redis;
	private publisher?: InvalidationPublisher;
	private subscriber?: RedisInvalidationSubscriber;
	private resolver?: TranslationResolver;
	private manager?: TranslationManager;
	private localizerFactory?: LocalizerFactory;

	constructor(config: ServiceConfig) {
		this.config = config;
	}

	/** Creates or retrieves the singleton translation store */
	public getTranslationStore(): SqliteTranslationStore {
		this.store ??= new SqliteTranslationStore(this.config.databasePath);

		return this.store;
	}

	/** Creates or retrieves the singleton lookup cache */
	public getCache(): CacheService<CachedLookup> {
		this.cache ??= new CacheService<CachedLookup>();

		return this.cache;
	}

	/** Creates or retrieves the invalidation publisher (no-op without Redis) */
	public getInvalidationPublisher(): InvalidationPublisher {
		if (this.publisher) return this.publisher;

		const redisConfig = this.config.redis;

		this.publisher =
			redisConfig ?
				new RedisInvalidationPublisher({
					redis: this.getRedis(redisConfig.url),
					channel: redisConfig.channel,
				})
			:	new NoopInvalidationPublisher();

		return this.publisher;
	}

	/**
	 * Creates or retrieves the invalidation subscriber.
	 *
	 * @returns `null` when Redis is not configured
	 */
	public getInvalidationSubscriber(): RedisInvalidationSubscriber | null {
		const redisConfig = this.config.redis;
		if (!redisConfig) return null;

		if (!this.subscriber) {
			this.subscriberRedis = this.createRedis(redisConfig.url, "redis-subscriber");
			this.subscriber = new RedisInvalidationSubscriber({
				redis: this.subscriberRedis,
				cache: this.getCache(),
				cacheKeyPrefix: this.config.localization.cacheKeyPrefix,
				channel: redisConfig.channel,
			});
		}

		return this.subscriber;
	}

	/** Starts listening for invalidations from other instances, when Redis is configured */
	public async startInvalidationSubscriber(): Promise<void> {
		await this.getInvalidationSubscriber()?.start();
	}

	/** Creates TranslationResolver with injected dependencies */
	public createTranslationResolver(): TranslationResolver {
		this.resolver ??= new TranslationResolver({
			store: this.getTranslationStore(),
			cache: this.getCache(),
			options: this.config.localization,
		});

		return this.resolver;
	}

	/** Creates TranslationManager with injected dependencies */
	public createTranslationManager(): TranslationManager {
		this.manager ??= new TranslationManager({
			store: this.getTranslationStore(),
			cache: this.getCache(),
			options: this.config.localization,
			publisher: this.getInvalidationPublisher(),
		});

		return this.manager;
	}

	/** Creates LocalizerFactory with injected dependencies */
	public createLocalizerFactory(): LocalizerFactory {
		this.localizerFactory ??= new LocalizerFactory(
			this.createTranslationResolver(),
			this.config.localization,
		);

		return this.localizerFactory;
	}

	/** Stops the subscriber, closes Redis connections and the database, drops the cache */
	public async dispose(): Promise<void> {
		await this.subscriber?.stop();
		await this.subscriberRedis?.quit();
		await this.redis?.quit();
		this.store?.close();
		this.cache?.clear();

		this.subscriber = undefined;
		this.subscriberRedis = undefined;
		this.redis = undefined;
		this.publisher = undefined;
		this.store = undefined;
		this.cache = undefined;
		this.resolver = undefined;
		this.manager = undefined;
		this.localizerFactory = undefined;

		this.logger.info("Services disposed");
	}

	private getRedis(url: string): Redis {
		this.redis ??= this.createRedis(url, "redis");

		return this.redis;
	}

	/** Creates a Redis connection whose errors are logged */
	private createRedis(url: string, component: string): Redis {
		const redisLogger = logger.child({ component });
		const redis = new Redis(url);

		redis.on("error", (error: Error) => {
			redisLogger.error({ err: error }, "Redis connection error");
		});

		return redis;
	}
}
