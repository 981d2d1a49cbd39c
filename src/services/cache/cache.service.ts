import { throwIfAborted } from "@/errors/";
import { logger } from "@/utils/";

/** Cache entry with value and expiration timestamp */
export interface CacheEntry<T> {
	/** Cached value */
	value: T;

	/** Expiration timestamp in milliseconds since epoch */
	expiresAt: number;
}

/** Tuning of a {@link CacheService} */
export interface CacheServiceOptions {
	/**
	 * Number of computed misses between sweeps of expired entries.
	 *
	 * @default 1000
	 */
	sweepInterval?: number;
}

/**
 * Cache contract consumed by the resolver and the manager.
 *
 * Implementations must coalesce concurrent misses on identical keys into a
 * single `compute` call.
 */
export interface LookupCache<T> {
	/**
	 * Returns the cached value for `key`, computing and storing it on a miss.
	 *
	 * @param key Cache key
	 * @param ttlMs Time-to-live of a computed value, in milliseconds
	 * @param compute Produces the value on a miss
	 * @param signal Cancels this caller's wait, not the shared computation
	 */
	getOrCompute(
		key: string,
		ttlMs: number,
		compute: () => Promise<T>,
		signal?: AbortSignal,
	): Promise<T>;

	/** Evicts `key`, including a computation still in flight for it */
	remove(key: string): void | Promise<void>;
}

/**
 * In-memory cache with TTL-based expiration and compute-if-absent.
 *
 * Uses {@link Map} for O(1) lookups. Concurrent misses on the same key share
 * one in-flight computation. A failed computation is not cached, and a value
 * whose key was removed while computing is returned to its waiters but not
 * stored. Expired entries are swept every `sweepInterval` computed misses, so
 * keys that are never read again do not accumulate.
 *
 * @example
 * ```typescript
 * const cache = new CacheService<string>();
 * cache.set("key", "value", 3600000); // 1 hour TTL
 * const cached = cache.get("key"); // ^? "value" | null
 *
 * const computed = await cache.getOrCompute("other", 60_000, () => loadValue());
 * ```
 */
export class CacheService<T> implements LookupCache<T> {
	private readonly logger = logger.child({ component: CacheService.name });
	private readonly cache = new Map<string, CacheEntry<T>>();
	private readonly inFlight = new Map<string, Promise<T>>();
	private readonly sweepInterval: number;
	private missesSinceSweep = 0;

	constructor(options: CacheServiceOptions = {}) {
		this.sweepInterval = options.sweepInterval ?? 1000;
	}

	/**
	 * Stores a value in cache with TTL.
	 *
	 * @param key Unique cache key
	 * @param value Value to cache
	 * @param ttlMs Time-to-live in milliseconds
	 */
	public set(key: string, value: T, ttlMs: number): void {
		const expiresAt = Date.now() + ttlMs;

		this.cache.set(key, { value, expiresAt });
	}

	/**
	 * Retrieves a cached value if not expired.
	 *
	 * @param key Cache key to lookup
	 *
	 * @returns Cached value or `null` if expired or not found
	 */
	public get(key: string): T | null {
		const entry = this.cache.get(key);

		if (!entry) {
			this.logger.debug({ key }, "Cache entry not found");
			return null;
		}

		if (Date.now() > entry.expiresAt) {
			this.logger.debug({ key }, "Cache entry found expired, deleting");
			this.cache.delete(key);
			return null;
		}

		this.logger.debug({ key }, "Cache entry found and valid");

		return entry.value;
	}

	public async getOrCompute(
		key: string,
		ttlMs: number,
		compute: () => Promise<T>,
		signal?: AbortSignal,
	): Promise<T> {
		throwIfAborted(signal, "CacheService.getOrCompute");

		const cached = this.get(key);
		if (cached !== null) return cached;

		let pending = this.inFlight.get(key);

		if (pending) {
			this.logger.debug({ key }, "Joining in-flight computation");
		} else {
			pending = this.startComputation(key, ttlMs, compute);
		}

		return waitFor(pending, signal);
	}

	/**
	 * Removes a specific key from cache.
	 *
	 * A computation in flight for the key is detached so its result is not stored.
	 *
	 * @param key Cache key to delete
	 */
	public remove(key: string): void {
		this.logger.debug({ key }, "Deleting cache entry");

		this.cache.delete(key);
		this.inFlight.delete(key);
	}

	/** Clears all entries from cache */
	public clear(): void {
		this.logger.debug("Clearing all cache entries");

		this.cache.clear();
		this.inFlight.clear();
	}

	/** Returns the current number of cache entries (including expired) */
	public get size(): number {
		return this.cache.size;
	}

	/** Removes all expired entries from cache */
	public cleanupExpired(): number {
		const now = Date.now();
		let removed = 0;

		for (const [key, entry] of this.cache.entries()) {
			if (now > entry.expiresAt) {
				this.cache.delete(key);
				removed++;
			}
		}

		this.logger.debug({ removed }, "Cleaned up expired cache entries");

		return removed;
	}

	private startComputation(key: string, ttlMs: number, compute: () => Promise<T>): Promise<T> {
		this.logger.debug({ key }, "Cache miss, computing value");

		if (++this.missesSinceSweep >= this.sweepInterval) {
			this.missesSinceSweep = 0;
			this.cleanupExpired();
		}

		const pending = compute().then(
			(value) => {
				if (this.inFlight.get(key) === pending) {
					this.inFlight.delete(key);
					this.set(key, value, ttlMs);
				}

				return value;
			},
			(error: unknown) => {
				if (this.inFlight.get(key) === pending) this.inFlight.delete(key);

				throw error;
			},
		);

		this.inFlight.set(key, pending);

		return pending;
	}
}

/**
 * Waits for a shared computation, giving up early when `signal` aborts.
 *
 * Aborting only rejects this waiter; the computation keeps running for the others.
 */
function waitFor<T>(pending: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) return pending;

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => {
			try {
				throwIfAborted(signal, "CacheService.getOrCompute");
			} catch (error) {
				reject(error);
			}
		};

		signal.addEventListener("abort", onAbort, { once: true });

		pending.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}
