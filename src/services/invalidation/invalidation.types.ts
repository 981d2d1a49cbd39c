/**
 * @fileoverview
 *
 * Contracts of the cross-instance invalidation protocol.
 *
 * Publishers broadcast which cache entries went stale; subscribers evict the
 * same entries locally, building keys with the shared cache key codec.
 */

/** `(key, culture)` pair carried by resource-level invalidation batches */
export interface InvalidationKey {
	key: string;
	culture: string;
}

/** Invalidation of a single `(resource, key, culture)` entry */
export interface SingleInvalidationMessage {
	type: "single";
	resource: string;
	key: string;
	culture: string;
}

/** Invalidation of a list of entries of one resource */
export interface BatchInvalidationMessage {
	type: "batch";
	resource: string;
	keys: InvalidationKey[];
}

/** Any message travelling on the invalidation channel */
export type InvalidationMessage = SingleInvalidationMessage | BatchInvalidationMessage;

/**
 * Best-effort broadcast channel for invalidations.
 *
 * Implementations may reject on transport failure; callers on the write path
 * report such failures without rolling back the write.
 */
export interface InvalidationPublisher {
	publishSingle(resource: string, key: string, culture: string, signal?: AbortSignal): Promise<void>;

	publishBatch(resource: string, keys: InvalidationKey[], signal?: AbortSignal): Promise<void>;
}

/** Receiving end of the invalidation channel */
export interface InvalidationSubscriber {
	start(): Promise<void>;

	stop(): Promise<void>;
}
