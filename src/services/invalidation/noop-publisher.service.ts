import type { InvalidationKey, InvalidationPublisher } from "./invalidation.types";

/** Publisher used when no distributed invalidation is configured */
export class NoopInvalidationPublisher implements InvalidationPublisher {
	public async publishSingle(_resource: string, _key: string, _culture: string): Promise<void> {}

	public async publishBatch(_resource: string, _keys: InvalidationKey[]): Promise<void> {}
}
