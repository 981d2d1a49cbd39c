export * from "./invalidation-message";
export * from "./invalidation.types";
export * from "./noop-publisher.service";
export * from "./redis-publisher.service";
export * from "./redis-subscriber.service";
