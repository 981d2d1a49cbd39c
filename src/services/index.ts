export * from "./cache/cache.service";
export * from "./database/base.service";
export * from "./database/translation-store.service";
export * from "./invalidation/";
export * from "./localization/";
export * from "./service-factory.service";
