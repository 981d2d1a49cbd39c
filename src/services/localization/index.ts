export * from "./cache-key";
export * from "./fallback-chain";
export * from "./localization-options";
export * from "./localization.types";
export * from "./string-localizer.service";
export * from "./translation-manager.service";
export * from "./translation-resolver.service";
