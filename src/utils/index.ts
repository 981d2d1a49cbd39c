export * from "./constants.util";
export * from "./env.util";
export * from "./format.util";
export * from "./logger.util";
