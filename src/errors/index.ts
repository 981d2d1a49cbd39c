export * from "./error";
export * from "./error.helper";
