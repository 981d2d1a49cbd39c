export * from "@/errors/";
export * from "@/services/";
export { formatString, logger, validateEnv } from "@/utils/";
export type { Environment, FormatArgument, Logger } from "@/utils/";
