export type { DriveContext } from "./context.js";
export { Logger, type LoggerOptions, type LogSink } from "./logger.js";
export * from "./transport/index.js";
export * from "./upload/index.js";
export * from "./listing/index.js";
export * from "./config/index.js";
export { runCommand, helpData, USAGE } from "./cli/commands.js";
export { parseArgs, type ParsedArgs } from "./cli/args.js";
