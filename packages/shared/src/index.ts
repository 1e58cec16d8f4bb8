/**
 * @capbridge/shared - dynamic value model, marshalling, errors and configuration
 */

export * from "./types/index.js";
export * from "./marshal/index.js";
export * from "./errors.js";
export * from "./constants.js";

export { ValueBridge } from "./quickjs/values.js";
export { setupConsole, describeVmError, dumpResult, formatConsoleArgs } from "./quickjs/utils.js";
export type { OutputSinks } from "./quickjs/utils.js";
