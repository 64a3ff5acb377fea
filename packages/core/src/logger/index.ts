export { type ConsoleLoggerOptions, createConsoleLogger, formatFields } from "./console-logger.js";
export { LEVEL_PRIORITY, type LogLevel, leveledLogger } from "./levels.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { buildRedactKeys, redactData } from "./redact.js";

import type { VigilLogger } from "../types/config.js";

/** Logger that drops everything. */
export const noopLogger: VigilLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};
