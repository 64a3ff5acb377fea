// =============================================================================
// JSON LOGGER -- Structured JSON logging for production environments
// =============================================================================

import type { VigilLogger } from "../types/config.js";
import { leveledLogger, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"vigil"` */
	service?: string;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: credential and account keys */
	redactKeys?: string[];
	/** Line sink. Default: stdout, with `error` lines on stderr */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

function serializeError(value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	return value;
}

/**
 * Create a structured JSON logger implementing `VigilLogger`.
 *
 * Each log line is a single JSON object, suitable for log aggregation.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@vigil/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "orchestrator" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): VigilLogger {
	const { level = "info", service = "vigil", write = defaultWrite } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);

	return leveledLogger(level, (lvl, message, data) => {
		const entry: Record<string, unknown> = {
			ts: new Date().toISOString(),
			level: lvl,
			service,
			msg: message,
		};
		for (const [key, value] of Object.entries(redactData(data, redactKeys) ?? {})) {
			entry[key] = serializeError(value);
		}
		write(JSON.stringify(entry), lvl);
	});
}
