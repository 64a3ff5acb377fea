// =============================================================================
// CONSOLE LOGGER -- human-readable lines for terminals
// =============================================================================
// Format: `<ts> LEVEL [prefix] message key=value ...`. Colour only when
// stdout is a TTY and NO_COLOR is unset.

import type { VigilLogger } from "../types/config.js";
import { leveledLogger, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const ANSI: Record<LogLevel | "dim", [number, number]> = {
	debug: [35, 39],
	info: [36, 39],
	warn: [33, 39],
	error: [31, 39],
	dim: [2, 22],
};

function colorEnabled(): boolean {
	return process.stdout.isTTY === true && !process.env.NO_COLOR;
}

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Default: `"vigil"` */
	prefix?: string;
	/** Default: `true` */
	timestamps?: boolean;
	redactKeys?: string[];
	/** Force colour on or off. Default: detected from stdout */
	color?: boolean;
	/** Line sink. Default: console.log, console.warn for `warn`, console.error for `error` */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	if (level === "error") console.error(line);
	else if (level === "warn") console.warn(line);
	else console.log(line);
}

function formatValue(value: unknown): string {
	if (value instanceof Error) return JSON.stringify(value.message);
	if (typeof value === "string") return /^[\w.:@/-]+$/.test(value) ? value : JSON.stringify(value);
	if (value === undefined) return "undefined";
	return JSON.stringify(value) ?? String(value);
}

/** `key=value` pairs, quoting anything with spaces or punctuation. */
export function formatFields(data: Record<string, unknown> | undefined): string {
	if (!data) return "";
	return Object.entries(data)
		.map(([key, value]) => `${key}=${formatValue(value)}`)
		.join(" ");
}

/**
 * @example
 * ```ts
 * import { createConsoleLogger } from "@vigil/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): VigilLogger {
	const { level = "info", prefix = "vigil", timestamps = true, write = defaultWrite } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);
	const color = options.color ?? colorEnabled();
	const paint = (style: LogLevel | "dim", text: string) =>
		color ? `\x1b[${ANSI[style][0]}m${text}\x1b[${ANSI[style][1]}m` : text;

	return leveledLogger(level, (lvl, message, data) => {
		const parts: string[] = [];
		if (timestamps) parts.push(paint("dim", new Date().toISOString()));
		parts.push(paint(lvl, lvl.toUpperCase().padEnd(5)), `[${prefix}]`, message);
		const fields = formatFields(redactData(data, redactKeys));
		if (fields) parts.push(paint("dim", fields));
		write(parts.join(" "), lvl);
	});
}
