import type { VigilLogger } from "../types/config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export type LogEmitter = (level: LogLevel, message: string, data: Record<string, unknown> | undefined) => void;

/** Wrap an emitter so calls below `minLevel` never reach it. */
export function leveledLogger(minLevel: LogLevel, emit: LogEmitter): VigilLogger {
	const min = LEVEL_PRIORITY[minLevel];
	const at =
		(level: LogLevel) =>
		(message: string, data?: Record<string, unknown>): void => {
			if (LEVEL_PRIORITY[level] >= min) emit(level, message, data);
		};
	return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}
