// Store contract
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, RawErrorCode, VigilErrorCode, VigilErrorOptions } from "./error/index.js";
export {
	BASE_ERROR_CODES,
	BUSINESS_REJECTION_CODES,
	errorMessage,
	isRetryableError,
	VigilError,
} from "./error/index.js";

// Loggers
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
