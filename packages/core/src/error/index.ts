import { BASE_ERROR_CODES, BUSINESS_REJECTION_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, BUSINESS_REJECTION_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type VigilErrorCode = BaseErrorCode;

export interface VigilErrorOptions {
	cause?: unknown;
	status?: number;
	transient?: boolean;
	details?: Record<string, unknown>;
}

export class VigilError extends Error {
	readonly code: VigilErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient: the condition may clear and a retry
	 * of the same operation may succeed. Activity runners and the store's
	 * atomic-unit runner consult this flag before retrying.
	 */
	readonly transient: boolean;

	constructor(code: VigilErrorCode, message: string, options?: VigilErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? BASE_ERROR_CODES[code].status;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "VigilError";
	}

	/** Whether the orchestrator should record this as a `reject` decision. */
	get isBusinessRejection(): boolean {
		return BUSINESS_REJECTION_CODES.includes(this.code);
	}

	/**
	 * Create a VigilError from a typed error code.
	 * Uses the default message and status from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: VigilErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): VigilError {
		const raw = BASE_ERROR_CODES[code];
		return new VigilError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	// --- Business rejections ---

	static insufficientFunds(message = "Insufficient funds", details?: Record<string, unknown>) {
		return new VigilError("INSUFFICIENT_FUNDS", message, { details });
	}

	static accountNotFound(message = "Account not found", cause?: unknown) {
		return new VigilError("ACCOUNT_NOT_FOUND", message, { cause });
	}

	static complianceViolation(message = "Compliance violation", details?: Record<string, unknown>) {
		return new VigilError("COMPLIANCE_VIOLATION", message, { details });
	}

	// --- Transient faults ---

	static storeContention(message = "Store contention", cause?: unknown) {
		return new VigilError("STORE_CONTENTION", message, { cause });
	}

	static activityTimeout(message = "Activity timed out", cause?: unknown) {
		return new VigilError("ACTIVITY_TIMEOUT", message, { cause });
	}

	static aiUnavailable(message = "AI analysis unavailable", cause?: unknown) {
		return new VigilError("AI_UNAVAILABLE", message, { cause });
	}

	// --- Deterministic errors ---

	static notFound(message = "Resource not found", cause?: unknown) {
		return new VigilError("NOT_FOUND", message, { cause });
	}

	static holdNotFound(message = "Hold not found", cause?: unknown) {
		return new VigilError("HOLD_NOT_FOUND", message, { cause });
	}

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new VigilError("INVALID_ARGUMENT", message, { cause });
	}

	static duplicate(message = "Duplicate resource", cause?: unknown) {
		return new VigilError("DUPLICATE", message, { cause });
	}

	static conflict(message = "Conflict", cause?: unknown) {
		return new VigilError("CONFLICT", message, { cause });
	}

	static workflowFailed(message: string, details: { stage: string; transactionId: string }, cause?: unknown) {
		return new VigilError("WORKFLOW_FAILED", message, { cause, details });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new VigilError("INTERNAL", message, { cause });
	}
}

// PostgreSQL SQLSTATEs worth retrying: serialization_failure, deadlock_detected,
// lock_not_available, too_many_connections, admin/crash shutdown, cannot_connect_now.
// Class 08 (connection exception) is matched by prefix.
const RETRYABLE_SQLSTATES = new Set(["40001", "40P01", "55P03", "53300", "57P01", "57P02", "57P03"]);

// Socket-level failures surfaced by the driver before any statement ran.
const RETRYABLE_NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN"]);

// pg reports a dropped connection without a code.
const CONNECTION_TERMINATED = /connection terminated/i;

/**
 * Whether an error is worth retrying. VigilErrors answer via `transient`;
 * driver errors are retryable for lock and serialization conflicts and for
 * lost or refused connections.
 */
export function isRetryableError(error: unknown): boolean {
	if (error instanceof VigilError) return error.transient;
	if (typeof error === "object" && error !== null && "code" in error) {
		const code = error.code;
		if (typeof code === "string") {
			return RETRYABLE_SQLSTATES.has(code) || code.startsWith("08") || RETRYABLE_NETWORK_CODES.has(code);
		}
	}
	return error instanceof Error && CONNECTION_TERMINATED.test(error.message);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
