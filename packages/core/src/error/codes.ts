// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP-like status codes and default messages.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: store contention, timeouts, provider outages.
	 * - `false` (default): business rejections and validation failures.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Business rejections. These become `reject` decisions, never retries.
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 400, transient: false },
	ACCOUNT_NOT_FOUND: { message: "Account not found", status: 404, transient: false },
	COMPLIANCE_VIOLATION: { message: "Compliance violation", status: 403, transient: false },

	// Transient infrastructure faults.
	STORE_CONTENTION: { message: "Store contention", status: 503, transient: true },
	ACTIVITY_TIMEOUT: { message: "Activity timed out", status: 504, transient: true },
	AI_UNAVAILABLE: { message: "AI analysis unavailable", status: 503, transient: true },

	// Deterministic errors.
	NOT_FOUND: { message: "Resource not found", status: 404, transient: false },
	HOLD_NOT_FOUND: { message: "Hold not found", status: 404, transient: false },
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	DUPLICATE: { message: "Duplicate resource", status: 409, transient: false },
	CONFLICT: { message: "Resource conflict", status: 409, transient: false },
	WORKFLOW_FAILED: { message: "Workflow failed", status: 500, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

/** Codes the orchestrator turns into a `reject` decision rather than a fault. */
export const BUSINESS_REJECTION_CODES: readonly BaseErrorCode[] = [
	"INSUFFICIENT_FUNDS",
	"ACCOUNT_NOT_FOUND",
	"COMPLIANCE_VIOLATION",
];
