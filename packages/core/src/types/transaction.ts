export type TransactionType = "ach" | "wire" | "international";

export type TransactionStatus =
	| "pending"
	| "processing"
	| "approved"
	| "rejected"
	| "escalated"
	| "completed"
	| "failed";

/** Statuses a caller can treat as final. `escalated` is not: review resolves it. */
export const TERMINAL_TRANSACTION_STATUSES: readonly TransactionStatus[] = [
	"approved",
	"rejected",
	"completed",
	"failed",
];

/** Allowed forward moves. Anything else is a CONFLICT. */
export const TRANSACTION_STATUS_TRANSITIONS: Readonly<Record<TransactionStatus, readonly TransactionStatus[]>> = {
	pending: ["processing", "failed"],
	processing: ["approved", "rejected", "escalated", "failed"],
	escalated: ["approved", "rejected", "failed"],
	approved: ["completed"],
	rejected: [],
	completed: [],
	failed: [],
};

export interface Party {
	name: string;
	accountId: string;
	country: string;
	customerId: string;
}

export interface ProcessingStage {
	stage: string;
	at: string;
}

export type MetadataValue = string | number | boolean;

export interface Transaction {
	id: string;
	type: TransactionType;
	/** Decimal string. */
	amount: string;
	currency: string;
	sender: Party;
	recipient: Party;
	reference: string | null;
	description: string | null;
	status: TransactionStatus;
	/** Append-only. */
	processingStages: ProcessingStage[];
	/** Accumulated, never removed. */
	riskFlags: string[];
	metadata: Record<string, MetadataValue>;
	/** Stored for similar-case search once computed. */
	embedding: number[] | null;
	// Denormalized for indexed lookups.
	senderAccountId: string;
	recipientAccountId: string;
	senderCustomerId: string;
	recipientCustomerId: string;
	createdAt: string;
	updatedAt: string;
}

export interface SubmitTransactionInput {
	/** Generated when omitted. Resubmitting an existing id returns the running workflow. */
	id?: string;
	type: TransactionType;
	/** Decimal string such as `"2500.00"`. */
	amount: string;
	currency?: string;
	sender: Party;
	recipient: Party;
	reference?: string;
	description?: string;
	metadata?: Record<string, MetadataValue>;
}
