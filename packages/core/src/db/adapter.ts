// =============================================================================
// VIGIL ADAPTER INTERFACE
// =============================================================================
// Document store contract. Every persisted document carries a string `id`
// and is addressed by model name. Ledger mutations must run inside
// `transaction()` so that partial writes are never visible to other readers.

import type { Decision, DecisionAmendment } from "../types/decision.js";
import type { Account, BalanceUpdate, Hold, JournalEntry } from "../types/ledger.js";
import type { Transaction } from "../types/transaction.js";
import type {
	AuditEvent,
	HumanReview,
	Notification,
	WorkerLease,
	WorkflowExecutionState,
	WorkflowSignalRecord,
} from "../types/workflow.js";

export interface ModelMap {
	account: Account;
	hold: Hold;
	journal_entry: JournalEntry;
	balance_update: BalanceUpdate;
	transaction: Transaction;
	decision: Decision;
	decision_amendment: DecisionAmendment;
	workflow_execution: WorkflowExecutionState;
	workflow_signal: WorkflowSignalRecord;
	human_review: HumanReview;
	audit_event: AuditEvent;
	notification: Notification;
	worker_lease: WorkerLease;
}

export type ModelName = keyof ModelMap;

export const MODEL_NAMES: readonly ModelName[] = [
	"account",
	"hold",
	"journal_entry",
	"balance_update",
	"transaction",
	"decision",
	"decision_amendment",
	"workflow_execution",
	"workflow_signal",
	"human_review",
	"audit_event",
	"notification",
	"worker_lease",
];

export type FieldOf<M extends ModelName> = keyof ModelMap[M] & string;

export interface Where<M extends ModelName = ModelName> {
	field: FieldOf<M>;
	operator: WhereOperator;
	value?: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "like"
	| "is_null"
	| "is_not_null";

export interface SortBy<M extends ModelName = ModelName> {
	field: FieldOf<M>;
	direction: "asc" | "desc";
}

export interface VigilAdapter {
	id: string;

	/** Fails with `DUPLICATE` when a document with the same id exists. */
	create<M extends ModelName>(data: { model: M; data: ModelMap[M] }): Promise<ModelMap[M]>;

	findOne<M extends ModelName>(data: {
		model: M;
		where: Where<M>[];
		/** Row-lock the match until the enclosing transaction ends. */
		forUpdate?: boolean;
	}): Promise<ModelMap[M] | null>;

	findMany<M extends ModelName>(data: {
		model: M;
		where?: Where<M>[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy<M>;
	}): Promise<ModelMap[M][]>;

	/** Updates the first match and returns it, or null when nothing matched. */
	update<M extends ModelName>(data: {
		model: M;
		where: Where<M>[];
		update: Partial<ModelMap[M]>;
	}): Promise<ModelMap[M] | null>;

	delete<M extends ModelName>(data: { model: M; where: Where<M>[] }): Promise<void>;

	count<M extends ModelName>(data: { model: M; where?: Where<M>[] }): Promise<number>;

	/** All-or-nothing unit. Writes become visible only when `fn` resolves. */
	transaction<T>(fn: (tx: VigilTransactionAdapter) => Promise<T>): Promise<T>;

	options?: VigilAdapterOptions;
}

export type VigilTransactionAdapter = Omit<VigilAdapter, "transaction">;

export interface VigilAdapterOptions {
	supportsForUpdate: boolean;
	dialectName: "postgres" | "memory";
}
