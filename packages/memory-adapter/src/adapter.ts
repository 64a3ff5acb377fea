// =============================================================================
// MEMORY ADAPTER -- VigilAdapter implementation backed by in-memory Maps
// =============================================================================
// Used by tests and single-process deployments. Data is stored per model as
// document id -> document. Every operation, and every transaction as a whole,
// runs through one FIFO lock, so transactions are serialized and a transaction
// never observes another's uncommitted writes. Transactions work on a cloned
// store that replaces the live one only on success.

import type {
	ModelMap,
	ModelName,
	SortBy,
	VigilAdapter,
	VigilAdapterOptions,
	VigilTransactionAdapter,
	Where,
} from "@vigil/core/db";
import { VigilError } from "@vigil/core/error";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Store = { [M in ModelName]: Map<string, ModelMap[M]> };

function emptyStore(): Store {
	return {
		account: new Map(),
		hold: new Map(),
		journal_entry: new Map(),
		balance_update: new Map(),
		transaction: new Map(),
		decision: new Map(),
		decision_amendment: new Map(),
		workflow_execution: new Map(),
		workflow_signal: new Map(),
		human_review: new Map(),
		audit_event: new Map(),
		notification: new Map(),
		worker_lease: new Map(),
	};
}

function cloneModel<M extends ModelName>(records: Map<string, ModelMap[M]>): Map<string, ModelMap[M]> {
	const clone = new Map<string, ModelMap[M]>();
	for (const [id, record] of records) {
		clone.set(id, structuredClone(record));
	}
	return clone;
}

/**
 * Deep clone a store for copy-on-write transaction support.
 */
function cloneStore(store: Store): Store {
	return {
		account: cloneModel<"account">(store.account),
		hold: cloneModel<"hold">(store.hold),
		journal_entry: cloneModel<"journal_entry">(store.journal_entry),
		balance_update: cloneModel<"balance_update">(store.balance_update),
		transaction: cloneModel<"transaction">(store.transaction),
		decision: cloneModel<"decision">(store.decision),
		decision_amendment: cloneModel<"decision_amendment">(store.decision_amendment),
		workflow_execution: cloneModel<"workflow_execution">(store.workflow_execution),
		workflow_signal: cloneModel<"workflow_signal">(store.workflow_signal),
		human_review: cloneModel<"human_review">(store.human_review),
		audit_event: cloneModel<"audit_event">(store.audit_event),
		notification: cloneModel<"notification">(store.notification),
		worker_lease: cloneModel<"worker_lease">(store.worker_lease),
	};
}

/** Order two scalar values; null when they are not comparable. */
function compare(a: unknown, b: unknown): number | null {
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
	if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
	return null;
}

function likeToRegExp(pattern: string): RegExp {
	// % matches any sequence of characters, _ matches any single character
	const source = pattern
		.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
		.replace(/%/g, ".*")
		.replace(/_/g, ".");
	return new RegExp(`^${source}$`, "i");
}

/**
 * Evaluate a single Where condition against a record.
 */
function matchesCondition<M extends ModelName>(record: ModelMap[M], condition: Where<M>): boolean {
	const value: unknown = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return value === condition.value;
		case "ne":
			return value !== condition.value;
		case "gt": {
			const c = compare(value, condition.value);
			return c !== null && c > 0;
		}
		case "gte": {
			const c = compare(value, condition.value);
			return c !== null && c >= 0;
		}
		case "lt": {
			const c = compare(value, condition.value);
			return c !== null && c < 0;
		}
		case "lte": {
			const c = compare(value, condition.value);
			return c !== null && c <= 0;
		}
		case "in":
			return Array.isArray(condition.value) && condition.value.includes(value);
		case "like":
			if (typeof value !== "string" || typeof condition.value !== "string") {
				return false;
			}
			return likeToRegExp(condition.value).test(value);
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
		default:
			return false;
	}
}

/**
 * Filter records by an array of Where conditions (all must match -- AND logic).
 */
function filterRecords<M extends ModelName>(
	records: Map<string, ModelMap[M]>,
	where: Where<M>[],
): ModelMap[M][] {
	const results: ModelMap[M][] = [];
	for (const record of records.values()) {
		if (where.every((w) => matchesCondition(record, w))) {
			results.push(record);
		}
	}
	return results;
}

/**
 * Sort records by a SortBy clause. Missing values sort last.
 */
function sortRecords<M extends ModelName>(records: ModelMap[M][], sortBy: SortBy<M>): ModelMap[M][] {
	return [...records].sort((a, b) => {
		const aVal: unknown = a[sortBy.field];
		const bVal: unknown = b[sortBy.field];

		if (aVal === bVal) return 0;
		if (aVal === null || aVal === undefined) return 1;
		if (bVal === null || bVal === undefined) return -1;

		const comparison = compare(aVal, bVal) ?? 0;
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}

/** FIFO lock: each task starts after every previously queued task settles. */
function createLock() {
	let tail: Promise<unknown> = Promise.resolve();
	return {
		run<T>(task: () => Promise<T>): Promise<T> {
			const result = tail.then(task);
			tail = result.then(
				() => undefined,
				() => undefined,
			);
			return result;
		},
	};
}

const ADAPTER_OPTIONS: VigilAdapterOptions = {
	supportsForUpdate: false,
	dialectName: "memory",
};

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the CRUD methods over a store accessor. The accessor is a closure so
 * a transaction can point the same methods at its working copy.
 */
function buildAdapterMethods(getStore: () => Store): Omit<VigilTransactionAdapter, "id" | "options"> {
	return {
		create: async ({ model, data }) => {
			const modelStore = getStore()[model];
			if (modelStore.has(data.id)) {
				throw VigilError.duplicate(`${model} ${data.id} already exists`);
			}
			modelStore.set(data.id, structuredClone(data));
			return structuredClone(data);
		},

		findOne: async ({ model, where }) => {
			const first = filterRecords(getStore()[model], where)[0];
			return first ? structuredClone(first) : null;
		},

		findMany: async ({ model, where, limit, offset, sortBy }) => {
			let results = filterRecords(getStore()[model], where ?? []);

			if (sortBy) {
				results = sortRecords(results, sortBy);
			}

			if (offset !== undefined) {
				results = results.slice(offset);
			}

			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => structuredClone(r));
		},

		update: async ({ model, where, update: updateData }) => {
			const modelStore = getStore()[model];
			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;

			const updated = { ...first, ...structuredClone(updateData), id: first.id };
			modelStore.set(first.id, updated);
			return structuredClone(updated);
		},

		delete: async ({ model, where }) => {
			const modelStore = getStore()[model];
			for (const match of filterRecords(modelStore, where)) {
				modelStore.delete(match.id);
			}
		},

		count: async ({ model, where }) => {
			const modelStore = getStore()[model];
			if (!where || where.length === 0) {
				return modelStore.size;
			}
			return filterRecords(modelStore, where).length;
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface MemoryAdapter extends VigilAdapter {
	/** Drop every document. */
	reset(): void;
}

/**
 * Create a VigilAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@vigil/memory-adapter";
 *
 * const adapter = memoryAdapter();
 * const vigil = createVigil({ database: adapter });
 * ```
 */
export function memoryAdapter(): MemoryAdapter {
	let store = emptyStore();
	const lock = createLock();
	const methods = buildAdapterMethods(() => store);

	return {
		id: "memory",
		create: (data) => lock.run(() => methods.create(data)),
		findOne: (data) => lock.run(() => methods.findOne(data)),
		findMany: (data) => lock.run(() => methods.findMany(data)),
		update: (data) => lock.run(() => methods.update(data)),
		delete: (data) => lock.run(() => methods.delete(data)),
		count: (data) => lock.run(() => methods.count(data)),

		transaction: (fn) =>
			lock.run(async () => {
				const working = cloneStore(store);
				const tx: VigilTransactionAdapter = {
					id: "memory",
					...buildAdapterMethods(() => working),
					options: ADAPTER_OPTIONS,
				};
				const result = await fn(tx);
				store = working;
				return result;
			}),

		reset: () => {
			store = emptyStore();
		},

		options: ADAPTER_OPTIONS,
	};
}
