// =============================================================================
// TRANSACTION MANAGER -- submitted transactions and their status
// =============================================================================
// Transactions are created on submission and mutated only by the workflow.
// Status moves forward along TRANSACTION_STATUS_TRANSITIONS; once terminal,
// only stage appends and risk flags may still change.

import type {
	Party,
	SubmitTransactionInput,
	Transaction,
	TransactionStatus,
	TransactionType,
	VigilContext,
} from "@vigil/core";
import {
	formatAmount,
	generateId,
	parseAmount,
	TERMINAL_TRANSACTION_STATUSES,
	TRANSACTION_STATUS_TRANSITIONS,
	VigilError,
} from "@vigil/core";
import { withStoreTransaction } from "./ledger-helpers.js";

const TRANSACTION_TYPES: readonly TransactionType[] = ["ach", "wire", "international"];

export function isTerminalStatus(status: TransactionStatus): boolean {
	return TERMINAL_TRANSACTION_STATUSES.includes(status);
}

// =============================================================================
// VALIDATION
// =============================================================================

function normalizeParty(party: Party, role: "sender" | "recipient"): Party {
	if (!party.accountId?.trim()) {
		throw VigilError.invalidArgument(`${role}.accountId is required`);
	}
	if (!party.name?.trim()) {
		throw VigilError.invalidArgument(`${role}.name is required`);
	}
	const country = party.country?.trim().toUpperCase() ?? "";
	if (!/^[A-Z]{2}$/.test(country)) {
		throw VigilError.invalidArgument(`${role}.country must be an ISO 3166 alpha-2 code`);
	}
	return {
		name: party.name.trim(),
		accountId: party.accountId.trim(),
		country,
		customerId: party.customerId?.trim() ?? "",
	};
}

export function buildTransaction(ctx: VigilContext, input: SubmitTransactionInput): Transaction {
	if (!TRANSACTION_TYPES.includes(input.type)) {
		throw VigilError.invalidArgument(`type must be one of ${TRANSACTION_TYPES.join(", ")}`);
	}
	const currency = input.currency ?? ctx.options.currency;
	const amount = formatAmount(parseAmount(input.amount), currency);
	const sender = normalizeParty(input.sender, "sender");
	const recipient = normalizeParty(input.recipient, "recipient");
	if (sender.accountId === recipient.accountId) {
		throw VigilError.invalidArgument("sender and recipient must use different accounts");
	}

	const now = ctx.now().toISOString();
	return {
		id: input.id ?? generateId("txn"),
		type: input.type,
		amount,
		currency,
		sender,
		recipient,
		reference: input.reference ?? null,
		description: input.description ?? null,
		status: "pending",
		processingStages: [{ stage: "submitted", at: now }],
		riskFlags: [],
		metadata: input.metadata ?? {},
		embedding: null,
		senderAccountId: sender.accountId,
		recipientAccountId: recipient.accountId,
		senderCustomerId: sender.customerId,
		recipientCustomerId: recipient.customerId,
		createdAt: now,
		updatedAt: now,
	};
}

// =============================================================================
// CRUD
// =============================================================================

/**
 * Persist a submitted transaction. Resubmitting an id that already exists
 * returns the stored transaction with `created: false`.
 */
export async function createTransaction(
	ctx: VigilContext,
	input: SubmitTransactionInput,
): Promise<{ transaction: Transaction; created: boolean }> {
	const candidate = buildTransaction(ctx, input);
	return withStoreTransaction(ctx, async (tx) => {
		const existing = await tx.findOne({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: candidate.id }],
		});
		if (existing) return { transaction: existing, created: false };
		return { transaction: await tx.create({ model: "transaction", data: candidate }), created: true };
	});
}

export async function findTransaction(ctx: VigilContext, transactionId: string): Promise<Transaction | null> {
	return ctx.adapter.findOne({
		model: "transaction",
		where: [{ field: "id", operator: "eq", value: transactionId }],
	});
}

export async function getTransaction(ctx: VigilContext, transactionId: string): Promise<Transaction> {
	const txn = await findTransaction(ctx, transactionId);
	if (!txn) {
		throw VigilError.notFound(`Transaction ${transactionId} not found`);
	}
	return txn;
}

export async function listTransactions(
	ctx: VigilContext,
	params: { status?: TransactionStatus; customerId?: string; limit?: number; offset?: number } = {},
): Promise<Transaction[]> {
	return ctx.adapter.findMany({
		model: "transaction",
		where: [
			...(params.status ? [{ field: "status" as const, operator: "eq" as const, value: params.status }] : []),
			...(params.customerId
				? [{ field: "senderCustomerId" as const, operator: "eq" as const, value: params.customerId }]
				: []),
		],
		sortBy: { field: "createdAt", direction: "desc" },
		limit: Math.min(params.limit ?? 50, 500),
		offset: params.offset ?? 0,
	});
}

// =============================================================================
// MUTATIONS (workflow only)
// =============================================================================

/**
 * Append a processing stage. Idempotent: a stage already recorded is not
 * appended twice.
 */
export async function appendStage(ctx: VigilContext, transactionId: string, stage: string): Promise<void> {
	await withStoreTransaction(ctx, async (tx) => {
		const txn = await tx.findOne({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			forUpdate: true,
		});
		if (!txn) throw VigilError.notFound(`Transaction ${transactionId} not found`);
		if (txn.processingStages.some((s) => s.stage === stage)) return;

		const at = ctx.now().toISOString();
		await tx.update({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			update: { processingStages: [...txn.processingStages, { stage, at }], updatedAt: at },
		});
	});
}

/** Add risk flags. Flags accumulate and are never removed. */
export async function addRiskFlags(ctx: VigilContext, transactionId: string, flags: string[]): Promise<void> {
	if (flags.length === 0) return;
	await withStoreTransaction(ctx, async (tx) => {
		const txn = await tx.findOne({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			forUpdate: true,
		});
		if (!txn) throw VigilError.notFound(`Transaction ${transactionId} not found`);
		const merged = [...txn.riskFlags];
		for (const flag of flags) {
			if (!merged.includes(flag)) merged.push(flag);
		}
		if (merged.length === txn.riskFlags.length) return;
		await tx.update({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			update: { riskFlags: merged, updatedAt: ctx.now().toISOString() },
		});
	});
}

export async function storeEmbedding(ctx: VigilContext, transactionId: string, embedding: number[]): Promise<void> {
	await ctx.adapter.update({
		model: "transaction",
		where: [{ field: "id", operator: "eq", value: transactionId }],
		update: { embedding },
	});
}

/**
 * Move the transaction to `status`. Writing the current status again is a
 * no-op; a move the transition table does not allow is a CONFLICT.
 */
export async function updateStatus(
	ctx: VigilContext,
	transactionId: string,
	status: TransactionStatus,
): Promise<Transaction> {
	return withStoreTransaction(ctx, async (tx) => {
		const txn = await tx.findOne({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			forUpdate: true,
		});
		if (!txn) throw VigilError.notFound(`Transaction ${transactionId} not found`);
		if (txn.status === status) return txn;
		if (!TRANSACTION_STATUS_TRANSITIONS[txn.status].includes(status)) {
			throw VigilError.conflict(`Transaction ${transactionId} cannot move from ${txn.status} to ${status}`);
		}

		const updated = await tx.update({
			model: "transaction",
			where: [{ field: "id", operator: "eq", value: transactionId }],
			update: { status, updatedAt: ctx.now().toISOString() },
		});
		return updated ?? txn;
	});
}
