// =============================================================================
// HOLD MANAGER -- reservations against available balance
// =============================================================================
// A hold lowers availableBalance once when placed and restores it once when
// released. Balance itself never moves here; transfer() consumes the hold
// in the same unit as the debit.

import type { Account, Hold, VigilContext, VigilTransactionAdapter } from "@vigil/core";
import { errorMessage, formatAmount, generateId, parseAmount, VigilError } from "@vigil/core";
import { Decimal } from "decimal.js";
import { coversAmount } from "./account-manager.js";
import { withStoreTransaction } from "./ledger-helpers.js";

// =============================================================================
// PLACE HOLD
// =============================================================================

export async function placeHold(
	ctx: VigilContext,
	params: {
		accountId: string;
		amount: string;
		transactionId: string;
		reason: string;
		ttlMs?: number;
	},
): Promise<Hold> {
	const amount = parseAmount(params.amount);
	const ttlMs = params.ttlMs ?? ctx.options.advanced.holdTtlMs;

	return withStoreTransaction(ctx, async (tx) => {
		const account = await tx.findOne({
			model: "account",
			where: [{ field: "id", operator: "eq", value: params.accountId }],
			forUpdate: true,
		});
		if (!account) {
			throw VigilError.accountNotFound(`Account ${params.accountId} not found`);
		}

		// Idempotent per (account, transaction), including holds already consumed.
		// Looked up under the account lock so concurrent callers serialize here.
		const existing = await tx.findOne({
			model: "hold",
			where: [
				{ field: "accountId", operator: "eq", value: params.accountId },
				{ field: "transactionId", operator: "eq", value: params.transactionId },
			],
		});
		if (existing) return existing;

		if (account.status !== "active") {
			throw VigilError.conflict(`Account ${account.id} is ${account.status}`);
		}
		if (!coversAmount(account, amount)) {
			throw VigilError.insufficientFunds(
				`Insufficient funds: available ${account.availableBalance}, requested ${amount.toFixed()}`,
				{ accountId: account.id, availableBalance: account.availableBalance },
			);
		}

		const now = ctx.now();
		await tx.update({
			model: "account",
			where: [{ field: "id", operator: "eq", value: account.id }],
			update: {
				availableBalance: formatAmount(new Decimal(account.availableBalance).minus(amount), account.currency),
				updatedAt: now.toISOString(),
			},
		});

		return tx.create({
			model: "hold",
			data: {
				id: generateId("hold"),
				accountId: account.id,
				transactionId: params.transactionId,
				amount: formatAmount(amount, account.currency),
				reason: params.reason,
				expiresAt: new Date(now.getTime() + ttlMs).toISOString(),
				released: false,
				releasedAt: null,
				releaseReason: null,
				createdAt: now.toISOString(),
			},
		});
	});
}

// =============================================================================
// RELEASE HOLD
// =============================================================================

/**
 * Inside an open unit: mark the hold released and restore the account's
 * available balance. Returns false when the hold is already released.
 */
export async function releaseHoldInTx(
	ctx: VigilContext,
	tx: VigilTransactionAdapter,
	hold: Hold,
	account: Account,
	reason: string,
): Promise<{ released: boolean; account: Account }> {
	if (hold.released) return { released: false, account };

	const now = ctx.now().toISOString();
	const updated = await tx.update({
		model: "account",
		where: [{ field: "id", operator: "eq", value: account.id }],
		update: {
			availableBalance: formatAmount(new Decimal(account.availableBalance).plus(hold.amount), account.currency),
			updatedAt: now,
		},
	});
	await tx.update({
		model: "hold",
		where: [{ field: "id", operator: "eq", value: hold.id }],
		update: { released: true, releasedAt: now, releaseReason: reason },
	});
	if (!updated) {
		throw VigilError.accountNotFound(`Account ${account.id} not found`);
	}
	return { released: true, account: updated };
}

/** Idempotent: false (no-op) when the hold is already released. */
export async function releaseHold(ctx: VigilContext, holdId: string, reason = "released"): Promise<boolean> {
	return withStoreTransaction(ctx, async (tx) => {
		const hold = await tx.findOne({
			model: "hold",
			where: [{ field: "id", operator: "eq", value: holdId }],
			forUpdate: true,
		});
		if (!hold) {
			throw VigilError.holdNotFound(`Hold ${holdId} not found`);
		}
		if (hold.released) return false;

		const account = await tx.findOne({
			model: "account",
			where: [{ field: "id", operator: "eq", value: hold.accountId }],
			forUpdate: true,
		});
		if (!account) {
			throw VigilError.accountNotFound(`Account ${hold.accountId} not found`);
		}
		const result = await releaseHoldInTx(ctx, tx, hold, account, reason);
		return result.released;
	});
}

// =============================================================================
// QUERIES
// =============================================================================

export async function getHold(ctx: VigilContext, holdId: string): Promise<Hold | null> {
	return ctx.adapter.findOne({
		model: "hold",
		where: [{ field: "id", operator: "eq", value: holdId }],
	});
}

/** The unreleased hold reserved for a transaction, if any. */
export async function findActiveHold(ctx: VigilContext, transactionId: string): Promise<Hold | null> {
	return ctx.adapter.findOne({
		model: "hold",
		where: [
			{ field: "transactionId", operator: "eq", value: transactionId },
			{ field: "released", operator: "eq", value: false },
		],
	});
}

export async function listHolds(
	ctx: VigilContext,
	accountId: string,
	options: { activeOnly?: boolean } = {},
): Promise<Hold[]> {
	return ctx.adapter.findMany({
		model: "hold",
		where: [
			{ field: "accountId", operator: "eq", value: accountId },
			...(options.activeOnly ? [{ field: "released" as const, operator: "eq" as const, value: false }] : []),
		],
		sortBy: { field: "createdAt", direction: "asc" },
	});
}

// =============================================================================
// EXPIRE HOLDS
// =============================================================================

/**
 * Release active holds past their expiry. `isProtected` lets the caller keep
 * holds whose owning workflow is still legitimately waiting.
 */
export async function expireHolds(
	ctx: VigilContext,
	options: { limit?: number; isProtected?: (hold: Hold) => Promise<boolean> } = {},
): Promise<{ expired: number; skipped: number }> {
	const now = ctx.now().toISOString();
	const candidates = await ctx.adapter.findMany({
		model: "hold",
		where: [
			{ field: "released", operator: "eq", value: false },
			{ field: "expiresAt", operator: "lt", value: now },
		],
		limit: options.limit ?? 100,
		sortBy: { field: "expiresAt", direction: "asc" },
	});

	let expired = 0;
	let skipped = 0;
	for (const hold of candidates) {
		if (options.isProtected && (await options.isProtected(hold))) {
			skipped++;
			continue;
		}
		try {
			if (await releaseHold(ctx, hold.id, "expired")) expired++;
		} catch (err) {
			ctx.logger.error("Failed to expire hold", {
				holdId: hold.id,
				error: errorMessage(err),
			});
		}
	}

	if (expired > 0) {
		ctx.logger.info("Expired holds released", { count: expired });
	}
	return { expired, skipped };
}
