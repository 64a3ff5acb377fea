// =============================================================================
// ACCOUNT MANAGER -- lazily created ledger accounts
// =============================================================================
// Accounts are keyed by their account reference. Balances change only through
// the hold and transfer primitives; this module creates and reads them.

import type { Account, FundsCheck, VigilContext, VigilTransactionAdapter } from "@vigil/core";
import { formatAmount, parseAmount, VigilError } from "@vigil/core";
import { Decimal } from "decimal.js";
import { withStoreTransaction } from "./ledger-helpers.js";

export interface CreateAccountParams {
	accountId: string;
	ownerId: string;
	initialBalance: string;
	currency?: string;
	overdraftLimit?: string;
}

function newAccount(ctx: VigilContext, params: CreateAccountParams): Account {
	const currency = params.currency ?? ctx.options.currency;
	const balance = formatAmount(parseAmount(params.initialBalance, { field: "initialBalance", allowZero: true }), currency);
	const overdraft = formatAmount(
		parseAmount(params.overdraftLimit ?? ctx.options.advanced.overdraftLimit, {
			field: "overdraftLimit",
			allowZero: true,
		}),
		currency,
	);
	const now = ctx.now().toISOString();
	return {
		id: params.accountId,
		ownerId: params.ownerId,
		balance,
		availableBalance: balance,
		overdraftLimit: overdraft,
		currency,
		status: "active",
		transactionCount: 0,
		totalDebits: formatAmount(new Decimal(0), currency),
		totalCredits: formatAmount(new Decimal(0), currency),
		createdAt: now,
		updatedAt: now,
	};
}

/** Inside an open unit: return the existing account or create it. */
export async function getOrCreateAccountInTx(
	ctx: VigilContext,
	tx: VigilTransactionAdapter,
	params: CreateAccountParams,
): Promise<Account> {
	const existing = await tx.findOne({
		model: "account",
		where: [{ field: "id", operator: "eq", value: params.accountId }],
		forUpdate: true,
	});
	if (existing) return existing;
	return tx.create({ model: "account", data: newAccount(ctx, params) });
}

/**
 * Idempotent by account reference. An existing account is returned as-is;
 * its balance is never overwritten.
 */
export async function getOrCreateAccount(ctx: VigilContext, params: CreateAccountParams): Promise<Account> {
	if (!params.accountId) {
		throw VigilError.invalidArgument("accountId is required");
	}
	try {
		return await withStoreTransaction(ctx, (tx) => getOrCreateAccountInTx(ctx, tx, params));
	} catch (err) {
		// Another writer created it between our read and insert.
		if (err instanceof VigilError && err.code === "DUPLICATE") {
			return getAccount(ctx, params.accountId);
		}
		throw err;
	}
}

export async function getAccount(ctx: VigilContext, accountId: string): Promise<Account> {
	const account = await ctx.adapter.findOne({
		model: "account",
		where: [{ field: "id", operator: "eq", value: accountId }],
	});
	if (!account) {
		throw VigilError.accountNotFound(`Account ${accountId} not found`);
	}
	return account;
}

/** Whether the available balance plus overdraft covers `amount`. */
export function coversAmount(account: Pick<Account, "availableBalance" | "overdraftLimit">, amount: Decimal): boolean {
	return new Decimal(account.availableBalance).plus(account.overdraftLimit).greaterThanOrEqualTo(amount);
}

/**
 * Read-only pre-check. The authoritative check runs again inside
 * placeHold() and transfer().
 */
export async function checkFunds(ctx: VigilContext, accountId: string, amount: string): Promise<FundsCheck> {
	const value = parseAmount(amount);
	const account = await getAccount(ctx, accountId);
	return {
		ok: coversAmount(account, value),
		availableBalance: account.availableBalance,
	};
}

export async function listAccounts(ctx: VigilContext, accountIds: string[]): Promise<Account[]> {
	if (accountIds.length === 0) return [];
	return ctx.adapter.findMany({
		model: "account",
		where: [{ field: "id", operator: "in", value: accountIds }],
		sortBy: { field: "id", direction: "asc" },
	});
}
