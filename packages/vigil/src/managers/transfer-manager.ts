// =============================================================================
// TRANSFER MANAGER -- double-entry settlement
// =============================================================================
// One unit: re-read both accounts under lock, consume the hold, check funds,
// debit, credit, write two balance updates and one journal entry. The journal
// id is derived from the transaction id, which makes a retried transfer a
// no-op instead of a second debit.

import type { Account, BalanceUpdate, JournalEntry, TransferResult, VigilContext, VigilTransactionAdapter } from "@vigil/core";
import { formatAmount, generateId, parseAmount, VigilError } from "@vigil/core";
import { Decimal } from "decimal.js";
import { coversAmount } from "./account-manager.js";
import { releaseHoldInTx } from "./hold-manager.js";
import { withStoreTransaction } from "./ledger-helpers.js";

export interface TransferParams {
	senderAccountId: string;
	recipientAccountId: string;
	amount: string;
	transactionId: string;
	description: string;
	/** Hold placed for this transaction; consumed in the same unit as the debit. */
	holdId?: string | null;
}

export function journalEntryId(transactionId: string): string {
	return `journal:${transactionId}`;
}

async function lockAccount(tx: VigilTransactionAdapter, accountId: string): Promise<Account> {
	const account = await tx.findOne({
		model: "account",
		where: [{ field: "id", operator: "eq", value: accountId }],
		forUpdate: true,
	});
	if (!account) {
		throw VigilError.accountNotFound(`Account ${accountId} not found`);
	}
	return account;
}

/**
 * Apply one side of the transfer and record its balance update.
 */
async function applyLeg(
	ctx: VigilContext,
	tx: VigilTransactionAdapter,
	account: Account,
	direction: "debit" | "credit",
	amount: Decimal,
	transactionId: string,
	now: string,
): Promise<void> {
	const before = new Decimal(account.balance);
	const signed = direction === "debit" ? amount.negated() : amount;
	const after = before.plus(signed);
	const currency = account.currency;

	await tx.update({
		model: "account",
		where: [{ field: "id", operator: "eq", value: account.id }],
		update: {
			balance: formatAmount(after, currency),
			availableBalance: formatAmount(new Decimal(account.availableBalance).plus(signed), currency),
			transactionCount: account.transactionCount + 1,
			totalDebits:
				direction === "debit"
					? formatAmount(new Decimal(account.totalDebits).plus(amount), currency)
					: account.totalDebits,
			totalCredits:
				direction === "credit"
					? formatAmount(new Decimal(account.totalCredits).plus(amount), currency)
					: account.totalCredits,
			updatedAt: now,
		},
	});

	await tx.create({
		model: "balance_update",
		data: {
			id: generateId("bal"),
			accountId: account.id,
			transactionId,
			direction,
			amount: formatAmount(amount, currency),
			balanceBefore: formatAmount(before, currency),
			balanceAfter: formatAmount(after, currency),
			createdAt: now,
		},
	});
	ctx.logger.debug("Ledger leg applied", { transactionId, direction });
}

export async function transfer(ctx: VigilContext, params: TransferParams): Promise<TransferResult> {
	const amount = parseAmount(params.amount);
	if (params.senderAccountId === params.recipientAccountId) {
		throw VigilError.invalidArgument("Sender and recipient accounts must differ");
	}
	const entryId = journalEntryId(params.transactionId);

	return withStoreTransaction(ctx, async (tx) => {
		const existing = await tx.findOne({
			model: "journal_entry",
			where: [{ field: "id", operator: "eq", value: entryId }],
		});
		if (existing) {
			return { committed: existing.committed, journalEntryId: existing.id, applied: false };
		}

		// Lock in id order so two opposing transfers cannot deadlock.
		let sender: Account;
		let recipient: Account;
		if (params.senderAccountId < params.recipientAccountId) {
			sender = await lockAccount(tx, params.senderAccountId);
			recipient = await lockAccount(tx, params.recipientAccountId);
		} else {
			recipient = await lockAccount(tx, params.recipientAccountId);
			sender = await lockAccount(tx, params.senderAccountId);
		}

		if (params.holdId) {
			const hold = await tx.findOne({
				model: "hold",
				where: [{ field: "id", operator: "eq", value: params.holdId }],
				forUpdate: true,
			});
			if (hold && hold.accountId === sender.id && hold.transactionId === params.transactionId) {
				sender = (await releaseHoldInTx(ctx, tx, hold, sender, "settled")).account;
			}
		}

		if (sender.status !== "active" || recipient.status !== "active") {
			throw VigilError.conflict("Both accounts must be active to transfer");
		}
		if (!coversAmount(sender, amount)) {
			throw VigilError.insufficientFunds(
				`Insufficient funds: available ${sender.availableBalance}, requested ${amount.toFixed()}`,
				{ accountId: sender.id, availableBalance: sender.availableBalance },
			);
		}

		const now = ctx.now().toISOString();
		await applyLeg(ctx, tx, sender, "debit", amount, params.transactionId, now);
		await applyLeg(ctx, tx, recipient, "credit", amount, params.transactionId, now);

		const entry = await tx.create({
			model: "journal_entry",
			data: {
				id: entryId,
				transactionId: params.transactionId,
				debitAccountId: sender.id,
				debitAmount: formatAmount(amount, sender.currency),
				creditAccountId: recipient.id,
				creditAmount: formatAmount(amount, recipient.currency),
				currency: sender.currency,
				description: params.description,
				status: "committed",
				committed: true,
				createdAt: now,
			},
		});

		return { committed: true, journalEntryId: entry.id, applied: true };
	});
}

export async function getJournalEntry(ctx: VigilContext, transactionId: string): Promise<JournalEntry | null> {
	return ctx.adapter.findOne({
		model: "journal_entry",
		where: [{ field: "id", operator: "eq", value: journalEntryId(transactionId) }],
	});
}

export async function listBalanceUpdates(ctx: VigilContext, transactionId: string): Promise<BalanceUpdate[]> {
	return ctx.adapter.findMany({
		model: "balance_update",
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
		sortBy: { field: "createdAt", direction: "asc" },
	});
}
