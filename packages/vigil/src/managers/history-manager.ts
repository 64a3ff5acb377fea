// =============================================================================
// HISTORY MANAGER -- velocity windows and customer history
// =============================================================================
// Read-only and best-effort. Sibling transactions written moments ago may not
// be visible yet, so a zero count is not proof of absence.

import type { CustomerHistory, Transaction, VelocitySnapshot, VelocityWindow, VigilContext } from "@vigil/core";
import { formatAmount, parseInterval, sumAmounts } from "@vigil/core";

const HISTORY_DAYS = 90;
const DAY_MS = 24 * 60 * 60 * 1000;
const INCIDENT_STATUSES = new Set<Transaction["status"]>(["rejected", "escalated"]);

const PAGE_SIZE = 500;

async function findSentBy(
	ctx: VigilContext,
	field: "senderCustomerId" | "senderAccountId",
	subjectId: string,
	sinceIso: string,
	limit: number | undefined,
): Promise<Transaction[]> {
	const found: Transaction[] = [];
	for (let offset = 0; ; offset += PAGE_SIZE) {
		const pageSize = limit === undefined ? PAGE_SIZE : Math.min(PAGE_SIZE, limit - found.length);
		if (pageSize <= 0) return found;
		const page = await ctx.adapter.findMany({
			model: "transaction",
			where: [
				{ field, operator: "eq", value: subjectId },
				{ field: "createdAt", operator: "gte", value: sinceIso },
			],
			sortBy: { field: "createdAt", direction: "desc" },
			limit: pageSize,
			offset,
		});
		found.push(...page);
		if (page.length < pageSize) return found;
	}
}

/**
 * Transactions sent by a customer or account since `since`, newest first.
 * Matches on either the sender customer id or the sender account id. Reads
 * every page unless `limit` is given.
 */
export async function listSentSince(
	ctx: VigilContext,
	subjectId: string,
	since: Date,
	options: { excludeTransactionId?: string; limit?: number } = {},
): Promise<Transaction[]> {
	const sinceIso = since.toISOString();
	const [byCustomer, byAccount] = await Promise.all([
		findSentBy(ctx, "senderCustomerId", subjectId, sinceIso, options.limit),
		findSentBy(ctx, "senderAccountId", subjectId, sinceIso, options.limit),
	]);

	const merged = new Map<string, Transaction>();
	for (const txn of [...byCustomer, ...byAccount]) {
		if (txn.id !== options.excludeTransactionId) merged.set(txn.id, txn);
	}
	const sorted = [...merged.values()].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
	return options.limit === undefined ? sorted : sorted.slice(0, options.limit);
}

/** Sum per currency, each rendered at its own precision. */
export function totalsByCurrency(transactions: Transaction[]): Record<string, string> {
	const grouped = new Map<string, string[]>();
	for (const txn of transactions) {
		grouped.set(txn.currency, [...(grouped.get(txn.currency) ?? []), txn.amount]);
	}
	const totals: Record<string, string> = {};
	for (const [currency, amounts] of [...grouped.entries()].sort((a, b) => a[0].localeCompare(b[0]))) {
		totals[currency] = formatAmount(sumAmounts(amounts), currency);
	}
	return totals;
}

// =============================================================================
// VELOCITY
// =============================================================================

/**
 * Count and volume per window. Counts cover every currency; `totalAmount`
 * covers only `currency` (default: the configured currency).
 */
export async function getVelocity(
	ctx: VigilContext,
	subjectId: string,
	options: { windows?: string[]; excludeTransactionId?: string; currency?: string } = {},
): Promise<VelocitySnapshot> {
	const windows = options.windows ?? ctx.options.advanced.velocityWindows;
	const currency = options.currency ?? ctx.options.currency;
	const now = ctx.now();
	const spans = windows.map((w) => ({ window: w, ms: parseInterval(w) }));
	const widest = Math.max(0, ...spans.map((s) => s.ms));

	const recent = await listSentSince(ctx, subjectId, new Date(now.getTime() - widest), {
		excludeTransactionId: options.excludeTransactionId,
	});
	const nowIso = now.toISOString();

	const result: Record<string, VelocityWindow> = {};
	for (const { window, ms } of spans) {
		const since = new Date(now.getTime() - ms).toISOString();
		const inWindow = recent.filter((t) => t.createdAt >= since && t.createdAt <= nowIso);
		const latest = inWindow[0];
		const totals = totalsByCurrency(inWindow);
		result[window] = {
			window,
			count: inWindow.length,
			totalAmount: totals[currency] ?? formatAmount(sumAmounts([]), currency),
			totalsByCurrency: totals,
			timeSinceLastMs: latest ? now.getTime() - new Date(latest.createdAt).getTime() : null,
		};
	}

	return { subjectId, currency, windows: result, computedAt: nowIso };
}

// =============================================================================
// CUSTOMER HISTORY
// =============================================================================

export async function getCustomerHistory(
	ctx: VigilContext,
	customerId: string,
	options: { excludeTransactionId?: string; currency?: string } = {},
): Promise<CustomerHistory> {
	const since = new Date(ctx.now().getTime() - HISTORY_DAYS * DAY_MS);
	const history = await listSentSince(ctx, customerId, since, options);
	const currency = options.currency ?? ctx.options.currency;

	const inCurrency = history.filter((t) => t.currency === currency);
	const total = sumAmounts(inCurrency.map((t) => t.amount));
	const recipientCounts = new Map<string, number>();
	for (const txn of history) {
		recipientCounts.set(txn.recipientAccountId, (recipientCounts.get(txn.recipientAccountId) ?? 0) + 1);
	}
	const commonRecipients = [...recipientCounts.entries()]
		.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
		.slice(0, 5)
		.map(([accountId]) => accountId);

	return {
		customerId,
		totalTransactions90d: history.length,
		currency,
		avgAmount: formatAmount(inCurrency.length > 0 ? total.dividedBy(inCurrency.length) : total, currency),
		totalAmount: formatAmount(total, currency),
		totalsByCurrency: totalsByCurrency(history),
		riskIncidents: history.filter((t) => INCIDENT_STATUSES.has(t.status)).length,
		commonRecipients,
		kycStatus: customerId.trim().length > 0 ? "verified" : "unverified",
	};
}

/** Whether this customer has sent to `recipientAccountId` before. */
export async function hasPriorTransfer(
	ctx: VigilContext,
	params: { customerId: string; recipientAccountId: string; excludeTransactionId: string },
): Promise<boolean> {
	const prior = await ctx.adapter.findMany({
		model: "transaction",
		where: [
			{ field: "senderCustomerId", operator: "eq", value: params.customerId },
			{ field: "recipientAccountId", operator: "eq", value: params.recipientAccountId },
		],
		limit: 2,
	});
	return prior.some((t) => t.id !== params.excludeTransactionId);
}
