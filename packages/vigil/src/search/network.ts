// =============================================================================
// FRAUD NETWORK ANALYSIS
// =============================================================================
// Breadth-first walk over the last 30 days of transfers: outward from the
// sender account, inward to the recipient account, three hops each way.

import type { NetworkAnalysis, Transaction, VigilContext } from "@vigil/core";
import { Decimal } from "decimal.js";

const MAX_DEPTH = 3;
const WINDOW_MS = 30 * 24 * 60 * 60 * 1000;
const EDGES_PER_NODE = 100;
const SMALL_AMOUNT = 1_000;
const HIGH_VALUE = 100_000;

export interface NetworkSide {
	counterparties: number;
	transfers: number;
	totalAmount: Decimal;
	patterns: string[];
}

type Direction = "outgoing" | "incoming";

async function edgesFor(
	ctx: VigilContext,
	accountId: string,
	direction: Direction,
	since: string,
	excludeTransactionId: string,
): Promise<Transaction[]> {
	const edges = await ctx.adapter.findMany({
		model: "transaction",
		where: [
			{
				field: direction === "outgoing" ? "senderAccountId" : "recipientAccountId",
				operator: "eq",
				value: accountId,
			},
			{ field: "createdAt", operator: "gte", value: since },
		],
		limit: EDGES_PER_NODE,
	});
	return edges.filter((t) => t.id !== excludeTransactionId);
}

/**
 * Walk the transfer graph from `origin` and describe what was found.
 * `rapid_cycling` means the walk led back to the origin.
 */
export async function traverse(
	ctx: VigilContext,
	origin: string,
	direction: Direction,
	excludeTransactionId: string,
): Promise<NetworkSide> {
	const since = new Date(ctx.now().getTime() - WINDOW_MS).toISOString();
	const visited = new Set<string>([origin]);
	const seenEdges = new Set<string>();
	const counterparties = new Set<string>();
	let frontier = [origin];
	let cycles = false;
	let smallTransfers = 0;
	let total = new Decimal(0);

	for (let depth = 0; depth < MAX_DEPTH && frontier.length > 0; depth++) {
		const next: string[] = [];
		for (const node of frontier) {
			for (const edge of await edgesFor(ctx, node, direction, since, excludeTransactionId)) {
				if (seenEdges.has(edge.id)) continue;
				seenEdges.add(edge.id);

				const neighbour = direction === "outgoing" ? edge.recipientAccountId : edge.senderAccountId;
				total = total.plus(edge.amount);
				if (new Decimal(edge.amount).lessThan(SMALL_AMOUNT)) smallTransfers++;
				if (neighbour === origin) {
					cycles = true;
					continue;
				}
				counterparties.add(neighbour);
				if (!visited.has(neighbour)) {
					visited.add(neighbour);
					next.push(neighbour);
				}
			}
		}
		frontier = next;
	}

	const patterns: string[] = [];
	if (cycles) patterns.push("rapid_cycling");
	if (smallTransfers >= 5) patterns.push("layering");
	if (counterparties.size > 10) patterns.push("large_network");
	if (total.greaterThan(HIGH_VALUE)) patterns.push("high_value_network");

	return { counterparties: counterparties.size, transfers: seenEdges.size, totalAmount: total, patterns };
}

/** Combine both sides into a 0-100 network score. */
export function scoreNetwork(sender: NetworkSide, recipient: NetworkSide): NetworkAnalysis {
	const senderSuspicious = sender.patterns.length > 0;
	const recipientSuspicious = recipient.patterns.length > 0;

	let score = 0;
	if (senderSuspicious) score += 30;
	if (sender.patterns.includes("large_network")) score += 20;
	if (sender.patterns.includes("high_value_network")) score += 25;
	if (recipientSuspicious) score += 20;
	if (recipient.counterparties > 20) score += 15;
	if (senderSuspicious && recipientSuspicious) score += 30;
	score = Math.min(score, 100);

	return {
		networkRiskScore: score,
		senderPatterns: sender.patterns,
		recipientPatterns: recipient.patterns,
		senderCounterparties: sender.counterparties,
		recipientCounterparties: recipient.counterparties,
		flags: score >= 50 ? ["suspicious_network"] : [],
	};
}

export async function analyzeNetwork(ctx: VigilContext, txn: Transaction): Promise<NetworkAnalysis> {
	const [sender, recipient] = await Promise.all([
		traverse(ctx, txn.senderAccountId, "outgoing", txn.id),
		traverse(ctx, txn.recipientAccountId, "incoming", txn.id),
	]);
	return scoreNetwork(sender, recipient);
}
