import type { Transaction } from "@vigil/core";
import { getTestInstance, party, type TestInstance, transactionInput } from "@vigil/test-utils";
import { Decimal } from "decimal.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildTransaction } from "../managers/transaction-manager.js";
import { analyzeNetwork, scoreNetwork } from "../search/network.js";

// =============================================================================
// NETWORK ANALYSIS TESTS
// =============================================================================

describe("analyzeNetwork", () => {
	let t: TestInstance;

	beforeEach(async () => {
		t = await getTestInstance();
	});

	afterEach(async () => {
		await t.cleanup();
	});

	function edge(id: string, from: string, to: string, amount: string): Transaction {
		return buildTransaction(
			t.ctx,
			transactionInput({
				id,
				amount,
				sender: party(from, "US", { accountId: from }),
				recipient: party(to, "US", { accountId: to }),
			}),
		);
	}

	async function store(...edges: Transaction[]): Promise<void> {
		for (const e of edges) {
			await t.adapter.create({ model: "transaction", data: e });
		}
	}

	it("reports a quiet network as clean", async () => {
		const result = await analyzeNetwork(t.ctx, edge("txn-q", "ACC-A", "ACC-D", "2500"));

		expect(result).toEqual({
			networkRiskScore: 0,
			senderPatterns: [],
			recipientPatterns: [],
			senderCounterparties: 0,
			recipientCounterparties: 0,
			flags: [],
		});
	});

	it("detects money cycling back to the sender", async () => {
		await store(
			edge("txn-1", "ACC-A", "ACC-B", "2500"),
			edge("txn-2", "ACC-B", "ACC-C", "2500"),
			edge("txn-3", "ACC-C", "ACC-A", "2500"),
		);

		const result = await analyzeNetwork(t.ctx, edge("txn-q", "ACC-A", "ACC-D", "2500"));

		expect(result.senderPatterns).toEqual(["rapid_cycling"]);
		expect(result.senderCounterparties).toBe(2);
		expect(result.networkRiskScore).toBe(30);
		expect(result.flags).toEqual([]);
	});

	it("flags a network suspicious on both sides", async () => {
		await store(
			edge("txn-1", "ACC-A", "ACC-B", "2500"),
			edge("txn-2", "ACC-B", "ACC-A", "2500"),
			...["ACC-S1", "ACC-S2", "ACC-S3", "ACC-S4", "ACC-S5"].map((s, i) => edge(`txn-s${i}`, s, "ACC-D", "400")),
		);

		const result = await analyzeNetwork(t.ctx, edge("txn-q", "ACC-A", "ACC-D", "2500"));

		expect(result.senderPatterns).toEqual(["rapid_cycling"]);
		expect(result.recipientPatterns).toEqual(["layering"]);
		expect(result.recipientCounterparties).toBe(5);
		// 30 sender + 20 recipient + 30 both sides
		expect(result.networkRiskScore).toBe(80);
		expect(result.flags).toEqual(["suspicious_network"]);
	});

	it("ignores transfers older than thirty days", async () => {
		await store(
			edge("txn-1", "ACC-A", "ACC-B", "2500"),
			{ ...edge("txn-2", "ACC-B", "ACC-A", "2500"), createdAt: "2026-01-01T00:00:00.000Z" },
		);

		const result = await analyzeNetwork(t.ctx, edge("txn-q", "ACC-A", "ACC-D", "2500"));

		expect(result.senderPatterns).toEqual([]);
		expect(result.senderCounterparties).toBe(1);
	});

	it("leaves the transaction under review out of its own network", async () => {
		const query = edge("txn-q", "ACC-A", "ACC-D", "2500");
		await store(query, edge("txn-1", "ACC-D", "ACC-A", "2500"));

		const result = await analyzeNetwork(t.ctx, query);

		expect(result.senderCounterparties).toBe(0);
		expect(result.recipientCounterparties).toBe(0);
	});
});

describe("scoreNetwork", () => {
	it("adds the large and high-value surcharges and caps at 100", () => {
		const result = scoreNetwork(
			{
				counterparties: 12,
				transfers: 20,
				totalAmount: new Decimal(250_000),
				patterns: ["large_network", "high_value_network"],
			},
			{ counterparties: 25, transfers: 25, totalAmount: new Decimal(10_000), patterns: [] },
		);

		// 30 + 20 + 25 + 15
		expect(result.networkRiskScore).toBe(90);
		expect(result.flags).toEqual(["suspicious_network"]);
	});
});
