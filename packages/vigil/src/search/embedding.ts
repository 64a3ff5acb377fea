// =============================================================================
// EMBEDDINGS
// =============================================================================
// Transactions are embedded from a short descriptive text. When the embedder
// is missing or fails, a deterministic unit vector seeded from the text's
// SHA-256 stands in, so similar-case search degrades instead of blocking.

import { createHash } from "node:crypto";
import type { Transaction, VigilContext } from "@vigil/core";
import { errorMessage } from "@vigil/core";

export function transactionText(
	txn: Pick<Transaction, "type" | "amount" | "currency" | "sender" | "recipient" | "description">,
): string {
	const parts = [
		`${txn.type} transaction of ${txn.amount} ${txn.currency}`,
		`from ${txn.sender.country} to ${txn.recipient.country}`,
	];
	if (txn.description) parts.push(txn.description);
	return parts.join(" ");
}

/** mulberry32 */
function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export function deterministicVector(text: string, dimension: number): number[] {
	const digest = createHash("sha256").update(text).digest();
	const random = seededRandom(digest.readUInt32BE(0));
	const vector = Array.from({ length: dimension }, () => random() * 2 - 1);
	const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
	return norm === 0 ? vector : vector.map((v) => v / norm);
}

function isUsableVector(vector: number[], dimension: number): boolean {
	return vector.length === dimension && vector.every((v) => Number.isFinite(v));
}

export async function embedText(ctx: VigilContext, text: string): Promise<{ vector: number[]; fallback: boolean }> {
	const dimension = ctx.embedder?.dimension ?? ctx.options.advanced.embeddingDimension;
	if (ctx.embedder) {
		try {
			const vector = await ctx.embedder.embed(text);
			if (isUsableVector(vector, dimension)) return { vector, fallback: false };
			ctx.logger.warn("Embedder returned an unusable vector, using deterministic fallback", {
				expected: dimension,
				received: vector.length,
			});
		} catch (err) {
			ctx.logger.warn("Embedding failed, using deterministic fallback", { error: errorMessage(err) });
		}
	}
	return { vector: deterministicVector(text, dimension), fallback: true };
}
