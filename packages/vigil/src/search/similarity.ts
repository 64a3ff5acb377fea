// =============================================================================
// SIMILARITY SEARCH -- blended vector + attribute scoring
// =============================================================================
// The default index scans stored transaction embeddings. Candidates outside
// +/-20% of the query amount are dropped before scoring; the rest are ranked
// by a weighted blend of vector similarity and attribute matches.

import type {
	DecisionValue,
	SimilarCase,
	SimilarityIndex,
	SimilarityQuery,
	Transaction,
	TransactionStatus,
	VigilAdapter,
} from "@vigil/core";
import { Decimal } from "decimal.js";

export const SIMILARITY_WEIGHTS = {
	vector: 0.4,
	exactField: 0.2,
	amount: 0.2,
	geography: 0.1,
	type: 0.1,
} as const;

const AMOUNT_RANGE = new Decimal("0.2");

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length === 0 || a.length !== b.length) return 0;
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) return 0;
	return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** 1 at equal amounts, falling linearly to 0 at the edge of the +/-20% band. */
export function amountProximity(query: string, candidate: string): number {
	const q = new Decimal(query);
	if (q.isZero()) return 0;
	const ratio = new Decimal(candidate).minus(q).abs().dividedBy(q.times(AMOUNT_RANGE));
	return Math.max(0, 1 - ratio.toNumber());
}

export function priorDecisionFromStatus(status: TransactionStatus): DecisionValue | null {
	switch (status) {
		case "approved":
		case "completed":
			return "approve";
		case "rejected":
			return "reject";
		case "escalated":
			return "escalate";
		default:
			return null;
	}
}

export function blendedScore(query: SimilarityQuery, candidate: Transaction, vector: number[]): number {
	const { filters } = query;
	const vectorScore = Math.max(0, cosineSimilarity(query.vector, vector));
	const exact =
		(candidate.senderCustomerId === filters.senderCustomerId ? 0.5 : 0) +
		(candidate.currency === filters.currency ? 0.5 : 0);
	const geography =
		(candidate.sender.country === filters.senderCountry ? 0.5 : 0) +
		(candidate.recipient.country === filters.recipientCountry ? 0.5 : 0);
	const type = candidate.type === query.transactionType ? 1 : 0;

	return (
		SIMILARITY_WEIGHTS.vector * vectorScore +
		SIMILARITY_WEIGHTS.exactField * exact +
		SIMILARITY_WEIGHTS.amount * amountProximity(filters.amount, candidate.amount) +
		SIMILARITY_WEIGHTS.geography * geography +
		SIMILARITY_WEIGHTS.type * type
	);
}

export function createDocumentSimilarityIndex(
	adapter: VigilAdapter,
	options: { threshold: number; candidateLimit?: number },
): SimilarityIndex {
	const candidateLimit = options.candidateLimit ?? 500;

	return {
		async findSimilar(query) {
			const amount = new Decimal(query.filters.amount);
			const low = amount.times(new Decimal(1).minus(AMOUNT_RANGE));
			const high = amount.times(new Decimal(1).plus(AMOUNT_RANGE));

			const candidates = await adapter.findMany({
				model: "transaction",
				where: [
					{ field: "embedding", operator: "is_not_null" },
					{ field: "id", operator: "ne", value: query.filters.excludeTransactionId },
				],
				sortBy: { field: "createdAt", direction: "desc" },
				limit: candidateLimit,
			});

			const scored: SimilarCase[] = [];
			for (const candidate of candidates) {
				if (!candidate.embedding) continue;
				const candidateAmount = new Decimal(candidate.amount);
				if (candidateAmount.lessThan(low) || candidateAmount.greaterThan(high)) continue;

				const score = blendedScore(query, candidate, candidate.embedding);
				if (score < options.threshold) continue;
				scored.push({
					transactionId: candidate.id,
					score: Math.round(score * 10_000) / 10_000,
					priorDecision: priorDecisionFromStatus(candidate.status),
					amount: candidate.amount,
					type: candidate.type,
				});
			}

			return scored.sort((a, b) => b.score - a.score).slice(0, query.limit);
		},
	};
}
