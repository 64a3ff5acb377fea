// =============================================================================
// COLLABORATORS -- AI, embedding, similarity and notification boundaries
// =============================================================================
// Implementations are injected through VigilOptions so the orchestrator can be
// exercised with in-process doubles.

import type { SimilarCase } from "./decision.js";
import type { TransactionType } from "./transaction.js";
import type { Notification } from "./workflow.js";

export type AnalysisPurpose = "decision" | "risk";

export interface AnalysisRequest {
	purpose: AnalysisPurpose;
	prompt: string;
	system?: string;
}

/**
 * Returns the model's raw completion text. Fenced JSON, bare JSON and
 * `KEY: value` prose are all tolerated by the parsers.
 */
export interface AiAnalyzer {
	analyze(request: AnalysisRequest): Promise<string>;
}

export interface Embedder {
	readonly dimension: number;
	embed(text: string): Promise<number[]>;
}

export interface SimilarityFilters {
	excludeTransactionId: string;
	/** Decimal string. */
	amount: string;
	currency: string;
	senderCountry: string;
	recipientCountry: string;
	senderCustomerId: string;
}

export interface SimilarityQuery {
	vector: number[];
	transactionType: TransactionType;
	filters: SimilarityFilters;
	limit: number;
}

export interface SimilarityIndex {
	findSimilar(query: SimilarityQuery): Promise<SimilarCase[]>;
}

export interface NotificationChannel {
	send(notification: Notification): Promise<void>;
}
