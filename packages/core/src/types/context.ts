import type { VigilAdapter } from "../db/adapter.js";
import type { AiAnalyzer, Embedder, NotificationChannel, SimilarityIndex } from "./collaborators.js";
import type { CoreWorkerOptions, VigilLogger } from "./config.js";
import type { Rule } from "./rule.js";

/** Advanced options after defaults are applied and intervals parsed. */
export interface ResolvedAdvancedOptions {
	confidenceThresholdApprove: number;
	confidenceThresholdEscalate: number;
	autoApprovalLimit: string;
	humanReviewTimeoutMs: number;
	managerApprovalTimeoutMs: number;
	holdTtlMs: number;
	embeddingDimension: number;
	maxSimilarCases: number;
	similarityThreshold: number;
	velocityWindows: string[];
	highRiskCountries: string[];
	sanctionedCountries: string[];
	defaultSenderBalanceFloor: string;
	defaultRecipientBalance: string;
	overdraftLimit: string;
	storeMaxAttempts: number;
	retryBaseDelayMs: number;
	retryMaxDelayMs: number;
}

export interface ResolvedVigilOptions {
	currency: string;
	advanced: ResolvedAdvancedOptions;
	coreWorkers?: CoreWorkerOptions;
}

export interface VigilContext {
	adapter: VigilAdapter;
	options: ResolvedVigilOptions;
	logger: VigilLogger;
	rules: Rule[];
	/** Null when no AI client is configured; AI steps then take their fallbacks. */
	analyzer: AiAnalyzer | null;
	/** Null when no embedding client is configured. */
	embedder: Embedder | null;
	similarityIndex: SimilarityIndex;
	notificationChannel: NotificationChannel | null;
	now: () => Date;
}

export interface VigilWorkerDefinition {
	id: string;
	description?: string;
	/** Interval string such as "5m". */
	interval: string;
	/** Only one process in a cluster runs the worker per interval. */
	leaseRequired: boolean;
	handler: (ctx: VigilContext) => Promise<void>;
}
