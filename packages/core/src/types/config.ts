import type { VigilAdapter } from "../db/adapter.js";
import type { AiAnalyzer, Embedder, NotificationChannel, SimilarityIndex } from "./collaborators.js";
import type { Rule } from "./rule.js";

export interface CoreWorkerOptions {
	/** Releases holds past expiry that no waiting workflow owns. Default: enabled, 5m interval */
	holdExpiry?: boolean | { interval?: string };
	/** Resumes non-terminal workflows not running in this process. Default: enabled, 1m interval */
	workflowRecovery?: boolean | { interval?: string };
}

export interface VigilOptions {
	/** Document store adapter instance or factory function */
	database: VigilAdapter | (() => VigilAdapter);

	/** AI analysis client. Without one, AI steps take their fallbacks. */
	analyzer?: AiAnalyzer;

	/** Embedding client. Without one, a deterministic vector is used. */
	embedder?: Embedder;

	/** Similar-case search. Default: blended scan over stored transaction embeddings */
	similarityIndex?: SimilarityIndex;

	/** Outbound channel for decision notifications */
	notificationChannel?: NotificationChannel;

	/** Rule set. Default: the bundled rules */
	rules?: Rule[];

	/** Default currency code (default: "USD") */
	currency?: string;

	/** Core background workers. All enabled by default. */
	coreWorkers?: CoreWorkerOptions;

	/** Advanced configuration */
	advanced?: VigilAdvancedOptions;

	/** Custom logger */
	logger?: VigilLogger;

	/** Clock override, mainly for tests. Default: `() => new Date()` */
	now?: () => Date;
}

export interface VigilAdvancedOptions {
	/** AI confidence at or above which an approve stands. Default: 85 */
	confidenceThresholdApprove?: number;
	/** AI confidence below which rule recommendations override the AI. Default: 70 */
	confidenceThresholdEscalate?: number;
	/** Amounts above this need a manager signal to approve. Default: "50000" */
	autoApprovalLimit?: string;
	/** Human review wait before defaulting to reject. Default: "7d" */
	humanReviewTimeout?: string;
	/** Manager approval wait before defaulting to escalate. Default: "24h" */
	managerApprovalTimeout?: string;
	/** Hold lifetime. Default: "24h" */
	holdTtl?: string;
	/** Embedding vector length. Default: 1024 */
	embeddingDimension?: number;
	/** Maximum similar cases returned. Default: 10 */
	maxSimilarCases?: number;
	/** Minimum blended similarity score. Default: 0.75 */
	similarityThreshold?: number;
	/** Velocity windows. Default: ["1h", "24h"] */
	velocityWindows?: string[];
	/** Countries that raise the `high_risk_country` flag. Default: RU, IR, KP, SY, AF, YE */
	highRiskCountries?: string[];
	/** Countries that fail the critical sanctions checks. Default: same as highRiskCountries */
	sanctionedCountries?: string[];
	/** Floor for lazily created sender balances. Default: "500000" */
	defaultSenderBalanceFloor?: string;
	/** Balance for lazily created recipient accounts. Default: "50000" */
	defaultRecipientBalance?: string;
	/** Overdraft allowance for new accounts. Default: "0" */
	overdraftLimit?: string;
	/** Attempts for an atomic store unit hitting contention. Default: 3 */
	storeMaxAttempts?: number;
	/** Base delay in ms for activity and store retries (doubled each attempt + jitter). Default: 1000 */
	retryBaseDelayMs?: number;
	/** Maximum delay in ms between retries. Default: 30000 */
	retryMaxDelayMs?: number;
}

export interface VigilLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
