import type { ComplianceChecks, DecisionSource, DecisionValue, RiskLevel } from "./decision.js";
import type { RuleEvaluation } from "./rule.js";

export interface VelocityWindow {
	window: string;
	/** Transactions in the window, every currency. */
	count: number;
	/** Decimal string, in the snapshot's reporting currency only. */
	totalAmount: string;
	/** Decimal strings keyed by ISO 4217 code. */
	totalsByCurrency: Record<string, string>;
	/** Null when no transaction fell inside the window. */
	timeSinceLastMs: number | null;
}

/** Best-effort figures: recent sibling transactions may not be visible yet. */
export interface VelocitySnapshot {
	subjectId: string;
	/** Currency `totalAmount` is reported in. */
	currency: string;
	windows: Record<string, VelocityWindow>;
	computedAt: string;
}

export interface CustomerHistory {
	customerId: string;
	totalTransactions90d: number;
	/** Reporting currency of `avgAmount` and `totalAmount`. */
	currency: string;
	avgAmount: string;
	totalAmount: string;
	totalsByCurrency: Record<string, string>;
	riskIncidents: number;
	commonRecipients: string[];
	kycStatus: "verified" | "unverified";
}

export interface EnrichmentResult {
	flags: string[];
	velocity: VelocitySnapshot;
	customerHistory: CustomerHistory;
	rules: RuleEvaluation;
	unusualTime: boolean;
	newRecipient: boolean;
}

export interface RiskAssessment {
	riskScore: number;
	riskLevel: RiskLevel;
	/** Deterministic score from type, amount tiers and factor surcharges. */
	composedScore: number;
	aiScore: number | null;
	riskFactors: string[];
	complianceChecks: ComplianceChecks;
	/** Names of failed critical checks (`sanctions_check`, `ofac_check`). */
	criticalFailures: string[];
	requiresEnhancedDueDiligence: boolean;
	patterns: string[];
}

export interface NetworkAnalysis {
	networkRiskScore: number;
	senderPatterns: string[];
	recipientPatterns: string[];
	senderCounterparties: number;
	recipientCounterparties: number;
	flags: string[];
}

export interface DecisionDraft {
	decision: DecisionValue;
	confidence: number;
	reasoning: string;
	riskFactors: string[];
	complianceNotes: string | null;
	rulesTriggered: string[];
	source: DecisionSource;
}
