// =============================================================================
// RISK ENGINE -- score composition, compliance checks, pattern checks
// =============================================================================
// Deterministic, no I/O. The AI risk score, when present, is merged in by
// finalizeRiskAssessment(); it can raise the composed score but never lower it.

import type {
	ComplianceChecks,
	DecisionValue,
	RiskAssessment,
	RiskLevel,
	Transaction,
	TransactionType,
	VelocitySnapshot,
} from "@vigil/core";
import { Decimal } from "decimal.js";

const TYPE_BASE_SCORE: Record<TransactionType, number> = {
	ach: 10,
	wire: 30,
	international: 50,
};

// Additive: an amount above 100k collects all three.
const AMOUNT_TIERS: ReadonlyArray<{ above: number; surcharge: number }> = [
	{ above: 10_000, surcharge: 10 },
	{ above: 50_000, surcharge: 10 },
	{ above: 100_000, surcharge: 10 },
];

export const RISK_FACTOR_SURCHARGES: Readonly<Record<string, number>> = {
	high_risk_country: 25,
	new_recipient: 15,
	unusual_time: 10,
	structuring: 30,
	structuring_pattern: 30,
	rapid_movement: 20,
	round_amount_below_threshold: 15,
};

/** Critical checks short-circuit the decision to `reject`. */
export const CRITICAL_CHECKS = ["sanctions_check", "ofac_check"] as const;

export function clampScore(score: number): number {
	return Math.min(100, Math.max(0, score));
}

// =============================================================================
// SCORE COMPOSITION
// =============================================================================

export function composeRiskScore(input: {
	type: TransactionType;
	amount: string;
	flags: readonly string[];
}): number {
	const amount = new Decimal(input.amount);
	let score = TYPE_BASE_SCORE[input.type];

	for (const tier of AMOUNT_TIERS) {
		if (amount.greaterThan(tier.above)) score += tier.surcharge;
	}

	// Each distinct factor counts once.
	for (const flag of new Set(input.flags)) {
		score += RISK_FACTOR_SURCHARGES[flag] ?? 0;
	}

	return clampScore(score);
}

export function riskLevel(score: number): RiskLevel {
	if (score <= 25) return "low";
	if (score <= 50) return "medium";
	if (score <= 75) return "high";
	return "very_high";
}

// =============================================================================
// COMPLIANCE
// =============================================================================

export function runComplianceChecks(input: {
	transaction: Pick<Transaction, "type" | "sender" | "recipient">;
	flags: readonly string[];
	sanctionedCountries: readonly string[];
	highRiskCountries: readonly string[];
}): { checks: ComplianceChecks; criticalFailures: string[] } {
	const { transaction: txn, flags } = input;
	const countries = [txn.sender.country, txn.recipient.country].map((c) => c.toUpperCase());
	const sanctioned = countries.some((c) => input.sanctionedCountries.includes(c));

	const checks: ComplianceChecks = {
		sanctions_check: !sanctioned,
		ofac_check: !sanctioned,
		aml_check: !flags.includes("structuring") && !flags.includes("structuring_pattern"),
		kyc_verified: txn.sender.customerId.trim().length > 0,
	};
	if (txn.type === "international") {
		checks.fatf_check = !countries.some((c) => input.highRiskCountries.includes(c));
	}

	const criticalFailures = CRITICAL_CHECKS.filter((name) => !checks[name]);
	return { checks, criticalFailures };
}

// =============================================================================
// PATTERNS
// =============================================================================

/**
 * History-based patterns: `high_velocity` when more than five transactions
 * landed in the last day, `potential_splitting` when more than three recent
 * amounts sit within 10% of this one.
 */
export function checkPatterns(input: {
	amount: string;
	velocity: VelocitySnapshot | null;
	recentAmounts: readonly string[];
}): string[] {
	const patterns: string[] = [];
	const dayCount = input.velocity?.windows["24h"]?.count ?? 0;
	if (dayCount > 5) {
		patterns.push("high_velocity");
	}

	const amount = new Decimal(input.amount);
	const tolerance = amount.times("0.1");
	const similar = input.recentAmounts.filter((a) => amount.minus(a).abs().lessThan(tolerance)).length;
	if (similar > 3) {
		patterns.push("potential_splitting");
	}
	return patterns;
}

// =============================================================================
// FINAL ASSESSMENT
// =============================================================================

export interface AiRiskResult {
	riskScore: number;
	riskFactors: string[];
}

export function finalizeRiskAssessment(input: {
	amount: string;
	composedScore: number;
	/** Null when the AI scorer failed or was not called. */
	ai: AiRiskResult | null;
	/** True when the AI scorer was called and failed. */
	aiFailed: boolean;
	ruleAction: DecisionValue | null;
	flags: readonly string[];
	patterns: string[];
	checks: ComplianceChecks;
	criticalFailures: string[];
}): RiskAssessment {
	const factors = new Set<string>(input.flags);
	let score: number;

	if (input.criticalFailures.length > 0) {
		score = 100;
		for (const failure of input.criticalFailures) factors.add(`${failure}_failed`);
	} else if (input.aiFailed || !input.ai) {
		score = Math.max(input.composedScore, 75);
		factors.add("assessment_error");
	} else {
		score = Math.max(input.composedScore, clampScore(input.ai.riskScore));
		for (const factor of input.ai.riskFactors) factors.add(factor);
	}

	if (input.ruleAction === "reject") score = Math.max(score, 90);
	else if (input.ruleAction === "escalate") score = Math.max(score, 70);
	score = clampScore(Math.round(score));

	for (const pattern of input.patterns) factors.add(pattern);

	const requiresEnhancedDueDiligence =
		score > 70 ||
		new Decimal(input.amount).greaterThan(100_000) ||
		input.flags.includes("high_risk_country") ||
		input.ruleAction === "escalate" ||
		input.ruleAction === "reject";

	return {
		riskScore: score,
		riskLevel: riskLevel(score),
		composedScore: input.composedScore,
		aiScore: input.ai && !input.aiFailed ? input.ai.riskScore : null,
		riskFactors: [...factors],
		complianceChecks: input.checks,
		criticalFailures: input.criticalFailures,
		requiresEnhancedDueDiligence,
		patterns: input.patterns,
	};
}
