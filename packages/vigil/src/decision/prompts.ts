// =============================================================================
// PROMPTS
// =============================================================================

import type {
	CustomerHistory,
	NetworkAnalysis,
	RiskAssessment,
	RuleEvaluation,
	SimilarCase,
	Transaction,
	TransactionType,
} from "@vigil/core";

export const DECISION_SYSTEM_PROMPT =
	"You are a financial fraud detection and compliance analyst. Assess transactions for fraud, money laundering and sanctions exposure, and explain every decision.";

export const RISK_SYSTEM_PROMPT =
	"You score the fraud and compliance risk of financial transactions on a 0-100 scale and answer in JSON.";

const TYPE_CONTEXT: Record<TransactionType, string> = {
	ach: [
		"This is an ACH transfer:",
		"- batch settled and reversible for two business days",
		"- typical for payroll and recurring payments",
	].join("\n"),
	wire: [
		"This is a wire transfer:",
		"- irreversible once settled",
		"- common for high-value business payments and a frequent fraud target",
	].join("\n"),
	international: [
		"This is an international transfer:",
		"- subject to cross-border regulation and sanctions screening",
		"- requires enhanced due diligence",
	].join("\n"),
};

function partyLine(label: string, party: Transaction["sender"]): string {
	return `- ${label}: ${party.name} (country ${party.country}, customer ${party.customerId || "unknown"})`;
}

function similarCasesBlock(cases: readonly SimilarCase[]): string {
	if (cases.length === 0) return "No similar historical cases found.";
	return [
		"SIMILAR HISTORICAL CASES:",
		...cases
			.slice(0, 5)
			.map(
				(c) =>
					`- ${c.type} ${c.amount}, prior decision ${c.priorDecision ?? "unknown"}, similarity ${c.score.toFixed(2)}`,
			),
	].join("\n");
}

export function buildDecisionPrompt(input: {
	transaction: Transaction;
	riskAssessment: RiskAssessment;
	customerHistory: CustomerHistory | null;
	similarCases: readonly SimilarCase[];
	rules: RuleEvaluation | null;
	network: NetworkAnalysis | null;
	flags: readonly string[];
	approveThreshold: number;
}): string {
	const { transaction: txn, riskAssessment: risk, customerHistory: history } = input;
	const sections = [
		"Analyze the following transaction and decide whether to approve, reject or escalate it.",
		"",
		"TRANSACTION:",
		`- ID: ${txn.id}`,
		`- Type: ${txn.type}`,
		`- Amount: ${txn.amount} ${txn.currency}`,
		partyLine("Sender", txn.sender),
		partyLine("Recipient", txn.recipient),
		`- Reference: ${txn.reference ?? "none"}`,
		`- Description: ${txn.description ?? "none"}`,
		`- Risk flags: ${input.flags.length > 0 ? input.flags.join(", ") : "none"}`,
		"",
		TYPE_CONTEXT[txn.type],
		"",
		"RISK ASSESSMENT:",
		`- Score: ${risk.riskScore} (${risk.riskLevel})`,
		`- Factors: ${risk.riskFactors.join(", ") || "none"}`,
		`- Patterns: ${risk.patterns.join(", ") || "none"}`,
	];

	if (history) {
		sections.push(
			"",
			"CUSTOMER HISTORY (90 days):",
			`- Transactions: ${history.totalTransactions90d}`,
			`- Average amount: ${history.avgAmount}`,
			`- Total volume: ${history.totalAmount}`,
			`- Previous risk incidents: ${history.riskIncidents}`,
		);
	}

	if (input.network) {
		sections.push(
			"",
			"COUNTERPARTY NETWORK:",
			`- Network risk score: ${input.network.networkRiskScore}`,
			`- Sender patterns: ${input.network.senderPatterns.join(", ") || "none"}`,
			`- Recipient patterns: ${input.network.recipientPatterns.join(", ") || "none"}`,
		);
	}

	sections.push("", similarCasesBlock(input.similarCases));

	if (input.rules && input.rules.triggered.length > 0) {
		sections.push(
			"",
			`RULES TRIGGERED: ${input.rules.triggered.map((r) => r.ruleId).join(", ")}`,
			`RULE RECOMMENDATION: ${input.rules.recommendedAction ?? "none"}`,
		);
	}

	sections.push(
		"",
		"Check for structuring (amounts just under 5000, repeated similar amounts to one recipient),",
		"fraud-ring indicators (circular or rapid sequential transfers) and sanctions concerns.",
		"",
		"Respond with JSON only:",
		'{"decision": "approve|reject|escalate", "confidence": <0-100>, "reasoning": "...", "risk_factors": ["..."], "compliance_notes": "..."}',
		"",
		`Approve only with confidence of at least ${input.approveThreshold}. Reject clear fraud or compliance violations.`,
		"Escalate anything that needs a human to tell structuring from legitimate business. When in doubt, escalate.",
	);

	return sections.join("\n");
}

export function buildRiskPrompt(input: { transaction: Transaction; flags: readonly string[] }): string {
	const { transaction: txn } = input;
	return [
		"Assess the risk of this financial transaction.",
		"",
		`Type: ${txn.type}`,
		`Amount: ${txn.amount} ${txn.currency}`,
		`Sender country: ${txn.sender.country}`,
		`Recipient country: ${txn.recipient.country}`,
		`Flags: ${input.flags.length > 0 ? input.flags.join(", ") : "none"}`,
		"",
		"Score from 0 to 100: 0-25 low, 26-50 medium, 51-75 high, 76-100 very high.",
		'Respond with JSON only: {"risk_score": <0-100>, "risk_level": "low|medium|high|very_high", "risk_factors": ["..."]}',
	].join("\n");
}
