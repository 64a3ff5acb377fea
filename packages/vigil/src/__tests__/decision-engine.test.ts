import type { AnalysisRequest, EnrichmentResult, RiskAssessment, Transaction } from "@vigil/core";
import { describe, expect, it, vi } from "vitest";
import { type DecisionEngineDeps, decide } from "../decision/decision-engine.js";

// =============================================================================
// HELPERS
// =============================================================================

const transaction: Transaction = {
	id: "txn-decide",
	type: "wire",
	amount: "75000.00",
	currency: "USD",
	sender: { name: "Alice", accountId: "ACC-A", country: "US", customerId: "CUST-A" },
	recipient: { name: "Bob", accountId: "ACC-B", country: "US", customerId: "CUST-B" },
	reference: null,
	description: null,
	status: "processing",
	processingStages: [],
	riskFlags: [],
	metadata: {},
	embedding: null,
	senderAccountId: "ACC-A",
	recipientAccountId: "ACC-B",
	senderCustomerId: "CUST-A",
	recipientCustomerId: "CUST-B",
	createdAt: "2026-03-04T12:00:00.000Z",
	updatedAt: "2026-03-04T12:00:00.000Z",
};

function risk(overrides: Partial<RiskAssessment> = {}): RiskAssessment {
	return {
		riskScore: 40,
		riskLevel: "medium",
		composedScore: 40,
		aiScore: 20,
		riskFactors: [],
		complianceChecks: { sanctions_check: true, ofac_check: true, aml_check: true, kyc_verified: true },
		criticalFailures: [],
		requiresEnhancedDueDiligence: false,
		patterns: [],
		...overrides,
	};
}

function enrichmentWithRule(ruleId: string, action: "escalate" | "reject"): EnrichmentResult {
	return {
		flags: ["high_amount"],
		velocity: { subjectId: "CUST-A", currency: "USD", windows: {}, computedAt: "2026-03-04T12:00:00.000Z" },
		customerHistory: {
			customerId: "CUST-A",
			totalTransactions90d: 0,
			currency: "USD",
			avgAmount: "0.00",
			totalAmount: "0.00",
			totalsByCurrency: {},
			riskIncidents: 0,
			commonRecipients: [],
			kycStatus: "verified",
		},
		rules: {
			triggered: [{ ruleId, name: ruleId, category: "amount", action, priority: 50 }],
			flags: ["rule_amount"],
			recommendedAction: action,
			winningRuleId: ruleId,
		},
		unusualTime: false,
		newRecipient: false,
	};
}

function deps(reply: string | Error | null) {
	const analyze = vi.fn(async (_request: AnalysisRequest): Promise<string> => {
		if (reply instanceof Error) throw reply;
		return reply ?? "";
	});
	const engineDeps: DecisionEngineDeps = {
		analyze: reply === null ? null : analyze,
		thresholds: { approve: 85, escalate: 70 },
		logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	};
	return { analyze, engineDeps };
}

function input(overrides: { risk?: RiskAssessment; enrichment?: EnrichmentResult | null; flags?: string[] } = {}) {
	return {
		transaction,
		riskAssessment: overrides.risk ?? risk(),
		similarCases: [],
		enrichment: overrides.enrichment ?? null,
		network: null,
		flags: overrides.flags ?? [],
	};
}

// =============================================================================
// DECISION TESTS
// =============================================================================

describe("decide", () => {
	it("rejects on a critical compliance failure without calling the AI", async () => {
		const { analyze, engineDeps } = deps('{"decision": "approve", "confidence": 99}');
		const draft = await decide(
			engineDeps,
			input({ risk: risk({ criticalFailures: ["sanctions_check", "ofac_check"] }), flags: ["high_risk_country"] }),
		);

		expect(draft).toEqual({
			decision: "reject",
			confidence: 100,
			reasoning: "Transaction rejected due to compliance violation: sanctions_check, ofac_check",
			riskFactors: ["compliance_violation", "sanctions_risk", "high_risk_country"],
			complianceNotes:
				"Failed compliance checks: sanctions_check, ofac_check. Transaction blocked for regulatory compliance.",
			rulesTriggered: [],
			source: "compliance",
		});
		expect(analyze).not.toHaveBeenCalled();
	});

	it("rejects on a rule reject without calling the AI", async () => {
		const { analyze, engineDeps } = deps('{"decision": "approve", "confidence": 99}');
		const draft = await decide(engineDeps, input({ enrichment: enrichmentWithRule("blocklist", "reject") }));

		expect(draft.decision).toBe("reject");
		expect(draft.confidence).toBe(95);
		expect(draft.reasoning).toBe("Transaction rejected by rules: blocklist");
		expect(draft.source).toBe("rules");
		expect(analyze).not.toHaveBeenCalled();
	});

	it("escalates when no analyzer is configured", async () => {
		const draft = await decide(deps(null).engineDeps, input());

		expect(draft.decision).toBe("escalate");
		expect(draft.confidence).toBe(50);
		expect(draft.reasoning).toBe("AI analysis unavailable: no analyzer configured");
		expect(draft.source).toBe("fallback");
	});

	it("escalates when the AI call fails", async () => {
		const draft = await decide(deps(new Error("upstream 503")).engineDeps, input());

		expect(draft.decision).toBe("escalate");
		expect(draft.reasoning).toBe("AI analysis failed: upstream 503");
		expect(draft.riskFactors).toEqual(["ai_unavailable"]);
	});

	it("keeps a confident AI approve over a rule escalation", async () => {
		const { analyze, engineDeps } = deps('{"decision": "approve", "confidence": 92, "reasoning": "Regular supplier"}');
		const draft = await decide(engineDeps, input({ enrichment: enrichmentWithRule("high_amount_wire", "escalate") }));

		expect(draft.decision).toBe("approve");
		expect(draft.confidence).toBe(92);
		expect(draft.source).toBe("ai");
		expect(draft.rulesTriggered).toEqual(["high_amount_wire"]);
		expect(analyze).toHaveBeenCalledTimes(1);
	});

	it("lets the rule override a low-confidence AI", async () => {
		const { engineDeps } = deps('{"decision": "approve", "confidence": 60, "reasoning": "Probably fine"}');
		const draft = await decide(engineDeps, input({ enrichment: enrichmentWithRule("high_amount_wire", "escalate") }));

		expect(draft.decision).toBe("escalate");
		expect(draft.source).toBe("rules_override");
		expect(draft.reasoning).toBe("Probably fine | Overridden by rule engine: escalate");
	});

	it("escalates an approve below the approval threshold", async () => {
		const { engineDeps } = deps('{"decision": "approve", "confidence": 80, "reasoning": "Looks ok"}');
		const draft = await decide(engineDeps, input());

		expect(draft.decision).toBe("escalate");
		expect(draft.source).toBe("ai");
		expect(draft.reasoning).toBe("Looks ok | Approval confidence 80 below threshold 85");
	});

	it("escalates an unreadable completion", async () => {
		const draft = await decide(deps("???").engineDeps, input());

		expect(draft.decision).toBe("escalate");
		expect(draft.confidence).toBe(50);
		expect(draft.source).toBe("fallback");
	});
});
