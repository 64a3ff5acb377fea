// =============================================================================
// DECISION ENGINE -- compliance, rules and AI merged into one decision
// =============================================================================
// Order matters: a failed critical compliance check rejects outright, a rule
// `reject` comes next, and only then is the AI consulted. Low-confidence AI
// output yields to the rule recommendation. AI failure never approves.

import type {
	AnalysisRequest,
	DecisionDraft,
	EnrichmentResult,
	NetworkAnalysis,
	RiskAssessment,
	SimilarCase,
	Transaction,
	VigilLogger,
} from "@vigil/core";
import { errorMessage } from "@vigil/core";
import { parseDecisionResponse } from "./parser.js";
import { buildDecisionPrompt, DECISION_SYSTEM_PROMPT } from "./prompts.js";

export interface DecisionEngineDeps {
	/** Null when no analyzer is configured. */
	analyze: ((request: AnalysisRequest) => Promise<string>) | null;
	thresholds: { approve: number; escalate: number };
	logger: VigilLogger;
}

export interface DecisionInput {
	transaction: Transaction;
	riskAssessment: RiskAssessment;
	similarCases: readonly SimilarCase[];
	enrichment: EnrichmentResult | null;
	network: NetworkAnalysis | null;
	/** All risk flags raised so far. */
	flags: readonly string[];
}

function unique(values: Iterable<string>): string[] {
	return [...new Set(values)];
}

export function fallbackDraft(reason: string, rulesTriggered: string[]): DecisionDraft {
	return {
		decision: "escalate",
		confidence: 50,
		reasoning: reason,
		riskFactors: ["ai_unavailable"],
		complianceNotes: null,
		rulesTriggered,
		source: "fallback",
	};
}

export async function decide(deps: DecisionEngineDeps, input: DecisionInput): Promise<DecisionDraft> {
	const { riskAssessment: risk, enrichment } = input;
	const rules = enrichment?.rules ?? null;
	const rulesTriggered = rules?.triggered.map((r) => r.ruleId) ?? [];
	const ruleAction = rules?.recommendedAction ?? null;

	// 1. Compliance short-circuit
	if (risk.criticalFailures.length > 0) {
		const failed = risk.criticalFailures.join(", ");
		return {
			decision: "reject",
			confidence: 100,
			reasoning: `Transaction rejected due to compliance violation: ${failed}`,
			riskFactors: unique(["compliance_violation", "sanctions_risk", ...input.flags]),
			complianceNotes: `Failed compliance checks: ${failed}. Transaction blocked for regulatory compliance.`,
			rulesTriggered,
			source: "compliance",
		};
	}

	// 2. Rule rejection
	if (ruleAction === "reject") {
		return {
			decision: "reject",
			confidence: 95,
			reasoning: `Transaction rejected by rules: ${rulesTriggered.join(", ")}`,
			riskFactors: unique(input.flags),
			complianceNotes: "Automatic rejection based on rule engine",
			rulesTriggered,
			source: "rules",
		};
	}

	// 3. AI analysis
	if (!deps.analyze) {
		return fallbackDraft("AI analysis unavailable: no analyzer configured", rulesTriggered);
	}

	const prompt = buildDecisionPrompt({
		transaction: input.transaction,
		riskAssessment: risk,
		customerHistory: enrichment?.customerHistory ?? null,
		similarCases: input.similarCases,
		rules,
		network: input.network,
		flags: input.flags,
		approveThreshold: deps.thresholds.approve,
	});
	deps.logger.debug("Decision prompt built", { transactionId: input.transaction.id, prompt });

	let raw: string;
	try {
		raw = await deps.analyze({ purpose: "decision", prompt, system: DECISION_SYSTEM_PROMPT });
	} catch (err) {
		deps.logger.warn("AI decision analysis failed, escalating", {
			transactionId: input.transaction.id,
			error: errorMessage(err),
		});
		return fallbackDraft(`AI analysis failed: ${errorMessage(err)}`, rulesTriggered);
	}

	const parsed = parseDecisionResponse(raw);
	const draft: DecisionDraft = {
		decision: parsed.decision,
		confidence: parsed.confidence,
		reasoning: parsed.reasoning,
		riskFactors: unique(parsed.riskFactors),
		complianceNotes: parsed.complianceNotes,
		rulesTriggered,
		source: parsed.format === "unparsed" ? "fallback" : "ai",
	};

	// 4. Rules outrank low-confidence AI
	if (draft.confidence < deps.thresholds.escalate && ruleAction && ruleAction !== draft.decision) {
		draft.reasoning += ` | Overridden by rule engine: ${ruleAction}`;
		draft.decision = ruleAction;
		draft.source = "rules_override";
	}

	// 5. An approve below the approval threshold goes to a human
	if (draft.decision === "approve" && draft.confidence < deps.thresholds.approve) {
		draft.reasoning += ` | Approval confidence ${draft.confidence} below threshold ${deps.thresholds.approve}`;
		draft.decision = "escalate";
	}

	return draft;
}
