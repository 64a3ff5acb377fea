export type DecisionValue = "approve" | "reject" | "escalate";

/** Actions a rule may recommend. `flag` and `hold` normalize to `escalate`. */
export type RuleAction = "approve" | "reject" | "escalate" | "flag" | "hold";

export type RiskLevel = "low" | "medium" | "high" | "very_high";

export interface SimilarCase {
	transactionId: string;
	score: number;
	priorDecision: DecisionValue | null;
	amount: string;
	type: string;
}

export interface ComplianceChecks {
	sanctions_check: boolean;
	ofac_check: boolean;
	aml_check: boolean;
	kyc_verified: boolean;
	fatf_check?: boolean;
}

export interface Decision {
	/** Always `decision:{transactionId}`: one original decision per transaction. */
	id: string;
	transactionId: string;
	workflowId: string;
	decision: DecisionValue;
	confidence: number;
	riskScore: number;
	reasoning: string;
	riskFactors: string[];
	rulesTriggered: string[];
	similarCases: string[];
	complianceNotes: string | null;
	/** Which layer produced the decision. */
	source: DecisionSource;
	processingTimeMs: number;
	createdAt: string;
}

export type DecisionSource = "compliance" | "rules" | "ai" | "rules_override" | "fallback" | "ledger";

export type AmendmentKind =
	| "human_review"
	| "manager_approval"
	| "manual_override"
	| "review_timeout"
	| "approval_timeout"
	| "settlement";

/** Later change to an original decision. The original is never rewritten. */
export interface DecisionAmendment {
	id: string;
	decisionId: string;
	transactionId: string;
	kind: AmendmentKind;
	previousDecision: DecisionValue;
	decision: DecisionValue;
	actor: string;
	reason: string;
	createdAt: string;
}
