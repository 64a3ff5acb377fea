// =============================================================================
// WORKFLOW TYPES -- durable execution state, signals, review queue, audit
// =============================================================================

import type { AmendmentKind, DecisionValue, SimilarCase } from "./decision.js";
import type { DecisionDraft, EnrichmentResult, NetworkAnalysis, RiskAssessment } from "./risk.js";

export type WorkflowStage =
	| "initialized"
	| "funds_validated"
	| "enriched"
	| "risk_assessed"
	| "similar_cases_found"
	| "network_analyzed"
	| "decided"
	| "awaiting_manager_approval"
	| "escalated"
	| "settled"
	| "decision_stored"
	| "status_updated"
	| "completed"
	| "failed";

export type WorkflowStatus = "running" | "waiting" | "completed" | "failed";

export type WaitKind = "human_review" | "manager_approval";

export interface WorkflowWait {
	kind: WaitKind;
	since: string;
	deadline: string;
}

/** Decision changes collected while running, written at `decision_stored`. */
export interface PendingAmendment {
	kind: AmendmentKind;
	previousDecision: DecisionValue;
	decision: DecisionValue;
	actor: string;
	reason: string;
	at: string;
}

export interface SettlementResult {
	committed: boolean;
	journalEntryId: string | null;
	holdReleased: boolean;
}

export interface WorkflowResults {
	holdId: string | null;
	enrichment: EnrichmentResult | null;
	riskAssessment: RiskAssessment | null;
	embedding: number[] | null;
	similarCases: SimilarCase[];
	network: NetworkAnalysis | null;
	draft: DecisionDraft | null;
	/** Effective decision after waits, overrides and settlement. */
	finalDecision: DecisionValue | null;
	amendments: PendingAmendment[];
	/** Consumed signals already folded into this state. */
	appliedSignalIds: string[];
	reviewId: string | null;
	settlement: SettlementResult | null;
	decisionId: string | null;
	analysisStartedAt: string | null;
	decidedAt: string | null;
}

export interface WorkflowExecutionState {
	/** `wf:{transactionId}` */
	id: string;
	transactionId: string;
	stage: WorkflowStage;
	status: WorkflowStatus;
	stagesCompleted: WorkflowStage[];
	retryCount: number;
	lastError: string | null;
	/** Last checkpoint reached before the failure. */
	failedStage: WorkflowStage | null;
	results: WorkflowResults;
	wait: WorkflowWait | null;
	startedAt: string;
	updatedAt: string;
	completedAt: string | null;
}

export type WorkflowSignal =
	| { kind: "human_review_complete"; decision: DecisionValue; reviewer: string; notes?: string }
	| { kind: "manager_approval"; approved: boolean; actor: string; reason?: string }
	| { kind: "manual_override"; decision: DecisionValue; actor: string; reason: string };

export type WorkflowSignalKind = WorkflowSignal["kind"];

export interface WorkflowSignalRecord {
	id: string;
	workflowId: string;
	kind: WorkflowSignalKind;
	signal: WorkflowSignal;
	consumed: boolean;
	consumedAt: string | null;
	createdAt: string;
}

/** Snapshot returned by the state query. */
export interface WorkflowStateView {
	workflowId: string;
	transactionId: string;
	currentState: WorkflowStage;
	status: WorkflowStatus;
	decision: DecisionValue | null;
	confidence: number | null;
	stagesCompleted: number;
	waitingFor: WaitKind | null;
	waitDeadline: string | null;
	error: string | null;
	retryCount: number;
}

export type ReviewPriority = "urgent" | "high" | "medium" | "low";

export interface HumanReview {
	/** `review:{transactionId}` */
	id: string;
	transactionId: string;
	workflowId: string;
	status: "pending" | "completed" | "expired";
	priority: ReviewPriority;
	riskScore: number;
	proposedDecision: DecisionValue;
	reasoning: string;
	riskFactors: string[];
	slaDeadline: string;
	outcome: DecisionValue | null;
	reviewer: string | null;
	notes: string | null;
	createdAt: string;
	completedAt: string | null;
}

export type AuditEventKind = "stage" | "status" | "decision" | "amendment" | "signal" | "compensation";

export type AuditValue = string | number | boolean | null;

export interface AuditEvent {
	id: string;
	transactionId: string;
	workflowId: string;
	kind: AuditEventKind;
	data: Record<string, AuditValue>;
	createdAt: string;
}

export interface Notification {
	/** `notification:{transactionId}` */
	id: string;
	transactionId: string;
	decision: DecisionValue;
	subject: string;
	body: string;
	delivered: boolean;
	error: string | null;
	createdAt: string;
}

export interface WorkerLease {
	/** Worker id. */
	id: string;
	holder: string;
	expiresAt: string;
}
