// =============================================================================
// WORKFLOW ENGINE -- durable transaction-processing state machine
// =============================================================================
// One workflow per transaction, keyed `wf:{transactionId}`. The state is
// checkpointed after every stage, so any process can pick a workflow up from
// its last checkpoint. Stage order:
//
//   initialized -> funds_validated -> enriched -> risk_assessed
//     -> similar_cases_found -> network_analyzed -> decided
//     -> [awaiting_manager_approval] -> [escalated]
//     -> settled -> decision_stored -> status_updated -> completed
//
// Any unrecoverable error releases the hold, marks the transaction failed and
// rejects with WORKFLOW_FAILED.

import type {
	AuditEventKind,
	AuditValue,
	DecisionValue,
	PendingAmendment,
	SubmitTransactionInput,
	Transaction,
	VigilContext,
	WaitKind,
	WorkflowExecutionState,
	WorkflowResults,
	WorkflowSignal,
	WorkflowSignalRecord,
	WorkflowStage,
	WorkflowStateView,
	WorkflowStatus,
	WorkflowWait,
} from "@vigil/core";
import { errorMessage, generateId, VigilError } from "@vigil/core";
import { Decimal } from "decimal.js";
import { fallbackDraft } from "../decision/decision-engine.js";
import { recordAuditEvent, sendNotification } from "../managers/audit-manager.js";
import { findActiveHold, releaseHold } from "../managers/hold-manager.js";
import { sleep } from "../managers/ledger-helpers.js";
import { resolveReview } from "../managers/review-manager.js";
import {
	appendStage,
	createTransaction,
	getTransaction,
	isTerminalStatus,
	updateStatus,
} from "../managers/transaction-manager.js";
import {
	analyzeTransactionNetwork,
	assessRisk,
	decideTransaction,
	enqueueReview,
	enrichTransaction,
	fallbackRiskAssessment,
	findSimilarCases,
	ledgerRejection,
	persistDecision,
	reserveFunds,
	settleApproved,
	statusForDecision,
} from "./activities.js";
import type { ActivityName, StepPolicy, StepPolicyOverrides } from "./retry-policy.js";
import { resolveStepPolicies, runActivity } from "./retry-policy.js";
import { ACCEPTED_SIGNALS, recordSignal, SignalBus, waitForSignal } from "./signals.js";
import {
	createState,
	isFinished,
	isSuperseded,
	listActiveStates,
	loadState,
	requireState,
	saveState,
	toStateView,
	withStage,
	workflowId,
} from "./state.js";

export const REVIEW_TIMEOUT_REASON = "Human review timeout - defaulting to reject";
export const APPROVAL_TIMEOUT_REASON = "Manager approval timeout - escalating to human review";

const DECISION_VALUES: readonly DecisionValue[] = ["approve", "reject", "escalate"];

export interface WorkflowEngineOptions {
	/** Per-activity attempt and timeout overrides. */
	policies?: StepPolicyOverrides;
	/** Store poll interval while waiting on a signal. Default: 1000 */
	signalPollIntervalMs?: number;
}

export interface WorkflowHandle {
	workflowId: string;
	transactionId: string;
	/** False when the transaction id had already been submitted. */
	created: boolean;
	/** Resolves with the final state; rejects with WORKFLOW_FAILED. */
	result(): Promise<WorkflowExecutionState>;
	getState(): Promise<WorkflowStateView>;
}

type RunOutcome = { ok: true; state: WorkflowExecutionState } | { ok: false; error: unknown };

function assertDecision(value: unknown, field: string): void {
	if (typeof value !== "string" || !DECISION_VALUES.some((d) => d === value)) {
		throw VigilError.invalidArgument(`${field} must be one of ${DECISION_VALUES.join(", ")}`);
	}
}

function assertActor(value: string, field: string): void {
	if (!value.trim()) throw VigilError.invalidArgument(`${field} is required`);
}

function validateSignal(signal: WorkflowSignal): void {
	switch (signal.kind) {
		case "human_review_complete":
			assertDecision(signal.decision, "decision");
			assertActor(signal.reviewer, "reviewer");
			return;
		case "manager_approval":
			assertActor(signal.actor, "actor");
			return;
		case "manual_override":
			assertDecision(signal.decision, "decision");
			assertActor(signal.actor, "actor");
			assertActor(signal.reason, "reason");
			return;
	}
}

/** The decision a signal asks for, as an amendment over `previous`. */
function amendmentFromSignal(signal: WorkflowSignal, previous: DecisionValue, at: string): PendingAmendment {
	switch (signal.kind) {
		case "human_review_complete":
			return {
				kind: "human_review",
				previousDecision: previous,
				decision: signal.decision,
				actor: signal.reviewer,
				reason: signal.notes ?? `Human review: ${signal.decision}`,
				at,
			};
		case "manager_approval":
			return {
				kind: "manager_approval",
				previousDecision: previous,
				decision: signal.approved ? "approve" : "reject",
				actor: signal.actor,
				reason: signal.reason ?? (signal.approved ? "Approved by manager" : "Rejected by manager"),
				at,
			};
		case "manual_override":
			return {
				kind: "manual_override",
				previousDecision: previous,
				decision: signal.decision,
				actor: signal.actor,
				reason: signal.reason,
				at,
			};
	}
}

export class WorkflowEngine {
	private readonly ctx: VigilContext;
	private readonly policies: Record<ActivityName, StepPolicy>;
	private readonly pollIntervalMs: number;
	private readonly bus = new SignalBus();
	private readonly running = new Map<string, Promise<RunOutcome>>();
	private readonly retries = new Map<string, number>();

	constructor(ctx: VigilContext, options: WorkflowEngineOptions = {}) {
		this.ctx = ctx;
		this.policies = resolveStepPolicies(options.policies);
		this.pollIntervalMs = options.signalPollIntervalMs ?? 1_000;
	}

	// ---------------------------------------------------------------------------
	// PUBLIC API
	// ---------------------------------------------------------------------------

	/**
	 * Persist the transaction and start its workflow. Returns as soon as the
	 * workflow is started; resubmitting a known id returns its handle.
	 */
	async submit(input: SubmitTransactionInput): Promise<WorkflowHandle> {
		const withId = { ...input, id: input.id ?? generateId("txn") };
		const { transaction, created } = await runActivity(this.ctx, "start", this.policies.start, () =>
			createTransaction(this.ctx, withId),
		);
		const id = workflowId(transaction.id);

		const existing = await loadState(this.ctx, id);
		if (!existing) {
			await createState(this.ctx, transaction.id);
			this.launch(id);
			this.ctx.logger.info("Workflow started", {
				workflowId: id,
				transactionId: transaction.id,
				type: transaction.type,
				amount: transaction.amount,
			});
		}
		return this.handle(transaction.id, created);
	}

	handle(transactionId: string, created = false): WorkflowHandle {
		const id = workflowId(transactionId);
		return {
			workflowId: id,
			transactionId,
			created,
			result: () => this.result(id),
			getState: () => this.getState(id),
		};
	}

	async getState(id: string): Promise<WorkflowStateView> {
		return toStateView(await requireState(this.ctx, id));
	}

	async result(id: string): Promise<WorkflowExecutionState> {
		for (;;) {
			const local = this.running.get(id);
			if (local) {
				const outcome = await local;
				if (!outcome.ok) throw outcome.error;
				if (outcome.state.status === "completed") return outcome.state;
				// Superseded here; another runner is finishing it
				continue;
			}

			const state = await requireState(this.ctx, id);
			if (state.status === "completed") return state;
			if (state.status === "failed") {
				throw VigilError.workflowFailed(state.lastError ?? `Workflow ${id} failed`, {
					stage: state.failedStage ?? state.stage,
					transactionId: state.transactionId,
				});
			}
			// Running in another process
			await sleep(this.pollIntervalMs);
		}
	}

	/**
	 * Record a signal and wake the workflow. A waiting workflow that is not
	 * running in this process is resumed here.
	 */
	async signal(id: string, signal: WorkflowSignal): Promise<WorkflowSignalRecord> {
		validateSignal(signal);
		const state = await requireState(this.ctx, id);
		if (isFinished(state)) {
			throw VigilError.conflict(`Workflow ${id} is ${state.status} and accepts no signals`);
		}

		const record = await recordSignal(this.ctx, id, signal);
		this.ctx.logger.info("Workflow signal received", { workflowId: id, kind: signal.kind, signalId: record.id });
		await this.audit(state, "signal", { kind: signal.kind, signalId: record.id });

		this.bus.notify(id);
		if (!this.running.has(id) && state.status === "waiting") this.launch(id);
		return record;
	}

	/**
	 * Continue non-terminal workflows that are not running in this process.
	 * With `staleAfterMs`, running workflows are taken over only when their
	 * last checkpoint is older than that, and waiting ones only once their
	 * deadline is that far behind.
	 */
	async resume(options: { staleAfterMs?: number; limit?: number } = {}): Promise<string[]> {
		const now = this.ctx.now().getTime();
		const resumed: string[] = [];

		for (const state of await listActiveStates(this.ctx, options.limit)) {
			if (this.running.has(state.id)) continue;
			if (options.staleAfterMs !== undefined) {
				const since =
					state.status === "waiting" && state.wait
						? new Date(state.wait.deadline).getTime()
						: new Date(state.updatedAt).getTime();
				if (now - since < options.staleAfterMs) continue;
			}
			this.launch(state.id);
			resumed.push(state.id);
		}

		if (resumed.length > 0) {
			this.ctx.logger.info("Workflows resumed", { count: resumed.length });
		}
		return resumed;
	}

	isRunning(id: string): boolean {
		return this.running.has(id);
	}

	/** Whether the hold reaper must leave this transaction's hold alone. */
	async isWaiting(transactionId: string): Promise<boolean> {
		const state = await loadState(this.ctx, workflowId(transactionId));
		return state?.status === "waiting";
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	private launch(id: string): void {
		if (this.running.has(id)) return;
		const outcome = this.execute(id)
			.then(
				(state): RunOutcome => ({ ok: true, state }),
				(error: unknown): RunOutcome => ({ ok: false, error }),
			)
			.finally(() => {
				this.running.delete(id);
				this.retries.delete(id);
			});
		this.running.set(id, outcome);
	}

	private async execute(id: string): Promise<WorkflowExecutionState> {
		let state = await requireState(this.ctx, id);
		try {
			while (!isFinished(state)) {
				state = await this.step(state);
			}
			return state;
		} catch (err) {
			if (isSuperseded(err)) {
				this.ctx.logger.info("Workflow advanced by another runner, stopping here", { workflowId: id });
				return requireState(this.ctx, id);
			}
			return this.compensate(state, err);
		}
	}

	private async step(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		switch (state.stage) {
			case "initialized":
				return this.reserve(state);
			case "funds_validated":
				return this.enrich(state);
			case "enriched":
				return this.assessRisk(state);
			case "risk_assessed":
				return this.findSimilar(state);
			case "similar_cases_found":
				return this.analyzeNetwork(state);
			case "network_analyzed":
				return this.decide(state);
			case "decided":
				return this.route(state);
			case "awaiting_manager_approval":
				return this.awaitManager(state);
			case "escalated":
				return this.awaitReview(state);
			case "settled":
				return this.storeDecision(state);
			case "decision_stored":
				return this.updateFinalStatus(state);
			case "status_updated":
				return this.notify(state);
			case "completed":
			case "failed":
				return state;
		}
	}

	// ---------------------------------------------------------------------------
	// STAGES
	// ---------------------------------------------------------------------------

	private async reserve(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		await this.run("update_status", state, () => updateStatus(this.ctx, txn.id, "processing"));
		const now = this.ctx.now().toISOString();

		try {
			const hold = await this.run("place_hold", state, () => reserveFunds(this.ctx, txn));
			return this.checkpoint(state, "funds_validated", { holdId: hold.id, analysisStartedAt: now });
		} catch (err) {
			if (!(err instanceof VigilError) || !err.isBusinessRejection) throw err;
			this.ctx.logger.info("Hold refused by ledger, rejecting without analysis", {
				transactionId: txn.id,
				code: err.code,
			});
			const draft = ledgerRejection(err);
			await this.audit(state, "decision", { decision: draft.decision, confidence: draft.confidence, source: draft.source });
			return this.checkpoint(state, "decided", {
				draft,
				finalDecision: draft.decision,
				analysisStartedAt: now,
				decidedAt: now,
			});
		}
	}

	private async enrich(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const enrichment = await this.bestEffort("enrich", state, () => enrichTransaction(this.ctx, txn), () => null);
		return this.checkpoint(state, "enriched", { enrichment });
	}

	private async assessRisk(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const { enrichment } = state.results;
		const riskAssessment = await this.bestEffort(
			"assess_risk",
			state,
			() => assessRisk(this.ctx, txn, enrichment),
			() => fallbackRiskAssessment(this.ctx, txn, enrichment?.flags ?? txn.riskFlags),
		);
		return this.checkpoint(state, "risk_assessed", { riskAssessment });
	}

	private async findSimilar(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const found = await this.bestEffort<{
			embedding: WorkflowResults["embedding"];
			cases: WorkflowResults["similarCases"];
		}>(
			"find_similar",
			state,
			() => findSimilarCases(this.ctx, txn),
			() => ({ embedding: null, cases: [] }),
		);
		return this.checkpoint(state, "similar_cases_found", { embedding: found.embedding, similarCases: found.cases });
	}

	private async analyzeNetwork(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const network = await this.bestEffort(
			"analyze_network",
			state,
			() => analyzeTransactionNetwork(this.ctx, txn),
			() => null,
		);
		return this.checkpoint(state, "network_analyzed", { network });
	}

	private async decide(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const risk = state.results.riskAssessment ?? fallbackRiskAssessment(this.ctx, txn, txn.riskFlags);
		const rulesTriggered = state.results.enrichment?.rules.triggered.map((r) => r.ruleId) ?? [];

		const draft = await this.bestEffort(
			"decide",
			state,
			() => decideTransaction(this.ctx, txn, state, risk),
			(err) => fallbackDraft(`AI analysis failed: ${errorMessage(err)}`, rulesTriggered),
		);

		this.ctx.logger.info("Decision made", {
			transactionId: txn.id,
			decision: draft.decision,
			confidence: draft.confidence,
			source: draft.source,
		});
		await this.audit(state, "decision", { decision: draft.decision, confidence: draft.confidence, source: draft.source });
		return this.checkpoint(state, "decided", {
			riskAssessment: risk,
			draft,
			finalDecision: draft.decision,
			decidedAt: this.ctx.now().toISOString(),
		});
	}

	private async route(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const decision = state.results.finalDecision ?? "escalate";
		if (decision === "escalate") return this.beginReview(state);

		if (decision === "approve") {
			const txn = await this.transaction(state);
			if (new Decimal(txn.amount).greaterThan(this.ctx.options.advanced.autoApprovalLimit)) {
				this.ctx.logger.info("Approval above auto-approval limit, awaiting manager", {
					transactionId: txn.id,
					amount: txn.amount,
				});
				return this.checkpoint(state, "awaiting_manager_approval", {}, {
					status: "waiting",
					wait: this.newWait("manager_approval", this.ctx.options.advanced.managerApprovalTimeoutMs),
				});
			}
		}
		return this.settle(state);
	}

	private async beginReview(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const draft = state.results.draft ?? fallbackDraft("No decision recorded before review", []);
		const reviewId = await this.run("queue_review", state, () => enqueueReview(this.ctx, txn, state, draft));
		await this.run("update_status", state, () => updateStatus(this.ctx, txn.id, "escalated"));

		return this.checkpoint(state, "escalated", { reviewId, finalDecision: "escalate" }, {
			status: "waiting",
			wait: this.newWait("human_review", this.ctx.options.advanced.humanReviewTimeoutMs),
		});
	}

	private async awaitManager(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const record = await this.nextSignal(state, "manager_approval");
		const now = this.ctx.now().toISOString();

		if (!record) {
			this.ctx.logger.warn("Manager approval timed out, escalating", { transactionId: state.transactionId });
			const amended = await this.amend(state, {
				kind: "approval_timeout",
				previousDecision: "approve",
				decision: "escalate",
				actor: "system",
				reason: APPROVAL_TIMEOUT_REASON,
				at: now,
			});
			return this.beginReview(amended);
		}

		const amendment = amendmentFromSignal(record.signal, state.results.finalDecision ?? "approve", now);
		const amended = await this.amend(state, amendment, record.id);
		if (amendment.decision === "escalate") return this.beginReview(amended);
		return this.settle(amended);
	}

	private async awaitReview(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const record = await this.nextSignal(state, "human_review");
		const now = this.ctx.now().toISOString();
		const previous = state.results.finalDecision ?? "escalate";
		const reviewId = state.results.reviewId;

		if (!record) {
			this.ctx.logger.warn("Human review timed out, rejecting", { transactionId: state.transactionId });
			const amended = await this.amend(state, {
				kind: "review_timeout",
				previousDecision: previous,
				decision: "reject",
				actor: "system",
				reason: REVIEW_TIMEOUT_REASON,
				at: now,
			});
			if (reviewId) {
				await this.run("queue_review", state, () =>
					resolveReview(this.ctx, reviewId, {
						status: "expired",
						outcome: "reject",
						reviewer: null,
						notes: REVIEW_TIMEOUT_REASON,
					}),
				);
			}
			return this.settle(amended);
		}

		const amendment = amendmentFromSignal(record.signal, previous, now);
		const amended = await this.amend(state, amendment, record.id);

		// Deferred by the reviewer: keep waiting until the same deadline.
		if (amendment.decision === "escalate") {
			return this.checkpoint(state, "escalated", amended.results, { status: "waiting", wait: state.wait });
		}

		if (reviewId) {
			await this.run("queue_review", state, () =>
				resolveReview(this.ctx, reviewId, {
					status: "completed",
					outcome: amendment.decision,
					reviewer: amendment.actor,
					notes: amendment.reason,
				}),
			);
		}
		return this.settle(amended);
	}

	private async settle(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const { holdId } = state.results;

		if (state.results.finalDecision !== "approve") {
			const holdReleased = await this.releaseHoldQuietly(state, "rejected");
			return this.checkpoint(state, "settled", {
				finalDecision: "reject",
				settlement: { committed: false, journalEntryId: null, holdReleased },
			});
		}

		const outcome = await this.run("transfer", state, () => settleApproved(this.ctx, txn, holdId));
		if (outcome.committed) {
			this.ctx.logger.info("Funds transferred", { transactionId: txn.id, journalEntryId: outcome.journalEntryId });
			return this.checkpoint(state, "settled", {
				settlement: { committed: true, journalEntryId: outcome.journalEntryId, holdReleased: holdId !== null },
			});
		}

		this.ctx.logger.warn("Settlement refused by ledger, rejecting", {
			transactionId: txn.id,
			code: outcome.error.code,
		});
		const amended = await this.amend(state, {
			kind: "settlement",
			previousDecision: "approve",
			decision: "reject",
			actor: "ledger",
			reason: `Settlement failed: ${outcome.error.message}`,
			at: this.ctx.now().toISOString(),
		});
		const holdReleased = await this.releaseHoldQuietly(amended, "settlement_failed");
		return this.checkpoint(amended, "settled", {
			settlement: { committed: false, journalEntryId: null, holdReleased },
		});
	}

	private async storeDecision(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const draft = state.results.draft ?? fallbackDraft("No decision recorded", []);
		const decision = await this.run("store_decision", state, () => persistDecision(this.ctx, state, draft));
		return this.checkpoint(state, "decision_stored", { decisionId: decision.id });
	}

	private async updateFinalStatus(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const status = statusForDecision(state.results.finalDecision ?? "reject");
		await this.run("update_status", state, () => updateStatus(this.ctx, state.transactionId, status));
		await this.audit(state, "status", { status });
		return this.checkpoint(state, "status_updated");
	}

	/** Non-critical: a failed notification is logged and the workflow completes. */
	private async notify(state: WorkflowExecutionState): Promise<WorkflowExecutionState> {
		const txn = await this.transaction(state);
		const decision = state.results.finalDecision ?? "reject";
		const lastAmendment = state.results.amendments.at(-1);
		const reasoning = lastAmendment?.reason ?? state.results.draft?.reasoning ?? "";

		try {
			await this.run("notify", state, () => sendNotification(this.ctx, { transaction: txn, decision, reasoning }));
		} catch (err) {
			this.ctx.logger.warn("Notification failed, completing without it", {
				transactionId: txn.id,
				error: errorMessage(err),
			});
		}
		return this.checkpoint(state, "completed", {}, { status: "completed" });
	}

	// ---------------------------------------------------------------------------
	// COMPENSATION
	// ---------------------------------------------------------------------------

	private async compensate(state: WorkflowExecutionState, cause: unknown): Promise<never> {
		const message = errorMessage(cause);
		this.ctx.logger.error("Workflow failed, compensating", {
			workflowId: state.id,
			transactionId: state.transactionId,
			stage: state.stage,
			error: message,
		});

		if (!state.results.settlement?.committed) {
			await this.releaseHoldQuietly(state, "compensation");
		}

		try {
			await this.run("update_status", state, () => this.markFailed(state.transactionId));
		} catch (err) {
			this.ctx.logger.error("Could not mark transaction failed", {
				transactionId: state.transactionId,
				error: errorMessage(err),
			});
		}

		const failed: WorkflowExecutionState = {
			...withStage(state, "failed"),
			status: "failed",
			lastError: message,
			failedStage: state.stage,
			wait: null,
			completedAt: this.ctx.now().toISOString(),
		};
		try {
			await saveState(this.ctx, state, failed);
		} catch (err) {
			this.ctx.logger.error("Could not checkpoint failed workflow", {
				workflowId: state.id,
				error: errorMessage(err),
			});
		}
		await this.audit(failed, "compensation", { failedStage: state.stage, error: message });

		throw VigilError.workflowFailed(
			`Workflow ${state.id} failed after ${state.stage}: ${message}`,
			{ stage: state.stage, transactionId: state.transactionId },
			cause,
		);
	}

	private async markFailed(transactionId: string): Promise<void> {
		const txn = await getTransaction(this.ctx, transactionId);
		if (isTerminalStatus(txn.status)) return;
		await updateStatus(this.ctx, transactionId, "failed");
	}

	/**
	 * Best-effort: a failed release is logged and reported as false. Without a
	 * checkpointed hold id the transaction's active hold is looked up, since
	 * the hold may have been placed before the checkpoint recording it failed.
	 */
	private async releaseHoldQuietly(state: WorkflowExecutionState, reason: string): Promise<boolean> {
		let holdId = state.results.holdId;
		try {
			holdId ??= (await this.run("release_hold", state, () => findActiveHold(this.ctx, state.transactionId)))?.id ?? null;
			if (!holdId) return false;
			const id = holdId;
			await this.run("release_hold", state, () => releaseHold(this.ctx, id, reason));
			return true;
		} catch (err) {
			this.ctx.logger.error("Hold release failed", {
				transactionId: state.transactionId,
				holdId,
				error: errorMessage(err),
			});
			return false;
		}
	}

	// ---------------------------------------------------------------------------
	// HELPERS
	// ---------------------------------------------------------------------------

	private async transaction(state: WorkflowExecutionState): Promise<Transaction> {
		return this.run("start", state, () => getTransaction(this.ctx, state.transactionId));
	}

	private run<T>(name: ActivityName, state: WorkflowExecutionState, operation: () => Promise<T>): Promise<T> {
		return runActivity(this.ctx, name, this.policies[name], operation, {
			logData: { workflowId: state.id, transactionId: state.transactionId },
			onRetry: () => {
				this.retries.set(state.id, (this.retries.get(state.id) ?? 0) + 1);
			},
		});
	}

	private async bestEffort<T>(
		name: ActivityName,
		state: WorkflowExecutionState,
		operation: () => Promise<T>,
		fallback: (error: unknown) => T,
	): Promise<T> {
		try {
			return await this.run(name, state, operation);
		} catch (err) {
			this.ctx.logger.warn("Activity exhausted, using fallback", {
				activity: name,
				transactionId: state.transactionId,
				error: errorMessage(err),
			});
			return fallback(err);
		}
	}

	private newWait(kind: WaitKind, timeoutMs: number): WorkflowWait {
		const since = this.ctx.now();
		return {
			kind,
			since: since.toISOString(),
			deadline: new Date(since.getTime() + timeoutMs).toISOString(),
		};
	}

	private async nextSignal(state: WorkflowExecutionState, kind: WaitKind): Promise<WorkflowSignalRecord | null> {
		const wait = state.wait?.kind === kind ? state.wait : null;
		const timeoutMs =
			kind === "human_review"
				? this.ctx.options.advanced.humanReviewTimeoutMs
				: this.ctx.options.advanced.managerApprovalTimeoutMs;
		const deadline = wait ? new Date(wait.deadline) : new Date(this.ctx.now().getTime() + timeoutMs);

		this.ctx.logger.info("Workflow waiting for signal", {
			workflowId: state.id,
			waitingFor: kind,
			deadline: deadline.toISOString(),
		});
		return waitForSignal(this.ctx, this.bus, {
			workflowId: state.id,
			kinds: ACCEPTED_SIGNALS[kind],
			applied: state.results.appliedSignalIds,
			deadline,
			pollIntervalMs: this.pollIntervalMs,
			isCurrent: async () => (await loadState(this.ctx, state.id))?.updatedAt === state.updatedAt,
		});
	}

	/** Fold an amendment into the state; it is persisted by the next checkpoint. */
	private async amend(
		state: WorkflowExecutionState,
		amendment: PendingAmendment,
		signalId?: string,
	): Promise<WorkflowExecutionState> {
		this.ctx.logger.info("Decision amended", {
			transactionId: state.transactionId,
			kind: amendment.kind,
			from: amendment.previousDecision,
			to: amendment.decision,
			actor: amendment.actor,
		});
		await this.audit(state, "amendment", {
			kind: amendment.kind,
			previousDecision: amendment.previousDecision,
			decision: amendment.decision,
			actor: amendment.actor,
		});
		return {
			...state,
			results: {
				...state.results,
				finalDecision: amendment.decision,
				amendments: [...state.results.amendments, amendment],
				appliedSignalIds: signalId
					? [...state.results.appliedSignalIds, signalId]
					: state.results.appliedSignalIds,
			},
		};
	}

	/**
	 * Record `stage` on the transaction, then persist the new checkpoint over
	 * `state`. The stage append is idempotent, so a crash between the two
	 * writes replays cleanly.
	 */
	private async checkpoint(
		state: WorkflowExecutionState,
		stage: WorkflowStage,
		results: Partial<WorkflowResults> = {},
		options: { status?: WorkflowStatus; wait?: WorkflowWait | null } = {},
	): Promise<WorkflowExecutionState> {
		const status = options.status ?? "running";
		const retried = this.retries.get(state.id) ?? 0;
		this.retries.delete(state.id);

		const next: WorkflowExecutionState = {
			...withStage(state, stage),
			status,
			retryCount: state.retryCount + retried,
			results: { ...state.results, ...results },
			wait: options.wait ?? null,
			completedAt: status === "completed" ? this.ctx.now().toISOString() : state.completedAt,
		};

		await this.run("checkpoint", state, () => appendStage(this.ctx, state.transactionId, stage));
		const saved = await this.run("checkpoint", state, () => saveState(this.ctx, state, next));

		this.ctx.logger.info("Workflow stage completed", {
			workflowId: state.id,
			transactionId: state.transactionId,
			stage,
		});
		await this.audit(saved, "stage", { stage, status });
		return saved;
	}

	/** Non-critical. */
	private async audit(
		state: WorkflowExecutionState,
		kind: AuditEventKind,
		data: Record<string, AuditValue>,
	): Promise<void> {
		try {
			await recordAuditEvent(this.ctx, {
				transactionId: state.transactionId,
				workflowId: state.id,
				kind,
				data,
			});
		} catch (err) {
			this.ctx.logger.warn("Audit event not recorded", {
				transactionId: state.transactionId,
				kind,
				error: errorMessage(err),
			});
		}
	}
}

export function createWorkflowEngine(ctx: VigilContext, options?: WorkflowEngineOptions): WorkflowEngine {
	return new WorkflowEngine(ctx, options);
}
