// =============================================================================
// WORKFLOW STATE -- checkpoint persistence and the state query
// =============================================================================

import type {
	VigilContext,
	WorkflowExecutionState,
	WorkflowResults,
	WorkflowStage,
	WorkflowStateView,
} from "@vigil/core";
import { VigilError } from "@vigil/core";

export function workflowId(transactionId: string): string {
	return `wf:${transactionId}`;
}

function emptyResults(): WorkflowResults {
	return {
		holdId: null,
		enrichment: null,
		riskAssessment: null,
		embedding: null,
		similarCases: [],
		network: null,
		draft: null,
		finalDecision: null,
		amendments: [],
		appliedSignalIds: [],
		reviewId: null,
		settlement: null,
		decisionId: null,
		analysisStartedAt: null,
		decidedAt: null,
	};
}

export function initialState(ctx: VigilContext, transactionId: string): WorkflowExecutionState {
	const now = ctx.now().toISOString();
	return {
		id: workflowId(transactionId),
		transactionId,
		stage: "initialized",
		status: "running",
		stagesCompleted: ["initialized"],
		retryCount: 0,
		lastError: null,
		failedStage: null,
		results: emptyResults(),
		wait: null,
		startedAt: now,
		updatedAt: now,
		completedAt: null,
	};
}

export async function loadState(ctx: VigilContext, id: string): Promise<WorkflowExecutionState | null> {
	return ctx.adapter.findOne({
		model: "workflow_execution",
		where: [{ field: "id", operator: "eq", value: id }],
	});
}

export async function requireState(ctx: VigilContext, id: string): Promise<WorkflowExecutionState> {
	const state = await loadState(ctx, id);
	if (!state) throw VigilError.notFound(`Workflow ${id} not found`);
	return state;
}

/** Create the initial checkpoint, or return the one already stored. */
export async function createState(ctx: VigilContext, transactionId: string): Promise<WorkflowExecutionState> {
	const existing = await loadState(ctx, workflowId(transactionId));
	if (existing) return existing;
	try {
		return await ctx.adapter.create({ model: "workflow_execution", data: initialState(ctx, transactionId) });
	} catch (err) {
		if (err instanceof VigilError && err.code === "DUPLICATE") {
			return requireState(ctx, workflowId(transactionId));
		}
		throw err;
	}
}

/**
 * Write `next` over the checkpoint `previous` was loaded from. When another
 * runner has written in between, nothing is saved and CONFLICT is thrown
 * with `details.superseded`.
 */
export async function saveState(
	ctx: VigilContext,
	previous: WorkflowExecutionState,
	next: WorkflowExecutionState,
): Promise<WorkflowExecutionState> {
	const saved = await ctx.adapter.update({
		model: "workflow_execution",
		where: [
			{ field: "id", operator: "eq", value: previous.id },
			{ field: "updatedAt", operator: "eq", value: previous.updatedAt },
		],
		update: { ...next, updatedAt: ctx.now().toISOString() },
	});
	if (!saved) {
		throw new VigilError("CONFLICT", `Workflow ${previous.id} was advanced by another runner`, {
			details: { superseded: true },
		});
	}
	return saved;
}

export function isSuperseded(error: unknown): boolean {
	return error instanceof VigilError && error.code === "CONFLICT" && error.details?.superseded === true;
}

/** Non-terminal workflows, oldest first. */
export async function listActiveStates(ctx: VigilContext, limit = 100): Promise<WorkflowExecutionState[]> {
	return ctx.adapter.findMany({
		model: "workflow_execution",
		where: [{ field: "status", operator: "in", value: ["running", "waiting"] }],
		sortBy: { field: "startedAt", direction: "asc" },
		limit,
	});
}

export function isFinished(state: WorkflowExecutionState): boolean {
	return state.status === "completed" || state.status === "failed";
}

export function withStage(state: WorkflowExecutionState, stage: WorkflowStage): WorkflowExecutionState {
	return {
		...state,
		stage,
		stagesCompleted: state.stagesCompleted.includes(stage) ? state.stagesCompleted : [...state.stagesCompleted, stage],
	};
}

export function toStateView(state: WorkflowExecutionState): WorkflowStateView {
	const { results } = state;
	return {
		workflowId: state.id,
		transactionId: state.transactionId,
		currentState: state.stage,
		status: state.status,
		decision: results.finalDecision ?? results.draft?.decision ?? null,
		confidence: results.draft?.confidence ?? null,
		stagesCompleted: state.stagesCompleted.length,
		waitingFor: state.wait?.kind ?? null,
		waitDeadline: state.wait?.deadline ?? null,
		error: state.lastError,
		retryCount: state.retryCount,
	};
}
