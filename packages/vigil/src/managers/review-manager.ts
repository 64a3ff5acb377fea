// =============================================================================
// REVIEW MANAGER -- human review queue
// =============================================================================
// Escalated transactions land here as `human_review` documents. The queue is
// durable; resolution arrives as a workflow signal and is mirrored back onto
// the review record by the workflow.

import type {
	DecisionDraft,
	DecisionValue,
	HumanReview,
	ReviewPriority,
	Transaction,
	VigilContext,
} from "@vigil/core";
import { VigilError } from "@vigil/core";

const PRIORITY_ORDER: Record<ReviewPriority, number> = { urgent: 0, high: 1, medium: 2, low: 3 };
const HOUR_MS = 60 * 60 * 1000;

export function reviewId(transactionId: string): string {
	return `review:${transactionId}`;
}

export function reviewPriority(riskScore: number): ReviewPriority {
	if (riskScore > 80) return "urgent";
	if (riskScore > 60) return "high";
	if (riskScore > 40) return "medium";
	return "low";
}

export function reviewSlaMs(priority: ReviewPriority): number {
	return priority === "urgent" ? 4 * HOUR_MS : 24 * HOUR_MS;
}

/** Idempotent per transaction. */
export async function queueForReview(
	ctx: VigilContext,
	params: { transaction: Transaction; workflowId: string; draft: DecisionDraft; riskScore: number },
): Promise<HumanReview> {
	const id = reviewId(params.transaction.id);
	const existing = await getReview(ctx, id);
	if (existing) return existing;

	const now = ctx.now();
	const priority = reviewPriority(params.riskScore);
	const review = await ctx.adapter.create({
		model: "human_review",
		data: {
			id,
			transactionId: params.transaction.id,
			workflowId: params.workflowId,
			status: "pending",
			priority,
			riskScore: params.riskScore,
			proposedDecision: params.draft.decision,
			reasoning: params.draft.reasoning,
			riskFactors: params.draft.riskFactors,
			slaDeadline: new Date(now.getTime() + reviewSlaMs(priority)).toISOString(),
			outcome: null,
			reviewer: null,
			notes: null,
			createdAt: now.toISOString(),
			completedAt: null,
		},
	});
	ctx.logger.info("Transaction queued for human review", {
		transactionId: params.transaction.id,
		priority,
	});
	return review;
}

export async function getReview(ctx: VigilContext, id: string): Promise<HumanReview | null> {
	return ctx.adapter.findOne({
		model: "human_review",
		where: [{ field: "id", operator: "eq", value: id }],
	});
}

export async function requireReview(ctx: VigilContext, id: string): Promise<HumanReview> {
	const review = await getReview(ctx, id);
	if (!review) throw VigilError.notFound(`Review ${id} not found`);
	return review;
}

/** Pending reviews, most urgent first, oldest first within a priority. */
export async function listPendingReviews(
	ctx: VigilContext,
	params: { priority?: ReviewPriority; limit?: number } = {},
): Promise<HumanReview[]> {
	const pending = await ctx.adapter.findMany({
		model: "human_review",
		where: [
			{ field: "status", operator: "eq", value: "pending" },
			...(params.priority ? [{ field: "priority" as const, operator: "eq" as const, value: params.priority }] : []),
		],
	});
	return pending
		.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority] || a.createdAt.localeCompare(b.createdAt))
		.slice(0, params.limit ?? 100);
}

/** Close a review. Already-closed reviews are left as they are. */
export async function resolveReview(
	ctx: VigilContext,
	id: string,
	resolution: { status: "completed" | "expired"; outcome: DecisionValue; reviewer: string | null; notes: string | null },
): Promise<HumanReview | null> {
	const review = await getReview(ctx, id);
	if (!review || review.status !== "pending") return review;
	return ctx.adapter.update({
		model: "human_review",
		where: [{ field: "id", operator: "eq", value: id }],
		update: {
			status: resolution.status,
			outcome: resolution.outcome,
			reviewer: resolution.reviewer,
			notes: resolution.notes,
			completedAt: ctx.now().toISOString(),
		},
	});
}
