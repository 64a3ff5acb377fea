// =============================================================================
// DECISION MANAGER -- original decisions and their amendments
// =============================================================================
// One decision per transaction, written once. Later changes (human review,
// manager approval, overrides, settlement flips) are amendments that point
// at it; the original record is never rewritten.

import type { Decision, DecisionAmendment, PendingAmendment, VigilContext } from "@vigil/core";
import { VigilError } from "@vigil/core";

export function decisionId(transactionId: string): string {
	return `decision:${transactionId}`;
}

/** Idempotent: a second write for the same transaction returns the stored decision. */
export async function storeDecision(ctx: VigilContext, decision: Decision): Promise<Decision> {
	const existing = await getDecision(ctx, decision.transactionId);
	if (existing) return existing;
	try {
		return await ctx.adapter.create({ model: "decision", data: decision });
	} catch (err) {
		if (err instanceof VigilError && err.code === "DUPLICATE") {
			const stored = await getDecision(ctx, decision.transactionId);
			if (stored) return stored;
		}
		throw err;
	}
}

export async function getDecision(ctx: VigilContext, transactionId: string): Promise<Decision | null> {
	return ctx.adapter.findOne({
		model: "decision",
		where: [{ field: "id", operator: "eq", value: decisionId(transactionId) }],
	});
}

/**
 * Write amendments collected by a workflow. Ids are positional
 * (`amend:{txnId}:{n}`), so replaying the same list writes nothing new.
 */
export async function recordAmendments(
	ctx: VigilContext,
	transactionId: string,
	amendments: PendingAmendment[],
): Promise<DecisionAmendment[]> {
	const written: DecisionAmendment[] = [];
	for (const [index, amendment] of amendments.entries()) {
		const id = `amend:${transactionId}:${index}`;
		const existing = await ctx.adapter.findOne({
			model: "decision_amendment",
			where: [{ field: "id", operator: "eq", value: id }],
		});
		if (existing) {
			written.push(existing);
			continue;
		}
		written.push(
			await ctx.adapter.create({
				model: "decision_amendment",
				data: {
					id,
					decisionId: decisionId(transactionId),
					transactionId,
					kind: amendment.kind,
					previousDecision: amendment.previousDecision,
					decision: amendment.decision,
					actor: amendment.actor,
					reason: amendment.reason,
					createdAt: amendment.at,
				},
			}),
		);
	}
	return written;
}

export async function listAmendments(ctx: VigilContext, transactionId: string): Promise<DecisionAmendment[]> {
	const amendments = await ctx.adapter.findMany({
		model: "decision_amendment",
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
	});
	// Positional ids; order by the trailing index, not lexically.
	const position = (a: DecisionAmendment) => Number(a.id.slice(a.id.lastIndexOf(":") + 1));
	return amendments.sort((a, b) => position(a) - position(b));
}
