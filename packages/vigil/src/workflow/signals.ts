// =============================================================================
// SIGNALS -- durable signal records and the in-process wake-up bus
// =============================================================================
// A signal is written to `workflow_signal` before any waiter is woken. Waiters
// consume signals from the store, so a signal sent to another process, or
// before the wait began, is still seen on the next poll.

import { EventEmitter } from "node:events";
import type {
	VigilContext,
	WaitKind,
	WorkflowSignal,
	WorkflowSignalKind,
	WorkflowSignalRecord,
} from "@vigil/core";
import { generateId, VigilError } from "@vigil/core";
import { withStoreTransaction } from "../managers/ledger-helpers.js";

/** Signals each wait accepts. */
export const ACCEPTED_SIGNALS: Readonly<Record<WaitKind, readonly WorkflowSignalKind[]>> = {
	manager_approval: ["manager_approval", "manual_override"],
	human_review: ["human_review_complete", "manual_override"],
};

export class SignalBus {
	private readonly emitter = new EventEmitter();

	constructor() {
		this.emitter.setMaxListeners(0);
	}

	notify(workflowId: string): void {
		this.emitter.emit(workflowId);
	}

	/** Resolves on the next notify() for `workflowId`, or after `timeoutMs`. */
	waitForNotify(workflowId: string, timeoutMs: number): Promise<void> {
		return new Promise((resolve) => {
			const done = () => {
				clearTimeout(timer);
				this.emitter.off(workflowId, done);
				resolve();
			};
			const timer = setTimeout(done, Math.max(0, timeoutMs));
			timer.unref();
			this.emitter.once(workflowId, done);
		});
	}
}

export async function recordSignal(
	ctx: VigilContext,
	workflowId: string,
	signal: WorkflowSignal,
): Promise<WorkflowSignalRecord> {
	return ctx.adapter.create({
		model: "workflow_signal",
		data: {
			id: generateId("sig"),
			workflowId,
			kind: signal.kind,
			signal,
			consumed: false,
			consumedAt: null,
			createdAt: ctx.now().toISOString(),
		},
	});
}

export async function listSignals(ctx: VigilContext, workflowId: string): Promise<WorkflowSignalRecord[]> {
	return ctx.adapter.findMany({
		model: "workflow_signal",
		where: [{ field: "workflowId", operator: "eq", value: workflowId }],
		sortBy: { field: "createdAt", direction: "asc" },
	});
}

/**
 * Consume the oldest pending signal of an accepted kind. Only one consumer
 * wins a given record.
 */
export async function takeSignal(
	ctx: VigilContext,
	workflowId: string,
	kinds: readonly WorkflowSignalKind[],
): Promise<WorkflowSignalRecord | null> {
	return withStoreTransaction(ctx, async (tx) => {
		const pending = await tx.findMany({
			model: "workflow_signal",
			where: [
				{ field: "workflowId", operator: "eq", value: workflowId },
				{ field: "consumed", operator: "eq", value: false },
				{ field: "kind", operator: "in", value: [...kinds] },
			],
			sortBy: { field: "createdAt", direction: "asc" },
			limit: 1,
		});
		const next = pending[0];
		if (!next) return null;

		const claimed = await tx.findOne({
			model: "workflow_signal",
			where: [
				{ field: "id", operator: "eq", value: next.id },
				{ field: "consumed", operator: "eq", value: false },
			],
			forUpdate: true,
		});
		if (!claimed) return null;

		const consumedAt = ctx.now().toISOString();
		await tx.update({
			model: "workflow_signal",
			where: [{ field: "id", operator: "eq", value: claimed.id }],
			update: { consumed: true, consumedAt },
		});
		return { ...claimed, consumed: true, consumedAt };
	});
}

/**
 * Block until an accepted signal is consumed or `deadline` passes. Returns
 * null on timeout. A signal consumed earlier but missing from `applied` (the
 * runner stopped before checkpointing it) is returned first. The store is
 * polled every `pollIntervalMs` in addition to the in-process wake-ups; once
 * `isCurrent` reports false, another runner owns the wait and the call
 * rejects with a superseded CONFLICT.
 */
export async function waitForSignal(
	ctx: VigilContext,
	bus: SignalBus,
	params: {
		workflowId: string;
		kinds: readonly WorkflowSignalKind[];
		applied: readonly string[];
		deadline: Date;
		pollIntervalMs: number;
		isCurrent?: () => Promise<boolean>;
	},
): Promise<WorkflowSignalRecord | null> {
	const consumed = await ctx.adapter.findMany({
		model: "workflow_signal",
		where: [
			{ field: "workflowId", operator: "eq", value: params.workflowId },
			{ field: "consumed", operator: "eq", value: true },
			{ field: "kind", operator: "in", value: [...params.kinds] },
		],
		sortBy: { field: "createdAt", direction: "asc" },
	});
	const unapplied = consumed.find((record) => !params.applied.includes(record.id));
	if (unapplied) return unapplied;

	for (;;) {
		const signal = await takeSignal(ctx, params.workflowId, params.kinds);
		if (signal) return signal;

		if (params.isCurrent && !(await params.isCurrent())) {
			throw new VigilError("CONFLICT", `Workflow ${params.workflowId} was advanced by another runner`, {
				details: { superseded: true },
			});
		}

		const remaining = params.deadline.getTime() - ctx.now().getTime();
		if (remaining <= 0) return null;
		await bus.waitForNotify(params.workflowId, Math.min(remaining, params.pollIntervalMs));
	}
}
