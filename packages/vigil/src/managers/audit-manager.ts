// =============================================================================
// AUDIT MANAGER -- audit trail and decision notifications
// =============================================================================
// Audit writes and notifications are non-critical: callers log and move on
// when they fail. Notifications are recorded whether or not a channel is
// configured, keyed by transaction so a retry does not send twice.

import type {
	AuditEvent,
	AuditEventKind,
	AuditValue,
	DecisionValue,
	Notification,
	Transaction,
	VigilContext,
} from "@vigil/core";
import { errorMessage, generateId, VigilError } from "@vigil/core";

export async function recordAuditEvent(
	ctx: VigilContext,
	params: {
		transactionId: string;
		workflowId: string;
		kind: AuditEventKind;
		data: Record<string, AuditValue>;
	},
): Promise<AuditEvent> {
	return ctx.adapter.create({
		model: "audit_event",
		data: {
			id: generateId("audit"),
			transactionId: params.transactionId,
			workflowId: params.workflowId,
			kind: params.kind,
			data: params.data,
			createdAt: ctx.now().toISOString(),
		},
	});
}

export async function listAuditEvents(ctx: VigilContext, transactionId: string): Promise<AuditEvent[]> {
	const events = await ctx.adapter.findMany({
		model: "audit_event",
		where: [{ field: "transactionId", operator: "eq", value: transactionId }],
	});
	return events.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export function notificationId(transactionId: string): string {
	return `notification:${transactionId}`;
}

export function notificationSubject(decision: DecisionValue, transactionId: string): string {
	return `Transaction ${decision.toUpperCase()}: ${transactionId}`;
}

export async function getNotification(ctx: VigilContext, transactionId: string): Promise<Notification | null> {
	return ctx.adapter.findOne({
		model: "notification",
		where: [{ field: "id", operator: "eq", value: notificationId(transactionId) }],
	});
}

/**
 * Record and deliver the decision notification. A notification already
 * delivered is returned untouched. Delivery failure is recorded on the
 * document and rethrown as a transient error so the caller may retry.
 */
export async function sendNotification(
	ctx: VigilContext,
	params: { transaction: Transaction; decision: DecisionValue; reasoning: string },
): Promise<Notification> {
	const { transaction: txn, decision } = params;
	const existing = await getNotification(ctx, txn.id);
	if (existing?.delivered) return existing;

	const notification: Notification = existing ?? {
		id: notificationId(txn.id),
		transactionId: txn.id,
		decision,
		subject: notificationSubject(decision, txn.id),
		body: [
			`Decision: ${decision}`,
			`Amount: ${txn.amount} ${txn.currency}`,
			`From: ${txn.sender.name} (${txn.sender.country})`,
			`To: ${txn.recipient.name} (${txn.recipient.country})`,
			`Reasoning: ${params.reasoning}`,
		].join("\n"),
		delivered: false,
		error: null,
		createdAt: ctx.now().toISOString(),
	};

	let deliveryError: unknown = null;
	if (ctx.notificationChannel) {
		try {
			await ctx.notificationChannel.send(notification);
		} catch (err) {
			deliveryError = err;
		}
	}

	const update = {
		delivered: ctx.notificationChannel !== null && deliveryError === null,
		error: deliveryError === null ? null : errorMessage(deliveryError),
	};
	const stored = existing
		? await ctx.adapter.update({
				model: "notification",
				where: [{ field: "id", operator: "eq", value: notification.id }],
				update,
			})
		: await ctx.adapter.create({ model: "notification", data: { ...notification, ...update } });

	if (deliveryError !== null) {
		throw new VigilError("INTERNAL", `Notification delivery failed: ${errorMessage(deliveryError)}`, {
			cause: deliveryError,
			transient: true,
		});
	}
	return stored ?? { ...notification, ...update };
}
