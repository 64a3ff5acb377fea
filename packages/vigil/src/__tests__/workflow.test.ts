import { memoryAdapter } from "@vigil/memory-adapter";
import {
	assertHoldsReconcile,
	assertLedgerConserved,
	decisionReply,
	faultyAdapter,
	getTestInstance,
	hangingAnalyzer,
	party,
	recordingChannel,
	riskReply,
	scriptedAnalyzer,
	type TestInstance,
	transactionInput,
	waitForState,
} from "@vigil/test-utils";
import { afterEach, describe, expect, it } from "vitest";
import { getNotification, listAuditEvents } from "../managers/audit-manager.js";
import { getDecision, listAmendments } from "../managers/decision-manager.js";
import { getReview } from "../managers/review-manager.js";
import { APPROVAL_TIMEOUT_REASON, REVIEW_TIMEOUT_REASON } from "../workflow/engine.js";

// =============================================================================
// WORKFLOW TESTS -- end-to-end runs over the memory adapter
// =============================================================================

const SENDER = "ACC-alice-sender";
const RECIPIENT = "ACC-bob-recipient";

describe("transaction workflow", () => {
	const instances: TestInstance[] = [];

	async function instance(options: Parameters<typeof getTestInstance>[0] = {}): Promise<TestInstance> {
		const t = await getTestInstance(options);
		instances.push(t);
		return t;
	}

	afterEach(async () => {
		for (const t of instances.splice(0)) {
			await t.cleanup();
		}
	});

	// =========================================================================
	// STRAIGHT-THROUGH
	// =========================================================================

	it("approves and settles a low-risk ACH payment", async () => {
		const channel = recordingChannel();
		const analyzer = scriptedAnalyzer({
			risk: riskReply(15),
			decision: decisionReply("approve", 92, { reasoning: "Regular supplier payment" }),
		});
		const t = await instance({ analyzer, notificationChannel: channel });

		const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-ach" }));
		expect(handle).toMatchObject({ workflowId: "wf:txn-ach", transactionId: "txn-ach", created: true });

		const final = await handle.result();
		expect(final.status).toBe("completed");
		expect(final.results.finalDecision).toBe("approve");
		expect(final.results.riskAssessment?.riskScore).toBe(25);
		expect(final.results.settlement).toEqual({
			committed: true,
			journalEntryId: "journal:txn-ach",
			holdReleased: true,
		});

		const txn = await t.vigil.transactions.get("txn-ach");
		expect(txn.status).toBe("approved");
		expect(txn.riskFlags).toEqual(["new_recipient"]);
		expect(txn.processingStages.map((s) => s.stage)).toEqual([
			"submitted",
			"funds_validated",
			"enriched",
			"risk_assessed",
			"similar_cases_found",
			"network_analyzed",
			"decided",
			"settled",
			"decision_stored",
			"status_updated",
			"completed",
		]);

		const sender = await t.vigil.ledger.getAccount(SENDER);
		const recipient = await t.vigil.ledger.getAccount(RECIPIENT);
		expect(sender.balance).toBe("497500.00");
		expect(recipient.balance).toBe("52500.00");
		await assertLedgerConserved(t.ctx, [SENDER, RECIPIENT], "550000");
		await assertHoldsReconcile(t.ctx, SENDER);

		const decision = await getDecision(t.ctx, "txn-ach");
		expect(decision).toMatchObject({
			id: "decision:txn-ach",
			decision: "approve",
			confidence: 92,
			riskScore: 25,
			reasoning: "Regular supplier payment",
			source: "ai",
		});

		expect(channel.sent).toHaveLength(1);
		expect(channel.sent[0]?.subject).toBe("Transaction APPROVE: txn-ach");
		expect(analyzer.callCount("risk")).toBe(1);
		expect(analyzer.callCount("decision")).toBe(1);

		expect(await t.vigil.workflows.getState("txn-ach")).toEqual({
			workflowId: "wf:txn-ach",
			transactionId: "txn-ach",
			currentState: "completed",
			status: "completed",
			decision: "approve",
			confidence: 92,
			stagesCompleted: 11,
			waitingFor: null,
			waitDeadline: null,
			error: null,
			retryCount: 0,
		});
	});

	it("rejects a sanctioned destination without consulting the AI", async () => {
		const analyzer = scriptedAnalyzer({ risk: riskReply(5), decision: decisionReply("approve", 99) });
		const t = await instance({ analyzer });

		const handle = await t.vigil.transactions.submit(
			transactionInput({
				id: "txn-ir",
				type: "wire",
				amount: "150000",
				recipient: party("Bob Recipient", "IR"),
			}),
		);
		const final = await handle.result();

		expect(final.results.finalDecision).toBe("reject");
		expect(final.results.draft).toMatchObject({
			decision: "reject",
			confidence: 100,
			reasoning: "Transaction rejected due to compliance violation: sanctions_check, ofac_check",
			source: "compliance",
		});
		expect(final.results.settlement).toEqual({ committed: false, journalEntryId: null, holdReleased: true });
		expect(analyzer.callCount()).toBe(0);

		expect((await t.vigil.transactions.get("txn-ir")).status).toBe("rejected");
		const sender = await t.vigil.ledger.getAccount(SENDER);
		expect(sender.balance).toBe("750000.00");
		expect(sender.availableBalance).toBe("750000.00");
		expect(await t.vigil.ledger.getJournalEntry("txn-ir")).toBeNull();
	});

	it("rejects when the ledger refuses the hold", async () => {
		const analyzer = scriptedAnalyzer({ risk: riskReply(5), decision: decisionReply("approve", 99) });
		const t = await instance({ analyzer });
		await t.vigil.ledger.getOrCreateAccount({ accountId: SENDER, ownerId: "CUST-alice-sender", initialBalance: "100" });

		const final = await (await t.vigil.transactions.submit(transactionInput({ id: "txn-poor" }))).result();

		expect(final.results.draft).toMatchObject({
			decision: "reject",
			source: "ledger",
			reasoning: "Transaction rejected by ledger: Insufficient funds: available 100.00, requested 2500",
		});
		expect(final.results.holdId).toBeNull();
		expect(final.stagesCompleted).not.toContain("enriched");
		expect(analyzer.callCount()).toBe(0);
		expect((await t.vigil.transactions.get("txn-poor")).status).toBe("rejected");
	});

	it("escalates when no analyzer is configured", async () => {
		const t = await instance();

		const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-noai" }));
		const state = await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");

		expect(state.currentState).toBe("escalated");
		expect(state.waitingFor).toBe("human_review");
		const review = await t.vigil.reviews.get("review:txn-noai");
		expect(review.proposedDecision).toBe("escalate");
		expect(review.reasoning).toBe("AI analysis unavailable: no analyzer configured");
		// 75 from the missing AI score
		expect(review.priority).toBe("high");
	});

	it("returns the running workflow when a transaction id is resubmitted", async () => {
		const t = await instance({
			analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) }),
		});

		const first = await t.vigil.transactions.submit(transactionInput({ id: "txn-dup" }));
		const second = await t.vigil.transactions.submit(transactionInput({ id: "txn-dup", amount: "9999" }));

		expect(second).toMatchObject({ workflowId: "wf:txn-dup", created: false });
		await first.result();
		expect((await t.vigil.transactions.get("txn-dup")).amount).toBe("2500.00");
		expect(await t.vigil.ledger.listHolds(SENDER)).toHaveLength(1);
	});

	it("completes even when the notification cannot be delivered", async () => {
		const t = await instance({
			analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) }),
			notificationChannel: recordingChannel({ fail: true }),
		});

		const final = await (await t.vigil.transactions.submit(transactionInput({ id: "txn-quiet" }))).result();

		expect(final.status).toBe("completed");
		expect(await getNotification(t.ctx, "txn-quiet")).toMatchObject({ delivered: false, error: "channel down" });
	});

	// =========================================================================
	// MANAGER APPROVAL
	// =========================================================================

	describe("manager approval", () => {
		const largeWire = transactionInput({ id: "txn-wire", type: "wire", amount: "75000" });

		it("waits for a manager above the auto-approval limit", async () => {
			const t = await instance({
				analyzer: scriptedAnalyzer({ risk: riskReply(20), decision: decisionReply("approve", 92) }),
				advanced: { managerApprovalTimeout: "48h" },
			});

			const handle = await t.vigil.transactions.submit(largeWire);
			const waiting = await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");
			expect(waiting.currentState).toBe("awaiting_manager_approval");
			expect(waiting.waitingFor).toBe("manager_approval");

			// Not reaped while the workflow waits
			t.clock.advance(25 * 60 * 60 * 1000);
			expect(await t.vigil.ledger.expireHolds()).toEqual({ expired: 0, skipped: 1 });

			await t.vigil.workflows.signalManagerApproval("txn-wire", { approved: true, actor: "manager-1" });
			const final = await handle.result();

			expect(final.results.riskAssessment?.riskScore).toBe(70);
			expect(final.results.finalDecision).toBe("approve");
			expect((await t.vigil.transactions.get("txn-wire")).status).toBe("approved");
			expect((await t.vigil.ledger.getAccount(SENDER)).balance).toBe("425000.00");
			expect((await t.vigil.ledger.getAccount(RECIPIENT)).balance).toBe("125000.00");

			const amendments = await listAmendments(t.ctx, "txn-wire");
			expect(amendments.map((a) => [a.kind, a.previousDecision, a.decision, a.actor, a.reason])).toEqual([
				["manager_approval", "approve", "approve", "manager-1", "Approved by manager"],
			]);
		});

		it("rejects when the manager declines", async () => {
			const t = await instance({
				analyzer: scriptedAnalyzer({ risk: riskReply(20), decision: decisionReply("approve", 92) }),
			});

			const handle = await t.vigil.transactions.submit(largeWire);
			await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");
			await t.vigil.workflows.signalManagerApproval(handle.workflowId, {
				approved: false,
				actor: "manager-1",
				reason: "Unverified beneficiary",
			});
			const final = await handle.result();

			expect(final.results.finalDecision).toBe("reject");
			expect((await t.vigil.transactions.get("txn-wire")).status).toBe("rejected");
			expect((await t.vigil.ledger.getAccount(SENDER)).availableBalance).toBe("500000.00");
			expect((await getNotification(t.ctx, "txn-wire"))?.body).toContain("Reasoning: Unverified beneficiary");
		});

		it("escalates to human review when the manager does not answer", async () => {
			const t = await instance({
				analyzer: scriptedAnalyzer({ risk: riskReply(20), decision: decisionReply("approve", 92) }),
				advanced: { managerApprovalTimeout: "50ms" },
			});

			const handle = await t.vigil.transactions.submit(largeWire);
			const escalated = await waitForState(
				t.vigil,
				handle.workflowId,
				(s) => s.currentState === "escalated" && s.status === "waiting",
			);
			expect(escalated.waitingFor).toBe("human_review");
			expect((await t.vigil.transactions.get("txn-wire")).status).toBe("escalated");

			await t.vigil.reviews.complete("review:txn-wire", { decision: "approve", reviewer: "analyst-1" });
			const final = await handle.result();

			expect(final.results.finalDecision).toBe("approve");
			const amendments = await listAmendments(t.ctx, "txn-wire");
			expect(amendments.map((a) => [a.kind, a.previousDecision, a.decision, a.reason])).toEqual([
				["approval_timeout", "approve", "escalate", APPROVAL_TIMEOUT_REASON],
				["human_review", "escalate", "approve", "Human review: approve"],
			]);
			// The original decision is never rewritten
			expect((await getDecision(t.ctx, "txn-wire"))?.decision).toBe("approve");
		});
	});

	// =========================================================================
	// HUMAN REVIEW
	// =========================================================================

	describe("human review", () => {
		const escalating = () => scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("escalate", 75) });

		it("queues the review and settles on the reviewer's approval", async () => {
			const t = await instance({ analyzer: escalating() });

			const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-rev" }));
			await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");

			const [pending] = await t.vigil.reviews.listPending();
			expect(pending).toMatchObject({
				id: "review:txn-rev",
				transactionId: "txn-rev",
				workflowId: "wf:txn-rev",
				status: "pending",
				priority: "low",
				proposedDecision: "escalate",
			});

			await t.vigil.reviews.complete("review:txn-rev", {
				decision: "approve",
				reviewer: "analyst-1",
				notes: "Confirmed with customer",
			});
			const final = await handle.result();

			expect(final.results.finalDecision).toBe("approve");
			expect((await t.vigil.transactions.get("txn-rev")).status).toBe("approved");
			expect(await getReview(t.ctx, "review:txn-rev")).toMatchObject({
				status: "completed",
				outcome: "approve",
				reviewer: "analyst-1",
				notes: "Confirmed with customer",
			});
			expect(await t.vigil.reviews.listPending()).toEqual([]);
			expect(await t.vigil.ledger.getJournalEntry("txn-rev")).not.toBeNull();
		});

		it("rejects and releases the hold when the review times out", async () => {
			const t = await instance({ analyzer: escalating(), advanced: { humanReviewTimeout: "50ms" } });

			const final = await (await t.vigil.transactions.submit(transactionInput({ id: "txn-late" }))).result();

			expect(final.results.finalDecision).toBe("reject");
			expect(final.results.amendments).toMatchObject([
				{ kind: "review_timeout", previousDecision: "escalate", decision: "reject", reason: REVIEW_TIMEOUT_REASON },
			]);
			expect((await t.vigil.transactions.get("txn-late")).status).toBe("rejected");
			expect(await getReview(t.ctx, "review:txn-late")).toMatchObject({ status: "expired", outcome: "reject" });
			expect((await t.vigil.ledger.getAccount(SENDER)).availableBalance).toBe("500000.00");
			expect((await getNotification(t.ctx, "txn-late"))?.body).toContain(`Reasoning: ${REVIEW_TIMEOUT_REASON}`);
		});

		it("applies a manual override", async () => {
			const t = await instance({ analyzer: escalating() });

			const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-ovr" }));
			await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");
			await t.vigil.workflows.override("txn-ovr", {
				decision: "reject",
				actor: "compliance-officer",
				reason: "Known mule account",
			});
			const final = await handle.result();

			expect(final.results.finalDecision).toBe("reject");
			expect((await t.vigil.transactions.get("txn-ovr")).status).toBe("rejected");
			const [amendment] = await listAmendments(t.ctx, "txn-ovr");
			expect(amendment).toMatchObject({
				kind: "manual_override",
				actor: "compliance-officer",
				reason: "Known mule account",
			});
		});

		it("validates signals and refuses them once the workflow is finished", async () => {
			const t = await instance({ analyzer: escalating() });

			const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-sig" }));
			await waitForState(t.vigil, handle.workflowId, (s) => s.status === "waiting");

			await expect(
				t.vigil.workflows.signalHumanReview("txn-sig", { decision: "approve", reviewer: " " }),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
			await expect(
				t.vigil.workflows.override("txn-sig", { decision: "reject", actor: "officer", reason: "" }),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });

			await t.vigil.workflows.signalHumanReview("txn-sig", { decision: "reject", reviewer: "analyst-1" });
			await handle.result();

			await expect(
				t.vigil.workflows.signalHumanReview("txn-sig", { decision: "approve", reviewer: "analyst-1" }),
			).rejects.toMatchObject({ code: "CONFLICT" });
		});

		it("rejects unknown workflows and reviews", async () => {
			const t = await instance();

			await expect(t.vigil.workflows.getState("txn-nope")).rejects.toMatchObject({ code: "NOT_FOUND" });
			await expect(t.vigil.reviews.get("review:txn-nope")).rejects.toMatchObject({ code: "NOT_FOUND" });
		});
	});

	// =========================================================================
	// DURABILITY
	// =========================================================================

	describe("durability", () => {
		it("resumes a stalled workflow from its last checkpoint in another process", async () => {
			const adapter = memoryAdapter();
			const stalled = await instance({ adapter, analyzer: hangingAnalyzer() });

			const handle = await stalled.vigil.transactions.submit(transactionInput({ id: "txn-crash" }));
			await waitForState(stalled.vigil, handle.workflowId, (s) => s.currentState === "enriched");

			const analyzer = scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) });
			const rescuer = await instance({ adapter, analyzer });
			expect(await rescuer.vigil.workflows.resume()).toEqual(["wf:txn-crash"]);

			const final = await rescuer.vigil.workflows.result("txn-crash");
			expect(final.status).toBe("completed");
			expect(final.results.finalDecision).toBe("approve");

			const holds = await rescuer.vigil.ledger.listHolds(SENDER);
			expect(holds).toHaveLength(1);
			expect(holds[0]?.releaseReason).toBe("settled");
			expect((await rescuer.vigil.ledger.getAccount(SENDER)).balance).toBe("497500.00");
		});

		it("resumes only workflows whose checkpoint has gone stale", async () => {
			const adapter = memoryAdapter();
			const stalled = await instance({ adapter, analyzer: hangingAnalyzer() });
			const handle = await stalled.vigil.transactions.submit(transactionInput({ id: "txn-stale" }));
			await waitForState(stalled.vigil, handle.workflowId, (s) => s.currentState === "enriched");

			const rescuer = await instance({
				adapter,
				analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) }),
			});
			expect(await rescuer.vigil.workflows.resume({ staleAfterMs: 60_000 })).toEqual([]);

			rescuer.clock.advance(120_000);
			expect(await rescuer.vigil.workflows.resume({ staleAfterMs: 60_000 })).toEqual(["wf:txn-stale"]);
			expect((await rescuer.vigil.workflows.result("txn-stale")).status).toBe("completed");
		});

		it("picks up a waiting workflow when a signal arrives at another process", async () => {
			const adapter = memoryAdapter();
			const analyzer = scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("escalate", 75) });
			const first = await instance({ adapter, analyzer });
			const handle = await first.vigil.transactions.submit(transactionInput({ id: "txn-hop" }));
			await waitForState(first.vigil, handle.workflowId, (s) => s.status === "waiting");

			const second = await instance({ adapter, analyzer });
			await second.vigil.reviews.complete("review:txn-hop", { decision: "reject", reviewer: "analyst-2" });

			const final = await second.vigil.workflows.result("txn-hop");
			expect(final.results.finalDecision).toBe("reject");
			expect(final.results.appliedSignalIds).toHaveLength(1);
			expect((await second.vigil.transactions.get("txn-hop")).status).toBe("rejected");
		});

		it("compensates an unrecoverable failure", async () => {
			const adapter = faultyAdapter(memoryAdapter());
			const t = await instance({
				adapter,
				analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("escalate", 75) }),
			});
			adapter.inject({ method: "create", model: "human_review", error: () => new Error("disk full") });

			const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-fail" }));

			await expect(handle.result()).rejects.toMatchObject({
				code: "WORKFLOW_FAILED",
				details: { stage: "decided", transactionId: "txn-fail" },
			});
			adapter.clear();

			const state = await t.vigil.workflows.getState("txn-fail");
			expect(state.status).toBe("failed");
			expect(state.currentState).toBe("failed");
			expect(state.error).toBe("disk full");
			expect((await t.vigil.transactions.get("txn-fail")).status).toBe("failed");

			const [hold] = await t.vigil.ledger.listHolds(SENDER);
			expect(hold?.releaseReason).toBe("compensation");
			expect((await t.vigil.ledger.getAccount(SENDER)).availableBalance).toBe("500000.00");

			const kinds = (await listAuditEvents(t.ctx, "txn-fail")).map((e) => e.kind);
			expect(kinds).toContain("compensation");

			// A second caller sees the same failure from the store
			await expect(t.vigil.workflows.result("txn-fail")).rejects.toMatchObject({ code: "WORKFLOW_FAILED" });
		});

		it("releases a hold placed before its checkpoint could be written", async () => {
			const adapter = faultyAdapter(memoryAdapter());
			const t = await instance({
				adapter,
				analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) }),
			});
			adapter.inject({ method: "update", model: "workflow_execution", error: () => new Error("disk full") });

			const handle = await t.vigil.transactions.submit(transactionInput({ id: "txn-unrecorded" }));

			await expect(handle.result()).rejects.toMatchObject({
				code: "WORKFLOW_FAILED",
				details: { stage: "initialized", transactionId: "txn-unrecorded" },
			});
			adapter.clear();

			expect((await t.vigil.transactions.get("txn-unrecorded")).status).toBe("failed");
			const holds = await t.vigil.ledger.listHolds(SENDER);
			expect(holds).toHaveLength(1);
			expect(holds[0]).toMatchObject({ released: true, releaseReason: "compensation" });
			expect((await t.vigil.ledger.getAccount(SENDER)).availableBalance).toBe("500000.00");
			await assertHoldsReconcile(t.ctx, SENDER);
		});

		it("counts retried activities", async () => {
			const adapter = faultyAdapter(memoryAdapter());
			const t = await instance({
				adapter,
				analyzer: scriptedAnalyzer({ risk: riskReply(15), decision: decisionReply("approve", 92) }),
			});
			adapter.inject({ method: "create", model: "decision", times: 1 });

			const final = await (await t.vigil.transactions.submit(transactionInput({ id: "txn-retry" }))).result();

			expect(final.status).toBe("completed");
			expect(final.retryCount).toBe(1);
			expect(adapter.triggered).toBe(1);
		});
	});
});
