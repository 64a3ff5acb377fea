// =============================================================================
// VIGIL -- Main entry point
// =============================================================================
// Creates the Vigil instance: transaction submission, workflow control, the
// ledger, history reads, the review queue and background workers.

import type {
	Account,
	CustomerHistory,
	DecisionValue,
	FundsCheck,
	Hold,
	HumanReview,
	JournalEntry,
	ReviewPriority,
	SubmitTransactionInput,
	Transaction,
	TransactionStatus,
	TransferResult,
	VelocitySnapshot,
	VigilContext,
	VigilOptions,
	VigilWorkerDefinition,
	WorkflowExecutionState,
	WorkflowSignalRecord,
	WorkflowStateView,
} from "@vigil/core";
import { buildContext } from "../context/context.js";
import { createWorkerRunner, type VigilWorkerRunner } from "../infrastructure/worker-runner.js";
import * as accounts from "../managers/account-manager.js";
import * as history from "../managers/history-manager.js";
import * as holds from "../managers/hold-manager.js";
import * as reviews from "../managers/review-manager.js";
import * as transactions from "../managers/transaction-manager.js";
import * as transfers from "../managers/transfer-manager.js";
import {
	createWorkflowEngine,
	type WorkflowEngine,
	type WorkflowEngineOptions,
	type WorkflowHandle,
} from "../workflow/engine.js";
import { workflowId } from "../workflow/state.js";

// =============================================================================
// VIGIL INTERFACE
// =============================================================================

export interface Vigil {
	transactions: {
		/** Persist the transaction and start its workflow. */
		submit: (input: SubmitTransactionInput) => Promise<WorkflowHandle>;
		get: (id: string) => Promise<Transaction>;
		list: (params?: {
			status?: TransactionStatus;
			customerId?: string;
			limit?: number;
			offset?: number;
		}) => Promise<Transaction[]>;
	};
	workflows: {
		/** Accepts a workflow id or a transaction id. */
		getState: (id: string) => Promise<WorkflowStateView>;
		result: (id: string) => Promise<WorkflowExecutionState>;
		resume: (params?: { staleAfterMs?: number; limit?: number }) => Promise<string[]>;
		signalHumanReview: (
			id: string,
			params: { decision: DecisionValue; reviewer: string; notes?: string },
		) => Promise<WorkflowSignalRecord>;
		signalManagerApproval: (
			id: string,
			params: { approved: boolean; actor: string; reason?: string },
		) => Promise<WorkflowSignalRecord>;
		override: (
			id: string,
			params: { decision: DecisionValue; actor: string; reason: string },
		) => Promise<WorkflowSignalRecord>;
	};
	ledger: {
		getOrCreateAccount: (params: accounts.CreateAccountParams) => Promise<Account>;
		checkFunds: (accountId: string, amount: string) => Promise<FundsCheck>;
		placeHold: (params: {
			accountId: string;
			amount: string;
			transactionId: string;
			reason: string;
			ttlMs?: number;
		}) => Promise<Hold>;
		releaseHold: (holdId: string, reason?: string) => Promise<boolean>;
		transfer: (params: transfers.TransferParams) => Promise<TransferResult>;
		getAccount: (accountId: string) => Promise<Account>;
		getJournalEntry: (transactionId: string) => Promise<JournalEntry | null>;
		listHolds: (accountId: string, options?: { activeOnly?: boolean }) => Promise<Hold[]>;
		/** Holds of waiting workflows are kept. */
		expireHolds: (params?: { limit?: number }) => Promise<{ expired: number; skipped: number }>;
	};
	history: {
		getVelocity: (
			customerId: string,
			options?: { windows?: string[]; currency?: string },
		) => Promise<VelocitySnapshot>;
		getCustomerHistory: (customerId: string) => Promise<CustomerHistory>;
	};
	reviews: {
		listPending: (params?: { priority?: ReviewPriority; limit?: number }) => Promise<HumanReview[]>;
		get: (id: string) => Promise<HumanReview>;
		/** Send the reviewer's decision to the waiting workflow. */
		complete: (
			id: string,
			params: { decision: DecisionValue; reviewer: string; notes?: string },
		) => Promise<WorkflowSignalRecord>;
	};
	workers: {
		start: () => Promise<void>;
		stop: () => Promise<void>;
	};
	$context: Promise<VigilContext>;
	$options: VigilOptions;
}

export interface CreateVigilOptions extends VigilOptions {
	workflow?: WorkflowEngineOptions;
	/** Extra background workers run beside the core ones. */
	workers?: VigilWorkerDefinition[];
}

function toWorkflowId(id: string): string {
	return id.startsWith("wf:") ? id : workflowId(id);
}

// =============================================================================
// CREATE VIGIL
// =============================================================================

export function createVigil(options: CreateVigilOptions): Vigil {
	let workerRunner: VigilWorkerRunner | null = null;

	const ctxPromise = (async () => buildContext(options))();
	const enginePromise = (async () => createWorkflowEngine(await ctxPromise, options.workflow))();

	const getCtx = () => ctxPromise;
	const getEngine = () => enginePromise;

	return {
		transactions: {
			submit: async (input) => {
				const engine = await getEngine();
				return engine.submit(input);
			},
			get: async (id) => {
				const ctx = await getCtx();
				return transactions.getTransaction(ctx, id);
			},
			list: async (params) => {
				const ctx = await getCtx();
				return transactions.listTransactions(ctx, params);
			},
		},
		workflows: {
			getState: async (id) => {
				const engine = await getEngine();
				return engine.getState(toWorkflowId(id));
			},
			result: async (id) => {
				const engine = await getEngine();
				return engine.result(toWorkflowId(id));
			},
			resume: async (params) => {
				const engine = await getEngine();
				return engine.resume(params);
			},
			signalHumanReview: async (id, params) => {
				const engine = await getEngine();
				return engine.signal(toWorkflowId(id), { kind: "human_review_complete", ...params });
			},
			signalManagerApproval: async (id, params) => {
				const engine = await getEngine();
				return engine.signal(toWorkflowId(id), { kind: "manager_approval", ...params });
			},
			override: async (id, params) => {
				const engine = await getEngine();
				return engine.signal(toWorkflowId(id), { kind: "manual_override", ...params });
			},
		},
		ledger: {
			getOrCreateAccount: async (params) => {
				const ctx = await getCtx();
				return accounts.getOrCreateAccount(ctx, params);
			},
			checkFunds: async (accountId, amount) => {
				const ctx = await getCtx();
				return accounts.checkFunds(ctx, accountId, amount);
			},
			placeHold: async (params) => {
				const ctx = await getCtx();
				return holds.placeHold(ctx, params);
			},
			releaseHold: async (holdId, reason) => {
				const ctx = await getCtx();
				return holds.releaseHold(ctx, holdId, reason);
			},
			transfer: async (params) => {
				const ctx = await getCtx();
				return transfers.transfer(ctx, params);
			},
			getAccount: async (accountId) => {
				const ctx = await getCtx();
				return accounts.getAccount(ctx, accountId);
			},
			getJournalEntry: async (transactionId) => {
				const ctx = await getCtx();
				return transfers.getJournalEntry(ctx, transactionId);
			},
			listHolds: async (accountId, opts) => {
				const ctx = await getCtx();
				return holds.listHolds(ctx, accountId, opts);
			},
			expireHolds: async (params) => {
				const [ctx, engine] = await Promise.all([getCtx(), getEngine()]);
				return holds.expireHolds(ctx, {
					limit: params?.limit,
					isProtected: (hold) => engine.isWaiting(hold.transactionId),
				});
			},
		},
		history: {
			getVelocity: async (customerId, opts) => {
				const ctx = await getCtx();
				return history.getVelocity(ctx, customerId, opts);
			},
			getCustomerHistory: async (customerId) => {
				const ctx = await getCtx();
				return history.getCustomerHistory(ctx, customerId);
			},
		},
		reviews: {
			listPending: async (params) => {
				const ctx = await getCtx();
				return reviews.listPendingReviews(ctx, params);
			},
			get: async (id) => {
				const ctx = await getCtx();
				return reviews.requireReview(ctx, id);
			},
			complete: async (id, params) => {
				const [ctx, engine] = await Promise.all([getCtx(), getEngine()]);
				const review = await reviews.requireReview(ctx, id);
				return engine.signal(review.workflowId, { kind: "human_review_complete", ...params });
			},
		},
		workers: {
			start: async () => {
				if (workerRunner) return;
				const [ctx, engine] = await Promise.all([getCtx(), getEngine()]);
				workerRunner = createWorkerRunner(ctx, { engine, workers: options.workers });
				workerRunner.start();
			},
			stop: async () => {
				if (workerRunner) {
					await workerRunner.stop();
					workerRunner = null;
				}
			},
		},
		$context: ctxPromise,
		$options: options,
	};
}
