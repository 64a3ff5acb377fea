// =============================================================================
// ACTIVITIES -- the side-effecting steps a workflow runs
// =============================================================================
// Each activity is safe to run again after a crash: holds are keyed by
// (account, transaction), transfers by journal id, decisions, reviews and
// notifications by transaction id.

import type {
	Decision,
	DecisionDraft,
	DecisionValue,
	EnrichmentResult,
	Hold,
	NetworkAnalysis,
	RiskAssessment,
	SimilarCase,
	Transaction,
	TransactionStatus,
	VigilContext,
	WorkflowExecutionState,
} from "@vigil/core";
import { errorMessage, formatAmount, VigilError } from "@vigil/core";
import { Decimal } from "decimal.js";
import { decide } from "../decision/decision-engine.js";
import { parseRiskResponse } from "../decision/parser.js";
import { buildRiskPrompt, RISK_SYSTEM_PROMPT } from "../decision/prompts.js";
import { getOrCreateAccount } from "../managers/account-manager.js";
import { decisionId, recordAmendments, storeDecision } from "../managers/decision-manager.js";
import { getCustomerHistory, getVelocity, hasPriorTransfer, listSentSince } from "../managers/history-manager.js";
import { placeHold } from "../managers/hold-manager.js";
import { queueForReview } from "../managers/review-manager.js";
import { addRiskFlags, storeEmbedding } from "../managers/transaction-manager.js";
import { transfer } from "../managers/transfer-manager.js";
import { buildEnrichment } from "../risk/enrichment.js";
import type { AiRiskResult } from "../risk/risk-engine.js";
import { checkPatterns, composeRiskScore, finalizeRiskAssessment, runComplianceChecks } from "../risk/risk-engine.js";
import { embedText, transactionText } from "../search/embedding.js";
import { analyzeNetwork } from "../search/network.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function velocitySubject(txn: Transaction): string {
	return txn.sender.customerId || txn.senderAccountId;
}

// =============================================================================
// FUNDS
// =============================================================================

/**
 * Make sure both ledger accounts exist, then reserve the amount on the
 * sender. Unknown senders are opened with max(floor, 5 x amount).
 */
export async function reserveFunds(ctx: VigilContext, txn: Transaction): Promise<Hold> {
	const { advanced } = ctx.options;
	const floor = new Decimal(advanced.defaultSenderBalanceFloor);
	const scaled = new Decimal(txn.amount).times(5);

	await getOrCreateAccount(ctx, {
		accountId: txn.senderAccountId,
		ownerId: txn.sender.customerId || txn.senderAccountId,
		initialBalance: formatAmount(Decimal.max(floor, scaled), txn.currency),
		currency: txn.currency,
	});
	await getOrCreateAccount(ctx, {
		accountId: txn.recipientAccountId,
		ownerId: txn.recipient.customerId || txn.recipientAccountId,
		initialBalance: advanced.defaultRecipientBalance,
		currency: txn.currency,
	});

	return placeHold(ctx, {
		accountId: txn.senderAccountId,
		amount: txn.amount,
		transactionId: txn.id,
		reason: `Transaction ${txn.id}`,
	});
}

/** Decision recorded when the ledger refuses the hold. */
export function ledgerRejection(error: VigilError): DecisionDraft {
	return {
		decision: "reject",
		confidence: 100,
		reasoning: `Transaction rejected by ledger: ${error.message}`,
		riskFactors: [error.code.toLowerCase()],
		complianceNotes: null,
		rulesTriggered: [],
		source: "ledger",
	};
}

// =============================================================================
// ANALYSIS
// =============================================================================

export async function enrichTransaction(ctx: VigilContext, txn: Transaction): Promise<EnrichmentResult> {
	const subject = velocitySubject(txn);
	const [velocity, customerHistory, seenRecipient] = await Promise.all([
		getVelocity(ctx, subject, { excludeTransactionId: txn.id, currency: txn.currency }),
		getCustomerHistory(ctx, subject, { excludeTransactionId: txn.id, currency: txn.currency }),
		hasPriorTransfer(ctx, {
			customerId: subject,
			recipientAccountId: txn.recipientAccountId,
			excludeTransactionId: txn.id,
		}),
	]);

	const enrichment = buildEnrichment({
		transaction: txn,
		velocity,
		customerHistory,
		newRecipient: !seenRecipient,
		rules: ctx.rules,
		highRiskCountries: ctx.options.advanced.highRiskCountries,
	});
	await addRiskFlags(ctx, txn.id, enrichment.flags);
	return enrichment;
}

/**
 * Compliance checks, pattern checks and the AI risk score merged into one
 * assessment. The AI scorer is skipped when a critical check fails.
 */
export async function assessRisk(
	ctx: VigilContext,
	txn: Transaction,
	enrichment: EnrichmentResult | null,
): Promise<RiskAssessment> {
	const { advanced } = ctx.options;
	const flags = enrichment?.flags ?? txn.riskFlags;
	const compliance = runComplianceChecks({
		transaction: txn,
		flags,
		sanctionedCountries: advanced.sanctionedCountries,
		highRiskCountries: advanced.highRiskCountries,
	});

	const recent = await listSentSince(ctx, velocitySubject(txn), new Date(ctx.now().getTime() - DAY_MS), {
		excludeTransactionId: txn.id,
		limit: 50,
	});
	const patterns = checkPatterns({
		amount: txn.amount,
		velocity: enrichment?.velocity ?? null,
		recentAmounts: recent.map((t) => t.amount),
	});

	let ai: AiRiskResult | null = null;
	let aiFailed = false;
	if (compliance.criticalFailures.length === 0 && ctx.analyzer) {
		try {
			const raw = await ctx.analyzer.analyze({
				purpose: "risk",
				prompt: buildRiskPrompt({ transaction: txn, flags }),
				system: RISK_SYSTEM_PROMPT,
			});
			ai = parseRiskResponse(raw);
			aiFailed = ai === null;
		} catch (err) {
			aiFailed = true;
			ctx.logger.warn("AI risk scoring failed, using fallback score", {
				transactionId: txn.id,
				error: errorMessage(err),
			});
		}
	}

	return finalizeRiskAssessment({
		amount: txn.amount,
		composedScore: composeRiskScore({ type: txn.type, amount: txn.amount, flags }),
		ai,
		aiFailed,
		ruleAction: enrichment?.rules.recommendedAction ?? null,
		flags,
		patterns,
		checks: compliance.checks,
		criticalFailures: compliance.criticalFailures,
	});
}

/** Assessment used when the risk activity itself cannot complete. */
export function fallbackRiskAssessment(ctx: VigilContext, txn: Transaction, flags: string[]): RiskAssessment {
	const { advanced } = ctx.options;
	const compliance = runComplianceChecks({
		transaction: txn,
		flags,
		sanctionedCountries: advanced.sanctionedCountries,
		highRiskCountries: advanced.highRiskCountries,
	});
	return finalizeRiskAssessment({
		amount: txn.amount,
		composedScore: composeRiskScore({ type: txn.type, amount: txn.amount, flags }),
		ai: null,
		aiFailed: true,
		ruleAction: null,
		flags,
		patterns: [],
		checks: compliance.checks,
		criticalFailures: compliance.criticalFailures,
	});
}

export async function findSimilarCases(
	ctx: VigilContext,
	txn: Transaction,
): Promise<{ embedding: number[]; cases: SimilarCase[] }> {
	const { vector } = await embedText(ctx, transactionText(txn));
	await storeEmbedding(ctx, txn.id, vector);
	const cases = await ctx.similarityIndex.findSimilar({
		vector,
		transactionType: txn.type,
		filters: {
			excludeTransactionId: txn.id,
			amount: txn.amount,
			currency: txn.currency,
			senderCountry: txn.sender.country,
			recipientCountry: txn.recipient.country,
			senderCustomerId: txn.senderCustomerId,
		},
		limit: ctx.options.advanced.maxSimilarCases,
	});
	return { embedding: vector, cases };
}

export async function analyzeTransactionNetwork(ctx: VigilContext, txn: Transaction): Promise<NetworkAnalysis> {
	const network = await analyzeNetwork(ctx, txn);
	await addRiskFlags(ctx, txn.id, network.flags);
	return network;
}

export async function decideTransaction(
	ctx: VigilContext,
	txn: Transaction,
	state: WorkflowExecutionState,
	risk: RiskAssessment,
): Promise<DecisionDraft> {
	const { results } = state;
	const analyzer = ctx.analyzer;
	const flags = [...new Set([...txn.riskFlags, ...(results.enrichment?.flags ?? []), ...(results.network?.flags ?? [])])];

	return decide(
		{
			analyze: analyzer ? (request) => analyzer.analyze(request) : null,
			thresholds: {
				approve: ctx.options.advanced.confidenceThresholdApprove,
				escalate: ctx.options.advanced.confidenceThresholdEscalate,
			},
			logger: ctx.logger,
		},
		{
			transaction: txn,
			riskAssessment: risk,
			similarCases: results.similarCases,
			enrichment: results.enrichment,
			network: results.network,
			flags,
		},
	);
}

// =============================================================================
// RECORDS
// =============================================================================

/** Write the original decision, then any amendments collected since. */
export async function persistDecision(
	ctx: VigilContext,
	state: WorkflowExecutionState,
	draft: DecisionDraft,
): Promise<Decision> {
	const { results } = state;
	const decidedAt = results.decidedAt ?? ctx.now().toISOString();
	const startedAt = results.analysisStartedAt ?? state.startedAt;

	const decision = await storeDecision(ctx, {
		id: decisionId(state.transactionId),
		transactionId: state.transactionId,
		workflowId: state.id,
		decision: draft.decision,
		confidence: draft.confidence,
		riskScore: results.riskAssessment?.riskScore ?? 0,
		reasoning: draft.reasoning,
		riskFactors: draft.riskFactors,
		rulesTriggered: draft.rulesTriggered,
		similarCases: results.similarCases.map((c) => c.transactionId),
		complianceNotes: draft.complianceNotes,
		source: draft.source,
		processingTimeMs: Math.max(0, new Date(decidedAt).getTime() - new Date(startedAt).getTime()),
		createdAt: decidedAt,
	});
	await recordAmendments(ctx, state.transactionId, results.amendments);
	return decision;
}

export async function enqueueReview(
	ctx: VigilContext,
	txn: Transaction,
	state: WorkflowExecutionState,
	draft: DecisionDraft,
): Promise<string> {
	const review = await queueForReview(ctx, {
		transaction: txn,
		workflowId: state.id,
		draft,
		riskScore: state.results.riskAssessment?.riskScore ?? 0,
	});
	return review.id;
}

// =============================================================================
// SETTLEMENT
// =============================================================================

/**
 * Move the funds for an approved transaction. Insufficient funds at this
 * point is a business outcome: the caller flips the decision to reject.
 */
export async function settleApproved(
	ctx: VigilContext,
	txn: Transaction,
	holdId: string | null,
): Promise<{ committed: true; journalEntryId: string } | { committed: false; error: VigilError }> {
	try {
		const result = await transfer(ctx, {
			senderAccountId: txn.senderAccountId,
			recipientAccountId: txn.recipientAccountId,
			amount: txn.amount,
			transactionId: txn.id,
			description: txn.description ?? `Transaction ${txn.id}`,
			holdId: holdId ?? undefined,
		});
		return { committed: true, journalEntryId: result.journalEntryId };
	} catch (err) {
		if (err instanceof VigilError && err.isBusinessRejection) {
			return { committed: false, error: err };
		}
		throw err;
	}
}

export function statusForDecision(decision: DecisionValue): TransactionStatus {
	switch (decision) {
		case "approve":
			return "approved";
		case "reject":
			return "rejected";
		case "escalate":
			return "escalated";
	}
}
