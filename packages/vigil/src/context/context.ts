// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds VigilContext from VigilOptions. Resolves the adapter and logger,
// merges advanced defaults and wires default collaborators.

import type {
	ResolvedAdvancedOptions,
	VigilAdapter,
	VigilAdvancedOptions,
	VigilContext,
	VigilOptions,
} from "@vigil/core";
import { parseInterval } from "@vigil/core";
import { createConsoleLogger } from "@vigil/core/logger";
import { validateConfig } from "../config/index.js";
import { DEFAULT_RULES } from "../risk/rules.js";
import { createDocumentSimilarityIndex } from "../search/similarity.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

export const HIGH_RISK_COUNTRIES = ["RU", "IR", "KP", "SY", "AF", "YE"];

const DEFAULT_ADVANCED = {
	confidenceThresholdApprove: 85,
	confidenceThresholdEscalate: 70,
	autoApprovalLimit: "50000",
	humanReviewTimeout: "7d",
	managerApprovalTimeout: "24h",
	holdTtl: "24h",
	embeddingDimension: 1024,
	maxSimilarCases: 10,
	similarityThreshold: 0.75,
	velocityWindows: ["1h", "24h"],
	highRiskCountries: HIGH_RISK_COUNTRIES,
	defaultSenderBalanceFloor: "500000",
	defaultRecipientBalance: "50000",
	overdraftLimit: "0",
	storeMaxAttempts: 3,
	retryBaseDelayMs: 1_000,
	retryMaxDelayMs: 30_000,
} satisfies Required<Omit<VigilAdvancedOptions, "sanctionedCountries">>;

export function resolveAdvanced(advanced: VigilAdvancedOptions = {}): ResolvedAdvancedOptions {
	const merged = { ...DEFAULT_ADVANCED, ...advanced };
	return {
		confidenceThresholdApprove: merged.confidenceThresholdApprove,
		confidenceThresholdEscalate: merged.confidenceThresholdEscalate,
		autoApprovalLimit: merged.autoApprovalLimit,
		humanReviewTimeoutMs: parseInterval(merged.humanReviewTimeout),
		managerApprovalTimeoutMs: parseInterval(merged.managerApprovalTimeout),
		holdTtlMs: parseInterval(merged.holdTtl),
		embeddingDimension: merged.embeddingDimension,
		maxSimilarCases: merged.maxSimilarCases,
		similarityThreshold: merged.similarityThreshold,
		velocityWindows: merged.velocityWindows,
		highRiskCountries: merged.highRiskCountries,
		sanctionedCountries: advanced.sanctionedCountries ?? merged.highRiskCountries,
		defaultSenderBalanceFloor: merged.defaultSenderBalanceFloor,
		defaultRecipientBalance: merged.defaultRecipientBalance,
		overdraftLimit: merged.overdraftLimit,
		storeMaxAttempts: merged.storeMaxAttempts,
		retryBaseDelayMs: merged.retryBaseDelayMs,
		retryMaxDelayMs: merged.retryMaxDelayMs,
	};
}

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export function buildContext(options: VigilOptions): VigilContext {
	validateConfig(options);

	const adapter: VigilAdapter = typeof options.database === "function" ? options.database() : options.database;
	const logger = options.logger ?? createConsoleLogger();
	const advanced = resolveAdvanced(options.advanced);
	const rules = options.rules ?? DEFAULT_RULES;

	if (!options.analyzer) {
		logger.warn("No AI analyzer configured. Risk scoring and decisions will use their fallbacks.");
	}

	return {
		adapter,
		logger,
		options: {
			currency: options.currency ?? "USD",
			advanced,
			coreWorkers: options.coreWorkers,
		},
		rules,
		analyzer: options.analyzer ?? null,
		embedder: options.embedder ?? null,
		similarityIndex:
			options.similarityIndex ??
			createDocumentSimilarityIndex(adapter, { threshold: advanced.similarityThreshold }),
		notificationChannel: options.notificationChannel ?? null,
		now: options.now ?? (() => new Date()),
	};
}
