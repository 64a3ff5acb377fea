import type { SimilarityIndex, VigilLogger } from "@vigil/core";
import { VigilError } from "@vigil/core";
import { memoryAdapter } from "@vigil/memory-adapter";
import { describe, expect, it, vi } from "vitest";
import { defineVigilConfig, validateConfig } from "../config/index.js";
import { buildContext, HIGH_RISK_COUNTRIES, resolveAdvanced } from "../context/context.js";
import { DEFAULT_RULES } from "../risk/rules.js";

function mockLogger(): VigilLogger {
	return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function configError(fn: () => unknown): VigilError {
	try {
		fn();
	} catch (error) {
		if (error instanceof VigilError) return error;
		throw error;
	}
	throw new Error("expected a config error");
}

// =============================================================================
// CONTEXT
// =============================================================================

describe("buildContext", () => {
	it("uses an adapter instance directly", () => {
		const adapter = memoryAdapter();
		const ctx = buildContext({ database: adapter, logger: mockLogger() });
		expect(ctx.adapter).toBe(adapter);
	});

	it("calls an adapter factory once", () => {
		const adapter = memoryAdapter();
		const factory = vi.fn(() => adapter);
		const ctx = buildContext({ database: factory, logger: mockLogger() });
		expect(factory).toHaveBeenCalledOnce();
		expect(ctx.adapter).toBe(adapter);
	});

	it("fills defaults for optional collaborators", () => {
		const ctx = buildContext({ database: memoryAdapter(), logger: mockLogger() });
		expect(ctx.options.currency).toBe("USD");
		expect(ctx.rules).toBe(DEFAULT_RULES);
		expect(ctx.analyzer).toBeNull();
		expect(ctx.embedder).toBeNull();
		expect(ctx.notificationChannel).toBeNull();
		expect(ctx.now()).toBeInstanceOf(Date);
	});

	it("warns when no analyzer is configured", () => {
		const logger = mockLogger();
		buildContext({ database: memoryAdapter(), logger });
		expect(logger.warn).toHaveBeenCalledWith(
			"No AI analyzer configured. Risk scoring and decisions will use their fallbacks.",
		);
	});

	it("stays quiet when an analyzer is configured", () => {
		const logger = mockLogger();
		buildContext({ database: memoryAdapter(), logger, analyzer: { analyze: async () => "{}" } });
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it("keeps a provided similarity index, clock and rules", () => {
		const similarityIndex: SimilarityIndex = { findSimilar: async () => [] };
		const now = () => new Date("2026-01-01T00:00:00.000Z");
		const ctx = buildContext({
			database: memoryAdapter(),
			logger: mockLogger(),
			similarityIndex,
			now,
			rules: [],
			currency: "EUR",
		});
		expect(ctx.similarityIndex).toBe(similarityIndex);
		expect(ctx.now().toISOString()).toBe("2026-01-01T00:00:00.000Z");
		expect(ctx.rules).toEqual([]);
		expect(ctx.options.currency).toBe("EUR");
	});

	it("rejects an invalid configuration before touching the adapter", () => {
		const factory = vi.fn(memoryAdapter);
		expect(() => buildContext({ database: factory, currency: "dollars" })).toThrow(VigilError);
		expect(factory).not.toHaveBeenCalled();
	});
});

// =============================================================================
// ADVANCED OPTIONS
// =============================================================================

describe("resolveAdvanced", () => {
	it("resolves defaults", () => {
		expect(resolveAdvanced()).toEqual({
			confidenceThresholdApprove: 85,
			confidenceThresholdEscalate: 70,
			autoApprovalLimit: "50000",
			humanReviewTimeoutMs: 604_800_000,
			managerApprovalTimeoutMs: 86_400_000,
			holdTtlMs: 86_400_000,
			embeddingDimension: 1024,
			maxSimilarCases: 10,
			similarityThreshold: 0.75,
			velocityWindows: ["1h", "24h"],
			highRiskCountries: HIGH_RISK_COUNTRIES,
			sanctionedCountries: HIGH_RISK_COUNTRIES,
			defaultSenderBalanceFloor: "500000",
			defaultRecipientBalance: "50000",
			overdraftLimit: "0",
			storeMaxAttempts: 3,
			retryBaseDelayMs: 1_000,
			retryMaxDelayMs: 30_000,
		});
	});

	it("parses interval overrides", () => {
		const resolved = resolveAdvanced({ humanReviewTimeout: "30m", holdTtl: "90s" });
		expect(resolved.humanReviewTimeoutMs).toBe(1_800_000);
		expect(resolved.holdTtlMs).toBe(90_000);
	});

	it("sanctions the high-risk list unless told otherwise", () => {
		expect(resolveAdvanced({ highRiskCountries: ["NG"] }).sanctionedCountries).toEqual(["NG"]);
		const split = resolveAdvanced({ highRiskCountries: ["NG"], sanctionedCountries: ["KP"] });
		expect(split.highRiskCountries).toEqual(["NG"]);
		expect(split.sanctionedCountries).toEqual(["KP"]);
	});
});

// =============================================================================
// CONFIG VALIDATION
// =============================================================================

describe("validateConfig", () => {
	const database = memoryAdapter();

	it("accepts a minimal configuration", () => {
		expect(() => validateConfig({ database })).not.toThrow();
	});

	it("rejects a non-ISO currency", () => {
		const error = configError(() => validateConfig({ database, currency: "usd" }));
		expect(error.code).toBe("INVALID_ARGUMENT");
		expect(error.message).toBe('vigil config: unknown currency "usd". Use an ISO 4217 code.');
	});

	it("rejects out-of-range thresholds", () => {
		expect(configError(() => validateConfig({ database, advanced: { confidenceThresholdApprove: 101 } })).message).toBe(
			"vigil config: 'advanced.confidenceThresholdApprove' must be between 0 and 100",
		);
		expect(
			configError(() =>
				validateConfig({
					database,
					advanced: { confidenceThresholdApprove: 60, confidenceThresholdEscalate: 70 },
				}),
			).message,
		).toBe("vigil config: 'advanced.confidenceThresholdEscalate' cannot exceed 'advanced.confidenceThresholdApprove'");
	});

	it("rejects malformed intervals", () => {
		expect(configError(() => validateConfig({ database, advanced: { holdTtl: "soon" } })).message).toBe(
			"vigil config: 'advanced.holdTtl' is not a valid interval: \"soon\"",
		);
		expect(configError(() => validateConfig({ database, advanced: { holdTtl: "0s" } })).message).toBe(
			"vigil config: 'advanced.holdTtl' must be a positive interval",
		);
		expect(
			configError(() => validateConfig({ database, coreWorkers: { holdExpiry: { interval: "often" } } })).message,
		).toBe("vigil config: 'coreWorkers.holdExpiry.interval' is not a valid interval: \"often\"");
	});

	it("rejects bad amounts", () => {
		expect(configError(() => validateConfig({ database, advanced: { autoApprovalLimit: "0" } })).message).toBe(
			"vigil config: 'advanced.autoApprovalLimit' must be a positive decimal, got \"0\"",
		);
		expect(() => validateConfig({ database, advanced: { overdraftLimit: "0" } })).not.toThrow();
		expect(configError(() => validateConfig({ database, advanced: { overdraftLimit: "-5" } })).message).toBe(
			"vigil config: 'advanced.overdraftLimit' must be a non-negative decimal, got \"-5\"",
		);
	});

	it("rejects bad counts and ratios", () => {
		expect(configError(() => validateConfig({ database, advanced: { embeddingDimension: 1.5 } })).message).toBe(
			"vigil config: 'advanced.embeddingDimension' must be a positive integer",
		);
		expect(configError(() => validateConfig({ database, advanced: { similarityThreshold: 1.2 } })).message).toBe(
			"vigil config: 'advanced.similarityThreshold' must be between 0 and 1",
		);
		expect(configError(() => validateConfig({ database, advanced: { retryBaseDelayMs: -1 } })).message).toBe(
			"vigil config: 'advanced.retryBaseDelayMs' must be a non-negative finite number",
		);
	});

	it("rejects country codes that are not alpha-2", () => {
		expect(configError(() => validateConfig({ database, advanced: { sanctionedCountries: ["IRN"] } })).message).toBe(
			"vigil config: 'advanced.sanctionedCountries' must contain ISO 3166 alpha-2 codes, got \"IRN\"",
		);
	});
});

describe("defineVigilConfig", () => {
	it("returns the options it validated", () => {
		const options = { database: memoryAdapter(), advanced: { autoApprovalLimit: "25000" } };
		expect(defineVigilConfig(options)).toBe(options);
	});

	it("throws on invalid options", () => {
		expect(() => defineVigilConfig({ database: memoryAdapter(), currency: "X" })).toThrow(
			"vigil config: unknown currency \"X\". Use an ISO 4217 code.",
		);
	});
});
