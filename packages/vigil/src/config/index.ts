import type { VigilOptions } from "@vigil/core";
import { parseAmount, parseInterval, VigilError } from "@vigil/core";

function fail(message: string): never {
	throw VigilError.invalidArgument(`vigil config: ${message}`);
}

function checkInterval(name: string, value: string | undefined): void {
	if (value === undefined) return;
	try {
		if (parseInterval(value) <= 0) fail(`'${name}' must be a positive interval`);
	} catch (error) {
		if (error instanceof VigilError) throw error;
		fail(`'${name}' is not a valid interval: "${value}"`);
	}
}

function checkAmount(name: string, value: string | undefined, allowZero = false): void {
	if (value === undefined) return;
	try {
		parseAmount(value, { field: name, allowZero });
	} catch {
		fail(`'${name}' must be a ${allowZero ? "non-negative" : "positive"} decimal, got "${value}"`);
	}
}

function checkPercent(name: string, value: number | undefined): void {
	if (value === undefined) return;
	if (!Number.isFinite(value) || value < 0 || value > 100) {
		fail(`'${name}' must be between 0 and 100`);
	}
}

function checkPositiveInt(name: string, value: number | undefined): void {
	if (value === undefined) return;
	if (!Number.isInteger(value) || value <= 0) {
		fail(`'${name}' must be a positive integer`);
	}
}

function checkCountries(name: string, value: string[] | undefined): void {
	if (value === undefined) return;
	for (const country of value) {
		if (!/^[A-Z]{2}$/.test(country)) {
			fail(`'${name}' must contain ISO 3166 alpha-2 codes, got "${country}"`);
		}
	}
}

/**
 * Validate vigil configuration options at runtime.
 * Throws VigilError (INVALID_ARGUMENT) naming the offending option.
 */
export function validateConfig(options: VigilOptions): void {
	if (!options.database) {
		fail("'database' adapter is required");
	}

	if (options.currency !== undefined && !/^[A-Z]{3}$/.test(options.currency)) {
		fail(`unknown currency "${options.currency}". Use an ISO 4217 code.`);
	}

	const adv = options.advanced;
	if (adv) {
		checkPercent("advanced.confidenceThresholdApprove", adv.confidenceThresholdApprove);
		checkPercent("advanced.confidenceThresholdEscalate", adv.confidenceThresholdEscalate);
		if (
			adv.confidenceThresholdApprove !== undefined &&
			adv.confidenceThresholdEscalate !== undefined &&
			adv.confidenceThresholdEscalate > adv.confidenceThresholdApprove
		) {
			fail("'advanced.confidenceThresholdEscalate' cannot exceed 'advanced.confidenceThresholdApprove'");
		}

		checkAmount("advanced.autoApprovalLimit", adv.autoApprovalLimit);
		checkAmount("advanced.defaultSenderBalanceFloor", adv.defaultSenderBalanceFloor, true);
		checkAmount("advanced.defaultRecipientBalance", adv.defaultRecipientBalance, true);
		checkAmount("advanced.overdraftLimit", adv.overdraftLimit, true);

		checkInterval("advanced.humanReviewTimeout", adv.humanReviewTimeout);
		checkInterval("advanced.managerApprovalTimeout", adv.managerApprovalTimeout);
		checkInterval("advanced.holdTtl", adv.holdTtl);
		for (const window of adv.velocityWindows ?? []) {
			checkInterval("advanced.velocityWindows", window);
		}

		checkPositiveInt("advanced.embeddingDimension", adv.embeddingDimension);
		checkPositiveInt("advanced.maxSimilarCases", adv.maxSimilarCases);
		checkPositiveInt("advanced.storeMaxAttempts", adv.storeMaxAttempts);

		if (
			adv.similarityThreshold !== undefined &&
			(!Number.isFinite(adv.similarityThreshold) || adv.similarityThreshold < 0 || adv.similarityThreshold > 1)
		) {
			fail("'advanced.similarityThreshold' must be between 0 and 1");
		}

		for (const [name, value] of [
			["advanced.retryBaseDelayMs", adv.retryBaseDelayMs],
			["advanced.retryMaxDelayMs", adv.retryMaxDelayMs],
		] as const) {
			if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
				fail(`'${name}' must be a non-negative finite number`);
			}
		}

		checkCountries("advanced.highRiskCountries", adv.highRiskCountries);
		checkCountries("advanced.sanctionedCountries", adv.sanctionedCountries);
	}

	const workers = options.coreWorkers;
	if (workers) {
		for (const [name, cfg] of Object.entries(workers)) {
			if (typeof cfg === "object" && cfg !== null) {
				checkInterval(`coreWorkers.${name}.interval`, cfg.interval);
			}
		}
	}
}

/**
 * Identity function for defining vigil configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineVigilConfig } from "vigil";
 *
 * export default defineVigilConfig({
 *   database: memoryAdapter(),
 *   advanced: { autoApprovalLimit: "25000" },
 * });
 * ```
 */
export function defineVigilConfig(options: VigilOptions): VigilOptions {
	validateConfig(options);
	return options;
}
