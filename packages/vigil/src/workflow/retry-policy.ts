// =============================================================================
// RETRY POLICY -- per-activity attempts, timeouts and backoff
// =============================================================================
// Every workflow activity runs through runActivity(). Transient failures are
// retried with exponential backoff; business rejections and other
// deterministic errors surface on the first attempt.

import type { VigilContext } from "@vigil/core";
import { errorMessage, isRetryableError, VigilError } from "@vigil/core";
import { backoffDelay, sleep } from "../managers/ledger-helpers.js";

export type ActivityName =
	| "start"
	| "place_hold"
	| "enrich"
	| "assess_risk"
	| "find_similar"
	| "analyze_network"
	| "decide"
	| "store_decision"
	| "queue_review"
	| "transfer"
	| "release_hold"
	| "update_status"
	| "notify"
	| "checkpoint";

export interface StepPolicy {
	maxAttempts: number;
	timeoutMs: number;
}

const SECOND = 1_000;

export const DEFAULT_STEP_POLICIES: Readonly<Record<ActivityName, StepPolicy>> = {
	start: { maxAttempts: 5, timeoutMs: 30 * SECOND },
	place_hold: { maxAttempts: 5, timeoutMs: 60 * SECOND },
	enrich: { maxAttempts: 3, timeoutMs: 120 * SECOND },
	assess_risk: { maxAttempts: 3, timeoutMs: 120 * SECOND },
	find_similar: { maxAttempts: 3, timeoutMs: 30 * SECOND },
	analyze_network: { maxAttempts: 3, timeoutMs: 120 * SECOND },
	decide: { maxAttempts: 3, timeoutMs: 120 * SECOND },
	// Critical writes get more attempts
	store_decision: { maxAttempts: 10, timeoutMs: 60 * SECOND },
	queue_review: { maxAttempts: 5, timeoutMs: 60 * SECOND },
	transfer: { maxAttempts: 5, timeoutMs: 120 * SECOND },
	release_hold: { maxAttempts: 3, timeoutMs: 30 * SECOND },
	update_status: { maxAttempts: 10, timeoutMs: 30 * SECOND },
	notify: { maxAttempts: 3, timeoutMs: 60 * SECOND },
	checkpoint: { maxAttempts: 10, timeoutMs: 30 * SECOND },
};

function isActivityName(name: string): name is ActivityName {
	return Object.hasOwn(DEFAULT_STEP_POLICIES, name);
}

export type StepPolicyOverrides = Partial<Record<ActivityName, Partial<StepPolicy>>>;

export function resolveStepPolicies(overrides: StepPolicyOverrides = {}): Record<ActivityName, StepPolicy> {
	const resolved: Record<ActivityName, StepPolicy> = { ...DEFAULT_STEP_POLICIES };
	for (const [name, policy] of Object.entries(DEFAULT_STEP_POLICIES)) {
		if (!isActivityName(name)) continue;
		const override = overrides[name];
		if (override) resolved[name] = { ...policy, ...override };
	}
	return resolved;
}

/**
 * Reject with ACTIVITY_TIMEOUT when `operation` outlives `timeoutMs`. The
 * operation itself is not cancelled; a late result is discarded.
 */
export async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(VigilError.activityTimeout(`${label} timed out after ${timeoutMs}ms`));
		}, timeoutMs);
		timer.unref();
	});
	try {
		return await Promise.race([operation(), timeout]);
	} finally {
		clearTimeout(timer);
	}
}

export async function runActivity<T>(
	ctx: VigilContext,
	name: ActivityName,
	policy: StepPolicy,
	operation: () => Promise<T>,
	options: { logData?: Record<string, unknown>; onRetry?: (attempt: number) => void } = {},
): Promise<T> {
	const { retryBaseDelayMs, retryMaxDelayMs } = ctx.options.advanced;

	for (let attempt = 0; ; attempt++) {
		try {
			return await withTimeout(operation, policy.timeoutMs, `Activity ${name}`);
		} catch (err) {
			if (!isRetryableError(err) || attempt + 1 >= policy.maxAttempts) throw err;
			const delay = backoffDelay(attempt, retryBaseDelayMs, retryMaxDelayMs);
			options.onRetry?.(attempt + 1);
			ctx.logger.warn("Activity failed, retrying", {
				...options.logData,
				activity: name,
				attempt: attempt + 1,
				maxAttempts: policy.maxAttempts,
				delayMs: Math.round(delay),
				error: errorMessage(err),
			});
			await sleep(delay);
		}
	}
}
