// =============================================================================
// LEDGER HELPERS
// =============================================================================
// Atomic-unit runner shared by every ledger mutation.

import type { VigilContext, VigilTransactionAdapter } from "@vigil/core";
import { isRetryableError, VigilError } from "@vigil/core";

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff with 50-150% jitter, capped at `maxDelayMs`. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
	const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
	return delay * (0.5 + Math.random());
}

/**
 * Run `operation` as one all-or-nothing unit, retrying on lock or
 * serialization conflicts up to `storeMaxAttempts`. Exhaustion surfaces
 * as STORE_CONTENTION; non-retryable errors pass through untouched.
 */
export async function withStoreTransaction<T>(
	ctx: VigilContext,
	operation: (tx: VigilTransactionAdapter) => Promise<T>,
): Promise<T> {
	const { storeMaxAttempts, retryBaseDelayMs, retryMaxDelayMs } = ctx.options.advanced;

	for (let attempt = 0; ; attempt++) {
		try {
			return await ctx.adapter.transaction(operation);
		} catch (err) {
			if (!isRetryableError(err)) throw err;
			if (attempt + 1 >= storeMaxAttempts) {
				throw VigilError.storeContention(
					`Store unit failed after ${storeMaxAttempts} attempts`,
					err,
				);
			}
			const delay = backoffDelay(attempt, retryBaseDelayMs, retryMaxDelayMs);
			ctx.logger.debug("Store transaction retry due to contention", {
				attempt: attempt + 1,
				maxAttempts: storeMaxAttempts,
				delayMs: Math.round(delay),
			});
			await sleep(delay);
		}
	}
}
