import { Decimal } from "decimal.js";
import type { Vigil, VigilContext, WorkflowStateView } from "vigil";

/**
 * Assert that money is conserved across `accountIds`: the balances sum to
 * `expectedTotal`.
 */
export async function assertLedgerConserved(
	ctx: VigilContext,
	accountIds: string[],
	expectedTotal: string,
): Promise<void> {
	const accounts = await ctx.adapter.findMany({
		model: "account",
		where: [{ field: "id", operator: "in", value: accountIds }],
	});
	const total = accounts.reduce((sum, a) => sum.plus(a.balance), new Decimal(0));
	if (!total.equals(expectedTotal)) {
		throw new Error(`Ledger not conserved: balances sum to ${total.toFixed(2)}, expected ${expectedTotal}`);
	}
}

/**
 * Assert that a specific account has the expected balance.
 */
export async function assertAccountBalance(
	ctx: VigilContext,
	accountId: string,
	expected: { balance?: string; availableBalance?: string },
): Promise<void> {
	const account = await ctx.adapter.findOne({
		model: "account",
		where: [{ field: "id", operator: "eq", value: accountId }],
	});
	if (!account) throw new Error(`Account ${accountId} not found`);
	if (expected.balance !== undefined && !new Decimal(account.balance).equals(expected.balance)) {
		throw new Error(`Account ${accountId}: expected balance ${expected.balance}, got ${account.balance}`);
	}
	if (expected.availableBalance !== undefined && !new Decimal(account.availableBalance).equals(expected.availableBalance)) {
		throw new Error(
			`Account ${accountId}: expected available ${expected.availableBalance}, got ${account.availableBalance}`,
		);
	}
}

/**
 * Assert that available balance equals balance minus the active holds.
 */
export async function assertHoldsReconcile(ctx: VigilContext, accountId: string): Promise<void> {
	const account = await ctx.adapter.findOne({
		model: "account",
		where: [{ field: "id", operator: "eq", value: accountId }],
	});
	if (!account) throw new Error(`Account ${accountId} not found`);
	const holds = await ctx.adapter.findMany({
		model: "hold",
		where: [
			{ field: "accountId", operator: "eq", value: accountId },
			{ field: "released", operator: "eq", value: false },
		],
	});
	const held = holds.reduce((sum, h) => sum.plus(h.amount), new Decimal(0));
	const expected = new Decimal(account.balance).minus(held);
	if (!expected.equals(account.availableBalance)) {
		throw new Error(
			`Account ${accountId}: available ${account.availableBalance} != balance ${account.balance} - holds ${held.toFixed(2)}`,
		);
	}
}

/**
 * Poll the workflow state until `predicate` holds.
 */
export async function waitForState(
	vigil: Vigil,
	id: string,
	predicate: (state: WorkflowStateView) => boolean,
	options: { timeoutMs?: number; intervalMs?: number } = {},
): Promise<WorkflowStateView> {
	const deadline = Date.now() + (options.timeoutMs ?? 5_000);
	for (;;) {
		const state = await vigil.workflows.getState(id);
		if (predicate(state)) return state;
		if (Date.now() > deadline) {
			throw new Error(`Workflow ${id} stuck at ${state.currentState} (${state.status})`);
		}
		await new Promise((resolve) => setTimeout(resolve, options.intervalMs ?? 5));
	}
}
