import type { CoreWorkerOptions, VigilContext, VigilLogger, VigilWorkerDefinition } from "@vigil/core";
import { memoryAdapter } from "@vigil/memory-adapter";
import { createTestClock, type TestClock } from "@vigil/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildContext } from "../context/context.js";
import { VigilWorkerRunner, withJitter } from "../infrastructure/worker-runner.js";
import { getOrCreateAccount } from "../managers/account-manager.js";
import { listHolds, placeHold } from "../managers/hold-manager.js";
import { createWorkflowEngine, type WorkflowEngine } from "../workflow/engine.js";

// ---------------------------------------------------------------------------
// withJitter
// ---------------------------------------------------------------------------

describe("withJitter", () => {
	it("stays within 25% of the interval", () => {
		for (let i = 0; i < 50; i++) {
			const value = withJitter(1_000);
			expect(value).toBeGreaterThanOrEqual(750);
			expect(value).toBeLessThanOrEqual(1_250);
		}
	});
});

// ---------------------------------------------------------------------------
// VigilWorkerRunner
// ---------------------------------------------------------------------------

describe("VigilWorkerRunner", () => {
	const runners: VigilWorkerRunner[] = [];

	function mockLogger(): VigilLogger & { info: ReturnType<typeof vi.fn> } {
		return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
	}

	function createContext(
		coreWorkers: CoreWorkerOptions = { holdExpiry: false, workflowRecovery: false },
		clock: TestClock = createTestClock(),
	) {
		const logger = mockLogger();
		const ctx: VigilContext = buildContext({
			database: memoryAdapter(),
			logger,
			now: clock.now,
			coreWorkers,
			advanced: { retryBaseDelayMs: 1, retryMaxDelayMs: 5 },
		});
		return { ctx, logger, engine: createWorkflowEngine(ctx, { signalPollIntervalMs: 10 }) };
	}

	function runner(
		ctx: VigilContext,
		engine: WorkflowEngine,
		workers: VigilWorkerDefinition[] = [],
	): VigilWorkerRunner {
		const created = new VigilWorkerRunner(ctx, { engine, workers });
		runners.push(created);
		return created;
	}

	afterEach(async () => {
		for (const r of runners.splice(0)) {
			await r.stop();
		}
		vi.restoreAllMocks();
	});

	it("registers the core workers by default", () => {
		const { ctx, logger, engine } = createContext({});
		const r = runner(ctx, engine);
		r.start();

		expect(r.workerIds).toEqual(["core:hold-expiry", "core:workflow-recovery"]);
		expect(logger.info).toHaveBeenCalledWith(
			"Starting worker runner",
			expect.objectContaining({
				workerCount: 2,
				workers: ["core:hold-expiry", "core:workflow-recovery"],
			}),
		);
	});

	it("runs extra workers beside the core ones", () => {
		const { ctx, engine } = createContext({ workflowRecovery: false });
		const r = runner(ctx, engine, [{ id: "reports", interval: "1h", leaseRequired: false, handler: vi.fn() }]);
		r.start();

		expect(r.workerIds).toEqual(["core:hold-expiry", "reports"]);
	});

	it("logs a message when no workers are registered", () => {
		const { ctx, logger, engine } = createContext();
		runner(ctx, engine).start();

		expect(logger.info).toHaveBeenCalledWith("No workers registered");
	});

	it("throws if started twice", () => {
		const { ctx, engine } = createContext();
		const r = runner(ctx, engine);
		r.start();

		expect(() => r.start()).toThrow("Worker runner is already started");
	});

	it("stop is idempotent", async () => {
		const { ctx, logger, engine } = createContext();
		const r = runner(ctx, engine);
		r.start();

		await r.stop();
		await r.stop();

		expect(logger.info.mock.calls.filter(([message]) => message === "Stopping worker runner")).toHaveLength(1);
	});

	it("runs a worker on demand and rejects unknown ids", async () => {
		const handler = vi.fn(async () => {});
		const { ctx, engine } = createContext();
		const r = runner(ctx, engine, [{ id: "reports", interval: "1h", leaseRequired: false, handler }]);
		r.start();

		await r.runOnce("reports");

		expect(handler).toHaveBeenCalledWith(ctx);
		await expect(r.runOnce("missing")).rejects.toMatchObject({ code: "NOT_FOUND" });
	});

	it("logs handler failures without stopping", async () => {
		const { ctx, logger, engine } = createContext();
		const r = runner(ctx, engine, [
			{
				id: "flaky",
				interval: "1h",
				leaseRequired: false,
				handler: async () => {
					throw new Error("boom");
				},
			},
		]);
		r.start();

		await r.runOnce("flaky");

		expect(logger.error).toHaveBeenCalledWith("Worker execution failed", { workerId: "flaky", error: "boom" });
	});

	it("lets only the lease holder run a lease-required worker", async () => {
		const { ctx, engine } = createContext();
		const first = vi.fn(async () => {});
		const second = vi.fn(async () => {});
		const a = runner(ctx, engine, [{ id: "exclusive", interval: "1h", leaseRequired: true, handler: first }]);
		const b = runner(ctx, engine, [{ id: "exclusive", interval: "1h", leaseRequired: true, handler: second }]);
		a.start();
		b.start();

		await a.runOnce("exclusive");
		await b.runOnce("exclusive");
		expect(first).toHaveBeenCalledTimes(1);
		expect(second).not.toHaveBeenCalled();

		// Stopping releases the lease
		await a.stop();
		await b.runOnce("exclusive");
		expect(second).toHaveBeenCalledTimes(1);
	});

	it("takes over a lease once it has expired", async () => {
		const clock = createTestClock();
		const { ctx, engine } = createContext(undefined, clock);
		const second = vi.fn(async () => {});
		const a = runner(ctx, engine, [{ id: "exclusive", interval: "1m", leaseRequired: true, handler: vi.fn() }]);
		const b = runner(ctx, engine, [{ id: "exclusive", interval: "1m", leaseRequired: true, handler: second }]);
		a.start();
		b.start();

		await a.runOnce("exclusive");
		clock.advance(3 * 60_000);
		await b.runOnce("exclusive");

		expect(second).toHaveBeenCalledTimes(1);
	});

	it("expires holds but keeps those of waiting workflows", async () => {
		const clock = createTestClock();
		const { ctx, logger, engine } = createContext({ holdExpiry: { interval: "1h" }, workflowRecovery: false }, clock);
		vi.spyOn(engine, "isWaiting").mockImplementation(async (transactionId) => transactionId === "txn-wait");

		await getOrCreateAccount(ctx, { accountId: "ACC-A", ownerId: "CUST-A", initialBalance: "1000" });
		await placeHold(ctx, { accountId: "ACC-A", amount: "100", transactionId: "txn-free", reason: "r", ttlMs: 1_000 });
		await placeHold(ctx, { accountId: "ACC-A", amount: "200", transactionId: "txn-wait", reason: "r", ttlMs: 1_000 });
		clock.advance(5_000);

		const r = runner(ctx, engine);
		r.start();
		await r.runOnce("core:hold-expiry");

		const holds = await listHolds(ctx, "ACC-A");
		expect(holds.map((h) => [h.transactionId, h.released])).toEqual([
			["txn-free", true],
			["txn-wait", false],
		]);
		expect(logger.info).toHaveBeenCalledWith("Core: kept holds of waiting workflows", { count: 1 });
	});

	it("resumes workflows idle for two recovery intervals", async () => {
		const { ctx, engine } = createContext({ holdExpiry: false, workflowRecovery: { interval: "1m" } });
		const resume = vi.spyOn(engine, "resume").mockResolvedValue([]);

		const r = runner(ctx, engine);
		r.start();
		await r.runOnce("core:workflow-recovery");

		expect(resume).toHaveBeenCalledWith({ staleAfterMs: 120_000 });
	});
});
