// =============================================================================
// WORKER RUNNER -- background workers for the hold reaper and recovery
// =============================================================================
// Runs the core workers (hold expiry, workflow recovery) and any extra
// definitions on a polling loop. Lease-required workers take a
// `worker_lease` document first, so only one process in a cluster runs them
// per interval.

import { randomUUID } from "node:crypto";
import type { CoreWorkerOptions, VigilContext, VigilWorkerDefinition } from "@vigil/core";
import { errorMessage, parseInterval, VigilError } from "@vigil/core";
import { expireHolds } from "../managers/hold-manager.js";
import { withStoreTransaction } from "../managers/ledger-helpers.js";
import type { WorkflowEngine } from "../workflow/engine.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;

// =============================================================================
// JITTER
// =============================================================================

/** Apply ±25% jitter to an interval. */
export function withJitter(ms: number): number {
	const jitterFactor = 0.75 + Math.random() * 0.5; // [0.75, 1.25]
	return Math.round(ms * jitterFactor);
}

// =============================================================================
// WORKER RUNNER CLASS
// =============================================================================

export interface WorkerRunnerOptions {
	engine: WorkflowEngine;
	/** Extra workers run beside the core ones. */
	workers?: VigilWorkerDefinition[];
}

interface RunningWorker {
	definition: VigilWorkerDefinition;
	intervalMs: number;
	timer: ReturnType<typeof setTimeout> | null;
	running: Promise<void> | null;
}

export class VigilWorkerRunner {
	private readonly ctx: VigilContext;
	private readonly engine: WorkflowEngine;
	private readonly extra: VigilWorkerDefinition[];
	private readonly leaseHolder: string;
	private readonly workers: RunningWorker[] = [];
	private started = false;
	private stopped = false;

	constructor(ctx: VigilContext, options: WorkerRunnerOptions) {
		this.ctx = ctx;
		this.engine = options.engine;
		this.extra = options.workers ?? [];
		this.leaseHolder = randomUUID();
	}

	get workerIds(): string[] {
		return this.workers.map((w) => w.definition.id);
	}

	// ---------------------------------------------------------------------------
	// START
	// ---------------------------------------------------------------------------

	start(): void {
		if (this.started) {
			throw VigilError.conflict("Worker runner is already started");
		}
		this.started = true;

		const definitions = [...this.buildCoreWorkers(this.ctx.options.coreWorkers), ...this.extra];
		if (definitions.length === 0) {
			this.ctx.logger.info("No workers registered");
			return;
		}

		this.ctx.logger.info("Starting worker runner", {
			workerCount: definitions.length,
			leaseHolder: this.leaseHolder,
			workers: definitions.map((w) => w.id),
		});

		for (const definition of definitions) {
			const worker: RunningWorker = {
				definition,
				intervalMs: parseInterval(definition.interval),
				timer: null,
				running: null,
			};
			this.workers.push(worker);
			this.scheduleNext(worker);
		}
	}

	// ---------------------------------------------------------------------------
	// CORE WORKERS
	// ---------------------------------------------------------------------------

	private buildCoreWorkers(cfg?: CoreWorkerOptions): VigilWorkerDefinition[] {
		const workers: VigilWorkerDefinition[] = [];
		const engine = this.engine;

		const holdExpiryCfg = cfg?.holdExpiry ?? true;
		if (holdExpiryCfg !== false) {
			workers.push({
				id: "core:hold-expiry",
				description: "Core: release expired holds not owned by a waiting workflow",
				interval: typeof holdExpiryCfg === "object" ? (holdExpiryCfg.interval ?? "5m") : "5m",
				leaseRequired: false,
				handler: async (ctx) => {
					const result = await expireHolds(ctx, {
						isProtected: (hold) => engine.isWaiting(hold.transactionId),
					});
					if (result.skipped > 0) {
						ctx.logger.info("Core: kept holds of waiting workflows", { count: result.skipped });
					}
				},
			});
		}

		const recoveryCfg = cfg?.workflowRecovery ?? true;
		if (recoveryCfg !== false) {
			const interval = typeof recoveryCfg === "object" ? (recoveryCfg.interval ?? "1m") : "1m";
			const staleAfterMs = parseInterval(interval) * 2;
			workers.push({
				id: "core:workflow-recovery",
				description: "Core: resume workflows whose runner stopped",
				interval,
				leaseRequired: true,
				handler: async () => {
					await engine.resume({ staleAfterMs });
				},
			});
		}

		return workers;
	}

	// ---------------------------------------------------------------------------
	// STOP
	// ---------------------------------------------------------------------------

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		this.ctx.logger.info("Stopping worker runner", { leaseHolder: this.leaseHolder });

		for (const worker of this.workers) {
			if (worker.timer !== null) {
				clearTimeout(worker.timer);
				worker.timer = null;
			}
		}

		const inFlight = this.workers.flatMap((w) => (w.running ? [w.running] : []));
		if (inFlight.length > 0) {
			this.ctx.logger.info("Waiting for running workers to finish", { count: inFlight.length });
			let timer: ReturnType<typeof setTimeout> | undefined;
			const timeout = new Promise<void>((resolve) => {
				timer = setTimeout(() => {
					this.ctx.logger.warn("Worker shutdown timed out, proceeding", {
						stillRunning: this.workers.filter((w) => w.running).map((w) => w.definition.id),
					});
					resolve();
				}, SHUTDOWN_TIMEOUT_MS);
				timer.unref();
			});
			await Promise.race([Promise.all(inFlight), timeout]);
			clearTimeout(timer);
		}

		await this.releaseAllLeases();
	}

	// ---------------------------------------------------------------------------
	// SCHEDULING
	// ---------------------------------------------------------------------------

	private scheduleNext(worker: RunningWorker): void {
		if (this.stopped) return;
		worker.timer = setTimeout(() => {
			worker.timer = null;
			worker.running = this.executeWorker(worker).finally(() => {
				worker.running = null;
				this.scheduleNext(worker);
			});
		}, withJitter(worker.intervalMs));
		worker.timer.unref();
	}

	/** Run one worker now, outside its schedule. Errors are logged. */
	async runOnce(workerId: string): Promise<void> {
		const worker = this.workers.find((w) => w.definition.id === workerId);
		if (!worker) throw VigilError.notFound(`Worker ${workerId} is not registered`);
		if (worker.running) return worker.running;
		await this.executeWorker(worker);
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	private async executeWorker(worker: RunningWorker): Promise<void> {
		if (this.stopped) return;
		const { definition } = worker;

		try {
			if (definition.leaseRequired) {
				const acquired = await this.acquireLease(definition.id, worker.intervalMs);
				if (!acquired) {
					this.ctx.logger.debug("Worker lease not acquired, skipping", { workerId: definition.id });
					return;
				}
			}
			await definition.handler(this.ctx);
		} catch (error) {
			this.ctx.logger.error("Worker execution failed", {
				workerId: definition.id,
				error: errorMessage(error),
			});
		}
	}

	// ---------------------------------------------------------------------------
	// LEASE MANAGEMENT
	// ---------------------------------------------------------------------------

	/**
	 * Take or renew the lease for `workerId`. A lease held by another runner
	 * is taken over only once expired. Lease duration is 2x the interval so it
	 * lapses on its own if the holder dies.
	 */
	private async acquireLease(workerId: string, intervalMs: number): Promise<boolean> {
		const now = this.ctx.now();
		const expiresAt = new Date(now.getTime() + intervalMs * 2).toISOString();

		try {
			return await withStoreTransaction(this.ctx, async (tx) => {
				const lease = await tx.findOne({
					model: "worker_lease",
					where: [{ field: "id", operator: "eq", value: workerId }],
					forUpdate: true,
				});
				if (!lease) {
					await tx.create({ model: "worker_lease", data: { id: workerId, holder: this.leaseHolder, expiresAt } });
					return true;
				}
				if (lease.holder !== this.leaseHolder && new Date(lease.expiresAt) > now) return false;

				await tx.update({
					model: "worker_lease",
					where: [{ field: "id", operator: "eq", value: workerId }],
					update: { holder: this.leaseHolder, expiresAt },
				});
				return true;
			});
		} catch (error) {
			if (error instanceof VigilError && error.code === "DUPLICATE") return false;
			this.ctx.logger.error("Failed to acquire worker lease", {
				workerId,
				error: errorMessage(error),
			});
			return false;
		}
	}

	private async releaseAllLeases(): Promise<void> {
		try {
			await this.ctx.adapter.delete({
				model: "worker_lease",
				where: [{ field: "holder", operator: "eq", value: this.leaseHolder }],
			});
		} catch (error) {
			this.ctx.logger.error("Failed to release worker leases", {
				leaseHolder: this.leaseHolder,
				error: errorMessage(error),
			});
		}
	}
}

// =============================================================================
// FACTORY
// =============================================================================

export function createWorkerRunner(ctx: VigilContext, options: WorkerRunnerOptions): VigilWorkerRunner {
	return new VigilWorkerRunner(ctx, options);
}
