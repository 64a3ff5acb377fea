import type {
	AiAnalyzer,
	Embedder,
	NotificationChannel,
	Rule,
	VigilAdapter,
	VigilAdvancedOptions,
	VigilContext,
	VigilLogger,
	WorkflowEngineOptions,
} from "vigil";
import { createVigil, type Vigil } from "vigil";
import { memoryAdapter } from "@vigil/memory-adapter";

/** Weekday midday UTC, so `unusual_time` stays off unless a test asks for it. */
export const TEST_CLOCK_START = "2026-03-04T12:00:00.000Z";

export interface TestClock {
	now(): Date;
	/** Jump forward; the clock keeps ticking from there. */
	advance(ms: number): void;
}

/**
 * A clock anchored at `start` that moves with real time. Waits and retries
 * measure elapsed time against it, so it must not stand still.
 */
export function createTestClock(start = TEST_CLOCK_START): TestClock {
	const anchor = new Date(start).getTime();
	const startedAt = Date.now();
	let offset = 0;
	return {
		now: () => new Date(anchor + (Date.now() - startedAt) + offset),
		advance: (ms) => {
			offset += ms;
		},
	};
}

export const silentLogger: VigilLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

export interface TestInstanceOptions {
	/** Database adapter. Default: a fresh memoryAdapter() */
	adapter?: VigilAdapter;
	analyzer?: AiAnalyzer;
	embedder?: Embedder;
	notificationChannel?: NotificationChannel;
	rules?: Rule[];
	/** Merged over fast test defaults. */
	advanced?: VigilAdvancedOptions;
	workflow?: WorkflowEngineOptions;
	clock?: TestClock;
	logger?: VigilLogger;
}

export interface TestInstance {
	vigil: Vigil;
	ctx: VigilContext;
	adapter: VigilAdapter;
	clock: TestClock;
	/** Cleanup function -- call in afterEach/afterAll */
	cleanup: () => Promise<void>;
}

export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const adapter = options.adapter ?? memoryAdapter();
	const clock = options.clock ?? createTestClock();

	const vigil = createVigil({
		database: adapter,
		analyzer: options.analyzer,
		embedder: options.embedder,
		notificationChannel: options.notificationChannel,
		rules: options.rules,
		logger: options.logger ?? silentLogger,
		now: clock.now,
		coreWorkers: { holdExpiry: false, workflowRecovery: false },
		advanced: {
			retryBaseDelayMs: 1,
			retryMaxDelayMs: 5,
			embeddingDimension: 8,
			...options.advanced,
		},
		workflow: { signalPollIntervalMs: 10, ...options.workflow },
	});

	const ctx = await vigil.$context;

	return {
		vigil,
		ctx,
		adapter,
		clock,
		cleanup: async () => {
			await vigil.workers.stop();
		},
	};
}
