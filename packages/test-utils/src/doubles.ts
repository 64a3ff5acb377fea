// =============================================================================
// TEST DOUBLES -- scripted AI collaborators and fault injection
// =============================================================================

import type {
	AiAnalyzer,
	AnalysisPurpose,
	AnalysisRequest,
	Embedder,
	Notification,
	NotificationChannel,
	VigilAdapter,
	VigilTransactionAdapter,
} from "vigil";
import { VigilError } from "vigil";

export type ScriptedReply = string | Error | ((request: AnalysisRequest) => string | Promise<string>);

export interface ScriptedAnalyzer extends AiAnalyzer {
	readonly calls: AnalysisRequest[];
	callCount(purpose?: AnalysisPurpose): number;
}

/**
 * Analyzer answering each purpose from a script. A purpose with no reply
 * fails as AI_UNAVAILABLE.
 */
export function scriptedAnalyzer(script: Partial<Record<AnalysisPurpose, ScriptedReply>>): ScriptedAnalyzer {
	const calls: AnalysisRequest[] = [];
	return {
		calls,
		callCount: (purpose) => (purpose ? calls.filter((c) => c.purpose === purpose).length : calls.length),
		analyze: async (request) => {
			calls.push(request);
			const reply = script[request.purpose];
			if (reply === undefined) throw VigilError.aiUnavailable(`No scripted ${request.purpose} reply`);
			if (reply instanceof Error) throw reply;
			if (typeof reply === "function") return reply(request);
			return reply;
		},
	};
}

/** Analyzer whose calls never settle, for simulating a runner that stalls. */
export function hangingAnalyzer(): ScriptedAnalyzer {
	const calls: AnalysisRequest[] = [];
	return {
		calls,
		callCount: (purpose) => (purpose ? calls.filter((c) => c.purpose === purpose).length : calls.length),
		analyze: (request) => {
			calls.push(request);
			return new Promise<string>(() => {});
		},
	};
}

export interface FixedEmbedder extends Embedder {
	readonly texts: string[];
}

/** Returns the vector mapped to the text, or a constant unit vector. */
export function fixedEmbedder(dimension: number, vectors: Record<string, number[]> = {}): FixedEmbedder {
	const texts: string[] = [];
	const unit = Array.from({ length: dimension }, (_, i) => (i === 0 ? 1 : 0));
	return {
		dimension,
		texts,
		embed: async (text) => {
			texts.push(text);
			return vectors[text] ?? unit;
		},
	};
}

export interface RecordingChannel extends NotificationChannel {
	readonly sent: Notification[];
}

export function recordingChannel(options: { fail?: boolean } = {}): RecordingChannel {
	const sent: Notification[] = [];
	return {
		sent,
		send: async (notification) => {
			if (options.fail) throw new Error("channel down");
			sent.push(notification);
		},
	};
}

// =============================================================================
// FAULT INJECTION
// =============================================================================

type AdapterMethod = "create" | "findOne" | "findMany" | "update" | "delete" | "count";

export interface FaultRule {
	method: AdapterMethod;
	/** Only calls against this model fail. */
	model?: string;
	/** Number of calls to fail. Default: every call */
	times?: number;
	error?: () => Error;
}

export interface FaultyAdapter extends VigilAdapter {
	/** Add a fault; calls inside transactions are covered too. */
	inject(rule: FaultRule): void;
	clear(): void;
	/** Faults triggered so far. */
	readonly triggered: number;
}

/**
 * Wrap an adapter so chosen calls fail. Without an explicit error the fault
 * is a transient STORE_CONTENTION.
 */
export function faultyAdapter(inner: VigilAdapter): FaultyAdapter {
	let rules: Array<FaultRule & { remaining: number }> = [];
	let triggered = 0;

	const check = (method: AdapterMethod, model: string): void => {
		const rule = rules.find((r) => r.method === method && (!r.model || r.model === model) && r.remaining > 0);
		if (!rule) return;
		rule.remaining--;
		triggered++;
		throw rule.error ? rule.error() : VigilError.storeContention(`Injected ${method} fault on ${model}`);
	};

	const wrap = (target: VigilTransactionAdapter): VigilTransactionAdapter => ({
		id: target.id,
		options: target.options,
		create: async (data) => {
			check("create", data.model);
			return target.create(data);
		},
		findOne: async (data) => {
			check("findOne", data.model);
			return target.findOne(data);
		},
		findMany: async (data) => {
			check("findMany", data.model);
			return target.findMany(data);
		},
		update: async (data) => {
			check("update", data.model);
			return target.update(data);
		},
		delete: async (data) => {
			check("delete", data.model);
			return target.delete(data);
		},
		count: async (data) => {
			check("count", data.model);
			return target.count(data);
		},
	});

	return {
		...wrap(inner),
		transaction: (fn) => inner.transaction((tx) => fn(wrap(tx))),
		inject: (rule) => {
			rules.push({ ...rule, remaining: rule.times ?? Number.POSITIVE_INFINITY });
		},
		clear: () => {
			rules = [];
		},
		get triggered() {
			return triggered;
		},
	};
}
