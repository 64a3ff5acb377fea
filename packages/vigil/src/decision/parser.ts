// =============================================================================
// AI RESPONSE PARSING
// =============================================================================
// Completions arrive as fenced JSON, bare JSON, `KEY: value` prose, or free
// text. Each form is tried in that order. Nothing here throws: the worst case
// is `escalate` at confidence 50 with the raw text kept as reasoning.

import type { DecisionValue } from "@vigil/core";
import type { AiRiskResult } from "../risk/risk-engine.js";

export type ParsedFormat = "json" | "lines" | "keywords" | "unparsed";

export interface ParsedAnalysis {
	decision: DecisionValue;
	confidence: number;
	reasoning: string;
	riskFactors: string[];
	complianceNotes: string | null;
	format: ParsedFormat;
}

const REJECT_WORDS = ["fraud", "suspicious", "high risk", "reject"];
const APPROVE_WORDS = ["low risk", "legitimate", "approve", "safe"];

// =============================================================================
// NORMALIZATION
// =============================================================================

/** Anything outside approve/reject/escalate (e.g. a legacy "flag") becomes escalate. */
export function normalizeDecision(value: unknown): DecisionValue {
	if (typeof value !== "string") return "escalate";
	const text = value.trim().toLowerCase();
	if (text === "approve" || text === "approved") return "approve";
	if (text === "reject" || text === "rejected") return "reject";
	return "escalate";
}

/** Accepts 72, "72", "72%" or "72.5 %". Clamped to 0..100; null when unreadable. */
export function normalizeConfidence(value: unknown): number | null {
	let parsed: number;
	if (typeof value === "number") {
		parsed = value;
	} else if (typeof value === "string") {
		const match = /-?\d+(?:\.\d+)?/.exec(value.replace(/%/g, ""));
		if (!match) return null;
		parsed = Number(match[0]);
	} else {
		return null;
	}
	if (!Number.isFinite(parsed)) return null;
	return Math.min(100, Math.max(0, parsed));
}

function toStringList(value: unknown): string[] {
	if (Array.isArray(value)) {
		return value.filter((v): v is string => typeof v === "string" && v.trim() !== "").map((v) => v.trim());
	}
	if (typeof value === "string") {
		return value
			.split(",")
			.map((v) => v.trim())
			.filter((v) => v !== "");
	}
	return [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// JSON EXTRACTION
// =============================================================================

function tryParseObject(text: string): Record<string, unknown> | null {
	try {
		const parsed: unknown = JSON.parse(text);
		return isRecord(parsed) ? parsed : null;
	} catch {
		return null;
	}
}

/** Fenced block first, then the whole text, then the outermost braces. */
export function extractJsonObject(text: string): Record<string, unknown> | null {
	const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
	if (fenced?.[1]) {
		const parsed = tryParseObject(fenced[1].trim());
		if (parsed) return parsed;
	}

	const direct = tryParseObject(text.trim());
	if (direct) return direct;

	const start = text.indexOf("{");
	const end = text.lastIndexOf("}");
	if (start !== -1 && end > start) {
		return tryParseObject(text.slice(start, end + 1));
	}
	return null;
}

function pick(obj: Record<string, unknown>, ...keys: string[]): unknown {
	for (const key of keys) {
		if (obj[key] !== undefined) return obj[key];
	}
	return undefined;
}

// =============================================================================
// DECISION RESPONSES
// =============================================================================

function fromJson(obj: Record<string, unknown>, raw: string): ParsedAnalysis | null {
	const decision = pick(obj, "decision", "Decision", "DECISION");
	if (decision === undefined) return null;
	const reasoning = pick(obj, "reasoning", "reason", "explanation");
	const notes = pick(obj, "compliance_notes", "complianceNotes");
	return {
		decision: normalizeDecision(decision),
		confidence: normalizeConfidence(pick(obj, "confidence", "confidence_score")) ?? 50,
		reasoning: typeof reasoning === "string" && reasoning.trim() !== "" ? reasoning.trim() : raw,
		riskFactors: toStringList(pick(obj, "risk_factors", "riskFactors")),
		complianceNotes: typeof notes === "string" && notes.trim() !== "" ? notes.trim() : null,
		format: "json",
	};
}

function readKeyLine(line: string): { key: string; value: string } | null {
	// Tolerates markdown emphasis and list markers: "- **DECISION:** approve"
	const match = /^[\s*\->#]*([A-Za-z_ ]+?)\s*\**\s*:\s*\**\s*(.*)$/.exec(line);
	if (!match?.[1]) return null;
	return { key: match[1].trim().toUpperCase().replace(/ /g, "_"), value: (match[2] ?? "").trim() };
}

function fromLines(raw: string): ParsedAnalysis | null {
	let decision: DecisionValue | null = null;
	let confidence: number | null = null;
	let reasoning: string | null = null;
	let riskFactors: string[] = [];
	let complianceNotes: string | null = null;

	for (const line of raw.split(/\r?\n/)) {
		const entry = readKeyLine(line);
		if (!entry) continue;
		switch (entry.key) {
			case "DECISION": {
				// First keyword wins: "escalate (do not approve)" is an escalation
				const keyword = /\b(approve|reject|escalate)/i.exec(entry.value)?.[1]?.toLowerCase();
				decision = keyword === "approve" || keyword === "reject" ? keyword : "escalate";
				break;
			}
			case "CONFIDENCE":
				confidence = normalizeConfidence(entry.value);
				break;
			case "REASONING":
				reasoning = entry.value;
				break;
			case "RISK_FACTORS":
				riskFactors = toStringList(entry.value);
				break;
			case "COMPLIANCE_NOTES":
				complianceNotes = entry.value || null;
				break;
		}
	}

	if (decision === null) return null;
	return {
		decision,
		confidence: confidence ?? 50,
		reasoning: reasoning || raw,
		riskFactors,
		complianceNotes,
		format: "lines",
	};
}

function fromKeywords(raw: string): ParsedAnalysis | null {
	const lower = raw.toLowerCase();
	if (REJECT_WORDS.some((w) => lower.includes(w))) {
		return {
			decision: "reject",
			confidence: 70,
			reasoning: raw,
			riskFactors: [],
			complianceNotes: null,
			format: "keywords",
		};
	}
	if (APPROVE_WORDS.some((w) => lower.includes(w))) {
		return {
			decision: "approve",
			confidence: 80,
			reasoning: raw,
			riskFactors: [],
			complianceNotes: null,
			format: "keywords",
		};
	}
	return null;
}

export function parseDecisionResponse(raw: string): ParsedAnalysis {
	const obj = extractJsonObject(raw);
	const parsed = (obj && fromJson(obj, raw)) ?? fromLines(raw) ?? fromKeywords(raw);
	if (parsed) {
		if (parsed.riskFactors.length === 0) parsed.riskFactors = ["general_review"];
		return parsed;
	}
	return {
		decision: "escalate",
		confidence: 50,
		reasoning: `Unparseable AI response: ${raw}`,
		riskFactors: ["unparseable_response"],
		complianceNotes: null,
		format: "unparsed",
	};
}

// =============================================================================
// RISK RESPONSES
// =============================================================================

/** Null when no risk score can be read; the caller falls back. */
export function parseRiskResponse(raw: string): AiRiskResult | null {
	const obj = extractJsonObject(raw);
	if (obj) {
		const score = normalizeConfidence(pick(obj, "risk_score", "riskScore", "score"));
		if (score !== null) {
			return {
				riskScore: score,
				riskFactors: toStringList(pick(obj, "risk_factors", "key_risk_factors", "riskFactors")),
			};
		}
	}

	let score: number | null = null;
	let factors: string[] = [];
	for (const line of raw.split(/\r?\n/)) {
		const entry = readKeyLine(line);
		if (entry?.key === "RISK_SCORE") score = normalizeConfidence(entry.value);
		else if (entry?.key === "RISK_FACTORS") factors = toStringList(entry.value);
	}
	return score === null ? null : { riskScore: score, riskFactors: factors };
}
