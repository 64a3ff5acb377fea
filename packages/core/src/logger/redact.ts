// =============================================================================
// REDACTION
// =============================================================================
// Key matching ignores case. Errors pass through untouched.

const DEFAULT_REDACT_KEYS = [
	"password",
	"secret",
	"token",
	"apiKey",
	"authorization",
	"accountNumber",
	"ssn",
	"prompt",
];

const MAX_DEPTH = 6;
const REDACTED = "[REDACTED]";

function redactValue(value: unknown, keys: Set<string>, depth: number): unknown {
	if (depth > MAX_DEPTH || value === null || typeof value !== "object" || value instanceof Error) return value;
	if (Array.isArray(value)) return value.map((item) => redactValue(item, keys, depth + 1));
	return redactEntries(Object.entries(value), keys, depth);
}

function redactEntries(entries: Array<[string, unknown]>, keys: Set<string>, depth: number): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of entries) {
		out[key] = keys.has(key.toLowerCase()) ? REDACTED : redactValue(value, keys, depth + 1);
	}
	return out;
}

export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;
	return redactEntries(Object.entries(data), keys, 0);
}

/** Lower-cased key set; `userKeys` replaces the defaults. */
export function buildRedactKeys(userKeys: string[] = DEFAULT_REDACT_KEYS): Set<string> {
	return new Set(userKeys.map((key) => key.toLowerCase()));
}
