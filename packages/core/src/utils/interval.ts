const UNIT_MS: Record<string, number> = {
	ms: 1,
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse an interval string into milliseconds.
 * "250ms" → 250, "5s" → 5000, "1m" → 60000, "1h" → 3600000, "7d" → 604800000
 */
export function parseInterval(interval: string): number {
	const match = interval.trim().match(/^(\d+)\s*(ms|s|m|h|d)$/);
	if (!match?.[1] || !match[2]) {
		throw new Error(`Invalid interval format: "${interval}". Use format like "5s", "1m", "1h", "1d".`);
	}
	const value = Number.parseInt(match[1], 10);
	const unit = UNIT_MS[match[2]];
	if (unit === undefined) {
		throw new Error(`Unknown interval unit: ${match[2]}`);
	}
	return value * unit;
}
