import { Decimal } from "decimal.js";
import { VigilError } from "../error/index.js";

/**
 * Parse a monetary amount into a Decimal. Rejects non-numeric input and,
 * unless `allowZero`, anything that is not strictly positive.
 */
export function parseAmount(
	value: string | Decimal,
	options: { field?: string; allowZero?: boolean } = {},
): Decimal {
	const field = options.field ?? "amount";
	let amount: Decimal;
	try {
		amount = new Decimal(value);
	} catch (cause) {
		throw VigilError.invalidArgument(`${field} is not a decimal number: ${String(value)}`, cause);
	}
	if (!amount.isFinite()) {
		throw VigilError.invalidArgument(`${field} must be finite`);
	}
	if (amount.isNegative() || (!options.allowZero && amount.isZero())) {
		throw VigilError.invalidArgument(`${field} must be positive`);
	}
	return amount;
}

/**
 * Render a Decimal with the currency's display precision.
 * 2500 (USD) → "2500.00", 1200 (JPY) → "1200"
 */
export function formatAmount(value: Decimal, currency = "USD"): string {
	return value.toFixed(getDecimalPlaces(currency));
}

/** Sum decimal strings without passing through floating point. */
export function sumAmounts(values: Iterable<string>): Decimal {
	let total = new Decimal(0);
	for (const value of values) {
		total = total.plus(value);
	}
	return total;
}

/**
 * Get precision (subunit count) for a currency.
 * USD → 100 (100 cents = 1 dollar)
 */
export function getCurrencyPrecision(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 1;
		case "BHD":
		case "KWD":
			return 1000;
		default:
			return 100;
	}
}

/**
 * Get decimal places for display.
 */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 0;
		case "BHD":
		case "KWD":
			return 3;
		default:
			return 2;
	}
}
