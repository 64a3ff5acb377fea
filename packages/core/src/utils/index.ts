export { generateId } from "./id.js";
export { parseInterval } from "./interval.js";
export {
	formatAmount,
	getCurrencyPrecision,
	getDecimalPlaces,
	parseAmount,
	sumAmounts,
} from "./money.js";
