export {
	type FieldOf,
	MODEL_NAMES,
	type ModelMap,
	type ModelName,
	type SortBy,
	type VigilAdapter,
	type VigilAdapterOptions,
	type VigilTransactionAdapter,
	type Where,
	type WhereOperator,
} from "./adapter.js";
export { buildWhereClause, jsonField } from "./adapter-utils.js";
