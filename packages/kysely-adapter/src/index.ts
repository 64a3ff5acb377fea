export { buildKyselySql, type DocumentTable, kyselyAdapter, type VigilDatabase } from "./adapter.js";
export {
	applySchema,
	createPostgresAdapter,
	loadSchemaSql,
	type PostgresAdapterConfig,
	type PostgresAdapterResult,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
