// =============================================================================
// CONNECTION POOL
// =============================================================================
// Builds the pg pool, the Kysely instance and the adapter in one place, and
// applies the bundled schema on request.

import { readFile } from "node:fs/promises";
import type { VigilAdapter } from "@vigil/core/db";
import { Kysely, PostgresDialect, sql } from "kysely";
import pg from "pg";
import { kyselyAdapter, type VigilDatabase } from "./adapter.js";

export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 5_000,
} as const;

export interface PostgresAdapterConfig {
	/** Connection string. Ignored when `pool` is given. */
	connectionString?: string;
	/** Existing pool to reuse. */
	pool?: pg.Pool;
}

export interface PostgresAdapterResult {
	adapter: VigilAdapter;
	db: Kysely<VigilDatabase>;
	/** Pool counters for health checks. */
	stats: () => { total: number; idle: number; waiting: number };
	close: () => Promise<void>;
}

/**
 * Create a pooled PostgreSQL adapter.
 *
 * @example
 * ```ts
 * const { adapter, close } = createPostgresAdapter({ connectionString: process.env.DATABASE_URL });
 * await applySchema(db);
 * const vigil = createVigil({ database: adapter });
 * // On shutdown:
 * await vigil.workers.stop();
 * await close();
 * ```
 */
export function createPostgresAdapter(config: PostgresAdapterConfig): PostgresAdapterResult {
	const pool =
		config.pool ?? new pg.Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: config.connectionString });
	const db = new Kysely<VigilDatabase>({ dialect: new PostgresDialect({ pool }) });

	return {
		adapter: kyselyAdapter(db),
		db,
		stats: () => ({ total: pool.totalCount, idle: pool.idleCount, waiting: pool.waitingCount }),
		close: () => db.destroy(),
	};
}

/** Read the bundled DDL. */
export async function loadSchemaSql(): Promise<string> {
	return readFile(new URL("../schema.sql", import.meta.url), "utf8");
}

/** Create the document table and indexes if they do not exist. */
export async function applySchema(db: Kysely<VigilDatabase>): Promise<void> {
	const ddl = await loadSchemaSql();
	await sql.raw(ddl).execute(db);
}
