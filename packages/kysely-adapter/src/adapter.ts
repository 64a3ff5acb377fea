// =============================================================================
// KYSELY ADAPTER -- VigilAdapter implementation backed by Kysely + PostgreSQL
// =============================================================================
// Documents live in one JSONB table keyed by (model, id). All statements go
// through Kysely's `sql` template so row locking (FOR UPDATE), RETURNING and
// parameter binding stay under direct control.

import type {
	ModelMap,
	ModelName,
	SortBy,
	VigilAdapter,
	VigilAdapterOptions,
	VigilTransactionAdapter,
	Where,
} from "@vigil/core/db";
import { buildWhereClause, jsonField } from "@vigil/core/db";
import { VigilError } from "@vigil/core/error";
import type { Generated, Kysely, Transaction } from "kysely";
import { sql } from "kysely";

export interface DocumentTable {
	model: string;
	id: string;
	data: unknown;
	created_at: Generated<Date>;
	updated_at: Generated<Date>;
}

export interface VigilDatabase {
	vigil_documents: DocumentTable;
}

const TABLE = "vigil_documents";
const UNIQUE_VIOLATION = "23505";

const ADAPTER_OPTIONS: VigilAdapterOptions = {
	supportsForUpdate: true,
	dialectName: "postgres",
};

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Build a Kysely sql template from a raw query string with $N placeholders and params.
 */
export function buildKyselySql(query: string, params: unknown[]) {
	const chunks: ReturnType<typeof sql.raw>[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;
	let match: RegExpExecArray | null = regex.exec(query);

	while (match !== null) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number.parseInt(match[1] ?? "0", 10) - 1;
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
		match = regex.exec(query);
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	if (chunks.length === 0) {
		return sql.raw(query);
	}

	return chunks.reduce((acc, chunk) => sql`${acc}${chunk}`);
}

type Executor = Kysely<VigilDatabase> | Transaction<VigilDatabase>;

async function queryData(db: Executor, query: string, params: unknown[]): Promise<unknown[]> {
	const result = await buildKyselySql(query, params).execute(db);
	const rows: unknown[] = result.rows;
	return rows.map((row) =>
		typeof row === "object" && row !== null && "data" in row ? row.data : undefined,
	);
}

// The row's JSONB payload is the document as written by `create`/`update`.
function asDocument<M extends ModelName>(data: unknown): ModelMap[M] {
	return data as ModelMap[M];
}

function isUniqueViolation(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the core adapter methods for a given Kysely database or transaction handle.
 */
function buildAdapterMethods(db: Executor): Omit<VigilTransactionAdapter, "id" | "options"> {
	return {
		create: async <M extends ModelName>({ model, data }: { model: M; data: ModelMap[M] }) => {
			const query = `INSERT INTO ${TABLE} (model, id, data) VALUES ($1, $2, $3::jsonb) RETURNING data`;
			try {
				const [row] = await queryData(db, query, [model, data.id, JSON.stringify(data)]);
				if (row === undefined) {
					throw new Error(`Insert into ${model} returned no rows`);
				}
				return asDocument<M>(row);
			} catch (error) {
				if (isUniqueViolation(error)) {
					throw VigilError.duplicate(`${model} ${data.id} already exists`, error);
				}
				throw error;
			}
		},

		findOne: async <M extends ModelName>({
			model,
			where,
			forUpdate,
		}: {
			model: M;
			where: Where<M>[];
			forUpdate?: boolean;
		}) => {
			const { clause, params } = buildWhereClause(where, 2);
			let query = `SELECT data FROM ${TABLE} WHERE model = $1 AND ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const [row] = await queryData(db, query, [model, ...params]);
			return row === undefined ? null : asDocument<M>(row);
		},

		findMany: async <M extends ModelName>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: M;
			where?: Where<M>[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy<M>;
		}) => {
			const { clause, params } = buildWhereClause(where ?? [], 2);
			const allParams: unknown[] = [model, ...params];
			let query = `SELECT data FROM ${TABLE} WHERE model = $1 AND ${clause}`;

			if (sortBy) {
				const dir = sortBy.direction === "desc" ? "DESC" : "ASC";
				// id breaks ties so offset pages never overlap
				query += ` ORDER BY ${jsonField(sortBy.field)} ${dir} NULLS LAST, id ASC`;
			}

			if (limit !== undefined) {
				allParams.push(limit);
				query += ` LIMIT $${allParams.length}`;
			}

			if (offset !== undefined) {
				allParams.push(offset);
				query += ` OFFSET $${allParams.length}`;
			}

			const rows = await queryData(db, query, allParams);
			return rows.map((row) => asDocument<M>(row));
		},

		update: async <M extends ModelName>({
			model,
			where,
			update: updateData,
		}: {
			model: M;
			where: Where<M>[];
			update: Partial<ModelMap[M]>;
		}) => {
			if (Object.keys(updateData).length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const { clause, params } = buildWhereClause(where, 3);
			const query =
				`UPDATE ${TABLE} SET data = data || $1::jsonb, updated_at = now() ` +
				`WHERE model = $2 AND id = (SELECT id FROM ${TABLE} WHERE model = $2 AND ${clause} LIMIT 1) ` +
				"RETURNING data";

			const [row] = await queryData(db, query, [JSON.stringify(updateData), model, ...params]);
			return row === undefined ? null : asDocument<M>(row);
		},

		delete: async ({ model, where }) => {
			const { clause, params } = buildWhereClause(where, 2);
			await buildKyselySql(`DELETE FROM ${TABLE} WHERE model = $1 AND ${clause}`, [model, ...params]).execute(db);
		},

		count: async ({ model, where }) => {
			const { clause, params } = buildWhereClause(where ?? [], 2);
			const query = `SELECT COUNT(*)::int AS count FROM ${TABLE} WHERE model = $1 AND ${clause}`;

			const result = await buildKyselySql(query, [model, ...params]).execute(db);
			const [row]: unknown[] = result.rows;
			if (typeof row === "object" && row !== null && "count" in row && typeof row.count === "number") {
				return row.count;
			}
			return 0;
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a VigilAdapter backed by a Kysely database instance.
 *
 * @example
 * ```ts
 * import { Kysely, PostgresDialect } from "kysely";
 * import pg from "pg";
 * import { kyselyAdapter } from "@vigil/kysely-adapter";
 *
 * const db = new Kysely<VigilDatabase>({
 *   dialect: new PostgresDialect({ pool: new pg.Pool({ connectionString: process.env.DATABASE_URL }) }),
 * });
 * const adapter = kyselyAdapter(db);
 * ```
 */
export function kyselyAdapter(db: Kysely<VigilDatabase>): VigilAdapter {
	const methods = buildAdapterMethods(db);

	return {
		id: "kysely",
		...methods,

		transaction: async (fn) => {
			return db.transaction().execute(async (tx) => {
				const txAdapter: VigilTransactionAdapter = {
					id: "kysely",
					...buildAdapterMethods(tx),
					options: ADAPTER_OPTIONS,
				};
				return fn(txAdapter);
			});
		},

		options: ADAPTER_OPTIONS,
	};
}
