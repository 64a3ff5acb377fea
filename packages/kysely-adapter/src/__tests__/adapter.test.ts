import {
	DummyDriver,
	Kysely,
	PostgresAdapter,
	PostgresIntrospector,
	PostgresQueryCompiler,
} from "kysely";
import { jsonField } from "@vigil/core/db";
import { describe, expect, it } from "vitest";
import { buildKyselySql, kyselyAdapter, type VigilDatabase } from "../adapter.js";
import { applySchema } from "../pool.js";

// =============================================================================
// KYSELY ADAPTER TESTS -- compiled SQL against a driver that never connects
// =============================================================================

interface CapturedQuery {
	sql: string;
	parameters: readonly unknown[];
}

function createTestDb() {
	const queries: CapturedQuery[] = [];
	const db = new Kysely<VigilDatabase>({
		dialect: {
			createAdapter: () => new PostgresAdapter(),
			createDriver: () => new DummyDriver(),
			createIntrospector: (inner) => new PostgresIntrospector(inner),
			createQueryCompiler: () => new PostgresQueryCompiler(),
		},
		log: (event) => {
			if (event.level === "query") {
				queries.push({ sql: event.query.sql, parameters: event.query.parameters });
			}
		},
	});
	return { db, queries };
}

describe("buildKyselySql", () => {
	it("keeps placeholder order and binds parameters", () => {
		const { db } = createTestDb();
		const compiled = buildKyselySql("SELECT data FROM t WHERE a = $1 AND b = $2", ["x", 2]).compile(db);
		expect(compiled.sql).toBe("SELECT data FROM t WHERE a = $1 AND b = $2");
		expect(compiled.parameters).toEqual(["x", 2]);
	});

	it("returns the raw query when there are no placeholders", () => {
		const { db } = createTestDb();
		expect(buildKyselySql("SELECT 1", []).compile(db).sql).toBe("SELECT 1");
	});
});

describe("kyselyAdapter", () => {
	it("reports postgres options", () => {
		const { db } = createTestDb();
		const adapter = kyselyAdapter(db);
		expect(adapter.id).toBe("kysely");
		expect(adapter.options).toEqual({ supportsForUpdate: true, dialectName: "postgres" });
	});

	it("locks the row with FOR UPDATE and compares JSONB fields", async () => {
		const { db, queries } = createTestDb();
		const adapter = kyselyAdapter(db);

		const found = await adapter.findOne({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "ACC-1" }],
			forUpdate: true,
		});

		expect(found).toBeNull();
		expect(queries[0]).toEqual({
			sql: "SELECT data FROM vigil_documents WHERE model = $1 AND data->'id' = $2::jsonb LIMIT 1 FOR UPDATE",
			parameters: ["account", '"ACC-1"'],
		});
	});

	it("orders, limits and offsets findMany", async () => {
		const { db, queries } = createTestDb();
		const adapter = kyselyAdapter(db);

		const rows = await adapter.findMany({
			model: "transaction",
			where: [
				{ field: "senderCustomerId", operator: "eq", value: "CUST-1" },
				{ field: "createdAt", operator: "gte", value: "2026-01-01T00:00:00.000Z" },
			],
			sortBy: { field: "createdAt", direction: "desc" },
			limit: 50,
			offset: 10,
		});

		expect(rows).toEqual([]);
		expect(queries[0]?.sql).toBe(
			"SELECT data FROM vigil_documents WHERE model = $1 AND data->'senderCustomerId' = $2::jsonb " +
				"AND data->'createdAt' >= $3::jsonb ORDER BY data->'createdAt' DESC NULLS LAST, id ASC LIMIT $4 OFFSET $5",
		);
		expect(queries[0]?.parameters).toEqual([
			"transaction",
			'"CUST-1"',
			'"2026-01-01T00:00:00.000Z"',
			50,
			10,
		]);
	});

	it("expands in, like and null checks", async () => {
		const { db, queries } = createTestDb();
		const adapter = kyselyAdapter(db);

		await adapter.count({
			model: "workflow_execution",
			where: [
				{ field: "status", operator: "in", value: ["running", "waiting"] },
				{ field: "transactionId", operator: "like", value: "txn_%" },
				{ field: "completedAt", operator: "is_null" },
			],
		});

		expect(queries[0]?.sql).toBe(
			"SELECT COUNT(*)::int AS count FROM vigil_documents WHERE model = $1 AND data->'status' IN ($2::jsonb, $3::jsonb) " +
				"AND data->>'transactionId' LIKE $4 AND (data->'completedAt' IS NULL OR data->'completedAt' = 'null'::jsonb)",
		);
		expect(queries[0]?.parameters).toEqual(["workflow_execution", '"running"', '"waiting"', "txn_%"]);
	});

	it("merges updates into the first matching document", async () => {
		const { db, queries } = createTestDb();
		const adapter = kyselyAdapter(db);

		const updated = await adapter.update({
			model: "hold",
			where: [{ field: "id", operator: "eq", value: "hold_1" }],
			update: { released: true },
		});

		expect(updated).toBeNull();
		expect(queries[0]?.sql).toBe(
			"UPDATE vigil_documents SET data = data || $1::jsonb, updated_at = now() " +
				"WHERE model = $2 AND id = (SELECT id FROM vigil_documents WHERE model = $2 AND data->'id' = $3::jsonb LIMIT 1) " +
				"RETURNING data",
		);
		expect(queries[0]?.parameters).toEqual(['{"released":true}', "hold", '"hold_1"']);
	});

	it("rejects field names that are not plain identifiers", () => {
		expect(() => jsonField("id'; DROP TABLE x; --")).toThrow("Invalid document field name");
		expect(jsonField("createdAt")).toBe("data->'createdAt'");
	});

	it("runs transactional statements through the transaction handle", async () => {
		const { db, queries } = createTestDb();
		const adapter = kyselyAdapter(db);

		const result = await adapter.transaction(async (tx) => {
			await tx.findOne({ model: "account", where: [{ field: "id", operator: "eq", value: "A" }], forUpdate: true });
			return tx.id;
		});

		expect(result).toBe("kysely");
		expect(queries.some((q) => q.sql.endsWith("FOR UPDATE"))).toBe(true);
	});
});

describe("applySchema", () => {
	it("executes the bundled DDL", async () => {
		const { db, queries } = createTestDb();
		await applySchema(db);
		expect(queries[0]?.sql).toContain("CREATE TABLE IF NOT EXISTS vigil_documents");
	});
});
