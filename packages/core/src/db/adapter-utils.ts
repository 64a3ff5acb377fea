// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// Helpers for SQL-backed document stores. Documents live in a JSONB `data`
// column; filters compare `data->'field'` against JSON-encoded parameters so
// numbers compare numerically and strings lexically.

import type { ModelName, Where } from "./adapter.js";

/** Default placeholder function: PostgreSQL-style $1, $2, etc. */
function defaultPlaceholder(index: number): string {
	return `$${index}`;
}

/** Quote a document field for use inside a JSON path expression. */
export function jsonField(field: string): string {
	if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(field)) {
		throw new Error(`Invalid document field name: ${field}`);
	}
	return `data->'${field}'`;
}

/**
 * Build a SQL WHERE clause from an array of Where conditions against the
 * JSONB `data` column. Returns the clause string (without the WHERE keyword)
 * and parameter values. Parameter numbering starts at startIndex.
 */
export function buildWhereClause<M extends ModelName>(
	where: Where<M>[],
	startIndex: number = 1,
	placeholder: (index: number) => string = defaultPlaceholder,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	const push = (sqlOp: string, col: string, value: unknown) => {
		conditions.push(`${col} ${sqlOp} ${placeholder(paramIdx)}::jsonb`);
		params.push(JSON.stringify(value));
		paramIdx++;
	};

	for (const w of where) {
		const col = jsonField(w.field);

		switch (w.operator) {
			case "eq":
				push("=", col, w.value);
				break;
			case "ne":
				push("<>", col, w.value);
				break;
			case "gt":
				push(">", col, w.value);
				break;
			case "gte":
				push(">=", col, w.value);
				break;
			case "lt":
				push("<", col, w.value);
				break;
			case "lte":
				push("<=", col, w.value);
				break;
			case "in": {
				const values = Array.isArray(w.value) ? w.value : [w.value];
				if (values.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = values.map((_, i) => `${placeholder(paramIdx + i)}::jsonb`).join(", ");
				conditions.push(`${col} IN (${placeholders})`);
				for (const value of values) params.push(JSON.stringify(value));
				paramIdx += values.length;
				break;
			}
			case "like":
				conditions.push(`data->>'${w.field}' LIKE ${placeholder(paramIdx)}`);
				params.push(String(w.value));
				paramIdx++;
				break;
			case "is_null":
				conditions.push(`(${col} IS NULL OR ${col} = 'null'::jsonb)`);
				break;
			case "is_not_null":
				conditions.push(`(${col} IS NOT NULL AND ${col} <> 'null'::jsonb)`);
				break;
		}
	}

	return { clause: conditions.join(" AND "), params };
}
