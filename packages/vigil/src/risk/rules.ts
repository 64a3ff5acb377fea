// =============================================================================
// RULE DEFINITIONS -- loading and validation
// =============================================================================
// Rules are plain data. The bundled set ships as default-rules.json and is
// validated on load like any caller-supplied rule set.

import type {
	ComparisonOperator,
	ConditionValue,
	FieldPath,
	Rule,
	RuleAction,
	RuleCategory,
	RuleCondition,
} from "@vigil/core";
import { VigilError } from "@vigil/core";
import defaultRules from "./default-rules.json" with { type: "json" };

const OPERATORS: readonly ComparisonOperator[] = [
	"equals",
	"not_equals",
	"greater_than",
	"less_than",
	"greater_or_equal",
	"less_or_equal",
	"in",
	"not_in",
	"contains",
	"regex",
	"exists",
	"not_exists",
];

const CATEGORIES: readonly RuleCategory[] = [
	"amount",
	"geography",
	"pattern",
	"timing",
	"velocity",
	"compliance",
	"custom",
];

const ACTIONS: readonly RuleAction[] = ["approve", "reject", "escalate", "flag", "hold"];

const FIXED_FIELDS: readonly FieldPath[] = [
	"id",
	"type",
	"amount",
	"currency",
	"reference",
	"description",
	"sender.name",
	"sender.accountId",
	"sender.country",
	"sender.customerId",
	"recipient.name",
	"recipient.accountId",
	"recipient.country",
	"recipient.customerId",
	"velocity.count1h",
	"velocity.count24h",
	"velocity.totalAmount1h",
	"velocity.totalAmount24h",
];

// =============================================================================
// GUARDS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOperator(value: unknown): value is ComparisonOperator {
	return OPERATORS.some((op) => op === value);
}

function isCategory(value: unknown): value is RuleCategory {
	return CATEGORIES.some((c) => c === value);
}

function isAction(value: unknown): value is RuleAction {
	return ACTIONS.some((a) => a === value);
}

export function isFieldPath(value: unknown): value is FieldPath {
	if (typeof value !== "string") return false;
	if (FIXED_FIELDS.some((f) => f === value)) return true;
	return /^(flags|metadata)\.[A-Za-z0-9_]+$/.test(value);
}

function isConditionValue(value: unknown): value is ConditionValue {
	if (typeof value === "string" || typeof value === "boolean") return true;
	if (typeof value === "number") return Number.isFinite(value);
	return (
		Array.isArray(value) &&
		value.every((v) => typeof v === "string" || (typeof v === "number" && Number.isFinite(v)))
	);
}

// =============================================================================
// PARSING
// =============================================================================

function parseCondition(raw: unknown, path: string): RuleCondition {
	if (!isRecord(raw)) {
		throw VigilError.invalidArgument(`${path} must be an object`);
	}

	const { kind, conditions, field, operator, value } = raw;

	if (kind === "all" || kind === "any") {
		if (!Array.isArray(conditions) || conditions.length === 0) {
			throw VigilError.invalidArgument(`${path}.conditions must be a non-empty array`);
		}
		return {
			kind,
			conditions: conditions.map((c, i) => parseCondition(c, `${path}.conditions[${i}]`)),
		};
	}

	if (kind !== "predicate") {
		throw VigilError.invalidArgument(`${path}.kind must be one of all, any, predicate`);
	}
	if (!isFieldPath(field)) {
		throw VigilError.invalidArgument(`${path}.field is not a known field path: ${String(field)}`);
	}
	if (!isOperator(operator)) {
		throw VigilError.invalidArgument(`${path}.operator is not supported: ${String(operator)}`);
	}

	if (operator === "exists" || operator === "not_exists") {
		return { kind: "predicate", field, operator };
	}
	if (!isConditionValue(value)) {
		throw VigilError.invalidArgument(`${path}.value is missing or not a scalar/array`);
	}
	if ((operator === "in" || operator === "not_in") && !Array.isArray(value)) {
		throw VigilError.invalidArgument(`${path}.value must be an array for "${operator}"`);
	}
	if (operator === "regex") {
		if (typeof value !== "string") {
			throw VigilError.invalidArgument(`${path}.value must be a pattern string for "regex"`);
		}
		try {
			new RegExp(value);
		} catch (cause) {
			throw VigilError.invalidArgument(`${path}.value is not a valid pattern`, cause);
		}
	}
	return { kind: "predicate", field, operator, value };
}

/**
 * Validate an untyped rule list (e.g. parsed JSON) into typed rules.
 * Throws INVALID_ARGUMENT naming the first offending path.
 */
export function parseRules(raw: unknown): Rule[] {
	if (!Array.isArray(raw)) {
		throw VigilError.invalidArgument("rules must be an array");
	}

	const seen = new Set<string>();
	return raw.map((entry, index): Rule => {
		const path = `rules[${index}]`;
		if (!isRecord(entry)) {
			throw VigilError.invalidArgument(`${path} must be an object`);
		}
		const { id, name, category, action, priority, flag, enabled } = entry;
		if (typeof id !== "string" || id.length === 0) {
			throw VigilError.invalidArgument(`${path}.id must be a non-empty string`);
		}
		if (seen.has(id)) {
			throw VigilError.invalidArgument(`${path}.id "${id}" is declared twice`);
		}
		seen.add(id);
		if (typeof name !== "string") {
			throw VigilError.invalidArgument(`${path}.name must be a string`);
		}
		if (!isCategory(category)) {
			throw VigilError.invalidArgument(`${path}.category is not supported: ${String(category)}`);
		}
		if (!isAction(action)) {
			throw VigilError.invalidArgument(`${path}.action is not supported: ${String(action)}`);
		}
		if (typeof priority !== "number" || !Number.isFinite(priority)) {
			throw VigilError.invalidArgument(`${path}.priority must be a number`);
		}
		if (flag !== undefined && typeof flag !== "string") {
			throw VigilError.invalidArgument(`${path}.flag must be a string`);
		}
		if (enabled !== undefined && typeof enabled !== "boolean") {
			throw VigilError.invalidArgument(`${path}.enabled must be a boolean`);
		}

		const rule: Rule = {
			id,
			name,
			category,
			condition: parseCondition(entry.condition, `${path}.condition`),
			action,
			priority,
			enabled: enabled ?? true,
		};
		if (flag !== undefined) rule.flag = flag;
		return rule;
	});
}

export const DEFAULT_RULES: Rule[] = parseRules(defaultRules);
