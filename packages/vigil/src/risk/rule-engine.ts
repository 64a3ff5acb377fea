// =============================================================================
// RULE ENGINE -- condition trees over transaction facts
// =============================================================================
// Pure and synchronous. A rule's condition is a discriminated union evaluated
// by a small recursive interpreter; fields are resolved through a typed path
// resolver, never by reflective lookup.

import type {
	ConditionValue,
	DecisionValue,
	FieldPath,
	Rule,
	RuleAction,
	RuleCondition,
	RuleEvaluation,
	Transaction,
	TriggeredRule,
	VelocitySnapshot,
} from "@vigil/core";
import { Decimal } from "decimal.js";

export interface RuleFacts {
	transaction: Pick<
		Transaction,
		"id" | "type" | "amount" | "currency" | "reference" | "description" | "sender" | "recipient" | "metadata"
	>;
	velocity: VelocitySnapshot | null;
	/** Flags raised so far. `flags.<name>` resolves to `true` when present, null otherwise. */
	flags: readonly string[];
}

export type FactValue = string | number | boolean | null;

// =============================================================================
// FIELD RESOLUTION
// =============================================================================

function velocityField(velocity: VelocitySnapshot | null, window: string, key: "count" | "totalAmount"): FactValue {
	const entry = velocity?.windows[window];
	if (!entry) return null;
	return entry[key];
}

export function resolveField(facts: RuleFacts, field: FieldPath): FactValue {
	const { transaction: txn } = facts;
	switch (field) {
		case "id":
			return txn.id;
		case "type":
			return txn.type;
		case "amount":
			return txn.amount;
		case "currency":
			return txn.currency;
		case "reference":
			return txn.reference;
		case "description":
			return txn.description;
		case "sender.name":
			return txn.sender.name;
		case "sender.accountId":
			return txn.sender.accountId;
		case "sender.country":
			return txn.sender.country;
		case "sender.customerId":
			return txn.sender.customerId;
		case "recipient.name":
			return txn.recipient.name;
		case "recipient.accountId":
			return txn.recipient.accountId;
		case "recipient.country":
			return txn.recipient.country;
		case "recipient.customerId":
			return txn.recipient.customerId;
		case "velocity.count1h":
			return velocityField(facts.velocity, "1h", "count");
		case "velocity.count24h":
			return velocityField(facts.velocity, "24h", "count");
		case "velocity.totalAmount1h":
			return velocityField(facts.velocity, "1h", "totalAmount");
		case "velocity.totalAmount24h":
			return velocityField(facts.velocity, "24h", "totalAmount");
	}

	if (field.startsWith("flags.")) {
		return facts.flags.includes(field.slice("flags.".length)) ? true : null;
	}
	return txn.metadata[field.slice("metadata.".length)] ?? null;
}

// =============================================================================
// OPERATORS
// =============================================================================

function toDecimal(value: FactValue | string | number): Decimal | null {
	if (typeof value === "number") return Number.isFinite(value) ? new Decimal(value) : null;
	if (typeof value !== "string" || value.trim() === "") return null;
	try {
		const parsed = new Decimal(value.trim());
		return parsed.isFinite() ? parsed : null;
	} catch {
		return null;
	}
}

/** Numeric comparison through decimal.js; null when either side is not a number. */
function compareNumeric(actual: FactValue, expected: ConditionValue | undefined): number | null {
	if (typeof expected !== "number" && typeof expected !== "string") return null;
	const a = toDecimal(actual);
	const b = toDecimal(expected);
	if (!a || !b) return null;
	return a.comparedTo(b);
}

function scalarEquals(actual: FactValue, expected: string | number | boolean): boolean {
	if (typeof expected === "number") {
		return compareNumeric(actual, expected) === 0;
	}
	return actual === expected;
}

function matchesPattern(actual: FactValue, pattern: string): boolean {
	if (actual === null) return false;
	try {
		// Anchored at the start of the value only.
		return new RegExp(`^(?:${pattern})`).test(String(actual));
	} catch {
		return false;
	}
}

function evaluatePredicate(
	actual: FactValue,
	operator: Extract<RuleCondition, { kind: "predicate" }>["operator"],
	expected: ConditionValue | undefined,
): boolean {
	switch (operator) {
		case "exists":
			return actual !== null;
		case "not_exists":
			return actual === null;
		case "equals":
			return expected !== undefined && !Array.isArray(expected) && scalarEquals(actual, expected);
		case "not_equals":
			return expected !== undefined && !Array.isArray(expected) && !scalarEquals(actual, expected);
		case "greater_than": {
			const c = compareNumeric(actual, expected);
			return c !== null && c > 0;
		}
		case "less_than": {
			const c = compareNumeric(actual, expected);
			return c !== null && c < 0;
		}
		case "greater_or_equal": {
			const c = compareNumeric(actual, expected);
			return c !== null && c >= 0;
		}
		case "less_or_equal": {
			const c = compareNumeric(actual, expected);
			return c !== null && c <= 0;
		}
		case "in":
			return Array.isArray(expected) && expected.some((v) => scalarEquals(actual, v));
		case "not_in":
			return Array.isArray(expected) && !expected.some((v) => scalarEquals(actual, v));
		case "contains":
			return actual !== null && expected !== undefined && String(actual).includes(String(expected));
		case "regex":
			return typeof expected === "string" && matchesPattern(actual, expected);
	}
}

// =============================================================================
// EVALUATION
// =============================================================================

export function evaluateCondition(condition: RuleCondition, facts: RuleFacts): boolean {
	switch (condition.kind) {
		case "all":
			return condition.conditions.length > 0 && condition.conditions.every((c) => evaluateCondition(c, facts));
		case "any":
			return condition.conditions.some((c) => evaluateCondition(c, facts));
		case "predicate":
			return evaluatePredicate(resolveField(facts, condition.field), condition.operator, condition.value);
	}
}

/** `flag` and `hold` are legacy rule actions; both mean a human should look. */
export function normalizeRuleAction(action: RuleAction): DecisionValue {
	return action === "flag" || action === "hold" ? "escalate" : action;
}

/**
 * Evaluate enabled rules in declaration order. The highest priority wins;
 * on equal priority the first-declared rule keeps the win.
 */
export function evaluateRules(rules: readonly Rule[], facts: RuleFacts): RuleEvaluation {
	const triggered: TriggeredRule[] = [];
	const flags: string[] = [];
	let winner: TriggeredRule | null = null;

	for (const rule of rules) {
		if (!rule.enabled || !evaluateCondition(rule.condition, facts)) continue;

		const hit: TriggeredRule = {
			ruleId: rule.id,
			name: rule.name,
			category: rule.category,
			action: rule.action,
			priority: rule.priority,
		};
		triggered.push(hit);

		for (const flag of [`rule_${rule.category}`, rule.flag]) {
			if (flag && !flags.includes(flag)) flags.push(flag);
		}
		if (!winner || hit.priority > winner.priority) {
			winner = hit;
		}
	}

	return {
		triggered,
		flags,
		recommendedAction: winner ? normalizeRuleAction(winner.action) : null,
		winningRuleId: winner?.ruleId ?? null,
	};
}
