import type { Rule, VelocitySnapshot } from "@vigil/core";
import { describe, expect, it } from "vitest";
import { evaluateCondition, evaluateRules, type RuleFacts, resolveField } from "../risk/rule-engine.js";
import { DEFAULT_RULES, parseRules } from "../risk/rules.js";

// =============================================================================
// HELPERS
// =============================================================================

function facts(overrides: Partial<RuleFacts["transaction"]> = {}, extra: Partial<RuleFacts> = {}): RuleFacts {
	return {
		transaction: {
			id: "txn-1",
			type: "wire",
			amount: "1000.00",
			currency: "USD",
			reference: null,
			description: null,
			sender: { name: "Alice", accountId: "ACC-A", country: "US", customerId: "CUST-A" },
			recipient: { name: "Bob", accountId: "ACC-B", country: "US", customerId: "CUST-B" },
			metadata: {},
			...overrides,
		},
		velocity: null,
		flags: [],
		...extra,
	};
}

function velocity(count1h: number, total1h: string): VelocitySnapshot {
	return {
		subjectId: "CUST-A",
		currency: "USD",
		windows: {
			"1h": { window: "1h", count: count1h, totalAmount: total1h, totalsByCurrency: {}, timeSinceLastMs: 1_000 },
			"24h": { window: "24h", count: count1h, totalAmount: total1h, totalsByCurrency: {}, timeSinceLastMs: 1_000 },
		},
		computedAt: "2026-03-04T12:00:00.000Z",
	};
}

function rule(id: string, priority: number, overrides: Partial<Rule> = {}): Rule {
	return {
		id,
		name: id,
		category: "custom",
		condition: { kind: "predicate", field: "type", operator: "equals", value: "wire" },
		action: "escalate",
		priority,
		enabled: true,
		...overrides,
	};
}

// =============================================================================
// DEFAULT RULES
// =============================================================================

describe("default rules", () => {
	it("loads the bundled rule set", () => {
		expect(DEFAULT_RULES.map((r) => r.id)).toEqual([
			"high_amount_wire",
			"high_risk_country",
			"suspicious_round_amount",
			"after_hours_large_amount",
			"rapid_movement",
			"structuring",
			"multiple_structuring_offshore",
		]);
	});

	describe("structuring", () => {
		it("triggers for a wire just below 5000", () => {
			const result = evaluateRules(DEFAULT_RULES, facts({ amount: "4950.00" }));

			expect(result.triggered.map((r) => r.ruleId)).toEqual(["structuring"]);
			expect(result.flags).toEqual(["rule_pattern", "structuring_pattern"]);
			expect(result.recommendedAction).toBe("escalate");
			expect(result.winningRuleId).toBe("structuring");
		});

		it("does not trigger at exactly 5000", () => {
			const result = evaluateRules(DEFAULT_RULES, facts({ amount: "5000.00" }));
			expect(result.triggered).toEqual([]);
			expect(result.recommendedAction).toBeNull();
		});

		it("does not trigger at 4899", () => {
			const result = evaluateRules(DEFAULT_RULES, facts({ amount: "4899.00" }));
			expect(result.triggered).toEqual([]);
		});

		it("does not trigger for ach", () => {
			const result = evaluateRules(DEFAULT_RULES, facts({ type: "ach", amount: "4950.00" }));
			expect(result.triggered).toEqual([]);
		});
	});

	it("flags an offshore recipient below the reporting threshold", () => {
		const result = evaluateRules(
			DEFAULT_RULES,
			facts({
				type: "ach",
				amount: "4850.00",
				recipient: { name: "Offshore Holdings", accountId: "ACC-O", country: "US", customerId: "CUST-O" },
			}),
		);
		expect(result.triggered.map((r) => r.ruleId)).toEqual(["multiple_structuring_offshore"]);
		expect(result.flags).toEqual(["rule_pattern", "structuring_pattern"]);
	});

	it("lets the higher priority win across several hits", () => {
		const result = evaluateRules(
			DEFAULT_RULES,
			facts({
				amount: "60000.00",
				recipient: { name: "Bob", accountId: "ACC-B", country: "IR", customerId: "CUST-B" },
			}),
		);
		expect(result.triggered.map((r) => r.ruleId)).toEqual(["high_amount_wire", "high_risk_country"]);
		expect(result.winningRuleId).toBe("high_risk_country");
		expect(result.flags).toEqual(["rule_amount", "rule_geography"]);
	});

	it("reads velocity facts for rapid movement", () => {
		const result = evaluateRules(DEFAULT_RULES, facts({ type: "ach", amount: "500.00" }, { velocity: velocity(1, "80000.00") }));
		expect(result.triggered.map((r) => r.ruleId)).toEqual(["rapid_movement"]);
		expect(result.flags).toEqual(["rule_velocity", "rapid_movement"]);
	});

	it("reads raised flags for after-hours amounts", () => {
		const result = evaluateRules(
			DEFAULT_RULES,
			facts({ type: "ach", amount: "30000.00" }, { flags: ["unusual_time"] }),
		);
		expect(result.triggered.map((r) => r.ruleId)).toEqual(["after_hours_large_amount"]);
	});
});

// =============================================================================
// PRIORITY AND ACTIONS
// =============================================================================

describe("evaluateRules", () => {
	it("keeps the first-declared rule on equal priority", () => {
		const result = evaluateRules(
			[rule("first", 50, { action: "approve" }), rule("second", 50, { action: "reject" })],
			facts(),
		);
		expect(result.winningRuleId).toBe("first");
		expect(result.recommendedAction).toBe("approve");
	});

	it("picks the higher priority regardless of order", () => {
		const result = evaluateRules([rule("low", 10, { action: "approve" }), rule("high", 90, { action: "reject" })], facts());
		expect(result.winningRuleId).toBe("high");
		expect(result.recommendedAction).toBe("reject");
	});

	it("maps legacy flag and hold actions to escalate", () => {
		expect(evaluateRules([rule("legacy", 1, { action: "flag" })], facts()).recommendedAction).toBe("escalate");
		expect(evaluateRules([rule("legacy", 1, { action: "hold" })], facts()).recommendedAction).toBe("escalate");
	});

	it("skips disabled rules", () => {
		const result = evaluateRules([rule("off", 99, { enabled: false })], facts());
		expect(result.triggered).toEqual([]);
		expect(result.winningRuleId).toBeNull();
	});
});

// =============================================================================
// CONDITIONS
// =============================================================================

describe("evaluateCondition", () => {
	it("treats an empty all as false and an empty any as false", () => {
		expect(evaluateCondition({ kind: "all", conditions: [] }, facts())).toBe(false);
		expect(evaluateCondition({ kind: "any", conditions: [] }, facts())).toBe(false);
	});

	it("anchors regex at the start of the value", () => {
		const offshore = { kind: "predicate", field: "recipient.name", operator: "regex", value: "Offshore.*" } as const;
		const named = (name: string) =>
			facts({ recipient: { name, accountId: "ACC-B", country: "US", customerId: "CUST-B" } });

		expect(evaluateCondition(offshore, named("Offshore Trust"))).toBe(true);
		expect(evaluateCondition(offshore, named("The Offshore Trust"))).toBe(false);
	});

	it("treats an invalid regex as no match", () => {
		expect(
			evaluateCondition({ kind: "predicate", field: "sender.name", operator: "regex", value: "(" }, facts()),
		).toBe(false);
	});

	it("compares decimal amounts numerically", () => {
		const check = (operator: "greater_or_equal" | "less_or_equal", value: number) =>
			evaluateCondition({ kind: "predicate", field: "amount", operator, value }, facts({ amount: "1000.00" }));

		expect(check("greater_or_equal", 1000)).toBe(true);
		expect(check("less_or_equal", 999.99)).toBe(false);
	});

	it("never matches a numeric comparison against a missing value", () => {
		expect(
			evaluateCondition({ kind: "predicate", field: "velocity.count1h", operator: "less_than", value: 5 }, facts()),
		).toBe(false);
	});

	it("resolves flags and metadata paths", () => {
		const f = facts({ metadata: { channel: "mobile" } }, { flags: ["new_recipient"] });
		expect(resolveField(f, "flags.new_recipient")).toBe(true);
		expect(resolveField(f, "flags.cross_border")).toBeNull();
		expect(resolveField(f, "metadata.channel")).toBe("mobile");
		expect(resolveField(f, "metadata.missing")).toBeNull();
	});

	it("supports exists, in and contains", () => {
		const f = facts({ description: "Quarterly invoice" });
		expect(evaluateCondition({ kind: "predicate", field: "description", operator: "exists" }, f)).toBe(true);
		expect(evaluateCondition({ kind: "predicate", field: "reference", operator: "not_exists" }, f)).toBe(true);
		expect(
			evaluateCondition({ kind: "predicate", field: "sender.country", operator: "in", value: ["CA", "US"] }, f),
		).toBe(true);
		expect(
			evaluateCondition({ kind: "predicate", field: "description", operator: "contains", value: "invoice" }, f),
		).toBe(true);
	});
});

// =============================================================================
// PARSING
// =============================================================================

describe("parseRules", () => {
	it("rejects a rule with an unknown field path", () => {
		expect(() =>
			parseRules([
				{
					id: "bad",
					name: "Bad",
					category: "custom",
					condition: { kind: "predicate", field: "sender.iban", operator: "equals", value: "x" },
					action: "escalate",
					priority: 1,
					enabled: true,
				},
			]),
		).toThrow();
	});
});
