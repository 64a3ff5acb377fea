// =============================================================================
// RULE TYPES -- condition trees evaluated by the rule engine
// =============================================================================

import type { DecisionValue, RuleAction } from "./decision.js";

export type ComparisonOperator =
	| "equals"
	| "not_equals"
	| "greater_than"
	| "less_than"
	| "greater_or_equal"
	| "less_or_equal"
	| "in"
	| "not_in"
	| "contains"
	| "regex"
	| "exists"
	| "not_exists";

/** Field paths the rule engine can resolve against a transaction's facts. */
export type FieldPath =
	| "id"
	| "type"
	| "amount"
	| "currency"
	| "reference"
	| "description"
	| "sender.name"
	| "sender.accountId"
	| "sender.country"
	| "sender.customerId"
	| "recipient.name"
	| "recipient.accountId"
	| "recipient.country"
	| "recipient.customerId"
	| "velocity.count1h"
	| "velocity.count24h"
	| "velocity.totalAmount1h"
	| "velocity.totalAmount24h"
	| `flags.${string}`
	| `metadata.${string}`;

export type ConditionValue = string | number | boolean | Array<string | number>;

export type RuleCondition =
	| { kind: "all"; conditions: RuleCondition[] }
	| { kind: "any"; conditions: RuleCondition[] }
	| { kind: "predicate"; field: FieldPath; operator: ComparisonOperator; value?: ConditionValue };

export type RuleCategory =
	| "amount"
	| "geography"
	| "pattern"
	| "timing"
	| "velocity"
	| "compliance"
	| "custom";

export interface Rule {
	id: string;
	name: string;
	category: RuleCategory;
	condition: RuleCondition;
	action: RuleAction;
	/** Higher wins. Equal priorities resolve to the first-declared rule. */
	priority: number;
	/** Extra risk flag contributed when triggered, e.g. `structuring_pattern`. */
	flag?: string;
	enabled: boolean;
}

export interface TriggeredRule {
	ruleId: string;
	name: string;
	category: RuleCategory;
	action: RuleAction;
	priority: number;
}

export interface RuleEvaluation {
	triggered: TriggeredRule[];
	/** Flags contributed by triggered rules (`rule_{category}` plus any rule flag). */
	flags: string[];
	/** Winning action, with legacy `flag` and `hold` mapped to `escalate`. */
	recommendedAction: DecisionValue | null;
	/** Id of the rule whose action won. */
	winningRuleId: string | null;
}
