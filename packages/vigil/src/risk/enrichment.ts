// =============================================================================
// ENRICHMENT -- contextual flags and rule evaluation
// =============================================================================

import type { CustomerHistory, EnrichmentResult, Rule, Transaction, VelocitySnapshot } from "@vigil/core";
import { Decimal } from "decimal.js";
import { evaluateRules } from "./rule-engine.js";

const HIGH_AMOUNT = 50_000;
const HIGH_AMOUNT_VELOCITY_1H = 100_000;

/** Outside 06:00-22:59 UTC. */
export function isUnusualTime(at: Date): boolean {
	const hour = at.getUTCHours();
	return hour < 6 || hour > 22;
}

export function buildEnrichment(input: {
	transaction: Transaction;
	velocity: VelocitySnapshot;
	customerHistory: CustomerHistory;
	newRecipient: boolean;
	rules: readonly Rule[];
	highRiskCountries: readonly string[];
}): EnrichmentResult {
	const { transaction: txn, velocity } = input;
	const flags: string[] = [];
	const add = (flag: string) => {
		if (!flags.includes(flag)) flags.push(flag);
	};

	if (new Decimal(txn.amount).greaterThan(HIGH_AMOUNT)) add("high_amount");

	const unusualTime = isUnusualTime(new Date(txn.createdAt));
	if (unusualTime) add("unusual_time");

	const senderCountry = txn.sender.country.toUpperCase();
	const recipientCountry = txn.recipient.country.toUpperCase();
	if (txn.type === "international" || senderCountry !== recipientCountry) add("cross_border");
	if (input.highRiskCountries.includes(senderCountry) || input.highRiskCountries.includes(recipientCountry)) {
		add("high_risk_country");
	}

	if (input.newRecipient) add("new_recipient");

	const hour = velocity.windows["1h"];
	const day = velocity.windows["24h"];
	if (hour && hour.count > 3) add("high_velocity_1h");
	if (day && day.count > 10) add("high_velocity_24h");
	if (hour && new Decimal(hour.totalAmount).greaterThan(HIGH_AMOUNT_VELOCITY_1H)) add("high_amount_velocity");

	const rules = evaluateRules(input.rules, { transaction: txn, velocity, flags });
	for (const flag of rules.flags) add(flag);

	return {
		flags,
		velocity,
		customerHistory: input.customerHistory,
		rules,
		unusualTime,
		newRecipient: input.newRecipient,
	};
}
