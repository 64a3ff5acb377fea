import type { DecisionValue, Party, SubmitTransactionInput } from "vigil";

export function party(name: string, country: string, overrides: Partial<Party> = {}): Party {
	const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, "-");
	return {
		name,
		accountId: `ACC-${slug}`,
		country,
		customerId: `CUST-${slug}`,
		...overrides,
	};
}

export function transactionInput(overrides: Partial<SubmitTransactionInput> = {}): SubmitTransactionInput {
	return {
		type: "ach",
		amount: "2500.00",
		currency: "USD",
		sender: party("Alice Sender", "US"),
		recipient: party("Bob Recipient", "US"),
		description: "Invoice payment",
		...overrides,
	};
}

/** JSON decision completion as the analyzer would return it. */
export function decisionReply(
	decision: DecisionValue,
	confidence: number,
	extra: { reasoning?: string; risk_factors?: string[] } = {},
): string {
	return JSON.stringify({
		decision,
		confidence,
		reasoning: extra.reasoning ?? `Scripted ${decision}`,
		risk_factors: extra.risk_factors ?? [],
	});
}

export function riskReply(score: number, factors: string[] = []): string {
	return JSON.stringify({ risk_score: score, risk_factors: factors });
}
