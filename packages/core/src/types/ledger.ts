// =============================================================================
// LEDGER TYPES -- accounts, holds, journal entries, balance updates
// =============================================================================
// Monetary fields are decimal strings. Arithmetic goes through decimal.js,
// never through JavaScript numbers.

export type AccountStatus = "active" | "frozen" | "closed";

export interface Account {
	/** Account reference. Doubles as the document key. */
	id: string;
	ownerId: string;
	/** Authoritative balance. */
	balance: string;
	/** `balance` minus the sum of active holds. */
	availableBalance: string;
	overdraftLimit: string;
	currency: string;
	status: AccountStatus;
	transactionCount: number;
	totalDebits: string;
	totalCredits: string;
	createdAt: string;
	updatedAt: string;
}

export interface Hold {
	id: string;
	accountId: string;
	transactionId: string;
	amount: string;
	reason: string;
	expiresAt: string;
	released: boolean;
	releasedAt: string | null;
	releaseReason: string | null;
	createdAt: string;
}

export type JournalEntryStatus = "committed";

export interface JournalEntry {
	/** Always `journal:{transactionId}`. */
	id: string;
	transactionId: string;
	debitAccountId: string;
	debitAmount: string;
	creditAccountId: string;
	creditAmount: string;
	currency: string;
	description: string;
	status: JournalEntryStatus;
	committed: boolean;
	createdAt: string;
}

export interface BalanceUpdate {
	id: string;
	accountId: string;
	transactionId: string;
	direction: "debit" | "credit";
	amount: string;
	balanceBefore: string;
	balanceAfter: string;
	createdAt: string;
}

export interface FundsCheck {
	ok: boolean;
	availableBalance: string;
}

export interface TransferResult {
	committed: boolean;
	journalEntryId: string;
	/** False when the journal entry already existed and nothing was applied. */
	applied: boolean;
}
