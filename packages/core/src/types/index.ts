export type {
	AiAnalyzer,
	AnalysisPurpose,
	AnalysisRequest,
	Embedder,
	NotificationChannel,
	SimilarityFilters,
	SimilarityIndex,
	SimilarityQuery,
} from "./collaborators.js";
export type { CoreWorkerOptions, VigilAdvancedOptions, VigilLogger, VigilOptions } from "./config.js";
export type {
	ResolvedAdvancedOptions,
	ResolvedVigilOptions,
	VigilContext,
	VigilWorkerDefinition,
} from "./context.js";
export type {
	AmendmentKind,
	ComplianceChecks,
	Decision,
	DecisionAmendment,
	DecisionSource,
	DecisionValue,
	RiskLevel,
	RuleAction,
	SimilarCase,
} from "./decision.js";
export type {
	Account,
	AccountStatus,
	BalanceUpdate,
	FundsCheck,
	Hold,
	JournalEntry,
	JournalEntryStatus,
	TransferResult,
} from "./ledger.js";
export type {
	CustomerHistory,
	DecisionDraft,
	EnrichmentResult,
	NetworkAnalysis,
	RiskAssessment,
	VelocitySnapshot,
	VelocityWindow,
} from "./risk.js";
export type {
	ComparisonOperator,
	ConditionValue,
	FieldPath,
	Rule,
	RuleCategory,
	RuleCondition,
	RuleEvaluation,
	TriggeredRule,
} from "./rule.js";
export {
	type MetadataValue,
	type Party,
	type ProcessingStage,
	type SubmitTransactionInput,
	TERMINAL_TRANSACTION_STATUSES,
	TRANSACTION_STATUS_TRANSITIONS,
	type Transaction,
	type TransactionStatus,
	type TransactionType,
} from "./transaction.js";
export type {
	AuditEvent,
	AuditEventKind,
	AuditValue,
	HumanReview,
	Notification,
	PendingAmendment,
	ReviewPriority,
	SettlementResult,
	WaitKind,
	WorkerLease,
	WorkflowExecutionState,
	WorkflowResults,
	WorkflowSignal,
	WorkflowSignalKind,
	WorkflowSignalRecord,
	WorkflowStage,
	WorkflowStateView,
	WorkflowStatus,
	WorkflowWait,
} from "./workflow.js";
