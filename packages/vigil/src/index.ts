export * from "@vigil/core";
export { createOpenAiAnalyzer, createOpenAiEmbedder, type OpenAiAnalyzerOptions, type OpenAiEmbedderOptions } from "./ai/openai.js";
export { defineVigilConfig, validateConfig } from "./config/index.js";
export { buildContext, HIGH_RISK_COUNTRIES, resolveAdvanced } from "./context/context.js";
export { decide, fallbackDraft } from "./decision/decision-engine.js";
export { parseDecisionResponse, parseRiskResponse } from "./decision/parser.js";
export { createWorkerRunner, VigilWorkerRunner, type WorkerRunnerOptions } from "./infrastructure/worker-runner.js";
export { evaluateRules } from "./risk/rule-engine.js";
export { DEFAULT_RULES, parseRules } from "./risk/rules.js";
export { createDocumentSimilarityIndex } from "./search/similarity.js";
export { type CreateVigilOptions, createVigil, type Vigil } from "./vigil/base.js";
export {
	APPROVAL_TIMEOUT_REASON,
	createWorkflowEngine,
	REVIEW_TIMEOUT_REASON,
	WorkflowEngine,
	type WorkflowEngineOptions,
	type WorkflowHandle,
} from "./workflow/engine.js";
export { DEFAULT_STEP_POLICIES, type StepPolicy, type StepPolicyOverrides } from "./workflow/retry-policy.js";
