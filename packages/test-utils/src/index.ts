export {
	assertAccountBalance,
	assertHoldsReconcile,
	assertLedgerConserved,
	waitForState,
} from "./assertions.js";
export {
	faultyAdapter,
	type FaultRule,
	type FaultyAdapter,
	type FixedEmbedder,
	fixedEmbedder,
	hangingAnalyzer,
	type RecordingChannel,
	recordingChannel,
	type ScriptedAnalyzer,
	type ScriptedReply,
	scriptedAnalyzer,
} from "./doubles.js";
export { decisionReply, party, riskReply, transactionInput } from "./fixtures.js";
export {
	createTestClock,
	getTestInstance,
	silentLogger,
	TEST_CLOCK_START,
	type TestClock,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
