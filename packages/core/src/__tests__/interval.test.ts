import { describe, expect, it } from "vitest";
import { parseInterval } from "../utils/interval.js";

describe("parseInterval", () => {
	it("parses every supported unit", () => {
		expect(parseInterval("250ms")).toBe(250);
		expect(parseInterval("5s")).toBe(5_000);
		expect(parseInterval("1m")).toBe(60_000);
		expect(parseInterval("24h")).toBe(86_400_000);
		expect(parseInterval("7d")).toBe(604_800_000);
	});

	it("tolerates surrounding whitespace", () => {
		expect(parseInterval(" 2h ")).toBe(7_200_000);
	});

	it("rejects malformed intervals", () => {
		expect(() => parseInterval("5")).toThrow('Invalid interval format: "5"');
		expect(() => parseInterval("1w")).toThrow('Invalid interval format: "1w"');
		expect(() => parseInterval("-1s")).toThrow();
	});
});
