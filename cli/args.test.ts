import { describe, expect, it } from "vitest";
import { optionString, parseArgs, toStringArray } from "./args.ts";

describe("parseArgs", () => {
	it("parses single values, value lists and flags", () => {
		const parsed = parseArgs([
			"--gold_standard",
			"gold.tsv",
			"--entities",
			"DISEASE",
			"SYMPTOM",
			"--per-document",
			"-h",
		]);

		expect(parsed.options).toEqual({
			gold_standard: "gold.tsv",
			entities: ["DISEASE", "SYMPTOM"],
			"per-document": true,
			h: true,
		});
		expect(parsed.args).toEqual([]);
	});

	it("keeps positional arguments", () => {
		expect(parseArgs(["extra", "--predictions", "pred.tsv"]).args).toEqual(["extra"]);
	});
});

describe("optionString", () => {
	it("takes a string, the last of several values, or nothing for a flag", () => {
		expect(optionString("a.tsv")).toBe("a.tsv");
		expect(optionString(["a.tsv", "b.tsv"])).toBe("b.tsv");
		expect(optionString(true)).toBeUndefined();
		expect(optionString(undefined)).toBeUndefined();
	});
});

describe("toStringArray", () => {
	it("splits comma-separated values", () => {
		expect(toStringArray(["DISEASE,SYMPTOM", "PROCEDURE"])).toEqual([
			"DISEASE",
			"SYMPTOM",
			"PROCEDURE",
		]);
		expect(toStringArray("DISEASE, ")).toEqual(["DISEASE"]);
		expect(toStringArray(true)).toBeUndefined();
	});
});
