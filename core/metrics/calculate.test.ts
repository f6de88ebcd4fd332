import { describe, expect, it } from "vitest";
import type { AnnotationRecord } from "../config.ts";
import { calculateMetrics } from "./calculate.ts";
import { countPositives } from "./positives.ts";
import { computeMetrics } from "./index.ts";

function rec(documentId: string, spanKey: string, label: string): AnnotationRecord {
	const [spanStart = "", spanEnd = ""] = spanKey.split(" ");
	return { documentId, spanStart, spanEnd, spanKey, label, entityText: "" };
}

const gold = [
	rec("doc1", "0 5", "DISEASE"),
	rec("doc1", "10 15", "SYMPTOM"),
	rec("doc2", "3 8", "DISEASE"),
];

describe("calculateMetrics", () => {
	it("derives micro precision, recall and F1", () => {
		const predicted = [rec("doc1", "0 5", "DISEASE"), rec("doc1", "10 15", "DISEASE")];

		const result = calculateMetrics(
			countPositives([rec("doc1", "0 5", "DISEASE")], predicted),
		);

		expect(result.precision).toBe(0.5);
		expect(result.recall).toBe(1);
		expect(result.f1).toBeCloseTo(2 / 3, 10);
	});

	it("derives per-document values over the gold documents", () => {
		const predicted = [
			rec("doc1", "0 5", "DISEASE"),
			rec("doc1", "10 15", "SYMPTOM"),
			rec("doc1", "20 22", "SYMPTOM"),
			rec("doc2", "3 8", "SYMPTOM"),
		];

		const result = calculateMetrics(countPositives(gold, predicted));

		expect(Array.from(result.precisionPerDoc.keys())).toEqual(["doc1", "doc2"]);
		expect(result.precisionPerDoc.get("doc1")).toBeCloseTo(2 / 3, 10);
		expect(result.recallPerDoc.get("doc1")).toBe(1);
		expect(result.f1PerDoc.get("doc1")).toBeCloseTo(0.8, 10);
		expect(result.precisionPerDoc.get("doc2")).toBe(0);
		expect(result.recallPerDoc.get("doc2")).toBe(0);
		expect(result.f1PerDoc.get("doc2")).toBeNaN();
	});

	it("propagates NaN for a gold document with no predictions", () => {
		const predicted = [rec("doc1", "0 5", "DISEASE")];

		const result = calculateMetrics(countPositives(gold, predicted));

		expect(result.precisionPerDoc.get("doc2")).toBeNaN();
		expect(result.recallPerDoc.get("doc2")).toBe(0);
		expect(result.f1PerDoc.get("doc2")).toBeNaN();
	});

	it("reports 0 instead of NaN when zeroDivision is zero", () => {
		const predicted = [rec("doc1", "0 5", "DISEASE")];

		const result = calculateMetrics(countPositives(gold, predicted), {
			zeroDivision: "zero",
		});

		expect(result.precisionPerDoc.get("doc2")).toBe(0);
		expect(result.f1PerDoc.get("doc2")).toBe(0);
		expect(result.precisionPerDoc.get("doc1")).toBe(1);
	});

	it("leaves predicted-only documents out of per-document precision", () => {
		const predicted = [...gold, rec("doc9", "0 4", "DISEASE")];

		const result = calculateMetrics(countPositives(gold, predicted));

		expect(result.precisionPerDoc.has("doc9")).toBe(false);
		expect(result.recallPerDoc.has("doc9")).toBe(false);
		expect(result.precisionPerDoc.get("doc1")).toBe(1);
		expect(result.precision).toBe(0.75);
		expect(result.recall).toBe(1);
	});
});

describe("computeMetrics", () => {
	it("scores a gold set against itself as perfect", () => {
		const result = computeMetrics(gold, gold);

		expect(result.precision).toBe(1);
		expect(result.recall).toBe(1);
		expect(result.f1).toBe(1);
	});

	it("scores zero when no triple is shared", () => {
		const predicted = [rec("doc1", "0 5", "SYMPTOM"), rec("doc2", "4 8", "DISEASE")];

		const result = computeMetrics(gold, predicted);

		expect(result.counts.truePositives).toBe(0);
		expect(result.precision).toBe(0);
		expect(result.recall).toBe(0);
		expect(result.f1).toBe(0);
	});

	it("guards the micro averages when there are no predictions", () => {
		const result = computeMetrics(gold, []);

		expect(result.precision).toBe(0);
		expect(result.recall).toBe(0);
		expect(result.f1).toBe(0);
		expect(result.counts.truePositivesPerDoc.get("doc1")).toBe(0);
		expect(result.counts.truePositivesPerDoc.get("doc2")).toBe(0);
	});

	it("guards the micro averages when there is no gold standard", () => {
		const result = computeMetrics([], gold);

		expect(result.precision).toBe(0);
		expect(result.recall).toBe(0);
		expect(result.f1).toBe(0);
		expect(result.precisionPerDoc.size).toBe(0);
	});

	it("does not depend on row order", () => {
		const predicted = [
			rec("doc2", "3 8", "DISEASE"),
			rec("doc1", "10 15", "DISEASE"),
			rec("doc1", "0 5", "DISEASE"),
		];

		const forward = computeMetrics(gold, predicted);
		const reversed = computeMetrics([...gold].reverse(), [...predicted].reverse());

		expect(reversed.precision).toBe(forward.precision);
		expect(reversed.recall).toBe(forward.recall);
		expect(reversed.f1).toBe(forward.f1);
		expect(Array.from(reversed.f1PerDoc.entries())).toEqual(
			Array.from(forward.f1PerDoc.entries()),
		);
	});
});
