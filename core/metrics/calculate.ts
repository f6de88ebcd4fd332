/**
 * Metric derivation: per-document and micro-averaged Precision, Recall and F1.
 */

import type { MetricsOptions, MetricsResult, PositiveCounts } from "./interface.ts";
import { computeF1FromPR, divide, guardedDivide, harmonicMean } from "./utils.ts";

/**
 * Derive metrics from positive counts.
 *
 * Per-document values are indexed by the gold documents and are not guarded:
 * a document with no predictions has precision 0/0 = NaN unless
 * `zeroDivision` is "zero". A gold document with predictions but no match
 * gets precision 0, recall 0 and F1 0/0 = NaN. Documents that only appear in
 * the predictions (`counts.predictedOnlyDocuments`) fall outside that index
 * and are left out of per-document precision.
 */
export function calculateMetrics(
	counts: PositiveCounts,
	options: MetricsOptions = {},
): MetricsResult {
	const settle = (value: number): number =>
		options.zeroDivision === "zero" && Number.isNaN(value) ? 0 : value;

	const precisionPerDoc = new Map<string, number>();
	const recallPerDoc = new Map<string, number>();
	const f1PerDoc = new Map<string, number>();

	for (const [doc, goldCount] of counts.goldPositivesPerDoc) {
		const tp = counts.truePositivesPerDoc.get(doc) ?? 0;
		const predictedCount = counts.predictedPositivesPerDoc.get(doc) ?? 0;

		const precision = divide(tp, predictedCount);
		const recall = divide(tp, goldCount);

		precisionPerDoc.set(doc, settle(precision));
		recallPerDoc.set(doc, settle(recall));
		f1PerDoc.set(doc, settle(harmonicMean(precision, recall)));
	}

	const precision = guardedDivide(counts.truePositives, counts.predictedPositives);
	const recall = guardedDivide(counts.truePositives, counts.goldPositives);

	return {
		precisionPerDoc,
		precision,
		recallPerDoc,
		recall,
		f1PerDoc,
		f1: computeF1FromPR(precision, recall),
		counts,
	};
}

