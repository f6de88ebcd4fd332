/**
 * Positive counting: true, predicted and gold positives, total and per document.
 */

import type { AnnotationRecord, RecordSet } from "../config.ts";
import { recordKey } from "../records/normalize.ts";
import type { DocumentSeries, PositiveCounts } from "./interface.ts";
import { increment, sortByKey } from "./utils.ts";

interface SpanCount {
	total: number;
	perDoc: DocumentSeries;
}

/**
 * Count distinct `(documentId, spanKey)` pairs; the label is ignored.
 */
export function countDistinctSpans(records: RecordSet): SpanCount {
	const seen = new Set<string>();
	const perDoc = new Map<string, number>();

	for (const record of records) {
		const key = JSON.stringify([record.documentId, record.spanKey]);
		if (seen.has(key)) continue;
		seen.add(key);
		increment(perDoc, record.documentId);
	}

	return { total: seen.size, perDoc: sortByKey(perDoc) };
}

function documentIds(records: readonly AnnotationRecord[]): Set<string> {
	return new Set(records.map((record) => record.documentId));
}

/**
 * Count positives for a gold/predicted pair.
 *
 * True positives join every gold record against the predicted
 * `(documentId, spanKey, label)` keys, so each gold document gets an entry
 * in `truePositivesPerDoc`, 0 when nothing matched or nothing was predicted.
 */
export function countPositives(gold: RecordSet, predicted: RecordSet): PositiveCounts {
	const predictedSpans = countDistinctSpans(predicted);
	const goldSpans = countDistinctSpans(gold);

	const predictedKeys = new Set(predicted.map(recordKey));
	const truePositivesPerDoc = new Map<string, number>();
	let truePositives = 0;

	for (const record of gold) {
		const hit = predictedKeys.has(recordKey(record)) ? 1 : 0;
		truePositives += hit;
		truePositivesPerDoc.set(
			record.documentId,
			(truePositivesPerDoc.get(record.documentId) ?? 0) + hit,
		);
	}

	const goldDocs = documentIds(gold);
	const predictedDocs = documentIds(predicted);

	const unpredictedDocuments = Array.from(goldDocs)
		.filter((doc) => !predictedDocs.has(doc))
		.sort();
	const predictedOnlyDocuments = Array.from(predictedDocs)
		.filter((doc) => !goldDocs.has(doc))
		.sort();

	for (const doc of unpredictedDocuments) {
		truePositivesPerDoc.set(doc, 0);
	}

	return {
		truePositives,
		truePositivesPerDoc: sortByKey(truePositivesPerDoc),
		predictedPositives: predictedSpans.total,
		predictedPositivesPerDoc: predictedSpans.perDoc,
		goldPositives: goldSpans.total,
		goldPositivesPerDoc: goldSpans.perDoc,
		unpredictedDocuments,
		predictedOnlyDocuments,
	};
}
