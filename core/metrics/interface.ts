/**
 * Result types for the Metrics Engine.
 */

import type { ZeroDivision } from "../config.ts";

/**
 * Per-document values keyed by document id.
 */
export type DocumentSeries = ReadonlyMap<string, number>;

/**
 * Counts produced by countPositives().
 */
export interface PositiveCounts {
	truePositives: number;
	truePositivesPerDoc: DocumentSeries;
	/** Distinct `(documentId, spanKey)` pairs in the predictions */
	predictedPositives: number;
	predictedPositivesPerDoc: DocumentSeries;
	/** Distinct `(documentId, spanKey)` pairs in the gold standard */
	goldPositives: number;
	goldPositivesPerDoc: DocumentSeries;
	/** Gold documents with no prediction at all (sorted) */
	unpredictedDocuments: readonly string[];
	/** Predicted documents with no gold annotation (sorted) */
	predictedOnlyDocuments: readonly string[];
}

export interface MetricsOptions {
	/**
	 * What a per-document 0/0 becomes: "nan" keeps NaN, "zero" reports 0.
	 * Micro averages are always guarded. Default: "nan".
	 */
	zeroDivision?: ZeroDivision;
}

/**
 * Per-document series and micro averages.
 * Per-document series are indexed by the gold documents, sorted by id.
 */
export interface MetricsResult {
	precisionPerDoc: DocumentSeries;
	precision: number;
	recallPerDoc: DocumentSeries;
	recall: number;
	f1PerDoc: DocumentSeries;
	f1: number;
	counts: PositiveCounts;
}
