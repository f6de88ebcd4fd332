/**
 * Record Normalizer: turns raw annotation rows into a deduplicated RecordSet.
 */

import {
	RawAnnotationRowSchema,
	type AnnotationRecord,
	type RecordSet,
} from "../config.ts";
import { MalformedInputError, consoleWarningSink, type WarningSink } from "../errors.ts";

export interface NormalizeOptions {
	/** Name of the input, used in errors and warnings (default: "input") */
	source?: string;
	/** Receives the duplicate warning (default: console.warn) */
	onWarning?: WarningSink;
}

/**
 * Build the offset half of the match key.
 */
export function toSpanKey(spanStart: string, spanEnd: string): string {
	return `${spanStart} ${spanEnd}`;
}

/**
 * Key a record by `(documentId, label, spanKey)`.
 */
export function recordKey(record: AnnotationRecord): string {
	return JSON.stringify([record.documentId, record.label, record.spanKey]);
}

/**
 * Drop all but the first record of every `(documentId, label, spanKey)` group.
 * Idempotent: a deduplicated set comes back unchanged.
 */
export function dedupeRecords(
	records: readonly AnnotationRecord[],
	options: NormalizeOptions = {},
): RecordSet {
	const seen = new Set<string>();
	const unique: AnnotationRecord[] = [];

	for (const record of records) {
		const key = recordKey(record);
		if (seen.has(key)) continue;
		seen.add(key);
		unique.push(record);
	}

	const removed = records.length - unique.length;
	if (removed > 0) {
		const warn = options.onWarning ?? consoleWarningSink;
		warn({ kind: "duplicate-records", source: options.source ?? "input", removed });
	}

	return unique;
}

/**
 * Validate raw rows, derive span keys and deduplicate.
 * @throws MalformedInputError if a row is missing a required field
 */
export function normalize(
	rawRows: readonly unknown[],
	options: NormalizeOptions = {},
): RecordSet {
	const source = options.source ?? "input";

	const records = rawRows.map((raw, index): AnnotationRecord => {
		const parsed = RawAnnotationRowSchema.safeParse(raw);
		if (!parsed.success) {
			const fields = parsed.error.issues
				.map((issue) => issue.path.join(".") || "(row)")
				.join(", ");
			throw new MalformedInputError(
				`row ${index + 1} is missing or has non-string fields: ${fields}`,
				source,
			);
		}

		const row = parsed.data;
		return {
			documentId: row.filename,
			spanStart: row.start_span,
			spanEnd: row.end_span,
			spanKey: toSpanKey(row.start_span, row.end_span),
			label: row.label,
			entityText: row.text,
		};
	});

	return dedupeRecords(records, { ...options, source });
}
