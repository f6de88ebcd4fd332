/**
 * Core schemas and types for spaneval.
 * Defines Zod schemas for raw annotation rows and the evaluation config.
 */

import { z } from "zod";

// ============================================================================
// Annotation Rows
// ============================================================================

/**
 * Column names every annotation file must carry.
 */
export const DOCUMENT_TAG = "filename";
export const LABEL_TAG = "label";
export const START_SPAN_TAG = "start_span";
export const END_SPAN_TAG = "end_span";
export const ENTITY_TEXT_TAG = "text";

export const REQUIRED_COLUMNS = [
	DOCUMENT_TAG,
	LABEL_TAG,
	START_SPAN_TAG,
	END_SPAN_TAG,
	ENTITY_TEXT_TAG,
] as const;

/**
 * A raw row as read from an annotation file. Extra columns pass through
 * validation untouched and are dropped by normalization.
 */
export const RawAnnotationRowSchema = z
	.object({
		[DOCUMENT_TAG]: z.string(),
		[LABEL_TAG]: z.string(),
		[START_SPAN_TAG]: z.string(),
		[END_SPAN_TAG]: z.string(),
		[ENTITY_TEXT_TAG]: z.string(),
	})
	.passthrough();

export type RawAnnotationRow = Record<string, string>;

/**
 * One labeled span occurrence after normalization.
 */
export interface AnnotationRecord {
	/** Source document ("clinical case") id */
	documentId: string;
	spanStart: string;
	spanEnd: string;
	/** `spanStart + " " + spanEnd`, the offset half of the match key */
	spanKey: string;
	label: string;
	/** Surface text, carried for display only */
	entityText: string;
}

/**
 * Deduplicated records from one source (gold or predicted).
 * No two records share `(documentId, label, spanKey)`.
 */
export type RecordSet = readonly AnnotationRecord[];

// ============================================================================
// Evaluation Configuration Schema
// ============================================================================

export const InputFormatSchema = z.enum(["tsv", "jsonl"]);

export type InputFormat = z.infer<typeof InputFormatSchema>;

export const ZeroDivisionSchema = z.enum(["nan", "zero"]);

export type ZeroDivision = z.infer<typeof ZeroDivisionSchema>;

export const EvalConfigSchema = z.object({
	goldStandard: z.string().min(1),
	predictions: z.string().min(1),
	entities: z.array(z.string()).optional(),
	format: InputFormatSchema.optional(),
	perDocument: z.boolean().default(false),
	zeroDivision: ZeroDivisionSchema.default("nan"),
	output: z.string().optional(),
});

export type EvalConfig = z.infer<typeof EvalConfigSchema>;
