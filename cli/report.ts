/**
 * Result output: the micro-average lines, a per-document table and a JSON report.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { EvalConfig } from "../core/config.ts";
import type { MetricsResult } from "../core/metrics/index.ts";

/**
 * Print a score in shortest round-trip form: `1.0`, `0.5`, `0.6666666666666666`.
 * Exponent notation is used below 1e-4 and from 1e16, with a signed
 * two-digit exponent (`1e-07`, `2.5e-05`).
 */
export function formatScore(value: number): string {
	if (!Number.isFinite(value)) return String(value);

	const [mantissa = "", exponentText = "0"] = value.toExponential().split("e");
	const exponent = Number(exponentText);
	if (value !== 0 && (exponent < -4 || exponent >= 16)) {
		const sign = exponent < 0 ? "-" : "+";
		return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
	}
	return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function microLines(result: MetricsResult): string[] {
	return [
		`Micro-average Precision: ${formatScore(result.precision)}`,
		`Micro-average Recall: ${formatScore(result.recall)}`,
		`Micro-average F1 score: ${formatScore(result.f1)}`,
	];
}

export interface DocumentRow {
	documentId: string;
	goldPositives: number;
	predictedPositives: number;
	truePositives: number;
	precision: number;
	recall: number;
	f1: number;
}

/**
 * One row per gold document, in document order.
 */
export function documentRows(result: MetricsResult): DocumentRow[] {
	const { counts } = result;
	return Array.from(result.precisionPerDoc.keys()).map((documentId) => ({
		documentId,
		goldPositives: counts.goldPositivesPerDoc.get(documentId) ?? 0,
		predictedPositives: counts.predictedPositivesPerDoc.get(documentId) ?? 0,
		truePositives: counts.truePositivesPerDoc.get(documentId) ?? 0,
		precision: result.precisionPerDoc.get(documentId) ?? Number.NaN,
		recall: result.recallPerDoc.get(documentId) ?? Number.NaN,
		f1: result.f1PerDoc.get(documentId) ?? Number.NaN,
	}));
}

/**
 * Render the per-document table as lines.
 */
export function perDocumentTable(result: MetricsResult): string[] {
	const rows = documentRows(result);
	const docCol = rows.reduce((width, r) => Math.max(width, r.documentId.length), 20);
	const countCol = 6;
	const metricCol = 10;

	const header = [
		"Document".padEnd(docCol),
		"Gold".padStart(countCol),
		"Pred".padStart(countCol),
		"TP".padStart(countCol),
		"Precision".padStart(metricCol),
		"Recall".padStart(metricCol),
		"F1".padStart(metricCol),
	].join(" │ ");
	const width = header.length + 2;

	const lines = [
		"╭" + "─".repeat(width) + "╮",
		"│ " + "PER DOCUMENT".padEnd(width - 1) + "│",
		"├" + "─".repeat(width) + "┤",
		"│ " + header + " │",
		"├" + "─".repeat(width) + "┤",
	];

	for (const r of rows) {
		const cells = [
			r.documentId.padEnd(docCol),
			String(r.goldPositives).padStart(countCol),
			String(r.predictedPositives).padStart(countCol),
			String(r.truePositives).padStart(countCol),
			r.precision.toFixed(4).padStart(metricCol),
			r.recall.toFixed(4).padStart(metricCol),
			r.f1.toFixed(4).padStart(metricCol),
		];
		lines.push("│ " + cells.join(" │ ") + " │");
	}

	lines.push("╰" + "─".repeat(width) + "╯");
	return lines;
}

/**
 * Build the JSON report. NaN serializes as null.
 */
export function buildReport(config: EvalConfig, result: MetricsResult) {
	const { counts } = result;
	return {
		goldStandard: config.goldStandard,
		predictions: config.predictions,
		entities: config.entities ?? null,
		micro: { precision: result.precision, recall: result.recall, f1: result.f1 },
		counts: {
			truePositives: counts.truePositives,
			predictedPositives: counts.predictedPositives,
			goldPositives: counts.goldPositives,
		},
		unpredictedDocuments: counts.unpredictedDocuments,
		predictedOnlyDocuments: counts.predictedOnlyDocuments,
		perDocument: documentRows(result),
	};
}

export async function writeReport(
	path: string,
	config: EvalConfig,
	result: MetricsResult,
): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, `${JSON.stringify(buildReport(config, result), null, 2)}\n`);
}
