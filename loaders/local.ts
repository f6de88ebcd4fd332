/**
 * Local annotation file loaders for TSV and JSONL formats.
 */

import { readFile } from "node:fs/promises";
import { REQUIRED_COLUMNS, type RawAnnotationRow } from "../core/config.ts";
import { MalformedInputError } from "../core/errors.ts";

/**
 * Read a file as UTF-8, dropping a leading byte-order mark.
 * @throws MalformedInputError if the file cannot be read
 */
async function readText(path: string): Promise<string> {
	let content: string;
	try {
		content = await readFile(path, "utf8");
	} catch (error) {
		throw new MalformedInputError(`cannot read file (${error})`, path, { cause: error });
	}
	return content.startsWith("\uFEFF") ? content.slice(1) : content;
}

function assertRequiredColumns(columns: readonly string[], source: string, where: string): void {
	const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
	if (missing.length > 0) {
		throw new MalformedInputError(`${where} is missing required columns: ${missing.join(", ")}`, source);
	}
}

/**
 * Parse tab-separated text with a header row.
 *
 * Quoting is disabled: quotes are literal characters. Blank lines are skipped,
 * short rows are padded with empty strings, and long rows are rejected.
 */
export function parseTsv(content: string, source = "input"): RawAnnotationRow[] {
	const lines = content
		.split("\n")
		.map((line, index) => ({ text: line.endsWith("\r") ? line.slice(0, -1) : line, lineNo: index + 1 }))
		.filter((line) => line.text.length > 0);

	const [header, ...body] = lines;
	if (!header) {
		throw new MalformedInputError("no header row", source);
	}

	const columns = header.text.split("\t");
	assertRequiredColumns(columns, source, "header");

	return body.map(({ text, lineNo }) => {
		const values = text.split("\t");
		if (values.length > columns.length) {
			throw new MalformedInputError(
				`line ${lineNo} has ${values.length} fields, expected ${columns.length}`,
				source,
			);
		}

		const row: RawAnnotationRow = {};
		columns.forEach((column, j) => {
			row[column] = values[j] ?? "";
		});
		return row;
	});
}

function jsonType(value: unknown): string {
	if (value === null) return "null";
	return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Parse JSON Lines: one object per line with the annotation columns.
 * Required columns must hold strings; non-string extra columns are dropped.
 */
export function parseJsonl(content: string, source = "input"): RawAnnotationRow[] {
	const rows: RawAnnotationRow[] = [];
	const lines = content.split("\n");

	lines.forEach((line, index) => {
		if (!line.trim()) return;

		let parsed: unknown;
		try {
			parsed = JSON.parse(line);
		} catch (error) {
			throw new MalformedInputError(`failed to parse line ${index + 1}: ${error}`, source, {
				cause: error,
			});
		}

		if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
			throw new MalformedInputError(`line ${index + 1} is not a JSON object`, source);
		}

		const row: RawAnnotationRow = {};
		for (const [key, value] of Object.entries(parsed)) {
			if (typeof value === "string") {
				row[key] = value;
			} else if (REQUIRED_COLUMNS.some((column) => column === key)) {
				throw new MalformedInputError(
					`line ${index + 1} field "${key}" must be a string, got ${jsonType(value)}`,
					source,
				);
			}
		}
		assertRequiredColumns(Object.keys(row), source, `line ${index + 1}`);
		rows.push(row);
	});

	return rows;
}

export async function loadLocalTsv(path: string): Promise<RawAnnotationRow[]> {
	return parseTsv(await readText(path), path);
}

export async function loadLocalJsonl(path: string): Promise<RawAnnotationRow[]> {
	return parseJsonl(await readText(path), path);
}
