/**
 * The evaluate command: load gold and predicted annotations, score, print.
 */

import { EvalConfigError, MalformedInputError } from "../core/errors.ts";
import { loadEvalConfig } from "../core/eval-config.ts";
import { computeMetrics } from "../core/metrics/index.ts";
import { UnknownFormatError, ensureBuiltinLoadersRegistered, loadRecordSet } from "../loaders/index.ts";
import { optionString, parseArgs, toStringArray } from "./args.ts";
import { microLines, perDocumentTable, writeReport } from "./report.ts";

export const USAGE = `
Usage:
  spaneval --gold_standard <path> --predictions <path> [options]

Evaluate NER predictions against a gold standard (exact span and label match).

Options:
  --gold_standard <path>     Gold standard annotations (TSV with header)
  --predictions <path>       Predicted annotations (TSV with header)
  --entities <LABEL...>      Only evaluate these labels (upper-cased)
  --config <path>            YAML file with any of the options below
  --format <tsv|jsonl>       Input format (default: from file extension)
  --per-document             Print per-document precision, recall and F1
  --zero-division <nan|zero> Per-document value for 0/0 (default: nan)
  --output <path>            Write a JSON report
  -h, --help                 Show this message

Input columns: filename, label, start_span, end_span, text
`;

/**
 * Usage text followed by the registered input formats.
 */
export function helpText(): string {
	const formats = ensureBuiltinLoadersRegistered()
		.list()
		.map((def) => {
			const extensions = (def.aliases ?? []).join(", ");
			return `  ${def.name.padEnd(8)}${def.description ?? ""}${extensions ? ` (${extensions})` : ""}`;
		});
	return `${USAGE}\nInput formats:\n${formats.join("\n")}\n`;
}

/**
 * Run the evaluation for argv (without the node and script entries).
 * Returns the process exit code; input and config errors print and return 1.
 */
export async function runEvaluation(argv: readonly string[]): Promise<number> {
	const { options } = parseArgs(argv);

	if (options["help"] || options["h"]) {
		console.log(helpText());
		return 0;
	}

	try {
		const config = await loadEvalConfig(
			{
				goldStandard: optionString(options["gold_standard"]),
				predictions: optionString(options["predictions"]),
				entities: toStringArray(options["entities"]),
				format: optionString(options["format"]),
				perDocument: options["per-document"] === true ? true : undefined,
				zeroDivision: optionString(options["zero-division"]),
				output: optionString(options["output"]),
			},
			optionString(options["config"]),
		);

		const loadOptions = { format: config.format, entities: config.entities };
		const gold = await loadRecordSet(config.goldStandard, loadOptions);
		const predicted = await loadRecordSet(config.predictions, loadOptions);

		const result = computeMetrics(gold, predicted, { zeroDivision: config.zeroDivision });

		for (const line of microLines(result)) {
			console.log(line);
		}
		if (config.perDocument) {
			console.log(perDocumentTable(result).join("\n"));
		}
		if (config.output) {
			await writeReport(config.output, config, result);
		}
		return 0;
	} catch (error) {
		if (
			error instanceof MalformedInputError ||
			error instanceof EvalConfigError ||
			error instanceof UnknownFormatError
		) {
			console.error(`❌ ${error.message}`);
			if (error instanceof EvalConfigError) {
				console.error(USAGE);
			}
			return 1;
		}
		throw error;
	}
}
