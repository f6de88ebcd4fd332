/**
 * Command-line argument parsing.
 */

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * Parse `--key value...` and `-k value...` options. A key followed by several
 * values collects them into an array; a key with no value is `true`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const args: string[] = [];
	const options: Record<string, OptionValue> = {};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;

		if (!arg.startsWith("-")) {
			args.push(arg);
			continue;
		}

		const key = arg.replace(/^--?/, "");
		const values: string[] = [];
		for (let next = argv[i + 1]; next !== undefined && !next.startsWith("-"); next = argv[i + 1]) {
			values.push(next);
			i++;
		}

		if (values.length === 0) {
			options[key] = true;
		} else {
			options[key] = values.length === 1 ? (values[0] ?? "") : values;
		}
	}

	return { args, options };
}

/**
 * Read a single-valued option; the last value wins when repeated.
 */
export function optionString(value: OptionValue | undefined): string | undefined {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value[value.length - 1];
	return undefined;
}

/**
 * Safely convert an option value to a string array.
 * Splits comma-separated values (e.g., "a,b,c" → ["a", "b", "c"]).
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	return values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
}
