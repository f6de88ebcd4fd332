/**
 * Error and warning types shared by the loaders, the normalizer and the CLI.
 */

/**
 * Input could not be read into annotation rows with the required columns.
 */
export class MalformedInputError extends Error {
	constructor(
		message: string,
		public readonly source: string,
		options?: { cause?: unknown },
	) {
		super(`${source}: ${message}`, options);
		this.name = "MalformedInputError";
	}
}

/**
 * Evaluation config file could not be read or failed validation.
 */
export class EvalConfigError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "EvalConfigError";
	}
}

/**
 * Emitted (never thrown) when duplicate records were dropped.
 */
export interface DuplicateRecordWarning {
	kind: "duplicate-records";
	source: string;
	removed: number;
}

export type WarningSink = (warning: DuplicateRecordWarning) => void;

/**
 * Default warning sink: writes to stderr through console.warn.
 */
export const consoleWarningSink: WarningSink = (warning) => {
	console.warn(
		`[normalize] ${warning.source}: ${warning.removed} duplicated entries found and removed.`,
	);
};
